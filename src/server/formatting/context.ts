/**
 * Per-evaluation formatting context
 */

import type { CancellationToken } from 'vscode-languageserver/node';
import type { TextDocument } from 'vscode-languageserver-textdocument';

import { throwIfCancelled } from '../core/cancellation';
import type { FormattingHost, FormattingOptionSet } from '../core/host';
import type { SyntaxNode, SyntaxTree } from '../core/syntax';
import { logger } from '../utils/logger';

/**
 * Everything one trigger evaluation reads. Built fresh for every event from
 * the document snapshot it was invoked with and never shared.
 */
export interface FormattingContext {
  readonly host: FormattingHost;
  readonly document: TextDocument;
  readonly tree: SyntaxTree;
  readonly root: SyntaxNode;
  readonly options: FormattingOptionSet;
  readonly cancellation: CancellationToken;
}

/**
 * Fetch tree, root and options for `document`.
 * @returns undefined when the tree or the options are unavailable
 */
export async function createFormattingContext(
  host: FormattingHost,
  document: TextDocument,
  cancellation: CancellationToken
): Promise<FormattingContext | undefined> {
  const tree = await host.getSyntaxTree(document, cancellation);
  throwIfCancelled(cancellation);
  if (!tree) {
    logger.verboseWithContext('Syntax tree unavailable', { uri: document.uri });
    return undefined;
  }

  const options = await host.getOptions(document, cancellation);
  throwIfCancelled(cancellation);
  if (!options) {
    logger.verboseWithContext('Formatting options unavailable', { uri: document.uri });
    return undefined;
  }

  const root = await tree.getRoot(cancellation);
  throwIfCancelled(cancellation);

  return Object.freeze({ host, document, tree, root, options, cancellation });
}
