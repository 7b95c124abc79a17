/**
 * Rule Assembly
 * Builds the ordered rule chain handed to the layout engine. Order is
 * significant: the layout engine lets later rules override earlier ones.
 */

import type { TextDocument } from 'vscode-languageserver-textdocument';

import type {
  FormattingHost,
  FormattingRule,
  LayoutContext,
  SyntaxFormattingService
} from '../core/host';

/**
 * Keeps the line structure of pasted text; only spacing and indentation change.
 */
export class PasteFormattingRule implements FormattingRule {
  readonly name = 'paste';

  applyTo(context: LayoutContext): void {
    context.directives.preserveLineBreaks = true;
  }
}

const pasteFormattingRule = new PasteFormattingRule();

/**
 * Host-specific rules first, then the default set
 */
export function assembleFormattingRules(
  host: FormattingHost,
  document: TextDocument,
  position: number
): readonly FormattingRule[] {
  return Object.freeze([
    ...host.createHostRules(document, position),
    ...host.getDefaultFormattingRules(document)
  ]);
}

/**
 * Paste rule ahead of the language's default set. Host rules are not consulted.
 */
export function assemblePasteFormattingRules(service: SyntaxFormattingService): readonly FormattingRule[] {
  return Object.freeze([pasteFormattingRule, ...service.getDefaultFormattingRules()]);
}
