/**
 * Editor Formatting Service
 * Host-facing entry points for automatic and on-demand formatting
 */

import { CancellationToken } from 'vscode-languageserver/node';
import type { TextDocument } from 'vscode-languageserver-textdocument';

import { createCancelledError, isCancellationError } from '../core/cancellation';
import type { FormattingHost, FormattingOptionSet, TextChange } from '../core/host';
import type { TextSpan } from '../core/syntax';
import { OPERATIONS } from '../utils/constants';
import { logger } from '../utils/logger';
import { isSupportedTriggerCharacter, supportsFormattingOnTypedCharacter } from './eligibility';
import { evaluateTrigger } from './triggerPolicy';
import type { TriggerResult } from './triggerPolicy';

type Operation = (typeof OPERATIONS)[keyof typeof OPERATIONS];

/**
 * Automatic formatting is best effort: a collaborator that is unavailable or
 * fails yields no edits. Only cancellation reaches the caller.
 */
export class EditorFormattingService {
  readonly supportsFormatDocument = true;
  readonly supportsFormatSelection = true;
  readonly supportsFormatOnPaste = true;
  readonly supportsFormatOnReturn = true;

  constructor(private readonly host: FormattingHost) {}

  async supportsFormattingOnTypedCharacter(
    document: TextDocument,
    typedChar: string,
    cancellation: CancellationToken = CancellationToken.None
  ): Promise<boolean> {
    if (!isSupportedTriggerCharacter(typedChar)) {
      return false;
    }

    const options = await this.guard<FormattingOptionSet | undefined>(
      OPERATIONS.TYPED_CHAR,
      document,
      cancellation,
      undefined,
      () => this.host.getOptions(document, cancellation)
    );
    return options !== undefined && supportsFormattingOnTypedCharacter(typedChar, options);
  }

  onTypedChar(
    document: TextDocument,
    typedChar: string,
    caretOffset: number,
    cancellation: CancellationToken = CancellationToken.None
  ): Promise<TriggerResult> {
    return this.guard<TriggerResult>(OPERATIONS.TYPED_CHAR, document, cancellation, undefined, () =>
      evaluateTrigger(this.host, document, { kind: 'typedChar', character: typedChar, caretOffset }, cancellation)
    );
  }

  onReturn(
    document: TextDocument,
    caretOffset: number,
    cancellation: CancellationToken = CancellationToken.None
  ): Promise<TriggerResult> {
    return this.guard<TriggerResult>(OPERATIONS.RETURN, document, cancellation, undefined, () =>
      evaluateTrigger(this.host, document, { kind: 'return', caretOffset }, cancellation)
    );
  }

  onPaste(
    document: TextDocument,
    span: TextSpan,
    cancellation: CancellationToken = CancellationToken.None
  ): Promise<TextChange[]> {
    return this.guard<TextChange[]>(OPERATIONS.PASTE, document, cancellation, [], () =>
      evaluateTrigger(this.host, document, { kind: 'paste', span }, cancellation)
    );
  }

  /**
   * Format `span`, or the whole document when no span is given
   */
  onDemand(
    document: TextDocument,
    span: TextSpan | undefined,
    cancellation: CancellationToken = CancellationToken.None
  ): Promise<TextChange[]> {
    return this.guard<TextChange[]>(OPERATIONS.DEMAND, document, cancellation, [], () =>
      evaluateTrigger(this.host, document, { kind: 'demand', span }, cancellation)
    );
  }

  private async guard<T>(
    operation: Operation,
    document: TextDocument,
    cancellation: CancellationToken,
    fallback: T,
    action: () => Promise<T>
  ): Promise<T> {
    const startTime = Date.now();
    try {
      const result = await action();
      logger.verboseWithContext('Formatting evaluated', {
        uri: document.uri,
        operation,
        duration: Date.now() - startTime
      });
      return result;
    } catch (error) {
      if (isCancellationError(error)) {
        throw error;
      }
      // A collaborator aborting on cancellation surfaces as a cancelled request
      if (cancellation.isCancellationRequested) {
        throw createCancelledError();
      }
      logger.errorWithContext('Formatting failed', { uri: document.uri, operation, error });
      return fallback;
    }
  }
}
