/**
 * Trigger Policy
 * Decides, per edit event, whether formatting runs and over which span
 */

import type { CancellationToken } from 'vscode-languageserver/node';
import type { TextDocument } from 'vscode-languageserver-textdocument';

import { throwIfCancelled } from '../core/cancellation';
import type { FormattingHost, TextChange } from '../core/host';
import { SyntaxKind, isKind, spanEnd, spanFromBounds } from '../core/syntax';
import type { SyntaxNode, TextSpan } from '../core/syntax';
import { logger } from '../utils/logger';
import { createFormattingContext } from './context';
import { formatRangeThenToken, formatSpans } from './dispatcher';
import {
  isInvalidSingleCharacterToken,
  isInvalidTokenKind,
  isKeywordSuffixCharacter,
  isSupportedTriggerCharacter,
  isValidSingleOrMultiCharacterTokenKind,
  supportsFormattingOnTypedCharacter,
  tokenShouldNotFormatOnReturn,
  tokenShouldNotFormatOnTypedChar
} from './eligibility';
import { assembleFormattingRules, assemblePasteFormattingRules } from './rules';
import { locateTokenBeforeCaret } from './tokenLocator';

export type TriggerEvent =
  | { readonly kind: 'typedChar'; readonly character: string; readonly caretOffset: number }
  | { readonly kind: 'return'; readonly caretOffset: number }
  | { readonly kind: 'paste'; readonly span: TextSpan }
  | { readonly kind: 'demand'; readonly span?: TextSpan };

/**
 * Result of a trigger evaluation: `undefined` means formatting was not
 * attempted; an empty list means it ran and found nothing to change.
 */
export type TriggerResult = TextChange[] | undefined;

function skip(document: TextDocument, event: TriggerEvent, reason: string): undefined {
  logger.verboseWithContext('Formatting skipped', {
    uri: document.uri,
    operation: event.kind,
    reason
  });
  return undefined;
}

/**
 * Widen `span` by one token on each side so the layout engine sees the
 * whitespace that joins the span to its surroundings.
 */
export function getFormattingSpan(root: SyntaxNode, span: TextSpan): TextSpan {
  const startToken = root.findToken(span.start, false).getPreviousToken();
  const endToken = root.findToken(Math.max(span.start, spanEnd(span) - 1), false).getNextToken();

  const start = startToken && !startToken.isMissing ? startToken.span.start : root.fullSpan.start;
  const end = endToken && !isInvalidTokenKind(endToken) ? spanEnd(endToken.span) : spanEnd(root.fullSpan);
  return spanFromBounds(start, end);
}

async function evaluateTypedChar(
  host: FormattingHost,
  document: TextDocument,
  event: Extract<TriggerEvent, { kind: 'typedChar' }>,
  cancellation: CancellationToken
): Promise<TriggerResult> {
  const { character, caretOffset } = event;
  if (!isSupportedTriggerCharacter(character)) {
    return skip(document, event, `character ${JSON.stringify(character)} does not trigger formatting`);
  }

  const context = await createFormattingContext(host, document, cancellation);
  if (!context) {
    return skip(document, event, 'tree or options unavailable');
  }

  if (!supportsFormattingOnTypedCharacter(character, context.options)) {
    return skip(document, event, `${JSON.stringify(character)} is turned off by the current options`);
  }

  const token = locateTokenBeforeCaret(context.root, caretOffset);
  if (token.isMissing) {
    return skip(document, event, 'no token before caret');
  }

  if (!isValidSingleOrMultiCharacterTokenKind(character, token.kind) || isInvalidTokenKind(token)) {
    return skip(document, event, `token ${token.kind} cannot anchor ${JSON.stringify(character)}`);
  }

  if (!isKeywordSuffixCharacter(character) && isInvalidSingleCharacterToken(token, character)) {
    return skip(document, event, `token text ${JSON.stringify(token.text)} was not produced by the keystroke`);
  }

  const syntaxFacts = host.getSyntaxFactsService(document);
  if (syntaxFacts?.isInNonUserCode(context.tree, caretOffset, cancellation)) {
    return skip(document, event, 'caret is in non-user code');
  }
  throwIfCancelled(cancellation);

  if (tokenShouldNotFormatOnTypedChar(token, document)) {
    return skip(document, event, `${token.kind} excluded in this context`);
  }

  const rules = assembleFormattingRules(host, document, caretOffset);

  // Close-brace formatting off: indent the brace, leave the block alone
  const smartIndentOnly =
    isKind(token, SyntaxKind.CloseBraceToken) && !context.options.autoFormattingOnCloseBrace;

  return formatRangeThenToken(context, token, rules, smartIndentOnly);
}

async function evaluateReturn(
  host: FormattingHost,
  document: TextDocument,
  event: Extract<TriggerEvent, { kind: 'return' }>,
  cancellation: CancellationToken
): Promise<TriggerResult> {
  const context = await createFormattingContext(host, document, cancellation);
  if (!context) {
    return skip(document, event, 'tree or options unavailable');
  }

  const token = locateTokenBeforeCaret(context.root, event.caretOffset);
  if (token.isMissing) {
    return skip(document, event, 'no token before caret');
  }

  if (isInvalidSingleCharacterToken(token)) {
    return skip(document, event, `token ${token.kind} cannot anchor a return`);
  }

  if (tokenShouldNotFormatOnReturn(token)) {
    return skip(document, event, 'only a using statement head formats on return');
  }

  const rules = assembleFormattingRules(host, document, event.caretOffset);
  return formatRangeThenToken(context, token, rules);
}

async function evaluatePaste(
  host: FormattingHost,
  document: TextDocument,
  event: Extract<TriggerEvent, { kind: 'paste' }>,
  cancellation: CancellationToken
): Promise<TextChange[]> {
  const service = host.getSyntaxFormattingService(document);
  if (!service) {
    skip(document, event, 'syntax formatting service unavailable');
    return [];
  }

  const context = await createFormattingContext(host, document, cancellation);
  if (!context) {
    skip(document, event, 'tree or options unavailable');
    return [];
  }

  const span = getFormattingSpan(context.root, event.span);
  if (span.length === 0) {
    return [];
  }

  return formatSpans(context, [span], assemblePasteFormattingRules(service));
}

async function evaluateDemand(
  host: FormattingHost,
  document: TextDocument,
  event: Extract<TriggerEvent, { kind: 'demand' }>,
  cancellation: CancellationToken
): Promise<TextChange[]> {
  const context = await createFormattingContext(host, document, cancellation);
  if (!context) {
    skip(document, event, 'tree or options unavailable');
    return [];
  }

  const requested = event.span ?? context.root.fullSpan;
  const span = getFormattingSpan(context.root, requested);
  if (span.length === 0) {
    return [];
  }

  return formatSpans(context, [span], host.getDefaultFormattingRules(document));
}

/**
 * Evaluate one trigger event against a document snapshot.
 *
 * Paste and on-demand events always produce a list; typed-character and
 * return events produce `undefined` when the policy declines to format.
 * Cancellation propagates as a `RequestCancelled` response error.
 */
export function evaluateTrigger(
  host: FormattingHost,
  document: TextDocument,
  event: Extract<TriggerEvent, { kind: 'paste' | 'demand' }>,
  cancellation: CancellationToken
): Promise<TextChange[]>;
export function evaluateTrigger(
  host: FormattingHost,
  document: TextDocument,
  event: TriggerEvent,
  cancellation: CancellationToken
): Promise<TriggerResult>;
export async function evaluateTrigger(
  host: FormattingHost,
  document: TextDocument,
  event: TriggerEvent,
  cancellation: CancellationToken
): Promise<TriggerResult> {
  throwIfCancelled(cancellation);

  switch (event.kind) {
    case 'typedChar':
      return evaluateTypedChar(host, document, event, cancellation);
    case 'return':
      return evaluateReturn(host, document, event, cancellation);
    case 'paste':
      return evaluatePaste(host, document, event, cancellation);
    case 'demand':
      return evaluateDemand(host, document, event, cancellation);
  }
}
