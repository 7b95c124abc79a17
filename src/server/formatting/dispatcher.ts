/**
 * Dispatcher
 * Calls the layout engine with a span, a token range or a single token
 */

import { throwIfCancelled } from '../core/cancellation';
import type { FormattingRule, TextChange } from '../core/host';
import { spanEnd, spanFromBounds } from '../core/syntax';
import type { SyntaxToken, TextSpan } from '../core/syntax';
import { logger } from '../utils/logger';
import type { FormattingContext } from './context';
import { resolveFormattingRange } from './rangeResolver';

/**
 * Format the spans exactly as given
 */
export async function formatSpans(
  context: FormattingContext,
  spans: readonly TextSpan[],
  rules: readonly FormattingRule[]
): Promise<TextChange[]> {
  throwIfCancelled(context.cancellation);
  const changes = await context.host.layoutEngine.computeEdits(
    context.root,
    spans,
    rules,
    context.options,
    context.cancellation
  );
  throwIfCancelled(context.cancellation);
  return changes;
}

/**
 * Format the range the resolver finds for `endToken`.
 * @returns an empty list when there is no range to format
 */
export async function formatRange(
  context: FormattingContext,
  endToken: SyntaxToken,
  rules: readonly FormattingRule[]
): Promise<TextChange[]> {
  const range = resolveFormattingRange(context.host.rangeResolver, endToken);
  if (!range) {
    logger.verboseWithContext('No range to format', {
      uri: context.document.uri,
      tokenKind: endToken.kind,
      offset: endToken.span.start
    });
    return [];
  }

  const span = spanFromBounds(range.start.span.start, spanEnd(range.end.span));
  return formatSpans(context, [span], rules);
}

/**
 * Smart-indent the whitespace around a single token
 */
export async function formatToken(
  context: FormattingContext,
  token: SyntaxToken,
  rules: readonly FormattingRule[]
): Promise<TextChange[]> {
  throwIfCancelled(context.cancellation);
  const changes = await context.host.layoutEngine.computeTokenEdits(
    context.root,
    token,
    rules,
    context.options,
    context.cancellation
  );
  throwIfCancelled(context.cancellation);
  return changes;
}

/**
 * Range format first; when that yields nothing, token format at least.
 * `smartIndentOnly` skips the range attempt.
 */
export async function formatRangeThenToken(
  context: FormattingContext,
  token: SyntaxToken,
  rules: readonly FormattingRule[],
  smartIndentOnly: boolean = false
): Promise<TextChange[]> {
  if (!smartIndentOnly) {
    const changes = await formatRange(context, token, rules);
    if (changes.length > 0) {
      return changes;
    }
  }

  return formatToken(context, token, rules);
}
