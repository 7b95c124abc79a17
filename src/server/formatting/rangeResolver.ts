/**
 * Range Resolver
 * Validates the token range the host's resolver proposes for a range format
 */

import type { RangeResolver } from '../core/host';
import { tokensEqual } from '../core/syntax';
import type { SyntaxToken, TokenRange } from '../core/syntax';
import { isEndToken, isInvalidTokenKind } from './eligibility';

/**
 * Resolve the range to reformat after `endToken`, or `undefined` when there is
 * nothing meaningful to format and the caller should fall back to token formatting.
 */
export function resolveFormattingRange(resolver: RangeResolver, endToken: SyntaxToken): TokenRange | undefined {
  if (!isEndToken(endToken)) {
    return undefined;
  }

  const range = resolver.findAppropriateRange(endToken);
  if (!range || tokensEqual(range.start, range.end)) {
    return undefined;
  }

  if (range.start.span.start > range.end.span.start) {
    return undefined;
  }

  if (isInvalidTokenKind(range.start) || isInvalidTokenKind(range.end)) {
    return undefined;
  }

  return range;
}
