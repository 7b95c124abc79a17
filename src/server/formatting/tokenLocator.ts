/**
 * Token Locator
 * Finds the token the user just produced, given the caret position after it
 */

import { MISSING_TOKEN } from '../core/syntax';
import type { SyntaxNode, SyntaxToken } from '../core/syntax';

/**
 * Locate the token immediately before `caretOffset`. A caret inside trivia
 * resolves to the token owning that trivia; no token yields `MISSING_TOKEN`.
 */
export function locateTokenBeforeCaret(root: SyntaxNode, caretOffset: number): SyntaxToken {
  if (caretOffset <= 0 || root.fullSpan.length === 0) {
    return MISSING_TOKEN;
  }

  const position = Math.max(0, caretOffset - 1);
  return root.findToken(position, true);
}
