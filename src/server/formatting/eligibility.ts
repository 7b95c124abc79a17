/**
 * Eligibility Filters
 * Pure predicates deciding whether a token may anchor automatic formatting
 */

import type { TextDocument } from 'vscode-languageserver-textdocument';

import { IndentStyle } from '../core/host';
import type { FormattingOptionSet } from '../core/host';
import { SyntaxKind, isKind } from '../core/syntax';
import type { SyntaxToken } from '../core/syntax';
import { SUPPORTED_TRIGGER_CHARACTERS, KEYWORD_SUFFIX_CHARACTERS } from '../utils/constants';

const SWITCH_LABEL_KINDS = [
  SyntaxKind.CaseSwitchLabel,
  SyntaxKind.CasePatternSwitchLabel,
  SyntaxKind.DefaultSwitchLabel
];

/**
 * Kinds that are never meaningful formatting anchors
 */
export function isInvalidTokenKind(token: SyntaxToken): boolean {
  return isKind(token, SyntaxKind.None, SyntaxKind.EndOfDirectiveToken, SyntaxKind.EndOfFileToken);
}

/**
 * `n`, `t` and `e` also occur inside identifiers, so they only count as the
 * last character of `#region`/`#endregion`, `select` and `where`.
 */
export function isValidSingleOrMultiCharacterTokenKind(typedChar: string, kind: SyntaxKind): boolean {
  switch (typedChar) {
    case 'n':
      return kind === SyntaxKind.RegionKeyword || kind === SyntaxKind.EndRegionKeyword;
    case 't':
      return kind === SyntaxKind.SelectKeyword;
    case 'e':
      return kind === SyntaxKind.WhereKeyword;
    default:
      return true;
  }
}

export function isKeywordSuffixCharacter(typedChar: string): boolean {
  return KEYWORD_SUFFIX_CHARACTERS.includes(typedChar);
}

/**
 * A single-character anchor must be exactly one character long and, when the
 * typed character is known, be that character.
 */
export function isInvalidSingleCharacterToken(token: SyntaxToken, typedChar?: string): boolean {
  if (isInvalidTokenKind(token)) {
    return true;
  }

  if (token.text.length !== 1) {
    return true;
  }

  return typedChar !== undefined && token.text !== typedChar;
}

/**
 * Only whitespace between the start of the token's line and the token
 */
export function isFirstTokenOnLine(token: SyntaxToken, document: TextDocument): boolean {
  const { line } = document.positionAt(token.span.start);
  const lineStart = document.offsetAt({ line, character: 0 });
  const leading = document.getText().slice(lineStart, token.span.start);
  return leading.trim().length === 0;
}

function isUsingStatementCloseParen(token: SyntaxToken): boolean {
  return isKind(token, SyntaxKind.CloseParenToken) && isKind(token.parent, SyntaxKind.UsingStatement);
}

/**
 * Context exclusions for the typed-character trigger:
 * - `)` unless it closes a `using (...)` head
 * - `:` unless it ends a label or a switch label
 * - `{` unless it is the first token on its line
 */
export function tokenShouldNotFormatOnTypedChar(token: SyntaxToken, document: TextDocument): boolean {
  if (isKind(token, SyntaxKind.CloseParenToken) && !isUsingStatementCloseParen(token)) {
    return true;
  }

  if (
    isKind(token, SyntaxKind.ColonToken) &&
    !(isKind(token.parent, SyntaxKind.LabeledStatement) || isKind(token.parent, ...SWITCH_LABEL_KINDS))
  ) {
    return true;
  }

  // A brace inside a line belongs to an inline construct; leave the line alone.
  if (isKind(token, SyntaxKind.OpenBraceToken) && !isFirstTokenOnLine(token, document)) {
    return true;
  }

  return false;
}

/**
 * Return only reformats after closing a `using (...)` head
 */
export function tokenShouldNotFormatOnReturn(token: SyntaxToken): boolean {
  return !isUsingStatementCloseParen(token);
}

/**
 * `{` opens a construct rather than ending one, so it never ends a range format
 */
export function isEndToken(token: SyntaxToken): boolean {
  return !isKind(token, SyntaxKind.OpenBraceToken);
}

export function isSupportedTriggerCharacter(typedChar: string): boolean {
  return typedChar.length === 1 && SUPPORTED_TRIGGER_CHARACTERS.includes(typedChar);
}

/**
 * Cheap pre-check before a typed-character evaluation
 */
export function supportsFormattingOnTypedCharacter(typedChar: string, options: FormattingOptionSet): boolean {
  const smartIndentOn = options.smartIndent === IndentStyle.Smart;

  if (
    (typedChar === '}' && !options.autoFormattingOnCloseBrace && !smartIndentOn) ||
    (typedChar === ';' && !options.autoFormattingOnSemicolon)
  ) {
    return false;
  }

  // Directive completion only reindents under smart indent
  if ((typedChar === '#' || typedChar === 'n') && !smartIndentOn) {
    return false;
  }

  return isSupportedTriggerCharacter(typedChar);
}
