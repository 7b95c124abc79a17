/**
 * Syntax tree contracts consumed by the formatting core
 *
 * The tree is owned by the host's parser. These interfaces only describe the
 * read-only handles the trigger policy inspects.
 */

import type { CancellationToken } from 'vscode-languageserver/node';

/**
 * Kinds the trigger policy distinguishes. Hosts map their parser's kinds onto
 * these; anything the policy does not inspect can be reported as `Other`.
 */
export enum SyntaxKind {
  None = 'None',
  Other = 'Other',

  // Tokens
  EndOfFileToken = 'EndOfFileToken',
  EndOfDirectiveToken = 'EndOfDirectiveToken',
  OpenBraceToken = 'OpenBraceToken',
  CloseBraceToken = 'CloseBraceToken',
  OpenParenToken = 'OpenParenToken',
  CloseParenToken = 'CloseParenToken',
  SemicolonToken = 'SemicolonToken',
  ColonToken = 'ColonToken',
  HashToken = 'HashToken',
  IdentifierToken = 'IdentifierToken',
  RegionKeyword = 'RegionKeyword',
  EndRegionKeyword = 'EndRegionKeyword',
  SelectKeyword = 'SelectKeyword',
  WhereKeyword = 'WhereKeyword',
  UsingKeyword = 'UsingKeyword',
  CaseKeyword = 'CaseKeyword',
  DefaultKeyword = 'DefaultKeyword',

  // Nodes
  CompilationUnit = 'CompilationUnit',
  Block = 'Block',
  UsingStatement = 'UsingStatement',
  LabeledStatement = 'LabeledStatement',
  CaseSwitchLabel = 'CaseSwitchLabel',
  CasePatternSwitchLabel = 'CasePatternSwitchLabel',
  DefaultSwitchLabel = 'DefaultSwitchLabel',
  ConditionalExpression = 'ConditionalExpression',
  InvocationExpression = 'InvocationExpression',
  RegionDirectiveTrivia = 'RegionDirectiveTrivia',
  EndRegionDirectiveTrivia = 'EndRegionDirectiveTrivia',
  QueryExpression = 'QueryExpression'
}

/**
 * Half-open character span `[start, start + length)`
 */
export interface TextSpan {
  readonly start: number;
  readonly length: number;
}

export interface SyntaxNode {
  readonly kind: SyntaxKind;
  /** Span without leading and trailing trivia */
  readonly span: TextSpan;
  /** Span including trivia */
  readonly fullSpan: TextSpan;
  readonly parent: SyntaxNode | undefined;

  /**
   * Find the token containing `offset`. With `findInsideTrivia` a position inside
   * a comment or whitespace resolves to the token that trivia belongs to.
   * Returns a missing token when there is none.
   */
  findToken(offset: number, findInsideTrivia: boolean): SyntaxToken;
}

export interface SyntaxToken {
  readonly kind: SyntaxKind;
  readonly span: TextSpan;
  readonly text: string;
  /** True for the locator's sentinel and for tokens the parser synthesised */
  readonly isMissing: boolean;
  readonly parent: SyntaxNode | undefined;

  getPreviousToken(): SyntaxToken | undefined;
  getNextToken(): SyntaxToken | undefined;
}

export interface SyntaxTree {
  getRoot(cancellation: CancellationToken): Promise<SyntaxNode>;
}

/**
 * Bounding token pair of a range format. `start.span.start <= end.span.start`.
 */
export interface TokenRange {
  readonly start: SyntaxToken;
  readonly end: SyntaxToken;
}

/**
 * Sentinel returned when no token precedes a position
 */
export const MISSING_TOKEN: SyntaxToken = Object.freeze({
  kind: SyntaxKind.None,
  span: Object.freeze({ start: 0, length: 0 }),
  text: '',
  isMissing: true,
  parent: undefined,
  getPreviousToken: () => undefined,
  getNextToken: () => undefined
});

export function createSpan(start: number, length: number): TextSpan {
  return { start, length };
}

export function spanFromBounds(start: number, end: number): TextSpan {
  return { start, length: Math.max(0, end - start) };
}

export function spanEnd(span: TextSpan): number {
  return span.start + span.length;
}

export function spansEqual(a: TextSpan, b: TextSpan): boolean {
  return a.start === b.start && a.length === b.length;
}

/**
 * Tokens are handles into one tree snapshot; two handles denote the same
 * token when kind and span agree.
 */
export function tokensEqual(a: SyntaxToken, b: SyntaxToken): boolean {
  return a.kind === b.kind && spansEqual(a.span, b.span);
}

export function isKind(token: SyntaxToken | SyntaxNode | undefined, ...kinds: SyntaxKind[]): boolean {
  return token !== undefined && kinds.includes(token.kind);
}
