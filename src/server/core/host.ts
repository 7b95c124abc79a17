/**
 * Collaborator contracts supplied by the embedding host
 *
 * The formatting core never parses text or computes whitespace itself. It asks
 * the host for a syntax tree, options, rules and a layout engine, and treats an
 * `undefined` answer from any of them as "unavailable".
 */

import type { CancellationToken } from 'vscode-languageserver/node';
import type { TextDocument } from 'vscode-languageserver-textdocument';

import type { SyntaxNode, SyntaxToken, SyntaxTree, TextSpan, TokenRange } from './syntax';

export enum IndentStyle {
  None = 'none',
  Block = 'block',
  Smart = 'smart'
}

/**
 * Options the trigger policy reads. The layout engine receives the same object.
 */
export interface FormattingOptionSet {
  readonly smartIndent: IndentStyle;
  readonly autoFormattingOnCloseBrace: boolean;
  readonly autoFormattingOnSemicolon: boolean;
}

/**
 * Proposed replacement of `span` with `newText`. Only the layout engine creates these.
 */
export interface TextChange {
  readonly span: TextSpan;
  readonly newText: string;
}

/**
 * Directives a rule can set while the layout engine prepares a pass. Rules run
 * in chain order, so a later rule overrides what an earlier one wrote.
 */
export interface LayoutDirectives {
  preserveLineBreaks?: boolean;
  [directive: string]: unknown;
}

export interface LayoutContext {
  readonly directives: LayoutDirectives;
}

export interface FormattingRule {
  readonly name: string;
  applyTo(context: LayoutContext): void;
}

export interface LayoutEngine {
  /** Range form: format every span with the given rule chain */
  computeEdits(
    root: SyntaxNode,
    spans: readonly TextSpan[],
    rules: readonly FormattingRule[],
    options: FormattingOptionSet,
    cancellation: CancellationToken
  ): Promise<TextChange[]>;

  /** Token form: smart-indent the whitespace around a single token */
  computeTokenEdits(
    root: SyntaxNode,
    token: SyntaxToken,
    rules: readonly FormattingRule[],
    options: FormattingOptionSet,
    cancellation: CancellationToken
  ): Promise<TextChange[]>;
}

export interface RangeResolver {
  /** Smallest enclosing construct worth reformatting when `endToken` was just typed */
  findAppropriateRange(endToken: SyntaxToken): TokenRange | undefined;
}

export interface SyntaxFactsService {
  isInNonUserCode(tree: SyntaxTree, offset: number, cancellation: CancellationToken): boolean;
}

export interface SyntaxFormattingService {
  getDefaultFormattingRules(): readonly FormattingRule[];
}

export interface FormattingHost {
  getSyntaxTree(document: TextDocument, cancellation: CancellationToken): Promise<SyntaxTree | undefined>;
  getOptions(document: TextDocument, cancellation: CancellationToken): Promise<FormattingOptionSet | undefined>;

  /** Language services may be missing for a document; callers degrade */
  getSyntaxFactsService(document: TextDocument): SyntaxFactsService | undefined;
  getSyntaxFormattingService(document: TextDocument): SyntaxFormattingService | undefined;

  getDefaultFormattingRules(document: TextDocument): readonly FormattingRule[];
  /** Rules that depend on the hosting context (e.g. an embedded code block). May be empty. */
  createHostRules(document: TextDocument, position: number): readonly FormattingRule[];

  readonly rangeResolver: RangeResolver;
  readonly layoutEngine: LayoutEngine;
}
