/**
 * Test utilities
 * In-process stand-ins for the host's parser, range resolver and layout engine
 */

import { CancellationToken } from 'vscode-languageserver/node';
import { TextDocument } from 'vscode-languageserver-textdocument';

import { IndentStyle } from '../core/host';
import type {
  FormattingHost,
  FormattingOptionSet,
  FormattingRule,
  LayoutDirectives,
  LayoutEngine,
  RangeResolver,
  SyntaxFactsService,
  SyntaxFormattingService,
  TextChange
} from '../core/host';
import { SyntaxKind, createSpan, spanEnd, spanFromBounds } from '../core/syntax';
import type { SyntaxNode, SyntaxToken, SyntaxTree, TextSpan, TokenRange } from '../core/syntax';

const PUNCTUATION: Record<string, SyntaxKind> = {
  '{': SyntaxKind.OpenBraceToken,
  '}': SyntaxKind.CloseBraceToken,
  '(': SyntaxKind.OpenParenToken,
  ')': SyntaxKind.CloseParenToken,
  ';': SyntaxKind.SemicolonToken,
  ':': SyntaxKind.ColonToken,
  '#': SyntaxKind.HashToken
};

const KEYWORDS: Record<string, SyntaxKind> = {
  using: SyntaxKind.UsingKeyword,
  select: SyntaxKind.SelectKeyword,
  where: SyntaxKind.WhereKeyword,
  case: SyntaxKind.CaseKeyword,
  default: SyntaxKind.DefaultKeyword
};

const DIRECTIVE_KEYWORDS: Record<string, SyntaxKind> = {
  region: SyntaxKind.RegionKeyword,
  endregion: SyntaxKind.EndRegionKeyword
};

const STATEMENT_BOUNDARIES = [SyntaxKind.SemicolonToken, SyntaxKind.OpenBraceToken, SyntaxKind.CloseBraceToken];

export const INDENT_UNIT = '    ';

class TestNode implements SyntaxNode {
  constructor(
    readonly kind: SyntaxKind,
    readonly span: TextSpan,
    readonly fullSpan: TextSpan,
    readonly parent: SyntaxNode | undefined,
    private readonly root: TestRootNode | undefined
  ) {}

  findToken(offset: number, findInsideTrivia: boolean): SyntaxToken {
    if (!this.root) {
      throw new Error('detached node');
    }
    return this.root.findToken(offset, findInsideTrivia);
  }
}

export class TestToken implements SyntaxToken {
  parent: SyntaxNode | undefined = undefined;
  readonly isMissing = false;
  fullStart = 0;
  fullEnd = 0;

  constructor(
    readonly kind: SyntaxKind,
    readonly span: TextSpan,
    readonly text: string,
    private readonly index: number,
    private readonly tokens: readonly TestToken[]
  ) {}

  getPreviousToken(): SyntaxToken | undefined {
    return this.tokens[this.index - 1];
  }

  getNextToken(): SyntaxToken | undefined {
    return this.tokens[this.index + 1];
  }
}

/**
 * Root of a test tree. Trailing trivia up to and including the first line break
 * belongs to the token before it; everything else is leading trivia of the next token.
 */
export class TestRootNode implements SyntaxNode {
  readonly kind = SyntaxKind.CompilationUnit;
  readonly parent = undefined;
  readonly span: TextSpan;
  readonly fullSpan: TextSpan;
  /** Real tokens followed by the end-of-file token */
  readonly tokens: TestToken[] = [];

  constructor(readonly text: string) {
    this.fullSpan = createSpan(0, text.length);
    lex(text, this.tokens);
    assignTrivia(text, this.tokens);
    assignParents(this, this.tokens);

    const first = this.tokens[0];
    const last = this.tokens[this.tokens.length - 1];
    this.span = first && last ? spanFromBounds(first.span.start, spanEnd(last.span)) : createSpan(0, 0);
  }

  findToken(offset: number, _findInsideTrivia: boolean = true): SyntaxToken {
    const eof = this.tokens[this.tokens.length - 1];
    if (!eof) {
      throw new Error('tree without end-of-file token');
    }
    if (offset >= this.text.length) {
      return eof;
    }
    return this.tokens.find(token => token.fullStart <= offset && offset < token.fullEnd) ?? eof;
  }

  createNode(kind: SyntaxKind, span: TextSpan): SyntaxNode {
    return new TestNode(kind, span, span, this, this);
  }
}

function isWordStart(ch: string): boolean {
  return /[A-Za-z_]/.test(ch);
}

function lex(text: string, tokens: TestToken[]): void {
  let i = 0;
  while (i < text.length) {
    const ch = text.charAt(i);

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (text.startsWith('//', i)) {
      const newline = text.indexOf('\n', i);
      i = newline === -1 ? text.length : newline;
      continue;
    }

    const start = i;
    let kind: SyntaxKind;

    if (isWordStart(ch)) {
      while (i < text.length && /\w/.test(text.charAt(i))) {
        i++;
      }
      const word = text.slice(start, i);
      const previous = tokens[tokens.length - 1];
      const directive = previous?.kind === SyntaxKind.HashToken ? DIRECTIVE_KEYWORDS[word] : undefined;
      kind = directive ?? KEYWORDS[word] ?? SyntaxKind.IdentifierToken;
    } else {
      i++;
      kind = PUNCTUATION[ch] ?? SyntaxKind.Other;
    }

    tokens.push(new TestToken(kind, spanFromBounds(start, i), text.slice(start, i), tokens.length, tokens));
  }

  tokens.push(new TestToken(SyntaxKind.EndOfFileToken, createSpan(text.length, 0), '', tokens.length, tokens));
}

function assignTrivia(text: string, tokens: TestToken[]): void {
  let fullStart = 0;
  for (let index = 0; index < tokens.length; index++) {
    const token = tokens[index];
    if (!token) {
      continue;
    }
    const next = tokens[index + 1];
    token.fullStart = fullStart;

    if (!next) {
      token.fullEnd = text.length;
      break;
    }

    const end = spanEnd(token.span);
    const newline = text.indexOf('\n', end);
    token.fullEnd = newline !== -1 && newline < next.span.start ? newline + 1 : next.span.start;
    fullStart = token.fullEnd;
  }
}

function findMatching(tokens: readonly TestToken[], closeIndex: number, open: SyntaxKind, close: SyntaxKind): number {
  let depth = 0;
  for (let index = closeIndex; index >= 0; index--) {
    const kind = tokens[index]?.kind;
    if (kind === close) {
      depth++;
    } else if (kind === open) {
      depth--;
      if (depth === 0) {
        return index;
      }
    }
  }
  return -1;
}

function classifyColon(tokens: readonly TestToken[], index: number): SyntaxKind {
  const previous = tokens[index - 1];
  const beforePrevious = tokens[index - 2];

  if (previous?.kind === SyntaxKind.DefaultKeyword) {
    return SyntaxKind.DefaultSwitchLabel;
  }
  if (beforePrevious?.kind === SyntaxKind.CaseKeyword) {
    return SyntaxKind.CaseSwitchLabel;
  }
  if (
    previous?.kind === SyntaxKind.IdentifierToken &&
    (beforePrevious === undefined || STATEMENT_BOUNDARIES.includes(beforePrevious.kind))
  ) {
    return SyntaxKind.LabeledStatement;
  }
  return SyntaxKind.ConditionalExpression;
}

function assignParents(root: TestRootNode, tokens: readonly TestToken[]): void {
  tokens.forEach((token, index) => {
    switch (token.kind) {
      case SyntaxKind.OpenParenToken:
      case SyntaxKind.CloseParenToken: {
        const openIndex =
          token.kind === SyntaxKind.OpenParenToken
            ? index
            : findMatching(tokens, index, SyntaxKind.OpenParenToken, SyntaxKind.CloseParenToken);
        const owner = tokens[openIndex - 1];
        const kind =
          owner?.kind === SyntaxKind.UsingKeyword
            ? SyntaxKind.UsingStatement
            : owner?.kind === SyntaxKind.IdentifierToken
              ? SyntaxKind.InvocationExpression
              : SyntaxKind.Other;
        token.parent = root.createNode(kind, token.span);
        break;
      }
      case SyntaxKind.ColonToken:
        token.parent = root.createNode(classifyColon(tokens, index), token.span);
        break;
      case SyntaxKind.OpenBraceToken:
      case SyntaxKind.CloseBraceToken:
        token.parent = root.createNode(SyntaxKind.Block, token.span);
        break;
      default:
        token.parent = root;
    }
  });
}

export class TestSyntaxTree implements SyntaxTree {
  readonly root: TestRootNode;

  constructor(text: string) {
    this.root = new TestRootNode(text);
  }

  async getRoot(_cancellation: CancellationToken): Promise<SyntaxNode> {
    return this.root;
  }
}

function asTestRoot(root: SyntaxNode): TestRootNode {
  if (!(root instanceof TestRootNode)) {
    throw new Error('layout engine received a foreign tree');
  }
  return root;
}

/**
 * First token of the statement that `token` ends
 */
function statementStart(token: SyntaxToken): SyntaxToken {
  let start = token;
  let previous = token.getPreviousToken();
  while (previous && !STATEMENT_BOUNDARIES.includes(previous.kind)) {
    start = previous;
    previous = previous.getPreviousToken();
  }
  return start;
}

/**
 * Statement for `;` and `:`, matching brace for `}`, `using` head for `)`
 */
export function findTestRange(endToken: SyntaxToken): TokenRange | undefined {
  switch (endToken.kind) {
    case SyntaxKind.SemicolonToken:
    case SyntaxKind.ColonToken:
      return { start: statementStart(endToken), end: endToken };
    case SyntaxKind.CloseBraceToken: {
      let depth = 0;
      for (let current: SyntaxToken | undefined = endToken; current; current = current.getPreviousToken()) {
        if (current.kind === SyntaxKind.CloseBraceToken) {
          depth++;
        } else if (current.kind === SyntaxKind.OpenBraceToken && --depth === 0) {
          return { start: current, end: endToken };
        }
      }
      return undefined;
    }
    case SyntaxKind.CloseParenToken:
      return endToken.parent?.kind === SyntaxKind.UsingStatement
        ? { start: statementStart(endToken), end: endToken }
        : undefined;
    default:
      return undefined;
  }
}

interface LineInfo {
  start: number;
  firstNonWhitespace: number;
  blank: boolean;
}

function getLines(text: string): LineInfo[] {
  const lines: LineInfo[] = [];
  let start = 0;
  while (start <= text.length) {
    const newline = text.indexOf('\n', start);
    const end = newline === -1 ? text.length : newline;
    const content = text.slice(start, end);
    const indent = content.length - content.trimStart().length;
    lines.push({ start, firstNonWhitespace: start + indent, blank: content.trim().length === 0 });
    if (newline === -1) {
      break;
    }
    start = newline + 1;
  }
  return lines;
}

function reindentLine(root: TestRootNode, line: LineInfo): TextChange | undefined {
  if (line.blank) {
    return undefined;
  }

  const first = root.tokens.find(token => token.span.start === line.firstNonWhitespace);
  if (!first || first.kind === SyntaxKind.EndOfFileToken) {
    return undefined;
  }

  let depth = 0;
  for (const token of root.tokens) {
    if (token.span.start >= first.span.start) {
      break;
    }
    if (token.kind === SyntaxKind.OpenBraceToken) {
      depth++;
    } else if (token.kind === SyntaxKind.CloseBraceToken) {
      depth--;
    }
  }
  if (first.kind === SyntaxKind.CloseBraceToken) {
    depth--;
  }

  const desired = INDENT_UNIT.repeat(Math.max(0, depth));
  const current = root.text.slice(line.start, line.firstNonWhitespace);
  if (current === desired) {
    return undefined;
  }
  return { span: spanFromBounds(line.start, line.firstNonWhitespace), newText: desired };
}

/**
 * Indentation-only layout engine: every line starts with one indent unit per
 * enclosing brace. Records the directives the last rule chain produced.
 */
export class TestLayoutEngine implements LayoutEngine {
  lastDirectives: LayoutDirectives | undefined;
  lastRules: readonly FormattingRule[] = [];

  async computeEdits(
    root: SyntaxNode,
    spans: readonly TextSpan[],
    rules: readonly FormattingRule[],
    _options: FormattingOptionSet,
    _cancellation: CancellationToken
  ): Promise<TextChange[]> {
    const testRoot = asTestRoot(root);
    this.applyRules(rules);

    const changes: TextChange[] = [];
    for (const line of getLines(testRoot.text)) {
      const inSpan = spans.some(
        span => line.firstNonWhitespace >= span.start && line.firstNonWhitespace <= spanEnd(span)
      );
      const change = inSpan ? reindentLine(testRoot, line) : undefined;
      if (change) {
        changes.push(change);
      }
    }
    return changes;
  }

  async computeTokenEdits(
    root: SyntaxNode,
    token: SyntaxToken,
    rules: readonly FormattingRule[],
    _options: FormattingOptionSet,
    _cancellation: CancellationToken
  ): Promise<TextChange[]> {
    const testRoot = asTestRoot(root);
    this.applyRules(rules);

    const line = getLines(testRoot.text)
      .filter(info => info.start <= token.span.start)
      .pop();
    const change = line ? reindentLine(testRoot, line) : undefined;
    return change ? [change] : [];
  }

  private applyRules(rules: readonly FormattingRule[]): void {
    const context = { directives: {} };
    rules.forEach(rule => rule.applyTo(context));
    this.lastDirectives = context.directives;
    this.lastRules = rules;
  }
}

export function createRule(name: string, directives: LayoutDirectives = {}): FormattingRule {
  return {
    name,
    applyTo: context => {
      Object.assign(context.directives, directives);
    }
  };
}

export const smartOptions: FormattingOptionSet = {
  smartIndent: IndentStyle.Smart,
  autoFormattingOnCloseBrace: true,
  autoFormattingOnSemicolon: true
};

export interface TestHostOverrides {
  options?: Partial<FormattingOptionSet> | null;
  tree?: 'unavailable';
  syntaxFacts?: SyntaxFactsService | null;
  syntaxFormatting?: SyntaxFormattingService | null;
  hostRules?: FormattingRule[];
  defaultRules?: FormattingRule[];
  rangeResolver?: RangeResolver;
}

export interface TestHost {
  host: FormattingHost;
  engine: TestLayoutEngine;
  computeEdits: jest.SpyInstance;
  computeTokenEdits: jest.SpyInstance;
  findAppropriateRange: jest.Mock<TokenRange | undefined, [SyntaxToken]>;
  isInNonUserCode: jest.Mock<boolean, [SyntaxTree, number, CancellationToken]>;
}

/**
 * Host backed by the test tree and indentation engine. `null` overrides make a
 * collaborator unavailable.
 */
export function createTestHost(overrides: TestHostOverrides = {}): TestHost {
  const engine = new TestLayoutEngine();
  const computeEdits = jest.spyOn(engine, 'computeEdits');
  const computeTokenEdits = jest.spyOn(engine, 'computeTokenEdits');
  const findAppropriateRange = jest.fn<TokenRange | undefined, [SyntaxToken]>(findTestRange);
  const isInNonUserCode = jest.fn<boolean, [SyntaxTree, number, CancellationToken]>(() => false);

  const defaultRules = overrides.defaultRules ?? [createRule('default')];
  const syntaxFacts = overrides.syntaxFacts === undefined ? { isInNonUserCode } : overrides.syntaxFacts ?? undefined;
  const syntaxFormatting =
    overrides.syntaxFormatting === undefined
      ? { getDefaultFormattingRules: () => defaultRules }
      : overrides.syntaxFormatting ?? undefined;

  const host: FormattingHost = {
    getSyntaxTree: async document =>
      overrides.tree === 'unavailable' ? undefined : new TestSyntaxTree(document.getText()),
    getOptions: async () => (overrides.options === null ? undefined : { ...smartOptions, ...overrides.options }),
    getSyntaxFactsService: () => syntaxFacts,
    getSyntaxFormattingService: () => syntaxFormatting,
    getDefaultFormattingRules: () => defaultRules,
    createHostRules: () => overrides.hostRules ?? [],
    rangeResolver: overrides.rangeResolver ?? { findAppropriateRange },
    layoutEngine: engine
  };

  return { host, engine, computeEdits, computeTokenEdits, findAppropriateRange, isInNonUserCode };
}

export function createDocument(content: string, uri: string = 'file:///test.cs'): TextDocument {
  return TextDocument.create(uri, 'csharp', 1, content);
}

/**
 * Apply layout engine changes to `document` and return the new snapshot
 */
export function applyChanges(document: TextDocument, changes: readonly TextChange[]): TextDocument {
  const edits = changes.map(change => ({
    range: { start: document.positionAt(change.span.start), end: document.positionAt(spanEnd(change.span)) },
    newText: change.newText
  }));
  return createDocument(TextDocument.applyEdits(document, edits), document.uri);
}

/**
 * Token at `offset` in a fresh test tree of `text`
 */
export function tokenAt(text: string, offset: number): SyntaxToken {
  return new TestRootNode(text).findToken(offset);
}

export { CancellationToken };
