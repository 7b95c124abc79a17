/**
 * Core module barrel exports
 * Syntax tree contracts, host collaborators and cancellation
 */

export {
  SyntaxKind,
  MISSING_TOKEN,
  createSpan,
  spanFromBounds,
  spanEnd,
  spansEqual,
  tokensEqual,
  isKind
} from './syntax';
export type { TextSpan, SyntaxNode, SyntaxToken, SyntaxTree, TokenRange } from './syntax';

export { IndentStyle } from './host';
export type {
  FormattingHost,
  FormattingOptionSet,
  FormattingRule,
  LayoutContext,
  LayoutDirectives,
  LayoutEngine,
  RangeResolver,
  SyntaxFactsService,
  SyntaxFormattingService,
  TextChange
} from './host';

export { throwIfCancelled, isCancellationError, createCancelledError } from './cancellation';
