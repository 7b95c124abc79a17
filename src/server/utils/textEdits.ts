/**
 * Conversions between offset spans and LSP ranges
 */

import type { Range, TextEdit } from 'vscode-languageserver/node';
import type { TextDocument } from 'vscode-languageserver-textdocument';

import type { TextChange } from '../core/host';
import { spanEnd, spanFromBounds } from '../core/syntax';
import type { TextSpan } from '../core/syntax';

/**
 * Converts a LSP Range to an offset span of `document`
 */
export function rangeToSpan(document: TextDocument, range: Range): TextSpan {
  return spanFromBounds(document.offsetAt(range.start), document.offsetAt(range.end));
}

export function spanToRange(document: TextDocument, span: TextSpan): Range {
  return {
    start: document.positionAt(span.start),
    end: document.positionAt(spanEnd(span))
  };
}

/**
 * Converts layout engine changes to LSP TextEdits against `document`
 */
export function toTextEdits(document: TextDocument, changes: readonly TextChange[]): TextEdit[] {
  return changes.map(change => ({
    range: spanToRange(document, change.span),
    newText: change.newText
  }));
}
