/**
 * Request and Response Types
 * Type definitions for custom LSP requests
 */

import type { Range, TextDocumentIdentifier } from 'vscode-languageserver/node';

/**
 * Format-on-paste request parameters
 */
export interface FormatOnPasteParams {
  /** Document the text was pasted into */
  textDocument: TextDocumentIdentifier;
  /** Range the pasted text now occupies */
  range: Range;
}
