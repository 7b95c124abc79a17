/**
 * Formatting Handler
 * Handles document, range, on-type and on-paste formatting requests
 */

import { CancellationToken } from 'vscode-languageserver/node';
import type {
  DocumentFormattingParams,
  DocumentOnTypeFormattingParams,
  DocumentRangeFormattingParams,
  TextDocuments,
  TextEdit
} from 'vscode-languageserver/node';
import type { TextDocument } from 'vscode-languageserver-textdocument';

import type { EditorFormattingService } from '../formatting/editorFormattingService';
import type { FormatOnPasteParams } from '../types/requests';
import { RETURN_TRIGGER_CHARACTER } from '../utils/constants';
import { rangeToSpan, toTextEdits } from '../utils/textEdits';
import type { Settings } from '../utils/types';

export type DocumentStore = Pick<TextDocuments<TextDocument>, 'get'>;

/**
 * Handle document formatting request
 */
export async function handleDocumentFormatting(
  params: DocumentFormattingParams,
  documents: DocumentStore,
  formattingService: EditorFormattingService,
  settings: Settings,
  token: CancellationToken = CancellationToken.None
): Promise<TextEdit[]> {
  if (!settings.smartFormat.enabled || !formattingService.supportsFormatDocument) {
    return [];
  }

  const document = documents.get(params.textDocument.uri);
  if (!document) {
    return [];
  }

  const changes = await formattingService.onDemand(document, undefined, token);
  return toTextEdits(document, changes);
}

/**
 * Handle document range formatting request
 */
export async function handleRangeFormatting(
  params: DocumentRangeFormattingParams,
  documents: DocumentStore,
  formattingService: EditorFormattingService,
  settings: Settings,
  token: CancellationToken = CancellationToken.None
): Promise<TextEdit[]> {
  if (!settings.smartFormat.enabled || !formattingService.supportsFormatSelection) {
    return [];
  }

  const document = documents.get(params.textDocument.uri);
  if (!document) {
    return [];
  }

  const changes = await formattingService.onDemand(document, rangeToSpan(document, params.range), token);
  return toTextEdits(document, changes);
}

/**
 * Handle on-type formatting request. The client reports Enter as `'\n'`;
 * the request position is the caret after the typed character.
 */
export async function handleOnTypeFormatting(
  params: DocumentOnTypeFormattingParams,
  documents: DocumentStore,
  formattingService: EditorFormattingService,
  settings: Settings,
  token: CancellationToken = CancellationToken.None
): Promise<TextEdit[]> {
  const config = settings.smartFormat;
  if (!config.enabled) {
    return [];
  }

  const document = documents.get(params.textDocument.uri);
  if (!document) {
    return [];
  }

  const caretOffset = document.offsetAt(params.position);

  if (params.ch === RETURN_TRIGGER_CHARACTER) {
    if (!config.formatOnReturn || !formattingService.supportsFormatOnReturn) {
      return [];
    }
    const changes = await formattingService.onReturn(document, caretOffset, token);
    return toTextEdits(document, changes ?? []);
  }

  if (!config.formatOnType) {
    return [];
  }

  const supported = await formattingService.supportsFormattingOnTypedCharacter(document, params.ch, token);
  if (!supported) {
    return [];
  }

  const changes = await formattingService.onTypedChar(document, params.ch, caretOffset, token);
  return toTextEdits(document, changes ?? []);
}

/**
 * Handle format-on-paste request
 */
export async function handlePasteFormatting(
  params: FormatOnPasteParams,
  documents: DocumentStore,
  formattingService: EditorFormattingService,
  settings: Settings,
  token: CancellationToken = CancellationToken.None
): Promise<TextEdit[]> {
  const config = settings.smartFormat;
  if (!config.enabled || !config.formatOnPaste || !formattingService.supportsFormatOnPaste) {
    return [];
  }

  const document = documents.get(params.textDocument.uri);
  if (!document) {
    return [];
  }

  const changes = await formattingService.onPaste(document, rangeToSpan(document, params.range), token);
  return toTextEdits(document, changes);
}
