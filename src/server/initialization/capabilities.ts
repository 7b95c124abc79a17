/**
 * Server capabilities configuration
 */

import type { InitializeResult } from 'vscode-languageserver/node';
import { TextDocumentSyncKind } from 'vscode-languageserver/node';

import { RETURN_TRIGGER_CHARACTER, SERVER_NAME, SUPPORTED_TRIGGER_CHARACTERS } from '../utils/constants';

/**
 * `;` is the first trigger character; the rest of the supported set and Enter follow
 */
export function getOnTypeTriggerCharacters(): { firstTriggerCharacter: string; moreTriggerCharacter: string[] } {
  const [first = ';', ...rest] = Array.from(SUPPORTED_TRIGGER_CHARACTERS);
  return {
    firstTriggerCharacter: first,
    moreTriggerCharacter: [...rest, RETURN_TRIGGER_CHARACTER]
  };
}

/**
 * Server capabilities returned during initialization
 */
export function getServerCapabilities(): InitializeResult {
  return {
    capabilities: {
      textDocumentSync: TextDocumentSyncKind.Incremental,
      documentFormattingProvider: true,
      documentRangeFormattingProvider: true,
      documentOnTypeFormattingProvider: getOnTypeTriggerCharacters()
    },
    serverInfo: {
      name: SERVER_NAME
    }
  };
}
