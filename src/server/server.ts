/**
 * Smart Format Language Server
 * Wires an LSP connection to the formatting trigger policy
 */

import type {
  Connection,
  DocumentFormattingParams,
  DocumentOnTypeFormattingParams,
  DocumentRangeFormattingParams,
  InitializeParams,
  InitializeResult
} from 'vscode-languageserver/node';
import {
  CancellationToken,
  createConnection,
  DidChangeConfigurationNotification,
  ProposedFeatures,
  TextDocuments
} from 'vscode-languageserver/node';
import { TextDocument } from 'vscode-languageserver-textdocument';

import type { FormattingHost } from './core/host';
import { EditorFormattingService } from './formatting/editorFormattingService';
import {
  handleDocumentFormatting,
  handleOnTypeFormatting,
  handlePasteFormatting,
  handleRangeFormatting
} from './handlers';
import { getServerCapabilities } from './initialization';
import type { FormatOnPasteParams } from './types/requests';
import { applySettings, normalizeSettings, toFormattingOptionSet } from './utils/configManager';
import { CONFIGURATION_SECTION, REQUEST_METHODS } from './utils/constants';
import { logger, LogLevel } from './utils/logger';
import { defaultSettings } from './utils/types';
import type { Settings } from './utils/types';

/**
 * Collaborators the embedding host supplies. Options default to the client's
 * `smartFormat` configuration when the host does not provide its own.
 */
export type HostServices = Omit<FormattingHost, 'getOptions'> & {
  getOptions?: FormattingHost['getOptions'];
};

export interface FormattingServerOptions {
  connection?: Connection;
  documents?: TextDocuments<TextDocument>;
}

export interface FormattingServer {
  readonly connection: Connection;
  readonly documents: TextDocuments<TextDocument>;
  readonly formattingService: EditorFormattingService;
  getSettings(): Settings;
}

/**
 * Register every formatting handler on the connection. Does not start listening.
 */
export function createFormattingServer(
  services: HostServices,
  options: FormattingServerOptions = {}
): FormattingServer {
  const connection = options.connection ?? createConnection(ProposedFeatures.all);
  const documents = options.documents ?? new TextDocuments(TextDocument);

  logger.initialize(connection, LogLevel.INFO, false);

  let settings: Settings = defaultSettings;
  let hasConfigurationCapability = false;

  // Calls stay bound to `services`
  const host: FormattingHost = {
    getSyntaxTree: (document, cancellation) => services.getSyntaxTree(document, cancellation),
    getOptions: (document, cancellation) =>
      services.getOptions
        ? services.getOptions(document, cancellation)
        : Promise.resolve(toFormattingOptionSet(settings)),
    getSyntaxFactsService: document => services.getSyntaxFactsService(document),
    getSyntaxFormattingService: document => services.getSyntaxFormattingService(document),
    getDefaultFormattingRules: document => services.getDefaultFormattingRules(document),
    createHostRules: (document, position) => services.createHostRules(document, position),
    rangeResolver: services.rangeResolver,
    layoutEngine: services.layoutEngine
  };
  const formattingService = new EditorFormattingService(host);

  async function loadSettings(fallback: unknown): Promise<void> {
    if (hasConfigurationCapability) {
      try {
        const config: unknown = await connection.workspace.getConfiguration(CONFIGURATION_SECTION);
        settings = normalizeSettings(config ?? fallback);
        applySettings(settings);
        return;
      } catch (error) {
        logger.errorWithContext('Failed to fetch configuration, using notification payload', {
          operation: 'config',
          error
        });
      }
    }

    settings = normalizeSettings(fallback);
    applySettings(settings);
  }

  connection.onInitialize((params: InitializeParams): InitializeResult => {
    const capabilities = params.capabilities;
    hasConfigurationCapability = !!capabilities.workspace?.configuration;

    if (params.initializationOptions !== undefined) {
      settings = normalizeSettings(params.initializationOptions);
    }

    logger.info(`Initializing (configuration capability: ${hasConfigurationCapability})`);
    return getServerCapabilities();
  });

  connection.onInitialized(async () => {
    if (!hasConfigurationCapability) {
      applySettings(settings);
      return;
    }

    await connection.client.register(DidChangeConfigurationNotification.type, undefined);
    await loadSettings(settings);
  });

  connection.onDidChangeConfiguration(async change => {
    await loadSettings(change.settings);
  });

  connection.onDocumentFormatting((params: DocumentFormattingParams, token: CancellationToken) => {
    return handleDocumentFormatting(params, documents, formattingService, settings, token);
  });

  connection.onDocumentRangeFormatting((params: DocumentRangeFormattingParams, token: CancellationToken) => {
    return handleRangeFormatting(params, documents, formattingService, settings, token);
  });

  connection.onDocumentOnTypeFormatting((params: DocumentOnTypeFormattingParams, token: CancellationToken) => {
    return handleOnTypeFormatting(params, documents, formattingService, settings, token);
  });

  connection.onRequest(REQUEST_METHODS.FORMAT_ON_PASTE, (params: FormatOnPasteParams, token: CancellationToken) => {
    return handlePasteFormatting(params, documents, formattingService, settings, token);
  });

  documents.listen(connection);

  return {
    connection,
    documents,
    formattingService,
    getSettings: () => settings
  };
}

/**
 * Create the server on stdio (or the given connection) and start listening
 */
export function startFormattingServer(
  services: HostServices,
  options: FormattingServerOptions = {}
): FormattingServer {
  const server = createFormattingServer(services, options);

  // Capture unexpected errors so the server doesn't silently die
  process.on('uncaughtException', err => {
    logger.errorWithContext('Uncaught exception', { error: err });
  });

  process.on('unhandledRejection', reason => {
    logger.errorWithContext('Unhandled rejection', { error: reason });
  });

  server.connection.listen();
  return server;
}
