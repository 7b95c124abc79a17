/**
 * Smart Format Language Server public API
 */

export * from './core';
export * from './formatting';
export * from './handlers';
export { getServerCapabilities, getOnTypeTriggerCharacters } from './initialization';
export { createFormattingServer, startFormattingServer } from './server';
export type { HostServices, FormattingServer, FormattingServerOptions } from './server';
export { normalizeSettings, toFormattingOptionSet, applySettings } from './utils/configManager';
export { defaultSettings } from './utils/types';
export type { Settings } from './utils/types';
export type { FormatOnPasteParams } from './types/requests';
export { REQUEST_METHODS, SUPPORTED_TRIGGER_CHARACTERS, CONFIGURATION_SECTION } from './utils/constants';
export { logger, Logger, LogLevel } from './utils/logger';
