/**
 * Configuration Manager
 * Turns client configuration into settings, formatting options and log levels
 */

import { IndentStyle } from '../core/host';
import type { FormattingOptionSet } from '../core/host';
import { CONFIGURATION_SECTION } from './constants';
import { LogLevel, logger } from './logger';
import { defaultSettings } from './types';
import type { IndentStyleSetting, LogLevelSetting, Settings } from './types';

/**
 * Map string log level to LogLevel enum
 */
const LOG_LEVEL_MAP: Record<LogLevelSetting, LogLevel> = {
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  info: LogLevel.INFO,
  debug: LogLevel.DEBUG,
  verbose: LogLevel.VERBOSE
};

const INDENT_STYLE_MAP: Record<IndentStyleSetting, IndentStyle> = {
  none: IndentStyle.None,
  block: IndentStyle.Block,
  smart: IndentStyle.Smart
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readBoolean(source: Record<string, unknown>, key: string, fallback: boolean): boolean {
  const value = source[key];
  return typeof value === 'boolean' ? value : fallback;
}

function isIndentStyleSetting(value: unknown): value is IndentStyleSetting {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(INDENT_STYLE_MAP, value);
}

function isLogLevelSetting(value: unknown): value is LogLevelSetting {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVEL_MAP, value);
}

/**
 * Build settings from whatever the client sent. Accepts either the section
 * itself or an object wrapping it under `smartFormat`; unknown or mistyped
 * values fall back to defaults.
 */
export function normalizeSettings(raw: unknown): Settings {
  if (!isRecord(raw)) {
    return defaultSettings;
  }

  const wrapped = raw[CONFIGURATION_SECTION];
  const section = isRecord(wrapped) ? wrapped : raw;
  const defaults = defaultSettings.smartFormat;

  const indentStyle = typeof section.indentStyle === 'string' ? section.indentStyle.toLowerCase() : undefined;
  const debug = isRecord(section.debug) ? section.debug : {};
  const logLevel = typeof debug.logLevel === 'string' ? debug.logLevel.toLowerCase() : undefined;

  return {
    smartFormat: {
      enabled: readBoolean(section, 'enabled', defaults.enabled),
      indentStyle: isIndentStyleSetting(indentStyle) ? indentStyle : defaults.indentStyle,
      formatOnType: readBoolean(section, 'formatOnType', defaults.formatOnType),
      formatOnCloseBrace: readBoolean(section, 'formatOnCloseBrace', defaults.formatOnCloseBrace),
      formatOnSemicolon: readBoolean(section, 'formatOnSemicolon', defaults.formatOnSemicolon),
      formatOnReturn: readBoolean(section, 'formatOnReturn', defaults.formatOnReturn),
      formatOnPaste: readBoolean(section, 'formatOnPaste', defaults.formatOnPaste),
      debug: {
        verboseLogging: readBoolean(debug, 'verboseLogging', defaults.debug.verboseLogging),
        logLevel: isLogLevelSetting(logLevel) ? logLevel : defaults.debug.logLevel
      }
    }
  };
}

/**
 * Options the trigger policy and the layout engine read
 */
export function toFormattingOptionSet(settings: Settings): FormattingOptionSet {
  const config = settings.smartFormat;
  return Object.freeze({
    smartIndent: INDENT_STYLE_MAP[config.indentStyle],
    autoFormattingOnCloseBrace: config.formatOnCloseBrace,
    autoFormattingOnSemicolon: config.formatOnSemicolon
  });
}

/**
 * Apply settings to the logger and record a summary
 */
export function applySettings(settings: Settings): void {
  const config = settings.smartFormat;

  logger.setLevel(LOG_LEVEL_MAP[config.debug.logLevel]);
  logger.setVerboseLogging(config.debug.verboseLogging);

  logger.info(
    `Formatting settings updated: enabled=${config.enabled}, indentStyle=${config.indentStyle}, ` +
      `onType=${config.formatOnType}, onCloseBrace=${config.formatOnCloseBrace}, ` +
      `onSemicolon=${config.formatOnSemicolon}, onReturn=${config.formatOnReturn}, onPaste=${config.formatOnPaste}`
  );
}
