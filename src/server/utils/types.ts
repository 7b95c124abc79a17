/**
 * Type definitions for the Smart Format Language Server
 * Centralized location for shared types and interfaces
 */

import { DEFAULT_CONFIG } from './constants';

export type IndentStyleSetting = 'none' | 'block' | 'smart';

export type LogLevelSetting = 'error' | 'warn' | 'info' | 'debug' | 'verbose';

/**
 * Configuration settings read from the `smartFormat` section
 */
export interface Settings {
  smartFormat: {
    /** Master switch for every formatting request */
    enabled: boolean;
    indentStyle: IndentStyleSetting;
    formatOnType: boolean;
    formatOnCloseBrace: boolean;
    formatOnSemicolon: boolean;
    formatOnReturn: boolean;
    formatOnPaste: boolean;
    debug: {
      verboseLogging: boolean;
      logLevel: LogLevelSetting;
    };
  };
}

/**
 * Default settings values
 */
export const defaultSettings: Settings = {
  smartFormat: {
    enabled: true,
    indentStyle: DEFAULT_CONFIG.INDENT_STYLE,
    formatOnType: true,
    formatOnCloseBrace: DEFAULT_CONFIG.FORMAT_ON_CLOSE_BRACE,
    formatOnSemicolon: DEFAULT_CONFIG.FORMAT_ON_SEMICOLON,
    formatOnReturn: true,
    formatOnPaste: true,
    debug: {
      verboseLogging: false,
      logLevel: DEFAULT_CONFIG.LOG_LEVEL
    }
  }
};
