/**
 * Constants for the Smart Format Language Server
 * Centralized location for trigger characters, request names and defaults
 */

/**
 * Every character that may trigger formatting when typed
 */
export const SUPPORTED_TRIGGER_CHARACTERS = ';{}#nte:)' as const;

/**
 * Trigger characters that only count as the last character of a keyword
 */
export const KEYWORD_SUFFIX_CHARACTERS = 'nte' as const;

/**
 * Character the client sends for an on-type request after Enter
 */
export const RETURN_TRIGGER_CHARACTER = '\n' as const;

/**
 * Configuration section read from the client
 */
export const CONFIGURATION_SECTION = 'smartFormat' as const;

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG = {
  /** Default indent style */
  INDENT_STYLE: 'smart',
  /** Format the enclosing block when `}` is typed */
  FORMAT_ON_CLOSE_BRACE: true,
  /** Format the statement when `;` is typed */
  FORMAT_ON_SEMICOLON: true,
  /** Default log level */
  LOG_LEVEL: 'info'
} as const;

/**
 * Request method names for custom LSP requests
 */
export const REQUEST_METHODS = {
  FORMAT_ON_PASTE: 'smartFormat/formatOnPaste'
} as const;

/**
 * Operation names used in log context
 */
export const OPERATIONS = {
  TYPED_CHAR: 'formatOnTypedChar',
  RETURN: 'formatOnReturn',
  PASTE: 'formatOnPaste',
  DEMAND: 'formatOnDemand'
} as const;

/**
 * Name reported to the client in `serverInfo`
 */
export const SERVER_NAME = 'Smart Format Language Server' as const;
