/**
 * Initialization module exports
 */

export { getServerCapabilities, getOnTypeTriggerCharacters } from './capabilities';
