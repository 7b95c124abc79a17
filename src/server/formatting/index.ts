/**
 * Formatting module exports
 *
 * Trigger policy for automatic formatting:
 * - Token location and eligibility filters
 * - Range resolution and rule assembly
 * - Dispatch to the host's layout engine
 */

export { EditorFormattingService } from './editorFormattingService';
export { evaluateTrigger, getFormattingSpan } from './triggerPolicy';
export type { TriggerEvent, TriggerResult } from './triggerPolicy';
export { locateTokenBeforeCaret } from './tokenLocator';
export * from './eligibility';
export { resolveFormattingRange } from './rangeResolver';
export { PasteFormattingRule, assembleFormattingRules, assemblePasteFormattingRules } from './rules';
export { formatRange, formatToken, formatSpans, formatRangeThenToken } from './dispatcher';
export { createFormattingContext } from './context';
export type { FormattingContext } from './context';
