/**
 * LSP Handlers
 * Centralized exports for the formatting request handlers
 */

export {
  handleDocumentFormatting,
  handleRangeFormatting,
  handleOnTypeFormatting,
  handlePasteFormatting
} from './formattingHandler';
export type { DocumentStore } from './formattingHandler';
