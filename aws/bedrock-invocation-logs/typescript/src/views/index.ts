export { systemTexts, messageTexts, outputTexts, summarizeRecord } from './text.js';
export type { MessageText, RecordSummary } from './text.js';
