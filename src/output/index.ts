/**
 * Output Module - report assembly and markdown rendering
 */

export { assembleReport, estimateTokens, TOKEN_COSTS } from './ReportAssembler.js';
export { MarkdownGenerator, markdownGenerator } from './MarkdownGenerator.js';
export { computeRelativeFramePath, countWords, formatTimestamp, markdownLinkTarget, singleLine } from './helpers.js';

export type { AnalysisReport, ReportInput } from './ReportAssembler.js';
