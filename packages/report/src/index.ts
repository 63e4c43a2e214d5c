/**
 * @coursecheck/report - Renders validation results for people and tools
 */

export { renderTextReport } from './render-text';
export { renderJsonReport } from './render-json';
export { columns, formatGpa, formatTimestamp, truncateName } from './format';
export type { TextReportOptions } from './types';
