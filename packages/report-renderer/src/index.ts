/**
 * @custodian/report-renderer
 *
 * HTML integrity report of a case.
 */

export { renderReport, escapeHtml, formatReportDate } from './generator.js';
export type { ReportInput } from './generator.js';

export { writeReport, reportFilenameFor } from './writer.js';
export type { WriteReportOptions } from './writer.js';
