export { formatSummaryReport, summarizeClassification } from './auditSummary';
export type { AuditSummary, KindTally } from './auditSummary';
export { csvEscape, formatCsvRow, parseCsv } from './csv';
export { headerFor, REPORT_LAYOUT } from './layout';
export { formatRecommendation, parseRecommendation } from './recommendation';
export { readReport, readReportFile } from './reportReader';
export { formatKindReport, SUMMARY_REPORT_FILE, writeReports } from './reportWriter';
export type { WriteReportOptions, WrittenReport } from './reportWriter';
