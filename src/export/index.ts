export { DEFAULT_REPORT_FILE, type ExportResult, exportReport, loadReport } from './report-writer';
export { formatReportSummary } from './summary';
