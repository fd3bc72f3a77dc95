export { formatReconciliationReport } from './report-formatter.js';
