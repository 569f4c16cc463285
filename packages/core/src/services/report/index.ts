export {
  REPORT_FORMATS,
  REPORT_CONTENT_TYPES,
  formatMarkdown,
  formatPlainText,
  formatJson,
  formatReport,
  reportFilename,
  parseResearchResult,
  researchResultSchema,
} from "./formatters";
export type { ReportFormat } from "./formatters";
