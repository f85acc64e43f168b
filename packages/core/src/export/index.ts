export {
  CSV_HEADER,
  escapeCsvField,
  exportAllData,
  exportListsAsPlainText,
  exportToCsv,
  exportToJson,
  formatListAsPlainText,
} from './list-exporter';
export type { ExportOptions, PlainTextFile, PlainTextOptions } from './list-exporter';
