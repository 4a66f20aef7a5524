export {
  serializeHistory,
  exportHistory,
  defaultExportFileName,
  type ExportedCalculation,
} from './export.js';
