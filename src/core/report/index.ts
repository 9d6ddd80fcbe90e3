export {
  CSV_COLUMNS,
  escapeCsvField,
  formatCsv,
  formatJson,
  formatResult,
  formatTags,
} from "./format.js";
export { defaultOutputPath, exportFile, fileTimestamp } from "./export.js";
