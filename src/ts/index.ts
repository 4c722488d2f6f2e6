/**
 * csvtable - load a CSV file and query it by 1-based row and column
 *
 * @module csvtable
 */

export { TableParser } from "./parser";
export { TableError, isTableError, type TableErrorCode } from "./errors";
export {
  loadConfig,
  mergeConfig,
  getDefaults,
  createTableParser,
  type CsvTableConfig,
  type CreateParserOptions,
} from "./config";
export { logger, setDebug, isDebugEnabled } from "./logger";
export type { Cell, Row, Table, TableMeta, TableParserOptions, SheetParser } from "./types";
