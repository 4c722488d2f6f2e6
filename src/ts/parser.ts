/**
 * TableParser - Main parser class
 */

import { closeSync, existsSync, openSync, readFileSync } from "fs";
import { basename, extname } from "path";
import { parse } from "csv-parse/sync";
import { CsvError } from "csv-parse";
import { TableError } from "./errors";
import { logger } from "./logger";
import type { Cell, Row, SheetParser, Table, TableMeta, TableParserOptions } from "./types";

/** Extension every loaded path must carry */
const FILE_EXTENSION = "CSV";

/** Delimiter tried first during auto-detection; every row must match the first row's width */
const PRIMARY_DELIMITER = ";";

/** Fallback delimiter; rows are accepted whatever their width */
const FALLBACK_DELIMITER = ",";

/** Input accepted by loadBuffer */
type BufferSource = string | Uint8Array;

interface ParseResult {
  rows: string[][];
  delimiter: string;
  detected: boolean;
}

/**
 * Loads a delimited text file into memory and answers 1-based
 * cell, row and column queries against it.
 *
 * @example
 * ```ts
 * const parser = new TableParser("prices.csv");
 * parser.getCell(2, 1); // first field of the second line
 *
 * // Force a delimiter instead of auto-detection
 * const piped = new TableParser();
 * piped.setDelimiter("|");
 * piped.loadFile("export.csv");
 * ```
 */
export class TableParser implements SheetParser, Iterable<Row> {
  private table: string[][] | null = null;
  private delimiter: string | null = null;
  private meta: TableMeta | null = null;

  constructor(filePath?: string, options: TableParserOptions = {}) {
    if (options.delimiter !== undefined) {
      this.delimiter = options.delimiter;
    }

    if (filePath !== undefined) {
      this.loadFile(filePath);
    }
  }

  /**
   * Set the delimiter used by every later load, overriding auto-detection.
   * The value is not checked here; one csv-parse rejects (such as "")
   * makes the next load fail with ReadError.
   */
  setDelimiter(delimiter: string): void {
    this.delimiter = delimiter;
  }

  /**
   * Forget the configured delimiter so the next load auto-detects again.
   */
  clearDelimiter(): void {
    this.delimiter = null;
  }

  /**
   * Load a CSV file, replacing the current table.
   * @throws TableError ExtensionMismatch, FileNotFound or ReadError
   */
  loadFile(filePath: string): void {
    const extension = extname(basename(filePath)).slice(1).toUpperCase();
    if (extension !== FILE_EXTENSION) {
      throw new TableError(
        "ExtensionMismatch",
        `File extension ${extension} doesn't match with ${FILE_EXTENSION}`
      );
    }

    if (!existsSync(filePath)) {
      throw new TableError("FileNotFound", `File ${filePath} doesn't exist`);
    }

    let content: Buffer;
    let fd: number | null = null;
    try {
      fd = openSync(filePath, "r");
      content = readFileSync(fd);
    } catch (err) {
      throw new TableError("ReadError", `Error reading the file in ${filePath}: ${errorMessage(err)}`, {
        cause: err,
      });
    } finally {
      if (fd !== null) {
        closeSync(fd);
      }
    }

    logger.debug(`loading ${filePath} (${content.length} bytes)`);
    this.replaceTable(this.parseContent(content, filePath));
  }

  /**
   * Load CSV content already held in memory, replacing the current table.
   * @throws TableError ReadError if the content is malformed
   */
  loadBuffer(data: BufferSource): void {
    const content = typeof data === "string" ? data : Buffer.from(data);
    this.replaceTable(this.parseContent(content, "<buffer>"));
  }

  /**
   * Get metadata about the last successful load.
   */
  getMeta(): TableMeta {
    if (!this.meta) {
      throw new TableError("FieldNotFound", "Field is not set");
    }
    return this.meta;
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  /**
   * Get the value of a cell.
   *
   * The existence check is the same loose one as isCellExists; a row
   * shorter than colNum still fails here instead of reading past its end.
   */
  getCell(rowNum: number, colNum: number): Cell {
    const cell = this.isCellExists(rowNum, colNum) ? this.table?.[rowNum - 1]?.[colNum - 1] : undefined;
    if (cell === undefined) {
      throw new TableError("CellNotFound", `Cell ${rowNum},${colNum} doesn't exist`);
    }
    return cell;
  }

  /**
   * Get every value of a column, top to bottom.
   * Rows too short to hold the column are skipped.
   */
  getColumn(colNum: number): Cell[] {
    if (!this.isColumnExists(colNum)) {
      throw new TableError("ColumnNotFound", `Column ${colNum} doesn't exist`);
    }

    const column: Cell[] = [];
    for (const row of this.table ?? []) {
      const cell = row[colNum - 1];
      if (cell !== undefined) {
        column.push(cell);
      }
    }
    return column;
  }

  /**
   * Get the whole table.
   */
  getField(): Table {
    if (!this.table) {
      throw new TableError("FieldNotFound", "Field is not set");
    }
    return this.table;
  }

  /**
   * Get a copy of the values of a row, left to right.
   */
  getRow(rowNum: number): Row {
    const row = this.isRowExists(rowNum) ? this.table?.[rowNum - 1] : undefined;
    if (!row) {
      throw new TableError("RowNotFound", `Row ${rowNum} doesn't exist`);
    }
    return [...row];
  }

  /** Number of rows, 0 before a load. */
  getRowCount(): number {
    return this.table?.length ?? 0;
  }

  /** Width of the widest row, 0 before a load. */
  getColumnCount(): number {
    let widest = 0;
    for (const row of this.table ?? []) {
      widest = Math.max(widest, row.length);
    }
    return widest;
  }

  /**
   * Copy the table into plain mutable arrays.
   */
  toArrays(): string[][] {
    return this.getField().map((row) => [...row]);
  }

  *[Symbol.iterator](): Iterator<Row> {
    yield* this.getField();
  }

  // ==========================================================================
  // Existence checks
  // ==========================================================================

  /**
   * Check that the row exists and that the column exists in some row.
   * Does not check that this particular row is long enough.
   */
  isCellExists(rowNum: number, colNum: number): boolean {
    return this.isRowExists(rowNum) && this.isColumnExists(colNum);
  }

  /**
   * Check whether any row has the given column.
   */
  isColumnExists(colNum: number): boolean {
    if (!isPosition(colNum)) return false;
    return (this.table ?? []).some((row) => colNum <= row.length);
  }

  isRowExists(rowNum: number): boolean {
    return isPosition(rowNum) && rowNum <= this.getRowCount();
  }

  /**
   * Check whether a load has completed, even if it produced no rows.
   */
  isFieldExists(): boolean {
    return this.table !== null;
  }

  // ==========================================================================
  // Parsing
  // ==========================================================================

  private replaceTable(result: ParseResult): void {
    const { rows, delimiter, detected } = result;
    const width = rows[0]?.length ?? 0;

    this.table = rows;
    this.meta = {
      delimiter,
      detected,
      rowCount: rows.length,
      ragged: rows.some((row) => row.length !== width),
    };
  }

  private parseContent(content: string | Buffer, source: string): ParseResult {
    if (this.delimiter !== null) {
      return {
        rows: this.splitRecords(content, this.delimiter, source),
        delimiter: this.delimiter,
        detected: false,
      };
    }

    const rows = this.trySemicolon(content);
    if (rows) {
      logger.debug(`kept "${PRIMARY_DELIMITER}" delimiter for ${source}`);
      return { rows, delimiter: PRIMARY_DELIMITER, detected: true };
    }

    logger.debug(`falling back to "${FALLBACK_DELIMITER}" delimiter for ${source}`);
    return {
      rows: this.splitRecords(content, FALLBACK_DELIMITER, source),
      delimiter: FALLBACK_DELIMITER,
      detected: true,
    };
  }

  /**
   * Split on `;` and require every row to match the first row's width.
   * Returns null when the attempt is abandoned or yields no rows.
   */
  private trySemicolon(content: string | Buffer): string[][] | null {
    let records: string[][];
    try {
      records = parseRecords(content, PRIMARY_DELIMITER);
    } catch (err) {
      if (err instanceof CsvError) {
        logger.debug(`"${PRIMARY_DELIMITER}" attempt abandoned: ${err.message}`);
        return null;
      }
      throw err;
    }

    const first = records[0];
    if (!first) return null;

    const rows: string[][] = [];
    for (const [index, record] of records.entries()) {
      if (record.length !== first.length) {
        logger.debug(
          `"${PRIMARY_DELIMITER}" attempt abandoned at row ${index + 1}: expected ${first.length} fields, found ${record.length}`
        );
        return null;
      }
      rows.push(record);
    }
    return rows;
  }

  private splitRecords(content: string | Buffer, delimiter: string, source: string): string[][] {
    try {
      return parseRecords(content, delimiter);
    } catch (err) {
      if (err instanceof CsvError) {
        throw new TableError("ReadError", `Error reading the file in ${source}: ${err.message}`, {
          cause: err,
        });
      }
      throw err;
    }
  }
}

/**
 * Split CSV content into records of raw strings, any width allowed.
 */
function parseRecords(content: string | Buffer, delimiter: string): string[][] {
  const records: string[][] = parse(content, {
    delimiter,
    bom: true,
    relax_quotes: true,
    relax_column_count: true,
  });
  return records;
}

/** Valid 1-based position */
function isPosition(value: number): boolean {
  return Number.isInteger(value) && value >= 1;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
