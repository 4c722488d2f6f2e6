/**
 * Type definitions for csvtable
 */

/** A single raw cell value */
export type Cell = string;

/** One parsed line, in field order */
export type Row = readonly Cell[];

/** The full parsed grid. Rows may differ in length. */
export type Table = readonly Row[];

/** Parser options */
export interface TableParserOptions {
  /** Field delimiter. Leave unset for `;` then `,` auto-detection. */
  delimiter?: string;
}

/** Facts about the last successful load */
export interface TableMeta {
  /** Delimiter the rows were split on */
  delimiter: string;
  /** Whether the delimiter came from auto-detection */
  detected: boolean;
  /** Number of rows */
  rowCount: number;
  /** Whether rows differ in length */
  ragged: boolean;
}

/**
 * Contract shared by sheet parsers. Row and column numbers are 1-based.
 */
export interface SheetParser {
  loadFile(filePath: string): void;
  getCell(rowNum: number, colNum: number): Cell;
  getRow(rowNum: number): Row;
  getColumn(colNum: number): Cell[];
  getField(): Table;
  isCellExists(rowNum: number, colNum: number): boolean;
  isColumnExists(colNum: number): boolean;
  isRowExists(rowNum: number): boolean;
  isFieldExists(): boolean;
}
