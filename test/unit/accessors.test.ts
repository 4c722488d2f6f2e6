/**
 * Tests for 1-based accessors and existence checks
 */

import { describe, test, expect, beforeEach } from "vitest";
import { TableParser } from "../../src/ts/parser";
import { isTableError } from "../../src/ts/errors";

describe("Rectangular table", () => {
  let parser: TableParser;

  beforeEach(() => {
    parser = new TableParser();
    parser.loadBuffer("a;b;c\nd;e;f\n");
  });

  test("getCell matches getField at every position", () => {
    const field = parser.getField();

    for (let r = 1; r <= 2; r++) {
      for (let c = 1; c <= 3; c++) {
        expect(parser.getCell(r, c)).toBe(field[r - 1]?.[c - 1]);
      }
    }
  });

  test("isRowExists only for 1..rowCount", () => {
    expect(parser.isRowExists(0)).toBe(false);
    expect(parser.isRowExists(1)).toBe(true);
    expect(parser.isRowExists(2)).toBe(true);
    expect(parser.isRowExists(3)).toBe(false);
    expect(parser.isRowExists(-1)).toBe(false);
    expect(parser.isRowExists(1.5)).toBe(false);
  });

  test("isColumnExists only for 1..width", () => {
    expect(parser.isColumnExists(0)).toBe(false);
    expect(parser.isColumnExists(3)).toBe(true);
    expect(parser.isColumnExists(4)).toBe(false);
  });

  test("getRow and getColumn", () => {
    expect(parser.getRow(2)).toEqual(["d", "e", "f"]);
    expect(parser.getColumn(2)).toEqual(["b", "e"]);
  });

  test("getRow returns a copy of the row", () => {
    const row = [...parser.getRow(1)];
    const copy = parser.getRow(1);

    expect(copy).not.toBe(parser.getField()[0]);
    expect(copy).toEqual(row);

    if (Array.isArray(copy)) {
      copy.push("x");
    }

    expect(parser.getField()).toEqual([
      ["a", "b", "c"],
      ["d", "e", "f"],
    ]);
    expect(parser.isColumnExists(4)).toBe(false);
  });

  test("out-of-range lookups fail with their own kind", () => {
    expect(() => parser.getRow(0)).toThrow("Row 0 doesn't exist");
    expect(() => parser.getColumn(4)).toThrow("Column 4 doesn't exist");
    expect(() => parser.getCell(3, 1)).toThrow("Cell 3,1 doesn't exist");
  });

  test("error codes identify the missing part", () => {
    let caught: unknown;
    try {
      parser.getColumn(9);
    } catch (err) {
      caught = err;
    }

    expect(isTableError(caught, "ColumnNotFound")).toBe(true);
  });
});

describe("Ragged table", () => {
  let parser: TableParser;

  beforeEach(() => {
    parser = new TableParser(undefined, { delimiter: "," });
    parser.loadBuffer("a,b,c\nd\ne,f\n");
  });

  test("column exists when any row has it", () => {
    expect(parser.isColumnExists(3)).toBe(true);
    expect(parser.getColumnCount()).toBe(3);
  });

  test("isCellExists keeps the loose row-and-any-column contract", () => {
    expect(parser.isCellExists(2, 3)).toBe(true);
  });

  test("getCell fails for a row shorter than the column", () => {
    expect(() => parser.getCell(2, 3)).toThrow("Cell 2,3 doesn't exist");
    expect(parser.getCell(3, 2)).toBe("f");
  });

  test("getColumn skips rows shorter than the column", () => {
    expect(parser.getColumn(2)).toEqual(["b", "f"]);
    expect(parser.getColumn(3)).toEqual(["c"]);
  });

  test("meta reports the table as ragged", () => {
    expect(parser.getMeta().ragged).toBe(true);
  });
});

describe("Empty table", () => {
  test("is loaded but has no rows", () => {
    const parser = new TableParser();
    parser.loadBuffer("");

    expect(parser.isFieldExists()).toBe(true);
    expect(parser.getField()).toEqual([]);
    expect(parser.isRowExists(1)).toBe(false);
    expect(parser.isColumnExists(1)).toBe(false);
    expect(() => parser.getRow(1)).toThrow("Row 1 doesn't exist");
  });
});
