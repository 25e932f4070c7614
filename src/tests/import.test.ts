import * as XLSX from "xlsx";
import { describe, expect, it } from "vitest";
import { classify } from "../lib/datasets/classify";
import { EmptyInputError, FormatError } from "../lib/errors";
import { parseCsvText, parseDelimitedLine } from "../lib/import/parseCsv";
import { parseContent, parseJsonText } from "../lib/import/parseFile";
import { parseXlsxBuffer } from "../lib/import/parseXlsx";
import { processDataSet } from "../lib/processing/processDataSet";

describe("import parsing", () => {
  it("parses CSV with comma delimiter", () => {
    const table = parseCsvText("name,age\nAlice,30\nBob,25");

    expect(table.headers).toEqual(["name", "age"]);
    expect(table.rows).toEqual([
      ["Alice", "30"],
      ["Bob", "25"]
    ]);
  });

  it("parses CSV with semicolon delimiter", () => {
    const table = parseCsvText("t;signal\n0;3.5\n1;4.1");

    expect(table.headers).toEqual(["t", "signal"]);
    expect(table.rows).toEqual([
      ["0", "3.5"],
      ["1", "4.1"]
    ]);
  });

  it("strips BOM and CRLF and skips blank lines", () => {
    const table = parseCsvText("\uFEFFa,b\r\n1,2\r\n\r\n3,4\r\n");

    expect(table.headers).toEqual(["a", "b"]);
    expect(table.rows).toEqual([
      ["1", "2"],
      ["3", "4"]
    ]);
  });

  it("keeps delimiters inside quotes and unescapes doubled quotes", () => {
    expect(parseDelimitedLine('"Smith, John", 42 ,"say ""hi"""')).toEqual([
      "Smith, John",
      "42",
      'say "hi"'
    ]);
  });

  it("keeps short rows short", () => {
    const table = parseCsvText("a,b,c\n1,2");

    expect(table.rows).toEqual([["1", "2"]]);
  });

  it("rejects empty CSV text", () => {
    expect(() => parseCsvText("\n  \n")).toThrow(EmptyInputError);
  });

  it("parses every XLSX sheet", () => {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(
      workbook,
      XLSX.utils.aoa_to_sheet([
        ["city", "population"],
        ["Oslo", 700000],
        ["Bergen", 285000]
      ]),
      "Cities"
    );
    XLSX.utils.book_append_sheet(
      workbook,
      XLSX.utils.aoa_to_sheet([
        ["code", null, "active"],
        ["A1", 1.5, true]
      ]),
      "Codes"
    );
    const buffer: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });

    const tables = parseXlsxBuffer(buffer);

    expect(tables).toHaveLength(2);
    expect(tables[0]).toEqual({
      sheetName: "Cities",
      headers: ["city", "population"],
      rows: [
        ["Oslo", "700000"],
        ["Bergen", "285000"]
      ]
    });
    expect(tables[1].headers).toEqual(["code", "Column 2", "active"]);
    expect(tables[1].rows).toEqual([["A1", "1.5", "true"]]);
  });

  it("leaves empty workbook cells missing", () => {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(
      workbook,
      XLSX.utils.aoa_to_sheet([
        ["a", "b", "c"],
        ["1", null, "3"],
        ["4"]
      ]),
      "Sparse"
    );
    const buffer: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });

    const tables = parseXlsxBuffer(buffer);
    expect(tables[0].rows).toEqual([
      ["1", null, "3"],
      ["4", null, null]
    ]);

    const main = classify({ format: "tabular", tables }).get("main");
    if (!main) {
      throw new Error("main set missing");
    }
    expect(main.rows[0].has("b")).toBe(false);
    expect(
      processDataSet(main, { viewKind: "table", slideNumber: 1, selectedColumns: ["a", "b", "c"] }).rows
    ).toEqual([
      { a: "1", b: "N/A", c: "3" },
      { a: "4", b: "N/A", c: "N/A" }
    ]);
  });

  it("reports invalid JSON as a format error", () => {
    expect(() => parseJsonText("{ broken")).toThrow(FormatError);
    expect(() => parseJsonText("{ broken")).toThrow(/^Invalid JSON: /);
  });

  it("dispatches on the file extension", () => {
    expect(parseContent("data.JSON", Buffer.from('[{"a":1}]'))).toEqual({
      format: "json",
      value: [{ a: 1 }]
    });
    expect(parseContent("data.csv", Buffer.from("x\n1"))).toEqual({
      format: "tabular",
      tables: [{ headers: ["x"], rows: [["1"]] }]
    });
    expect(() => parseContent("notes.txt", Buffer.from("hello"))).toThrow(
      'Unsupported file type ".txt". Supported: .json, .csv, .xlsx.'
    );
  });
});
