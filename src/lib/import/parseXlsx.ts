import * as XLSX from "xlsx";
import type { RawCell, RawTable } from "../../types/dataset";

const normalizeCell = (value: unknown): string | null => {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "number") {
    return String(value);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === "boolean") {
    return value ? "true" : "false";
  }
  return String(value).trim();
};

const buildHeaders = (rawHeaders: unknown[]): string[] =>
  Array.from(rawHeaders, (header, index) => {
    const label = normalizeCell(header);
    if (label === null || label === "") {
      return `Column ${index + 1}`;
    }
    return label;
  });

const toRows = (sheet: XLSX.WorkSheet): unknown[][] => {
  const rows: unknown = XLSX.utils.sheet_to_json(sheet, {
    header: 1,
    blankrows: false
  });
  if (!Array.isArray(rows)) {
    return [];
  }
  return rows.filter((row): row is unknown[] => Array.isArray(row));
};

export const parseXlsxBuffer = (buffer: Buffer): RawTable[] => {
  const workbook = XLSX.read(buffer, { type: "buffer" });
  return workbook.SheetNames.flatMap((sheetName) => {
    const sheet = workbook.Sheets[sheetName];
    if (!sheet) {
      return [];
    }
    const rows = toRows(sheet);
    const headers = buildHeaders(rows[0] ?? []);
    const dataRows = rows
      .slice(1)
      .map((row): RawCell[] => headers.map((_, index) => normalizeCell(row[index])));

    return [
      {
        sheetName,
        headers,
        rows: dataRows
      }
    ];
  });
};
