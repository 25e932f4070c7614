import { parseNumericText } from "../values/typedValue";
import type { ProcessedDataSet, ProcessedRow } from "../../types/view";
import { computeColumnStats, isColumnNumeric } from "./columnStats";
import { cellOf } from "./rows";

export type BarColumns = {
  valueColumn: string;
  labelColumn: string | null;
};

export type NumericPoint = {
  label: string;
  value: number;
  rowIndex: number;
};

const withRows = (data: ProcessedDataSet, rows: readonly ProcessedRow[]): ProcessedDataSet => ({
  ...data,
  rows,
  columnStats: computeColumnStats(data.columns, rows)
});

export const compareCells = (left: string, right: string): number => {
  const leftNumber = parseNumericText(left);
  const rightNumber = parseNumericText(right);
  if (leftNumber !== null && rightNumber !== null) {
    return leftNumber - rightNumber;
  }
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
};

// Array.prototype.sort is stable, so equal keys keep their relative order.
export const sortDataSet = (
  data: ProcessedDataSet,
  column: string,
  ascending = true
): ProcessedDataSet => {
  if (!data.columns.includes(column)) {
    return data;
  }
  const direction = ascending ? 1 : -1;
  const rows = [...data.rows].sort(
    (left, right) => direction * compareCells(cellOf(left, column), cellOf(right, column))
  );
  return withRows(data, rows);
};

export const filterDataSet = (
  data: ProcessedDataSet,
  column: string,
  needle: string
): ProcessedDataSet => {
  if (!data.columns.includes(column)) {
    return withRows(data, []);
  }
  const lowered = needle.toLowerCase();
  return withRows(
    data,
    data.rows.filter((row) => cellOf(row, column).toLowerCase().includes(lowered))
  );
};

export const limitDataSet = (data: ProcessedDataSet, maxRows: number): ProcessedDataSet => {
  const bound = Math.max(0, Math.floor(maxRows));
  if (data.rows.length <= bound) {
    return data;
  }
  return withRows(data, data.rows.slice(0, bound));
};

const labelColumnFor = (data: ProcessedDataSet, valueColumn: string): string | null =>
  data.columns.find(
    (column) => column !== valueColumn && !isColumnNumeric(data.columnStats, column)
  ) ?? null;

export const pickBarColumns = (data: ProcessedDataSet): BarColumns | null => {
  const valueColumn = data.columns.find((column) => isColumnNumeric(data.columnStats, column));
  if (valueColumn === undefined) {
    return null;
  }
  return { valueColumn, labelColumn: labelColumnFor(data, valueColumn) };
};

export const rowLabel = (row: ProcessedRow, labelColumn: string | null, rowIndex: number): string =>
  labelColumn === null ? `Row ${rowIndex + 1}` : cellOf(row, labelColumn);

// Rows whose cell is not numeric are left out; rowIndex keeps the original position.
export const numericSeries = (data: ProcessedDataSet, column: string): NumericPoint[] => {
  if (!data.columns.includes(column)) {
    return [];
  }
  const labelColumn = labelColumnFor(data, column);

  return data.rows.flatMap((row, rowIndex) => {
    const value = parseNumericText(cellOf(row, column));
    return value === null ? [] : [{ label: rowLabel(row, labelColumn, rowIndex), value, rowIndex }];
  });
};
