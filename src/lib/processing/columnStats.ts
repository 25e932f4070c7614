import { parseNumericText } from "../values/typedValue";
import type { ColumnStatistics, ProcessedRow } from "../../types/view";
import { cellOf } from "./rows";

const textStatistics = (rowCount: number): ColumnStatistics => ({
  isNumeric: false,
  min: 0,
  max: 0,
  sum: 0,
  avg: 0,
  count: rowCount
});

export const computeColumnStatistics = (
  rows: readonly ProcessedRow[],
  column: string
): ColumnStatistics => {
  const values: number[] = [];
  rows.forEach((row) => {
    const numeric = parseNumericText(cellOf(row, column));
    if (numeric !== null) {
      values.push(numeric);
    }
  });

  if (values.length === 0) {
    return textStatistics(rows.length);
  }

  const sum = values.reduce((total, value) => total + value, 0);
  return {
    isNumeric: true,
    min: values.reduce((lowest, value) => (value < lowest ? value : lowest)),
    max: values.reduce((highest, value) => (value > highest ? value : highest)),
    sum,
    avg: sum / values.length,
    count: values.length
  };
};

export const computeColumnStats = (
  columns: readonly string[],
  rows: readonly ProcessedRow[]
): Record<string, ColumnStatistics> =>
  Object.fromEntries(columns.map((column) => [column, computeColumnStatistics(rows, column)]));

export const isColumnNumeric = (
  stats: Readonly<Record<string, ColumnStatistics>>,
  column: string
): boolean => Object.prototype.hasOwnProperty.call(stats, column) && stats[column].isNumeric;
