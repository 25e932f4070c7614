import { numericSeries, pickBarColumns, type NumericPoint } from "../processing/transforms";
import type { ProcessedDataSet } from "../../types/view";
import type { Viewport } from "./viewport";

export const MAX_BAR_WIDTH = 50;
export const BAR_LABEL_RESERVE = 30;
export const BAR_CHAR = "█";

const LABEL_WIDTH = 15;
const VALUE_WIDTH = 8;

export const barWidthFor = (terminalWidth: number): number =>
  Math.max(0, Math.min(MAX_BAR_WIDTH, terminalWidth - BAR_LABEL_RESERVE));

export const barLength = (value: number, maxAbsValue: number, barWidth: number): number =>
  maxAbsValue === 0 ? 0 : Math.round((Math.abs(value) / maxAbsValue) * barWidth);

// Non-numeric rows inside the window are skipped and do not use up the row budget.
const collectWindow = (
  data: ProcessedDataSet,
  valueColumn: string,
  viewport: Viewport
): NumericPoint[] =>
  numericSeries(data, valueColumn)
    .filter((point) => point.rowIndex >= viewport.scrollOffset)
    .slice(0, viewport.maxRows);

const barLine = (point: NumericPoint, length: number): string =>
  point.label.slice(0, LABEL_WIDTH - 1).padEnd(LABEL_WIDTH) +
  " " +
  point.value.toFixed(2).padStart(VALUE_WIDTH) +
  " " +
  BAR_CHAR.repeat(length);

export const barLines = (data: ProcessedDataSet, viewport: Viewport): string[] => {
  if (data.rows.length === 0 || data.columns.length === 0) {
    return [`No data for bar chart: ${data.setName}`];
  }

  const barColumns = pickBarColumns(data);
  if (barColumns === null) {
    return [`No numeric column found for bar chart: ${data.setName}`];
  }

  const { valueColumn, labelColumn } = barColumns;
  const lines = [`Bar Chart: ${valueColumn} by ${labelColumn ?? "Row"}`];
  const points = collectWindow(data, valueColumn, viewport);
  if (points.length === 0) {
    return [...lines, "No numeric data to display."];
  }

  const maxAbsValue = points.reduce((max, point) => Math.max(max, Math.abs(point.value)), 0);
  if (maxAbsValue === 0) {
    return [...lines, "All values are zero."];
  }

  const barWidth = barWidthFor(viewport.width);
  return [
    ...lines,
    ...points.map((point) => barLine(point, barLength(point.value, maxAbsValue, barWidth)))
  ];
};
