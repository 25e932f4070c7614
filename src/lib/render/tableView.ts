import { cellOf } from "../processing/rows";
import type { ProcessedDataSet } from "../../types/view";
import { truncateText } from "./text";
import type { Viewport } from "./viewport";

export const MAX_COLUMN_WIDTH = 30;

export const columnWidths = (data: ProcessedDataSet): number[] =>
  data.columns.map((column) =>
    Math.min(
      MAX_COLUMN_WIDTH,
      data.rows.reduce((width, row) => Math.max(width, cellOf(row, column).length), column.length)
    )
  );

const fitCell = (value: string, width: number): string => truncateText(value, width).padEnd(width);

const border = (widths: readonly number[], left: string, join: string, right: string): string =>
  left + widths.map((width) => "─".repeat(width + 2)).join(join) + right;

const contentLine = (cells: readonly string[], widths: readonly number[]): string =>
  "│" + cells.map((cell, index) => ` ${fitCell(cell, widths[index])} │`).join("");

export const tableLines = (data: ProcessedDataSet, viewport: Viewport): string[] => {
  if (data.rows.length === 0 || data.columns.length === 0) {
    return [`No data in set: ${data.setName}`];
  }

  const widths = columnWidths(data);
  const { scrollOffset, maxRows } = viewport;
  const visible = data.rows.slice(scrollOffset, scrollOffset + maxRows);
  const lines = [
    border(widths, "┌", "┬", "┐"),
    contentLine(data.columns, widths),
    border(widths, "├", "┼", "┤"),
    ...visible.map((row) =>
      contentLine(
        data.columns.map((column) => cellOf(row, column)),
        widths
      )
    ),
    border(widths, "└", "┴", "┘")
  ];

  const total = data.rows.length;
  if (scrollOffset > 0 || scrollOffset + maxRows < total) {
    lines.push(
      visible.length > 0
        ? `Showing rows ${scrollOffset + 1}-${scrollOffset + visible.length} of ${total}`
        : `Showing rows 0 of ${total}`
    );
  }
  return lines;
};
