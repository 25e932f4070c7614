import { cellOf } from "../processing/rows";
import { formatNumber } from "../values/typedValue";
import type { ColumnStatistics, ProcessedDataSet } from "../../types/view";
import { truncateText } from "./text";
import type { Viewport } from "./viewport";

export const TREE_SAMPLE_COUNT = 3;
export const TREE_SAMPLE_LENGTH = 20;

const describeColumn = (stats: ColumnStatistics | undefined): string => {
  if (stats === undefined) {
    return "";
  }
  return stats.isNumeric
    ? ` [${formatNumber(stats.min)}–${formatNumber(stats.max)}]`
    : " (text)";
};

const statsFor = (data: ProcessedDataSet, column: string): ColumnStatistics | undefined =>
  Object.prototype.hasOwnProperty.call(data.columnStats, column)
    ? data.columnStats[column]
    : undefined;

// One level deep: columns, then a few sample values for every column but the last.
export const treeLines = (data: ProcessedDataSet, viewport: Viewport): string[] => {
  if (data.rows.length === 0) {
    return [`No data for tree view: ${data.setName}`];
  }

  const lines = [
    `Tree View: ${data.setName}`,
    `├── Columns: ${data.columns.length}`,
    `├── Rows: ${data.rows.length}`
  ];
  const samples = data.rows.slice(viewport.scrollOffset, viewport.scrollOffset + TREE_SAMPLE_COUNT);

  data.columns.forEach((column, index) => {
    const isLastColumn = index === data.columns.length - 1;
    lines.push(`${isLastColumn ? "└── " : "├── "}${column}${describeColumn(statsFor(data, column))}`);
    if (isLastColumn) {
      return;
    }
    samples.forEach((row, sampleIndex) => {
      const branch = sampleIndex === samples.length - 1 ? "└── " : "├── ";
      lines.push(`│   ${branch}${truncateText(cellOf(row, column), TREE_SAMPLE_LENGTH)}`);
    });
  });
  return lines;
};
