import type { ProcessedDataSet, ViewKind } from "../../types/view";
import { barLines } from "./barView";
import { tableLines } from "./tableView";
import { clipLine, joinBlocks, NO_DATA_LINE } from "./text";
import { treeLines } from "./treeView";
import { toViewport, type Viewport } from "./viewport";

type SetRenderer = (data: ProcessedDataSet, viewport: Viewport) => string[];

const renderEach = (
  render: SetRenderer,
  processedSets: readonly ProcessedDataSet[],
  viewport: Viewport
): string[] => {
  if (processedSets.length === 0) {
    return [NO_DATA_LINE];
  }
  return joinBlocks(processedSets.map((data) => render(data, viewport))).map((line) =>
    clipLine(line, viewport.width)
  );
};

export const rendererFor = (viewKind: ViewKind): SetRenderer => {
  switch (viewKind) {
    case "bars":
      return barLines;
    case "tree":
      return treeLines;
    default:
      return tableLines;
  }
};

export const renderTable = (
  processedSets: readonly ProcessedDataSet[],
  scrollOffset: number,
  terminalWidth: number,
  maxVisibleRows: number
): string[] =>
  renderEach(tableLines, processedSets, toViewport(scrollOffset, terminalWidth, maxVisibleRows));

export const renderBars = (
  processedSets: readonly ProcessedDataSet[],
  scrollOffset: number,
  terminalWidth: number,
  maxVisibleRows: number
): string[] =>
  renderEach(barLines, processedSets, toViewport(scrollOffset, terminalWidth, maxVisibleRows));

export const renderTree = (
  processedSets: readonly ProcessedDataSet[],
  scrollOffset: number,
  terminalWidth: number,
  maxVisibleRows: number
): string[] =>
  renderEach(treeLines, processedSets, toViewport(scrollOffset, terminalWidth, maxVisibleRows));

// Skipped sets are left out; every other set is drawn with its own view kind.
export const renderMixed = (
  processedSets: readonly ProcessedDataSet[],
  scrollOffset: number,
  terminalWidth: number,
  maxVisibleRows: number
): string[] =>
  renderEach(
    (data, viewport) => [`=== ${data.setName} ===`, ...rendererFor(data.viewKind)(data, viewport)],
    processedSets.filter((data) => data.viewKind !== "skip"),
    toViewport(scrollOffset, terminalWidth, maxVisibleRows)
  );
