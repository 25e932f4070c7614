export const ELLIPSIS = "...";

export const truncateText = (value: string, maxLength: number): string =>
  value.length > maxLength
    ? value.slice(0, Math.max(0, maxLength - ELLIPSIS.length)) + ELLIPSIS
    : value;

export const clipLine = (line: string, width: number): string =>
  line.length > width ? line.slice(0, Math.max(0, width)) : line;

export const joinBlocks = (blocks: readonly string[][]): string[] =>
  blocks.flatMap((block, index) => (index === 0 ? block : ["", ...block]));

export const NO_DATA_LINE = "No data to display.";
