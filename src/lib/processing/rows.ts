import { MISSING_CELL } from "../values/typedValue";
import type { ProcessedRow } from "../../types/view";

export const cellOf = (row: ProcessedRow, column: string): string =>
  Object.prototype.hasOwnProperty.call(row, column) ? row[column] : MISSING_CELL;
