export type TypedValue =
  | { kind: "string"; value: string }
  | { kind: "integer"; value: number }
  | { kind: "float"; value: number }
  | { kind: "boolean"; value: boolean }
  | { kind: "null" };

export type DataRow = ReadonlyMap<string, TypedValue>;

export type DataSetKind = "flat" | "nested" | "arrayOfObjects" | "csv";

export type DataSet = {
  readonly name: string;
  readonly kind: DataSetKind;
  // header order for csv sets, first-seen key order otherwise
  readonly columns: readonly string[];
  readonly rows: readonly DataRow[];
};

// null marks an empty workbook cell
export type RawCell = string | null;

export type RawTable = {
  sheetName?: string;
  headers: string[];
  rows: RawCell[][];
};

export type ParsedInput =
  | { format: "json"; value: unknown }
  | { format: "tabular"; tables: RawTable[] };
