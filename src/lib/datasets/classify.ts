import { EmptyInputError, FormatError } from "../errors";
import { coerceText, fromJsonValue } from "../values/typedValue";
import type {
  DataRow,
  DataSet,
  DataSetKind,
  ParsedInput,
  RawTable,
  TypedValue
} from "../../types/dataset";

export const MAIN_SET_NAME = "main";

// Non-qualifying keys of a mixed top-level object are dropped by default.
export type ScalarKeyPolicy = "drop" | "retain" | "reject";

export type ClassifyOptions = {
  scalarKeys?: ScalarKeyPolicy;
};

type JsonObject = Record<string, unknown>;

const KIND_LABELS: Record<DataSetKind, string> = {
  flat: "Flat",
  nested: "Nested",
  arrayOfObjects: "Array",
  csv: "CSV"
};

const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isRecordArray = (value: unknown): value is unknown[] =>
  Array.isArray(value) && value.length > 0 && isJsonObject(value[0]);

const rowFromObject = (item: JsonObject): DataRow =>
  new Map<string, TypedValue>(
    Object.entries(item).map(([key, value]) => [key, fromJsonValue(value)])
  );

const rowsFromArray = (items: unknown[]): DataRow[] =>
  items.filter(isJsonObject).map(rowFromObject);

const collectColumns = (rows: readonly DataRow[]): string[] => {
  const seen = new Set<string>();
  rows.forEach((row) => {
    row.forEach((_, key) => seen.add(key));
  });
  return Array.from(seen);
};

const buildDataSet = (name: string, kind: DataSetKind, rows: DataRow[]): DataSet => ({
  name,
  kind,
  columns: collectColumns(rows),
  rows
});

const tableToDataSet = (name: string, table: RawTable): DataSet => {
  const rows = table.rows.map((cells) => {
    const row = new Map<string, TypedValue>();
    table.headers.forEach((header, index) => {
      const cell = index < cells.length ? cells[index] : null;
      if (cell !== null) {
        row.set(header, coerceText(cell));
      }
    });
    return row;
  });
  return {
    name,
    kind: "csv",
    columns: [...table.headers],
    rows
  };
};

const uniqueName = (candidate: string, taken: ReadonlyMap<string, unknown>): string => {
  if (!taken.has(candidate)) {
    return candidate;
  }
  let suffix = 2;
  while (taken.has(`${candidate} (${suffix})`)) {
    suffix += 1;
  }
  return `${candidate} (${suffix})`;
};

const classifyObject = (
  value: JsonObject,
  policy: ScalarKeyPolicy
): Map<string, DataSet> => {
  const dataSets = new Map<string, DataSet>();
  const leftovers: [string, unknown][] = [];

  Object.entries(value).forEach(([key, entry]) => {
    if (isRecordArray(entry)) {
      dataSets.set(key, buildDataSet(key, "nested", rowsFromArray(entry)));
    } else {
      leftovers.push([key, entry]);
    }
  });

  if (dataSets.size === 0) {
    if (leftovers.length === 0) {
      throw new EmptyInputError("JSON object has no fields to display.");
    }
    return new Map([[MAIN_SET_NAME, buildDataSet(MAIN_SET_NAME, "flat", [rowFromObject(value)])]]);
  }

  if (leftovers.length === 0 || policy === "drop") {
    return dataSets;
  }

  if (policy === "reject") {
    throw new FormatError(
      `JSON object mixes record arrays with plain fields: ${leftovers
        .map(([key]) => key)
        .join(", ")}`
    );
  }

  const name = dataSets.has(MAIN_SET_NAME) ? uniqueName("fields", dataSets) : MAIN_SET_NAME;
  dataSets.set(name, buildDataSet(name, "flat", [rowFromObject(Object.fromEntries(leftovers))]));
  return dataSets;
};

const classifyJson = (value: unknown, policy: ScalarKeyPolicy): Map<string, DataSet> => {
  if (Array.isArray(value)) {
    return new Map([
      [MAIN_SET_NAME, buildDataSet(MAIN_SET_NAME, "arrayOfObjects", rowsFromArray(value))]
    ]);
  }
  if (isJsonObject(value)) {
    return classifyObject(value, policy);
  }
  throw new FormatError("Unsupported JSON structure: expected an object or an array at the top level.");
};

const classifyTables = (tables: readonly RawTable[]): Map<string, DataSet> => {
  if (tables.length === 0) {
    throw new FormatError("No tables found in input.");
  }

  if (tables.length === 1) {
    const [table] = tables;
    if (table.rows.length === 0) {
      throw new EmptyInputError("CSV has a header row but no data rows.");
    }
    return new Map([[MAIN_SET_NAME, tableToDataSet(MAIN_SET_NAME, table)]]);
  }

  const dataSets = new Map<string, DataSet>();
  tables.forEach((table, index) => {
    if (table.rows.length === 0) {
      return;
    }
    const name = uniqueName(table.sheetName ?? `Sheet ${index + 1}`, dataSets);
    dataSets.set(name, tableToDataSet(name, table));
  });
  return dataSets;
};

export const classify = (
  input: ParsedInput,
  options: ClassifyOptions = {}
): Map<string, DataSet> => {
  const dataSets =
    input.format === "json"
      ? classifyJson(input.value, options.scalarKeys ?? "drop")
      : classifyTables(input.tables);

  const totalRows = Array.from(dataSets.values()).reduce(
    (sum, dataSet) => sum + dataSet.rows.length,
    0
  );
  if (totalRows === 0) {
    throw new EmptyInputError("Input contains no rows to display.");
  }
  return dataSets;
};

export const getColumnNames = (dataSet: DataSet): string[] => [...dataSet.columns];

export const describeDataSet = (dataSet: DataSet): string =>
  `${dataSet.name} (${KIND_LABELS[dataSet.kind]}): ${dataSet.rows.length} rows, ${dataSet.columns.length} columns`;
