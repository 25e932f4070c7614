import { renderValue } from "../values/typedValue";
import type { DataSet } from "../../types/dataset";
import type { PreferenceMap, ProcessedDataSet, ProcessedRow, ViewPreference } from "../../types/view";
import { computeColumnStats } from "./columnStats";

const selectColumns = (dataSet: DataSet, preference: ViewPreference): string[] => {
  if (preference.selectedColumns.length > 0) {
    return Array.from(new Set(preference.selectedColumns));
  }
  const firstRow = dataSet.rows[0];
  return firstRow ? Array.from(firstRow.keys()) : [];
};

export const processDataSet = (dataSet: DataSet, preference: ViewPreference): ProcessedDataSet => {
  const columns = selectColumns(dataSet, preference);
  const rows: ProcessedRow[] = dataSet.rows.map((row) =>
    Object.fromEntries(columns.map((column) => [column, renderValue(row.get(column))]))
  );

  return {
    setName: dataSet.name,
    viewKind: preference.viewKind,
    slideNumber: preference.slideNumber,
    columns,
    rows,
    columnStats: computeColumnStats(columns, rows)
  };
};

export const processAll = (
  dataSets: ReadonlyMap<string, DataSet>,
  preferences: PreferenceMap
): ProcessedDataSet[] =>
  Array.from(dataSets.values()).flatMap((dataSet) => {
    const preference = Object.prototype.hasOwnProperty.call(preferences, dataSet.name)
      ? preferences[dataSet.name]
      : undefined;
    return preference ? [processDataSet(dataSet, preference)] : [];
  });
