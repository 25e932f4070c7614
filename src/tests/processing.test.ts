import { describe, expect, it } from "vitest";
import { classify } from "../lib/datasets/classify";
import { parseCsvText } from "../lib/import/parseCsv";
import { processAll, processDataSet } from "../lib/processing/processDataSet";
import {
  filterDataSet,
  limitDataSet,
  numericSeries,
  pickBarColumns,
  sortDataSet
} from "../lib/processing/transforms";
import type { DataSet } from "../types/dataset";
import type { ViewPreference } from "../types/view";

const tablePreference = (selectedColumns: string[] = []): ViewPreference => ({
  viewKind: "table",
  slideNumber: 1,
  selectedColumns
});

const mainSet = (csv: string): DataSet => {
  const dataSet = classify({ format: "tabular", tables: [parseCsvText(csv)] }).get("main");
  if (!dataSet) {
    throw new Error("main set missing");
  }
  return dataSet;
};

const cities = mainSet(
  "name,population,state\nNew York,8419000,NY\nLos Angeles,3980000,CA\n"
);

describe("data processing", () => {
  it("renders rows and computes numeric statistics", () => {
    const processed = processDataSet(cities, tablePreference(["name", "population", "state"]));

    expect(processed.rows).toHaveLength(2);
    expect(processed.rows[0]).toEqual({ name: "New York", population: "8419000", state: "NY" });
    expect(processed.columnStats.population).toEqual({
      isNumeric: true,
      min: 3980000,
      max: 8419000,
      sum: 12399000,
      avg: 6199500,
      count: 2
    });
    expect(processed.columnStats.name).toEqual({
      isNumeric: false,
      min: 0,
      max: 0,
      sum: 0,
      avg: 0,
      count: 2
    });
  });

  it("falls back to the first row's keys and renders missing cells as N/A", () => {
    const dataSet = classify({
      format: "json",
      value: [{ a: 1, b: null }, { c: 2.5 }]
    }).get("main");
    if (!dataSet) {
      throw new Error("main set missing");
    }

    const processed = processDataSet(dataSet, tablePreference());

    expect(processed.columns).toEqual(["a", "b"]);
    expect(processed.rows).toEqual([
      { a: "1", b: "null" },
      { a: "N/A", b: "N/A" }
    ]);
    expect(processed.columnStats.a).toMatchObject({ isNumeric: true, count: 1, avg: 1 });
  });

  it("keeps selected columns in order without duplicates", () => {
    const processed = processDataSet(cities, tablePreference(["state", "name", "state"]));

    expect(processed.columns).toEqual(["state", "name"]);
  });

  it("processes only sets with a preference", () => {
    const processed = processAll(new Map([["main", cities]]), {});

    expect(processed).toEqual([]);
  });

  it("sorts numerically and keeps ties stable", () => {
    const data = processDataSet(
      mainSet("id,score\na,10\nb,9\nc,10\nd,100"),
      tablePreference()
    );

    expect(sortDataSet(data, "score").rows.map((row) => row.id)).toEqual(["b", "a", "c", "d"]);
    expect(sortDataSet(data, "score", false).rows.map((row) => row.id)).toEqual([
      "d",
      "a",
      "c",
      "b"
    ]);
    expect(sortDataSet(data, "missing")).toBe(data);
  });

  it("filters case-insensitively", () => {
    const data = processDataSet(cities, tablePreference());
    const filtered = filterDataSet(data, "name", "new");

    expect(filtered.rows.map((row) => row.name)).toEqual(["New York"]);
    expect(filterDataSet(filtered, "name", "new").rows).toEqual(filtered.rows);
    expect(filtered.columnStats.population.max).toBe(8419000);
    expect(filterDataSet(data, "missing", "x").rows).toEqual([]);
  });

  it("limits row counts", () => {
    const data = processDataSet(cities, tablePreference());

    expect(limitDataSet(data, 1).rows).toHaveLength(1);
    expect(limitDataSet(data, 5)).toBe(data);
    expect(limitDataSet(data, -3).rows).toEqual([]);
  });

  it("picks bar columns and numeric series", () => {
    const data = processDataSet(cities, tablePreference());

    expect(pickBarColumns(data)).toEqual({ valueColumn: "population", labelColumn: "name" });
    expect(numericSeries(data, "population")).toEqual([
      { label: "New York", value: 8419000, rowIndex: 0 },
      { label: "Los Angeles", value: 3980000, rowIndex: 1 }
    ]);
  });
});
