import { describe, expect, it } from "vitest";
import { classify, describeDataSet, getColumnNames } from "../lib/datasets/classify";
import { EmptyInputError, FormatError } from "../lib/errors";
import { parseCsvText } from "../lib/import/parseCsv";
import type { ParsedInput } from "../types/dataset";

const json = (value: unknown): ParsedInput => ({ format: "json", value });

describe("data set classification", () => {
  it("splits an object of record arrays into nested sets", () => {
    const dataSets = classify(
      json({
        users: [{ name: "John", age: 30 }],
        products: [{ name: "Laptop", price: 999.99 }]
      })
    );

    expect(Array.from(dataSets.keys())).toEqual(["users", "products"]);
    expect(dataSets.get("users")?.kind).toBe("nested");
    expect(dataSets.get("products")?.kind).toBe("nested");
    expect(dataSets.get("products")?.rows[0].get("price")).toEqual({ kind: "float", value: 999.99 });
  });

  it("treats a flat object as a single row", () => {
    const dataSets = classify(json({ a: 1, b: 2 }));
    const main = dataSets.get("main");

    expect(dataSets.size).toBe(1);
    expect(main?.kind).toBe("flat");
    expect(main?.rows).toHaveLength(1);
    expect(Array.from(main?.rows[0].entries() ?? [])).toEqual([
      ["a", { kind: "integer", value: 1 }],
      ["b", { kind: "integer", value: 2 }]
    ]);
  });

  it("collects columns in first-seen order across an array of objects", () => {
    const dataSets = classify(json([{ id: 1, name: "x" }, "skipped", { id: 2, tag: "new" }]));
    const main = dataSets.get("main");

    expect(main?.kind).toBe("arrayOfObjects");
    expect(main?.rows).toHaveLength(2);
    expect(main ? getColumnNames(main) : []).toEqual(["id", "name", "tag"]);
  });

  it("keeps CSV header order and omits cells of short rows", () => {
    const dataSets = classify({
      format: "tabular",
      tables: [parseCsvText("zeta,alpha,mid\n1,two\n3,four,5")]
    });
    const main = dataSets.get("main");

    expect(main?.kind).toBe("csv");
    expect(main?.columns).toEqual(["zeta", "alpha", "mid"]);
    expect(main?.rows[0].has("mid")).toBe(false);
    expect(main?.rows[1].get("mid")).toEqual({ kind: "integer", value: 5 });
    expect(main ? describeDataSet(main) : "").toBe("main (CSV): 2 rows, 3 columns");
  });

  it("names workbook sheets and skips empty ones", () => {
    const dataSets = classify({
      format: "tabular",
      tables: [
        { sheetName: "Data", headers: ["a"], rows: [["1"]] },
        { sheetName: "Empty", headers: ["a"], rows: [] },
        { sheetName: "Data", headers: ["b"], rows: [["x"]] }
      ]
    });

    expect(Array.from(dataSets.keys())).toEqual(["Data", "Data (2)"]);
  });

  it("drops plain fields next to record arrays by default", () => {
    const dataSets = classify(json({ version: 3, items: [{ id: 1 }] }));

    expect(Array.from(dataSets.keys())).toEqual(["items"]);
  });

  it("retains plain fields as a flat set on request", () => {
    const dataSets = classify(json({ version: 3, items: [{ id: 1 }] }), { scalarKeys: "retain" });

    expect(Array.from(dataSets.keys())).toEqual(["items", "main"]);
    expect(dataSets.get("main")?.rows[0].get("version")).toEqual({ kind: "integer", value: 3 });
  });

  it("uses a fresh name for retained fields when main is taken", () => {
    const dataSets = classify(json({ note: "hi", main: [{ id: 1 }] }), { scalarKeys: "retain" });

    expect(Array.from(dataSets.keys())).toEqual(["main", "fields"]);
  });

  it("rejects mixed objects in strict mode", () => {
    expect(() => classify(json({ version: 3, items: [{ id: 1 }] }), { scalarKeys: "reject" })).toThrow(
      "JSON object mixes record arrays with plain fields: version"
    );
  });

  it("rejects scalar documents", () => {
    expect(() => classify(json(42))).toThrow(FormatError);
  });

  it("rejects inputs without rows", () => {
    expect(() => classify(json({}))).toThrow(EmptyInputError);
    expect(() => classify(json([]))).toThrow("Input contains no rows to display.");
    expect(() => classify({ format: "tabular", tables: [parseCsvText("a,b")] })).toThrow(
      "CSV has a header row but no data rows."
    );
  });
});
