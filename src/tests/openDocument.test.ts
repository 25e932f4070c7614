import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FormatError } from "../lib/errors";
import { openDocument } from "../lib/openDocument";
import { fileIdentity } from "../lib/preferences/fileStore";
import { createMemoryPreferenceStore } from "../lib/preferences/store";

describe("opening documents", () => {
  let workDir = "";

  beforeEach(() => {
    workDir = mkdtempSync(join(tmpdir(), "datadeck-open-"));
  });

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  const writeSource = (name: string, content: string) => {
    const filePath = join(workDir, name);
    writeFileSync(filePath, content);
    return filePath;
  };

  it("creates and stores default preferences on first open", () => {
    const filePath = writeSource("shop.json", '{"users":[{"id":1}],"orders":[{"id":7}]}');
    const store = createMemoryPreferenceStore();

    const document = openDocument(filePath, store);

    expect(document.restored).toBe(false);
    expect(document.identity).toBe(
      fileIdentity(filePath, '{"users":[{"id":1}],"orders":[{"id":7}]}')
    );
    expect(document.preferences).toEqual({
      users: { viewKind: "table", slideNumber: 1, selectedColumns: [] },
      orders: { viewKind: "table", slideNumber: 2, selectedColumns: [] }
    });
    expect(store.get(document.identity)).toEqual(document.preferences);
  });

  it("restores stored preferences", () => {
    const filePath = writeSource("cities.csv", "name,population\nOslo,700000");
    const store = createMemoryPreferenceStore();
    const first = openDocument(filePath, store);
    store.set(first.identity, {
      main: { viewKind: "bars", slideNumber: 1, selectedColumns: ["population"] }
    });

    const second = openDocument(filePath, store);

    expect(second.restored).toBe(true);
    expect(second.preferences.main.viewKind).toBe("bars");
  });

  it("forgets stored preferences on reset", () => {
    const filePath = writeSource("cities.csv", "name,population\nOslo,700000");
    const store = createMemoryPreferenceStore();
    const first = openDocument(filePath, store);
    store.set(first.identity, {
      main: { viewKind: "tree", slideNumber: 1, selectedColumns: [] }
    });

    const reset = openDocument(filePath, store, { reset: true });

    expect(reset.restored).toBe(false);
    expect(reset.preferences.main.viewKind).toBe("table");
  });

  it("passes classification options through", () => {
    const filePath = writeSource("mixed.json", '{"version":2,"items":[{"id":1}]}');

    const document = openDocument(filePath, createMemoryPreferenceStore(), {
      classify: { scalarKeys: "retain" }
    });

    expect(Array.from(document.dataSets.keys())).toEqual(["items", "main"]);
  });

  it("rejects unsupported files", () => {
    const filePath = writeSource("notes.txt", "hello");

    expect(() => openDocument(filePath, createMemoryPreferenceStore())).toThrow(FormatError);
  });
});
