import type { DataSet } from "../../types/dataset";
import type { PreferenceMap, ViewKind, ViewPreference } from "../../types/view";

export type WizardStep = "kind" | "slide" | "columns";

export type WizardState = {
  readonly setNames: readonly string[];
  readonly index: number;
  readonly step: WizardStep;
  readonly draft: PreferenceMap;
  readonly columnCursor: number;
};

export type WizardResult =
  | { status: "editing"; wizard: WizardState }
  | { status: "done"; preferences: PreferenceMap }
  | { status: "cancelled" };

const KIND_KEYS: Record<string, ViewKind> = {
  t: "table",
  b: "bars",
  v: "tree",
  s: "skip"
};

const KIND_LABELS: Record<ViewKind, string> = {
  table: "Table",
  bars: "Bars",
  tree: "Tree",
  skip: "Skip"
};

const KEY = {
  enter: ["\r", "\n"],
  escape: ["\x1b", "\x03"],
  up: "\x1b[A",
  down: "\x1b[B",
  right: "\x1b[C",
  left: "\x1b[D"
};

const hasOwn = (record: object, key: string): boolean =>
  Object.prototype.hasOwnProperty.call(record, key);

export const startWizard = (
  dataSets: ReadonlyMap<string, DataSet>,
  preferences: PreferenceMap
): WizardState => ({
  setNames: Array.from(dataSets.keys()),
  index: 0,
  step: "kind",
  draft: preferences,
  columnCursor: 0
});

export const wizardSetName = (wizard: WizardState): string => wizard.setNames[wizard.index] ?? "";

export const wizardPreference = (wizard: WizardState): ViewPreference => {
  const name = wizardSetName(wizard);
  return hasOwn(wizard.draft, name)
    ? wizard.draft[name]
    : { viewKind: "table", slideNumber: 1, selectedColumns: [] };
};

// The slide after the highest one used by any other shown set.
export const newSlideNumber = (wizard: WizardState): number => {
  const current = wizardSetName(wizard);
  return (
    Object.entries(wizard.draft).reduce(
      (max, [name, preference]) =>
        name === current || preference.viewKind === "skip"
          ? max
          : Math.max(max, preference.slideNumber),
      0
    ) + 1
  );
};

const columnsOf = (wizard: WizardState, dataSets: ReadonlyMap<string, DataSet>): readonly string[] =>
  dataSets.get(wizardSetName(wizard))?.columns ?? [];

const updatePreference = (wizard: WizardState, patch: Partial<ViewPreference>): WizardState => ({
  ...wizard,
  draft: {
    ...wizard.draft,
    [wizardSetName(wizard)]: { ...wizardPreference(wizard), ...patch }
  }
});

const editing = (wizard: WizardState): WizardResult => ({ status: "editing", wizard });

const moveToSet = (wizard: WizardState, index: number): WizardResult => {
  if (index >= wizard.setNames.length) {
    return { status: "done", preferences: wizard.draft };
  }
  return editing({ ...wizard, index: Math.max(0, index), step: "kind", columnCursor: 0 });
};

const chooseKind = (wizard: WizardState, viewKind: ViewKind): WizardResult => {
  const updated = updatePreference(wizard, { viewKind });
  return viewKind === "skip"
    ? moveToSet(updated, updated.index + 1)
    : editing({ ...updated, step: "slide" });
};

const chooseSlide = (wizard: WizardState, slideNumber: number): WizardResult =>
  editing({ ...updatePreference(wizard, { slideNumber }), step: "columns", columnCursor: 0 });

const toggleColumn = (wizard: WizardState, column: string): WizardState => {
  const selected = wizardPreference(wizard).selectedColumns;
  return updatePreference(wizard, {
    selectedColumns: selected.includes(column)
      ? selected.filter((name) => name !== column)
      : [...selected, column]
  });
};

const shiftColumn = (wizard: WizardState, column: string, delta: number): WizardState => {
  const selected = [...wizardPreference(wizard).selectedColumns];
  const from = selected.indexOf(column);
  const to = from + delta;
  if (from < 0 || to < 0 || to >= selected.length) {
    return wizard;
  }
  selected.splice(from, 1);
  selected.splice(to, 0, column);
  return updatePreference(wizard, { selectedColumns: selected });
};

const handleColumnKey = (
  wizard: WizardState,
  key: string,
  columns: readonly string[]
): WizardResult => {
  const column = columns[wizard.columnCursor];
  const lastIndex = Math.max(0, columns.length - 1);

  if (key === KEY.up || key === "k") {
    return editing({ ...wizard, columnCursor: Math.max(0, wizard.columnCursor - 1) });
  }
  if (key === KEY.down || key === "j") {
    return editing({ ...wizard, columnCursor: Math.min(lastIndex, wizard.columnCursor + 1) });
  }
  if (key === "a") {
    return editing(updatePreference(wizard, { selectedColumns: [] }));
  }
  if (column === undefined) {
    return editing(wizard);
  }
  if (key === " ") {
    return editing(toggleColumn(wizard, column));
  }
  if (key === "<" || key === ",") {
    return editing(shiftColumn(wizard, column, -1));
  }
  if (key === ">" || key === ".") {
    return editing(shiftColumn(wizard, column, 1));
  }
  return editing(wizard);
};

export const wizardKey = (
  wizard: WizardState,
  chunk: string,
  dataSets: ReadonlyMap<string, DataSet>
): WizardResult => {
  const key = chunk.length === 1 ? chunk.toLowerCase() : chunk;
  const preference = wizardPreference(wizard);

  if (KEY.escape.includes(key)) {
    return { status: "cancelled" };
  }
  if (key === KEY.left) {
    return moveToSet(wizard, wizard.index - 1);
  }
  if (key === KEY.right) {
    return moveToSet(wizard, wizard.index + 1);
  }

  switch (wizard.step) {
    case "kind":
      if (hasOwn(KIND_KEYS, key)) {
        return chooseKind(wizard, KIND_KEYS[key]);
      }
      return KEY.enter.includes(key) ? chooseKind(wizard, preference.viewKind) : editing(wizard);
    case "slide":
      if (/^[1-9]$/.test(key)) {
        return chooseSlide(wizard, Number(key));
      }
      if (key === "n") {
        return chooseSlide(wizard, newSlideNumber(wizard));
      }
      return KEY.enter.includes(key)
        ? chooseSlide(wizard, preference.slideNumber)
        : editing(wizard);
    case "columns":
      if (KEY.enter.includes(key)) {
        return moveToSet(wizard, wizard.index + 1);
      }
      return handleColumnKey(wizard, key, columnsOf(wizard, dataSets));
  }
};

const columnLines = (wizard: WizardState, columns: readonly string[]): string[] => {
  const selected = wizardPreference(wizard).selectedColumns;
  if (columns.length === 0) {
    return ["  (no columns)"];
  }
  return columns.map((column, index) => {
    const pointer = index === wizard.columnCursor ? ">" : " ";
    const position = selected.indexOf(column);
    const mark = position < 0 ? "[ ]" : `[${position + 1}]`;
    return `${pointer} ${mark} ${column}`;
  });
};

export const wizardScreen = (
  wizard: WizardState,
  dataSets: ReadonlyMap<string, DataSet>
): string[] => {
  const name = wizardSetName(wizard);
  const preference = wizardPreference(wizard);
  const columns = columnsOf(wizard, dataSets);
  const rowCount = dataSets.get(name)?.rows.length ?? 0;
  const header = [
    `=== Configure ${wizard.index + 1}/${wizard.setNames.length}: ${name} ===`,
    `Rows: ${rowCount} | Columns: ${columns.length}`,
    `Current: ${KIND_LABELS[preference.viewKind]}, slide ${preference.slideNumber}, ` +
      (preference.selectedColumns.length > 0 ? preference.selectedColumns.join(", ") : "all columns"),
    ""
  ];
  const footer = ["", "[←/→] Previous / next set | [Esc] Cancel"];

  switch (wizard.step) {
    case "kind":
      return [
        ...header,
        "Choose representation:",
        "  [t] Table  [b] Bars  [v] Tree  [s] Skip  [Enter] Keep",
        ...footer
      ];
    case "slide":
      return [
        ...header,
        "Choose slide:",
        `  [1-9] Slide number  [n] New slide (${newSlideNumber(wizard)})  [Enter] Keep`,
        ...footer
      ];
    case "columns":
      return [
        ...header,
        "Choose columns (numbers give display order, none selected shows all):",
        ...columnLines(wizard, columns),
        "  [↑/↓] Move  [Space] Toggle  [<>] Reorder  [a] All  [Enter] Done",
        ...footer
      ];
  }
};
