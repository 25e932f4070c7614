export type { DataRow, DataSet, DataSetKind, ParsedInput, RawCell, RawTable, TypedValue } from "./types/dataset";
export type {
  ColumnStatistics,
  PreferenceMap,
  ProcessedDataSet,
  ProcessedRow,
  SlideLayout,
  SlideMap,
  ViewKind,
  ViewPreference
} from "./types/view";
export { VIEW_KINDS } from "./types/view";
export { EmptyInputError, FormatError } from "./lib/errors";
export { coerceText, fromJsonValue, isNumericText, renderValue } from "./lib/values/typedValue";
export { parseCsvText } from "./lib/import/parseCsv";
export { parseXlsxBuffer } from "./lib/import/parseXlsx";
export { parseContent, parseJsonText, readSourceFile } from "./lib/import/parseFile";
export { classify, describeDataSet, getColumnNames, type ClassifyOptions } from "./lib/datasets/classify";
export { processAll, processDataSet } from "./lib/processing/processDataSet";
export { computeColumnStats } from "./lib/processing/columnStats";
export {
  filterDataSet,
  limitDataSet,
  numericSeries,
  pickBarColumns,
  sortDataSet
} from "./lib/processing/transforms";
export { clampSlide, organizeSlides, setsForSlide } from "./lib/slides/organizeSlides";
export { renderBars, renderMixed, renderTable, renderTree } from "./lib/render/renderViews";
export {
  createMemoryPreferenceStore,
  type PreferenceSource,
  type PreferenceStore
} from "./lib/preferences/store";
export { createFilePreferenceStore, fileIdentity } from "./lib/preferences/fileStore";
export { cycleViewKind, defaultPreferences, reconcilePreferences } from "./lib/preferences/defaults";
export { openDocument } from "./lib/openDocument";
export { applyCommand, createCursor, type ViewCursor, type ViewerCommand } from "./lib/viewer/cursor";
export {
  composeScreen,
  createSession,
  handleCommand,
  handleInput,
  type ViewerSession
} from "./lib/viewer/session";
export { startWizard, wizardKey, type WizardResult, type WizardState } from "./lib/viewer/wizard";
