export const VIEW_KINDS = ["table", "bars", "tree", "skip"] as const;

export type ViewKind = (typeof VIEW_KINDS)[number];

export type ViewPreference = {
  viewKind: ViewKind;
  slideNumber: number;
  // empty means every column of the first row
  selectedColumns: string[];
};

export type PreferenceMap = Record<string, ViewPreference>;

export type ColumnStatistics = {
  isNumeric: boolean;
  min: number;
  max: number;
  sum: number;
  avg: number;
  count: number;
};

export type ProcessedRow = Readonly<Record<string, string>>;

export type ProcessedDataSet = {
  readonly setName: string;
  readonly viewKind: ViewKind;
  readonly slideNumber: number;
  readonly columns: readonly string[];
  readonly rows: readonly ProcessedRow[];
  readonly columnStats: Readonly<Record<string, ColumnStatistics>>;
};

export type SlideMap = ReadonlyMap<number, readonly string[]>;

export type SlideLayout = {
  slides: SlideMap;
  totalSlides: number;
};
