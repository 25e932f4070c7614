export const VIEW_MODES = ["mixed", "table", "bars", "tree"] as const;

export type ViewMode = (typeof VIEW_MODES)[number];

export type ViewCursor = {
  readonly scrollOffset: number;
  readonly currentSlide: number;
  readonly viewMode: ViewMode;
  readonly width: number;
  readonly height: number;
};

export type ViewerCommand =
  | "up"
  | "down"
  | "pageUp"
  | "pageDown"
  | "home"
  | "end"
  | "previousSlide"
  | "nextSlide"
  | "modeTable"
  | "modeBars"
  | "modeTree"
  | "modeMixed"
  | "configure"
  | "cycleViews"
  | "help"
  | "quit";

export type CursorLimits = {
  totalSlides: number;
  totalRows: number;
};

export const DEFAULT_WIDTH = 80;
export const DEFAULT_HEIGHT = 24;

// Ten lines are kept for headers, slide info and the controls line.
export const maxVisibleRows = (height: number): number => Math.max(5, height - 10);

export const createCursor = (overrides: Partial<ViewCursor> = {}): ViewCursor => ({
  scrollOffset: 0,
  currentSlide: 1,
  viewMode: "mixed",
  width: DEFAULT_WIDTH,
  height: DEFAULT_HEIGHT,
  ...overrides
});

const clampScroll = (offset: number, totalRows: number): number =>
  Math.max(0, Math.min(offset, Math.max(0, totalRows - 1)));

const changeSlide = (cursor: ViewCursor, slide: number, totalSlides: number): ViewCursor => {
  if (slide < 1 || slide > totalSlides || slide === cursor.currentSlide) {
    return cursor;
  }
  return { ...cursor, currentSlide: slide, scrollOffset: 0 };
};

export const applyCommand = (
  cursor: ViewCursor,
  command: ViewerCommand,
  limits: CursorLimits
): ViewCursor => {
  const page = maxVisibleRows(cursor.height);
  const scrollTo = (offset: number): ViewCursor => ({
    ...cursor,
    scrollOffset: clampScroll(offset, limits.totalRows)
  });

  switch (command) {
    case "up":
      return scrollTo(cursor.scrollOffset - 1);
    case "down":
      return scrollTo(cursor.scrollOffset + 1);
    case "pageUp":
      return scrollTo(cursor.scrollOffset - page);
    case "pageDown":
      return scrollTo(cursor.scrollOffset + page);
    case "home":
      return scrollTo(0);
    case "end":
      return scrollTo(limits.totalRows - page);
    case "previousSlide":
      return changeSlide(cursor, cursor.currentSlide - 1, limits.totalSlides);
    case "nextSlide":
      return changeSlide(cursor, cursor.currentSlide + 1, limits.totalSlides);
    case "modeTable":
      return { ...cursor, viewMode: "table" };
    case "modeBars":
      return { ...cursor, viewMode: "bars" };
    case "modeTree":
      return { ...cursor, viewMode: "tree" };
    case "modeMixed":
      return { ...cursor, viewMode: "mixed" };
    default:
      return cursor;
  }
};

export const resizeCursor = (cursor: ViewCursor, width: number, height: number): ViewCursor => ({
  ...cursor,
  width: Math.max(1, width),
  height: Math.max(1, height)
});
