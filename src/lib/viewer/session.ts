import { processAll } from "../processing/processDataSet";
import { cycleViewKind } from "../preferences/defaults";
import { renderBars, renderMixed, renderTable, renderTree } from "../render/renderViews";
import { clipLine } from "../render/text";
import { clampSlide, organizeSlides, setsForSlide } from "../slides/organizeSlides";
import type { DataSet } from "../../types/dataset";
import type { PreferenceMap, ProcessedDataSet, SlideLayout } from "../../types/view";
import {
  applyCommand,
  maxVisibleRows,
  resizeCursor,
  type ViewCursor,
  type ViewerCommand
} from "./cursor";
import { CONTROLS_LINE, HELP_LINES, parseKey } from "./keys";
import { startWizard, wizardKey, wizardScreen, type WizardState } from "./wizard";

export type ViewerSession = {
  readonly dataSets: ReadonlyMap<string, DataSet>;
  readonly preferences: PreferenceMap;
  readonly processed: readonly ProcessedDataSet[];
  readonly layout: SlideLayout;
  readonly cursor: ViewCursor;
  readonly showHelp: boolean;
  readonly wizard?: WizardState;
  readonly status?: string;
};

export type SessionUpdate = {
  session: ViewerSession;
  quit: boolean;
  preferencesChanged: boolean;
};

export const createSession = (
  dataSets: ReadonlyMap<string, DataSet>,
  preferences: PreferenceMap,
  cursor: ViewCursor
): ViewerSession => {
  const layout = organizeSlides(preferences);
  return {
    dataSets,
    preferences,
    processed: processAll(dataSets, preferences),
    layout,
    cursor: { ...cursor, currentSlide: clampSlide(cursor.currentSlide, layout.totalSlides) },
    showHelp: false
  };
};

export const currentSlideSets = (session: ViewerSession): ProcessedDataSet[] =>
  setsForSlide(session.layout, session.cursor.currentSlide, session.processed);

const slideRowCount = (sets: readonly ProcessedDataSet[]): number =>
  sets.reduce((max, data) => Math.max(max, data.rows.length), 0);

export const cycleSlideViews = (session: ViewerSession): ViewerSession => {
  const onSlide = new Set(session.layout.slides.get(session.cursor.currentSlide) ?? []);
  const preferences: PreferenceMap = Object.fromEntries(
    Object.entries(session.preferences).map(([name, preference]) => [
      name,
      onSlide.has(name) ? { ...preference, viewKind: cycleViewKind(preference.viewKind) } : preference
    ])
  );
  return {
    ...createSession(session.dataSets, preferences, session.cursor),
    status: "Representation updated."
  };
};

export const withStatus = (session: ViewerSession, status: string | undefined): ViewerSession => ({
  ...session,
  status
});

export const resizeSession = (
  session: ViewerSession,
  width: number,
  height: number
): ViewerSession => ({ ...session, cursor: resizeCursor(session.cursor, width, height) });

export const handleCommand = (session: ViewerSession, command: ViewerCommand): SessionUpdate => {
  if (command === "quit") {
    return { session, quit: true, preferencesChanged: false };
  }
  if (session.showHelp) {
    return { session: { ...session, showHelp: false }, quit: false, preferencesChanged: false };
  }
  if (command === "help") {
    return { session: { ...session, showHelp: true }, quit: false, preferencesChanged: false };
  }
  if (command === "cycleViews") {
    return { session: cycleSlideViews(session), quit: false, preferencesChanged: true };
  }
  if (command === "configure") {
    return {
      session: { ...session, wizard: startWizard(session.dataSets, session.preferences) },
      quit: false,
      preferencesChanged: false
    };
  }

  const cursor = applyCommand(session.cursor, command, {
    totalSlides: session.layout.totalSlides,
    totalRows: slideRowCount(currentSlideSets(session))
  });
  return {
    session: { ...session, cursor, status: undefined },
    quit: false,
    preferencesChanged: false
  };
};

const unchanged = (session: ViewerSession): SessionUpdate => ({
  session,
  quit: false,
  preferencesChanged: false
});

// Raw terminal input: the wizard takes every key while it is open.
export const handleInput = (session: ViewerSession, chunk: string): SessionUpdate => {
  if (!session.wizard) {
    const command = parseKey(chunk);
    return command ? handleCommand(session, command) : unchanged(session);
  }

  const result = wizardKey(session.wizard, chunk, session.dataSets);
  switch (result.status) {
    case "editing":
      return unchanged({ ...session, wizard: result.wizard });
    case "cancelled":
      return unchanged({ ...session, wizard: undefined, status: "Configuration cancelled." });
    case "done":
      return {
        session: {
          ...createSession(session.dataSets, result.preferences, session.cursor),
          status: "Configuration saved."
        },
        quit: false,
        preferencesChanged: true
      };
  }
};

export const renderBody = (session: ViewerSession): string[] => {
  const { scrollOffset, width, height, viewMode } = session.cursor;
  const sets = currentSlideSets(session);
  const rows = maxVisibleRows(height);
  switch (viewMode) {
    case "table":
      return renderTable(sets, scrollOffset, width, rows);
    case "bars":
      return renderBars(sets, scrollOffset, width, rows);
    case "tree":
      return renderTree(sets, scrollOffset, width, rows);
    case "mixed":
      return renderMixed(sets, scrollOffset, width, rows);
  }
};

export const composeScreen = (session: ViewerSession): string[] => {
  const { width, height, currentSlide } = session.cursor;
  if (session.showHelp) {
    return HELP_LINES.slice(0, height).map((line) => clipLine(line, width));
  }
  if (session.wizard) {
    return wizardScreen(session.wizard, session.dataSets)
      .slice(0, height)
      .map((line) => clipLine(line, width));
  }

  const footer = [""];
  if (session.layout.totalSlides > 1) {
    footer.push(`Slide ${currentSlide} of ${session.layout.totalSlides}`);
  }
  if (session.status) {
    footer.push(session.status);
  }
  footer.push(CONTROLS_LINE);

  const bodyHeight = Math.max(0, height - footer.length);
  return [...renderBody(session).slice(0, bodyHeight), ...footer]
    .slice(0, height)
    .map((line) => clipLine(line, width));
};
