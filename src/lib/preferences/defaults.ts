import type { DataSet } from "../../types/dataset";
import type { PreferenceMap, ViewKind, ViewPreference } from "../../types/view";

const VIEW_CYCLE: Record<ViewKind, ViewKind> = {
  table: "bars",
  bars: "tree",
  tree: "table",
  skip: "skip"
};

export const cycleViewKind = (viewKind: ViewKind): ViewKind => VIEW_CYCLE[viewKind];

const defaultPreference = (slideNumber: number): ViewPreference => ({
  viewKind: "table",
  slideNumber,
  selectedColumns: []
});

export const defaultPreferences = (dataSets: ReadonlyMap<string, DataSet>): PreferenceMap =>
  Object.fromEntries(
    Array.from(dataSets.keys()).map((name, index) => [name, defaultPreference(index + 1)])
  );

// New sets land on fresh slides after the highest one already in use.
export const reconcilePreferences = (
  dataSets: ReadonlyMap<string, DataSet>,
  stored: PreferenceMap
): PreferenceMap => {
  const names = Array.from(dataSets.keys());
  const kept = names.filter((name) => Object.prototype.hasOwnProperty.call(stored, name));
  let nextSlide = kept.reduce((max, name) => Math.max(max, stored[name].slideNumber), 0) + 1;

  return Object.fromEntries(
    names.map((name) => {
      if (kept.includes(name)) {
        return [name, stored[name]];
      }
      const preference = defaultPreference(nextSlide);
      nextSlide += 1;
      return [name, preference];
    })
  );
};
