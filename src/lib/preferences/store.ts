import type { PreferenceMap } from "../../types/view";

export type PreferenceSource = {
  filePath: string;
};

export type PreferenceStore = {
  get: (identity: string) => PreferenceMap | undefined;
  set: (identity: string, preferences: PreferenceMap, source?: PreferenceSource) => void;
  delete: (identity: string) => boolean;
};

const clonePreferences = (preferences: PreferenceMap): PreferenceMap =>
  Object.fromEntries(
    Object.entries(preferences).map(([name, preference]) => [
      name,
      { ...preference, selectedColumns: [...preference.selectedColumns] }
    ])
  );

export const createMemoryPreferenceStore = (
  initial: Record<string, PreferenceMap> = {}
): PreferenceStore => {
  const entries = new Map<string, PreferenceMap>(
    Object.entries(initial).map(([identity, preferences]) => [identity, clonePreferences(preferences)])
  );

  return {
    get: (identity) => {
      const preferences = entries.get(identity);
      return preferences ? clonePreferences(preferences) : undefined;
    },
    set: (identity, preferences) => {
      entries.set(identity, clonePreferences(preferences));
    },
    delete: (identity) => entries.delete(identity)
  };
};
