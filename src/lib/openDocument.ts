import { classify, type ClassifyOptions } from "./datasets/classify";
import { readSourceFile } from "./import/parseFile";
import { defaultPreferences, reconcilePreferences } from "./preferences/defaults";
import { fileIdentity } from "./preferences/fileStore";
import type { PreferenceStore } from "./preferences/store";
import type { DataSet } from "../types/dataset";
import type { PreferenceMap } from "../types/view";

export type OpenDocumentOptions = {
  reset?: boolean;
  classify?: ClassifyOptions;
};

export type OpenedDocument = {
  filePath: string;
  identity: string;
  dataSets: Map<string, DataSet>;
  preferences: PreferenceMap;
  restored: boolean;
};

// Preferences are written back whenever they were created or had to be reconciled.
export const openDocument = (
  filePath: string,
  store: PreferenceStore,
  options: OpenDocumentOptions = {}
): OpenedDocument => {
  const { content, input } = readSourceFile(filePath);
  const dataSets = classify(input, options.classify);
  const identity = fileIdentity(filePath, content);

  if (options.reset) {
    store.delete(identity);
  }

  const stored = store.get(identity);
  const preferences = stored
    ? reconcilePreferences(dataSets, stored)
    : defaultPreferences(dataSets);

  if (!stored || JSON.stringify(stored) !== JSON.stringify(preferences)) {
    store.set(identity, preferences, { filePath });
  }

  return {
    filePath,
    identity,
    dataSets,
    preferences,
    restored: stored !== undefined
  };
};
