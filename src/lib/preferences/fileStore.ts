import { createHash } from "crypto";
import { existsSync, mkdirSync, readdirSync, readFileSync, unlinkSync, writeFileSync } from "fs";
import { basename, join, resolve } from "path";
import { describeError } from "../errors";
import type { PreferenceMap } from "../../types/view";
import { storedConfigSchema, type StoredConfig } from "./schema";
import type { PreferenceSource, PreferenceStore } from "./store";

export type StoredConfigEntry = {
  identity: string;
  configFile: string;
  filePath: string;
  fileName: string;
  createdAt: string;
  preferences: PreferenceMap;
  fileExists: boolean;
};

export type FilePreferenceStore = PreferenceStore & {
  configDir: string;
  list: () => StoredConfigEntry[];
  cleanupMissing: () => number;
};

export type FilePreferenceStoreOptions = {
  now?: () => Date;
};

export const fileIdentity = (filePath: string, content: Buffer | string): string =>
  createHash("md5")
    .update(`${resolve(filePath)}:${basename(filePath)}:`)
    .update(content)
    .digest("hex");

const readStoredConfig = (configFile: string): StoredConfig | null => {
  try {
    const parsed = storedConfigSchema.safeParse(JSON.parse(readFileSync(configFile, "utf8")));
    if (!parsed.success) {
      console.warn("[preferences] ignoring malformed config", {
        configFile,
        issues: parsed.error.issues.length
      });
      return null;
    }
    return parsed.data;
  } catch (error) {
    console.warn("[preferences] ignoring unreadable config", {
      configFile,
      message: describeError(error)
    });
    return null;
  }
};

export const createFilePreferenceStore = (
  configDir: string,
  options: FilePreferenceStoreOptions = {}
): FilePreferenceStore => {
  const now = options.now ?? (() => new Date());
  const configPath = (identity: string) => join(configDir, `${identity}.json`);

  const list = (): StoredConfigEntry[] => {
    if (!existsSync(configDir)) {
      return [];
    }
    const entries = readdirSync(configDir)
      .filter((name) => name.endsWith(".json"))
      .flatMap((name) => {
        const configFile = join(configDir, name);
        const stored = readStoredConfig(configFile);
        if (!stored) {
          return [];
        }
        return [
          {
            identity: name.slice(0, -".json".length),
            configFile,
            filePath: stored.filePath,
            fileName: stored.fileName,
            createdAt: stored.createdAt,
            preferences: stored.config,
            fileExists: stored.filePath !== "" && existsSync(stored.filePath)
          }
        ];
      });
    return entries.sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  };

  return {
    configDir,
    get: (identity) => {
      const configFile = configPath(identity);
      if (!existsSync(configFile)) {
        return undefined;
      }
      return readStoredConfig(configFile)?.config;
    },
    set: (identity, preferences, source?: PreferenceSource) => {
      mkdirSync(configDir, { recursive: true });
      const filePath = source ? resolve(source.filePath) : "";
      const stored: StoredConfig = {
        filePath,
        fileName: filePath ? basename(filePath) : "",
        createdAt: now().toISOString(),
        config: preferences
      };
      writeFileSync(configPath(identity), JSON.stringify(stored, null, 2));
    },
    delete: (identity) => {
      const configFile = configPath(identity);
      if (!existsSync(configFile)) {
        return false;
      }
      unlinkSync(configFile);
      return true;
    },
    list,
    cleanupMissing: () => {
      const missing = list().filter((entry) => !entry.fileExists);
      missing.forEach((entry) => unlinkSync(entry.configFile));
      return missing.length;
    }
  };
};
