import { homedir } from "os";
import { join } from "path";
import { z } from "zod";

const envSchema = z.object({
  DATADECK_CONFIG_DIR: z
    .string()
    .trim()
    .min(1)
    .optional()
});

export type Settings = {
  configDir: string;
};

export const defaultConfigDir = (): string => join(homedir(), ".datadeck", "configs");

export const loadSettings = (env: NodeJS.ProcessEnv = process.env): Settings => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    console.warn("[datadeck] ignoring invalid environment settings", {
      issues: parsed.error.issues.map((issue) => issue.path.join("."))
    });
    return { configDir: defaultConfigDir() };
  }
  return { configDir: parsed.data.DATADECK_CONFIG_DIR ?? defaultConfigDir() };
};
