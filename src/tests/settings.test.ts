import { homedir } from "os";
import { join } from "path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { loadSettings } from "../lib/settings";

describe("settings", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("reads the config directory from the environment", () => {
    expect(loadSettings({ DATADECK_CONFIG_DIR: " /tmp/datadeck " })).toEqual({
      configDir: "/tmp/datadeck"
    });
  });

  it("defaults to a directory in the home folder", () => {
    expect(loadSettings({})).toEqual({ configDir: join(homedir(), ".datadeck", "configs") });
  });

  it("ignores a blank override", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    expect(loadSettings({ DATADECK_CONFIG_DIR: "  " })).toEqual({
      configDir: join(homedir(), ".datadeck", "configs")
    });
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
