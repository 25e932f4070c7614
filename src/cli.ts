#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { describeDataSet } from "./lib/datasets/classify";
import { describeError, EmptyInputError, FormatError } from "./lib/errors";
import { openDocument } from "./lib/openDocument";
import { createFilePreferenceStore, type FilePreferenceStore } from "./lib/preferences/fileStore";
import { loadSettings } from "./lib/settings";
import { createCursor, VIEW_MODES, type ViewMode } from "./lib/viewer/cursor";
import { composeScreen, createSession } from "./lib/viewer/session";
import { runTerminalViewer, terminalSize } from "./lib/viewer/terminal";

type ViewOptions = {
  file: string;
  configDir?: string;
  reset: boolean;
  print: boolean;
  keepFields: boolean;
  slide: number;
  mode: ViewMode;
  width?: number;
  height?: number;
};

const isViewMode = (value: unknown): value is ViewMode =>
  VIEW_MODES.some((mode) => mode === value);

const openStore = (configDir: string | undefined): FilePreferenceStore =>
  createFilePreferenceStore(configDir ?? loadSettings().configDir);

const reportLoadFailure = (file: string, error: unknown): void => {
  if (error instanceof FormatError || error instanceof EmptyInputError) {
    console.error(`[datadeck] ${error.name}: ${error.message}`);
    return;
  }
  console.error("[datadeck] could not open file", { file, message: describeError(error) });
};

const viewFile = async (options: ViewOptions): Promise<number> => {
  const store = openStore(options.configDir);
  const document = (() => {
    try {
      return openDocument(options.file, store, {
        reset: options.reset,
        classify: { scalarKeys: options.keepFields ? "retain" : "drop" }
      });
    } catch (error) {
      reportLoadFailure(options.file, error);
      return null;
    }
  })();
  if (!document) {
    return 1;
  }

  const interactive = !options.print && process.stdout.isTTY && process.stdin.isTTY;
  const [detectedWidth, detectedHeight] = terminalSize();
  const session = createSession(
    document.dataSets,
    document.preferences,
    createCursor({
      currentSlide: options.slide,
      viewMode: options.mode,
      width: options.width ?? detectedWidth,
      height: options.height ?? detectedHeight
    })
  );

  if (!interactive) {
    process.stdout.write(`${composeScreen(session).join("\n")}\n`);
    return 0;
  }

  console.info("[datadeck] loaded", {
    file: options.file,
    dataSets: Array.from(document.dataSets.values()).map(describeDataSet),
    restoredPreferences: document.restored
  });
  await runTerminalViewer(session, {
    persist: (preferences) => store.set(document.identity, preferences, { filePath: document.filePath })
  });
  return 0;
};

const listConfigs = (configDir: string | undefined): number => {
  const store = openStore(configDir);
  const entries = store.list();
  if (entries.length === 0) {
    process.stdout.write(`No stored configurations in ${store.configDir}\n`);
    return 0;
  }
  entries.forEach((entry) => {
    const missing = entry.fileExists ? "" : " (missing)";
    process.stdout.write(`${entry.fileName || entry.identity}${missing}  ${entry.createdAt}\n`);
    process.stdout.write(`  ${entry.filePath}\n`);
    Object.entries(entry.preferences).forEach(([name, preference]) => {
      process.stdout.write(`  ${name}: ${preference.viewKind} (slide ${preference.slideNumber})\n`);
    });
  });
  return 0;
};

const cleanConfigs = (configDir: string | undefined): number => {
  const removed = openStore(configDir).cleanupMissing();
  process.stdout.write(`Removed ${removed} configuration(s) for missing files.\n`);
  return 0;
};

const main = async (): Promise<void> => {
  await yargs(hideBin(process.argv))
    .scriptName("datadeck")
    .option("config-dir", {
      type: "string",
      describe: "Directory holding saved view preferences (env: DATADECK_CONFIG_DIR)"
    })
    .command(
      "$0 <file>",
      "View a JSON, CSV or XLSX file",
      (y) =>
        y
          .positional("file", { type: "string", demandOption: true, describe: "File to view" })
          .option("reset", {
            type: "boolean",
            default: false,
            describe: "Forget saved preferences for this file"
          })
          .option("print", {
            type: "boolean",
            default: false,
            describe: "Print one screen and exit"
          })
          .option("keep-fields", {
            type: "boolean",
            default: false,
            describe: "Keep plain top-level fields next to record arrays"
          })
          .option("slide", { type: "number", default: 1, describe: "Slide to open" })
          .option("mode", {
            choices: VIEW_MODES,
            default: "mixed",
            describe: "Initial view mode"
          })
          .option("width", { type: "number", describe: "Override terminal width" })
          .option("height", { type: "number", describe: "Override terminal height" }),
      async (argv) => {
        process.exitCode = await viewFile({
          file: argv.file,
          configDir: argv.configDir,
          reset: argv.reset,
          print: argv.print,
          keepFields: argv.keepFields,
          slide: argv.slide,
          mode: isViewMode(argv.mode) ? argv.mode : "mixed",
          width: argv.width,
          height: argv.height
        });
      }
    )
    .command("configs", "Manage saved view preferences", (y) =>
      y
        .command(
          "list",
          "List saved preferences",
          (sub) => sub,
          (argv) => {
            process.exitCode = listConfigs(argv.configDir);
          }
        )
        .command(
          "clean",
          "Remove preferences whose source file no longer exists",
          (sub) => sub,
          (argv) => {
            process.exitCode = cleanConfigs(argv.configDir);
          }
        )
        .demandCommand(1)
    )
    .strict()
    .help()
    .parseAsync();
};

main().catch((error: unknown) => {
  console.error("[datadeck] fail", { message: describeError(error) });
  process.exitCode = 1;
});
