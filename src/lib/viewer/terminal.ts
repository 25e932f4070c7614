import { describeError } from "../errors";
import type { PreferenceMap } from "../../types/view";
import { DEFAULT_HEIGHT, DEFAULT_WIDTH } from "./cursor";
import {
  composeScreen,
  handleInput,
  resizeSession,
  withStatus,
  type ViewerSession
} from "./session";

const ansi = {
  enterAltScreen: "\x1b[?1049h",
  leaveAltScreen: "\x1b[?1049l",
  hideCursor: "\x1b[?25l",
  showCursor: "\x1b[?25h",
  clearScreen: "\x1b[2J\x1b[H"
};

export type TerminalViewerOptions = {
  persist: (preferences: PreferenceMap) => void;
  input?: NodeJS.ReadStream;
  output?: NodeJS.WriteStream;
};

export const terminalSize = (output: NodeJS.WriteStream = process.stdout): [number, number] => [
  output.columns ?? DEFAULT_WIDTH,
  output.rows ?? DEFAULT_HEIGHT
];

// The only place that touches the terminal; every state change goes through handleInput.
export const runTerminalViewer = (
  initial: ViewerSession,
  options: TerminalViewerOptions
): Promise<void> => {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  const state = { current: initial };

  const draw = () => {
    output.write(ansi.clearScreen + composeScreen(state.current).join("\n"));
  };

  return new Promise((resolve) => {
    const onResize = () => {
      const [width, height] = terminalSize(output);
      state.current = resizeSession(state.current, width, height);
      draw();
    };

    const cleanup = () => {
      input.off("data", onData);
      output.off("resize", onResize);
      input.setRawMode(false);
      input.pause();
      output.write(ansi.showCursor + ansi.leaveAltScreen);
      resolve();
    };

    const onData = (chunk: Buffer | string) => {
      const update = handleInput(
        state.current,
        typeof chunk === "string" ? chunk : chunk.toString("utf8")
      );
      if (update.quit) {
        cleanup();
        return;
      }
      state.current = update.session;
      if (update.preferencesChanged) {
        try {
          options.persist(state.current.preferences);
        } catch (error) {
          state.current = withStatus(
            state.current,
            `Could not save preferences: ${describeError(error)}`
          );
        }
      }
      draw();
    };

    input.setRawMode(true);
    input.setEncoding("utf8");
    input.resume();
    input.on("data", onData);
    output.on("resize", onResize);
    output.write(ansi.enterAltScreen + ansi.hideCursor);
    onResize();
  });
};
