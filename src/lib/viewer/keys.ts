import type { ViewerCommand } from "./cursor";

const KEY_COMMANDS: Record<string, ViewerCommand> = {
  "\x1b[A": "up",
  "\x1b[B": "down",
  "\x1b[C": "nextSlide",
  "\x1b[D": "previousSlide",
  "\x1b[5~": "pageUp",
  "\x1b[6~": "pageDown",
  "\x1b[H": "home",
  "\x1b[1~": "home",
  "\x1b[F": "end",
  "\x1b[4~": "end",
  k: "up",
  j: "down",
  h: "previousSlide",
  l: "nextSlide",
  " ": "pageDown",
  t: "modeTable",
  b: "modeBars",
  v: "modeTree",
  m: "modeMixed",
  r: "configure",
  c: "cycleViews",
  "?": "help",
  q: "quit",
  "\x03": "quit"
};

export const parseKey = (chunk: string): ViewerCommand | undefined => {
  const key = chunk.length === 1 ? chunk.toLowerCase() : chunk;
  return Object.prototype.hasOwnProperty.call(KEY_COMMANDS, key) ? KEY_COMMANDS[key] : undefined;
};

export const HELP_LINES = [
  "=== datadeck help ===",
  "",
  "Navigation:",
  "  Up / k        Scroll up",
  "  Down / j      Scroll down",
  "  Left / h      Previous slide",
  "  Right / l     Next slide",
  "  PageUp        Scroll up one page",
  "  PageDown      Scroll down one page",
  "  Home / End    Jump to first / last rows",
  "",
  "View modes:",
  "  m             Mixed (each set in its own view)",
  "  t             Table",
  "  b             Bar chart",
  "  v             Column tree",
  "",
  "Configuration:",
  "  r             Configure view, slide and columns of every set",
  "  c             Cycle the view of every set on this slide",
  "",
  "Other:",
  "  ?             Show this help",
  "  q             Quit",
  "",
  "Press any key to return."
];

export const CONTROLS_LINE =
  "[↑/↓] Scroll | [←/→] Slides | [t] Table | [b] Bars | [v] Tree | [m] Mixed | [r] Configure | [c] Cycle | [?] Help | [q] Quit";
