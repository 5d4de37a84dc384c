export const VISIBLE_ROWS = 20;
export const PAGE_STEP = 10;
/** Share of the terminal width given to the list pane. */
export const LIST_PANE_RATIO = 0.6;
/** Rows between the top of the list pane and its first item: border and title. */
export const LIST_HEADER_ROWS = 2;

/** The subset of ink's key flags the selector reads. */
export interface KeyInfo {
  readonly upArrow: boolean;
  readonly downArrow: boolean;
  readonly leftArrow: boolean;
  readonly rightArrow: boolean;
  readonly pageUp: boolean;
  readonly pageDown: boolean;
  readonly return: boolean;
  readonly escape: boolean;
  readonly ctrl: boolean;
  readonly backspace: boolean;
  readonly delete: boolean;
}

export type ListCommand = "commit" | "configure" | "preview" | "restore" | "quit";

export interface SelectorState {
  readonly selected: number;
  readonly count: number;
  /** First `g` of `gg` seen. */
  readonly pendingG: boolean;
  readonly status: string | null;
}

export interface KeyOutcome {
  readonly state: SelectorState;
  readonly command: ListCommand | null;
}

export const initialSelectorState = (count: number, selected = 0): SelectorState => ({
  selected: Math.max(0, Math.min(count - 1, selected)),
  count,
  pendingG: false,
  status: null,
});

const moveTo = (state: SelectorState, index: number): SelectorState => ({
  ...state,
  selected: Math.max(0, Math.min(state.count - 1, index)),
});

const MOUSE_REPORT = /\[<(\d+);(\d+);(\d+)([Mm])/;

export interface MouseReport {
  readonly code: number;
  /** 1-based terminal cell. */
  readonly column: number;
  readonly row: number;
  readonly pressed: boolean;
}

export const parseMouseReport = (input: string): MouseReport | null => {
  const match = MOUSE_REPORT.exec(input);
  if (!match) {
    return null;
  }
  return {
    code: Number(match[1]),
    column: Number(match[2]),
    row: Number(match[3]),
    pressed: match[4] === "M",
  };
};

export interface ListWindow {
  readonly start: number;
  readonly end: number;
}

/** Pages of `rows` entries; the last page is pulled back so it stays full. */
export const listWindow = (selected: number, count: number, rows = VISIBLE_ROWS): ListWindow => {
  const paged = Math.floor(selected / rows) * rows;
  const start = Math.max(0, Math.min(paged, count - rows));
  return { start, end: Math.min(count, start + rows) };
};

/** Maps a left click to a list index, or null outside the visible rows. */
export const clickTarget = (
  report: MouseReport,
  columns: number,
  state: SelectorState,
): number | null => {
  if (!report.pressed || (report.code & 3) !== 0 || (report.code & (32 | 64)) !== 0) {
    return null;
  }
  if (report.column - 1 >= Math.floor(columns * LIST_PANE_RATIO)) {
    return null;
  }
  const relative = report.row - 1 - LIST_HEADER_ROWS;
  if (relative < 0) {
    return null;
  }
  const { start, end } = listWindow(state.selected, state.count);
  const index = start + relative;
  return index < end ? index : null;
};

const isCtrl = (input: string, key: KeyInfo, letter: string, code: number): boolean =>
  (key.ctrl && input === letter) || input === String.fromCharCode(code);

/** Applies one list-view key press; any key clears the status line. */
export const handleListKey = (
  state: SelectorState,
  input: string,
  key: KeyInfo,
  columns = 80,
): KeyOutcome => {
  const base: SelectorState = { ...state, status: null, pendingG: false };
  const move = (delta: number): KeyOutcome => ({
    state: moveTo(base, base.selected + delta),
    command: null,
  });
  const run = (command: ListCommand): KeyOutcome => ({ state: base, command });

  const mouse = parseMouseReport(input);
  if (mouse) {
    // Only a click on a list row changes anything, the status line included.
    const target = clickTarget(mouse, columns, base);
    return { state: target === null ? state : moveTo(base, target), command: null };
  }
  if (isCtrl(input, key, "u", 21)) {
    return move(-PAGE_STEP);
  }
  if (isCtrl(input, key, "d", 4)) {
    return move(PAGE_STEP);
  }
  if (key.upArrow || key.leftArrow || input === "k" || input === "h") {
    return move(-1);
  }
  if (key.downArrow || key.rightArrow || input === "j" || input === "l") {
    return move(1);
  }
  if (key.pageUp) {
    return move(-PAGE_STEP);
  }
  if (key.pageDown) {
    return move(PAGE_STEP);
  }
  if (key.return) {
    return run("commit");
  }
  if (key.escape) {
    return run("quit");
  }
  switch (input) {
    case "g":
      return state.pendingG
        ? { state: moveTo(base, 0), command: null }
        : { state: { ...base, pendingG: true }, command: null };
    case "G":
      return { state: moveTo(base, base.count - 1), command: null };
    case "q":
    case "Q":
      return run("quit");
    case "c":
    case "C":
      return run("configure");
    case "p":
    case "P":
      return run("preview");
    case "r":
    case "R":
      return run("restore");
    default:
      return { state: base, command: null };
  }
};

export const withStatus = (state: SelectorState, status: string | null): SelectorState => ({
  ...state,
  status,
});

/**
 * Greedy word wrap. Newlines in `text` always break; words longer than the
 * width get a line of their own.
 */
export const wrapText = (text: string, width: number): string[] => {
  if (width < 1) {
    return [];
  }
  const lines: string[] = [];
  for (const paragraph of text.split("\n")) {
    let line = "";
    for (const word of paragraph.split(" ").filter((part) => part.length > 0)) {
      if (line.length === 0) {
        line = word;
      } else if (line.length + 1 + word.length <= width) {
        line = `${line} ${word}`;
      } else {
        lines.push(line);
        line = word;
      }
    }
    lines.push(line);
  }
  return lines;
};
