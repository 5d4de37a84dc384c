import {
  adjustValue,
  composeOptionString,
  parseOptionString,
  type OptionSpec,
  type OptionValue,
} from "./options.js";
import type { KeyInfo } from "./selector-state.js";

export interface EditorState {
  readonly key: string;
  readonly specs: readonly OptionSpec[];
  readonly values: readonly OptionValue[];
  readonly cursor: number;
  /** Text buffer while a string option is being typed. */
  readonly draft: string | null;
}

export type EditorAction =
  | { readonly type: "move"; readonly delta: number }
  | { readonly type: "adjust"; readonly direction: 1 | -1 }
  | { readonly type: "begin-text" }
  | { readonly type: "type-text"; readonly text: string }
  | { readonly type: "erase-text" }
  | { readonly type: "commit-text" }
  | { readonly type: "cancel-text" };

export const openEditor = (
  key: string,
  specs: readonly OptionSpec[],
  saved: string,
): EditorState => ({
  key,
  specs,
  values: parseOptionString(specs, saved),
  cursor: 0,
  draft: null,
});

const replaceAt = (
  values: readonly OptionValue[],
  index: number,
  value: OptionValue,
): OptionValue[] => values.map((current, i) => (i === index ? value : current));

export const editorReducer = (state: EditorState, action: EditorAction): EditorState => {
  const spec = state.specs[state.cursor];
  switch (action.type) {
    case "move": {
      if (state.draft !== null || state.specs.length === 0) {
        return state;
      }
      const cursor = Math.max(0, Math.min(state.specs.length - 1, state.cursor + action.delta));
      return cursor === state.cursor ? state : { ...state, cursor };
    }
    case "adjust": {
      if (state.draft !== null || !spec) {
        return state;
      }
      const next = adjustValue(spec, state.values[state.cursor], action.direction);
      return { ...state, values: replaceAt(state.values, state.cursor, next) };
    }
    case "begin-text":
      if (state.draft !== null || spec?.kind !== "string") {
        return state;
      }
      return { ...state, draft: String(state.values[state.cursor]) };
    case "type-text":
      return state.draft === null ? state : { ...state, draft: state.draft + action.text };
    case "erase-text":
      return state.draft === null ? state : { ...state, draft: state.draft.slice(0, -1) };
    case "commit-text":
      if (state.draft === null) {
        return state;
      }
      return {
        ...state,
        values: replaceAt(state.values, state.cursor, state.draft),
        draft: null,
      };
    case "cancel-text":
      return state.draft === null ? state : { ...state, draft: null };
  }
};

export const editorOptionString = (state: EditorState): string =>
  composeOptionString(state.specs, state.values);

export type EditorCommand = "save" | "cancel";

export interface EditorOutcome {
  readonly state: EditorState;
  readonly command: EditorCommand | null;
}

/** Key handling for the option editor; while a draft is open keys go to the text. */
export const handleEditorKey = (state: EditorState, input: string, key: KeyInfo): EditorOutcome => {
  const apply = (action: EditorAction): EditorOutcome => ({
    state: editorReducer(state, action),
    command: null,
  });
  if (state.draft !== null) {
    if (key.return) {
      return apply({ type: "commit-text" });
    }
    if (key.escape) {
      return apply({ type: "cancel-text" });
    }
    if (key.backspace || key.delete) {
      return apply({ type: "erase-text" });
    }
    if (key.ctrl || input.length === 0) {
      return { state, command: null };
    }
    return apply({ type: "type-text", text: input });
  }
  if (key.upArrow || input === "k") {
    return apply({ type: "move", delta: -1 });
  }
  if (key.downArrow || input === "j") {
    return apply({ type: "move", delta: 1 });
  }
  if (key.rightArrow || input === "+" || input === "=") {
    return apply({ type: "adjust", direction: 1 });
  }
  if (key.leftArrow || input === "-" || input === "_") {
    return apply({ type: "adjust", direction: -1 });
  }
  if (key.return) {
    return apply({ type: "begin-text" });
  }
  if (key.escape) {
    return { state, command: "cancel" };
  }
  if (input === "s" || input === "S") {
    return { state, command: "save" };
  }
  return { state, command: null };
};
