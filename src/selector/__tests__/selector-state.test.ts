import { describe, expect, test } from "vitest";

import {
  clickTarget,
  handleListKey,
  initialSelectorState,
  listWindow,
  parseMouseReport,
  withStatus,
  wrapText,
  type SelectorState,
} from "../selector-state.js";
import { NO_KEY, withKey } from "../../__tests__/helpers/ink-keys.js";

const at = (selected: number, count = 21): SelectorState => initialSelectorState(count, selected);

describe("handleListKey", () => {
  test("moves with vim keys and arrows, clamped to the list", () => {
    expect(handleListKey(at(3), "j", NO_KEY).state.selected).toBe(4);
    expect(handleListKey(at(3), "h", NO_KEY).state.selected).toBe(2);
    expect(handleListKey(at(3), "", withKey({ rightArrow: true })).state.selected).toBe(4);
    expect(handleListKey(at(0), "k", NO_KEY).state.selected).toBe(0);
    expect(handleListKey(at(20), "", withKey({ downArrow: true })).state.selected).toBe(20);
  });

  test("pages by ten", () => {
    expect(handleListKey(at(3), "d", withKey({ ctrl: true })).state.selected).toBe(13);
    expect(handleListKey(at(3), "\x04", NO_KEY).state.selected).toBe(13);
    expect(handleListKey(at(15), "\x15", NO_KEY).state.selected).toBe(5);
    expect(handleListKey(at(15), "", withKey({ pageDown: true })).state.selected).toBe(20);
    expect(handleListKey(at(4), "", withKey({ pageUp: true })).state.selected).toBe(0);
  });

  test("gg jumps to the top and G to the bottom", () => {
    const first = handleListKey(at(7), "g", NO_KEY);
    expect(first.state).toMatchObject({ selected: 7, pendingG: true });
    expect(handleListKey(first.state, "g", NO_KEY).state).toMatchObject({
      selected: 0,
      pendingG: false,
    });
    expect(handleListKey(first.state, "j", NO_KEY).state).toMatchObject({
      selected: 8,
      pendingG: false,
    });
    expect(handleListKey(at(7), "G", NO_KEY).state.selected).toBe(20);
  });

  test.each([
    ["", withKey({ return: true }), "commit"],
    ["", withKey({ escape: true }), "quit"],
    ["q", NO_KEY, "quit"],
    ["C", NO_KEY, "configure"],
    ["p", NO_KEY, "preview"],
    ["R", NO_KEY, "restore"],
    ["x", NO_KEY, null],
  ])("%j maps to %s", (input, key, command) => {
    expect(handleListKey(at(2), input, key).command).toBe(command);
  });

  test("any key clears the status line", () => {
    const state = withStatus(at(2), "Selected: warp");
    expect(handleListKey(state, "x", NO_KEY).state.status).toBeNull();
  });

  test("a click selects the row under the pointer", () => {
    expect(handleListKey(at(0), "\x1b[<0;5;6M", NO_KEY, 80)).toEqual({
      state: { ...at(0), selected: 3 },
      command: null,
    });
  });

  test("pointer motion and releases leave the state alone", () => {
    const state = withStatus(at(2), "Selected: warp");
    expect(handleListKey(state, "\x1b[<35;10;5M", NO_KEY, 80).state).toBe(state);
    expect(handleListKey(state, "\x1b[<0;10;5m", NO_KEY, 80).state).toBe(state);
  });
});

describe("listWindow", () => {
  test("pages by twenty and keeps the last page full", () => {
    expect(listWindow(0, 21)).toEqual({ start: 0, end: 20 });
    expect(listWindow(19, 21)).toEqual({ start: 0, end: 20 });
    expect(listWindow(20, 21)).toEqual({ start: 1, end: 21 });
    expect(listWindow(5, 8)).toEqual({ start: 0, end: 8 });
  });
});

describe("mouse", () => {
  test("parseMouseReport reads SGR reports", () => {
    expect(parseMouseReport("\x1b[<0;5;4M")).toEqual({ code: 0, column: 5, row: 4, pressed: true });
    expect(parseMouseReport("[<2;1;1m")).toEqual({ code: 2, column: 1, row: 1, pressed: false });
    expect(parseMouseReport("j")).toBeNull();
  });

  test("clickTarget only accepts left presses on list rows", () => {
    const click = (code: number, column: number, row: number, pressed = true) =>
      clickTarget({ code, column, row, pressed }, 80, at(0));
    expect(click(0, 5, 4)).toBe(1);
    expect(click(0, 5, 3)).toBe(0);
    expect(click(0, 5, 2)).toBeNull();
    expect(click(0, 49, 4)).toBeNull();
    expect(click(0, 48, 4)).toBe(1);
    expect(click(0, 5, 4, false)).toBeNull();
    expect(click(2, 5, 4)).toBeNull();
    expect(click(32, 5, 4)).toBeNull();
    expect(click(0, 5, 23)).toBeNull();
  });

  test("clicks land on the visible page", () => {
    expect(clickTarget({ code: 0, column: 1, row: 3, pressed: true }, 80, at(20))).toBe(1);
  });
});

test("initialSelectorState clamps the selection", () => {
  expect(initialSelectorState(21, 30).selected).toBe(20);
  expect(initialSelectorState(0).selected).toBe(0);
});

describe("wrapText", () => {
  test("breaks between words", () => {
    expect(wrapText("the quick brown fox", 10)).toEqual(["the quick", "brown fox"]);
  });

  test("keeps explicit newlines and long words", () => {
    expect(wrapText("a\n\nb", 10)).toEqual(["a", "", "b"]);
    expect(wrapText("abcdefghijkl xy", 5)).toEqual(["abcdefghijkl", "xy"]);
    expect(wrapText("anything", 0)).toEqual([]);
  });
});
