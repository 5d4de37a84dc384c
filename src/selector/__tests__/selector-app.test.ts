import { expect, test } from "vitest";

import { MOUSE_OFF, MOUSE_ON } from "../selector-app.js";

test("mouse reporting covers every event in SGR form and is switched off again", () => {
  expect(MOUSE_ON).toBe("\x1b[?1003h\x1b[?1006h");
  expect(MOUSE_OFF).toBe("\x1b[?1003l\x1b[?1006l");
});
