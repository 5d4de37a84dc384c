import { existsSync } from "node:fs";
import os from "node:os";
import path from "node:path";

import { describe, expect, test } from "vitest";

import { AplayAudioDevice, encodeWav, MutedAudioDevice, wavDurationMs } from "../audio.js";
import { SubprocessError } from "../errors.js";
import { FakeSubprocessRunner } from "../../__tests__/helpers/headless-platform.js";

const ascii = (value: string) => Array.from(value, (ch) => ch.charCodeAt(0));

describe("encodeWav", () => {
  test("writes a 16-bit mono header and clamped samples", () => {
    const wav = encodeWav(new Float32Array([1, -2, 0.5]), 8000);
    const view = new DataView(wav.buffer);
    expect(wav.byteLength).toBe(50);
    expect(view.getUint32(24, true)).toBe(8000);
    expect(view.getUint32(28, true)).toBe(16000);
    expect(view.getUint32(40, true)).toBe(6);
    expect([view.getInt16(44, true), view.getInt16(46, true), view.getInt16(48, true)]).toEqual([
      32767, -32767, 16384,
    ]);
  });

  test("a second of samples lasts a second", () => {
    expect(wavDurationMs("tone", encodeWav(new Float32Array(22050), 22050))).toBe(1000);
  });
});

describe("wavDurationMs", () => {
  test("rejects other formats", () => {
    expect(() => wavDurationMs("song", new TextEncoder().encode("ID3"))).toThrow(
      "song: not a RIFF/WAVE file",
    );
  });

  test("needs a fmt chunk before the data", () => {
    const header = [...ascii("RIFF"), 12, 0, 0, 0, ...ascii("WAVE")];
    expect(() => wavDurationMs("cut", new Uint8Array(header))).toThrow("cut: missing data chunk");
    const dataFirst = new Uint8Array([...header, ...ascii("data"), 0, 0, 0, 0]);
    expect(() => wavDurationMs("cut", dataFirst)).toThrow("cut: data chunk before fmt chunk");
  });
});

test("the muted device still measures chunks", () => {
  const device = new MutedAudioDevice();
  const chunk = device.decode("tone", encodeWav(new Float32Array(4410), 22050));
  expect(device.muted).toBe(true);
  expect(chunk.durationMs).toBe(200);
});

describe("AplayAudioDevice", () => {
  test("plays spooled chunks and cleans up on close", () => {
    const runner = new FakeSubprocessRunner();
    const device = new AplayAudioDevice(runner);
    const chunk = device.decode("beep-play", encodeWav(new Float32Array(10), 8000));
    const file = path.join(os.tmpdir(), `screensaver-${process.pid}-beep-play.wav`);
    try {
      device.play(chunk);
      expect(runner.last().handle.command).toEqual(["aplay", "-q", file]);
      expect(existsSync(file)).toBe(true);
    } finally {
      device.close();
    }
    expect(existsSync(file)).toBe(false);
  });

  test("mutes itself after a failed playback", async () => {
    const runner = new FakeSubprocessRunner();
    runner.onRun = (command) => ({
      code: 1,
      signal: null,
      error: new SubprocessError(command, "exited with status 1", 1),
    });
    const device = new AplayAudioDevice(runner);
    const chunk = device.decode("beep-fail", encodeWav(new Float32Array(10), 8000));
    try {
      device.play(chunk);
      await runner.last().handle.exited;
      expect(device.muted).toBe(true);
      device.play(chunk);
      expect(runner.children).toHaveLength(1);
    } finally {
      device.close();
    }
  });
});
