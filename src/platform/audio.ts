import { rmSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";

import { createLogger } from "../logger.js";
import { detectContentType } from "./assets.js";
import { AssetDecodeError, describeError } from "./errors.js";
import type { SubprocessRunner } from "./subprocess.js";

const log = createLogger("audio");

export interface AudioChunk {
  readonly id: string;
  readonly durationMs: number;
  readonly bytes: Uint8Array;
}

export interface AudioDevice {
  readonly muted: boolean;
  decode(id: string, bytes: Uint8Array): AudioChunk;
  play(chunk: AudioChunk): void;
  close(): void;
}

const readAscii = (view: DataView, offset: number, length: number): string => {
  let text = "";
  for (let i = 0; i < length; i += 1) {
    text += String.fromCharCode(view.getUint8(offset + i));
  }
  return text;
};

/** Reads the PCM duration from a RIFF/WAVE header. */
export const wavDurationMs = (id: string, bytes: Uint8Array): number => {
  if (detectContentType(bytes) !== "wav") {
    throw new AssetDecodeError(id, "not a RIFF/WAVE file");
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  let byteRate = 0;
  let offset = 12;
  while (offset + 8 <= bytes.byteLength) {
    const chunkId = readAscii(view, offset, 4);
    const size = view.getUint32(offset + 4, true);
    if (chunkId === "fmt ") {
      byteRate = view.getUint32(offset + 16, true);
    } else if (chunkId === "data") {
      if (byteRate === 0) {
        throw new AssetDecodeError(id, "data chunk before fmt chunk");
      }
      return (size / byteRate) * 1000;
    }
    offset += 8 + size + (size % 2);
  }
  throw new AssetDecodeError(id, "missing data chunk");
};

/** Encodes mono samples in [-1, 1] as 16-bit PCM WAV bytes. */
export const encodeWav = (samples: Float32Array, sampleRate: number): Uint8Array => {
  const dataSize = samples.length * 2;
  const bytes = new Uint8Array(44 + dataSize);
  const view = new DataView(bytes.buffer);
  const writeAscii = (offset: number, text: string) => {
    for (let i = 0; i < text.length; i += 1) {
      view.setUint8(offset + i, text.charCodeAt(i));
    }
  };
  writeAscii(0, "RIFF");
  view.setUint32(4, 36 + dataSize, true);
  writeAscii(8, "WAVE");
  writeAscii(12, "fmt ");
  view.setUint32(16, 16, true);
  view.setUint16(20, 1, true);
  view.setUint16(22, 1, true);
  view.setUint32(24, sampleRate, true);
  view.setUint32(28, sampleRate * 2, true);
  view.setUint16(32, 2, true);
  view.setUint16(34, 16, true);
  writeAscii(36, "data");
  view.setUint32(40, dataSize, true);
  samples.forEach((sample, i) => {
    const clamped = Math.max(-1, Math.min(1, sample));
    view.setInt16(44 + i * 2, Math.round(clamped * 32767), true);
  });
  return bytes;
};

export class MutedAudioDevice implements AudioDevice {
  readonly muted = true;

  decode(id: string, bytes: Uint8Array): AudioChunk {
    return { id, durationMs: wavDurationMs(id, bytes), bytes };
  }

  play(): void {}

  close(): void {}
}

/**
 * Plays chunks through `aplay`. Each decoded chunk is spooled to a temporary
 * file once; the device mutes itself after the first failed playback.
 */
export class AplayAudioDevice implements AudioDevice {
  private silenced = false;
  private readonly files = new Map<string, string>();

  constructor(private readonly runner: SubprocessRunner) {}

  get muted(): boolean {
    return this.silenced;
  }

  decode(id: string, bytes: Uint8Array): AudioChunk {
    const chunk: AudioChunk = { id, durationMs: wavDurationMs(id, bytes), bytes };
    const file = path.join(os.tmpdir(), `screensaver-${process.pid}-${id}.wav`);
    try {
      writeFileSync(file, bytes);
      this.files.set(id, file);
    } catch (error) {
      log.warn(`cannot spool ${id}, muting: ${describeError(error)}`);
      this.silenced = true;
    }
    return chunk;
  }

  play(chunk: AudioChunk): void {
    const file = this.files.get(chunk.id);
    if (this.silenced || !file) {
      return;
    }
    try {
      const child = this.runner.run(["aplay", "-q", file]);
      void child.exited.then((exit) => {
        if (exit.error) {
          log.warn(`playback failed, muting: ${exit.error.message}`);
          this.silenced = true;
        }
      });
    } catch (error) {
      log.warn(`playback failed, muting: ${describeError(error)}`);
      this.silenced = true;
    }
  }

  close(): void {
    for (const file of this.files.values()) {
      rmSync(file, { force: true });
    }
    this.files.clear();
  }
}
