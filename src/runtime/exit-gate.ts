import type { InputEvent } from "../platform/types.js";

export type GracePhase = "in-grace" | "armed";

/**
 * Decides which input ends an effect. Keys, buttons and quit requests always
 * do; pointer motion only once `graceMs` has passed since `startMs`.
 */
export class ExitGate {
  constructor(
    private readonly startMs: number,
    private readonly graceMs: number,
  ) {}

  phase(nowMs: number): GracePhase {
    return nowMs - this.startMs >= this.graceMs ? "armed" : "in-grace";
  }

  shouldExit(event: InputEvent, nowMs: number): boolean {
    switch (event.type) {
      case "quit":
      case "key":
      case "pointer-button":
        return true;
      case "pointer-motion":
        return this.phase(nowMs) === "armed";
    }
  }
}
