import process from "node:process";
import { SPINNER_FRAMES } from "../config/constants.js";

export interface Spinner {
  start: (message?: string) => void;
  stop: () => void;
}

/**
 * Progress indicator for long model calls, drawn on stderr so command output
 * on stdout stays clean. Inert when stderr is not a terminal or in debug mode,
 * where the prompt and reply logs show progress instead.
 */
export function createSpinner(debugMode: boolean): Spinner {
  const stream = process.stderr;
  const interactive = stream.isTTY && !debugMode;
  let timer: ReturnType<typeof setInterval> | undefined;

  function stop(): void {
    if (timer) {
      clearInterval(timer);
      timer = undefined;
      stream.write("\r\u001B[K");
    }
  }

  function start(message = "Working"): void {
    if (!interactive) return;
    stop();
    const startedAt = Date.now();
    let frameIndex = 0;
    timer = setInterval(() => {
      const frame = SPINNER_FRAMES[frameIndex++ % SPINNER_FRAMES.length];
      const seconds = Math.floor((Date.now() - startedAt) / 1000);
      stream.write(`\r\u001B[K${frame} ${message}... ${seconds}s`);
    }, 80);
  }

  return { start, stop };
}

export function createNoopSpinner(): Spinner {
  return { start: () => {}, stop: () => {} };
}
