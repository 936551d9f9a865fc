import type { CompleteOptions, CompletionService } from "../src/core/services.js";
import type { PipelineDeps } from "../src/core/pipeline.js";
import type { Logger } from "../src/ui/logger.js";

export interface RecordedCall {
  method: "complete" | "completeJson";
  prompt: string;
  schema?: object;
  options?: CompleteOptions;
}

export interface FakeCompletion extends CompletionService {
  calls: RecordedCall[];
}

/** In-process stand-in for the model; each handler decides the reply. */
export function fakeCompletion(handlers: {
  complete?: (prompt: string) => Promise<string>;
  completeJson?: (prompt: string) => Promise<unknown>;
}): FakeCompletion {
  const calls: RecordedCall[] = [];
  return {
    calls,
    async complete(prompt, options) {
      calls.push({ method: "complete", prompt, ...(options ? { options } : {}) });
      if (!handlers.complete) throw new Error("unexpected complete call");
      return handlers.complete(prompt);
    },
    async completeJson(prompt, schema, options) {
      calls.push({ method: "completeJson", prompt, schema, ...(options ? { options } : {}) });
      if (!handlers.completeJson) throw new Error("unexpected completeJson call");
      return handlers.completeJson(prompt);
    },
  };
}

export interface RecordingLogger extends Logger {
  messages: string[];
}

export function recordingLogger(): RecordingLogger {
  const messages: string[] = [];
  const log = (message: string): void => {
    messages.push(message);
  };
  return Object.assign(log, { messages });
}

export function stageDeps(completion: CompletionService): PipelineDeps & {
  stageLog: RecordingLogger;
  stageWarn: RecordingLogger;
} {
  return { completion, stageLog: recordingLogger(), stageWarn: recordingLogger() };
}
