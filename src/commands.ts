import fs from "node:fs/promises";
import process from "node:process";
import type { Command } from "./types.js";
import type { Loggers } from "./ui/logger.js";
import type { CompletionService } from "./core/services.js";
import { describeError } from "./ui/logger.js";
import { printJson, printLines } from "./ui/output.js";
import { FormatError } from "./core/errors.js";
import { buildFinalDocument, finalizeManuscript } from "./core/orchestrator.js";
import { readManuscriptText } from "./document/docx-reader.js";
import { writeDocument } from "./document/docx-writer.js";
import { runAnalystPass } from "./stages/analyst.js";
import { detectLanguages } from "./stages/languages.js";
import { runInteractiveEdit } from "./stages/interactive-edit.js";
import { buildConsistencyReport } from "./consistency/names.js";

export interface CommandDeps {
  completion: CompletionService;
  loggers: Loggers;
}

async function readInput(filePath: string): Promise<string> {
  let bytes: Buffer;
  try {
    bytes = await fs.readFile(filePath);
  } catch (error) {
    throw new FormatError(`Cannot read ${filePath}: ${describeError(error)}`, { cause: error });
  }
  return readManuscriptText(bytes);
}

export async function runCommand(command: Command, deps: CommandDeps): Promise<void> {
  const { completion, loggers } = deps;
  const stageDeps = {
    completion,
    stageLog: loggers.stageLog,
    stageWarn: loggers.stageWarn,
  };

  switch (command.kind) {
    case "process": {
      const rawText = await readInput(command.input);
      if (!rawText.trim()) {
        loggers.stageWarn(`[process] ${command.input} contains no text`);
      }

      const result = await finalizeManuscript(
        {
          rawText,
          brief: command.brief,
          shloka: command.style.shloka,
          withGlossary: command.glossary,
        },
        stageDeps
      );
      const model = buildFinalDocument(result, command.style, {
        consistencyReport: command.consistency,
      });
      const bytes = await writeDocument(model, command.style);
      await fs.writeFile(command.output, bytes);

      loggers.userLog(
        `Wrote ${command.output} (${model.blocks.length} blocks, ${result.glossary.length} glossary entries)`
      );
      return;
    }

    case "analyze": {
      const text = await readInput(command.input);
      const glossary = await runAnalystPass(text, stageDeps);
      printJson({ glossary, consistency: buildConsistencyReport(text) });
      return;
    }

    case "edit": {
      const edited = await runInteractiveEdit(command.snippet, command.instruction, stageDeps);
      process.stdout.write(`${edited}\n`);
      return;
    }

    case "languages": {
      const text = await readInput(command.input);
      printLines("Languages", await detectLanguages(text, stageDeps));
      return;
    }
  }
}
