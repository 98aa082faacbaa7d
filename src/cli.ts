import * as fs from "node:fs";
import { Command } from "commander";
import type winston from "winston";
import { supportsAnsi } from "./ansi.js";
import { loadConfig } from "./config.js";
import { FormCancelledError, FormDefinitionError } from "./errors.js";
import { buildForm, readFormDefinition } from "./formDefinition.js";
import { FormRegistry } from "./formRegistry.js";
import { serializeFormResult } from "./formResult.js";
import type { FormDefinition, FormResult } from "./formTypes.js";
import { getLogger } from "./logger.js";
import type { OutputSink } from "./questions/question.js";
import { RawTerminalInput, type TerminalInputStream } from "./rawInput.js";

export const VERSION = "0.1.0";

/** Exit code used when the user cancels a form, as for SIGINT. */
export const EXIT_CANCELLED = 130;

export type CliEnvironment = {
  stdin: TerminalInputStream;
  stdout: OutputSink;
  stderr: OutputSink;
  env: Record<string, string | undefined>;
  platform: NodeJS.Platform;
  setExitCode: (code: number) => void;
  logger?: winston.Logger;
};

function processEnvironment(): CliEnvironment {
  return {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env,
    platform: process.platform,
    setExitCode: (code) => {
      process.exitCode = code;
    },
  };
}

function resolveDefinition(form: string, dir: string, registry: FormRegistry): FormDefinition {
  if (form.endsWith(".json") || fs.existsSync(form)) {
    return readFormDefinition(form);
  }
  registry.loadFormsFromDir(dir);
  const definition = registry.getForm(form);
  if (!definition) throw new FormDefinitionError(`Form not found: ${form}`);
  return definition;
}

export function createProgram(io: CliEnvironment = processEnvironment()): Command {
  const config = loadConfig(io.env, io.platform);
  const logger = io.logger ?? getLogger();
  const program = new Command();

  program
    .name("termform")
    .description("Fill out question wizards in the terminal")
    .version(VERSION)
    .configureOutput({
      writeOut: (text) => io.stdout.write(text),
      writeErr: (text) => io.stderr.write(text),
    });

  program
    .command("list")
    .description("List the form definitions in a directory")
    .option("-d, --dir <dir>", "directory with *.json form definitions", config.formsDir)
    .action((options: { dir: string }) => {
      const registry = new FormRegistry(logger);
      registry.loadFormsFromDir(options.dir);
      const forms = registry.listForms();
      if (forms.length === 0) {
        io.stdout.write(`No forms found in ${options.dir}\n`);
        return;
      }
      for (const form of forms) {
        io.stdout.write(`${form.id}\t${form.title}\t(${form.questions.length} questions)\n`);
      }
    });

  program
    .command("run")
    .description("Run a form and print the answers as JSON")
    .argument("<form>", "form id from the forms directory, or path to a definition file")
    .option("-d, --dir <dir>", "directory with *.json form definitions", config.formsDir)
    .option("-o, --output <file>", "write the answers to a file instead of stdout")
    .action(async (form: string, options: { dir: string; output?: string }) => {
      const definition = resolveDefinition(form, options.dir, new FormRegistry(logger));
      const terminalForm = buildForm(definition, {
        input: new RawTerminalInput(io.stdin, logger),
        output: io.stdout,
        ansi: supportsAnsi(config.platform, config.term),
        logger,
      });

      let result: FormResult;
      try {
        result = await terminalForm.run();
      } catch (err) {
        if (err instanceof FormCancelledError) {
          io.stderr.write(`\n${err.message}\n`);
          io.setExitCode(EXIT_CANCELLED);
          return;
        }
        throw err;
      }

      const json = `${JSON.stringify(serializeFormResult(result), null, 2)}\n`;
      if (options.output) {
        fs.writeFileSync(options.output, json);
        logger.info(`Wrote answers of ${definition.id} to ${options.output}`);
      } else {
        io.stdout.write(`\n${json}`);
      }
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv);
}
