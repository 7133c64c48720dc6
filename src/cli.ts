#!/usr/bin/env node
import * as dotenv from "dotenv";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { type CommandContext, runCommand } from "./commands/context";
import { handleInit } from "./commands/init";
import { handleLoops } from "./commands/loops";
import { handleRun, validateRunOptions } from "./commands/run";
import { LoopCatalog, loadLoopCatalog } from "./lib/catalog";
import { resolveLogLevel, setupLogging } from "./lib/logger";

dotenv.config();

function commandContext(catalog: LoopCatalog): CommandContext {
  return {
    cwd: process.cwd(),
    env: process.env,
    catalog,
    print: (line) => console.log(line),
    printError: (line) => console.error(line),
    spinner: Boolean(process.stderr.isTTY)
  };
}

async function main(): Promise<number> {
  let exitCode = 0;
  const run = async (action: () => Promise<unknown>) => {
    exitCode = await runCommand(action);
  };

  // Loaded on first use, then shared by every command.
  let catalog: LoopCatalog | null = null;
  const context = async () => {
    catalog = catalog ?? (await loadLoopCatalog());
    return commandContext(catalog);
  };

  await yargs(hideBin(process.argv))
    .scriptName("qf")
    .option("verbose", { alias: "v", type: "boolean", default: false, describe: "Debug logging" })
    .option("log-level", {
      type: "string",
      choices: ["error", "warning", "info", "debug", "trace"],
      describe: "Log level for stderr output"
    })
    .middleware((argv) => {
      setupLogging(resolveLogLevel({ flag: argv.logLevel, verbose: argv.verbose, env: process.env }));
    })
    .command(
      "run <loop>",
      "Execute a loop",
      (yargs) => {
        return yargs
          .positional("loop", {
            type: "string",
            demandOption: true,
            describe: "Loop id or display name (see qf loops)"
          })
          .option("seed", { type: "string", describe: "Story premise for story-spark" })
          .option("seed-policy", {
            type: "string",
            choices: ["require", "warn"],
            describe: "What story-spark does without a seed (default: project config, then require)"
          })
          .option("revisions", {
            type: "number",
            default: 0,
            describe: "Simulated quality-gate failures before the loop stabilizes"
          })
          .option("step-delay", { type: "number", default: 300, describe: "Simulated step time in ms" })
          .option("interactive", { alias: "i", type: "boolean", default: false, describe: "Interactive mode (coming soon)" })
          .option("json", { type: "boolean", default: false, describe: "Print the run summary as JSON" })
          .option("save", { type: "boolean", default: true, describe: "Save the run summary under .questfoundry/sessions" })
          .check((argv) => {
            validateRunOptions({ revisions: argv.revisions, stepDelay: argv["step-delay"] });
            return true;
          });
      },
      (argv) =>
        run(async () => {
          const ctx = await context();
          await handleRun(
            {
              loop: argv.loop,
              seed: argv.seed,
              seedPolicy: argv.seedPolicy,
              revisions: argv.revisions,
              interactive: argv.interactive,
              json: argv.json,
              save: argv.save,
              stepDelay: argv.json ? 0 : argv.stepDelay,
              verbose: argv.verbose,
              logLevel: argv.logLevel
            },
            { ...ctx, spinner: ctx.spinner && !argv.json }
          );
        })
    )
    .command(
      "loops",
      "List all available loops by category",
      (yargs) => yargs,
      () => run(async () => handleLoops(await context()))
    )
    .command(
      "init [path]",
      "Initialize a new project",
      (yargs) => {
        return yargs
          .positional("path", { type: "string", describe: "Project directory (defaults to cwd)" })
          .option("name", { type: "string", describe: "Project name (defaults to the directory name)" })
          .option("description", { type: "string", default: "", describe: "Project description" });
      },
      (argv) =>
        run(async () =>
          handleInit({ path: argv.path, name: argv.name, description: argv.description }, await context())
        )
    )
    .demandCommand(1, "You must provide a command")
    .help()
    .strict()
    .parseAsync();

  return exitCode;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
);
