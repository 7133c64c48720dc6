import chalk from "chalk";
import ora from "ora";
import type { LoopSummary } from "../schemas";
import { InvalidOptionError } from "../lib/errors";
import { checkPreconditions, executeLoop } from "../lib/dispatch";
import { type ExecutionObserver, type LoopExecutor, SimulatedExecutor } from "../lib/executor";
import { resolveLogLevel, setupLogging } from "../lib/logger";
import {
  renderEfficiency,
  renderIterationHistory,
  renderIterationTree,
  renderLoopHeader,
  renderLoopSummary,
  renderQualityGateFailure,
  renderShowrunnerDecision,
  renderStabilization,
  renderStepLine
} from "../lib/render";
import { saveRunSummary } from "../lib/workspace";
import { type ActiveSpinner, type CommandContext, printLines } from "./context";

export interface RunArgs {
  loop: string;
  seed?: string;
  seedPolicy?: string;
  revisions: number;
  interactive: boolean;
  json: boolean;
  save: boolean;
  stepDelay: number;
  verbose?: boolean;
  logLevel?: string;
}

/** Rejects option values yargs lets through, such as NaN from `--revisions abc`. */
export function validateRunOptions(options: Pick<RunArgs, "revisions" | "stepDelay">): void {
  if (!Number.isInteger(options.revisions) || options.revisions < 0) {
    throw new InvalidOptionError("revisions", options.revisions, "a whole number of 0 or more");
  }
  if (!Number.isFinite(options.stepDelay) || options.stepDelay < 0) {
    throw new InvalidOptionError("step-delay", options.stepDelay, "a number of milliseconds, 0 or more");
  }
}

export interface ProgressObserver extends ExecutionObserver {
  /** Stops a spinner left running by a step that never finished. */
  dispose(): void;
}

/** Live progress: a spinner per step, settled into a status line when it ends. */
export function createProgressObserver(
  ctx: Pick<CommandContext, "print" | "spinner" | "startSpinner">
): ProgressObserver {
  const startSpinner = ctx.startSpinner ?? ((text: string) => ora(text).start());
  let spinner: ActiveSpinner | null = null;

  const stopSpinner = () => {
    if (spinner) {
      spinner.stop();
      spinner = null;
    }
  };

  const settle = (line: string) => {
    stopSpinner();
    ctx.print(line);
  };

  return {
    onIterationStart: (iteration) => {
      if (iteration.iterationNumber > 1) {
        ctx.print("");
        ctx.print(chalk.bold(`Iteration ${iteration.iterationNumber}`));
      }
    },
    onStepStart: (step) => {
      if (ctx.spinner) {
        stopSpinner();
        spinner = startSpinner(`${step.name} (${step.agent})`);
      }
    },
    onStepComplete: (step) => settle(renderStepLine(step)),
    onStepBlocked: (step) => {
      settle(renderStepLine(step));
      printLines(ctx, ["", ...renderQualityGateFailure(step)]);
    },
    onShowrunnerDecision: (decision) => printLines(ctx, renderShowrunnerDecision(decision)),
    onStabilized: () => printLines(ctx, ["", ...renderStabilization()]),
    dispose: stopSpinner
  };
}

export async function handleRun(
  args: RunArgs,
  ctx: CommandContext,
  executor?: LoopExecutor
): Promise<LoopSummary> {
  validateRunOptions(args);
  setupLogging(resolveLogLevel({ flag: args.logLevel, verbose: args.verbose, env: ctx.env }));

  const preflight = await checkPreconditions({
    loopName: args.loop,
    cwd: ctx.cwd,
    env: ctx.env,
    catalog: ctx.catalog,
    seedFlag: args.seed,
    seedPolicyFlag: args.seedPolicy,
    onConfig: (config) =>
      setupLogging(
        resolveLogLevel({
          flag: args.logLevel,
          verbose: args.verbose,
          env: ctx.env,
          configLevel: config.logging?.level
        })
      )
  });
  const { loop } = preflight;

  // With --json, stdout carries the summary document only.
  const notice = args.json ? ctx.printError : ctx.print;
  for (const warning of preflight.warnings) {
    notice(chalk.yellow(`⚠ ${warning}`));
  }
  if (args.interactive) {
    notice(chalk.yellow("Note: Interactive mode will be available in a future release."));
    notice("");
  }

  if (!args.json) {
    printLines(ctx, ["", ...renderLoopHeader(loop)]);
    ctx.print(chalk.dim("Executing loop..."));
    ctx.print("");
  }

  const observer = args.json ? undefined : createProgressObserver(ctx);
  const tracker = await executeLoop(
    preflight,
    executor ?? new SimulatedExecutor({ revisions: args.revisions, stepDelayMs: args.stepDelay }),
    { observer, clock: ctx.clock }
  ).finally(() => observer?.dispose());

  const summary = tracker.getSummary();
  const savedTo = args.save
    ? await saveRunSummary(preflight.workspaceDir, loop.id, summary, ctx.clock?.())
    : undefined;

  if (args.json) {
    ctx.print(JSON.stringify(summary, null, 2));
    return summary;
  }

  printLines(ctx, [
    ...renderIterationHistory(tracker),
    ...renderEfficiency(tracker),
    ...renderIterationTree(tracker),
    ...renderLoopSummary({ loop, tracker, next: ctx.catalog.suggestNext(loop.id), savedTo })
  ]);
  return summary;
}
