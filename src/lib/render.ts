import chalk from "chalk";
import { LoopCatalog, type LoopDefinition, LoopNotFoundError } from "./catalog";
import { CliError } from "./errors";
import { Iteration, LoopProgressTracker, Step, computeEfficiency } from "./progress";

type BorderColor = "cyan" | "yellow" | "red" | "green";

const BORDER: Record<BorderColor, chalk.Chalk> = {
  cyan: chalk.cyan,
  yellow: chalk.yellow,
  red: chalk.red,
  green: chalk.green
};

const ANSI_PATTERN = /\u001b\[[0-9;]*m/g;

export function visibleLength(text: string): number {
  return text.replace(ANSI_PATTERN, "").length;
}

/** "2m 34s" or "45s"; fractions of a second are dropped. */
export function formatDuration(seconds: number): string {
  const minutes = Math.floor(seconds / 60);
  const secs = Math.floor(seconds % 60);
  return minutes > 0 ? `${minutes}m ${secs}s` : `${secs}s`;
}

export function panel(content: string[], options: { title?: string; color?: BorderColor } = {}): string[] {
  const border = BORDER[options.color ?? "cyan"];
  const lines = content.flatMap((entry) => entry.split("\n"));
  const title = options.title ? ` ${options.title} ` : "";
  const width = Math.max(title.length, ...lines.map(visibleLength));

  const top = border(`╭─${title}${"─".repeat(width + 1 - title.length)}╮`);
  const body = lines.map(
    (line) => `${border("│")} ${line}${" ".repeat(width - visibleLength(line))} ${border("│")}`
  );
  const bottom = border(`╰${"─".repeat(width + 2)}╯`);
  return [top, ...body, bottom];
}

export function renderLoopHeader(loop: LoopDefinition): string[] {
  return [
    ...panel([chalk.bold.cyan(loop.displayName), chalk.dim(loop.description)], {
      title: `Loop Execution - ${loop.abbrev}`
    }),
    "",
    `${chalk.bold("Category:")} ${loop.category}`,
    ""
  ];
}

export function renderLoopsList(catalog: LoopCatalog): string[] {
  const lines = ["", chalk.bold.cyan("Available QuestFoundry Loops"), ""];
  for (const group of catalog.byCategory()) {
    lines.push(chalk.bold.magenta(`${group.category}:`));
    for (const loop of group.loops) {
      lines.push(`  ${chalk.cyan(loop.id.padEnd(20))} (${loop.abbrev}) - ${loop.description}`);
    }
    lines.push("");
  }
  lines.push(`${chalk.dim("Run a loop with:")} ${chalk.green("qf run <loop-name>")}`, "");
  return lines;
}

export function renderError(err: unknown): string[] {
  if (err instanceof LoopNotFoundError) {
    return [
      chalk.red(`Error: ${err.message}`),
      "",
      chalk.cyan("Available loops:"),
      ...err.available.map((loop) => `  • ${loop.displayName} (${loop.id}) - ${loop.description}`)
    ];
  }
  if (err instanceof CliError) {
    const lines = [chalk.red(`Error: ${err.message}`)];
    if (err.hint) {
      lines.push("", ...err.hint.split("\n").map((line) => `${chalk.cyan("Tip:")} ${line}`));
    }
    return lines;
  }
  const message = err instanceof Error ? err.message : String(err);
  return [chalk.red(`Unexpected error: ${message}`)];
}

function stepIcon(step: Step): string {
  if (step.blocked) return chalk.red("✗");
  if (step.status === "completed") return chalk.green(step.isRevision ? "↻" : "✓");
  return chalk.yellow("→");
}

export function renderStepLine(step: Step): string {
  const revision = step.isRevision ? " (revision)" : "";
  const agent = step.agent ? ` (${step.agent})` : "";
  const duration = step.duration > 0 ? ` (${formatDuration(step.duration)})` : "";
  return `${stepIcon(step)} ${step.name}${revision}${agent}${duration}`;
}

function iterationStatus(iteration: Iteration): string {
  if (iteration.stabilized) return chalk.green("Stabilized");
  if (iteration.blockedSteps > 0) return chalk.red("Blocked");
  return chalk.yellow("In Progress");
}

function renderIteration(iteration: Iteration): string[] {
  const title = iteration.duration
    ? `Iteration ${iteration.iterationNumber} (${formatDuration(iteration.duration)})`
    : `Iteration ${iteration.iterationNumber}`;
  const separator = "━".repeat(80);
  const lines = ["", separator, chalk.bold(title), separator, ""];

  for (const step of iteration.steps) {
    lines.push(renderStepLine(step));
    if (step.blocked && step.blockingIssues.length > 0) {
      lines.push(chalk.red("  Issues:"));
      lines.push(...step.blockingIssues.map((issue) => chalk.red(`    - ${issue}`)));
    }
  }

  let counts = chalk.green(`Steps: ${iteration.completedSteps} completed`);
  if (iteration.blockedSteps > 0) counts += chalk.red(` | ${iteration.blockedSteps} blocked`);
  if (iteration.revisedSteps > 0) counts += chalk.yellow(` | ${iteration.revisedSteps} revisions`);

  const summary = [counts, `${chalk.bold("Status:")} ${iterationStatus(iteration)}`];
  if (iteration.showrunnerDecision) {
    summary.push("", chalk.bold.dim("Showrunner decision:"), chalk.dim(iteration.showrunnerDecision));
  }
  return [...lines, ...panel(summary), ""];
}

/** Full per-iteration history; single-pass runs have nothing worth repeating. */
export function renderIterationHistory(tracker: LoopProgressTracker): string[] {
  if (tracker.iterations.length === 0) {
    return [chalk.yellow("No iterations recorded"), ""];
  }
  if (!tracker.isMultiIteration) {
    return [];
  }
  return ["", chalk.bold.cyan("Iteration Summary"), ...tracker.iterations.flatMap(renderIteration)];
}

export function renderEfficiency(tracker: LoopProgressTracker): string[] {
  const metrics = computeEfficiency(tracker);
  if (!metrics) {
    return [];
  }
  return [
    ...panel(
      [
        chalk.bold.cyan("Efficiency Metrics"),
        "",
        chalk.cyan(`Total step executions: ${metrics.total_steps}`),
        chalk.yellow(`Step revisions: ${metrics.revised_steps}`),
        chalk.green(`Step reuse: ${metrics.reused_steps} (${metrics.efficiency_percent.toFixed(0)}%)`),
        chalk.cyan(`Total duration: ${formatDuration(tracker.totalDuration)}`)
      ],
      { title: "Performance" }
    ),
    ""
  ];
}

export function renderIterationTree(tracker: LoopProgressTracker): string[] {
  if (tracker.iterations.length === 0) {
    return [];
  }

  const lines = [chalk.bold(tracker.loopName)];
  tracker.iterations.forEach((iteration, index) => {
    const lastIteration = index === tracker.iterations.length - 1;
    let label = chalk.cyan(`Iteration ${iteration.iterationNumber}`);
    if (iteration.duration) {
      label += chalk.dim(` (${formatDuration(iteration.duration)})`);
    }
    const marker = iteration.stabilized ? "✓" : iteration.blockedSteps > 0 ? "✗" : "→";
    label += ` ${marker} ${iterationStatus(iteration)}`;
    lines.push(`${lastIteration ? "└── " : "├── "}${label}`);

    const indent = lastIteration ? "    " : "│   ";
    iteration.steps.forEach((step, stepIndex) => {
      const branch = stepIndex === iteration.steps.length - 1 ? "└── " : "├── ";
      let stepLabel = step.name;
      if (step.isRevision) stepLabel += chalk.yellow(" (revision)");
      if (step.duration > 0) stepLabel += chalk.dim(` ${formatDuration(step.duration)}`);
      lines.push(`${indent}${branch}${stepIcon(step)} ${stepLabel}`);
    });
  });
  return [...lines, ""];
}

export function renderQualityGateFailure(step: Step, plan?: string): string[] {
  const content = [
    chalk.bold.red(`Step '${step.name}' blocked by quality gate`),
    "",
    chalk.bold.red("Issues found:"),
    ...step.blockingIssues.map((issue) => chalk.red(`  • ${issue}`))
  ];
  if (plan) {
    content.push("", chalk.bold.yellow("Showrunner's plan:"), chalk.yellow(plan));
  }
  return [...panel(content, { title: "Quality Gate Failure", color: "red" }), ""];
}

export function renderShowrunnerDecision(decision: string, reasoning?: string): string[] {
  const content = [`${chalk.bold.yellow("⟳ Showrunner:")} ${chalk.yellow(decision)}`];
  if (reasoning) {
    content.push("", chalk.bold.dim("Reasoning:"), chalk.dim(reasoning));
  }
  return [...panel(content, { color: "yellow" }), ""];
}

export function renderStabilization(): string[] {
  return [...panel([chalk.bold.green("✓ Loop Stabilized")], { title: "Stabilization", color: "green" }), ""];
}

export function renderLoopSummary(options: {
  loop: LoopDefinition;
  tracker: LoopProgressTracker;
  next: readonly LoopDefinition[];
  savedTo?: string;
}): string[] {
  const { loop, tracker, next } = options;
  const summary = tracker.getSummary();
  const content = [
    `${chalk.bold.cyan(loop.displayName)}${chalk.dim(` (${loop.abbrev})`)}`,
    chalk.green(`Completed in ${formatDuration(summary.total_duration)}`),
    `Iterations: ${summary.iteration_count} | Steps: ${summary.total_steps}`,
    `Stabilized: ${summary.stabilized ? chalk.green("yes") : chalk.red("no")}`
  ];
  if (options.savedTo) {
    content.push(chalk.dim(`Saved: ${options.savedTo}`));
  }

  const lines = ["", ...panel(content, { title: "Loop Execution Summary" })];
  if (next.length > 0) {
    const suggestions = next.map((n) => `Run ${chalk.green(`qf run ${n.id}`)} (${n.displayName})`);
    lines.push(
      "",
      ...panel([chalk.bold("Suggested next step:"), ...suggestions], { title: "Next Action", color: "yellow" })
    );
  }
  return [...lines, ""];
}
