import { LoopCategory } from "../schemas";
import type { LoopDefinition } from "./catalog";
import { getLogger } from "./logger";
import { Iteration, LoopProgressTracker, Step } from "./progress";

const logger = getLogger("executor");

export interface ExecutionObserver {
  onIterationStart?(iteration: Iteration): void;
  onStepStart?(step: Step): void;
  onStepComplete?(step: Step): void;
  onStepBlocked?(step: Step): void;
  onShowrunnerDecision?(decision: string, iteration: Iteration): void;
  onStabilized?(iteration: Iteration): void;
}

export interface ExecutionRequest {
  loop: LoopDefinition;
  seed: string | null;
  tracker: LoopProgressTracker;
  observer?: ExecutionObserver;
}

/** Runs a loop's steps, recording everything on the request's tracker. */
export interface LoopExecutor {
  execute(request: ExecutionRequest): Promise<void>;
}

interface ScriptedStep {
  name: string;
  agent: string;
}

const GATE: ScriptedStep = { name: "Quality Gate", agent: "Gatekeeper" };

const STEP_SCRIPTS: Record<LoopCategory, ScriptedStep[]> = {
  Discovery: [
    { name: "Context Initialization", agent: "Showrunner" },
    { name: "Hook Generation", agent: "Plotwright" },
    { name: "Canon Check", agent: "Lore Weaver" },
    GATE
  ],
  Refinement: [
    { name: "Context Initialization", agent: "Showrunner" },
    { name: "Codex Drafting", agent: "Codex Curator" },
    { name: "Style Review", agent: "Style Lead" },
    GATE
  ],
  Asset: [
    { name: "Context Initialization", agent: "Showrunner" },
    { name: "Asset Planning", agent: "Art Director" },
    { name: "Asset Rendering", agent: "Illustrator" },
    GATE
  ],
  Export: [
    { name: "Context Initialization", agent: "Showrunner" },
    { name: "View Binding", agent: "Book Binder" },
    { name: "Player Narration", agent: "Player-Narrator" },
    GATE
  ]
};

export function stepScript(category: LoopCategory): readonly ScriptedStep[] {
  return STEP_SCRIPTS[category];
}

export interface SimulatedExecutorOptions {
  /** Number of iterations whose quality gate blocks before the loop stabilizes. */
  revisions?: number;
  stepDelayMs?: number;
}

/**
 * Stand-in for the orchestration library: walks a fixed step script per
 * loop category, optionally failing the quality gate to exercise the
 * revision cycle.
 */
export class SimulatedExecutor implements LoopExecutor {
  private readonly revisions: number;
  private readonly stepDelayMs: number;

  constructor(options: SimulatedExecutorOptions = {}) {
    const revisions = options.revisions ?? 0;
    const stepDelayMs = options.stepDelayMs ?? 0;
    if (!Number.isFinite(revisions)) {
      throw new RangeError(`revisions must be a finite number, got ${revisions}`);
    }
    if (!Number.isFinite(stepDelayMs)) {
      throw new RangeError(`stepDelayMs must be a finite number, got ${stepDelayMs}`);
    }
    this.revisions = Math.max(0, Math.floor(revisions));
    this.stepDelayMs = Math.max(0, stepDelayMs);
  }

  async execute({ loop, seed, tracker, observer }: ExecutionRequest): Promise<void> {
    const script = stepScript(loop.category);
    const gate = script[script.length - 1];
    const target = script[script.length - 2];
    if (!gate || !target) {
      throw new Error(`No step script for ${loop.category} loops`);
    }

    if (seed) {
      logger.debug(`Seeding ${loop.id} (${seed.length} chars)`);
    }

    let steps: Array<ScriptedStep & { isRevision: boolean }> = script.map((s) => ({ ...s, isRevision: false }));

    for (let pass = 1; ; pass++) {
      const iteration = tracker.startIteration();
      observer?.onIterationStart?.(iteration);
      logger.debug(`Iteration ${iteration.iterationNumber} of ${loop.id}: ${steps.length} step(s)`);

      for (const scripted of steps) {
        const step = tracker.startStep(scripted.name, scripted.agent, scripted.isRevision);
        observer?.onStepStart?.(step);
        await this.pause();

        if (scripted.name === gate.name && pass <= this.revisions) {
          tracker.blockStep(step, [`${target.name} output failed quality checks (pass ${pass})`]);
          observer?.onStepBlocked?.(step);
        } else {
          tracker.completeStep(step);
          observer?.onStepComplete?.(step);
        }
      }

      if (pass > this.revisions) {
        tracker.markStabilized();
        observer?.onStabilized?.(iteration);
        tracker.completeIteration();
        return;
      }

      const decision = `Revising ${target.name}`;
      tracker.recordShowrunnerDecision(decision);
      observer?.onShowrunnerDecision?.(decision, iteration);
      tracker.completeIteration();

      steps = [
        { ...target, isRevision: true },
        { ...gate, isRevision: false }
      ];
    }
  }

  private async pause(): Promise<void> {
    if (this.stepDelayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.stepDelayMs));
    }
  }
}
