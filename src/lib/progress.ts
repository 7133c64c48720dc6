import { LoopSummary } from "../schemas";

export type Clock = () => Date;

export type StepStatus = "pending" | "running" | "completed" | "blocked";

export type TrackerState = "not_started" | "iteration_active" | "iteration_closed";

const systemClock: Clock = () => new Date();

function secondsBetween(start: Date | null, end: Date | null): number {
  if (start && end) {
    return (end.getTime() - start.getTime()) / 1000;
  }
  return 0;
}

/**
 * Raised when the tracker is driven out of order, e.g. a step started
 * with no open iteration. This is a bug in the caller, not a user error.
 */
export class TrackerStateError extends Error {
  constructor(readonly operation: string, readonly state: TrackerState, detail?: string) {
    super(`Cannot ${operation} while tracker is ${state.replace(/_/g, " ")}${detail ? `: ${detail}` : ""}`);
    this.name = "TrackerStateError";
  }
}

export class Step {
  private started: Date | null = null;
  private ended: Date | null = null;
  private isBlocked = false;
  private issues: readonly string[] = [];

  constructor(
    readonly name: string,
    readonly agent: string,
    readonly isRevision: boolean = false
  ) {}

  get startTime(): Date | null {
    return this.started;
  }

  get endTime(): Date | null {
    return this.ended;
  }

  get blocked(): boolean {
    return this.isBlocked;
  }

  get blockingIssues(): readonly string[] {
    return this.issues;
  }

  /** Seconds from start to end, 0 until both are set. */
  get duration(): number {
    return secondsBetween(this.started, this.ended);
  }

  get status(): StepStatus {
    if (this.isBlocked) return "blocked";
    if (this.ended) return "completed";
    if (this.started) return "running";
    return "pending";
  }

  get finished(): boolean {
    return this.isBlocked || this.ended !== null;
  }

  start(at: Date): void {
    if (this.status !== "pending") {
      throw new Error(`Step '${this.name}' is already ${this.status}`);
    }
    this.started = at;
  }

  complete(at: Date): void {
    this.assertUnfinished();
    this.ended = at;
  }

  /** A blocked step is finished, just not successfully. */
  block(issues: readonly string[], at: Date): void {
    this.assertUnfinished();
    this.isBlocked = true;
    this.issues = Object.freeze([...issues]);
    this.ended = at;
  }

  private assertUnfinished(): void {
    if (this.finished) {
      throw new Error(`Step '${this.name}' is already ${this.status}`);
    }
  }
}

export class Iteration {
  private readonly stepList: Step[] = [];
  private ended: Date | null = null;
  private isStabilized = false;
  private decision: string | null = null;

  constructor(
    readonly iterationNumber: number,
    readonly startTime: Date
  ) {}

  /** Steps in the order they were started. */
  get steps(): readonly Step[] {
    return this.stepList;
  }

  get endTime(): Date | null {
    return this.ended;
  }

  get closed(): boolean {
    return this.ended !== null;
  }

  get stabilized(): boolean {
    return this.isStabilized;
  }

  get showrunnerDecision(): string | null {
    return this.decision;
  }

  get duration(): number {
    return secondsBetween(this.startTime, this.ended);
  }

  get completedSteps(): number {
    return this.steps.filter((s) => s.status === "completed").length;
  }

  get blockedSteps(): number {
    return this.steps.filter((s) => s.status === "blocked").length;
  }

  get revisedSteps(): number {
    return this.steps.filter((s) => s.isRevision).length;
  }

  get firstPassSteps(): number {
    return this.steps.filter((s) => !s.isRevision).length;
  }

  beginStep(name: string, agent: string, isRevision: boolean, at: Date): Step {
    if (this.closed) {
      throw new Error(`Iteration ${this.iterationNumber} is closed`);
    }
    const step = new Step(name, agent, isRevision);
    step.start(at);
    this.stepList.push(step);
    return step;
  }

  recordDecision(decision: string): void {
    this.decision = decision;
  }

  close(at: Date): void {
    this.ended = at;
  }

  /** Stabilizing closes the iteration as well. */
  stabilize(at: Date): void {
    this.isStabilized = true;
    this.ended = at;
  }
}

export interface EfficiencyMetrics {
  total_steps: number;
  revised_steps: number;
  reused_steps: number;
  efficiency_percent: number;
}

/**
 * Iteration history of one loop run.
 *
 * States: not_started -> iteration_active <-> iteration_closed.
 * Iterations are numbered by the tracker, starting at 1.
 */
export class LoopProgressTracker {
  private readonly history: Iteration[] = [];
  private current: Iteration | null = null;
  private loopStart: Date | null = null;
  private readonly now: Clock;

  constructor(readonly loopName: string, options: { clock?: Clock } = {}) {
    this.now = options.clock ?? systemClock;
  }

  get iterations(): readonly Iteration[] {
    return this.history;
  }

  get currentIteration(): Iteration | null {
    return this.current;
  }

  get startTime(): Date | null {
    return this.loopStart;
  }

  get state(): TrackerState {
    if (!this.current) return "not_started";
    return this.current.closed ? "iteration_closed" : "iteration_active";
  }

  /** Records the loop start. A second call restarts the clock. */
  startLoop(): void {
    this.loopStart = this.now();
  }

  startIteration(): Iteration {
    if (this.state === "iteration_active") {
      throw new TrackerStateError("start an iteration", this.state, "complete the current iteration first");
    }
    const iteration = new Iteration(this.history.length + 1, this.now());
    this.history.push(iteration);
    this.current = iteration;
    return iteration;
  }

  startStep(name: string, agent: string, isRevision: boolean = false): Step {
    const iteration = this.current;
    if (!iteration || this.state !== "iteration_active") {
      throw new TrackerStateError("start a step", this.state, "call startIteration first");
    }
    return iteration.beginStep(name, agent, isRevision, this.now());
  }

  completeStep(step: Step): void {
    if (step.finished) {
      throw new TrackerStateError("complete a step", this.state, `step '${step.name}' is already ${step.status}`);
    }
    step.complete(this.now());
  }

  blockStep(step: Step, issues: readonly string[]): void {
    if (step.finished) {
      throw new TrackerStateError("block a step", this.state, `step '${step.name}' is already ${step.status}`);
    }
    step.block(issues, this.now());
  }

  recordShowrunnerDecision(decision: string): void {
    if (this.current) {
      this.current.recordDecision(decision);
    }
  }

  completeIteration(): void {
    if (this.current) {
      this.current.close(this.now());
    }
  }

  markStabilized(): void {
    if (this.current) {
      this.current.stabilize(this.now());
    }
  }

  /** Seconds since startLoop, 0 if the loop never started. */
  get totalDuration(): number {
    return this.loopStart ? secondsBetween(this.loopStart, this.now()) : 0;
  }

  get isMultiIteration(): boolean {
    return this.history.length > 1;
  }

  // Reflects the most recent iteration only, not any earlier one.
  get stabilized(): boolean {
    return this.current?.stabilized ?? false;
  }

  get totalSteps(): number {
    return this.history.reduce((sum, i) => sum + i.steps.length, 0);
  }

  get totalRevisedSteps(): number {
    return this.history.reduce((sum, i) => sum + i.revisedSteps, 0);
  }

  getSummary(): LoopSummary {
    return {
      loop_name: this.loopName,
      iteration_count: this.history.length,
      total_steps: this.totalSteps,
      total_duration: this.totalDuration,
      is_multi_iteration: this.isMultiIteration,
      stabilized: this.stabilized,
      iterations: this.history.map((i) => ({
        number: i.iterationNumber,
        completed_steps: i.completedSteps,
        blocked_steps: i.blockedSteps,
        revised_steps: i.revisedSteps,
        first_pass_steps: i.firstPassSteps,
        duration: i.duration,
        stabilized: i.stabilized,
        showrunner_decision: i.showrunnerDecision
      }))
    };
  }
}

export function reuseEfficiency(totalSteps: number, revisedSteps: number): number {
  if (totalSteps <= 0) return 0;
  return ((totalSteps - revisedSteps) / totalSteps) * 100;
}

/** Step reuse across iterations; null unless the loop needed more than one. */
export function computeEfficiency(tracker: LoopProgressTracker): EfficiencyMetrics | null {
  if (!tracker.isMultiIteration || tracker.iterations.length < 2) {
    return null;
  }
  const total = tracker.totalSteps;
  const revised = tracker.totalRevisedSteps;
  return {
    total_steps: total,
    revised_steps: revised,
    reused_steps: total - revised,
    efficiency_percent: reuseEfficiency(total, revised)
  };
}
