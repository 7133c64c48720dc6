import { describe, it, expect, beforeAll } from "vitest";
import chalk from "chalk";
import { LoopCatalog, LoopNotFoundError, loadLoopCatalog } from "../catalog";
import { ProjectNotFoundError } from "../errors";
import { LoopProgressTracker, Step } from "../progress";
import {
  formatDuration,
  panel,
  renderEfficiency,
  renderError,
  renderIterationHistory,
  renderIterationTree,
  renderLoopHeader,
  renderLoopSummary,
  renderLoopsList,
  renderQualityGateFailure,
  renderStepLine,
  visibleLength
} from "../render";

function blockThenRevise(): LoopProgressTracker {
  const tracker = new LoopProgressTracker("Hook Harvest", { clock: () => new Date(0) });
  tracker.startLoop();
  tracker.startIteration();
  tracker.completeStep(tracker.startStep("Step 1", "Agent A"));
  tracker.completeStep(tracker.startStep("Step 2", "Agent B"));
  tracker.blockStep(tracker.startStep("Step 3", "Agent C"), ["X inconsistent"]);
  tracker.recordShowrunnerDecision("Revising step 2");
  tracker.completeIteration();
  tracker.startIteration();
  tracker.completeStep(tracker.startStep("Step 2", "Agent B", true));
  tracker.completeStep(tracker.startStep("Step 3", "Agent C"));
  tracker.markStabilized();
  tracker.completeIteration();
  return tracker;
}

describe("render", () => {
  let catalog: LoopCatalog;

  beforeAll(async () => {
    chalk.level = 0;
    catalog = await loadLoopCatalog();
  });

  it("formats durations in minutes and whole seconds", () => {
    expect(formatDuration(0)).toBe("0s");
    expect(formatDuration(45.9)).toBe("45s");
    expect(formatDuration(60)).toBe("1m 0s");
    expect(formatDuration(154)).toBe("2m 34s");
  });

  it("measures text without colour codes", () => {
    expect(visibleLength("\u001b[31mred\u001b[39m")).toBe(3);
  });

  describe("panel", () => {
    it("frames lines to the widest one", () => {
      expect(panel(["hello", "hi"])).toEqual(["╭───────╮", "│ hello │", "│ hi    │", "╰───────╯"]);
    });

    it("widens to fit the title", () => {
      expect(panel(["ab"], { title: "T" })).toEqual(["╭─ T ─╮", "│ ab  │", "╰─────╯"]);
    });

    it("splits embedded newlines", () => {
      expect(panel(["a\nb"])).toEqual(["╭───╮", "│ a │", "│ b │", "╰───╯"]);
    });
  });

  it("renders the loop header", () => {
    const loop = catalog.get("hook-harvest");
    const lines = renderLoopHeader(loop);
    const width = loop.description.length;

    expect(lines[0]).toBe(`╭─ Loop Execution - HH ${"─".repeat(width + 1 - " Loop Execution - HH ".length)}╮`);
    expect(lines[1]).toBe(`│ ${"Hook Harvest".padEnd(width)} │`);
    expect(lines[2]).toBe(`│ ${loop.description} │`);
    expect(lines.slice(4)).toEqual(["", "Category: Discovery", ""]);
  });

  it("lists loops by category", () => {
    const lines = renderLoopsList(catalog);
    expect(lines.slice(0, 6)).toEqual([
      "",
      "Available QuestFoundry Loops",
      "",
      "Discovery:",
      `  ${"hook-harvest".padEnd(20)} (HH) - Triage proposed hooks into accepted, deferred and rejected`,
      `  ${"lore-deepening".padEnd(20)} (LD) - Expand accepted hooks into consistent canon`
    ]);
    expect(lines.slice(-2)).toEqual(["Run a loop with: qf run <loop-name>", ""]);
    expect(lines.filter((line) => line.startsWith("  "))).toHaveLength(13);
  });

  describe("renderError", () => {
    it("lists the catalog for an unknown loop", () => {
      const lines = renderError(new LoopNotFoundError("nope", catalog.all()));
      expect(lines.slice(0, 4)).toEqual([
        "Error: Unknown loop 'nope'",
        "",
        "Available loops:",
        "  • Story Spark (story-spark) - Turn a seed premise into a first topology of scenes and hooks"
      ]);
      expect(lines).toHaveLength(3 + 13);
    });

    it("prints the hint of a user error", () => {
      expect(renderError(new ProjectNotFoundError())).toEqual([
        "Error: No project found in current directory",
        "",
        "Tip: Run qf init to create a new project"
      ]);
    });

    it("marks anything else as unexpected", () => {
      expect(renderError(new Error("disk on fire"))).toEqual(["Unexpected error: disk on fire"]);
      expect(renderError("plain")).toEqual(["Unexpected error: plain"]);
    });
  });

  describe("renderStepLine", () => {
    it("shows revision, agent and duration", () => {
      const step = new Step("Step 2", "Agent B", true);
      step.start(new Date(0));
      step.complete(new Date(2_000));
      expect(renderStepLine(step)).toBe("↻ Step 2 (revision) (Agent B) (2s)");
    });

    it("marks blocked and running steps", () => {
      const blocked = new Step("Quality Gate", "Gatekeeper");
      blocked.block([], new Date(0));
      expect(renderStepLine(blocked)).toBe("✗ Quality Gate (Gatekeeper)");

      const running = new Step("Draft", "");
      running.start(new Date(0));
      expect(renderStepLine(running)).toBe("→ Draft");
    });
  });

  describe("renderIterationHistory", () => {
    it("says so when nothing ran", () => {
      expect(renderIterationHistory(new LoopProgressTracker("Gatecheck"))).toEqual(["No iterations recorded", ""]);
    });

    it("stays quiet for single-pass runs", () => {
      const tracker = new LoopProgressTracker("Gatecheck");
      tracker.startIteration();
      tracker.completeStep(tracker.startStep("A", "X"));
      expect(renderIterationHistory(tracker)).toEqual([]);
    });

    it("shows every iteration with issues and decisions", () => {
      const lines = renderIterationHistory(blockThenRevise());
      const separator = "━".repeat(80);

      expect(lines.slice(0, 11)).toEqual([
        "",
        "Iteration Summary",
        "",
        separator,
        "Iteration 1",
        separator,
        "",
        "✓ Step 1 (Agent A)",
        "✓ Step 2 (Agent B)",
        "✗ Step 3 (Agent C)",
        "  Issues:"
      ]);
      expect(lines[11]).toBe("    - X inconsistent");
      expect(lines).toContain("│ Steps: 2 completed | 1 blocked │");
      expect(lines).toContain("│ Showrunner decision:           │");
      expect(lines).toContain("│ Steps: 2 completed | 1 revisions │");
      expect(lines).toContain("│ Status: Stabilized               │");
    });
  });

  it("renders efficiency for multi-iteration runs", () => {
    const lines = renderEfficiency(blockThenRevise());
    expect(lines).toEqual([
      "╭─ Performance ────────────╮",
      "│ Efficiency Metrics       │",
      "│                          │",
      "│ Total step executions: 5 │",
      "│ Step revisions: 1        │",
      "│ Step reuse: 4 (80%)      │",
      "│ Total duration: 0s       │",
      "╰──────────────────────────╯",
      ""
    ]);
  });

  it("renders the iteration tree", () => {
    expect(renderIterationTree(blockThenRevise())).toEqual([
      "Hook Harvest",
      "├── Iteration 1 ✗ Blocked",
      "│   ├── ✓ Step 1",
      "│   ├── ✓ Step 2",
      "│   └── ✗ Step 3",
      "└── Iteration 2 ✓ Stabilized",
      "    ├── ↻ Step 2 (revision)",
      "    └── ✓ Step 3",
      ""
    ]);
  });

  it("renders a quality gate failure", () => {
    const step = new Step("Quality Gate", "Gatekeeper");
    step.block(["Canon drift"], new Date(0));
    expect(renderQualityGateFailure(step, "Revise canon")).toEqual([
      "╭─ Quality Gate Failure ──────────────────────╮",
      "│ Step 'Quality Gate' blocked by quality gate │",
      "│                                             │",
      "│ Issues found:                               │",
      "│   • Canon drift                             │",
      "│                                             │",
      "│ Showrunner's plan:                          │",
      "│ Revise canon                                │",
      "╰─────────────────────────────────────────────╯",
      ""
    ]);
  });

  it("suggests the next loop in the summary", () => {
    const loop = catalog.get("hook-harvest");
    const lines = renderLoopSummary({ loop, tracker: blockThenRevise(), next: catalog.suggestNext(loop.id) });

    expect(lines).toContain("│ Hook Harvest (HH)        │");
    expect(lines).toContain("│ Iterations: 2 | Steps: 5 │");
    expect(lines).toContain("│ Stabilized: yes          │");
    expect(lines.some((line) => line.startsWith("╭─ Next Action "))).toBe(true);
    expect(lines).toContain("│ Run qf run lore-deepening (Lore Deepening) │");
  });
});
