import { describe, it, expect, beforeAll } from "vitest";
import chalk from "chalk";
import { loadLoopCatalog } from "../../lib/catalog";
import { handleLoops } from "../loops";

describe("handleLoops", () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it("prints every loop under its category", async () => {
    const output: string[] = [];
    const catalog = await loadLoopCatalog();
    await handleLoops({
      cwd: ".",
      env: {},
      catalog,
      print: (line) => output.push(line),
      printError: () => undefined,
      spinner: false
    });

    expect(output.filter((line) => line.endsWith(":") && !line.startsWith(" "))).toEqual([
      "Discovery:",
      "Refinement:",
      "Asset:",
      "Export:"
    ]);
    expect(output).toContain(`  ${"archive-snapshot".padEnd(20)} (AS) - ${catalog.get("archive-snapshot").description}`);
    expect(output.filter((line) => line.startsWith("  "))).toHaveLength(catalog.size);
  });
});
