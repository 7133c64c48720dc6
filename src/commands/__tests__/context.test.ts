import { describe, it, expect, beforeAll } from "vitest";
import chalk from "chalk";
import { CliError, SeedRequiredError } from "../../lib/errors";
import { runCommand } from "../context";

describe("runCommand", () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  const capture = () => {
    const lines: string[] = [];
    return { lines, print: (line: string) => lines.push(line) };
  };

  it("returns 0 when the command succeeds", async () => {
    const { lines, print } = capture();
    expect(await runCommand(async () => "done", print)).toBe(0);
    expect(lines).toEqual([]);
  });

  it("prints a user error and uses its exit code", async () => {
    const { lines, print } = capture();
    const code = await runCommand(async () => {
      throw new CliError("Loop is locked", "Wait for the other run", 3);
    }, print);

    expect(code).toBe(3);
    expect(lines).toEqual(["Error: Loop is locked", "", "Tip: Wait for the other run"]);
  });

  it("prints every hint line", async () => {
    const { lines, print } = capture();
    const code = await runCommand(async () => {
      throw new SeedRequiredError();
    }, print);

    expect(code).toBe(1);
    expect(lines[0]).toBe("Error: Story Spark requires a seed");
    expect(lines.filter((line) => line.startsWith("Tip: ")).length).toBeGreaterThan(1);
  });

  it("maps unexpected failures to 1", async () => {
    const { lines, print } = capture();
    const code = await runCommand(async () => {
      throw new Error("disk full");
    }, print);

    expect(code).toBe(1);
    expect(lines).toEqual(["Unexpected error: disk full"]);
  });
});
