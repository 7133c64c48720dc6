import { LoopCatalog } from "../lib/catalog";
import { CliError } from "../lib/errors";
import { getLogger } from "../lib/logger";
import type { Clock } from "../lib/progress";
import { renderError } from "../lib/render";

const logger = getLogger("cli");

export interface ActiveSpinner {
  stop(): unknown;
}

export interface CommandContext {
  cwd: string;
  env: NodeJS.ProcessEnv;
  catalog: LoopCatalog;
  /** Command output (stdout). */
  print: (line: string) => void;
  /** Notices that must stay out of machine-readable output (stderr). */
  printError: (line: string) => void;
  /** Animate step progress with a spinner; off when output is captured. */
  spinner: boolean;
  /** Spinner factory, ora by default. */
  startSpinner?: (text: string) => ActiveSpinner;
  clock?: Clock;
}

export function printLines(ctx: Pick<CommandContext, "print">, lines: readonly string[]): void {
  for (const line of lines) {
    ctx.print(line);
  }
}

/**
 * Runs one command and maps its outcome to an exit code, printing
 * user-facing errors instead of a stack trace.
 */
export async function runCommand(
  action: () => Promise<unknown>,
  printError: (line: string) => void = (line) => console.error(line)
): Promise<number> {
  try {
    await action();
    return 0;
  } catch (err) {
    for (const line of renderError(err)) {
      printError(line);
    }
    if (err instanceof CliError) {
      return err.exitCode;
    }
    if (err instanceof Error && err.stack) {
      logger.debug(err.stack);
    }
    return 1;
  }
}
