/**
 * User-facing failure. The CLI prints the message and hint, then exits
 * with `exitCode` without a stack trace.
 */
export class CliError extends Error {
  constructor(
    message: string,
    readonly hint?: string,
    readonly exitCode: number = 1
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ProjectNotFoundError extends CliError {
  constructor() {
    super("No project found in current directory", "Run qf init to create a new project");
  }
}

export class WorkspaceNotFoundError extends CliError {
  constructor(readonly workspaceDir: string) {
    super(`Workspace not found: ${workspaceDir}`, "Run qf init to recreate the project workspace");
  }
}

export class SeedRequiredError extends CliError {
  constructor() {
    super(
      "Story Spark requires a seed",
      [
        "A seed is a prompt or concept to generate story ideas from.",
        "Pass it directly:        qf run story-spark --seed 'Your story concept'",
        "Or set it in the shell:  export QUESTFOUNDRY_SEED='Your story concept'",
        "Or write it to:          .questfoundry/seed.txt"
      ].join("\n")
    );
  }
}

export class ConfigError extends CliError {
  constructor(readonly configPath: string, detail: string) {
    super(`Invalid project config ${configPath}: ${detail}`, "Fix or delete the file and run the command again");
  }
}

export class ProjectExistsError extends CliError {
  constructor(projectPath: string, reason: string) {
    super(`${reason}: ${projectPath}`);
  }
}

export class LoopExecutionError extends CliError {
  constructor(readonly loopId: string, readonly failure: unknown) {
    super(`Error executing loop: ${failure instanceof Error ? failure.message : String(failure)}`);
  }
}

export class InvalidOptionError extends CliError {
  constructor(readonly option: string, value: unknown, expected: string) {
    super(`Invalid value for --${option}: ${String(value)}`, `Expected ${expected}`);
  }
}
