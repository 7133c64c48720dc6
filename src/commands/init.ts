import chalk from "chalk";
import * as path from "path";
import { createProject, type CreatedProject, WORKSPACE_DIR } from "../lib/workspace";
import { panel } from "../lib/render";
import { type CommandContext, printLines } from "./context";

export interface InitArgs {
  path?: string;
  name?: string;
  description: string;
}

export async function handleInit(args: InitArgs, ctx: CommandContext): Promise<CreatedProject> {
  const projectPath = args.path ? path.resolve(ctx.cwd, args.path) : ctx.cwd;
  const name = args.name?.trim() || path.basename(projectPath);

  const created = await createProject({
    projectPath,
    name,
    description: args.description,
    now: ctx.clock?.()
  });

  printLines(ctx, [
    "",
    chalk.green("✓ Project initialized successfully!"),
    "",
    ...panel(
      [
        `${chalk.cyan("Project:")} ${name}`,
        `${chalk.cyan("Location:")} ${projectPath}`,
        `${chalk.cyan("Project file:")} ${path.basename(created.projectFile)}`,
        `${chalk.cyan("Workspace:")} ${WORKSPACE_DIR}/`,
        "",
        chalk.bold("Next steps:"),
        `  1. Run ${chalk.green("qf loops")} to see the available loops`,
        `  2. Run ${chalk.green("qf run story-spark --seed '<premise>'")} to start a story`
      ],
      { title: "Project Created", color: "green" }
    )
  ]);
  return created;
}
