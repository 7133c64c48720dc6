import * as fs from "fs-extra";
import * as path from "path";
import YAML from "yaml";
import { LoopSummary, ProjectConfig, ProjectMetadata, SeedPolicy } from "../schemas";
import { ConfigError, ProjectExistsError } from "./errors";

export const WORKSPACE_DIR = ".questfoundry";
export const PROJECT_EXTENSION = ".qfproj";
export const SEED_FILE = "seed.txt";
export const CONFIG_FILE = "config.yml";
export const SEED_ENV = "QUESTFOUNDRY_SEED";

export const CONFIG_TEMPLATE_PATH = path.join(__dirname, "..", "..", "templates", "config.yml");

const WORKSPACE_LAYOUT = ["hot/hooks", "hot/canon", "hot/artifacts", "cache", "sessions"];

export type SeedSource = "flag" | "env" | "file" | "config";

export interface ResolvedSeed {
  value: string;
  source: SeedSource;
}

/** First `*.qfproj` in the directory (sorted by name), or null. */
export async function findProjectFile(cwd: string): Promise<string | null> {
  const entries = await fs.readdir(cwd).catch(() => [] as string[]);
  const match = entries.filter((entry) => entry.endsWith(PROJECT_EXTENSION)).sort()[0];
  return match ? path.join(cwd, match) : null;
}

export async function loadProjectMetadata(projectFile: string): Promise<ProjectMetadata> {
  const raw: unknown = await fs.readJson(projectFile);
  return ProjectMetadata.parse(raw);
}

export function workspacePath(cwd: string): string {
  return path.join(cwd, WORKSPACE_DIR);
}

export async function workspaceExists(cwd: string): Promise<boolean> {
  const dir = workspacePath(cwd);
  if (!(await fs.pathExists(dir))) return false;
  const stats = await fs.stat(dir);
  return stats.isDirectory();
}

export async function loadProjectConfig(cwd: string): Promise<ProjectConfig> {
  const configPath = path.join(workspacePath(cwd), CONFIG_FILE);
  if (!(await fs.pathExists(configPath))) {
    return {};
  }

  let data: unknown;
  try {
    data = YAML.parse(await fs.readFile(configPath, "utf-8"));
  } catch (err) {
    throw new ConfigError(configPath, err instanceof Error ? err.message : String(err));
  }

  const parsed = ProjectConfig.safeParse(data ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(configPath, issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid config");
  }
  return parsed.data;
}

function nonEmpty(value: string | undefined | null): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/**
 * Seed lookup order: --seed flag, QUESTFOUNDRY_SEED, .questfoundry/seed.txt,
 * then story_seed in the project config.
 */
export async function resolveSeed(options: {
  cwd: string;
  flag?: string;
  env: NodeJS.ProcessEnv;
  config: ProjectConfig;
}): Promise<ResolvedSeed | null> {
  const fromFlag = nonEmpty(options.flag);
  if (fromFlag) return { value: fromFlag, source: "flag" };

  const fromEnv = nonEmpty(options.env[SEED_ENV]);
  if (fromEnv) return { value: fromEnv, source: "env" };

  const seedFile = path.join(workspacePath(options.cwd), SEED_FILE);
  if (await fs.pathExists(seedFile)) {
    const fromFile = nonEmpty(await fs.readFile(seedFile, "utf-8"));
    if (fromFile) return { value: fromFile, source: "file" };
  }

  const fromConfig = nonEmpty(options.config.story_seed);
  if (fromConfig) return { value: fromConfig, source: "config" };

  return null;
}

export function resolveSeedPolicy(flag: string | undefined, config: ProjectConfig): SeedPolicy {
  if (flag !== undefined) {
    return SeedPolicy.parse(flag);
  }
  return config.run?.seed_policy ?? "require";
}

export interface CreatedProject {
  projectFile: string;
  workspaceDir: string;
  metadata: ProjectMetadata;
}

export async function createProject(options: {
  projectPath: string;
  name: string;
  description: string;
  now?: Date;
}): Promise<CreatedProject> {
  const { projectPath, name, description } = options;

  if (await fs.pathExists(projectPath)) {
    const stats = await fs.stat(projectPath);
    if (!stats.isDirectory()) {
      throw new ProjectExistsError(projectPath, "Not a directory");
    }
    if (await findProjectFile(projectPath)) {
      throw new ProjectExistsError(projectPath, "Project already exists in");
    }
  }

  const workspaceDir = workspacePath(projectPath);
  for (const sub of WORKSPACE_LAYOUT) {
    await fs.ensureDir(path.join(workspaceDir, sub));
  }

  const projectFile = path.join(projectPath, `${name}${PROJECT_EXTENSION}`);
  const metadata: ProjectMetadata = {
    name,
    description,
    version: "0.1.0",
    created_at: (options.now ?? new Date()).toISOString(),
    layers: {
      hot: path.join(workspaceDir, "hot"),
      cold: projectFile
    }
  };
  await fs.writeFile(projectFile, JSON.stringify(metadata, null, 2));

  const template = await fs.readFile(CONFIG_TEMPLATE_PATH, "utf-8");
  await fs.writeFile(path.join(workspaceDir, CONFIG_FILE), template);

  return { projectFile, workspaceDir, metadata };
}

export async function saveRunSummary(
  workspaceDir: string,
  loopId: string,
  summary: LoopSummary,
  now: Date = new Date()
): Promise<string> {
  const stamp = now.toISOString().replace(/[:.]/g, "-");
  const target = path.join(workspaceDir, "sessions", `${stamp}_${loopId}.json`);
  await fs.ensureDir(path.dirname(target));
  await fs.writeFile(
    target,
    JSON.stringify({ loop_id: loopId, saved_at: now.toISOString(), summary }, null, 2)
  );
  return target;
}
