import type { ProjectConfig, SeedPolicy } from "../schemas";
import { LoopCatalog, type LoopDefinition } from "./catalog";
import { LoopExecutionError, ProjectNotFoundError, SeedRequiredError, WorkspaceNotFoundError } from "./errors";
import type { ExecutionObserver, LoopExecutor } from "./executor";
import { getLogger } from "./logger";
import { type Clock, LoopProgressTracker } from "./progress";
import {
  type ResolvedSeed,
  findProjectFile,
  loadProjectConfig,
  resolveSeed,
  resolveSeedPolicy,
  workspaceExists,
  workspacePath
} from "./workspace";

const logger = getLogger("dispatch");

export const SEED_LOOP_ID = "story-spark";

export interface DispatchRequest {
  loopName: string;
  cwd: string;
  env: NodeJS.ProcessEnv;
  catalog: LoopCatalog;
  seedFlag?: string;
  /** --seed-policy; falls back to run.seed_policy in the project config. */
  seedPolicyFlag?: string;
  /** Called once the project config is loaded, before the seed check. */
  onConfig?: (config: ProjectConfig) => void;
}

export interface Preflight {
  loop: LoopDefinition;
  projectFile: string;
  workspaceDir: string;
  config: ProjectConfig;
  seedPolicy: SeedPolicy;
  seed: ResolvedSeed | null;
  warnings: string[];
}

/**
 * Checks, in order: project descriptor, loop name, workspace directory,
 * and for story-spark a seed. Throws the matching CliError on the first
 * failure; a missing seed under the warn policy becomes a warning.
 * The project config lives in the workspace, so it is read only after
 * the workspace check.
 */
export async function checkPreconditions(request: DispatchRequest): Promise<Preflight> {
  const projectFile = await findProjectFile(request.cwd);
  if (!projectFile) {
    throw new ProjectNotFoundError();
  }

  logger.debug(`Validating loop name: ${request.loopName}`);
  const loop = request.catalog.get(request.catalog.resolve(request.loopName));

  const workspaceDir = workspacePath(request.cwd);
  if (!(await workspaceExists(request.cwd))) {
    throw new WorkspaceNotFoundError(workspaceDir);
  }
  logger.debug(`Workspace found at: ${workspaceDir}`);

  const config = await loadProjectConfig(request.cwd);
  request.onConfig?.(config);
  const seedPolicy = resolveSeedPolicy(request.seedPolicyFlag, config);

  const warnings: string[] = [];
  let seed: ResolvedSeed | null = null;
  if (loop.id === SEED_LOOP_ID) {
    seed = await resolveSeed({
      cwd: request.cwd,
      flag: request.seedFlag,
      env: request.env,
      config
    });
    if (!seed) {
      if (seedPolicy === "require") {
        throw new SeedRequiredError();
      }
      logger.warn("Story Spark requires a seed but none was found");
      warnings.push("Story Spark runs without a seed; results will be generic");
    } else {
      logger.debug(`Story Spark seed from ${seed.source} (${seed.value.length} chars)`);
    }
  }

  return { loop, projectFile, workspaceDir, config, seedPolicy, seed, warnings };
}

/**
 * Builds a fresh tracker for this run and hands it to the executor.
 * Executor failures surface as LoopExecutionError.
 */
export async function executeLoop(
  preflight: Preflight,
  executor: LoopExecutor,
  options: { observer?: ExecutionObserver; clock?: Clock } = {}
): Promise<LoopProgressTracker> {
  const tracker = new LoopProgressTracker(preflight.loop.displayName, { clock: options.clock });
  tracker.startLoop();
  logger.info(`Executing loop: ${preflight.loop.id} (${preflight.loop.displayName})`);

  try {
    await executor.execute({
      loop: preflight.loop,
      seed: preflight.seed?.value ?? null,
      tracker,
      observer: options.observer
    });
  } catch (err) {
    logger.error(`Error executing loop: ${err instanceof Error ? err.message : String(err)}`);
    throw new LoopExecutionError(preflight.loop.id, err);
  }

  logger.info(`Loop execution completed: ${preflight.loop.id}`);
  return tracker;
}
