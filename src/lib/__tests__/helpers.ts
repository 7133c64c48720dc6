import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import * as path from "node:path";

export async function makeTempDir(prefix = "qf-test-"): Promise<string> {
  return mkdtemp(path.join(tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/** Clock that only moves when told to. */
export function manualClock(startMs: number = Date.UTC(2026, 0, 2, 3, 4, 5)) {
  let now = startMs;
  return {
    clock: () => new Date(now),
    advance(seconds: number) {
      now += seconds * 1000;
    }
  };
}
