import * as fs from "fs-extra";
import * as path from "path";
import YAML from "yaml";
import { LOOP_CATEGORIES, LoopCatalogFile, LoopCategory } from "../schemas";
import { CliError } from "./errors";

export const DEFAULT_CATALOG_PATH = path.join(__dirname, "..", "..", "data", "loops.yml");

export interface LoopDefinition {
  readonly id: string;
  readonly displayName: string;
  readonly abbrev: string;
  readonly category: LoopCategory;
  readonly description: string;
  readonly next: readonly string[];
}

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}

export class LoopNotFoundError extends CliError {
  constructor(readonly input: string, readonly available: readonly LoopDefinition[]) {
    super(`Unknown loop '${input}'`, "Run qf loops to see every loop with its description");
  }
}

/**
 * Immutable table of loop definitions, in the order they were declared.
 * Built once at startup and handed to whatever needs it.
 */
export class LoopCatalog {
  private readonly byId: ReadonlyMap<string, LoopDefinition>;

  constructor(definitions: readonly LoopDefinition[]) {
    const byId = new Map<string, LoopDefinition>();
    const displayNames = new Set<string>();

    for (const definition of definitions) {
      if (byId.has(definition.id)) {
        throw new CatalogError(`Duplicate loop id: ${definition.id}`);
      }
      const key = definition.displayName.toLowerCase();
      if (displayNames.has(key)) {
        throw new CatalogError(`Duplicate display name: ${definition.displayName}`);
      }
      byId.set(definition.id, Object.freeze({ ...definition, next: Object.freeze([...definition.next]) }));
      displayNames.add(key);
    }

    for (const definition of byId.values()) {
      const unknown = definition.next.filter((id) => !byId.has(id));
      if (unknown.length > 0) {
        throw new CatalogError(`Loop ${definition.id} suggests unknown loop(s): ${unknown.join(", ")}`);
      }
    }

    this.byId = byId;
  }

  static fromData(data: unknown): LoopCatalog {
    const parsed = LoopCatalogFile.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? issue.path.join(".") : "";
      throw new CatalogError(`Invalid loop catalog${where ? ` at ${where}` : ""}: ${issue?.message ?? "unknown error"}`);
    }

    return new LoopCatalog(
      Object.entries(parsed.data).map(([id, entry]) => ({
        id,
        displayName: entry.display_name,
        abbrev: entry.abbrev,
        category: entry.category,
        description: entry.description,
        next: entry.next
      }))
    );
  }

  get size(): number {
    return this.byId.size;
  }

  all(): LoopDefinition[] {
    return [...this.byId.values()];
  }

  ids(): string[] {
    return [...this.byId.keys()];
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  get(id: string): LoopDefinition {
    const definition = this.byId.get(id);
    if (!definition) {
      throw new LoopNotFoundError(id, this.all());
    }
    return definition;
  }

  /**
   * Resolve user input to a canonical loop id.
   *
   * The input is first normalized (trimmed, lowercased, spaces to hyphens)
   * and matched against ids. Failing that, the raw input is compared
   * case-insensitively with display names, first match wins.
   */
  resolve(input: string): string {
    const normalized = input.trim().toLowerCase().replace(/ /g, "-");
    if (this.byId.has(normalized)) {
      return normalized;
    }

    const wanted = input.toLowerCase();
    for (const definition of this.byId.values()) {
      if (definition.displayName.toLowerCase() === wanted) {
        return definition.id;
      }
    }

    throw new LoopNotFoundError(input, this.all());
  }

  /** Loops grouped by category in display order, ids sorted within a group. */
  byCategory(): Array<{ category: LoopCategory; loops: LoopDefinition[] }> {
    return LOOP_CATEGORIES.map((category) => ({
      category,
      loops: this.all()
        .filter((loop) => loop.category === category)
        .sort((a, b) => a.id.localeCompare(b.id))
    })).filter((group) => group.loops.length > 0);
  }

  suggestNext(id: string): LoopDefinition[] {
    return this.get(id).next.map((nextId) => this.get(nextId));
  }
}

export function validateLoopName(catalog: LoopCatalog, input: string): string {
  return catalog.resolve(input);
}

export async function loadLoopCatalog(catalogPath: string = DEFAULT_CATALOG_PATH): Promise<LoopCatalog> {
  const content = await fs.readFile(catalogPath, "utf-8");
  let data: unknown;
  try {
    data = YAML.parse(content);
  } catch (err) {
    throw new CatalogError(`Cannot parse ${catalogPath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return LoopCatalog.fromData(data ?? {});
}
