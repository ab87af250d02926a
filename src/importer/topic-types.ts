import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ConfigError } from "../utils/errors.js";

// data/ sits beside src/ and dist/
const projectRoot = join(dirname(fileURLToPath(import.meta.url)), "..", "..");
export const TOPIC_TYPES_FILE = join(projectRoot, "data", "topic-types.json");

const TopicTypeSchema = z.object({
  key: z.string().min(1),
  title: z.string().min(1),
  displayName: z.string(),
  namespace: z.string(),
});

export type TopicType = z.infer<typeof TopicTypeSchema>;

export type TopicLevel = "process" | "task" | "step" | "instruction";

/** Topic type used for each document level when none (or an unknown one) is given. */
export const LEVEL_DEFAULTS: Readonly<Record<TopicLevel, string>> = {
  process: "Digitale Coach Homepagina",
  task: "Task",
  step: "Digitale Coach Stap",
  instruction: "Digitale Coach Instructie",
};

/**
 * Topic types indexed by title.
 */
export class TopicTypeRegistry {
  private readonly byTitle: Map<string, TopicType>;

  constructor(types: readonly TopicType[]) {
    this.byTitle = new Map(types.map((t) => [t.title, t]));
    for (const title of Object.values(LEVEL_DEFAULTS)) {
      if (!this.byTitle.has(title)) {
        throw new ConfigError(`topic type registry lacks the default type "${title}"`);
      }
    }
  }

  static fromFile(file: string = TOPIC_TYPES_FILE): TopicTypeRegistry {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(file, "utf-8"));
    } catch (error) {
      throw new ConfigError(
        `cannot read topic types from ${file}`,
        error instanceof Error ? error : undefined,
      );
    }
    const parsed = z.array(TopicTypeSchema).safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(`invalid topic types file ${file}: ${parsed.error.issues[0]?.message ?? "unknown issue"}`);
    }
    return new TopicTypeRegistry(parsed.data);
  }

  get size(): number {
    return this.byTitle.size;
  }

  find(title: string): TopicType | undefined {
    return this.byTitle.get(title);
  }

  /** Resolve a requested type title, falling back to the level's default. */
  resolve(level: TopicLevel, title?: string): TopicType {
    const requested = title !== undefined ? this.byTitle.get(title) : undefined;
    if (requested) return requested;

    const fallback = this.byTitle.get(LEVEL_DEFAULTS[level]);
    if (!fallback) {
      throw new ConfigError(`no topic type for level ${level}`);
    }
    return fallback;
  }
}
