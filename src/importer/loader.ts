import { readFile } from "node:fs/promises";
import type { TopicNode } from "../types/index.js";
import { ProcessDocumentSchema } from "./schemas.js";
import { ProcessMapper } from "./mapper.js";
import { assertTreeIntegrity, countTopics } from "./traversal.js";
import { ConfigError, ProcessValidationError } from "../utils/errors.js";
import { log } from "../utils/logger.js";

/**
 * Validate raw JSON as a process document and map it to a topic tree.
 *
 * @throws ProcessValidationError on schema violations or tree invariant breaches
 */
export function parseProcessDocument(
  data: unknown,
  mapper: ProcessMapper = new ProcessMapper(),
): TopicNode[] {
  const result = ProcessDocumentSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.map(String).join(".") || "(root)"}: ${issue.message}`,
    );
    throw new ProcessValidationError(issues.join("; "), issues);
  }

  const roots = mapper.mapProcess(result.data.process);
  assertTreeIntegrity(roots);
  return roots;
}

/**
 * Read a process document from disk (UTF-8, optional BOM).
 */
export async function loadProcessFile(
  file: string,
  mapper?: ProcessMapper,
): Promise<TopicNode[]> {
  let text: string;
  try {
    text = await readFile(file, "utf-8");
  } catch (error) {
    throw new ConfigError(
      `cannot read process document ${file}`,
      error instanceof Error ? error : undefined,
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(text.replace(/^\uFEFF/, ""));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ProcessValidationError(`${file} is not valid JSON (${reason})`);
  }

  const roots = parseProcessDocument(data, mapper);
  log("INFO", `Loaded ${file}: ${countTopics(roots)} topic(s)`);
  return roots;
}
