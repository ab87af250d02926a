import type { DeleteOutcome, TopicNode } from "../types/index.js";
import type { TopicApi } from "../api/topics.js";
import { ApiError } from "../api/errors.js";
import { log } from "../utils/logger.js";
import { ancestorIds, assertTreeIntegrity, indexTree, planCascadeDelete } from "./traversal.js";

export interface DeleteReport {
  outcomes: DeleteOutcome[];
  deleted: number;
  absent: number;
  failed: number;
  blocked: number;
}

/**
 * Removes a locally known topic tree from the service, children before parents.
 *
 * A 404 counts as already removed. Any other API failure leaves the node in
 * place, so every ancestor is marked blocked and skipped; sibling subtrees
 * are still attempted.
 */
export class CascadeDeleter {
  constructor(private readonly api: TopicApi) {}

  async deleteTopics(roots: readonly TopicNode[]): Promise<DeleteReport> {
    assertTreeIntegrity(roots);

    const order = planCascadeDelete(roots);
    const index = indexTree(roots);
    const blocked = new Map<string, string>();
    const outcomes: DeleteOutcome[] = [];

    log("INFO", `Cascade delete started: ${order.length} topic(s)`);

    for (const node of order) {
      const blocker = blocked.get(node.id);
      if (blocker !== undefined) {
        outcomes.push({ topicId: node.id, status: "blocked" });
        log("WARN", `Not deleting ${node.id}: descendant ${blocker} is still present`);
        continue;
      }

      const outcome = await this.deleteTopic(node);
      outcomes.push(outcome);

      if (outcome.status === "failed") {
        for (const id of ancestorIds(index, node)) {
          if (!blocked.has(id)) blocked.set(id, node.id);
        }
      }
    }

    const report = summarizeDeletes(outcomes);
    log(
      report.failed > 0 ? "WARN" : "INFO",
      `Cascade delete finished: ${report.deleted} deleted, ${report.absent} already absent, ` +
        `${report.failed} failed, ${report.blocked} blocked`,
    );
    return report;
  }

  private async deleteTopic(node: TopicNode): Promise<DeleteOutcome> {
    try {
      await this.api.deleteTopic(node.id);
      log("DEBUG", `Deleted ${node.id}`);
      return { topicId: node.id, status: "deleted" };
    } catch (error) {
      if (!(error instanceof ApiError)) {
        throw error;
      }
      if (error.status === 404) {
        log("DEBUG", `${node.id} already absent`);
        return { topicId: node.id, status: "absent" };
      }
      log("ERROR", `Failed to delete ${node.title} (${node.id}): ${error.message}`);
      return { topicId: node.id, status: "failed", error };
    }
  }
}

export function summarizeDeletes(outcomes: DeleteOutcome[]): DeleteReport {
  const count = (status: DeleteOutcome["status"]): number =>
    outcomes.filter((o) => o.status === status).length;
  return {
    outcomes,
    deleted: count("deleted"),
    absent: count("absent"),
    failed: count("failed"),
    blocked: count("blocked"),
  };
}
