import type { ImportOutcome, ImportState, TopicNode } from "../types/index.js";
import type { TopicApi } from "../api/topics.js";
import type { CreateTopicRequest } from "../api/types.js";
import { ApiError, isApiError } from "../api/errors.js";
import { log } from "../utils/logger.js";
import { assertTreeIntegrity, planImport } from "./traversal.js";

export interface TopicImporterOptions {
  /** Issue updates right after create, without checkout/checkin. */
  skipCheckoutCheckin?: boolean;
  /** Treat 409 on create as "already there" (the caller cleared or replaces the tree). */
  replaceExisting?: boolean;
  checkinComment?: string;
}

export interface ImportReport {
  outcomes: ImportOutcome[];
  succeeded: number;
  failed: number;
  skipped: number;
}

// Thrown inside one node's workflow to carry the state reached so far
class NodeFailure extends Error {
  constructor(
    readonly state: ImportState,
    readonly error: ApiError,
  ) {
    super(error.message);
    this.name = "NodeFailure";
  }
}

/**
 * Drives each topic through absent → created → checked-out → updated → checked-in,
 * in pre-order. An API failure ends that topic's workflow and abandons its
 * subtree; siblings and the rest of the tree continue. Any other error
 * (authentication, network) aborts the whole run.
 *
 * When an update fails on a checked-out topic, a checkin is still attempted.
 * The outcome keeps the update's error and the state "checked-out".
 */
export class TopicImporter {
  private readonly skipCheckoutCheckin: boolean;
  private readonly replaceExisting: boolean;
  private readonly checkinComment?: string;

  constructor(
    private readonly api: TopicApi,
    options: TopicImporterOptions = {},
  ) {
    this.skipCheckoutCheckin = options.skipCheckoutCheckin ?? false;
    this.replaceExisting = options.replaceExisting ?? false;
    this.checkinComment = options.checkinComment;
  }

  async importTopics(roots: readonly TopicNode[]): Promise<ImportReport> {
    assertTreeIntegrity(roots);

    const steps = planImport(roots);
    log("INFO", `Import started: ${steps.length} topic(s) under ${roots.length} root(s)`);

    const outcomes: ImportOutcome[] = [];
    const abandoned = new Set<string>();

    for (const { node, depth } of steps) {
      const indent = "  ".repeat(depth);

      if (node.parentId !== null && abandoned.has(node.parentId)) {
        abandoned.add(node.id);
        outcomes.push({ topicId: node.id, title: node.title, state: "absent", status: "skipped" });
        log("WARN", `${indent}Skipped ${node.id}: parent ${node.parentId} did not import`);
        continue;
      }

      const outcome = await this.importTopic(node, indent);
      outcomes.push(outcome);
      if (outcome.status === "failed") {
        abandoned.add(node.id);
      }
    }

    const report = summarize(outcomes);
    log(
      report.failed > 0 ? "WARN" : "INFO",
      `Import finished: ${report.succeeded} succeeded, ${report.failed} failed, ${report.skipped} skipped`,
    );
    return report;
  }

  private async importTopic(node: TopicNode, indent: string): Promise<ImportOutcome> {
    try {
      const state = await this.runWorkflow(node, indent);
      log("INFO", `${indent}✓ ${node.title} (${node.id}) → ${state}`);
      return { topicId: node.id, title: node.title, state, status: "succeeded" };
    } catch (error) {
      if (!(error instanceof NodeFailure)) {
        throw error;
      }
      log("ERROR", `${indent}✗ ${node.title} (${node.id}) failed after ${error.state}: ${error.error.message}`);
      return {
        topicId: node.id,
        title: node.title,
        state: error.state,
        status: "failed",
        error: error.error,
      };
    }
  }

  private async runWorkflow(node: TopicNode, indent: string): Promise<ImportState> {
    let state: ImportState = "absent";

    const step = async (next: ImportState, action: () => Promise<void>): Promise<void> => {
      try {
        await action();
      } catch (error) {
        if (error instanceof ApiError) {
          throw new NodeFailure(state, error);
        }
        throw error;
      }
      state = next;
    };

    await step("created", () => this.create(node, indent));

    if (!this.skipCheckoutCheckin) {
      await step("checked-out", () => this.checkout(node, indent));
    }

    if (hasUpdates(node)) {
      try {
        await step("updated", () => this.applyUpdates(node, indent));
      } catch (error) {
        if (error instanceof NodeFailure && error.state === "checked-out") {
          await this.releaseCheckout(node, indent);
        }
        throw error;
      }
    }

    if (!this.skipCheckoutCheckin) {
      await step("checked-in", async () => {
        log("DEBUG", `${indent}  → checkin`);
        await this.api.checkin(node.id, this.checkinComment);
      });
    }

    return state;
  }

  private async create(node: TopicNode, indent: string): Promise<void> {
    const request: CreateTopicRequest = {
      topicId: node.id,
      topicTitle: node.title,
      topicTypeId: node.topicTypeId,
      copyParentTags: false,
      ...(node.parentId !== null ? { parentTopicId: node.parentId } : {}),
    };

    try {
      const result = await this.api.createTopic(request);
      const version = result.topicVersionId ?? result.topicVersionKey;
      log("DEBUG", `${indent}  → created${version ? ` (version ${version})` : ""}`);
    } catch (error) {
      if (this.replaceExisting && isApiError(error, 409)) {
        log("DEBUG", `${indent}  → already exists, continuing`);
        return;
      }
      throw error;
    }
  }

  private async checkout(node: TopicNode, indent: string): Promise<void> {
    try {
      await this.api.checkout(node.id);
      log("DEBUG", `${indent}  → checked out`);
    } catch (error) {
      if (isApiError(error, 409)) {
        log("DEBUG", `${indent}  → already checked out`);
        return;
      }
      throw error;
    }
  }

  // Check in after a failed update so the topic is not left locked
  private async releaseCheckout(node: TopicNode, indent: string): Promise<void> {
    try {
      await this.api.checkin(node.id, this.checkinComment);
      log("DEBUG", `${indent}  → checked in after failed update`);
    } catch (error) {
      if (!(error instanceof ApiError)) {
        throw error;
      }
      log("WARN", `${indent}  Could not check ${node.id} back in: ${error.message}`);
    }
  }

  private async applyUpdates(node: TopicNode, indent: string): Promise<void> {
    if (Object.keys(node.metadata).length > 0) {
      log("DEBUG", `${indent}  → metadata`);
      await this.api.updateMetadata(node.id, node.metadata);
    }
    for (const [name, content] of Object.entries(node.parts)) {
      log("DEBUG", `${indent}  → part ${name}`);
      await this.api.updatePart(node.id, name, content);
    }
    for (const tag of node.tags) {
      log("DEBUG", `${indent}  → tag ${tag}`);
      await this.api.addTag(node.id, tag);
    }
    for (const relation of node.relations) {
      log("DEBUG", `${indent}  → relation ${relation.relationTypeId}`);
      await this.api.addRelation(node.id, relation.relationTypeId, [...relation.targetTopicIds]);
    }
  }
}

export function hasUpdates(node: TopicNode): boolean {
  return (
    Object.keys(node.metadata).length > 0 ||
    Object.keys(node.parts).length > 0 ||
    node.tags.length > 0 ||
    node.relations.length > 0
  );
}

export function summarize(outcomes: ImportOutcome[]): ImportReport {
  return {
    outcomes,
    succeeded: outcomes.filter((o) => o.status === "succeeded").length,
    failed: outcomes.filter((o) => o.status === "failed").length,
    skipped: outcomes.filter((o) => o.status === "skipped").length,
  };
}
