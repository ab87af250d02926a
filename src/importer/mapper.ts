import type { TopicNode } from "../types/index.js";
import type { Instruction, Process, Step, Task } from "./schemas.js";
import { TopicTypeRegistry, type TopicLevel } from "./topic-types.js";
import { log } from "../utils/logger.js";

/** Part that holds an instruction's text. */
export const CONTENT_PART = "contentPart";

interface NodeFields {
  id: string;
  title: string;
  description?: string;
  topicType?: string;
  tags: string[];
}

/**
 * Maps a validated process document to a topic tree.
 *
 * The process becomes the single root; its tasks and then its steps become
 * children, steps own their instructions.
 */
export class ProcessMapper {
  constructor(private readonly types: TopicTypeRegistry = TopicTypeRegistry.fromFile()) {}

  mapProcess(process: Process): TopicNode[] {
    const children: TopicNode[] = [
      ...process.tasks.map((task) => this.mapTask(task, process.id)),
      ...process.steps.map((step) => this.mapStep(step, process.id)),
    ];
    const root = this.node("process", process, null, children);
    log("DEBUG", `Mapped process ${process.id} to 1 root topic with ${children.length} children`);
    return [root];
  }

  private mapTask(task: Task, parentId: string): TopicNode {
    const children = task.steps.map((step) => this.mapStep(step, task.id));
    return this.node("task", task, parentId, children);
  }

  private mapStep(step: Step, parentId: string): TopicNode {
    const children = step.instructions.map((instruction) =>
      this.mapInstruction(instruction, step.id),
    );
    return this.node("step", step, parentId, children);
  }

  private mapInstruction(instruction: Instruction, parentId: string): TopicNode {
    const parts = instruction.content !== undefined
      ? { [CONTENT_PART]: { text: instruction.content } }
      : {};
    return this.node("instruction", instruction, parentId, [], parts);
  }

  private node(
    level: TopicLevel,
    fields: NodeFields,
    parentId: string | null,
    children: TopicNode[],
    parts: Record<string, unknown> = {},
  ): TopicNode {
    return {
      id: fields.id,
      title: fields.title,
      topicTypeId: this.types.resolve(level, fields.topicType).key,
      parentId,
      children,
      tags: [...new Set(fields.tags)],
      metadata: fields.description !== undefined ? { description: fields.description } : {},
      parts,
      relations: [],
    };
  }
}
