import type { TopicNode } from "../types/index.js";
import { ProcessValidationError } from "../utils/errors.js";

export interface ImportStep {
  node: TopicNode;
  depth: number;
}

/**
 * Import order: pre-order (parent before children, siblings in definition
 * order). A child's create call references its parent, which must exist first.
 */
export function planImport(roots: readonly TopicNode[]): ImportStep[] {
  const steps: ImportStep[] = [];
  const stack: ImportStep[] = [...roots].reverse().map((node) => ({ node, depth: 0 }));

  while (stack.length > 0) {
    const step = stack.pop();
    if (!step) break;
    steps.push(step);
    for (let i = step.node.children.length - 1; i >= 0; i--) {
      stack.push({ node: step.node.children[i], depth: step.depth + 1 });
    }
  }

  return steps;
}

/**
 * Delete order: post-order (every child before its parent).
 */
export function planCascadeDelete(roots: readonly TopicNode[]): TopicNode[] {
  const order: TopicNode[] = [];
  const visit = (node: TopicNode): void => {
    for (const child of node.children) {
      visit(child);
    }
    order.push(node);
  };
  roots.forEach(visit);
  return order;
}

/** Map every topic id in the tree to its node. */
export function indexTree(roots: readonly TopicNode[]): Map<string, TopicNode> {
  const index = new Map<string, TopicNode>();
  for (const { node } of planImport(roots)) {
    index.set(node.id, node);
  }
  return index;
}

/** Ids of the ancestors of a node, nearest first. */
export function ancestorIds(index: ReadonlyMap<string, TopicNode>, node: TopicNode): string[] {
  const ids: string[] = [];
  const seen = new Set<string>([node.id]);
  let parentId = node.parentId;
  while (parentId !== null && !seen.has(parentId)) {
    ids.push(parentId);
    seen.add(parentId);
    parentId = index.get(parentId)?.parentId ?? null;
  }
  return ids;
}

export function countTopics(roots: readonly TopicNode[]): number {
  return planImport(roots).length;
}

/**
 * Check the tree invariants: ids unique, every child's parentId equals its
 * container's id, roots have no parent.
 *
 * @throws ProcessValidationError listing every violation
 */
export function assertTreeIntegrity(roots: readonly TopicNode[]): void {
  const issues: string[] = [];
  const seen = new Set<string>();

  for (const root of roots) {
    if (root.parentId !== null) {
      issues.push(`root topic "${root.id}" has parentId "${root.parentId}"`);
    }
  }

  for (const { node } of planImport(roots)) {
    if (seen.has(node.id)) {
      issues.push(`duplicate topic id "${node.id}"`);
    }
    seen.add(node.id);

    for (const child of node.children) {
      if (child.parentId !== node.id) {
        issues.push(
          `topic "${child.id}" is a child of "${node.id}" but has parentId "${child.parentId ?? "null"}"`,
        );
      }
    }
  }

  if (issues.length > 0) {
    throw new ProcessValidationError(issues.join("; "), issues);
  }
}
