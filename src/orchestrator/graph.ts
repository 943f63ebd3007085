import { SetupError } from "./errors.js";
import type { AgentDescriptor } from "./types.js";

/** Validated predecessor graph of a run. */
export interface DependencyGraph {
  /** Agents in a topological order, ties broken by registration order. */
  readonly order: readonly string[];
  /** Agents that list the key as a predecessor. */
  readonly dependents: ReadonlyMap<string, readonly string[]>;
}

/**
 * Detects directed cycles using depth-first search. Each cycle is reported as
 * the path that closes it, e.g. `["a", "b", "a"]`.
 */
export function detectCycles(adjacency: ReadonlyMap<string, readonly string[]>, limit = 20): string[][] {
  const visiting = new Set<string>();
  const visited = new Set<string>();
  const stack: string[] = [];
  const cycles: string[][] = [];

  const visit = (node: string): void => {
    visiting.add(node);
    stack.push(node);
    for (const next of adjacency.get(node) ?? []) {
      if (cycles.length >= limit) {
        break;
      }
      if (visiting.has(next)) {
        cycles.push(stack.slice(stack.indexOf(next)).concat(next));
        continue;
      }
      if (!visited.has(next)) {
        visit(next);
      }
    }
    visiting.delete(node);
    visited.add(node);
    stack.pop();
  };

  for (const node of adjacency.keys()) {
    if (cycles.length >= limit) {
      break;
    }
    if (!visited.has(node)) {
      visit(node);
    }
  }
  return cycles;
}

/**
 * Builds the predecessor graph and rejects unknown predecessors and cycles
 * with a {@link SetupError}.
 */
export function buildDependencyGraph(descriptors: readonly AgentDescriptor[]): DependencyGraph {
  const names = new Set(descriptors.map((descriptor) => descriptor.name));
  const dependents = new Map<string, string[]>();
  for (const name of names) {
    dependents.set(name, []);
  }

  for (const descriptor of descriptors) {
    for (const { agent } of descriptor.predecessors) {
      const bucket = dependents.get(agent);
      if (!bucket) {
        throw new SetupError(
          "E-SETUP-UNKNOWN",
          `agent '${descriptor.name}' depends on unknown agent '${agent}'`,
          { agent: descriptor.name, predecessor: agent },
        );
      }
      bucket.push(descriptor.name);
    }
  }

  const cycles = detectCycles(dependents);
  if (cycles.length > 0) {
    const rendered = cycles.map((cycle) => cycle.join(" -> "));
    throw new SetupError("E-SETUP-CYCLE", `dependency cycle detected: ${rendered.join("; ")}`, { cycles });
  }

  const remaining = new Map<string, number>();
  for (const descriptor of descriptors) {
    remaining.set(descriptor.name, descriptor.predecessors.length);
  }
  const order: string[] = [];
  const queue = descriptors.filter((descriptor) => descriptor.predecessors.length === 0).map((d) => d.name);
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) {
      break;
    }
    order.push(current);
    for (const dependent of dependents.get(current) ?? []) {
      const left = (remaining.get(dependent) ?? 0) - 1;
      remaining.set(dependent, left);
      if (left === 0) {
        queue.push(dependent);
      }
    }
  }

  return { order, dependents };
}
