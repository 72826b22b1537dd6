/**
 * Dependency ordering.
 */

import { CycleError } from './types.js';

const VISITING = 1;
const VISITED = 2;

type Node = string | number;

function compareNodes<T extends Node>(a: T, b: T): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

/**
 * Topologically sort a dependency graph given as `{node: [nodes it depends on]}`.
 * Every node comes after all of its dependencies. Nodes that only appear as
 * dependencies are included too.
 *
 * When several orders are valid the result is still deterministic: nodes are
 * visited in sorted order and dependencies in the order they're listed.
 *
 * @throws {CycleError} If the graph has a cycle; the error lists its members.
 *
 * @example
 * ```ts
 * topoSort(new Map([['app', ['lib']], ['lib', ['util']]]));
 * // ['util', 'lib', 'app']
 * ```
 */
export function topoSort<T extends Node>(edges: ReadonlyMap<T, readonly T[]>): T[] {
  const nodes = new Set<T>();
  for (const [node, deps] of edges) {
    nodes.add(node);
    for (const d of deps) nodes.add(d);
  }

  const state = new Map<T, number>();
  const out: T[] = [];

  // Depth-first with an explicit stack.
  for (const start of [...nodes].sort(compareNodes)) {
    if (state.has(start)) continue;
    const stack: { node: T; next: number }[] = [{ node: start, next: 0 }];
    state.set(start, VISITING);

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      const deps = edges.get(frame.node) ?? [];
      if (frame.next < deps.length) {
        const dep = deps[frame.next++];
        const s = state.get(dep);
        if (s === VISITED) continue;
        if (s === VISITING) {
          const path = stack.map((f) => f.node);
          throw new CycleError(path.slice(path.indexOf(dep)).map(String));
        }
        state.set(dep, VISITING);
        stack.push({ node: dep, next: 0 });
      } else {
        stack.pop();
        state.set(frame.node, VISITED);
        out.push(frame.node);
      }
    }
  }
  return out;
}
