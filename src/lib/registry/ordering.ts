/**
 * Emission ordering over the model dependency graph
 */

import type { ModelId } from "../../types/canonical-type.js";
import type { DependencyGraph } from "../../types/model.js";

/**
 * Tarjan's strongly connected components. Components come out
 * dependencies-first: a component is emitted after every component it
 * reaches. Nodes are visited in the given order for stable output.
 */
export function stronglyConnectedComponents(
  nodes: readonly ModelId[],
  successors: (id: ModelId) => readonly ModelId[],
): ModelId[][] {
  let counter = 0;
  const index = new Map<ModelId, number>();
  const lowLink = new Map<ModelId, number>();
  const onStack = new Set<ModelId>();
  const stack: ModelId[] = [];
  const components: ModelId[][] = [];

  const visit = (id: ModelId): void => {
    index.set(id, counter);
    lowLink.set(id, counter);
    counter++;
    stack.push(id);
    onStack.add(id);

    for (const next of successors(id)) {
      if (!index.has(next)) {
        visit(next);
        lowLink.set(id, Math.min(lowLink.get(id) ?? 0, lowLink.get(next) ?? 0));
      } else if (onStack.has(next)) {
        lowLink.set(id, Math.min(lowLink.get(id) ?? 0, index.get(next) ?? 0));
      }
    }

    if (lowLink.get(id) === index.get(id)) {
      const component: ModelId[] = [];
      let member: ModelId | undefined;
      do {
        member = stack.pop();
        if (member === undefined) {
          break;
        }
        onStack.delete(member);
        component.push(member);
      } while (member !== id);
      components.push(component);
    }
  };

  for (const id of nodes) {
    if (!index.has(id)) {
      visit(id);
    }
  }
  return components;
}

/**
 * Order one component: bases before subclasses, otherwise by rank.
 * Members left over by a base cycle follow in rank order.
 */
export function orderComponent(
  component: readonly ModelId[],
  basesOf: (id: ModelId) => readonly ModelId[],
  rank: (id: ModelId) => number,
): ModelId[] {
  const members = new Set(component);
  const byRank = [...component].sort((a, b) => rank(a) - rank(b));
  const pending = new Map<ModelId, number>();
  for (const id of byRank) {
    pending.set(
      id,
      basesOf(id).filter((base) => base !== id && members.has(base)).length,
    );
  }

  const ordered: ModelId[] = [];
  const done = new Set<ModelId>();
  let progressed = true;
  while (progressed) {
    progressed = false;
    for (const id of byRank) {
      if (done.has(id) || (pending.get(id) ?? 0) > 0) {
        continue;
      }
      ordered.push(id);
      done.add(id);
      progressed = true;
      for (const other of byRank) {
        if (!done.has(other) && basesOf(other).includes(id)) {
          pending.set(other, (pending.get(other) ?? 0) - 1);
        }
      }
      break;
    }
  }
  for (const id of byRank) {
    if (!done.has(id)) {
      ordered.push(id);
    }
  }
  return ordered;
}

export function emissionOrder(
  graph: DependencyGraph,
  rank: (id: ModelId) => number,
): ModelId[] {
  const successors = new Map<ModelId, ModelId[]>();
  const bases = new Map<ModelId, ModelId[]>();
  for (const edge of graph.edges) {
    if (edge.from === edge.to) {
      continue;
    }
    const list = successors.get(edge.from) ?? [];
    if (!list.includes(edge.to)) {
      list.push(edge.to);
    }
    successors.set(edge.from, list);
    if (edge.kind === "base") {
      bases.set(edge.from, [...(bases.get(edge.from) ?? []), edge.to]);
    }
  }

  const components = stronglyConnectedComponents(
    graph.nodes,
    (id) => successors.get(id) ?? [],
  );
  return components.flatMap((component) =>
    orderComponent(component, (id) => bases.get(id) ?? [], rank),
  );
}

/**
 * For every model, the models it references that are declared after it
 */
export function forwardReferences(
  order: readonly ModelId[],
  graph: DependencyGraph,
): Map<ModelId, ModelId[]> {
  const position = new Map(order.map((id, index) => [id, index]));
  const forward = new Map<ModelId, ModelId[]>();
  for (const edge of graph.edges) {
    const from = position.get(edge.from);
    const to = position.get(edge.to);
    if (from === undefined || to === undefined || to <= from) {
      continue;
    }
    const list = forward.get(edge.from) ?? [];
    if (!list.includes(edge.to)) {
      list.push(edge.to);
    }
    forward.set(edge.from, list);
  }
  return forward;
}
