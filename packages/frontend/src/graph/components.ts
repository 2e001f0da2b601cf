/**
 * Strongly connected components (Tarjan)
 */

export type Component = readonly string[];

/**
 * Find the strongly connected components of a directed graph.
 *
 * Components come back dependencies-first: every component is listed after
 * all components reachable from it. Members of a component are sorted.
 * Edges to nodes outside `nodes` are ignored. The result depends only on the
 * order of `nodes` and of each edge list, so callers sort both.
 */
export const findStronglyConnectedComponents = (
  nodes: readonly string[],
  edges: ReadonlyMap<string, readonly string[]>
): readonly Component[] => {
  const known = new Set(nodes);
  const index = new Map<string, number>();
  const lowLink = new Map<string, number>();
  const onStack = new Set<string>();
  const stack: string[] = [];
  const components: Component[] = [];
  let counter = 0;

  const visit = (node: string): number => {
    const nodeIndex = counter++;
    index.set(node, nodeIndex);
    let low = nodeIndex;
    stack.push(node);
    onStack.add(node);

    for (const next of edges.get(node) ?? []) {
      if (!known.has(next)) continue;
      const visited = index.get(next);
      if (visited === undefined) {
        low = Math.min(low, visit(next));
      } else if (onStack.has(next)) {
        low = Math.min(low, visited);
      }
    }

    lowLink.set(node, low);
    if (low === nodeIndex) {
      const members: string[] = [];
      for (;;) {
        const member = stack.pop();
        if (member === undefined) break;
        onStack.delete(member);
        members.push(member);
        if (member === node) break;
      }
      components.push(members.sort());
    }
    return low;
  };

  for (const node of nodes) {
    if (!index.has(node)) {
      visit(node);
    }
  }

  return components;
};

/**
 * A component is a cycle when it has several members or a self edge.
 */
export const isCyclicComponent = (
  component: Component,
  edges: ReadonlyMap<string, readonly string[]>
): boolean => {
  if (component.length > 1) return true;
  const only = component[0];
  return only !== undefined && (edges.get(only) ?? []).includes(only);
};
