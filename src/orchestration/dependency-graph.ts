import { FatalDeploymentError } from '../errors';

export interface GraphNode {
  id: string;
  dependsOn: readonly string[];
}

/**
 * Stable topological sort: among the nodes whose dependencies are satisfied,
 * the one declared first goes next. Duplicate ids, unknown dependencies and
 * cycles are rejected.
 */
export function topologicalOrder<T extends GraphNode>(nodes: readonly T[]): T[] {
  const ids = new Set<string>();
  for (const node of nodes) {
    if (ids.has(node.id)) {
      throw new FatalDeploymentError(`Duplicate step ${node.id}`, node.id);
    }
    ids.add(node.id);
  }

  for (const node of nodes) {
    const unknown = node.dependsOn.find(dependency => !ids.has(dependency));
    if (unknown !== undefined) {
      throw new FatalDeploymentError(`Step ${node.id} depends on unknown step ${unknown}`, node.id);
    }
  }

  const ordered: T[] = [];
  const placed = new Set<string>();
  const remaining = [...nodes];

  while (remaining.length > 0) {
    const index = remaining.findIndex(node => node.dependsOn.every(dependency => placed.has(dependency)));
    if (index === -1) {
      const cycle = remaining.map(node => node.id).join(', ');
      throw new FatalDeploymentError(`Dependency cycle between steps: ${cycle}`);
    }
    const [next] = remaining.splice(index, 1);
    ordered.push(next);
    placed.add(next.id);
  }

  return ordered;
}
