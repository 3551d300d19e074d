/**
 * Small undirected graph keyed by integer node ids.
 * Molecular graphs use atom ids as nodes and bonds as edges.
 */
export class Graph {
  private adjacency = new Map<number, Set<number>>();

  addNode(id: number): void {
    if (!this.adjacency.has(id)) {
      this.adjacency.set(id, new Set());
    }
  }

  /**
   * Add an undirected edge. Missing endpoints are added as bare nodes.
   */
  addEdge(from: number, to: number): void {
    this.addNode(from);
    this.addNode(to);
    this.adjacency.get(from)?.add(to);
    this.adjacency.get(to)?.add(from);
  }

  hasNode(id: number): boolean {
    return this.adjacency.has(id);
  }

  /**
   * Node ids in insertion order.
   */
  getNodes(): number[] {
    return Array.from(this.adjacency.keys());
  }

  getNeighbors(id: number): number[] {
    return Array.from(this.adjacency.get(id) || []);
  }
}

/**
 * Depth-first traversal from `startNode`.
 * Iterative, so long chains (polymers, large cages) do not exhaust the call stack.
 * @param visited Optional set shared across calls to skip nodes already seen
 * @returns The visited set
 */
export function dfs(
  graph: Graph,
  startNode: number,
  visitCallback?: (nodeId: number) => void,
  visited: Set<number> = new Set()
): Set<number> {
  if (visited.has(startNode)) return visited;

  const stack: number[] = [startNode];
  while (stack.length > 0) {
    const nodeId = stack.pop();
    if (nodeId === undefined || visited.has(nodeId)) continue;

    visited.add(nodeId);
    visitCallback?.(nodeId);

    const neighbors = graph.getNeighbors(nodeId);
    for (let i = neighbors.length - 1; i >= 0; i--) {
      const neighbor = neighbors[i];
      if (neighbor !== undefined && !visited.has(neighbor)) {
        stack.push(neighbor);
      }
    }
  }

  return visited;
}

/**
 * Find all connected components in the graph.
 * Components come out in the order of their first node; ids inside a component are sorted ascending.
 */
export function findConnectedComponents(graph: Graph): number[][] {
  const visited = new Set<number>();
  const components: number[][] = [];

  for (const nodeId of graph.getNodes()) {
    if (!visited.has(nodeId)) {
      const component: number[] = [];
      dfs(graph, nodeId, id => component.push(id), visited);
      components.push(component.sort((a, b) => a - b));
    }
  }

  return components;
}
