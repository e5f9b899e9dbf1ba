/**
 * Small undirected graph keyed by integer node ids.
 * Adjacency is index based: nodes never hold references to each other, so
 * cyclic structures (rings) need no special ownership handling.
 */
export class Graph<TNode> {
  private nodes = new Map<number, TNode>();
  private adjacency = new Map<number, Set<number>>();
  private edgeCountValue = 0;

  /**
   * Add a node, or replace the data of an existing one.
   */
  addNode(id: number, data: TNode): void {
    this.nodes.set(id, data);
    if (!this.adjacency.has(id)) {
      this.adjacency.set(id, new Set());
    }
  }

  /**
   * Add an undirected edge between two existing nodes.
   * @returns False when either node is missing or the edge already exists
   */
  addEdge(from: number, to: number): boolean {
    const fromAdj = this.adjacency.get(from);
    const toAdj = this.adjacency.get(to);
    if (!fromAdj || !toAdj || fromAdj.has(to)) return false;

    fromAdj.add(to);
    toAdj.add(from);
    this.edgeCountValue++;
    return true;
  }

  hasNode(id: number): boolean {
    return this.nodes.has(id);
  }

  hasEdge(from: number, to: number): boolean {
    return this.adjacency.get(from)?.has(to) ?? false;
  }

  getNodeData(id: number): TNode | undefined {
    return this.nodes.get(id);
  }

  /**
   * Get all node ids, in insertion order.
   */
  getNodes(): number[] {
    return Array.from(this.nodes.keys());
  }

  /**
   * Get neighbours of a node in ascending id order.
   * @returns Empty array for unknown nodes
   */
  getNeighbors(id: number): number[] {
    const adj = this.adjacency.get(id);
    if (!adj) return [];
    return Array.from(adj).sort((a, b) => a - b);
  }

  nodeCount(): number {
    return this.nodes.size;
  }

  edgeCount(): number {
    return this.edgeCountValue;
  }
}

export interface TraversalOptions {
  /** Only nodes in this set are visited (the start node is always visited). */
  within?: ReadonlySet<number>;
  /** Treat this edge as absent. */
  excludeEdge?: readonly [number, number];
  /** Stop expanding past this many hops from the start. */
  maxDepth?: number;
}

function isExcluded(edge: readonly [number, number] | undefined, a: number, b: number): boolean {
  if (!edge) return false;
  return (edge[0] === a && edge[1] === b) || (edge[0] === b && edge[1] === a);
}

/**
 * Breadth-first traversal recording the hop distance of every reached node.
 * Frontier order is ascending node id, so results are deterministic.
 * @returns Map of node id to distance from the start (start included at 0)
 */
export function bfsDistances<TNode>(
  graph: Graph<TNode>,
  startNode: number,
  options: TraversalOptions = {}
): Map<number, number> {
  const distances = new Map<number, number>();
  if (!graph.hasNode(startNode)) return distances;

  const { within, excludeEdge, maxDepth = Infinity } = options;
  distances.set(startNode, 0);
  let frontier = [startNode];
  let depth = 0;

  while (frontier.length > 0 && depth < maxDepth) {
    depth++;
    const next: number[] = [];
    for (const node of frontier) {
      for (const neighbor of graph.getNeighbors(node)) {
        if (distances.has(neighbor)) continue;
        if (within && !within.has(neighbor)) continue;
        if (isExcluded(excludeEdge, node, neighbor)) continue;
        distances.set(neighbor, depth);
        next.push(neighbor);
      }
    }
    frontier = next;
  }

  return distances;
}

/**
 * Find shortest path between two nodes using BFS.
 * @returns Node ids from start to end inclusive, or null if no path exists
 */
export function findShortestPath<TNode>(
  graph: Graph<TNode>,
  startNode: number,
  endNode: number,
  options: Omit<TraversalOptions, 'maxDepth'> = {}
): number[] | null {
  if (!graph.hasNode(startNode) || !graph.hasNode(endNode)) return null;
  if (startNode === endNode) return [startNode];

  const { within, excludeEdge } = options;
  const parents = new Map<number, number>();
  const visited = new Set<number>([startNode]);
  const queue: number[] = [startNode];
  let head = 0;

  while (head < queue.length) {
    const node = queue[head++];
    if (node === undefined) break;

    for (const neighbor of graph.getNeighbors(node)) {
      if (visited.has(neighbor)) continue;
      if (isExcluded(excludeEdge, node, neighbor)) continue;
      if (within && !within.has(neighbor) && neighbor !== endNode) continue;

      visited.add(neighbor);
      parents.set(neighbor, node);
      if (neighbor === endNode) {
        return tracePath(parents, startNode, endNode);
      }
      queue.push(neighbor);
    }
  }

  return null;
}

function tracePath(parents: Map<number, number>, startNode: number, endNode: number): number[] {
  const path = [endNode];
  let current = endNode;
  while (current !== startNode) {
    const parent = parents.get(current);
    if (parent === undefined) break;
    path.push(parent);
    current = parent;
  }
  return path.reverse();
}
