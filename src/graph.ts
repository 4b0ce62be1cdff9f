/**
 * Shared graph representation.
 *
 * Every graph in this package is a node arena plus a list of typed edges that
 * reference nodes by index. Cycles (loops, recursion, circular imports) are just
 * index pairs, so no graph ever needs owning references between nodes.
 */

export interface GraphEdge<K extends string = string> {
  /** Index of the source node */
  from: number;
  /** Index of the target node */
  to: number;
  kind: K;
}

export interface Graph<N, E extends GraphEdge> {
  /** Node arena; a node's id is its index */
  nodes: N[];
  edges: E[];
}

/**
 * Outgoing/incoming edge indices per node
 */
export interface Adjacency {
  outgoing: number[][];
  incoming: number[][];
}

export interface TraversalOptions<E extends GraphEdge> {
  direction?: 'forward' | 'backward';
  /** Only follow edges accepted by this predicate */
  edgeFilter?: (edge: E) => boolean;
  /** Nodes that are never entered (unless they are a start node) */
  stopAt?: ReadonlySet<number>;
  /** Pre-computed adjacency, reused across many traversals */
  adjacency?: Adjacency;
}

export function buildAdjacency<N, E extends GraphEdge>(graph: Graph<N, E>): Adjacency {
  const outgoing: number[][] = graph.nodes.map(() => []);
  const incoming: number[][] = graph.nodes.map(() => []);

  graph.edges.forEach((edge, index) => {
    outgoing[edge.from].push(index);
    incoming[edge.to].push(index);
  });

  return { outgoing, incoming };
}

/**
 * Breadth-first reachability. Start nodes are always part of the result.
 */
export function reachableFrom<N, E extends GraphEdge>(
  graph: Graph<N, E>,
  starts: number[],
  options: TraversalOptions<E> = {}
): Set<number> {
  const adjacency = options.adjacency ?? buildAdjacency(graph);
  const backward = options.direction === 'backward';
  const visited = new Set<number>(starts);
  const queue = [...starts];

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;

    const edgeIndices = backward ? adjacency.incoming[current] : adjacency.outgoing[current];
    for (const edgeIndex of edgeIndices) {
      const edge = graph.edges[edgeIndex];
      if (options.edgeFilter && !options.edgeFilter(edge)) continue;

      const next = backward ? edge.from : edge.to;
      if (visited.has(next) || options.stopAt?.has(next)) continue;

      visited.add(next);
      queue.push(next);
    }
  }

  return visited;
}

/**
 * Shortest-path (edge count) distance from `start` to every node reachable from it.
 */
export function bfsDistances<N, E extends GraphEdge>(
  graph: Graph<N, E>,
  start: number,
  adjacency: Adjacency = buildAdjacency(graph)
): Map<number, number> {
  const distances = new Map<number, number>([[start, 0]]);
  const queue = [start];

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    const distance = distances.get(current) ?? 0;

    for (const edgeIndex of adjacency.outgoing[current]) {
      const next = graph.edges[edgeIndex].to;
      if (!distances.has(next)) {
        distances.set(next, distance + 1);
        queue.push(next);
      }
    }
  }

  return distances;
}
