/**
 * DOT Renderer - Generates DOT format output for any graph document.
 *
 * The DOT format can be rendered using Graphviz (https://graphviz.org/):
 *
 *   codegraph control-flow src/app.ts --format dot > app.dot
 *   dot -Tsvg app.dot -o app.svg
 *
 * Node shape and colour encode the node's kind and the analyzers' findings,
 * both read from the document's attributes.
 */

import type { DocumentEdge, DocumentNode, GraphDocument, GraphType } from './graph-document';

export interface DotOptions {
  /** Title for the graph; defaults to the graph type */
  title?: string;
  /** Use left-to-right layout instead of top-to-bottom */
  leftToRight?: boolean;
  /** Include unreachable CFG blocks (shown in gray) */
  showUnreachable?: boolean;
}

const GRAPH_NAMES: Record<GraphType, string> = {
  'syntax-tree': 'SyntaxTree',
  'control-flow': 'CFG',
  'data-flow': 'DFG',
  'call-graph': 'CallGraph',
  'dependency-graph': 'Dependencies',
  'program-dependency': 'PDG',
};

export function documentToDot(document: GraphDocument, options: DotOptions = {}): string {
  const { title = document.graphType, leftToRight = false, showUnreachable = true } = options;
  const hidden = new Set(
    showUnreachable ? [] : document.nodes.filter((node) => node.reachable === false).map((node) => node.id)
  );

  const lines: string[] = [];

  // Graph header
  lines.push(`digraph ${GRAPH_NAMES[document.graphType]} {`);
  lines.push(`  label="${escapeLabel(title)}";`);
  lines.push('  labelloc="t";');
  lines.push('  fontsize=16;');
  lines.push(`  rankdir="${leftToRight ? 'LR' : 'TB'}";`);
  lines.push('  node [fontname="monospace", fontsize=10];');
  lines.push('  edge [fontname="monospace", fontsize=9];');
  lines.push('');

  for (const node of document.nodes) {
    if (hidden.has(node.id)) continue;
    const label = typeof node.label === 'string' ? node.label : node.kind;
    lines.push(`  "${node.id}" [label="${escapeLabel(label)}"${formatAttributes(nodeAttributes(document.graphType, node))}];`);
  }

  lines.push('');

  for (const { edge, attributes } of styledEdges(document)) {
    if (hidden.has(edge.from) || hidden.has(edge.to)) continue;
    lines.push(`  "${edge.from}" -> "${edge.to}"${attributes.length > 0 ? ` [${attributes.join(', ')}]` : ''};`);
  }

  lines.push('}');

  return lines.join('\n');
}

function formatAttributes(attrs: string[]): string {
  return attrs.length > 0 ? `, ${attrs.join(', ')}` : '';
}

function filled(shape: string, color: string): string[] {
  return [`shape=${shape}`, `fillcolor="${color}"`, 'style=filled'];
}

/**
 * DOT attributes for a node based on its kind and findings.
 */
function nodeAttributes(graphType: GraphType, node: DocumentNode): string[] {
  switch (graphType) {
    case 'control-flow':
      if (node.reachable === false) {
        return ['shape=box', 'fillcolor="#eeeeee"', 'style="filled,dashed"', 'fontcolor="#888888"'];
      }
      switch (node.kind) {
        case 'entry':
          return filled('ellipse', '#90EE90'); // Light green
        case 'exit':
          return filled('ellipse', '#FF9999'); // Light red
        case 'return':
          return filled('box', '#FF9999');
        case 'branch':
          return filled('diamond', '#FFFF99'); // Light yellow
        case 'loop':
          return filled('hexagon', '#87CEEB'); // Sky blue
        default:
          return ['shape=box'];
      }

    case 'call-graph':
      if (node.recursive === true) return filled(node.kind === 'module' ? 'note' : 'box', '#FF7F50'); // Coral
      if (node.kind === 'module') return filled('note', '#E6E6FA'); // Lavender
      if (node.dead === true) return ['shape=box', 'style=dashed', 'fontcolor="#888888"'];
      if (node.root === true) return filled('box', '#90EE90');
      return ['shape=box'];

    case 'dependency-graph':
      if (node.onCycle === true) return filled('note', '#FFB6C1'); // Light pink
      return ['shape=note'];

    case 'data-flow':
      switch (node.kind) {
        case 'parameter':
          return filled('ellipse', '#90EE90');
        case 'definition':
          return node.unused === true ? filled('box', '#FFDAB9') : ['shape=box'];
        case 'operation':
          return filled('circle', '#F0E68C'); // Khaki
        case 'call':
          return filled('box3d', '#E6E6FA');
        case 'constant':
          return ['shape=plaintext'];
        default:
          return ['shape=ellipse'];
      }

    case 'program-dependency':
      return ['shape=box'];

    case 'syntax-tree':
      switch (node.kind) {
        case 'file':
          return filled('folder', '#D3D3D3'); // Light gray
        case 'class':
          return filled('component', '#87CEEB');
        case 'function':
          return filled('box', '#90EE90');
        case 'import':
          return ['shape=note'];
        case 'call-site':
          return ['shape=ellipse'];
        default:
          return ['shape=plaintext'];
      }
  }
}

interface StyledEdge {
  edge: DocumentEdge;
  attributes: string[];
}

/**
 * Edges with their DOT attributes. A PDG pair that is both a control and a
 * data dependence is drawn once, in purple.
 */
function styledEdges(document: GraphDocument): StyledEdge[] {
  if (document.graphType === 'program-dependency') {
    const byPair = new Map<string, { edge: DocumentEdge; kinds: Set<string>; variables: string[] }>();
    for (const edge of document.edges) {
      const key = `${edge.from}->${edge.to}`;
      const entry = byPair.get(key) ?? { edge, kinds: new Set<string>(), variables: [] };
      entry.kinds.add(edge.kind);
      if (typeof edge.variable === 'string' && !entry.variables.includes(edge.variable)) {
        entry.variables.push(edge.variable);
      }
      byPair.set(key, entry);
    }
    return [...byPair.values()].map(({ edge, kinds, variables }) => {
      const label = variables.length > 0 ? [`label="${escapeLabel(variables.join(', '))}"`] : [];
      if (kinds.size > 1) return { edge, attributes: ['color="#800080"', ...label] }; // Purple
      if (kinds.has('data')) return { edge, attributes: ['color="#1E90FF"', 'style=dashed', ...label] }; // Dodger blue
      return { edge, attributes: ['color="#DC143C"'] }; // Crimson
    });
  }

  const seen = new Set<string>();
  const styled: StyledEdge[] = [];
  for (const edge of document.edges) {
    const key = `${edge.from}->${edge.to}:${edge.kind}`;
    if (seen.has(key)) continue;
    seen.add(key);
    styled.push({ edge, attributes: edgeAttributes(document.graphType, edge) });
  }
  return styled;
}

/**
 * DOT attributes for an edge.
 */
function edgeAttributes(graphType: GraphType, edge: DocumentEdge): string[] {
  switch (graphType) {
    case 'control-flow':
      switch (edge.kind) {
        case 'true-branch':
          return ['label="T"', 'color="#228B22"']; // Forest green
        case 'false-branch':
          return ['label="F"', 'color="#DC143C"']; // Crimson
        case 'loop-back':
          return ['style=dashed', 'constraint=false'];
        case 'break':
        case 'continue':
          return [`label="${edge.kind}"`, 'style=dotted'];
        default:
          return [];
      }

    case 'dependency-graph':
      return edge.onCycle === true ? ['color="#DC143C"', 'penwidth=2'] : [];

    case 'data-flow':
      return edge.kind === 'flow' ? ['style=dashed', 'color="#888888"'] : [];

    default:
      return [];
  }
}

/**
 * Escape special characters for DOT labels.
 */
function escapeLabel(label: string): string {
  return label.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}
