/**
 * Graph export: JSON interchange documents and DOT rendering.
 */

export {
  GRAPH_TYPES,
  parseGraphDocument,
  serializeDocument,
  subgraph,
  summarize,
  type AttributeValue,
  type DocumentEdge,
  type DocumentNode,
  type GraphDocument,
  type GraphSummary,
  type GraphType,
} from './graph-document';

export {
  callGraphToDocument,
  controlFlowToDocument,
  dataFlowToDocument,
  moduleGraphToDocument,
  programDependenceToDocument,
  syntaxTreeToDocument,
} from './converters';

export { documentToDot, type DotOptions } from './dot';
