/**
 * JSON interchange document shared by every graph kind:
 * `{ graphType, nodes: [{ id, kind, ...attributes }], edges: [{ from, to, kind, ...attributes }], metadata }`.
 */

import { z } from 'zod';
import { DocumentFormatError, errorMessage } from '../errors';

export const GRAPH_TYPES = [
  'syntax-tree',
  'control-flow',
  'data-flow',
  'call-graph',
  'dependency-graph',
  'program-dependency',
] as const;

export type GraphType = (typeof GRAPH_TYPES)[number];

export type AttributeValue = string | number | boolean | null | AttributeValue[] | { [key: string]: AttributeValue };

const attributeSchema: z.ZodType<AttributeValue> = z.lazy(() => attributeUnion);

// catchall needs the concrete union: a plain ZodType<T> there erases the index signature
const attributeUnion = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.null(),
  z.array(attributeSchema),
  z.record(z.string(), attributeSchema),
]);

const nodeSchema = z
  .object({
    id: z.number().int().nonnegative(),
    kind: z.string().min(1),
  })
  .catchall(attributeUnion);

const edgeSchema = z
  .object({
    from: z.number().int().nonnegative(),
    to: z.number().int().nonnegative(),
    kind: z.string().min(1),
  })
  .catchall(attributeUnion);

const documentSchema = z
  .object({
    graphType: z.enum(GRAPH_TYPES),
    nodes: z.array(nodeSchema),
    edges: z.array(edgeSchema),
    metadata: z.record(z.string(), attributeSchema),
  })
  .superRefine((document, ctx) => {
    const ids = new Set<number>();
    document.nodes.forEach((node, index) => {
      if (ids.has(node.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['nodes', index, 'id'], message: `Duplicate node id ${node.id}` });
      }
      ids.add(node.id);
    });
    document.edges.forEach((edge, index) => {
      for (const end of ['from', 'to'] as const) {
        if (!ids.has(edge[end])) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['edges', index, end],
            message: `Edge refers to unknown node ${edge[end]}`,
          });
        }
      }
    });
  });

export type DocumentNode = z.infer<typeof nodeSchema>;
export type DocumentEdge = z.infer<typeof edgeSchema>;
export type GraphDocument = z.infer<typeof documentSchema>;

export function serializeDocument(document: GraphDocument): string {
  return JSON.stringify(document, null, 2);
}

/**
 * Parse and validate a document produced by `serializeDocument`
 */
export function parseGraphDocument(text: string): GraphDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new DocumentFormatError(`Graph document is not valid JSON: ${errorMessage(error)}`);
  }

  const result = documentSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new DocumentFormatError(`Invalid graph document:\n  ${issues.join('\n  ')}`);
  }
  return result.data;
}

/**
 * Count summary carried by every analysis result
 */
export interface GraphSummary {
  nodeCount: number;
  edgeCount: number;
  keyFindings: string[];
}

/**
 * Counts over one document or several (one per function)
 */
export function summarize(documents: GraphDocument | GraphDocument[], keyFindings: string[]): GraphSummary {
  const list = Array.isArray(documents) ? documents : [documents];
  return {
    nodeCount: list.reduce((sum, document) => sum + document.nodes.length, 0),
    edgeCount: list.reduce((sum, document) => sum + document.edges.length, 0),
    keyFindings,
  };
}

/**
 * The part of a document spanned by `keep`; node ids are left as they are
 */
export function subgraph(document: GraphDocument, keep: ReadonlySet<number>): GraphDocument {
  return {
    ...document,
    nodes: document.nodes.filter((node) => keep.has(node.id)),
    edges: document.edges.filter((edge) => keep.has(edge.from) && keep.has(edge.to)),
  };
}
