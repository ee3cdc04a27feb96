import { z } from "zod";

import { DirectedGraphError } from "../errors.js";
import { UndirectedGraph } from "./model.js";

/** Label accepted for a node inside a JSON descriptor. */
export type DescriptorLabel = string | number;

const NodeIndexSchema = z.number().int().nonnegative();

const EdgeSchema = z
  .object({
    source: NodeIndexSchema,
    target: NodeIndexSchema,
    weight: z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
  })
  .strict();

/**
 * JSON shape of a graph on disk. `nodes` is either the node count (labels are
 * then the indices) or the list of labels in index order.
 */
export const GraphDescriptorSchema = z
  .object({
    directed: z.boolean().optional(),
    nodes: z.union([NodeIndexSchema, z.array(z.union([z.string().min(1), z.number()]))]),
    edges: z.array(EdgeSchema).default([]),
  })
  .strict()
  .superRefine((descriptor, ctx) => {
    const nodeCount = typeof descriptor.nodes === "number" ? descriptor.nodes : descriptor.nodes.length;
    descriptor.edges.forEach((edge, index) => {
      for (const key of ["source", "target"] as const) {
        if (edge[key] >= nodeCount) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["edges", index, key],
            message: `node ${edge[key]} is outside [0, ${nodeCount})`,
          });
        }
      }
    });
  });

export type GraphDescriptor = z.infer<typeof GraphDescriptorSchema>;

/** Validates an untrusted value; throws the `ZodError` on failure. */
export function parseGraphDescriptor(input: unknown): GraphDescriptor {
  return GraphDescriptorSchema.parse(input);
}

/** Builds an {@link UndirectedGraph} from a validated descriptor. */
export function graphFromDescriptor(descriptor: GraphDescriptor): UndirectedGraph<DescriptorLabel> {
  if (descriptor.directed === true) {
    throw new DirectedGraphError();
  }
  const graph = new UndirectedGraph<DescriptorLabel>();
  const labels: DescriptorLabel[] =
    typeof descriptor.nodes === "number"
      ? Array.from({ length: descriptor.nodes }, (_, index) => index)
      : descriptor.nodes;
  for (const label of labels) {
    graph.addNode(label);
  }
  for (const edge of descriptor.edges) {
    graph.addEdge(edge.source, edge.target, edge.weight);
  }
  return graph;
}
