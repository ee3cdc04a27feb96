import { describe, it } from "mocha";
import { expect } from "chai";
import { ZodError } from "zod";

import { DirectedGraphError, InvalidWeightError, NodeIndexError, normaliseApspError } from "../../src/errors.js";
import { graphFromDescriptor, parseGraphDescriptor } from "../../src/graph/descriptor.js";
import { UndirectedGraph } from "../../src/graph/model.js";
import { hasNodeLabels } from "../../src/graph/view.js";

describe("UndirectedGraph", () => {
  it("numbers nodes in insertion order and keeps their labels", () => {
    const graph = new UndirectedGraph<string>();

    expect(graph.addNode("a")).to.equal(0);
    expect(graph.addNode("b")).to.equal(1);
    expect(graph.addNode("c")).to.equal(2);
    expect(graph.nodeCount()).to.equal(3);
    expect([...graph.nodeIds()]).to.deep.equal([0, 1, 2]);
    expect(graph.nodeLabel(2)).to.equal("c");
    expect(graph.isDirected()).to.equal(false);
    expect(hasNodeLabels(graph)).to.equal(true);
  });

  it("indexes edges from both endpoints", () => {
    const graph = UndirectedGraph.withNodes(3);
    graph.extendWithEdges([
      [0, 1, 2],
      [1, 2, 3],
      [2, 2, 4],
    ]);

    expect(graph.edgeCount()).to.equal(3);
    expect(graph.neighbours(1)).to.deep.equal([
      { node: 0, weight: 2 },
      { node: 2, weight: 3 },
    ]);
    expect(graph.incidentEdges(2)).to.have.length(2);
    expect(graph.edges()[0]).to.deep.equal({ source: 0, target: 1, weight: 2 });
  });

  it("rejects unknown nodes and invalid weights", () => {
    const graph = UndirectedGraph.withNodes(2);

    expect(() => graph.addEdge(0, 2, 1)).to.throw(NodeIndexError);
    expect(() => graph.addEdge(0, 1, -1)).to.throw(InvalidWeightError, "edge 0 - 1 has invalid weight -1");
    expect(() => graph.addEdge(0, 1, 1.5)).to.throw(InvalidWeightError);
    expect(() => graph.addEdge(0, 1, Number.POSITIVE_INFINITY)).to.throw(InvalidWeightError);
    expect(() => graph.nodeLabel(5)).to.throw(NodeIndexError);
    expect(graph.edgeCount()).to.equal(0);
  });
});

describe("graph descriptors", () => {
  it("builds a labelled graph from a list of labels", () => {
    const descriptor = parseGraphDescriptor({
      nodes: ["a", "b", "c"],
      edges: [{ source: 0, target: 2, weight: 3 }],
    });
    const graph = graphFromDescriptor(descriptor);

    expect(graph.nodeCount()).to.equal(3);
    expect(graph.nodeLabel(1)).to.equal("b");
    expect(graph.edges()).to.deep.equal([{ source: 0, target: 2, weight: 3 }]);
  });

  it("labels nodes by index when only a count is given", () => {
    const graph = graphFromDescriptor(parseGraphDescriptor({ nodes: 3, directed: false }));

    expect(graph.nodeLabel(2)).to.equal(2);
    expect(graph.edgeCount()).to.equal(0);
  });

  it("rejects edges pointing outside the node list", () => {
    const parse = () => parseGraphDescriptor({ nodes: ["a", "b"], edges: [{ source: 0, target: 5, weight: 1 }] });

    expect(parse).to.throw(ZodError);
    try {
      parse();
    } catch (error) {
      expect(normaliseApspError(error)).to.include({
        code: "E-APSP-INVALID-INPUT",
        message: "edges.0.target: node 5 is outside [0, 2)",
        hint: "invalid_input",
      });
    }
  });

  it("rejects malformed fields", () => {
    expect(() => parseGraphDescriptor({ nodes: 2, edges: [{ source: 0, target: 1, weight: -4 }] })).to.throw(ZodError);
    expect(() => parseGraphDescriptor({ nodes: 2, edges: [{ source: 0, target: 1, weight: 1.5 }] })).to.throw(ZodError);
    expect(() => parseGraphDescriptor({ nodes: 2, colour: "blue" })).to.throw(ZodError);
    expect(() => parseGraphDescriptor({ edges: [] })).to.throw(ZodError);
  });

  it("refuses directed descriptors", () => {
    const descriptor = parseGraphDescriptor({ nodes: 2, directed: true });

    expect(() => graphFromDescriptor(descriptor)).to.throw(DirectedGraphError);
  });
});
