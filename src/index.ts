export * from "./errors.js";
export * from "./logger.js";
export * from "./config/apsp.js";
export * from "./matrix/triangular.js";
export * from "./matrix/packedSymmetricMatrix.js";
export * from "./matrix/distanceMatrix.js";
export * from "./matrix/path.js";
export * from "./matrix/pathMatrix.js";
export * from "./graph/view.js";
export * from "./graph/model.js";
export * from "./graph/descriptor.js";
export * from "./algorithms/floydWarshall.js";
export * from "./algorithms/dijkstra.js";
export * from "./apsp.js";
