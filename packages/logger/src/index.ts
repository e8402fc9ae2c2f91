export { createNodeLogger, type LifecycleLogger, withDocumentContext } from "./node.js";
export * from "./redaction.js";
export * from "./types.js";
