export { type BuildOptions, buildHierarchy, segment } from "./builder.js";
