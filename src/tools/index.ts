export { createCalculateTool } from "./calculate.ts";
export { listOperationsTool } from "./operations.ts";
