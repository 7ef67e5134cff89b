export { SERVER_NAME, SERVER_VERSION, createServer, handleToolCall } from "./server.js";
export type { AccessorResult } from "./server.js";
export { ACCESSOR_TOOLS, ALL_TOOLS, OPERATION_TOOLS } from "./tools.js";
