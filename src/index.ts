import { FastMCP } from "fastmcp";
import { readConfig } from "./lib/config.ts";
import { createCalculateTool, listOperationsTool } from "./tools/index.ts";

const config = readConfig();

const server = new FastMCP({
  name: "Expression Calculator MCP",
  version: "0.1.0",
});

// Register tools
server.addTool(createCalculateTool(config));
server.addTool(listOperationsTool);

// stdio for local MCP agents; HTTP streaming when configured
if (config.transport === "httpStream") {
  await server.start({ transportType: "httpStream", httpStream: { port: config.port } });
} else {
  await server.start({ transportType: "stdio" });
}
