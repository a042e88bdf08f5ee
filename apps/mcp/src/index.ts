import "dotenv/config";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config";
import { createServer } from "./server";

const config = loadConfig();
const server = createServer(config);

// stdout carries the protocol; diagnostics go to stderr
console.error("[startup]", `MCP server running (stdio): ${config.serverName}`, { debug: config.debug });

await server.connect(new StdioServerTransport());
