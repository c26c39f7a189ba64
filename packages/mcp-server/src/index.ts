#!/usr/bin/env node
import "dotenv/config";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createProspector, loadConfig, setLogLevel } from "@prospect-intel/agents";
import { registerProspectTools } from "./tools/prospect.js";
import { registerCacheTools } from "./tools/cache.js";

const config = loadConfig();
setLogLevel(config.logLevel);
const { orchestrator, cache } = await createProspector(config);

const server = new McpServer({
  name: "prospect-intel-mcp",
  version: "0.1.0",
});

registerProspectTools(server, orchestrator);
registerCacheTools(server, cache);

const transport = new StdioServerTransport();
await server.connect(transport);
