#!/usr/bin/env node
import "dotenv/config";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createAnalysisService, loadConfig } from "@regimpact/engine";
import { registerAnalysisTools } from "./tools/analysis.js";

const service = createAnalysisService(loadConfig());

const server = new McpServer({
  name: "regimpact",
  version: "0.1.0",
});

registerAnalysisTools(server, service);

process.once("SIGTERM", () => {
  service.dispose();
  process.exit(0);
});

const transport = new StdioServerTransport();
await server.connect(transport);
