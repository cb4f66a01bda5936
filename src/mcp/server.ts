#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { VERSION } from "../version.js";
import { commitMessageInput, draftCommitMessage } from "./commit-tool.js";

// Backends are located on PATH; make sure the usual locations are on it
// when the server is launched from a minimal environment
const requiredPaths = ["/usr/local/bin", "/usr/bin", "/bin"];
const pathParts = (process.env.PATH || "").split(":").filter(Boolean);
for (const p of requiredPaths) {
  if (!pathParts.includes(p)) {
    pathParts.push(p);
  }
}
process.env.PATH = pathParts.join(":");

const server = new McpServer({
  name: "git-cc-ai",
  version: VERSION,
});

server.registerTool(
  "commit_message",
  {
    title: "Commit Message",
    description:
      "Draft a Conventional Commit message for the staged changes using the claude, gemini or codex CLI. Does not commit.",
    inputSchema: commitMessageInput,
  },
  async (args) => draftCommitMessage(args)
);

const transport = new StdioServerTransport();
await server.connect(transport);
console.error("MCP server running on stdio");
