#!/usr/bin/env node

/**
 * spatial-patch-mcp-server: MCP entry point.
 *
 * Registers tools and starts the stdio transport.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { executeAnalyzePatch } from "./tools/analyze.js";
import { analyzePatchSchema } from "./schemas/analyze.js";
import { executeAnalyzeSpatial, executeConvertSpatial } from "./tools/spatial.js";
import { spatialToolSchema } from "./schemas/spatial.js";

const server = new McpServer({
  name: "spatial-patch-mcp-server",
  version: "0.1.0",
});

// ---------------------------------------------------------------------------
// Tool: analyze_patch
// ---------------------------------------------------------------------------

server.tool(
  "analyze_patch",
  "Analyze a Max .maxpat file: object counts by category, signal flow graph with audio/control/message cable types, " +
    "audio sources, sinks and signal chains, complexity scoring, and validation.",
  analyzePatchSchema,
  async ({ source, pathBudget }) => {
    try {
      const result = await executeAnalyzePatch(source, pathBudget);
      return { content: [{ type: "text", text: result }] };
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      return {
        content: [{ type: "text", text: `Error analyzing patch: ${msg}` }],
        isError: true,
      };
    }
  },
);

// ---------------------------------------------------------------------------
// Tool: analyze_spatial
// ---------------------------------------------------------------------------

server.tool(
  "analyze_spatial",
  "Analyze the spatial side of a Max .maxpat file: spat5 objects, speaker-array topology (ring, WFS line, irregular) " +
    "and the spatial method the converted project should use (WFS, HOA, VBAP or stereo), with VBAP/HOA validation.",
  spatialToolSchema,
  async ({ source, speakers, options }) => {
    try {
      const result = await executeAnalyzeSpatial({ source, speakers, options });
      return { content: [{ type: "text", text: result }] };
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      return {
        content: [{ type: "text", text: `Error analyzing spatial configuration: ${msg}` }],
        isError: true,
      };
    }
  },
);

// ---------------------------------------------------------------------------
// Tool: convert_spatial
// ---------------------------------------------------------------------------

server.tool(
  "convert_spatial",
  "Convert the spatial configuration of a Max .maxpat file into WFS, VBAP or HOA parameter objects. " +
    "Returns JSON: the analysis, the ordered stages with their class, method, arguments and properties, " +
    "OSC responder descriptors, validation reports and warnings.",
  spatialToolSchema,
  async ({ source, speakers, options }) => {
    try {
      const result = await executeConvertSpatial({ source, speakers, options });
      return { content: [{ type: "text", text: result }] };
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      return {
        content: [{ type: "text", text: `Error converting spatial configuration: ${msg}` }],
        isError: true,
      };
    }
  },
);

// ---------------------------------------------------------------------------
// Start server
// ---------------------------------------------------------------------------

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((error) => {
  console.error("Fatal error starting MCP server:", error);
  process.exit(1);
});
