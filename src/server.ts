import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
	CallToolRequestSchema,
	type CallToolResult,
	ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import type { SearchConsoleToolkit } from "./index.js";
import { VERSION } from "./index.js";
import { invokeTool } from "./tools/invoke.js";
import type { ToolDefinition } from "./tools/session-tools.js";

const INSTRUCTIONS = `Search performance data from Google Search Console and Bing Webmaster Tools.
Google access reuses the browser's logged-in Google session; be logged in to Google in Chrome, Brave, Edge, Chromium or Firefox.
Bing access needs the BING_API_KEY environment variable.
Site URLs must match each tool exactly (e.g. "https://example.com/" with trailing slash, or "sc-domain:example.com" for a Search Console domain property).`;

/** MCP tool listing entry: the TypeBox schema is plain JSON Schema already. */
export function describeTool(tool: ToolDefinition) {
	return {
		name: tool.name,
		description: tool.description,
		inputSchema: {
			type: "object" as const,
			properties: tool.parameters.properties,
			required: tool.parameters.required ?? [],
		},
	};
}

export function createServer(toolkit: SearchConsoleToolkit): Server {
	const log = toolkit.context.logger.child({ component: "mcp-server" });
	const server = new Server(
		{ name: "search-console-bridge", version: VERSION },
		{ capabilities: { tools: { listChanged: false } }, instructions: INSTRUCTIONS },
	);

	server.setRequestHandler(ListToolsRequestSchema, async () => ({
		tools: toolkit.tools.map(describeTool),
	}));

	server.setRequestHandler(CallToolRequestSchema, async (request): Promise<CallToolResult> => {
		const { name, arguments: args } = request.params;
		const result = await invokeTool(toolkit.tools, name, args, log);
		return result.isError
			? { content: result.content, isError: true }
			: { content: result.content };
	});

	return server;
}

export async function startStdioServer(toolkit: SearchConsoleToolkit): Promise<Server> {
	const server = createServer(toolkit);
	const transport = new StdioServerTransport();
	await server.connect(transport);
	toolkit.context.logger.info({ tools: toolkit.tools.length }, "MCP server listening on stdio");
	return server;
}
