import { BingWebmasterClient } from "./bing/client.js";
import type { BridgeConfig } from "./config.js";
import { DEFAULT_CONFIG } from "./config.js";
import { SearchConsoleClient } from "./gsc/client.js";
import { SearchConsoleRestClient } from "./gsc/rest.js";
import type { Logger } from "./observe/logger.js";
import { createLogger } from "./observe/logger.js";
import { RpcTrace } from "./observe/trace.js";
import { AntiForgeryTokenCache } from "./rpc/anti-forgery.js";
import { RpcChannel } from "./rpc/channel.js";
import { loadSchemaTable, SchemaTable } from "./rpc/schema-table.js";
import type { CookieSourceFactory, SessionCookieProviderOptions } from "./session/cookie-provider.js";
import { SessionCookieProvider } from "./session/cookie-provider.js";
import { createBingTools } from "./tools/bing-tools.js";
import type { BridgeContext } from "./tools/context.js";
import { createGscTools } from "./tools/gsc-tools.js";
import type { ToolDefinition } from "./tools/session-tools.js";
import { createSessionTools } from "./tools/session-tools.js";

export const VERSION = "0.1.0";

/** Seams for tests and embedding; each defaults to the real thing. */
export interface ToolkitDependencies {
	logger?: Logger;
	fetch?: typeof fetch;
	now?: () => number;
	cookieSource?: CookieSourceFactory;
}

export interface SearchConsoleToolkit {
	tools: ToolDefinition[];
	context: BridgeContext;
	shutdown: () => Promise<void>;
}

export async function createToolkit(
	config: BridgeConfig = DEFAULT_CONFIG,
	deps: ToolkitDependencies = {},
): Promise<SearchConsoleToolkit> {
	const logger = deps.logger ?? createLogger("search-console-bridge", config.logLevel);

	const schemaTable = config.schemaTablePath
		? loadSchemaTable(config.schemaTablePath)
		: new SchemaTable();

	const cookieOpts: SessionCookieProviderOptions = { logger, ttlMs: config.cookieTtlMs };
	if (config.browser) {
		cookieOpts.browser = config.browser;
	}
	if (config.fallbackOrder) {
		cookieOpts.fallbackOrder = config.fallbackOrder;
	}
	if (deps.now) {
		cookieOpts.now = deps.now;
	}
	if (deps.cookieSource) {
		cookieOpts.sourceFor = deps.cookieSource;
	}
	const cookies = new SessionCookieProvider(cookieOpts);

	const antiForgery = new AntiForgeryTokenCache(
		deps.now
			? { logger, ttlMs: config.antiForgeryTtlMs, now: deps.now }
			: { logger, ttlMs: config.antiForgeryTtlMs },
	);
	const trace = new RpcTrace();

	const seams: { fetch?: typeof fetch; now?: () => number } = {};
	if (deps.fetch) {
		seams.fetch = deps.fetch;
	}
	if (deps.now) {
		seams.now = deps.now;
	}

	const channel = new RpcChannel({
		cookies,
		antiForgery,
		logger,
		trace,
		timeoutMs: config.timeoutMs,
		...seams,
	});
	const gsc = new SearchConsoleClient({ channel, schemaTable, logger, ...(deps.now ? { now: deps.now } : {}) });
	const rest = new SearchConsoleRestClient({ cookies, logger, timeoutMs: config.timeoutMs, ...seams });
	const bing = new BingWebmasterClient({
		logger,
		apiKey: config.bingApiKey,
		timeoutMs: config.timeoutMs,
		...(deps.fetch ? { fetch: deps.fetch } : {}),
	});

	const context: BridgeContext = {
		config,
		logger,
		cookies,
		antiForgery,
		schemaTable,
		trace,
		gsc,
		rest,
		bing,
	};

	const tools = [...createGscTools(context), ...createSessionTools(context), ...createBingTools(context)];

	const shutdown = async (): Promise<void> => {
		logger.info("shutting down search console bridge");
		antiForgery.invalidate();
		trace.reset();
		logger.info("search console bridge shut down");
	};

	logger.info(
		{ toolCount: tools.length, version: VERSION, schemaTable: schemaTable.version },
		"search console bridge initialized",
	);

	return { tools, context, shutdown };
}

// biome-ignore lint/performance/noBarrelFile: index.ts is the package public API surface
export { generateAuthToken } from "./auth/auth-token.js";
export type { BingCrawlStats, BingKeywordRow, BingSite, BingTrafficRow } from "./bing/client.js";
export { BingWebmasterClient } from "./bing/client.js";
export type { BridgeConfig } from "./config.js";
export { resolveConfig } from "./config.js";
export type { StructuredError } from "./errors.js";
export {
	AntiForgeryFetchFailedError,
	BingApiError,
	ConfigurationError,
	EmptyResultError,
	IncompleteSessionError,
	InvalidArgumentError,
	RpcAuthError,
	RpcDecodeError,
	RpcTransportError,
	SearchConsoleError,
	SessionNotFoundError,
	SessionStoreLockedError,
	toStructuredError,
} from "./errors.js";
export { filterDateRange } from "./extract/date-range.js";
export type { SemanticRow } from "./extract/extractor.js";
export type { DatedRow, SearchAnalyticsRequest, SearchAnalyticsResult } from "./gsc/client.js";
export { SearchConsoleClient } from "./gsc/client.js";
export { SearchConsoleRestClient } from "./gsc/rest.js";
export type { RpcTraceEntry, RpcTraceStats } from "./observe/trace.js";
export { decode } from "./rpc/decoder.js";
export { DEFAULT_SCHEMA_TABLE, loadSchemaTable, SchemaTable } from "./rpc/schema-table.js";
export type { BridgeContext } from "./tools/context.js";
export { invokeTool } from "./tools/invoke.js";
// Re-export key types for consumers
export type { ToolDefinition, ToolResult } from "./tools/session-tools.js";
