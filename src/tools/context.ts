import type { BingWebmasterClient } from "../bing/client.js";
import type { BridgeConfig } from "../config.js";
import { InvalidArgumentError } from "../errors.js";
import type { SearchConsoleClient } from "../gsc/client.js";
import type { SearchConsoleRestClient } from "../gsc/rest.js";
import type { Logger } from "../observe/logger.js";
import type { RpcTrace } from "../observe/trace.js";
import type { AntiForgeryTokenCache } from "../rpc/anti-forgery.js";
import type { SchemaTable } from "../rpc/schema-table.js";
import type { SessionCookieProvider } from "../session/cookie-provider.js";

export interface BridgeContext {
	config: BridgeConfig;
	logger: Logger;
	cookies: SessionCookieProvider;
	antiForgery: AntiForgeryTokenCache;
	schemaTable: SchemaTable;
	trace: RpcTrace;
	gsc: SearchConsoleClient;
	rest: SearchConsoleRestClient;
	bing: BingWebmasterClient;
}

export type ToolParams = Record<string, unknown>;

export function requireString(params: ToolParams, key: string): string {
	const value = params[key];
	if (typeof value !== "string" || value.trim() === "") {
		throw new InvalidArgumentError(`${key} is required`);
	}
	return value.trim();
}

export function optionalString(params: ToolParams, key: string): string | undefined {
	const value = params[key];
	return typeof value === "string" && value.trim() !== "" ? value.trim() : undefined;
}

/** Integer param clamped to [min, max]; `fallback` when absent. */
export function boundedInt(
	params: ToolParams,
	key: string,
	fallback: number,
	min: number,
	max: number,
): number {
	const value = params[key];
	if (typeof value !== "number" || !Number.isFinite(value)) {
		return fallback;
	}
	return Math.min(max, Math.max(min, Math.floor(value)));
}
