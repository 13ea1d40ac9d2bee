import { ConfigurationError } from "./errors.js";
import { DEFAULT_ANTI_FORGERY_TTL_MS } from "./rpc/anti-forgery.js";
import { DEFAULT_RPC_TIMEOUT_MS } from "./rpc/channel.js";
import type { BrowserName } from "./session/browsers.js";
import { BROWSER_NAMES, isBrowserName } from "./session/browsers.js";
import { DEFAULT_COOKIE_TTL_MS } from "./session/cookie-provider.js";

export interface BridgeConfig {
	/** Browser read first; the fallback order follows. */
	browser?: BrowserName;
	fallbackOrder?: BrowserName[];
	cookieTtlMs: number;
	antiForgeryTtlMs: number;
	timeoutMs: number;
	/** JSON file replacing the built-in schema table. */
	schemaTablePath?: string;
	bingApiKey?: string;
	logLevel?: string;
}

export const DEFAULT_CONFIG: BridgeConfig = {
	cookieTtlMs: DEFAULT_COOKIE_TTL_MS,
	antiForgeryTtlMs: DEFAULT_ANTI_FORGERY_TTL_MS,
	timeoutMs: DEFAULT_RPC_TIMEOUT_MS,
};

function parseBrowser(value: string, setting: string): BrowserName {
	const name = value.trim().toLowerCase();
	if (!isBrowserName(name)) {
		throw new ConfigurationError(
			`${setting} has unknown browser "${value}"`,
			`Use one of: ${BROWSER_NAMES.join(", ")}.`,
		);
	}
	return name;
}

function parsePositive(value: string, setting: string): number {
	const n = Number(value);
	if (!Number.isFinite(n) || n <= 0) {
		throw new ConfigurationError(
			`${setting} must be a positive number, got "${value}"`,
			`Unset ${setting} or give it a positive number.`,
		);
	}
	return n;
}

function setting(env: NodeJS.ProcessEnv, name: string): string | undefined {
	const value = env[name]?.trim();
	return value ? value : undefined;
}

/** Maps environment variables onto a config; unset variables keep the defaults. */
export function resolveConfig(env: NodeJS.ProcessEnv = process.env): BridgeConfig {
	const config: BridgeConfig = { ...DEFAULT_CONFIG };

	const browser = setting(env, "SEARCH_CONSOLE_BROWSER");
	if (browser) {
		config.browser = parseBrowser(browser, "SEARCH_CONSOLE_BROWSER");
	}
	const browsers = setting(env, "SEARCH_CONSOLE_BROWSERS");
	if (browsers) {
		config.fallbackOrder = browsers
			.split(",")
			.filter((entry) => entry.trim() !== "")
			.map((entry) => parseBrowser(entry, "SEARCH_CONSOLE_BROWSERS"));
	}

	const cookieTtl = setting(env, "SEARCH_CONSOLE_COOKIE_TTL_SECONDS");
	if (cookieTtl) {
		config.cookieTtlMs = parsePositive(cookieTtl, "SEARCH_CONSOLE_COOKIE_TTL_SECONDS") * 1000;
	}
	const xsrfTtl = setting(env, "SEARCH_CONSOLE_XSRF_TTL_SECONDS");
	if (xsrfTtl) {
		config.antiForgeryTtlMs = parsePositive(xsrfTtl, "SEARCH_CONSOLE_XSRF_TTL_SECONDS") * 1000;
	}
	const timeout = setting(env, "SEARCH_CONSOLE_TIMEOUT_MS");
	if (timeout) {
		config.timeoutMs = parsePositive(timeout, "SEARCH_CONSOLE_TIMEOUT_MS");
	}

	const schemaTable = setting(env, "SEARCH_CONSOLE_SCHEMA_TABLE");
	if (schemaTable) {
		config.schemaTablePath = schemaTable;
	}
	const bingKey = setting(env, "BING_API_KEY");
	if (bingKey) {
		config.bingApiKey = bingKey;
	}
	const logLevel = setting(env, "LOG_LEVEL");
	if (logLevel) {
		config.logLevel = logLevel;
	}
	return config;
}
