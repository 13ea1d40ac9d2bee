/**
 * Typed error hierarchy for the search-console bridge.
 *
 * Every subclass carries a machine-readable `code` and an actionable
 * `recoveryHint` so callers (and the agent) know what to do next.
 */

export class SearchConsoleError extends Error {
	readonly code: string;
	readonly recoveryHint: string;

	constructor(code: string, message: string, recoveryHint: string, options?: ErrorOptions) {
		super(message, options);
		this.name = "SearchConsoleError";
		this.code = code;
		this.recoveryHint = recoveryHint;
	}
}

export class SessionNotFoundError extends SearchConsoleError {
	constructor(message: string, recoveryHint?: string, options?: ErrorOptions) {
		super(
			"SESSION_NOT_FOUND",
			message,
			recoveryHint ??
				"Log in to Google in your browser (and open it at least once since login), then retry.",
			options,
		);
		this.name = "SessionNotFoundError";
	}
}

export class IncompleteSessionError extends SearchConsoleError {
	readonly missing: readonly string[];

	constructor(missing: readonly string[], recoveryHint?: string) {
		super(
			"INCOMPLETE_SESSION",
			`browser session is missing required cookies: ${missing.join(", ")}`,
			recoveryHint ??
				"Sign out of Google and back in using the browser, then call refresh_google_session.",
		);
		this.name = "IncompleteSessionError";
		this.missing = missing;
	}
}

export class SessionStoreLockedError extends SearchConsoleError {
	constructor(message: string, recoveryHint?: string, options?: ErrorOptions) {
		super(
			"SESSION_STORE_LOCKED",
			message,
			recoveryHint ??
				"The browser's cookie store appears locked. Close the browser completely and retry.",
			options,
		);
		this.name = "SessionStoreLockedError";
	}
}

export class AntiForgeryFetchFailedError extends SearchConsoleError {
	constructor(message: string, recoveryHint?: string, options?: ErrorOptions) {
		super(
			"ANTI_FORGERY_FETCH_FAILED",
			message,
			recoveryHint ?? "Call refresh_google_session and retry; if it persists, log in again.",
			options,
		);
		this.name = "AntiForgeryFetchFailedError";
	}
}

export class RpcTransportError extends SearchConsoleError {
	readonly status: number | undefined;

	constructor(
		message: string,
		opts: { status?: number; recoveryHint?: string; cause?: unknown } = {},
	) {
		super(
			"RPC_TRANSPORT",
			message,
			opts.recoveryHint ?? hintForStatus(opts.status),
			opts.cause === undefined ? undefined : { cause: opts.cause },
		);
		this.name = "RpcTransportError";
		this.status = opts.status;
	}
}

export class RpcAuthError extends SearchConsoleError {
	readonly status: number | undefined;

	constructor(message: string, opts: { status?: number; recoveryHint?: string } = {}) {
		super(
			"RPC_AUTH",
			message,
			opts.recoveryHint ??
				"Your Google session was rejected. Log in to Google in the browser, then call refresh_google_session.",
		);
		this.name = "RpcAuthError";
		this.status = opts.status;
	}
}

export class RpcDecodeError extends SearchConsoleError {
	constructor(message: string, recoveryHint?: string, options?: ErrorOptions) {
		super(
			"RPC_DECODE",
			message,
			recoveryHint ??
				"The upstream response format may have changed. Update the schema table (SEARCH_CONSOLE_SCHEMA_TABLE) and retry.",
			options,
		);
		this.name = "RpcDecodeError";
	}
}

export class EmptyResultError extends SearchConsoleError {
	constructor(message: string, recoveryHint?: string) {
		super(
			"EMPTY_RESULT",
			message,
			recoveryHint ??
				"Search Console data lags about 3 days. Try a date range ending 3 or more days ago, or widen it.",
		);
		this.name = "EmptyResultError";
	}
}

export class InvalidArgumentError extends SearchConsoleError {
	constructor(message: string, recoveryHint?: string) {
		super("INVALID_ARGUMENT", message, recoveryHint ?? "Fix the argument named in the message.");
		this.name = "InvalidArgumentError";
	}
}

export class ConfigurationError extends SearchConsoleError {
	constructor(message: string, recoveryHint?: string, options?: ErrorOptions) {
		super(
			"CONFIGURATION",
			message,
			recoveryHint ?? "Set the setting named in the message and restart the server.",
			options,
		);
		this.name = "ConfigurationError";
	}
}

export class BingApiError extends SearchConsoleError {
	readonly status: number;

	constructor(message: string, status: number, recoveryHint?: string) {
		super("BING_API", message, recoveryHint ?? bingHintForStatus(status));
		this.name = "BingApiError";
		this.status = status;
	}
}

function hintForStatus(status: number | undefined): string {
	if (status === undefined) {
		return "Check your network connection and retry; raise the timeout if requests are slow.";
	}
	switch (status) {
		case 404:
			return "Check that the site URL is correct and verified in Search Console.";
		case 429:
			return "Rate limited by Google. Wait a moment and retry.";
		default:
			return status >= 500
				? "Google returned a server error. Wait a moment and retry."
				: "The request was rejected. Check the parameters and retry.";
	}
}

function bingHintForStatus(status: number): string {
	switch (status) {
		case 401:
			return "The Bing API key is invalid or expired. Regenerate it at bing.com/webmasters → Settings → API Access.";
		case 403:
			return "Make sure the Bing API key has access to this site.";
		case 404:
			return "Check that the site is added and verified in Bing Webmaster Tools.";
		case 429:
			return "Bing API rate limit exceeded. Wait a moment and retry.";
		default:
			return "Bing Webmaster API call failed. Wait a moment and retry.";
	}
}

export interface StructuredError {
	code: string;
	message: string;
	recoveryHint: string;
}

export function toStructuredError(err: unknown): string | StructuredError {
	if (err instanceof SearchConsoleError) {
		return { code: err.code, message: err.message, recoveryHint: err.recoveryHint };
	}
	if (err instanceof Error) {
		return err.message;
	}
	return String(err);
}
