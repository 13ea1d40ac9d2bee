import { describe, expect, it } from "vitest";
import {
	BingApiError,
	ConfigurationError,
	EmptyResultError,
	IncompleteSessionError,
	RpcAuthError,
	RpcDecodeError,
	RpcTransportError,
	SearchConsoleError,
	SessionNotFoundError,
	SessionStoreLockedError,
	toStructuredError,
} from "../../src/errors.js";

describe("Error Taxonomy", () => {
	it("SearchConsoleError has code, message, and recoveryHint", () => {
		const err = new SearchConsoleError("TEST_CODE", "test message", "try again");
		expect(err.code).toBe("TEST_CODE");
		expect(err.message).toBe("test message");
		expect(err.recoveryHint).toBe("try again");
		expect(err.name).toBe("SearchConsoleError");
		expect(err).toBeInstanceOf(Error);
	});

	it("SessionNotFoundError has correct code and default hint", () => {
		const err = new SessionNotFoundError("no chrome cookie store");
		expect(err.code).toBe("SESSION_NOT_FOUND");
		expect(err.name).toBe("SessionNotFoundError");
		expect(err.recoveryHint).toContain("Log in to Google");
		expect(err).toBeInstanceOf(SearchConsoleError);
	});

	it("IncompleteSessionError lists the missing cookies", () => {
		const err = new IncompleteSessionError(["SID", "SAPISID"]);
		expect(err.code).toBe("INCOMPLETE_SESSION");
		expect(err.message).toBe("browser session is missing required cookies: SID, SAPISID");
		expect(err.missing).toEqual(["SID", "SAPISID"]);
		expect(err.recoveryHint).toContain("refresh_google_session");
	});

	it("SessionStoreLockedError suggests closing the browser", () => {
		const err = new SessionStoreLockedError("chrome cookie store is locked");
		expect(err.code).toBe("SESSION_STORE_LOCKED");
		expect(err.recoveryHint).toContain("Close the browser");
	});

	it("RpcTransportError derives its hint from the status", () => {
		expect(new RpcTransportError("slow").recoveryHint).toContain("network connection");
		expect(new RpcTransportError("limited", { status: 429 }).recoveryHint).toBe(
			"Rate limited by Google. Wait a moment and retry.",
		);
		expect(new RpcTransportError("down", { status: 503 }).recoveryHint).toBe(
			"Google returned a server error. Wait a moment and retry.",
		);
		expect(new RpcTransportError("bad", { status: 400 }).status).toBe(400);
	});

	it("RpcAuthError keeps the status and a custom hint", () => {
		const err = new RpcAuthError("rejected twice", { status: 400, recoveryHint: "log in again" });
		expect(err.code).toBe("RPC_AUTH");
		expect(err.status).toBe(400);
		expect(err.recoveryHint).toBe("log in again");
	});

	it("RpcDecodeError preserves the cause", () => {
		const cause = new SyntaxError("Unexpected end of JSON input");
		const err = new RpcDecodeError("inner payload is not valid JSON", undefined, { cause });
		expect(err.code).toBe("RPC_DECODE");
		expect(err.cause).toBe(cause);
		expect(err.recoveryHint).toContain("schema table");
	});

	it("EmptyResultError mentions the data lag", () => {
		const err = new EmptyResultError("no data");
		expect(err.code).toBe("EMPTY_RESULT");
		expect(err.recoveryHint).toContain("3 days");
	});

	it("ConfigurationError has correct code", () => {
		expect(new ConfigurationError("BING_API_KEY is not set").code).toBe("CONFIGURATION");
	});

	it("BingApiError maps 401 to an API key hint", () => {
		const err = new BingApiError("unauthorized", 401);
		expect(err.code).toBe("BING_API");
		expect(err.status).toBe(401);
		expect(err.recoveryHint).toContain("API key");
	});

	it("custom recovery hints override defaults", () => {
		const err = new SessionNotFoundError("gone", "custom hint");
		expect(err.recoveryHint).toBe("custom hint");
	});
});

describe("toStructuredError", () => {
	it("should convert a SearchConsoleError to code, message and hint", () => {
		const err = new EmptyResultError("no data for sc-domain:example.com", "widen the range");
		expect(toStructuredError(err)).toEqual({
			code: "EMPTY_RESULT",
			message: "no data for sc-domain:example.com",
			recoveryHint: "widen the range",
		});
	});

	it("should return the message of a plain Error", () => {
		expect(toStructuredError(new Error("boom"))).toBe("boom");
	});

	it("should stringify anything else", () => {
		expect(toStructuredError(42)).toBe("42");
	});
});
