import pino from "pino";
import { SessionNotFoundError } from "../src/errors.js";
import type { Logger } from "../src/observe/logger.js";
import type { BrowserName, CookieSource } from "../src/session/browsers.js";
import type { CookieRecord } from "../src/session/cookies.js";

export const TEST_SECRET = "test-sapisid";

export function silentLogger(): Logger {
	return pino({ level: "silent" });
}

/** Serializes payloads into the streamed `)]}'` + length-prefixed frame layout. */
export function encodeFrames(payloads: readonly unknown[][]): string {
	let body = ")]}'\n\n";
	for (const payload of payloads) {
		const json = JSON.stringify(payload);
		body += `${Buffer.byteLength(json, "utf8")}\n${json}\n`;
	}
	return body;
}

/** A data entry as the RPC endpoint sends it: the payload is a JSON string. */
export function wrbEntry(procedureId: string, payload: unknown): unknown[] {
	return ["wrb.fr", procedureId, JSON.stringify(payload), null, null, null, "generic"];
}

export function cookie(name: string, value: string, domain = ".google.com"): CookieRecord {
	return {
		name,
		value,
		domain,
		path: "/",
		secure: true,
		httpOnly: false,
		sameSite: "Lax",
		expiresAt: null,
	};
}

export function sessionRecords(omit: readonly string[] = []): CookieRecord[] {
	const values: Record<string, string> = {
		SID: "test-sid",
		HSID: "test-hsid",
		SSID: "test-ssid",
		APISID: "test-apisid",
		SAPISID: TEST_SECRET,
	};
	return Object.entries(values)
		.filter(([name]) => !omit.includes(name))
		.map(([name, value]) => cookie(name, value));
}

export class FakeCookieSource implements CookieSource {
	readonly browser: BrowserName;
	reads = 0;
	private _result: CookieRecord[] | Error;

	constructor(browser: BrowserName, result: CookieRecord[] | Error) {
		this.browser = browser;
		this._result = result;
	}

	async read(_domain: string): Promise<CookieRecord[]> {
		this.reads++;
		if (this._result instanceof Error) {
			throw this._result;
		}
		return this._result;
	}
}

/** Chrome holds a complete session; every other browser has none. */
export function chromeSessionSource(browser: BrowserName): CookieSource {
	return browser === "chrome"
		? new FakeCookieSource(browser, sessionRecords())
		: new FakeCookieSource(browser, new SessionNotFoundError(`no ${browser} cookie store`));
}

export interface RecordedRequest {
	url: string;
	method: string;
	headers: Headers;
	body: string;
	signal: AbortSignal | undefined;
}

export type Responder = (request: RecordedRequest) => Response | Promise<Response>;

/**
 * A fetch that answers each call with the next responder in order and
 * records what was sent. Rejects like the real one when the signal is
 * already aborted.
 */
export function scriptedFetch(responders: readonly Responder[]): {
	fetch: typeof fetch;
	requests: RecordedRequest[];
} {
	const requests: RecordedRequest[] = [];
	const fetchFn = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
		const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
		const request: RecordedRequest = {
			url,
			method: init?.method ?? "GET",
			headers: new Headers(init?.headers),
			body: typeof init?.body === "string" ? init.body : "",
			signal: init?.signal ?? undefined,
		};
		requests.push(request);

		if (request.signal?.aborted) {
			throw new Error("This operation was aborted");
		}
		const responder = responders[requests.length - 1];
		if (!responder) {
			throw new Error(`unexpected request #${requests.length} to ${url}`);
		}
		return responder(request);
	};
	return { fetch: fetchFn, requests };
}

export function rpcResponse(...frames: unknown[][]): Responder {
	return () => new Response(encodeFrames(frames), { status: 200 });
}

/** The 400 the endpoint answers with when `at` is missing or stale. */
export function tokenResponse(token: string): Responder {
	return () =>
		new Response(
			encodeFrames([
				[
					["er", null, null, null, null, 400, null, null, null, 3],
					["xsrf", token, null, null, null, 1],
				],
			]),
			{ status: 400 },
		);
}

export function jsonResponse(body: unknown, status = 200): Responder {
	return () =>
		new Response(JSON.stringify(body), {
			status,
			headers: { "Content-Type": "application/json" },
		});
}

export function textResponse(text: string, status: number): Responder {
	return () => new Response(text, { status });
}

/** Never answers; rejects once the request signal aborts. */
export const hangingResponse: Responder = (request) =>
	new Promise<Response>((_resolve, reject) => {
		request.signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
	});

/** `f.req` inner argument list of a recorded batch request. */
export function batchArgs(request: RecordedRequest): unknown {
	const freq = new URLSearchParams(request.body).get("f.req") ?? "[]";
	const batch: unknown = JSON.parse(freq);
	if (!Array.isArray(batch) || !Array.isArray(batch[0]) || !Array.isArray(batch[0][0])) {
		return undefined;
	}
	const inner: unknown = batch[0][0][1];
	return typeof inner === "string" ? JSON.parse(inner) : undefined;
}
