/**
 * Batched RPC transport for the Search Console web endpoint.
 *
 * Each call resolves credentials (cookies, authorization token,
 * anti-forgery token), posts one `f.req` batch, and parses the streamed
 * length-prefixed frames into a flat envelope. The channel keeps no
 * per-call state; caches live in the injected providers.
 */

import { currentTimestampSeconds, generateAuthToken } from "../auth/auth-token.js";
import {
	IncompleteSessionError,
	RpcAuthError,
	RpcTransportError,
	SearchConsoleError,
} from "../errors.js";
import type { Logger } from "../observe/logger.js";
import type { RpcTrace } from "../observe/trace.js";
import type { SessionCookieProvider } from "../session/cookie-provider.js";
import type { CookieSet } from "../session/cookies.js";
import { buildCookieHeader, sessionSecret } from "../session/cookies.js";
import type {
	AntiForgeryProbe,
	AntiForgeryTokenCache,
	ProbeOptions,
	ProbeResponse,
} from "./anti-forgery.js";
import { extractAntiForgeryToken } from "./anti-forgery.js";
import type { TimedResponse } from "./deadline.js";
import { fetchWithDeadline } from "./deadline.js";
import type { DecodedEnvelope } from "./frames.js";
import { parseFrames, toEnvelope } from "./frames.js";

export const DEFAULT_RPC_ORIGIN = "https://search.google.com";
export const BATCH_EXECUTE_PATH = "/_/SearchConsoleAggReportUi/data/batchexecute";
export const DEFAULT_SOURCE_PATH = "/search-console/performance/search-analytics";
export const DEFAULT_RPC_TIMEOUT_MS = 30_000;
export const BROWSER_USER_AGENT =
	"Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36";

/** Status codes carried in a `wrb.fr` error slot. */
const REMOTE_UNAUTHENTICATED = 16;
const REMOTE_PERMISSION_DENIED = 7;

export type JsonValue =
	| string
	| number
	| boolean
	| null
	| JsonValue[]
	| { [key: string]: JsonValue };

export interface RpcRequest {
	readonly procedureId: string;
	readonly args: readonly JsonValue[];
}

export interface RpcCallOptions extends ProbeOptions {}

export interface RpcChannelOptions {
	cookies: SessionCookieProvider;
	antiForgery: AntiForgeryTokenCache;
	logger: Logger;
	trace?: RpcTrace;
	fetch?: typeof fetch;
	/** Clock in epoch milliseconds. */
	now?: () => number;
	origin?: string;
	sourcePath?: string;
	language?: string;
	timeoutMs?: number;
}

type SendOutcome =
	| { tag: "ok"; envelope: DecodedEnvelope; frames: number }
	| { tag: "token-rejected" };

export function buildRequestBody(request: RpcRequest, antiForgeryToken?: string): string {
	const batch = [[[request.procedureId, JSON.stringify(request.args), null, "generic"]]];
	const params = new URLSearchParams({ "f.req": JSON.stringify(batch) });
	if (antiForgeryToken !== undefined) {
		params.set("at", antiForgeryToken);
	}
	return `${params.toString()}&`;
}

export class RpcChannel implements AntiForgeryProbe {
	private _cookies: SessionCookieProvider;
	private _antiForgery: AntiForgeryTokenCache;
	private _log: Logger;
	private _trace: RpcTrace | undefined;
	private _fetch: typeof fetch;
	private _now: () => number;
	private _origin: string;
	private _sourcePath: string;
	private _language: string;
	private _timeoutMs: number;

	constructor(opts: RpcChannelOptions) {
		this._cookies = opts.cookies;
		this._antiForgery = opts.antiForgery;
		this._log = opts.logger.child({ component: "rpc-channel" });
		this._trace = opts.trace;
		this._fetch = opts.fetch ?? fetch;
		this._now = opts.now ?? Date.now;
		this._origin = opts.origin ?? DEFAULT_RPC_ORIGIN;
		this._sourcePath = opts.sourcePath ?? DEFAULT_SOURCE_PATH;
		this._language = opts.language ?? "en";
		this._timeoutMs = opts.timeoutMs ?? DEFAULT_RPC_TIMEOUT_MS;
	}

	/**
	 * Sends one procedure call. An anti-forgery rejection is answered with
	 * exactly one token refresh and resend; a second rejection is surfaced.
	 */
	async call(
		procedureId: string,
		args: readonly JsonValue[],
		opts: RpcCallOptions = {},
	): Promise<DecodedEnvelope> {
		const request: RpcRequest = { procedureId, args };
		const startedAt = performance.now();
		let tokenRefreshed = false;

		try {
			let outcome = await this._send(request, opts);
			if (outcome.tag === "token-rejected") {
				this._log.info({ procedureId }, "anti-forgery token rejected; refreshing once");
				tokenRefreshed = true;
				await this._antiForgery.refresh(this, opts);
				outcome = await this._send(request, opts);
			}
			if (outcome.tag === "token-rejected") {
				throw new RpcAuthError(
					`anti-forgery token rejected twice for procedure ${procedureId}`,
					{
						status: 400,
						recoveryHint:
							"Call refresh_google_session; if it keeps failing, log out and back in to Google in the browser.",
					},
				);
			}

			const durationMs = Math.round(performance.now() - startedAt);
			this._trace?.record({
				procedureId,
				timestamp: this._now(),
				durationMs,
				ok: true,
				tokenRefreshed,
				frames: outcome.frames,
			});
			this._log.debug({ procedureId, durationMs, frames: outcome.frames }, "rpc call completed");
			return outcome.envelope;
		} catch (err) {
			const durationMs = Math.round(performance.now() - startedAt);
			const message = err instanceof Error ? err.message : String(err);
			this._trace?.record({
				procedureId,
				timestamp: this._now(),
				durationMs,
				ok: false,
				error: err instanceof SearchConsoleError ? err.code : message,
				tokenRefreshed,
			});
			this._log.warn({ procedureId, durationMs, error: message }, "rpc call failed");
			throw err;
		}
	}

	/** Posts a batch without the `at` parameter; the rejection body carries a token. */
	async probe(opts: ProbeOptions = {}): Promise<ProbeResponse> {
		const cookies = await this._cookies.getCookies();
		const request: RpcRequest = { procedureId: "probe", args: [] };
		const response = await this._post(request, cookies, undefined, opts);
		return { status: response.status, body: response.body.toString("utf8") };
	}

	private async _send(request: RpcRequest, opts: RpcCallOptions): Promise<SendOutcome> {
		const cookies = await this._cookies.getCookies();
		const token = await this._antiForgery.getToken(this, opts);
		const response = await this._post(request, cookies, token, opts);

		if (response.status === 400 && extractAntiForgeryToken(response.body.toString("utf8"))) {
			return { tag: "token-rejected" };
		}
		if (response.status === 401 || response.status === 403) {
			throw new RpcAuthError(
				`Google rejected the session for procedure ${request.procedureId} (HTTP ${response.status})`,
				{ status: response.status },
			);
		}
		if (response.status < 200 || response.status >= 300) {
			throw new RpcTransportError(
				`procedure ${request.procedureId} failed with HTTP ${response.status}`,
				{ status: response.status },
			);
		}

		const frames = parseFrames(response.body);
		const envelope = toEnvelope(frames);
		assertNoRemoteError(envelope, request.procedureId);
		return { tag: "ok", envelope, frames: frames.length };
	}

	private async _post(
		request: RpcRequest,
		cookies: CookieSet,
		antiForgeryToken: string | undefined,
		opts: ProbeOptions,
	): Promise<TimedResponse> {
		const secret = sessionSecret(cookies);
		if (!secret) {
			throw new IncompleteSessionError(["SAPISID"]);
		}

		const url = this._url(request.procedureId);
		const headers: Record<string, string> = {
			Authorization: generateAuthToken(secret, currentTimestampSeconds(this._now()), this._origin),
			Cookie: buildCookieHeader(cookies),
			"Content-Type": "application/x-www-form-urlencoded;charset=utf-8",
			Origin: this._origin,
			"X-Origin": this._origin,
			Referer: `${this._origin}/`,
			"X-Same-Domain": "1",
			"X-Goog-AuthUser": "0",
			"User-Agent": BROWSER_USER_AGENT,
			Accept: "*/*",
		};

		return fetchWithDeadline(
			this._fetch,
			url,
			{ method: "POST", headers, body: buildRequestBody(request, antiForgeryToken) },
			{
				timeoutMs: opts.timeoutMs ?? this._timeoutMs,
				signal: opts.signal,
				label: `procedure ${request.procedureId}`,
			},
		);
	}

	private _url(procedureId: string): string {
		const params = new URLSearchParams({
			rpcids: procedureId,
			"source-path": this._sourcePath,
			hl: this._language,
			_reqid: String(Math.floor(Math.random() * 900_000) + 100_000),
			rt: "c",
		});
		return `${this._origin}${BATCH_EXECUTE_PATH}?${params.toString()}`;
	}
}

/**
 * A `wrb.fr` entry with no payload and a status array in slot 5 is a
 * remote failure for that procedure.
 */
function assertNoRemoteError(envelope: DecodedEnvelope, procedureId: string): void {
	for (const entry of envelope) {
		if (!Array.isArray(entry) || entry[0] !== "wrb.fr" || entry[1] !== procedureId) {
			continue;
		}
		const status = entry[5];
		if (entry[2] !== null || !Array.isArray(status) || typeof status[0] !== "number") {
			continue;
		}
		const code = status[0];
		if (code === REMOTE_UNAUTHENTICATED) {
			throw new RpcAuthError(`procedure ${procedureId} reported an unauthenticated session`);
		}
		if (code === REMOTE_PERMISSION_DENIED) {
			throw new RpcAuthError(`procedure ${procedureId} was denied for this account`, {
				recoveryHint:
					"Make sure the logged-in Google account has access to this Search Console property.",
			});
		}
		throw new RpcTransportError(`procedure ${procedureId} failed with remote status ${code}`);
	}
}
