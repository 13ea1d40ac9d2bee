import { AntiForgeryFetchFailedError } from "../errors.js";
import type { Logger } from "../observe/logger.js";
import type { CredentialCacheOptions, CredentialCacheStatus } from "../session/credential-cache.js";
import { CredentialCache } from "../session/credential-cache.js";
import { awaitShared } from "./deadline.js";

export const DEFAULT_ANTI_FORGERY_TTL_MS = 1_800_000;

const PROBE_LABEL = "procedure probe";

/** The rejection body embeds the token as `["xsrf","<token>", …]`. */
const TOKEN_PATTERN = /\["xsrf","([^"\\]+)"/;

export interface ProbeResponse {
	status: number;
	body: string;
}

export interface ProbeOptions {
	timeoutMs?: number;
	signal?: AbortSignal;
}

/** What the cache needs from the channel: one request sent without a token. */
export interface AntiForgeryProbe {
	probe(opts?: ProbeOptions): Promise<ProbeResponse>;
}

export function extractAntiForgeryToken(body: string): string | undefined {
	return TOKEN_PATTERN.exec(body)?.[1];
}

export interface AntiForgeryTokenCacheOptions {
	logger: Logger;
	ttlMs?: number;
	now?: () => number;
}

export class AntiForgeryTokenCache {
	private _cache: CredentialCache<string>;
	private _log: Logger;

	constructor(opts: AntiForgeryTokenCacheOptions) {
		this._log = opts.logger.child({ component: "anti-forgery" });
		const cacheOpts: CredentialCacheOptions = {
			name: "anti-forgery-token",
			ttlMs: opts.ttlMs ?? DEFAULT_ANTI_FORGERY_TTL_MS,
			logger: opts.logger,
		};
		if (opts.now) {
			cacheOpts.now = opts.now;
		}
		this._cache = new CredentialCache<string>(cacheOpts);
	}

	/**
	 * The probe itself runs under the channel's own deadline. `opts` bounds
	 * how long this caller waits for it, not the probe other callers share.
	 */
	async getToken(channel: AntiForgeryProbe, opts: ProbeOptions = {}): Promise<string> {
		return awaitShared(() => this._cache.get(() => this._fetch(channel)), {
			...opts,
			label: PROBE_LABEL,
		});
	}

	/** Forces a new probe; concurrent callers share it. */
	async refresh(channel: AntiForgeryProbe, opts: ProbeOptions = {}): Promise<string> {
		return awaitShared(() => this._cache.refresh(() => this._fetch(channel)), {
			...opts,
			label: PROBE_LABEL,
		});
	}

	invalidate(): void {
		this._cache.invalidate();
	}

	status(): CredentialCacheStatus {
		return this._cache.status();
	}

	private async _fetch(channel: AntiForgeryProbe): Promise<string> {
		const response = await channel.probe();
		const token = extractAntiForgeryToken(response.body);
		if (!token) {
			throw new AntiForgeryFetchFailedError(
				`anti-forgery probe (HTTP ${response.status}) returned no token`,
			);
		}
		this._log.debug({ status: response.status }, "anti-forgery token obtained");
		return token;
	}
}
