/**
 * The single access point to the browser cookie stores.
 *
 * Reads the Google session cookies from the configured browser (or the
 * fallback order), validates that the required set is complete and caches
 * the result for a short TTL. An explicit browser hint reads only that
 * browser.
 */

import {
	IncompleteSessionError,
	SessionNotFoundError,
	SessionStoreLockedError,
} from "../errors.js";
import type { Logger } from "../observe/logger.js";
import type { BrowserName, CookieSource } from "./browsers.js";
import { DEFAULT_BROWSER_ORDER } from "./browsers.js";
import { ChromiumCookieStore } from "./chromium-store.js";
import type { CookieSet } from "./cookies.js";
import { DEFAULT_REQUIRED_COOKIES, missingCookies, toCookieSet } from "./cookies.js";
import type { CredentialCacheOptions, CredentialCacheStatus } from "./credential-cache.js";
import { CredentialCache } from "./credential-cache.js";
import { FirefoxCookieStore } from "./firefox-store.js";

export const DEFAULT_COOKIE_DOMAIN = "google.com";
export const DEFAULT_COOKIE_TTL_MS = 300_000;

export type CookieSourceFactory = (browser: BrowserName) => CookieSource;

export function defaultCookieSource(browser: BrowserName): CookieSource {
	if (browser === "firefox") {
		return new FirefoxCookieStore();
	}
	return new ChromiumCookieStore({ browser });
}

export interface SessionCookieProviderOptions {
	logger: Logger;
	browser?: BrowserName;
	fallbackOrder?: readonly BrowserName[];
	required?: readonly string[];
	domain?: string;
	ttlMs?: number;
	now?: () => number;
	sourceFor?: CookieSourceFactory;
}

export interface SessionCookieStatus extends CredentialCacheStatus {
	browser: BrowserName | null;
	cookieCount: number;
}

type CandidateFailure = SessionNotFoundError | IncompleteSessionError | SessionStoreLockedError;

export class SessionCookieProvider {
	private _cache: CredentialCache<CookieSet>;
	private _candidates: BrowserName[];
	private _required: readonly string[];
	private _domain: string;
	private _sourceFor: CookieSourceFactory;
	private _sources = new Map<BrowserName, CookieSource>();
	private _log: Logger;
	private _browser: BrowserName | null = null;
	private _cookieCount = 0;

	constructor(opts: SessionCookieProviderOptions) {
		this._log = opts.logger.child({ component: "cookie-provider" });
		const order = opts.fallbackOrder ?? DEFAULT_BROWSER_ORDER;
		this._candidates = [...new Set(opts.browser ? [opts.browser, ...order] : order)];
		this._required = opts.required ?? DEFAULT_REQUIRED_COOKIES;
		this._domain = opts.domain ?? DEFAULT_COOKIE_DOMAIN;
		this._sourceFor = opts.sourceFor ?? defaultCookieSource;
		const cacheOpts: CredentialCacheOptions = {
			name: "session-cookies",
			ttlMs: opts.ttlMs ?? DEFAULT_COOKIE_TTL_MS,
			logger: opts.logger,
		};
		if (opts.now) {
			cacheOpts.now = opts.now;
		}
		this._cache = new CredentialCache<CookieSet>(cacheOpts);
	}

	/** Browser the cached set was read from, if any. */
	get browser(): BrowserName | null {
		return this._browser;
	}

	async getCookies(browserHint?: BrowserName): Promise<CookieSet> {
		if (browserHint && this._browser !== browserHint) {
			return this.refresh(browserHint);
		}
		return this._cache.get(() => this._read(browserHint));
	}

	/** Re-reads the store regardless of TTL and clears a previous failure. */
	async refresh(browserHint?: BrowserName): Promise<CookieSet> {
		return this._cache.refresh(() => this._read(browserHint));
	}

	status(): SessionCookieStatus {
		return { ...this._cache.status(), browser: this._browser, cookieCount: this._cookieCount };
	}

	private async _read(browserHint: BrowserName | undefined): Promise<CookieSet> {
		const candidates = browserHint ? [browserHint] : this._candidates;
		const failures: CandidateFailure[] = [];

		for (const browser of candidates) {
			const outcome = await this._readCandidate(browser);
			if (outcome.tag === "failure") {
				this._log.debug({ browser, code: outcome.error.code }, outcome.error.message);
				failures.push(outcome.error);
				continue;
			}

			this._browser = browser;
			this._cookieCount = outcome.cookies.size;
			this._log.info({ browser, count: outcome.cookies.size }, "session cookies loaded");
			return outcome.cookies;
		}

		throw mostSpecific(failures, candidates);
	}

	private async _readCandidate(
		browser: BrowserName,
	): Promise<{ tag: "success"; cookies: CookieSet } | { tag: "failure"; error: CandidateFailure }> {
		let cookies: CookieSet;
		try {
			const records = await this._source(browser).read(this._domain);
			cookies = toCookieSet(records);
		} catch (err) {
			return { tag: "failure", error: asCandidateFailure(err, browser) };
		}

		if (cookies.size === 0) {
			return {
				tag: "failure",
				error: new SessionNotFoundError(`no ${this._domain} cookies found in ${browser}`),
			};
		}
		const missing = missingCookies(cookies, this._required);
		if (missing.length > 0) {
			return { tag: "failure", error: new IncompleteSessionError(missing) };
		}
		return { tag: "success", cookies };
	}

	private _source(browser: BrowserName): CookieSource {
		let source = this._sources.get(browser);
		if (!source) {
			source = this._sourceFor(browser);
			this._sources.set(browser, source);
		}
		return source;
	}
}

function asCandidateFailure(err: unknown, browser: BrowserName): CandidateFailure {
	if (
		err instanceof SessionNotFoundError ||
		err instanceof SessionStoreLockedError ||
		err instanceof IncompleteSessionError
	) {
		return err;
	}
	const reason = err instanceof Error ? err.message : String(err);
	return new SessionNotFoundError(`failed to read ${browser} cookies (${reason})`, undefined, {
		cause: err,
	});
}

/** Locked beats incomplete beats not found. */
function mostSpecific(failures: CandidateFailure[], candidates: BrowserName[]): CandidateFailure {
	const locked = failures.find((f) => f instanceof SessionStoreLockedError);
	if (locked) {
		return locked;
	}
	const incomplete = failures.find((f) => f instanceof IncompleteSessionError);
	if (incomplete) {
		return incomplete;
	}
	if (failures.length === 1 && failures[0]) {
		return failures[0];
	}
	return new SessionNotFoundError(
		`no Google session found in any browser (tried ${candidates.join(", ")})`,
	);
}
