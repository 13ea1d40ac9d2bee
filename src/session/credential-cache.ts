/**
 * TTL cache with a single in-flight fetch and an explicit lifecycle:
 *
 *   empty → cached → expired → cached (on refresh)
 *   empty | expired → invalid (fetch failed; terminal until refresh())
 *
 * Concurrent callers racing on an empty or expired entry share one fetch.
 * `invalidate()` also detaches a fetch still in flight: its callers get the
 * value, the cache does not.
 * Nothing runs in the background; expiry is noticed by the next `get()`.
 */

import { RpcTransportError } from "../errors.js";
import type { Logger } from "../observe/logger.js";

export type CredentialState = "empty" | "cached" | "expired" | "invalid";

export interface CredentialEntry<T> {
	value: T;
	fetchedAt: number;
	ttlMs: number;
}

export interface CredentialCacheOptions {
	name: string;
	ttlMs: number;
	logger: Logger;
	/** Clock in epoch milliseconds. */
	now?: () => number;
}

export interface CredentialCacheStatus {
	name: string;
	state: CredentialState;
	fetchedAt: number | null;
	expiresAt: number | null;
	lastError: string | null;
}

export class CredentialCache<T> {
	private _entry: CredentialEntry<T> | null = null;
	private _failure: unknown = null;
	private _inflight: Promise<T> | null = null;
	private _generation = 0;
	private _name: string;
	private _ttlMs: number;
	private _now: () => number;
	private _log: Logger;

	constructor(opts: CredentialCacheOptions) {
		this._name = opts.name;
		this._ttlMs = opts.ttlMs;
		this._now = opts.now ?? Date.now;
		this._log = opts.logger.child({ component: "credential-cache", cache: opts.name });
	}

	get state(): CredentialState {
		if (this._failure !== null) {
			return "invalid";
		}
		if (!this._entry) {
			return "empty";
		}
		return this._now() - this._entry.fetchedAt > this._entry.ttlMs ? "expired" : "cached";
	}

	/** Returns the cached value, fetching it when empty or expired. */
	async get(fetcher: () => Promise<T>): Promise<T> {
		const state = this.state;
		if (state === "invalid") {
			throw this._failure;
		}
		if (state === "cached" && this._entry) {
			return this._entry.value;
		}
		return this._fetch(fetcher);
	}

	/** Drops the cached value and any recorded failure, then fetches anew. */
	async refresh(fetcher: () => Promise<T>): Promise<T> {
		if (this._inflight) {
			return this._inflight;
		}
		this.invalidate();
		return this._fetch(fetcher);
	}

	/** Returns to `empty` without fetching. */
	invalidate(): void {
		this._entry = null;
		this._failure = null;
		this._inflight = null;
		this._generation++;
	}

	status(): CredentialCacheStatus {
		return {
			name: this._name,
			state: this.state,
			fetchedAt: this._entry?.fetchedAt ?? null,
			expiresAt: this._entry ? this._entry.fetchedAt + this._entry.ttlMs : null,
			lastError: describeFailure(this._failure),
		};
	}

	private _fetch(fetcher: () => Promise<T>): Promise<T> {
		if (this._inflight) {
			return this._inflight;
		}

		this._inflight = this._runFetch(fetcher);
		return this._inflight;
	}

	private async _runFetch(fetcher: () => Promise<T>): Promise<T> {
		const generation = this._generation;
		try {
			const value = await fetcher();
			if (generation !== this._generation) {
				this._log.debug("cache invalidated during fetch; result not stored");
				return value;
			}
			this._entry = { value, fetchedAt: this._now(), ttlMs: this._ttlMs };
			this._failure = null;
			this._log.debug({ ttlMs: this._ttlMs }, "credential cached");
			return value;
		} catch (err) {
			// Timeouts and network failures leave the previous state untouched.
			if (generation === this._generation && !(err instanceof RpcTransportError)) {
				this._entry = null;
				this._failure = err;
				this._log.warn({ err: describeFailure(err) }, "credential fetch failed; cache invalid");
			}
			throw err;
		} finally {
			if (generation === this._generation) {
				this._inflight = null;
			}
		}
	}
}

function describeFailure(failure: unknown): string | null {
	if (failure === null) {
		return null;
	}
	return failure instanceof Error ? failure.message : String(failure);
}
