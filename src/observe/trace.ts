export interface RpcTraceEntry {
	procedureId: string;
	timestamp: number;
	durationMs: number;
	ok: boolean;
	error?: string;
	/** True when the call was resent after an anti-forgery token refresh. */
	tokenRefreshed: boolean;
	frames?: number;
}

export interface RpcTraceStats {
	callsTotal: number;
	callsByProcedure: Record<string, number>;
	callsByOutcome: { ok: number; failed: number };
	tokenRefreshesTotal: number;
	durationP50Ms: number;
	durationP95Ms: number;
}

interface RpcTraceOptions {
	maxEntries?: number;
}

/** Bounded in-memory record of RPC round trips, newest last. */
export class RpcTrace {
	private _entries: RpcTraceEntry[] = [];
	private _maxEntries: number;

	constructor(opts: RpcTraceOptions = {}) {
		this._maxEntries = Math.max(1, opts.maxEntries ?? 1000);
	}

	record(entry: RpcTraceEntry): void {
		this._entries.push(entry);
		if (this._entries.length > this._maxEntries) {
			this._entries.splice(0, this._entries.length - this._maxEntries);
		}
	}

	recent(limit = 20): RpcTraceEntry[] {
		return this._entries.slice(-Math.max(0, limit));
	}

	summary(limit = 20): string {
		const entries = this.recent(limit);
		if (entries.length === 0) {
			return "no calls recorded";
		}

		const lines = entries.map((e, i) => {
			const status = e.ok ? "OK" : `FAIL: ${e.error ?? "unknown"}`;
			const refreshed = e.tokenRefreshed ? " [token refreshed]" : "";
			return `${i + 1}. ${e.procedureId} → ${status} (${e.durationMs}ms)${refreshed}`;
		});

		return lines.join("\n");
	}

	stats(): RpcTraceStats {
		const sorted = this._entries.map((e) => e.durationMs).sort((a, b) => a - b);
		const callsByProcedure: Record<string, number> = {};
		let ok = 0;
		let tokenRefreshes = 0;
		for (const entry of this._entries) {
			callsByProcedure[entry.procedureId] = (callsByProcedure[entry.procedureId] ?? 0) + 1;
			if (entry.ok) {
				ok++;
			}
			if (entry.tokenRefreshed) {
				tokenRefreshes++;
			}
		}

		return {
			callsTotal: this._entries.length,
			callsByProcedure,
			callsByOutcome: { ok, failed: this._entries.length - ok },
			tokenRefreshesTotal: tokenRefreshes,
			durationP50Ms: percentile(sorted, 0.5),
			durationP95Ms: percentile(sorted, 0.95),
		};
	}

	reset(): void {
		this._entries = [];
	}
}

function percentile(sorted: number[], p: number): number {
	if (sorted.length === 0) {
		return 0;
	}
	const idx = Math.ceil(sorted.length * p) - 1;
	return sorted[Math.max(0, idx)] ?? 0;
}
