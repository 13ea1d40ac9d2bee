import { describe, expect, it } from "vitest";
import type { RpcTraceEntry } from "../../src/observe/trace.js";
import { RpcTrace } from "../../src/observe/trace.js";

function entry(overrides: Partial<RpcTraceEntry> = {}): RpcTraceEntry {
	return {
		procedureId: "nDAfwb",
		timestamp: 1_700_000_000_000,
		durationMs: 10,
		ok: true,
		tokenRefreshed: false,
		...overrides,
	};
}

describe("RpcTrace", () => {
	it("should record and return recent entries", () => {
		const trace = new RpcTrace();
		trace.record(entry({ procedureId: "nDAfwb" }));
		trace.record(entry({ procedureId: "gydQ5d" }));

		const entries = trace.recent();
		expect(entries).toHaveLength(2);
		expect(entries[0]?.procedureId).toBe("nDAfwb");
		expect(entries[1]?.procedureId).toBe("gydQ5d");
	});

	it("should drop the oldest entries past maxEntries", () => {
		const trace = new RpcTrace({ maxEntries: 2 });
		trace.record(entry({ procedureId: "a" }));
		trace.record(entry({ procedureId: "b" }));
		trace.record(entry({ procedureId: "c" }));

		expect(trace.recent().map((e) => e.procedureId)).toEqual(["b", "c"]);
	});

	it("should limit recent entries", () => {
		const trace = new RpcTrace();
		for (let i = 0; i < 5; i++) {
			trace.record(entry({ durationMs: i }));
		}
		expect(trace.recent(2).map((e) => e.durationMs)).toEqual([3, 4]);
	});

	it("should produce a human-readable summary", () => {
		const trace = new RpcTrace();
		trace.record(entry({ procedureId: "nDAfwb", durationMs: 12 }));
		trace.record(
			entry({ procedureId: "gydQ5d", durationMs: 30, ok: false, error: "RPC_AUTH", tokenRefreshed: true }),
		);

		expect(trace.summary()).toBe(
			"1. nDAfwb → OK (12ms)\n2. gydQ5d → FAIL: RPC_AUTH (30ms) [token refreshed]",
		);
	});

	it("should report when nothing was recorded", () => {
		expect(new RpcTrace().summary()).toBe("no calls recorded");
	});

	it("should aggregate counts and latency percentiles", () => {
		const trace = new RpcTrace();
		trace.record(entry({ procedureId: "nDAfwb", durationMs: 40 }));
		trace.record(entry({ procedureId: "nDAfwb", durationMs: 10, tokenRefreshed: true }));
		trace.record(entry({ procedureId: "OLiH4d", durationMs: 30, ok: false, error: "RPC_DECODE" }));
		trace.record(entry({ procedureId: "nDAfwb", durationMs: 20 }));

		expect(trace.stats()).toEqual({
			callsTotal: 4,
			callsByProcedure: { nDAfwb: 3, OLiH4d: 1 },
			callsByOutcome: { ok: 3, failed: 1 },
			tokenRefreshesTotal: 1,
			durationP50Ms: 20,
			durationP95Ms: 40,
		});
	});

	it("should clear entries on reset", () => {
		const trace = new RpcTrace();
		trace.record(entry());
		trace.reset();
		expect(trace.recent()).toHaveLength(0);
		expect(trace.stats().durationP50Ms).toBe(0);
	});
});
