import { describe, expect, it, vi } from "vitest";
import { AntiForgeryFetchFailedError } from "../../src/errors.js";
import type { ProbeResponse } from "../../src/rpc/anti-forgery.js";
import { AntiForgeryTokenCache, extractAntiForgeryToken } from "../../src/rpc/anti-forgery.js";
import { encodeFrames, silentLogger } from "../helpers.js";

function rejection(token: string): ProbeResponse {
	return {
		status: 400,
		body: encodeFrames([[["er", null, null, null, null, 400], ["xsrf", token, null, null, null, 1]]]),
	};
}

/** A probe that stays pending until `answer` is called. */
function createPendingProbe() {
	let answer: (response: ProbeResponse) => void = () => {};
	const probe = vi.fn(
		() =>
			new Promise<ProbeResponse>((resolve) => {
				answer = resolve;
			}),
	);
	return { channel: { probe }, answer: (response: ProbeResponse) => answer(response) };
}

function createProbe(...responses: ProbeResponse[]) {
	const probe = vi.fn<() => Promise<ProbeResponse>>();
	for (const response of responses) {
		probe.mockResolvedValueOnce(response);
	}
	return { probe };
}

describe("extractAntiForgeryToken", () => {
	it("should find the token in a rejection body", () => {
		expect(extractAntiForgeryToken(rejection("test-token").body)).toBe("test-token");
	});

	it("should return undefined when there is none", () => {
		expect(extractAntiForgeryToken(')]}\'\n\n[["er",null]]')).toBeUndefined();
	});
});

describe("AntiForgeryTokenCache", () => {
	it("should probe once and reuse the token", async () => {
		const channel = createProbe(rejection("tok-1"));
		const cache = new AntiForgeryTokenCache({ logger: silentLogger() });

		expect(await cache.getToken(channel)).toBe("tok-1");
		expect(await cache.getToken(channel)).toBe("tok-1");
		expect(channel.probe).toHaveBeenCalledTimes(1);
		expect(cache.status().state).toBe("cached");
	});

	it("should share one probe between concurrent callers", async () => {
		const channel = createProbe(rejection("tok-1"));
		const cache = new AntiForgeryTokenCache({ logger: silentLogger() });

		const tokens = await Promise.all([cache.getToken(channel), cache.getToken(channel)]);

		expect(tokens).toEqual(["tok-1", "tok-1"]);
		expect(channel.probe).toHaveBeenCalledTimes(1);
	});

	it("should let one caller stop waiting without failing the others", async () => {
		const { channel, answer } = createPendingProbe();
		const cache = new AntiForgeryTokenCache({ logger: silentLogger() });
		const controller = new AbortController();

		const first = cache.getToken(channel, { signal: controller.signal }).catch((e: unknown) => e);
		const second = cache.getToken(channel);
		controller.abort();
		answer(rejection("tok-1"));

		expect(await first).toMatchObject({ message: "procedure probe was cancelled" });
		expect(await second).toBe("tok-1");
		expect(channel.probe).toHaveBeenCalledTimes(1);
		expect(channel.probe).toHaveBeenCalledWith();
	});

	it("should time out one caller's wait while the probe carries on", async () => {
		const { channel, answer } = createPendingProbe();
		const cache = new AntiForgeryTokenCache({ logger: silentLogger() });

		const first = cache.getToken(channel, { timeoutMs: 20 }).catch((e: unknown) => e);
		const second = cache.getToken(channel);

		expect(await first).toMatchObject({ message: "procedure probe timed out after 20ms" });
		answer(rejection("tok-1"));
		expect(await second).toBe("tok-1");
		expect(cache.status().state).toBe("cached");
	});

	it("should not start a probe for a caller that already gave up", async () => {
		const { channel } = createPendingProbe();
		const cache = new AntiForgeryTokenCache({ logger: silentLogger() });
		const controller = new AbortController();
		controller.abort();

		await expect(cache.refresh(channel, { signal: controller.signal })).rejects.toThrow(
			"procedure probe was cancelled",
		);
		expect(channel.probe).not.toHaveBeenCalled();
	});

	it("should probe again on refresh", async () => {
		const channel = createProbe(rejection("tok-1"), rejection("tok-2"));
		const cache = new AntiForgeryTokenCache({ logger: silentLogger() });

		await cache.getToken(channel);
		expect(await cache.refresh(channel)).toBe("tok-2");
		expect(await cache.getToken(channel)).toBe("tok-2");
	});

	it("should expire the token after its TTL", async () => {
		const clock = { now: 0 };
		const channel = createProbe(rejection("tok-1"), rejection("tok-2"));
		const cache = new AntiForgeryTokenCache({ logger: silentLogger(), ttlMs: 1_000, now: () => clock.now });

		await cache.getToken(channel);
		clock.now = 1_001;

		expect(await cache.getToken(channel)).toBe("tok-2");
	});

	it("should fail and turn invalid when the probe carries no token", async () => {
		const channel = createProbe({ status: 200, body: ")]}'\n\n" });
		const cache = new AntiForgeryTokenCache({ logger: silentLogger() });

		const err = await cache.getToken(channel).catch((e: unknown) => e);

		expect(err).toBeInstanceOf(AntiForgeryFetchFailedError);
		expect(err).toMatchObject({ message: "anti-forgery probe (HTTP 200) returned no token" });
		expect(cache.status().state).toBe("invalid");
	});

	it("should return to empty on invalidate", async () => {
		const cache = new AntiForgeryTokenCache({ logger: silentLogger() });
		await cache.getToken(createProbe(rejection("tok-1")));

		cache.invalidate();

		expect(cache.status().state).toBe("empty");
	});
});
