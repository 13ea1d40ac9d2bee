import { createHash } from "node:crypto";
import { InvalidArgumentError } from "../errors.js";

export const DEFAULT_AUTH_SCHEME = "SAPISIDHASH";

/** Anything at or above this is a millisecond timestamp, not seconds. */
const MILLISECOND_MAGNITUDE = 100_000_000_000;

export function currentTimestampSeconds(nowMs: number = Date.now()): number {
	return Math.floor(nowMs / 1000);
}

/**
 * Derives the per-request `Authorization` value for the cookie session:
 * `"<scheme> <ts>_<sha1hex(ts + " " + secret + " " + origin)>"`.
 *
 * `timestampSeconds` must be whole wall-clock seconds; the remote side
 * rejects any other granularity.
 */
export function generateAuthToken(
	sessionSecret: string,
	timestampSeconds: number,
	origin: string,
	scheme: string = DEFAULT_AUTH_SCHEME,
): string {
	if (!Number.isInteger(timestampSeconds) || timestampSeconds < 0) {
		throw new InvalidArgumentError(
			`timestamp must be a non-negative integer number of seconds, got ${timestampSeconds}`,
		);
	}
	if (timestampSeconds >= MILLISECOND_MAGNITUDE) {
		throw new InvalidArgumentError(
			`timestamp ${timestampSeconds} looks like milliseconds; pass seconds`,
			"Divide the timestamp by 1000 (see currentTimestampSeconds).",
		);
	}
	if (!sessionSecret) {
		throw new InvalidArgumentError("session secret is empty");
	}

	const digest = createHash("sha1")
		.update(`${timestampSeconds} ${sessionSecret} ${origin}`, "utf8")
		.digest("hex");
	return `${scheme} ${timestampSeconds}_${digest}`;
}
