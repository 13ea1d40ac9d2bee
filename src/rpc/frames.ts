/**
 * Length-prefixed frame parsing for the streamed RPC response body.
 *
 * Body layout: an optional anti-XSSI prefix `)]}'`, then repeated
 * `<decimal byte count>\n<JSON array of exactly that many UTF-8 bytes>`,
 * separated by whitespace. Frame payloads are concatenated into one
 * envelope of entries.
 */

import { RpcDecodeError } from "../errors.js";

export interface RpcFrame {
	byteCount: number;
	payload: unknown[];
}

/** Every top-level entry of every frame, in order. */
export type DecodedEnvelope = unknown[];

const ANTI_XSSI_PREFIX = Buffer.from(")]}'", "utf8");
const NEWLINE = 0x0a;

function isWhitespace(byte: number): boolean {
	return byte === 0x20 || byte === 0x0a || byte === 0x0d || byte === 0x09;
}

function isDigit(byte: number): boolean {
	return byte >= 0x30 && byte <= 0x39;
}

function skipWhitespace(body: Buffer, offset: number): number {
	let cursor = offset;
	while (cursor < body.length && isWhitespace(body[cursor] ?? 0)) {
		cursor++;
	}
	return cursor;
}

export function parseFrames(body: Buffer): RpcFrame[] {
	let offset = 0;
	if (body.subarray(0, ANTI_XSSI_PREFIX.length).equals(ANTI_XSSI_PREFIX)) {
		offset = ANTI_XSSI_PREFIX.length;
	}

	const frames: RpcFrame[] = [];
	offset = skipWhitespace(body, offset);
	while (offset < body.length) {
		const lineEnd = body.indexOf(NEWLINE, offset);
		if (lineEnd === -1) {
			throw new RpcDecodeError(`frame length line at byte ${offset} is not terminated`);
		}

		const lengthText = body.subarray(offset, lineEnd).toString("utf8").trim();
		if (!/^\d+$/.test(lengthText)) {
			throw new RpcDecodeError(
				`expected a frame byte count at byte ${offset}, found ${JSON.stringify(lengthText.slice(0, 20))}`,
			);
		}

		const byteCount = Number.parseInt(lengthText, 10);
		const start = lineEnd + 1;
		const end = start + byteCount;
		if (end > body.length) {
			throw new RpcDecodeError(
				`frame at byte ${offset} declares ${byteCount} bytes but only ${body.length - start} remain`,
			);
		}

		frames.push({ byteCount, payload: parsePayload(body.subarray(start, end), offset) });

		offset = skipWhitespace(body, end);
		if (offset < body.length && !isDigit(body[offset] ?? 0)) {
			throw new RpcDecodeError(
				`frame at byte ${start} overruns its declared ${byteCount} bytes`,
			);
		}
	}
	return frames;
}

function parsePayload(bytes: Buffer, frameOffset: number): unknown[] {
	let parsed: unknown;
	try {
		parsed = JSON.parse(bytes.toString("utf8"));
	} catch (err) {
		throw new RpcDecodeError(
			`frame at byte ${frameOffset} does not end on a JSON boundary`,
			undefined,
			{ cause: err },
		);
	}
	if (!Array.isArray(parsed)) {
		throw new RpcDecodeError(`frame at byte ${frameOffset} is not a JSON array`);
	}
	return parsed;
}

export function toEnvelope(frames: readonly RpcFrame[]): DecodedEnvelope {
	return frames.flatMap((frame) => frame.payload);
}
