/**
 * Locates the data-bearing `wrb.fr` entries of a decoded envelope and
 * unwraps their inner payload into raw rows.
 *
 * The row list has been observed nested three ways, tried in a fixed order:
 *
 *   A  payload[0][0] is the row list, rows are flat
 *   B  as A, every row wrapped in a one-element array
 *   C  payload[0] is the row list
 *
 * Each shape decoder returns a tagged result; nothing is guessed by
 * exception handling.
 */

import { RpcDecodeError } from "../errors.js";
import type { DecodedEnvelope } from "./frames.js";

export type DimensionValue = string | number | boolean | null;

/** `[typeCode, ...valueCandidates]` or null. */
export type MetricSlot = readonly unknown[] | null;

export interface RawRow {
	readonly dimensionInfo: readonly DimensionValue[];
	readonly slots: readonly MetricSlot[];
}

export type PayloadShape = "A" | "B" | "C" | "empty";

export interface DecodeResult {
	rows: RawRow[];
	/** List entries that were not rows. */
	skipped: number;
	shape: PayloadShape;
}

type ShapeResult =
	| { tag: "match"; rows: RawRow[]; skipped: number }
	| { tag: "mismatch"; reason: string };

interface ShapeDecoder {
	shape: Exclude<PayloadShape, "empty">;
	decode(payload: unknown[]): ShapeResult;
}

function isDimensionValue(value: unknown): value is DimensionValue {
	return (
		value === null ||
		typeof value === "string" ||
		typeof value === "number" ||
		typeof value === "boolean"
	);
}

/** `[dimensionInfo, ...metricSlots]` with at least one slot. */
export function asRawRow(value: unknown): RawRow | undefined {
	if (!Array.isArray(value) || value.length < 2) {
		return undefined;
	}
	const [dimensionInfo, ...rest] = value;
	if (!Array.isArray(dimensionInfo) || !dimensionInfo.every(isDimensionValue)) {
		return undefined;
	}
	const slots: MetricSlot[] = [];
	for (const slot of rest) {
		if (slot !== null && !Array.isArray(slot)) {
			return undefined;
		}
		slots.push(slot);
	}
	return { dimensionInfo, slots };
}

function unwrapRow(value: unknown): RawRow | undefined {
	if (!Array.isArray(value) || value.length !== 1) {
		return undefined;
	}
	return asRawRow(value[0]);
}

function decodeList(
	list: unknown,
	where: string,
	toRow: (entry: unknown) => RawRow | undefined,
): ShapeResult {
	if (!Array.isArray(list)) {
		return { tag: "mismatch", reason: `${where} is not a list` };
	}
	const rows: RawRow[] = [];
	let skipped = 0;
	for (const entry of list) {
		const row = toRow(entry);
		if (row) {
			rows.push(row);
		} else {
			skipped++;
		}
	}
	if (list.length > 0 && rows.length === 0) {
		return { tag: "mismatch", reason: `no entry of ${where} is a row` };
	}
	return { tag: "match", rows, skipped };
}

const SHAPE_DECODERS: readonly ShapeDecoder[] = [
	{
		shape: "A",
		decode: (payload) => {
			const outer = payload[0];
			if (!Array.isArray(outer)) {
				return { tag: "mismatch", reason: "payload[0] is not a list" };
			}
			return decodeList(outer[0], "payload[0][0]", asRawRow);
		},
	},
	{
		shape: "B",
		decode: (payload) => {
			const outer = payload[0];
			if (!Array.isArray(outer)) {
				return { tag: "mismatch", reason: "payload[0] is not a list" };
			}
			return decodeList(outer[0], "payload[0][0] (wrapped rows)", unwrapRow);
		},
	},
	{
		shape: "C",
		decode: (payload) => decodeList(payload[0], "payload[0]", asRawRow),
	},
];

/** `null`, `[]` and `[null]` all mean the procedure returned no rows. */
function isEmptyPayload(payload: unknown): boolean {
	if (payload === null) {
		return true;
	}
	return Array.isArray(payload) && (payload.length === 0 || payload[0] === null);
}

function decodePayload(payload: unknown, procedureId: string): DecodeResult {
	if (isEmptyPayload(payload)) {
		return { rows: [], skipped: 0, shape: "empty" };
	}
	if (!Array.isArray(payload)) {
		throw new RpcDecodeError(`procedure ${procedureId} payload is not a JSON array`);
	}

	const reasons: string[] = [];
	for (const decoder of SHAPE_DECODERS) {
		const result = decoder.decode(payload);
		if (result.tag === "match") {
			return { rows: result.rows, skipped: result.skipped, shape: decoder.shape };
		}
		reasons.push(`${decoder.shape}: ${result.reason}`);
	}
	throw new RpcDecodeError(
		`procedure ${procedureId} payload matches no known shape (${reasons.join("; ")})`,
	);
}

function parseInner(inner: unknown, procedureId: string): unknown {
	if (inner === null || inner === undefined) {
		return null;
	}
	if (typeof inner !== "string") {
		throw new RpcDecodeError(`procedure ${procedureId} inner payload is not a JSON string`);
	}
	try {
		return JSON.parse(inner);
	} catch (err) {
		throw new RpcDecodeError(
			`procedure ${procedureId} inner payload is not valid JSON`,
			undefined,
			{ cause: err },
		);
	}
}

export function decode(envelope: DecodedEnvelope, procedureId: string): DecodeResult {
	const entries = envelope.filter(
		(entry): entry is unknown[] =>
			Array.isArray(entry) && entry[0] === "wrb.fr" && entry[1] === procedureId,
	);
	if (entries.length === 0) {
		throw new RpcDecodeError(`response carries no data entry for procedure ${procedureId}`);
	}

	const combined: DecodeResult = { rows: [], skipped: 0, shape: "empty" };
	for (const entry of entries) {
		const result = decodePayload(parseInner(entry[2], procedureId), procedureId);
		combined.rows.push(...result.rows);
		combined.skipped += result.skipped;
		if (combined.shape === "empty") {
			combined.shape = result.shape;
		}
	}
	return combined;
}
