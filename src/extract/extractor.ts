/**
 * Maps raw rows onto named dimensions and metrics.
 *
 * Dimension positions come from the schema table for the procedure that
 * produced the rows. Metric slots are identified by their type code
 * (`slot[0]`); the value is the first numeric candidate after it.
 */

import type { DimensionValue, RawRow } from "../rpc/decoder.js";
import type { DimensionName, MetricName, SchemaTable } from "../rpc/schema-table.js";
import { normalizeDate } from "./date-range.js";

export type Metrics = Record<MetricName, number | null>;

export interface SemanticRow {
	dimensions: Partial<Record<DimensionName, string>>;
	/** null when the row carried no slot for that metric. */
	metrics: Metrics;
}

export interface ExtractResult {
	rows: SemanticRow[];
	/** Rows dropped because a requested dimension was missing. */
	skipped: number;
}

const NUMERIC_TEXT = /^-?\d+(\.\d+)?([eE][-+]?\d+)?$/;

export function emptyMetrics(): Metrics {
	return { clicks: null, impressions: null, ctr: null, position: null };
}

function numericCandidate(value: unknown): number | undefined {
	if (typeof value === "number") {
		return Number.isFinite(value) ? value : undefined;
	}
	if (typeof value === "string" && NUMERIC_TEXT.test(value.trim())) {
		return Number(value.trim());
	}
	return undefined;
}

function dimensionText(name: DimensionName, value: DimensionValue | undefined): string | undefined {
	if (value === null || value === undefined) {
		return undefined;
	}
	if (name === "date") {
		return normalizeDate(value);
	}
	const text = String(value);
	return text === "" ? undefined : text;
}

export class DimensionMetricExtractor {
	private _table: SchemaTable;

	constructor(table: SchemaTable) {
		this._table = table;
	}

	extract(
		rawRows: readonly RawRow[],
		requestedDimensions: readonly DimensionName[],
		procedureId: string,
	): ExtractResult {
		const positions = this._table.dimensionCodes(procedureId, requestedDimensions);
		const rows: SemanticRow[] = [];
		let skipped = 0;

		for (const raw of rawRows) {
			const dimensions: Partial<Record<DimensionName, string>> = {};
			let complete = true;
			for (const { name, position } of positions) {
				const text = dimensionText(name, raw.dimensionInfo[position]);
				if (text === undefined) {
					complete = false;
					break;
				}
				dimensions[name] = text;
			}
			if (!complete) {
				skipped++;
				continue;
			}
			rows.push({ dimensions, metrics: this.metrics(raw) });
		}

		return { rows, skipped };
	}

	/** First slot per metric wins; unknown or non-integer type codes are ignored. */
	metrics(raw: RawRow): Metrics {
		const metrics = emptyMetrics();
		for (const slot of raw.slots) {
			if (!slot) {
				continue;
			}
			const code = slot[0];
			if (typeof code !== "number" || !Number.isInteger(code)) {
				continue;
			}
			const metric = this._table.metricForTypeCode(code);
			if (!metric || metrics[metric] !== null) {
				continue;
			}
			for (let i = 1; i < slot.length; i++) {
				const value = numericCandidate(slot[i]);
				if (value !== undefined) {
					metrics[metric] = value;
					break;
				}
			}
		}
		return metrics;
	}
}

