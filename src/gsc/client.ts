/**
 * Search Console performance reports over the batched RPC endpoint.
 *
 * One report = one procedure call: channel → decoder → extractor, then
 * an optional client-side date filter for procedures that ignore the
 * requested range.
 */

import { EmptyResultError, InvalidArgumentError } from "../errors.js";
import { daysAgo, filterDateRange, validateDateRange } from "../extract/date-range.js";
import type { Metrics, SemanticRow } from "../extract/extractor.js";
import { DimensionMetricExtractor } from "../extract/extractor.js";
import type { Logger } from "../observe/logger.js";
import type { JsonValue, RpcCallOptions, RpcChannel } from "../rpc/channel.js";
import type { PayloadShape } from "../rpc/decoder.js";
import { decode } from "../rpc/decoder.js";
import type { DimensionName, ProcedureName, SchemaTable } from "../rpc/schema-table.js";
import { DIMENSION_NAMES } from "../rpc/schema-table.js";

export const MAX_ROW_LIMIT = 25_000;
/** Search Console data lags by about three days. */
export const DATA_LAG_DAYS = 3;
export const DEFAULT_WINDOW_DAYS = 28;

const PROCEDURE_FOR_DIMENSIONS: ReadonlyMap<string, ProcedureName> = new Map([
	["query", "byQuery"],
	["page", "byPage"],
	["country", "byCountry"],
	["device", "byDevice"],
	["date", "timeseries"],
	["page,query", "queryPages"],
]);

export interface SearchAnalyticsRequest {
	siteUrl: string;
	startDate: string;
	endDate: string;
	dimensions: readonly DimensionName[];
	rowLimit?: number | undefined;
}

export interface SearchAnalyticsResult {
	siteUrl: string;
	startDate: string;
	endDate: string;
	dimensions: DimensionName[];
	procedure: ProcedureName;
	rows: SemanticRow[];
	/** Entries dropped while decoding or extracting. */
	skippedRows: number;
	shape: PayloadShape;
}

export interface TopReportRequest {
	siteUrl: string;
	limit?: number;
	startDate?: string;
	endDate?: string;
}

export interface DatedRow {
	date: string;
	metrics: Metrics;
}

export interface PerformanceTrendResult {
	siteUrl: string;
	startDate: string;
	endDate: string;
	rows: DatedRow[];
	skippedRows: number;
}

export interface SearchConsoleClientOptions {
	channel: RpcChannel;
	schemaTable: SchemaTable;
	logger: Logger;
	now?: () => number;
}

export function clampRowLimit(limit: number | undefined, fallback = 100): number {
	if (limit === undefined || !Number.isFinite(limit)) {
		return fallback;
	}
	return Math.min(MAX_ROW_LIMIT, Math.max(1, Math.floor(limit)));
}

/** Procedure for a dimension set; order and duplicates do not matter. */
export function procedureForDimensions(dimensions: readonly string[]): ProcedureName {
	const unique = [...new Set(dimensions)];
	for (const name of unique) {
		if (!DIMENSION_NAMES.some((known) => known === name)) {
			throw new InvalidArgumentError(
				`unknown dimension "${name}"`,
				`Use one of: ${DIMENSION_NAMES.join(", ")}.`,
			);
		}
	}
	const key = unique.sort().join(",");
	const procedure = PROCEDURE_FOR_DIMENSIONS.get(key);
	if (!procedure) {
		throw new InvalidArgumentError(
			`dimension combination "${unique.join(",")}" is not supported`,
			"Use a single dimension (query, page, country, device, date) or query,page.",
		);
	}
	return procedure;
}

function compactDate(date: string): number {
	return Number(date.replaceAll("-", ""));
}

function byClicksDesc(a: SemanticRow, b: SemanticRow): number {
	return (b.metrics.clicks ?? 0) - (a.metrics.clicks ?? 0);
}

export class SearchConsoleClient {
	private _channel: RpcChannel;
	private _table: SchemaTable;
	private _extractor: DimensionMetricExtractor;
	private _log: Logger;
	private _now: () => number;

	constructor(opts: SearchConsoleClientOptions) {
		this._channel = opts.channel;
		this._table = opts.schemaTable;
		this._extractor = new DimensionMetricExtractor(opts.schemaTable);
		this._log = opts.logger.child({ component: "gsc-client" });
		this._now = opts.now ?? Date.now;
	}

	/** Last 28 days of complete data, ending three days ago. */
	defaultRange(): { startDate: string; endDate: string } {
		return {
			startDate: daysAgo(DATA_LAG_DAYS + DEFAULT_WINDOW_DAYS - 1, this._now()),
			endDate: daysAgo(DATA_LAG_DAYS, this._now()),
		};
	}

	async searchAnalytics(
		request: SearchAnalyticsRequest,
		opts?: RpcCallOptions,
	): Promise<SearchAnalyticsResult> {
		return this._report(request, opts);
	}

	async topQueries(request: TopReportRequest, opts?: RpcCallOptions): Promise<SearchAnalyticsResult> {
		return this._top("query", request, opts);
	}

	async topPages(request: TopReportRequest, opts?: RpcCallOptions): Promise<SearchAnalyticsResult> {
		return this._top("page", request, opts);
	}

	/** Correlated query + page pairs, most clicked first. */
	async queryPages(request: TopReportRequest, opts?: RpcCallOptions): Promise<SearchAnalyticsResult> {
		const range = this._rangeOrDefault(request);
		return this._report(
			{ siteUrl: request.siteUrl, ...range, dimensions: ["query", "page"], rowLimit: request.limit },
			opts,
			byClicksDesc,
		);
	}

	/** Daily metrics, oldest first. */
	async performanceTrend(
		request: Omit<TopReportRequest, "limit">,
		opts?: RpcCallOptions,
	): Promise<PerformanceTrendResult> {
		const range = this._rangeOrDefault(request);
		const result = await this._report(
			{ siteUrl: request.siteUrl, ...range, dimensions: ["date"], rowLimit: MAX_ROW_LIMIT },
			opts,
		);
		const rows = result.rows
			.map((row) => ({ date: row.dimensions.date ?? "", metrics: row.metrics }))
			.sort((a, b) => a.date.localeCompare(b.date));
		return {
			siteUrl: result.siteUrl,
			startDate: result.startDate,
			endDate: result.endDate,
			rows,
			skippedRows: result.skippedRows,
		};
	}

	/**
	 * channel → decoder → extractor → date filter → order → row limit.
	 * `order` runs before the limit, over every row that came back.
	 */
	private async _report(
		request: SearchAnalyticsRequest,
		opts: RpcCallOptions | undefined,
		order?: (a: SemanticRow, b: SemanticRow) => number,
	): Promise<SearchAnalyticsResult> {
		if (!request.siteUrl) {
			throw new InvalidArgumentError("siteUrl is required");
		}
		if (request.dimensions.length === 0) {
			throw new InvalidArgumentError("at least one dimension is required");
		}
		const range = validateDateRange(request.startDate, request.endDate);
		const procedure = procedureForDimensions(request.dimensions);
		const spec = this._table.procedure(procedure);
		const dimensions = [...new Set(request.dimensions)];
		const rowLimit = clampRowLimit(request.rowLimit);

		// A procedure that ignores the range is asked for the whole series;
		// the limit only applies after the local date filter.
		const remoteLimit = spec.honorsDateRange ? rowLimit : MAX_ROW_LIMIT;
		const args: JsonValue[] = [
			request.siteUrl,
			[compactDate(range.start), compactDate(range.end)],
			remoteLimit,
		];
		const envelope = await this._channel.call(spec.id, args, opts);
		const decoded = decode(envelope, spec.id);
		const extracted = this._extractor.extract(decoded.rows, dimensions, spec.id);

		let rows = extracted.rows;
		if (!spec.honorsDateRange && dimensions.includes("date")) {
			rows = filterDateRange(
				rows.map((row) => ({ date: row.dimensions.date ?? "", row })),
				range.start,
				range.end,
			).map((entry) => entry.row);
		}
		if (order) {
			rows = [...rows].sort(order);
		}
		rows = rows.slice(0, rowLimit);

		const skippedRows = decoded.skipped + extracted.skipped;
		this._log.info(
			{ procedure, rows: rows.length, skippedRows, shape: decoded.shape },
			"search analytics fetched",
		);
		if (rows.length === 0) {
			throw new EmptyResultError(
				`no data for ${request.siteUrl} between ${range.start} and ${range.end}`,
			);
		}

		return {
			siteUrl: request.siteUrl,
			startDate: range.start,
			endDate: range.end,
			dimensions,
			procedure,
			rows,
			skippedRows,
			shape: decoded.shape,
		};
	}

	private async _top(
		dimension: DimensionName,
		request: TopReportRequest,
		opts: RpcCallOptions | undefined,
	): Promise<SearchAnalyticsResult> {
		const range = this._rangeOrDefault(request);
		return this._report(
			{ siteUrl: request.siteUrl, ...range, dimensions: [dimension], rowLimit: request.limit },
			opts,
			byClicksDesc,
		);
	}

	private _rangeOrDefault(request: { startDate?: string; endDate?: string }): {
		startDate: string;
		endDate: string;
	} {
		if (request.startDate && request.endDate) {
			return { startDate: request.startDate, endDate: request.endDate };
		}
		return this.defaultRange();
	}
}
