import { Type } from "@sinclair/typebox";
import { InvalidArgumentError } from "../errors.js";
import type { Metrics, SemanticRow } from "../extract/extractor.js";
import type { SearchAnalyticsResult } from "../gsc/client.js";
import { DIMENSION_NAMES, type DimensionName } from "../rpc/schema-table.js";
import type { BridgeContext } from "./context.js";
import { boundedInt, optionalString, requireString } from "./context.js";
import type { ToolDefinition } from "./session-tools.js";
import { jsonResult } from "./session-tools.js";

const SITE_URL_DESCRIPTION =
	'Verified property exactly as in Search Console, e.g. "https://example.com/" or "sc-domain:example.com"';

function round(value: number | null, digits: number): number | null {
	if (value === null) {
		return null;
	}
	const factor = 10 ** digits;
	return Math.round(value * factor) / factor;
}

/** CTR as a percentage, position to one decimal; absent metrics stay null. */
export function formatMetrics(metrics: Metrics): Record<string, number | null> {
	return {
		clicks: metrics.clicks,
		impressions: metrics.impressions,
		ctr: metrics.ctr === null ? null : round(metrics.ctr * 100, 2),
		position: round(metrics.position, 1),
	};
}

export function formatRow(row: SemanticRow): Record<string, unknown> {
	return { ...row.dimensions, ...formatMetrics(row.metrics) };
}

function parseDimensions(raw: string | undefined): DimensionName[] {
	const names = (raw ?? "query")
		.split(",")
		.map((name) => name.trim())
		.filter((name) => name !== "");
	if (names.length === 0) {
		return ["query"];
	}
	return names.map((name) => {
		const known = DIMENSION_NAMES.find((dimension) => dimension === name);
		if (!known) {
			throw new InvalidArgumentError(
				`unknown dimension "${name}"`,
				`Use one of: ${DIMENSION_NAMES.join(", ")}.`,
			);
		}
		return known;
	});
}

function reportPayload(result: SearchAnalyticsResult, key: string): Record<string, unknown> {
	return {
		site: result.siteUrl,
		period: `${result.startDate} to ${result.endDate}`,
		dimensions: result.dimensions,
		totalRows: result.rows.length,
		skippedRows: result.skippedRows,
		[key]: result.rows.map(formatRow),
	};
}

function dateRangeParams(params: Record<string, unknown>): { startDate?: string; endDate?: string } {
	const range: { startDate?: string; endDate?: string } = {};
	const startDate = optionalString(params, "startDate");
	const endDate = optionalString(params, "endDate");
	if (startDate) {
		range.startDate = startDate;
	}
	if (endDate) {
		range.endDate = endDate;
	}
	return range;
}

const optionalDate = (what: string) =>
	Type.Optional(Type.String({ description: `${what} date YYYY-MM-DD (default: last 28 days ending 3 days ago)` }));

export function createGscTools(ctx: BridgeContext): ToolDefinition[] {
	return [
		{
			name: "gsc_list_sites",
			description:
				"List the properties in your Google Search Console account with permission levels. Use the siteUrl values in the other gsc_* tools.",
			label: "List GSC Sites",
			parameters: Type.Object({}),
			async execute() {
				const sites = await ctx.rest.listSites();
				return jsonResult({ sites, total: sites.length });
			},
		},
		{
			name: "gsc_search_analytics",
			description:
				"Clicks, impressions, CTR and average position grouped by one dimension (query, page, country, device, date) or by query,page.",
			label: "Search Analytics",
			parameters: Type.Object({
				siteUrl: Type.String({ description: SITE_URL_DESCRIPTION }),
				startDate: Type.String({ description: "Start date YYYY-MM-DD" }),
				endDate: Type.String({ description: "End date YYYY-MM-DD" }),
				dimensions: Type.Optional(
					Type.String({ description: 'Comma-separated dimensions, e.g. "query" or "query,page" (default "query")' }),
				),
				rowLimit: Type.Optional(
					Type.Integer({ minimum: 1, maximum: 1000, description: "Maximum rows (default 100)" }),
				),
			}),
			async execute(params) {
				const result = await ctx.gsc.searchAnalytics({
					siteUrl: requireString(params, "siteUrl"),
					startDate: requireString(params, "startDate"),
					endDate: requireString(params, "endDate"),
					dimensions: parseDimensions(optionalString(params, "dimensions")),
					rowLimit: boundedInt(params, "rowLimit", 100, 1, 1000),
				});
				return jsonResult(reportPayload(result, "data"));
			},
		},
		{
			name: "gsc_top_queries",
			description: "Top search queries by clicks (highest first) with impressions, CTR and position",
			label: "Top Queries",
			parameters: Type.Object({
				siteUrl: Type.String({ description: SITE_URL_DESCRIPTION }),
				limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 200, description: "Queries to return (default 25)" })),
				startDate: optionalDate("Start"),
				endDate: optionalDate("End"),
			}),
			async execute(params) {
				const result = await ctx.gsc.topQueries({
					siteUrl: requireString(params, "siteUrl"),
					limit: boundedInt(params, "limit", 25, 1, 200),
					...dateRangeParams(params),
				});
				return jsonResult(reportPayload(result, "topQueries"));
			},
		},
		{
			name: "gsc_top_pages",
			description: "Top pages by clicks (highest first) with impressions, CTR and position",
			label: "Top Pages",
			parameters: Type.Object({
				siteUrl: Type.String({ description: SITE_URL_DESCRIPTION }),
				limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 200, description: "Pages to return (default 25)" })),
				startDate: optionalDate("Start"),
				endDate: optionalDate("End"),
			}),
			async execute(params) {
				const result = await ctx.gsc.topPages({
					siteUrl: requireString(params, "siteUrl"),
					limit: boundedInt(params, "limit", 25, 1, 200),
					...dateRangeParams(params),
				});
				return jsonResult(reportPayload(result, "topPages"));
			},
		},
		{
			name: "gsc_query_pages",
			description: "Which pages rank for which queries: correlated query + page rows sorted by clicks",
			label: "Query Pages",
			parameters: Type.Object({
				siteUrl: Type.String({ description: SITE_URL_DESCRIPTION }),
				limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 1000, description: "Rows to return (default 100)" })),
				startDate: optionalDate("Start"),
				endDate: optionalDate("End"),
			}),
			async execute(params) {
				const result = await ctx.gsc.queryPages({
					siteUrl: requireString(params, "siteUrl"),
					limit: boundedInt(params, "limit", 100, 1, 1000),
					...dateRangeParams(params),
				});
				return jsonResult(reportPayload(result, "data"));
			},
		},
		{
			name: "gsc_performance_trend",
			description: "Daily clicks, impressions, CTR and position over a date range, oldest first",
			label: "Performance Trend",
			parameters: Type.Object({
				siteUrl: Type.String({ description: SITE_URL_DESCRIPTION }),
				startDate: optionalDate("Start"),
				endDate: optionalDate("End"),
			}),
			async execute(params) {
				const result = await ctx.gsc.performanceTrend({
					siteUrl: requireString(params, "siteUrl"),
					...dateRangeParams(params),
				});
				return jsonResult({
					site: result.siteUrl,
					period: `${result.startDate} to ${result.endDate}`,
					totalRows: result.rows.length,
					skippedRows: result.skippedRows,
					trend: result.rows.map((row) => ({ date: row.date, ...formatMetrics(row.metrics) })),
				});
			},
		},
		{
			name: "gsc_list_sitemaps",
			description: "Sitemaps submitted for a property with status, submission dates, warnings and errors",
			label: "List Sitemaps",
			parameters: Type.Object({
				siteUrl: Type.String({ description: SITE_URL_DESCRIPTION }),
			}),
			async execute(params) {
				const siteUrl = requireString(params, "siteUrl");
				const sitemaps = await ctx.rest.listSitemaps(siteUrl);
				return jsonResult({ site: siteUrl, sitemaps, total: sitemaps.length });
			},
		},
		{
			name: "gsc_inspect_url",
			description:
				"Indexing status of one URL: coverage, last crawl, canonical, mobile usability and rich results",
			label: "Inspect URL",
			parameters: Type.Object({
				siteUrl: Type.String({ description: SITE_URL_DESCRIPTION }),
				url: Type.String({ description: "Page URL inside siteUrl" }),
			}),
			async execute(params) {
				const summary = await ctx.rest.inspectUrl(
					requireString(params, "siteUrl"),
					requireString(params, "url"),
				);
				return jsonResult({ ...summary });
			},
		},
	];
}
