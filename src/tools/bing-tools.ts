import { Type } from "@sinclair/typebox";
import type { BridgeContext } from "./context.js";
import { boundedInt, requireString } from "./context.js";
import type { ToolDefinition } from "./session-tools.js";
import { jsonResult } from "./session-tools.js";

const SITE_URL_DESCRIPTION = 'Site exactly as in Bing Webmaster Tools, e.g. "https://example.com/"';

export function createBingTools(ctx: BridgeContext): ToolDefinition[] {
	return [
		{
			name: "bing_list_sites",
			description: "List the sites in your Bing Webmaster Tools account. Requires BING_API_KEY.",
			label: "List Bing Sites",
			parameters: Type.Object({}),
			async execute() {
				const sites = await ctx.bing.getUserSites();
				return jsonResult({ sites, total: sites.length });
			},
		},
		{
			name: "bing_search_analytics",
			description: "Daily Bing impressions, clicks and average click position for a date range",
			label: "Bing Search Analytics",
			parameters: Type.Object({
				siteUrl: Type.String({ description: SITE_URL_DESCRIPTION }),
				startDate: Type.String({ description: "Start date YYYY-MM-DD" }),
				endDate: Type.String({ description: "End date YYYY-MM-DD" }),
				limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 500, description: "Maximum rows (default 100)" })),
			}),
			async execute(params) {
				const siteUrl = requireString(params, "siteUrl");
				const startDate = requireString(params, "startDate");
				const endDate = requireString(params, "endDate");
				const rows = await ctx.bing.getRankAndTrafficStats({
					siteUrl,
					startDate,
					endDate,
					limit: boundedInt(params, "limit", 100, 1, 500),
				});
				return jsonResult({
					site: siteUrl,
					period: `${startDate} to ${endDate}`,
					totalRows: rows.length,
					data: rows,
				});
			},
		},
		{
			name: "bing_crawl_stats",
			description: "Latest Bing crawl statistics: crawled pages, index count, crawl, DNS and HTTP errors",
			label: "Bing Crawl Stats",
			parameters: Type.Object({
				siteUrl: Type.String({ description: SITE_URL_DESCRIPTION }),
			}),
			async execute(params) {
				const siteUrl = requireString(params, "siteUrl");
				const stats = await ctx.bing.getCrawlStats(siteUrl);
				return jsonResult({ site: siteUrl, stats });
			},
		},
		{
			name: "bing_keyword_stats",
			description: "Top Bing keywords by clicks with impressions and average click position",
			label: "Bing Keyword Stats",
			parameters: Type.Object({
				siteUrl: Type.String({ description: SITE_URL_DESCRIPTION }),
				startDate: Type.String({ description: "Start date YYYY-MM-DD" }),
				endDate: Type.String({ description: "End date YYYY-MM-DD" }),
				limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 500, description: "Maximum keywords (default 100)" })),
			}),
			async execute(params) {
				const siteUrl = requireString(params, "siteUrl");
				const startDate = requireString(params, "startDate");
				const endDate = requireString(params, "endDate");
				const keywords = await ctx.bing.getKeywordStats({
					siteUrl,
					startDate,
					endDate,
					limit: boundedInt(params, "limit", 100, 1, 500),
				});
				return jsonResult({
					site: siteUrl,
					period: `${startDate} to ${endDate}`,
					total: keywords.length,
					keywords,
				});
			},
		},
		{
			name: "bing_url_info",
			description: "Bing index details for one URL: HTTP status, crawl and discovery dates, size",
			label: "Bing URL Info",
			parameters: Type.Object({
				siteUrl: Type.String({ description: SITE_URL_DESCRIPTION }),
				url: Type.String({ description: "Page URL inside siteUrl" }),
			}),
			async execute(params) {
				const url = requireString(params, "url");
				const info = await ctx.bing.getUrlInfo(requireString(params, "siteUrl"), url);
				return jsonResult({ url, info });
			},
		},
	];
}
