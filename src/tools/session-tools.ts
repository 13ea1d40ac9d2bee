import { type TObject, Type } from "@sinclair/typebox";
import { BROWSER_NAMES, isBrowserName } from "../session/browsers.js";
import type { BridgeContext } from "./context.js";
import { boundedInt, optionalString } from "./context.js";

export interface ToolDefinition {
	name: string;
	description: string;
	label: string;
	parameters: TObject;
	execute: (params: Record<string, unknown>) => Promise<ToolResult>;
}

export interface ToolResult {
	content: Array<{ type: "text"; text: string }>;
	details: Record<string, unknown>;
	isError?: boolean;
}

export function jsonResult(payload: Record<string, unknown>): ToolResult {
	return {
		content: [{ type: "text", text: JSON.stringify(payload, null, 2) }],
		details: payload,
	};
}

export function createSessionTools(ctx: BridgeContext): ToolDefinition[] {
	return [
		{
			name: "refresh_google_session",
			description:
				"Re-read the Google session cookies from the browser and drop the cached anti-forgery token. Use after logging back in to Google.",
			label: "Refresh Google Session",
			parameters: Type.Object({
				browser: Type.Optional(
					Type.Union(
						BROWSER_NAMES.map((name) => Type.Literal(name)),
						{ description: "Read only this browser instead of the configured order" },
					),
				),
			}),
			async execute(params) {
				const hint = optionalString(params, "browser");
				const browser = hint && isBrowserName(hint) ? hint : undefined;
				ctx.antiForgery.invalidate();
				const cookies = await ctx.cookies.refresh(browser);
				return jsonResult({
					ok: true,
					browser: ctx.cookies.browser,
					cookieCount: cookies.size,
				});
			},
		},
		{
			name: "gsc_session_status",
			description:
				"Show the state of the cached Google session cookies and anti-forgery token without contacting Google.",
			label: "Session Status",
			parameters: Type.Object({}),
			async execute() {
				return jsonResult({
					cookies: ctx.cookies.status(),
					antiForgeryToken: ctx.antiForgery.status(),
					schemaTableVersion: ctx.schemaTable.version,
					bingConfigured: ctx.bing.configured,
				});
			},
		},
		{
			name: "gsc_rpc_stats",
			description: "Summarize recent Search Console RPC calls: counts, failures, token refreshes and latency",
			label: "RPC Stats",
			parameters: Type.Object({
				limit: Type.Optional(
					Type.Integer({ minimum: 1, maximum: 200, description: "Recent calls to list (default 20)" }),
				),
			}),
			async execute(params) {
				const limit = boundedInt(params, "limit", 20, 1, 200);
				return jsonResult({
					stats: ctx.trace.stats(),
					recent: ctx.trace.summary(limit),
				});
			},
		},
	];
}
