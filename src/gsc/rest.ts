/**
 * Search Console REST endpoints (sites, sitemaps, URL inspection) called
 * with the browser session instead of an OAuth token.
 */

import { type Static, type TSchema, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { currentTimestampSeconds, generateAuthToken } from "../auth/auth-token.js";
import { IncompleteSessionError, RpcAuthError, RpcDecodeError, RpcTransportError } from "../errors.js";
import type { Logger } from "../observe/logger.js";
import { BROWSER_USER_AGENT, DEFAULT_RPC_TIMEOUT_MS } from "../rpc/channel.js";
import type { ProbeOptions } from "../rpc/anti-forgery.js";
import { fetchWithDeadline } from "../rpc/deadline.js";
import type { SessionCookieProvider } from "../session/cookie-provider.js";
import { buildCookieHeader, sessionSecret } from "../session/cookies.js";

export const REST_ORIGIN = "https://searchconsole.googleapis.com";

const SitesResponse = Type.Object({
	siteEntry: Type.Optional(
		Type.Array(
			Type.Object({
				siteUrl: Type.String(),
				permissionLevel: Type.Optional(Type.String()),
			}),
		),
	),
});

const SitemapContent = Type.Object({
	type: Type.Optional(Type.String()),
	submitted: Type.Optional(Type.Union([Type.String(), Type.Number()])),
	indexed: Type.Optional(Type.Union([Type.String(), Type.Number()])),
});

const SitemapsResponse = Type.Object({
	sitemap: Type.Optional(
		Type.Array(
			Type.Object({
				path: Type.String(),
				lastSubmitted: Type.Optional(Type.String()),
				lastDownloaded: Type.Optional(Type.String()),
				isPending: Type.Optional(Type.Boolean()),
				isSitemapsIndex: Type.Optional(Type.Boolean()),
				type: Type.Optional(Type.String()),
				warnings: Type.Optional(Type.Union([Type.String(), Type.Number()])),
				errors: Type.Optional(Type.Union([Type.String(), Type.Number()])),
				contents: Type.Optional(Type.Array(SitemapContent)),
			}),
		),
	),
});

const Verdict = Type.Object({
	verdict: Type.Optional(Type.String()),
	issues: Type.Optional(Type.Array(Type.Object({ issueType: Type.Optional(Type.String()) }))),
});

const IndexStatus = Type.Object({
	coverageState: Type.Optional(Type.String()),
	robotsTxtState: Type.Optional(Type.String()),
	indexingState: Type.Optional(Type.String()),
	lastCrawlTime: Type.Optional(Type.String()),
	pageFetchState: Type.Optional(Type.String()),
	crawledAs: Type.Optional(Type.String()),
	googleCanonical: Type.Optional(Type.String()),
	userCanonical: Type.Optional(Type.String()),
	referringUrls: Type.Optional(Type.Array(Type.String())),
});

const InspectResponse = Type.Object({
	inspectionResult: Type.Optional(
		Type.Object({
			indexStatusResult: Type.Optional(IndexStatus),
			mobileUsabilityResult: Type.Optional(Verdict),
			richResultsResult: Type.Optional(Verdict),
		}),
	),
});

export interface SiteEntry {
	siteUrl: string;
	permissionLevel: string;
}

export interface SitemapSummary {
	path: string;
	lastSubmitted: string;
	lastDownloaded: string;
	isPending: boolean;
	isSitemapsIndex: boolean;
	type: string;
	warnings: number;
	errors: number;
	urlCount: number;
}

export interface UrlInspectionSummary {
	url: string;
	coverageState: string;
	robotsTxtState: string;
	indexingState: string;
	lastCrawlTime: string;
	pageFetchState: string;
	crawledAs: string;
	googleCanonical: string;
	userCanonical: string;
	referringUrls: string[];
	mobileUsability: string;
	mobileIssues: string[];
	richResultsVerdict: string;
}

export interface SearchConsoleRestClientOptions {
	cookies: SessionCookieProvider;
	logger: Logger;
	fetch?: typeof fetch;
	now?: () => number;
	origin?: string;
	timeoutMs?: number;
}

function toCount(value: string | number | undefined): number {
	const n = Number(value ?? 0);
	return Number.isFinite(n) ? n : 0;
}

export class SearchConsoleRestClient {
	private _cookies: SessionCookieProvider;
	private _log: Logger;
	private _fetch: typeof fetch;
	private _now: () => number;
	private _origin: string;
	private _timeoutMs: number;

	constructor(opts: SearchConsoleRestClientOptions) {
		this._cookies = opts.cookies;
		this._log = opts.logger.child({ component: "gsc-rest" });
		this._fetch = opts.fetch ?? fetch;
		this._now = opts.now ?? Date.now;
		this._origin = opts.origin ?? REST_ORIGIN;
		this._timeoutMs = opts.timeoutMs ?? DEFAULT_RPC_TIMEOUT_MS;
	}

	async listSites(opts?: ProbeOptions): Promise<SiteEntry[]> {
		const data = await this._request(SitesResponse, "GET", "/webmasters/v3/sites", "list sites", opts);
		return (data.siteEntry ?? []).map((site) => ({
			siteUrl: site.siteUrl,
			permissionLevel: site.permissionLevel ?? "",
		}));
	}

	async listSitemaps(siteUrl: string, opts?: ProbeOptions): Promise<SitemapSummary[]> {
		const path = `/webmasters/v3/sites/${encodeURIComponent(siteUrl)}/sitemaps`;
		const data = await this._request(SitemapsResponse, "GET", path, `list sitemaps for ${siteUrl}`, opts);
		return (data.sitemap ?? []).map((sitemap) => ({
			path: sitemap.path,
			lastSubmitted: sitemap.lastSubmitted ?? "",
			lastDownloaded: sitemap.lastDownloaded ?? "",
			isPending: sitemap.isPending ?? false,
			isSitemapsIndex: sitemap.isSitemapsIndex ?? false,
			type: sitemap.type ?? "",
			warnings: toCount(sitemap.warnings),
			errors: toCount(sitemap.errors),
			urlCount: (sitemap.contents ?? []).reduce((sum, c) => sum + toCount(c.submitted), 0),
		}));
	}

	async inspectUrl(siteUrl: string, url: string, opts?: ProbeOptions): Promise<UrlInspectionSummary> {
		const body = { inspectionUrl: url, siteUrl, languageCode: "en" };
		const data = await this._request(
			InspectResponse,
			"POST",
			"/v1/urlInspection/index:inspect",
			`inspect ${url}`,
			opts,
			body,
		);
		const index: Static<typeof IndexStatus> = data.inspectionResult?.indexStatusResult ?? {};
		const mobile: Static<typeof Verdict> = data.inspectionResult?.mobileUsabilityResult ?? {};
		const rich: Static<typeof Verdict> = data.inspectionResult?.richResultsResult ?? {};
		return {
			url,
			coverageState: index.coverageState ?? "UNKNOWN",
			robotsTxtState: index.robotsTxtState ?? "UNKNOWN",
			indexingState: index.indexingState ?? "UNKNOWN",
			lastCrawlTime: index.lastCrawlTime ?? "",
			pageFetchState: index.pageFetchState ?? "UNKNOWN",
			crawledAs: index.crawledAs ?? "",
			googleCanonical: index.googleCanonical ?? "",
			userCanonical: index.userCanonical ?? "",
			referringUrls: (index.referringUrls ?? []).slice(0, 5),
			mobileUsability: mobile.verdict ?? "UNKNOWN",
			mobileIssues: (mobile.issues ?? []).flatMap((issue) =>
				issue.issueType ? [issue.issueType] : [],
			),
			richResultsVerdict: rich.verdict ?? "UNKNOWN",
		};
	}

	private async _request<T extends TSchema>(
		schema: T,
		method: "GET" | "POST",
		path: string,
		context: string,
		opts: ProbeOptions = {},
		body?: unknown,
	): Promise<Static<T>> {
		const cookies = await this._cookies.getCookies();
		const secret = sessionSecret(cookies);
		if (!secret) {
			throw new IncompleteSessionError(["SAPISID"]);
		}

		const headers: Record<string, string> = {
			Authorization: generateAuthToken(secret, currentTimestampSeconds(this._now()), this._origin),
			Cookie: buildCookieHeader(cookies),
			Origin: this._origin,
			"X-Origin": this._origin,
			Referer: `${this._origin}/`,
			"X-Goog-AuthUser": "0",
			"User-Agent": BROWSER_USER_AGENT,
			Accept: "application/json",
		};
		const init: RequestInit = { method, headers };
		if (body !== undefined) {
			headers["Content-Type"] = "application/json";
			init.body = JSON.stringify(body);
		}

		const response = await fetchWithDeadline(this._fetch, `${this._origin}${path}`, init, {
			timeoutMs: opts.timeoutMs ?? this._timeoutMs,
			signal: opts.signal,
			label: context,
		});
		const text = response.body.toString("utf8");

		if (response.status === 401) {
			throw new RpcAuthError(`Google session expired (${context})`, { status: 401 });
		}
		if (response.status === 403) {
			throw new RpcAuthError(`access denied (${context})`, {
				status: 403,
				recoveryHint:
					"Make sure the logged-in Google account has access to this Search Console property.",
			});
		}
		if (response.status < 200 || response.status >= 300) {
			throw new RpcTransportError(
				`Google API error ${response.status} (${context}): ${text.slice(0, 200)}`,
				{ status: response.status },
			);
		}

		let parsed: unknown;
		try {
			parsed = text.trim() === "" ? {} : JSON.parse(text);
		} catch (err) {
			throw new RpcDecodeError(`${context} returned invalid JSON`, undefined, { cause: err });
		}
		if (!Value.Check(schema, parsed)) {
			const first = Value.Errors(schema, parsed).First();
			throw new RpcDecodeError(
				`${context} returned an unexpected body (${first ? `${first.path || "/"}: ${first.message}` : "unknown"})`,
			);
		}
		this._log.debug({ context, status: response.status }, "rest call completed");
		return parsed;
	}
}
