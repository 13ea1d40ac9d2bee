/**
 * Bing Webmaster Tools JSON API, authenticated with an API key from
 * bing.com/webmasters → Settings → API Access.
 *
 * Responses wrap their payload in `d`. Field names arrive in PascalCase
 * (sometimes camelCase) and dates as `/Date(<ms>)/`; both are normalized
 * here so tools see one shape.
 */

import { BingApiError, ConfigurationError, RpcDecodeError } from "../errors.js";
import { filterDateRange, formatDate, validateDateRange } from "../extract/date-range.js";
import type { Logger } from "../observe/logger.js";
import type { ProbeOptions } from "../rpc/anti-forgery.js";
import { fetchWithDeadline } from "../rpc/deadline.js";

export const BING_API_BASE = "https://ssl.bing.com/webmaster/api.svc/json";
export const DEFAULT_BING_TIMEOUT_MS = 30_000;
export const MAX_BING_ROWS = 500;

const BING_USER_AGENT = "Mozilla/5.0 (compatible; search-console-bridge/1.0)";
const MS_DATE = /^\/Date\((-?\d+)(?:[+-]\d{4})?\)\/$/;

export type BingRecord = { [key: string]: unknown };

export interface BingSite {
	url: string;
	isVerified: boolean | null;
}

export interface BingTrafficRow {
	date: string;
	impressions: number;
	clicks: number;
	avgClickPosition: number | null;
}

export interface BingKeywordRow {
	query: string;
	impressions: number;
	clicks: number;
	avgClickPosition: number | null;
}

export interface BingCrawlStats {
	date: string | null;
	crawledPages: number;
	inIndex: number;
	crawlErrors: number;
	dnsErrors: number;
	connectionTimeouts: number;
	robotsExcluded: number;
	httpErrors: number;
}

export interface BingDateRangeRequest {
	siteUrl: string;
	startDate: string;
	endDate: string;
	limit?: number;
}

export interface BingWebmasterClientOptions {
	logger: Logger;
	apiKey?: string | undefined;
	fetch?: typeof fetch;
	baseUrl?: string;
	timeoutMs?: number;
}

function isRecord(value: unknown): value is BingRecord {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function lowerFirst(key: string): string {
	return key.length === 0 ? key : key.charAt(0).toLowerCase() + key.slice(1);
}

/** `/Date(1735689600000)/` → `2025-01-01`; other values unchanged. */
export function normalizeBingValue(value: unknown): unknown {
	if (typeof value === "string") {
		const match = MS_DATE.exec(value);
		if (match) {
			return formatDate(new Date(Number(match[1])));
		}
		return value;
	}
	if (Array.isArray(value)) {
		return value.map(normalizeBingValue);
	}
	if (isRecord(value)) {
		return normalizeBingRecord(value);
	}
	return value;
}

/** Keys to camelCase (first wins on collision), values through normalizeBingValue. */
export function normalizeBingRecord(record: BingRecord): BingRecord {
	const out: BingRecord = {};
	for (const [key, value] of Object.entries(record)) {
		const name = lowerFirst(key);
		if (!(name in out)) {
			out[name] = normalizeBingValue(value);
		}
	}
	return out;
}

function num(record: BingRecord, key: string): number {
	const value = Number(record[key] ?? 0);
	return Number.isFinite(value) ? value : 0;
}

function optionalNum(record: BingRecord, key: string): number | null {
	const raw = record[key];
	if (raw === undefined || raw === null) {
		return null;
	}
	const value = Number(raw);
	return Number.isFinite(value) ? value : null;
}

function str(record: BingRecord, key: string): string {
	const value = record[key];
	return typeof value === "string" ? value : "";
}

function records(payload: unknown): BingRecord[] {
	if (payload === null || payload === undefined) {
		return [];
	}
	if (!Array.isArray(payload)) {
		throw new RpcDecodeError("Bing response `d` is not a list", "The Bing API response format changed.");
	}
	return payload.filter(isRecord).map(normalizeBingRecord);
}

function clampLimit(limit: number | undefined, fallback = 100): number {
	if (limit === undefined || !Number.isFinite(limit)) {
		return fallback;
	}
	return Math.min(MAX_BING_ROWS, Math.max(1, Math.floor(limit)));
}

export class BingWebmasterClient {
	private _apiKey: string | undefined;
	private _log: Logger;
	private _fetch: typeof fetch;
	private _baseUrl: string;
	private _timeoutMs: number;

	constructor(opts: BingWebmasterClientOptions) {
		this._apiKey = opts.apiKey?.trim() || undefined;
		this._log = opts.logger.child({ component: "bing-client" });
		this._fetch = opts.fetch ?? fetch;
		this._baseUrl = opts.baseUrl ?? BING_API_BASE;
		this._timeoutMs = opts.timeoutMs ?? DEFAULT_BING_TIMEOUT_MS;
	}

	get configured(): boolean {
		return this._apiKey !== undefined;
	}

	async getUserSites(opts?: ProbeOptions): Promise<BingSite[]> {
		const payload = await this._get("GetUserSites", {}, "get user sites", opts);
		return records(payload).map((site) => ({
			url: str(site, "url"),
			isVerified: typeof site["isVerified"] === "boolean" ? site["isVerified"] : null,
		}));
	}

	/** Daily traffic; Bing returns its whole history, so the range is applied here. */
	async getRankAndTrafficStats(
		request: BingDateRangeRequest,
		opts?: ProbeOptions,
	): Promise<BingTrafficRow[]> {
		const range = validateDateRange(request.startDate, request.endDate);
		const limit = clampLimit(request.limit);
		const payload = await this._get(
			"GetRankAndTrafficStats",
			{ siteUrl: request.siteUrl, startDate: range.start, endDate: range.end, page: "0", count: String(limit) },
			`get traffic stats for ${request.siteUrl}`,
			opts,
		);
		const rows = records(payload).map((row) => ({
			date: str(row, "date"),
			impressions: num(row, "impressions"),
			clicks: num(row, "clicks"),
			avgClickPosition: optionalNum(row, "avgClickPosition"),
		}));
		return filterDateRange(rows, range.start, range.end)
			.sort((a, b) => a.date.localeCompare(b.date))
			.slice(0, limit);
	}

	/** Latest crawl snapshot. */
	async getCrawlStats(siteUrl: string, opts?: ProbeOptions): Promise<BingCrawlStats | null> {
		const payload = await this._get(
			"GetCrawlStats",
			{ siteUrl },
			`get crawl stats for ${siteUrl}`,
			opts,
		);
		const entries = isRecord(payload) ? [normalizeBingRecord(payload)] : records(payload);
		const latest = [...entries].sort((a, b) => str(b, "date").localeCompare(str(a, "date")))[0];
		if (!latest) {
			return null;
		}
		return {
			date: str(latest, "date") || null,
			crawledPages: num(latest, "crawledPages"),
			inIndex: num(latest, "inIndex"),
			crawlErrors: num(latest, "crawlErrors"),
			dnsErrors: num(latest, "dnsErrors"),
			connectionTimeouts: num(latest, "connectionTimeouts"),
			robotsExcluded: num(latest, "robotsExcluded"),
			httpErrors: num(latest, "httpErrors"),
		};
	}

	/** Keywords sorted by clicks, highest first. */
	async getKeywordStats(
		request: BingDateRangeRequest,
		opts?: ProbeOptions,
	): Promise<BingKeywordRow[]> {
		const range = validateDateRange(request.startDate, request.endDate);
		const limit = clampLimit(request.limit);
		const payload = await this._get(
			"GetKeywordStats",
			{ siteUrl: request.siteUrl, startDate: range.start, endDate: range.end, page: "0", count: String(limit) },
			`get keyword stats for ${request.siteUrl}`,
			opts,
		);
		return records(payload)
			.map((row) => ({
				query: str(row, "query"),
				impressions: num(row, "impressions"),
				clicks: num(row, "clicks"),
				avgClickPosition: optionalNum(row, "avgClickPosition"),
			}))
			.sort((a, b) => b.clicks - a.clicks)
			.slice(0, limit);
	}

	/** Index details for one URL, keys normalized, dates as YYYY-MM-DD. */
	async getUrlInfo(siteUrl: string, url: string, opts?: ProbeOptions): Promise<BingRecord> {
		const payload = await this._get("GetUrlInfo", { siteUrl, url }, `get url info for ${url}`, opts);
		return isRecord(payload) ? normalizeBingRecord(payload) : {};
	}

	private _requireKey(): string {
		if (!this._apiKey) {
			throw new ConfigurationError(
				"BING_API_KEY is not set",
				"Generate a key at bing.com/webmasters → Settings → API Access and set BING_API_KEY in the server environment.",
			);
		}
		return this._apiKey;
	}

	private async _get(
		method: string,
		params: Record<string, string>,
		context: string,
		opts: ProbeOptions = {},
	): Promise<unknown> {
		const query = new URLSearchParams({ apikey: this._requireKey(), ...params });
		const response = await fetchWithDeadline(
			this._fetch,
			`${this._baseUrl}/${method}?${query.toString()}`,
			{ method: "GET", headers: { "User-Agent": BING_USER_AGENT, Accept: "application/json" } },
			{ timeoutMs: opts.timeoutMs ?? this._timeoutMs, signal: opts.signal, label: `Bing ${context}` },
		);
		const text = response.body.toString("utf8");

		if (response.status < 200 || response.status >= 300) {
			throw new BingApiError(
				`Bing Webmaster API error ${response.status} (${context}): ${bingErrorMessage(text)}`,
				response.status,
			);
		}

		let parsed: unknown;
		try {
			parsed = JSON.parse(text);
		} catch (err) {
			throw new RpcDecodeError(`Bing ${context} returned invalid JSON`, "The Bing API response format changed.", {
				cause: err,
			});
		}
		this._log.debug({ method, status: response.status }, "bing call completed");
		return isRecord(parsed) ? parsed["d"] : undefined;
	}
}

/** `Message` from a JSON error body, else the first 200 characters. */
function bingErrorMessage(text: string): string {
	let parsed: unknown;
	try {
		parsed = JSON.parse(text);
	} catch {
		// not JSON; fall back to the raw text
		return text.slice(0, 200);
	}
	if (isRecord(parsed)) {
		const message = parsed["Message"] ?? parsed["message"];
		if (typeof message === "string" && message) {
			return message;
		}
	}
	return text.slice(0, 200);
}
