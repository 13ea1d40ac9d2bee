import * as path from "node:path";
import { SessionNotFoundError } from "../errors.js";
import type { BrowserName, CookieSource } from "./browsers.js";
import { firefoxProfilesRoot, resolveFirefoxProfile } from "./browsers.js";
import type { CookieRecord, CookieSameSite } from "./cookies.js";
import { withCookieDatabase } from "./sqlite.js";

interface FirefoxCookieRow {
	host: string;
	name: string;
	value: string;
	path: string;
	expiry: number;
	isSecure: number;
	isHttpOnly: number;
	sameSite: number;
}

/** Expiry values this large are already milliseconds. */
const MILLISECOND_EXPIRY = 100_000_000_000;

export interface FirefoxCookieStoreOptions {
	/** Explicit `cookies.sqlite` path; otherwise the default profile's store. */
	dbPath?: string;
	profilesRoot?: string;
}

/** Firefox keeps cookie values in plaintext in `moz_cookies`. */
export class FirefoxCookieStore implements CookieSource {
	readonly browser: BrowserName = "firefox";
	private _dbPath: string | undefined;
	private _profilesRoot: string;

	constructor(opts: FirefoxCookieStoreOptions = {}) {
		this._dbPath = opts.dbPath;
		this._profilesRoot = opts.profilesRoot ?? firefoxProfilesRoot();
	}

	async read(domain: string): Promise<CookieRecord[]> {
		const dbPath = this._dbPath ?? this._defaultDbPath();
		const rows = withCookieDatabase(
			this.browser,
			dbPath,
			(db) =>
				db
					.prepare(
						`SELECT host, name, value, path, expiry, isSecure, isHttpOnly, sameSite
						FROM moz_cookies
						WHERE host = ? OR host = ? OR host LIKE ?
						ORDER BY CASE WHEN host = ? OR host = ? THEN 0 ELSE 1 END`,
					)
					.all(domain, `.${domain}`, `%.${domain}`, domain, `.${domain}`) as FirefoxCookieRow[],
		);

		return rows
			.filter((row) => row.value)
			.map((row) => ({
				name: row.name,
				value: row.value,
				domain: row.host,
				path: row.path,
				secure: row.isSecure === 1,
				httpOnly: row.isHttpOnly === 1,
				sameSite: firefoxSameSite(row.sameSite),
				expiresAt: firefoxExpiry(row.expiry),
			}));
	}

	private _defaultDbPath(): string {
		const profile = resolveFirefoxProfile(this._profilesRoot);
		if (!profile) {
			throw new SessionNotFoundError(`no firefox profile found under ${this._profilesRoot}`);
		}
		return path.join(profile, "cookies.sqlite");
	}
}

function firefoxSameSite(value: number): CookieSameSite {
	switch (value) {
		case 1:
			return "Lax";
		case 2:
			return "Strict";
		default:
			return "None";
	}
}

function firefoxExpiry(expiry: number): number | null {
	if (!expiry) {
		return null;
	}
	return expiry >= MILLISECOND_EXPIRY ? expiry : expiry * 1000;
}
