import { execFile } from "node:child_process";
import { createDecipheriv, pbkdf2Sync } from "node:crypto";
import * as fs from "node:fs";
import { promisify } from "node:util";
import type Database from "better-sqlite3";
import { SessionNotFoundError } from "../errors.js";
import type { BrowserName, CookieSource } from "./browsers.js";
import { chromiumCookiePaths, chromiumLayout } from "./browsers.js";
import type { CookieRecord, CookieSameSite } from "./cookies.js";
import { hasTable, withCookieDatabase } from "./sqlite.js";

const execFileAsync = promisify(execFile);

/** Milliseconds between 1601-01-01 and 1970-01-01. */
const WINDOWS_EPOCH_OFFSET_MS = 11_644_473_600_000;
/** From this schema version on, plaintext values carry a SHA-256 of the host key. */
const HOST_DIGEST_SCHEMA_VERSION = 24;
const HOST_DIGEST_BYTES = 32;
const SALT = "saltysalt";
const IV = Buffer.alloc(16, 0x20);

export type ChromiumCipherVersion = "v10" | "v11";

/** Resolves the AES key for an encrypted value prefix. */
export type ChromiumKeyProvider = (version: ChromiumCipherVersion) => Promise<Buffer>;

export function deriveChromiumKey(password: string, iterations: number): Buffer {
	return pbkdf2Sync(password, SALT, iterations, 16, "sha1");
}

/**
 * Default key lookup: the macOS Keychain "Safe Storage" password, or on
 * Linux the fixed v10 password and the keyring secret for v11.
 */
export function systemKeyProvider(
	browser: Exclude<BrowserName, "firefox">,
	platform: NodeJS.Platform = process.platform,
): ChromiumKeyProvider {
	const layout = chromiumLayout(browser);
	return async (version) => {
		if (platform === "darwin") {
			const password = await runSecretCommand("security", [
				"find-generic-password",
				"-w",
				"-s",
				layout.keychainService,
			]);
			return deriveChromiumKey(password, 1003);
		}
		if (platform === "win32") {
			throw new SessionNotFoundError(
				`${browser} cookies on Windows are DPAPI-encrypted and cannot be read`,
				"Use a browser whose store is readable here (for example firefox), or run on macOS or Linux.",
			);
		}
		if (version === "v10") {
			return deriveChromiumKey("peanuts", 1);
		}
		const password = await runSecretCommand("secret-tool", [
			"lookup",
			"application",
			layout.keyringApplication,
		]);
		return deriveChromiumKey(password, 1);
	};
}

async function runSecretCommand(command: string, args: string[]): Promise<string> {
	try {
		const { stdout } = await execFileAsync(command, args, { timeout: 10_000 });
		return stdout.trim();
	} catch (err) {
		throw new SessionNotFoundError(
			`could not read the browser cookie encryption key via ${command}`,
			"Unlock the system keychain or keyring (approve the access prompt if one appears), then retry.",
			{ cause: err },
		);
	}
}

interface ChromiumCookieRow {
	host_key: string;
	name: string;
	value: string;
	encrypted_value: Buffer | null;
	path: string;
	/** Milliseconds since 1601-01-01; 0 for a session cookie. */
	expires_ms: number;
	is_secure: number;
	is_httponly: number;
	samesite: number;
}

export interface ChromiumCookieStoreOptions {
	browser: Exclude<BrowserName, "firefox">;
	/** Explicit database path; otherwise the profile's default locations are tried. */
	dbPath?: string;
	profile?: string;
	keyProvider?: ChromiumKeyProvider;
}

export class ChromiumCookieStore implements CookieSource {
	readonly browser: BrowserName;
	private _paths: string[];
	private _keyProvider: ChromiumKeyProvider;

	constructor(opts: ChromiumCookieStoreOptions) {
		this.browser = opts.browser;
		this._paths = opts.dbPath ? [opts.dbPath] : chromiumCookiePaths(opts.browser, opts.profile);
		this._keyProvider = opts.keyProvider ?? systemKeyProvider(opts.browser);
	}

	async read(domain: string): Promise<CookieRecord[]> {
		const dbPath =
			this._paths.find((candidate) => fs.existsSync(candidate)) ?? this._paths[0] ?? "";
		const { rows, schemaVersion } = withCookieDatabase(this.browser, dbPath, (db) => {
			const matched = db
				.prepare(
					`SELECT host_key, name, value, encrypted_value, path, expires_utc / 1000 AS expires_ms,
						is_secure, is_httponly, samesite
					FROM cookies
					WHERE host_key = ? OR host_key = ? OR host_key LIKE ?`,
				)
				.all(domain, `.${domain}`, `%.${domain}`) as ChromiumCookieRow[];
			return { rows: matched, schemaVersion: readSchemaVersion(db) };
		});

		const keys = new Map<ChromiumCipherVersion, Buffer>();
		const records: CookieRecord[] = [];
		for (const row of sortBySpecificity(rows, domain)) {
			const value = await this._decodeValue(row, schemaVersion, keys);
			if (!value) {
				continue;
			}
			records.push({
				name: row.name,
				value,
				domain: row.host_key,
				path: row.path,
				secure: row.is_secure === 1,
				httpOnly: row.is_httponly === 1,
				sameSite: chromiumSameSite(row.samesite),
				expiresAt: row.expires_ms ? row.expires_ms - WINDOWS_EPOCH_OFFSET_MS : null,
			});
		}
		return records;
	}

	private async _decodeValue(
		row: ChromiumCookieRow,
		schemaVersion: number,
		keys: Map<ChromiumCipherVersion, Buffer>,
	): Promise<string> {
		const encrypted = row.encrypted_value;
		if (!encrypted || encrypted.length === 0) {
			return row.value;
		}

		const prefix = encrypted.subarray(0, 3).toString("latin1");
		if (prefix !== "v10" && prefix !== "v11") {
			return row.value;
		}

		let key = keys.get(prefix);
		if (!key) {
			key = await this._keyProvider(prefix);
			keys.set(prefix, key);
		}
		return decryptChromiumValue(encrypted, key, schemaVersion);
	}
}

export function decryptChromiumValue(encrypted: Buffer, key: Buffer, schemaVersion: number): string {
	let plain: Buffer;
	try {
		const decipher = createDecipheriv("aes-128-cbc", key, IV);
		plain = Buffer.concat([decipher.update(encrypted.subarray(3)), decipher.final()]);
	} catch (err) {
		throw new SessionNotFoundError(
			"could not decrypt browser cookies (wrong key or corrupted value)",
			"Make sure the keychain or keyring entry for the browser is accessible, then retry.",
			{ cause: err },
		);
	}
	if (schemaVersion >= HOST_DIGEST_SCHEMA_VERSION && plain.length >= HOST_DIGEST_BYTES) {
		plain = plain.subarray(HOST_DIGEST_BYTES);
	}
	return plain.toString("utf8");
}

function readSchemaVersion(db: Database.Database): number {
	if (!hasTable(db, "meta")) {
		return 0;
	}
	const row = db.prepare("SELECT value FROM meta WHERE key = 'version'").get() as
		| { value: string }
		| undefined;
	return Number(row?.value ?? 0);
}

function sortBySpecificity(rows: ChromiumCookieRow[], domain: string): ChromiumCookieRow[] {
	const rank = (host: string): number => (host.replace(/^\./, "") === domain ? 0 : 1);
	return [...rows].sort((a, b) => rank(a.host_key) - rank(b.host_key));
}

function chromiumSameSite(value: number): CookieSameSite {
	switch (value) {
		case 0:
			return "None";
		case 2:
			return "Strict";
		default:
			return "Lax";
	}
}
