import * as fs from "node:fs";
import Database from "better-sqlite3";
import { SessionNotFoundError, SessionStoreLockedError } from "../errors.js";
import type { BrowserName } from "./browsers.js";

const LOCKED_CODES = new Set(["SQLITE_BUSY", "SQLITE_LOCKED", "SQLITE_BUSY_SNAPSHOT"]);

function errorCode(err: unknown): string | undefined {
	if (typeof err === "object" && err !== null && "code" in err) {
		const code = (err as { code: unknown }).code;
		return typeof code === "string" ? code : undefined;
	}
	return undefined;
}

/**
 * Maps a SQLite failure onto the session taxonomy, keeping the raw reason
 * in the message so the caller can act on it.
 */
export function classifyStoreError(
	err: unknown,
	browser: BrowserName,
	dbPath: string,
): SessionNotFoundError | SessionStoreLockedError {
	const reason = err instanceof Error ? err.message : String(err);
	const code = errorCode(err);
	const lowered = reason.toLowerCase();

	if ((code && LOCKED_CODES.has(code)) || lowered.includes("locked") || lowered.includes("busy")) {
		return new SessionStoreLockedError(`${browser} cookie store is locked (${reason})`, undefined, {
			cause: err,
		});
	}
	if (code === "EACCES" || code === "EPERM" || lowered.includes("permission")) {
		return new SessionNotFoundError(
			`permission denied reading ${browser} cookie store at ${dbPath} (${reason})`,
			"Grant your terminal or editor access to the browser profile (on macOS: System Settings → Privacy & Security → Full Disk Access), then retry.",
			{ cause: err },
		);
	}
	return new SessionNotFoundError(
		`failed to read ${browser} cookie store at ${dbPath} (${reason})`,
		undefined,
		{ cause: err },
	);
}

/**
 * Runs `fn` against a read-only handle on a browser cookie database and
 * always closes it. The store is never written and never waited on.
 */
export function withCookieDatabase<T>(
	browser: BrowserName,
	dbPath: string,
	fn: (db: Database.Database) => T,
): T {
	if (!fs.existsSync(dbPath)) {
		throw new SessionNotFoundError(`no ${browser} cookie store at ${dbPath}`);
	}

	let db: Database.Database;
	try {
		db = new Database(dbPath, { readonly: true, fileMustExist: true, timeout: 0 });
	} catch (err) {
		throw classifyStoreError(err, browser, dbPath);
	}

	try {
		return fn(db);
	} catch (err) {
		if (err instanceof SessionNotFoundError || err instanceof SessionStoreLockedError) {
			throw err;
		}
		throw classifyStoreError(err, browser, dbPath);
	} finally {
		db.close();
	}
}

export function hasTable(db: Database.Database, table: string): boolean {
	const row = db
		.prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?")
		.get(table) as { name: string } | undefined;
	return row !== undefined;
}
