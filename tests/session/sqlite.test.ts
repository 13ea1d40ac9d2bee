import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SessionNotFoundError, SessionStoreLockedError } from "../../src/errors.js";
import { classifyStoreError, withCookieDatabase } from "../../src/session/sqlite.js";

function sqliteError(message: string, code: string): Error {
	return Object.assign(new Error(message), { code });
}

describe("classifyStoreError", () => {
	it("should classify busy and locked databases as locked", () => {
		const busy = classifyStoreError(sqliteError("database is busy", "SQLITE_BUSY"), "chrome", "/tmp/Cookies");
		expect(busy).toBeInstanceOf(SessionStoreLockedError);
		expect(busy.message).toBe("chrome cookie store is locked (database is busy)");

		const locked = classifyStoreError(new Error("database table is locked"), "edge", "/tmp/Cookies");
		expect(locked).toBeInstanceOf(SessionStoreLockedError);
	});

	it("should explain permission failures", () => {
		const err = classifyStoreError(
			sqliteError("unable to open database file", "EACCES"),
			"chrome",
			"/home/user/Cookies",
		);
		expect(err).toBeInstanceOf(SessionNotFoundError);
		expect(err.message).toBe(
			"permission denied reading chrome cookie store at /home/user/Cookies (unable to open database file)",
		);
		expect(err.recoveryHint).toContain("Full Disk Access");
	});

	it("should keep the raw reason for other failures", () => {
		const err = classifyStoreError(new Error("no such table: cookies"), "firefox", "/tmp/cookies.sqlite");
		expect(err).toBeInstanceOf(SessionNotFoundError);
		expect(err.message).toBe(
			"failed to read firefox cookie store at /tmp/cookies.sqlite (no such table: cookies)",
		);
	});
});

describe("withCookieDatabase", () => {
	let tmpDir: string;

	beforeEach(() => {
		tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "scb-test-sqlite-"));
	});

	afterEach(() => {
		fs.rmSync(tmpDir, { recursive: true, force: true });
	});

	it("should reject a missing file", () => {
		const dbPath = path.join(tmpDir, "Cookies");
		expect(() => withCookieDatabase("chrome", dbPath, () => 1)).toThrow(`no chrome cookie store at ${dbPath}`);
	});

	it("should classify a file that is not a database", () => {
		const dbPath = path.join(tmpDir, "Cookies");
		fs.writeFileSync(dbPath, "this is not a sqlite database, just some text padding it out");

		expect(() =>
			withCookieDatabase("chrome", dbPath, (db) => db.prepare("SELECT * FROM cookies").all()),
		).toThrow(SessionNotFoundError);
	});
});
