import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SessionNotFoundError } from "../../src/errors.js";
import { FirefoxCookieStore } from "../../src/session/firefox-store.js";

interface SeedRow {
	host: string;
	name: string;
	value: string;
	expiry?: number;
	sameSite?: number;
}

function createMozCookies(dbPath: string, rows: SeedRow[]): void {
	const db = new Database(dbPath);
	db.exec(`
		CREATE TABLE moz_cookies (
			id INTEGER PRIMARY KEY, host TEXT, name TEXT, value TEXT, path TEXT,
			expiry INTEGER, isSecure INTEGER, isHttpOnly INTEGER, sameSite INTEGER
		);
	`);
	const insert = db.prepare(
		"INSERT INTO moz_cookies (host, name, value, path, expiry, isSecure, isHttpOnly, sameSite) VALUES (?, ?, ?, '/', ?, 1, 1, ?)",
	);
	for (const row of rows) {
		insert.run(row.host, row.name, row.value, row.expiry ?? 0, row.sameSite ?? 0);
	}
	db.close();
}

describe("FirefoxCookieStore", () => {
	let tmpDir: string;

	beforeEach(() => {
		tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "scb-test-firefox-"));
	});

	afterEach(() => {
		fs.rmSync(tmpDir, { recursive: true, force: true });
	});

	it("should read plaintext cookies with the exact domain first", async () => {
		const dbPath = path.join(tmpDir, "cookies.sqlite");
		createMozCookies(dbPath, [
			{ host: "accounts.google.com", name: "SID", value: "subdomain-sid" },
			{ host: ".google.com", name: "SID", value: "root-sid", expiry: 1_700_000_000, sameSite: 1 },
			{ host: ".google.com", name: "OSID", value: "" },
		]);
		const store = new FirefoxCookieStore({ dbPath });

		const records = await store.read("google.com");

		expect(records).toEqual([
			{
				name: "SID",
				value: "root-sid",
				domain: ".google.com",
				path: "/",
				secure: true,
				httpOnly: true,
				sameSite: "Lax",
				expiresAt: 1_700_000_000_000,
			},
			{
				name: "SID",
				value: "subdomain-sid",
				domain: "accounts.google.com",
				path: "/",
				secure: true,
				httpOnly: true,
				sameSite: "None",
				expiresAt: null,
			},
		]);
	});

	it("should keep expiry values already in milliseconds", async () => {
		const dbPath = path.join(tmpDir, "cookies.sqlite");
		createMozCookies(dbPath, [
			{ host: ".google.com", name: "SID", value: "test-sid", expiry: 1_700_000_000_000, sameSite: 2 },
		]);

		const [record] = await new FirefoxCookieStore({ dbPath }).read("google.com");

		expect(record?.expiresAt).toBe(1_700_000_000_000);
		expect(record?.sameSite).toBe("Strict");
	});

	it("should find the default profile through profiles.ini", async () => {
		const profileDir = path.join(tmpDir, "Profiles", "abcd.default-release");
		fs.mkdirSync(profileDir, { recursive: true });
		fs.writeFileSync(
			path.join(tmpDir, "profiles.ini"),
			"[Profile0]\nName=default-release\nIsRelative=1\nPath=Profiles/abcd.default-release\n",
		);
		createMozCookies(path.join(profileDir, "cookies.sqlite"), [
			{ host: ".google.com", name: "SAPISID", value: "test-sapisid" },
		]);

		const records = await new FirefoxCookieStore({ profilesRoot: tmpDir }).read("google.com");

		expect(records.map((r) => r.value)).toEqual(["test-sapisid"]);
	});

	it("should throw SessionNotFoundError without a profile", async () => {
		const store = new FirefoxCookieStore({ profilesRoot: tmpDir });

		await expect(store.read("google.com")).rejects.toBeInstanceOf(SessionNotFoundError);
		await expect(store.read("google.com")).rejects.toThrow(`no firefox profile found under ${tmpDir}`);
	});
});
