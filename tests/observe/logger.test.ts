import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { dailyLogFile } from "../../src/observe/logger.js";

describe("dailyLogFile", () => {
	let tmpDir: string;

	beforeEach(() => {
		tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "scb-test-logs-"));
	});

	afterEach(() => {
		fs.rmSync(tmpDir, { recursive: true, force: true });
	});

	it("should name the file after the logger and the UTC day", () => {
		const dir = path.join(tmpDir, "nested", "logs");

		const file = dailyLogFile("bridge", { SEARCH_CONSOLE_LOG_DIR: dir }, new Date(Date.UTC(2025, 0, 2, 23, 59)));

		expect(file).toBe(path.join(dir, "bridge-2025-01-02.log"));
		expect(fs.statSync(dir).isDirectory()).toBe(true);
	});

	it("should give up when the configured directory cannot be created", () => {
		const blocker = path.join(tmpDir, "not-a-dir");
		fs.writeFileSync(blocker, "");

		expect(dailyLogFile("bridge", { SEARCH_CONSOLE_LOG_DIR: path.join(blocker, "logs") })).toBeUndefined();
	});
});
