import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import pino from "pino";

export type Logger = pino.Logger;

function logDirCandidates(env: NodeJS.ProcessEnv): string[] {
	const configured = env["SEARCH_CONSOLE_LOG_DIR"];
	if (configured) {
		return [configured];
	}
	return [
		path.join(os.homedir(), ".search-console-bridge", "logs"),
		path.join(process.cwd(), ".search-console-logs"),
		path.join(os.tmpdir(), "search-console-logs"),
	];
}

function isWritableDir(dir: string): boolean {
	try {
		fs.mkdirSync(dir, { recursive: true });
		fs.accessSync(dir, fs.constants.W_OK);
		return true;
	} catch {
		// Not creatable or read-only; the caller moves on to the next candidate.
		return false;
	}
}

/**
 * `<dir>/<name>-<YYYY-MM-DD>.log` under the first usable log directory.
 * SEARCH_CONSOLE_LOG_DIR, when set, is the only directory considered.
 */
export function dailyLogFile(
	name: string,
	env: NodeJS.ProcessEnv = process.env,
	now: Date = new Date(),
): string | undefined {
	const dir = logDirCandidates(env).find(isWritableDir);
	return dir ? path.join(dir, `${name}-${now.toISOString().slice(0, 10)}.log`) : undefined;
}

/**
 * stdout carries the MCP protocol, so console output always goes to stderr.
 * The daily file is added when a log directory is usable.
 */
export function createLogger(name: string, level?: string): Logger {
	const options: pino.LoggerOptions = {
		name,
		level: level ?? process.env["LOG_LEVEL"] ?? "info",
		timestamp: pino.stdTimeFunctions.isoTime,
	};

	const file = dailyLogFile(name);
	if (!file) {
		return pino(options, process.stderr);
	}
	return pino(
		options,
		pino.multistream([
			{ stream: process.stderr },
			{ stream: pino.destination({ dest: file, sync: false, append: true }) },
		]),
	);
}
