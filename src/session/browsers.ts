import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import type { CookieRecord } from "./cookies.js";

export type BrowserName = "chrome" | "chromium" | "brave" | "edge" | "firefox";

export const BROWSER_NAMES: readonly BrowserName[] = [
	"chrome",
	"chromium",
	"brave",
	"edge",
	"firefox",
];

export const DEFAULT_BROWSER_ORDER: readonly BrowserName[] = [
	"chrome",
	"brave",
	"edge",
	"chromium",
	"firefox",
];

/** Read-only access to one browser's on-disk cookie store. */
export interface CookieSource {
	readonly browser: BrowserName;
	/** Cookies whose host is `domain` or one of its subdomains, most specific host first. */
	read(domain: string): Promise<CookieRecord[]>;
}

export function isBrowserName(value: string): value is BrowserName {
	return (BROWSER_NAMES as readonly string[]).includes(value);
}

interface ChromiumLayout {
	darwin: string;
	linux: string;
	win32: string;
	/** macOS Keychain service holding the "Safe Storage" password. */
	keychainService: string;
	/** Linux keyring `application` attribute. */
	keyringApplication: string;
}

const CHROMIUM_LAYOUTS: Record<Exclude<BrowserName, "firefox">, ChromiumLayout> = {
	chrome: {
		darwin: "Library/Application Support/Google/Chrome",
		linux: ".config/google-chrome",
		win32: "AppData/Local/Google/Chrome/User Data",
		keychainService: "Chrome Safe Storage",
		keyringApplication: "chrome",
	},
	chromium: {
		darwin: "Library/Application Support/Chromium",
		linux: ".config/chromium",
		win32: "AppData/Local/Chromium/User Data",
		keychainService: "Chromium Safe Storage",
		keyringApplication: "chromium",
	},
	brave: {
		darwin: "Library/Application Support/BraveSoftware/Brave-Browser",
		linux: ".config/BraveSoftware/Brave-Browser",
		win32: "AppData/Local/BraveSoftware/Brave-Browser/User Data",
		keychainService: "Brave Safe Storage",
		keyringApplication: "brave",
	},
	edge: {
		darwin: "Library/Application Support/Microsoft Edge",
		linux: ".config/microsoft-edge",
		win32: "AppData/Local/Microsoft/Edge/User Data",
		keychainService: "Microsoft Edge Safe Storage",
		keyringApplication: "chromium",
	},
};

export function chromiumLayout(browser: Exclude<BrowserName, "firefox">): ChromiumLayout {
	return CHROMIUM_LAYOUTS[browser];
}

function platformKey(platform: NodeJS.Platform): "darwin" | "linux" | "win32" {
	if (platform === "darwin" || platform === "win32") {
		return platform;
	}
	return "linux";
}

/**
 * Candidate cookie database paths for a Chromium-family browser profile.
 * Newer releases keep the file under `Network/`.
 */
export function chromiumCookiePaths(
	browser: Exclude<BrowserName, "firefox">,
	profile = "Default",
	platform: NodeJS.Platform = process.platform,
	home: string = os.homedir(),
): string[] {
	const base = path.join(home, CHROMIUM_LAYOUTS[browser][platformKey(platform)], profile);
	return [path.join(base, "Network", "Cookies"), path.join(base, "Cookies")];
}

export function firefoxProfilesRoot(
	platform: NodeJS.Platform = process.platform,
	home: string = os.homedir(),
): string {
	switch (platformKey(platform)) {
		case "darwin":
			return path.join(home, "Library", "Application Support", "Firefox");
		case "win32":
			return path.join(home, "AppData", "Roaming", "Mozilla", "Firefox");
		default:
			return path.join(home, ".mozilla", "firefox");
	}
}

/**
 * Picks the default Firefox profile directory from `profiles.ini`: an
 * `[Install…]` section's `Default=` wins, then a profile marked `Default=1`,
 * then the first `*.default-release` profile.
 */
export function resolveFirefoxProfile(root: string): string | undefined {
	const iniPath = path.join(root, "profiles.ini");
	if (!fs.existsSync(iniPath)) {
		return undefined;
	}

	const sections = parseIni(fs.readFileSync(iniPath, "utf8"));
	const toDir = (entry: Record<string, string>, key: string): string | undefined => {
		const value = entry[key];
		if (!value) {
			return undefined;
		}
		return entry["IsRelative"] === "0" ? value : path.join(root, value);
	};

	for (const [name, entry] of sections) {
		if (name.startsWith("Install")) {
			const dir = toDir(entry, "Default");
			if (dir) {
				return dir;
			}
		}
	}
	const profiles = [...sections].filter(([name]) => name.startsWith("Profile"));
	const marked = profiles.find(([, entry]) => entry["Default"] === "1");
	if (marked) {
		return toDir(marked[1], "Path");
	}
	const release = profiles.find(([, entry]) => entry["Path"]?.endsWith(".default-release"));
	return release ? toDir(release[1], "Path") : undefined;
}

function parseIni(text: string): Map<string, Record<string, string>> {
	const sections = new Map<string, Record<string, string>>();
	let current: Record<string, string> | undefined;
	for (const rawLine of text.split(/\r?\n/)) {
		const line = rawLine.trim();
		if (!line || line.startsWith(";") || line.startsWith("#")) {
			continue;
		}
		const header = /^\[(.+)\]$/.exec(line);
		if (header?.[1]) {
			current = {};
			sections.set(header[1], current);
			continue;
		}
		const eq = line.indexOf("=");
		if (current && eq > 0) {
			current[line.slice(0, eq).trim()] = line.slice(eq + 1).trim();
		}
	}
	return sections;
}
