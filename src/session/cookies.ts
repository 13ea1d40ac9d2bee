export type CookieSameSite = "Strict" | "Lax" | "None";

export interface CookieRecord {
	readonly name: string;
	readonly value: string;
	readonly domain: string;
	readonly path: string;
	readonly secure: boolean;
	readonly httpOnly: boolean;
	readonly sameSite: CookieSameSite;
	/** Epoch milliseconds, or null for a session cookie. */
	readonly expiresAt: number | null;
}

export type CookieSet = ReadonlyMap<string, CookieRecord>;

/** Cookies the Search Console session needs; all must be present. */
export const DEFAULT_REQUIRED_COOKIES = ["SID", "HSID", "SSID", "APISID", "SAPISID"] as const;

/** Session secret cookie names, in order of preference. */
export const SESSION_SECRET_COOKIES = ["SAPISID", "__Secure-3PAPISID", "__Secure-1PAPISID"] as const;

const GOOGLE_SESSION_COOKIES: readonly string[] = [
	"SAPISID",
	"__Secure-1PAPISID",
	"__Secure-3PAPISID",
	"__Secure-1PSID",
	"__Secure-3PSID",
	"SID",
	"HSID",
	"SSID",
	"APISID",
	"OSID",
	"NID",
];

export function missingCookies(cookies: CookieSet, required: readonly string[]): string[] {
	return required.filter((name) => !cookies.get(name)?.value);
}

export function sessionSecret(cookies: CookieSet): string | undefined {
	for (const name of SESSION_SECRET_COOKIES) {
		const value = cookies.get(name)?.value;
		if (value) {
			return value;
		}
	}
	return undefined;
}

/**
 * Builds a `Cookie` header from the known Google session cookies plus any
 * `__Secure-` / `__Host-` prefixed cookie.
 */
export function buildCookieHeader(cookies: CookieSet): string {
	const parts: string[] = [];
	for (const name of GOOGLE_SESSION_COOKIES) {
		const cookie = cookies.get(name);
		if (cookie?.value) {
			parts.push(`${name}=${cookie.value}`);
		}
	}
	for (const [name, cookie] of cookies) {
		if (GOOGLE_SESSION_COOKIES.includes(name)) {
			continue;
		}
		if (name.startsWith("__Secure-") || name.startsWith("__Host-")) {
			parts.push(`${name}=${cookie.value}`);
		}
	}
	return parts.join("; ");
}

/** Keeps the first cookie per name; callers order records most specific first. */
export function toCookieSet(records: readonly CookieRecord[]): CookieSet {
	const set = new Map<string, CookieRecord>();
	for (const record of records) {
		if (record.value && !set.has(record.name)) {
			set.set(record.name, record);
		}
	}
	return set;
}
