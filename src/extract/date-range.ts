import { InvalidArgumentError } from "../errors.js";

export interface Dated {
	readonly date: string;
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const COMPACT_DATE = /^(\d{4})(\d{2})(\d{2})$/;

/**
 * Normalizes `20250101`, `"20250101"` or `"2025-01-01"` to `YYYY-MM-DD`.
 * Returns undefined for anything that is not a real calendar date.
 */
export function normalizeDate(value: unknown): string | undefined {
	let text: string;
	if (typeof value === "number" && Number.isInteger(value)) {
		text = String(value);
	} else if (typeof value === "string") {
		text = value.trim();
	} else {
		return undefined;
	}

	const match = ISO_DATE.exec(text) ?? COMPACT_DATE.exec(text);
	if (!match) {
		return undefined;
	}
	const [, y, m, d] = match;
	const year = Number(y);
	const month = Number(m);
	const day = Number(d);
	const probe = new Date(Date.UTC(year, month - 1, day));
	if (
		probe.getUTCFullYear() !== year ||
		probe.getUTCMonth() !== month - 1 ||
		probe.getUTCDate() !== day
	) {
		return undefined;
	}
	return `${y}-${m}-${d}`;
}

export function formatDate(date: Date): string {
	return date.toISOString().slice(0, 10);
}

/** `YYYY-MM-DD` of `days` days before `now`, in UTC. */
export function daysAgo(days: number, now: number = Date.now()): string {
	return formatDate(new Date(now - days * 86_400_000));
}

function requireDate(value: string, name: string): string {
	const normalized = normalizeDate(value);
	if (!normalized) {
		throw new InvalidArgumentError(
			`${name} "${value}" is not a valid date`,
			`Pass ${name} as YYYY-MM-DD.`,
		);
	}
	return normalized;
}

export interface DateRange {
	start: string;
	end: string;
}

/** Normalizes both bounds and checks their order. */
export function validateDateRange(start: string, end: string): DateRange {
	const from = requireDate(start, "startDate");
	const to = requireDate(end, "endDate");
	if (from > to) {
		throw new InvalidArgumentError(
			`startDate ${from} is after endDate ${to}`,
			"Swap the dates or pass an earlier startDate.",
		);
	}
	return { start: from, end: to };
}

/**
 * Rows whose date falls within [start, end], both inclusive. Rows with an
 * unparseable date are dropped.
 */
export function filterDateRange<T extends Dated>(
	rows: readonly T[],
	start: string,
	end: string,
): T[] {
	const range = validateDateRange(start, end);
	return rows.filter((row) => {
		const date = normalizeDate(row.date);
		return date !== undefined && date >= range.start && date <= range.end;
	});
}
