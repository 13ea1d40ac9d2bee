/**
 * Versioned lookup table for the undocumented Search Console RPC format.
 *
 * Procedure ids, dimension position codes and metric type codes are
 * observed values, not a published contract. Everything position-dependent
 * lives here so a format change means shipping a new table (or pointing
 * SEARCH_CONSOLE_SCHEMA_TABLE at a JSON file), not touching the decoder.
 */

import * as fs from "node:fs";
import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigurationError, RpcDecodeError } from "../errors.js";

export const DIMENSION_NAMES = ["query", "page", "country", "device", "date"] as const;
export type DimensionName = (typeof DIMENSION_NAMES)[number];

export const METRIC_NAMES = ["clicks", "impressions", "ctr", "position"] as const;
export type MetricName = (typeof METRIC_NAMES)[number];

export const PROCEDURE_NAMES = [
	"byQuery",
	"byPage",
	"byCountry",
	"byDevice",
	"queryPages",
	"timeseries",
] as const;
export type ProcedureName = (typeof PROCEDURE_NAMES)[number];

const DimensionCodesSchema = Type.Object({
	query: Type.Optional(Type.Integer({ minimum: 0 })),
	page: Type.Optional(Type.Integer({ minimum: 0 })),
	country: Type.Optional(Type.Integer({ minimum: 0 })),
	device: Type.Optional(Type.Integer({ minimum: 0 })),
	date: Type.Optional(Type.Integer({ minimum: 0 })),
});

const ProcedureSchema = Type.Object({
	id: Type.String({ minLength: 1 }),
	dimensions: DimensionCodesSchema,
	/** False when the remote ignores the date arguments and returns the full series. */
	honorsDateRange: Type.Boolean(),
});

const MetricNameSchema = Type.Union(METRIC_NAMES.map((name) => Type.Literal(name)));

export const SchemaTableSchema = Type.Object({
	version: Type.String({ minLength: 1 }),
	procedures: Type.Object({
		byQuery: ProcedureSchema,
		byPage: ProcedureSchema,
		byCountry: ProcedureSchema,
		byDevice: ProcedureSchema,
		queryPages: ProcedureSchema,
		timeseries: ProcedureSchema,
	}),
	/** Metric type code (as a decimal string key) → metric. */
	metricTypeCodes: Type.Record(Type.String({ pattern: "^[0-9]+$" }), MetricNameSchema),
});

export type SchemaTableData = Static<typeof SchemaTableSchema>;
export type ProcedureSpec = Static<typeof ProcedureSchema>;
export type DimensionCodes = Static<typeof DimensionCodesSchema>;

export const DEFAULT_SCHEMA_TABLE: SchemaTableData = {
	version: "2025-06",
	procedures: {
		byQuery: { id: "nDAfwb", dimensions: { query: 0 }, honorsDateRange: true },
		byPage: { id: "gydQ5d", dimensions: { page: 0 }, honorsDateRange: true },
		byCountry: { id: "b3Gq1e", dimensions: { country: 0 }, honorsDateRange: true },
		byDevice: { id: "QH8tQe", dimensions: { device: 0 }, honorsDateRange: true },
		// Page first: this procedure has shipped with the two codes swapped before.
		queryPages: { id: "V1Ty6e", dimensions: { page: 0, query: 1 }, honorsDateRange: true },
		timeseries: { id: "OLiH4d", dimensions: { date: 0 }, honorsDateRange: false },
	},
	metricTypeCodes: { "1": "clicks", "2": "impressions", "3": "ctr", "4": "position" },
};

/** Read-only view over one table version. */
export class SchemaTable {
	readonly version: string;
	private _procedures: SchemaTableData["procedures"];
	private _byId = new Map<string, ProcedureSpec>();
	private _metrics = new Map<number, MetricName>();

	constructor(data: SchemaTableData = DEFAULT_SCHEMA_TABLE) {
		this.version = data.version;
		this._procedures = data.procedures;
		for (const name of PROCEDURE_NAMES) {
			const spec = data.procedures[name];
			this._byId.set(spec.id, spec);
		}
		for (const [code, metric] of Object.entries(data.metricTypeCodes)) {
			this._metrics.set(Number(code), metric);
		}
	}

	procedure(name: ProcedureName): ProcedureSpec {
		return this._procedures[name];
	}

	procedureById(procedureId: string): ProcedureSpec | undefined {
		return this._byId.get(procedureId);
	}

	/**
	 * Position of each requested dimension inside the dimension-info slot
	 * of `procedureId`'s rows.
	 */
	dimensionCodes(
		procedureId: string,
		requested: readonly DimensionName[],
	): Array<{ name: DimensionName; position: number }> {
		const spec = this._byId.get(procedureId);
		if (!spec) {
			throw new RpcDecodeError(
				`procedure ${procedureId} is not in schema table ${this.version}`,
			);
		}
		return requested.map((name) => {
			const position = spec.dimensions[name];
			if (position === undefined) {
				throw new RpcDecodeError(
					`procedure ${procedureId} carries no "${name}" dimension in schema table ${this.version}`,
				);
			}
			return { name, position };
		});
	}

	metricForTypeCode(code: number): MetricName | undefined {
		return this._metrics.get(code);
	}
}

export function loadSchemaTable(filePath: string): SchemaTable {
	let raw: unknown;
	try {
		raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
	} catch (err) {
		throw new ConfigurationError(
			`cannot read schema table ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
			"Point SEARCH_CONSOLE_SCHEMA_TABLE at a readable JSON file.",
			{ cause: err },
		);
	}

	if (!Value.Check(SchemaTableSchema, raw)) {
		const first = Value.Errors(SchemaTableSchema, raw).First();
		const where = first ? `${first.path || "/"}: ${first.message}` : "unknown error";
		throw new ConfigurationError(
			`schema table ${filePath} is invalid (${where})`,
			"Fix the schema table file so it matches the documented layout.",
		);
	}
	return new SchemaTable(raw);
}
