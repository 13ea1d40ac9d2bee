import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigurationError, RpcDecodeError } from "../../src/errors.js";
import { DEFAULT_SCHEMA_TABLE, SchemaTable, loadSchemaTable } from "../../src/rpc/schema-table.js";

describe("SchemaTable", () => {
	const table = new SchemaTable();

	it("should look procedures up by name and by id", () => {
		expect(table.procedure("queryPages").id).toBe("V1Ty6e");
		expect(table.procedureById("OLiH4d")?.honorsDateRange).toBe(false);
		expect(table.procedureById("unknown")).toBeUndefined();
	});

	it("should resolve dimension positions in request order", () => {
		expect(table.dimensionCodes("V1Ty6e", ["query", "page"])).toEqual([
			{ name: "query", position: 1 },
			{ name: "page", position: 0 },
		]);
	});

	it("should fail for a dimension the procedure does not carry", () => {
		expect(() => table.dimensionCodes("nDAfwb", ["date"])).toThrow(
			'procedure nDAfwb carries no "date" dimension in schema table 2025-06',
		);
		expect(() => table.dimensionCodes("zzz", ["query"])).toThrow(RpcDecodeError);
	});

	it("should map metric type codes", () => {
		expect(table.metricForTypeCode(3)).toBe("ctr");
		expect(table.metricForTypeCode(9)).toBeUndefined();
	});
});

describe("loadSchemaTable", () => {
	let tmpDir: string;

	beforeEach(() => {
		tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "scb-test-schema-"));
	});

	afterEach(() => {
		fs.rmSync(tmpDir, { recursive: true, force: true });
	});

	it("should load a replacement table from JSON", () => {
		const file = path.join(tmpDir, "table.json");
		const data = {
			...DEFAULT_SCHEMA_TABLE,
			version: "2026-01",
			metricTypeCodes: { "11": "clicks", "12": "impressions", "13": "ctr", "14": "position" },
		};
		fs.writeFileSync(file, JSON.stringify(data));

		const loaded = loadSchemaTable(file);

		expect(loaded.version).toBe("2026-01");
		expect(loaded.metricForTypeCode(11)).toBe("clicks");
		expect(loaded.metricForTypeCode(1)).toBeUndefined();
	});

	it("should reject a table with a missing procedure", () => {
		const file = path.join(tmpDir, "table.json");
		const { timeseries: _dropped, ...procedures } = DEFAULT_SCHEMA_TABLE.procedures;
		fs.writeFileSync(file, JSON.stringify({ ...DEFAULT_SCHEMA_TABLE, procedures }));

		expect(() => loadSchemaTable(file)).toThrow(ConfigurationError);
	});

	it("should reject an unreadable file", () => {
		expect(() => loadSchemaTable(path.join(tmpDir, "missing.json"))).toThrow(
			`cannot read schema table ${path.join(tmpDir, "missing.json")}`,
		);
	});
});
