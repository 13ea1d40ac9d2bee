import { describe, expect, it } from "vitest";
import { RpcDecodeError } from "../../src/errors.js";
import { parseFrames, toEnvelope } from "../../src/rpc/frames.js";
import { encodeFrames } from "../helpers.js";

function body(text: string): Buffer {
	return Buffer.from(text, "utf8");
}

describe("parseFrames", () => {
	it("should split a prefixed body into frames and flatten them", () => {
		const frames = parseFrames(body(encodeFrames([[["wrb.fr", "a"]], [["di", 42], ["af.httprm", 40]]])));

		expect(frames).toHaveLength(2);
		expect(frames[0]?.byteCount).toBe(JSON.stringify([["wrb.fr", "a"]]).length);
		expect(toEnvelope(frames)).toEqual([
			["wrb.fr", "a"],
			["di", 42],
			["af.httprm", 40],
		]);
	});

	it("should count multi-byte characters as bytes", () => {
		const frames = parseFrames(body(encodeFrames([[["café", "ü"]]])));
		expect(frames[0]?.payload).toEqual([["café", "ü"]]);
		expect(frames[0]?.byteCount).toBe(16);
	});

	it("should accept a body without the anti-XSSI prefix", () => {
		expect(toEnvelope(parseFrames(body('5\n[1,2]\n')))).toEqual([1, 2]);
	});

	it("should return no frames for an empty body", () => {
		expect(parseFrames(body(")]}'\n\n"))).toEqual([]);
	});

	it("should reject a frame longer than the body", () => {
		expect(() => parseFrames(body(")]}'\n\n50\n[1]"))).toThrow(
			"frame at byte 6 declares 50 bytes but only 3 remain",
		);
	});

	it("should reject a count that cuts through the JSON", () => {
		expect(() => parseFrames(body(")]}'\n5\n[1,2,3]"))).toThrow("does not end on a JSON boundary");
	});

	it("should reject trailing bytes after a complete frame", () => {
		expect(() => parseFrames(body(")]}'\n3\n[1]]\n"))).toThrow("overruns its declared 3 bytes");
	});

	it("should reject a non-numeric length line", () => {
		expect(() => parseFrames(body(")]}'\nabc\n[]"))).toThrow(RpcDecodeError);
	});

	it("should reject an unterminated length line", () => {
		expect(() => parseFrames(body(")]}'\n12"))).toThrow("is not terminated");
	});

	it("should reject a frame that is not an array", () => {
		expect(() => parseFrames(body("2\n{}"))).toThrow("is not a JSON array");
	});
});
