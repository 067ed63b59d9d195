import { describe, it, expect } from "vitest";
import {
	cloneRaw,
	isMapping,
	isPlainObject,
	isRawLeafValue,
	isSequence,
	isValidRawMapping,
	isValidRawValue,
} from "../src/types/raw.js";
import {
	ALERT,
	ERROR,
	INFO,
	WARNING,
	WARNING_LEVELS,
	isWarningLevel,
	parseWarningLevel,
	warningLevelName,
} from "../src/types/warning-level.js";
import {
	compareFormatVersions,
	expandPatchVersions,
	formatVersionSeries,
	isNewerFormatVersion,
	parseFormatVersion,
	sortFormatVersions,
} from "../src/types/format-version.js";

describe("raw values", () => {
	it("accepts leaf scalars", () => {
		for (const value of ["text", 1.5, true, null, new Date(0)]) {
			expect(isRawLeafValue(value)).toBe(true);
		}
		expect(isRawLeafValue(undefined)).toBe(false);
		expect(isRawLeafValue(Symbol("s"))).toBe(false);
	});

	it("accepts nested sequences and mappings", () => {
		expect(isValidRawValue({ a: [1, { b: "c" }], d: null })).toBe(true);
	});

	it("rejects functions, undefined and class instances anywhere in the tree", () => {
		expect(isValidRawValue({ a: [() => 1] })).toBe(false);
		expect(isValidRawValue({ a: undefined })).toBe(false);
		expect(isValidRawValue([new Map()])).toBe(false);
	});

	it("distinguishes plain objects", () => {
		expect(isPlainObject({})).toBe(true);
		expect(isPlainObject(Object.create(null))).toBe(true);
		expect(isPlainObject([])).toBe(false);
		expect(isPlainObject(new Date())).toBe(false);
	});

	it("requires a mapping at the top level", () => {
		expect(isValidRawMapping({ type: "model" })).toBe(true);
		expect(isValidRawMapping(["model"])).toBe(false);
		expect(isValidRawMapping("model")).toBe(false);
	});

	it("narrows document members", () => {
		expect(isMapping({ a: 1 })).toBe(true);
		expect(isMapping([1])).toBe(false);
		expect(isSequence([1])).toBe(true);
		expect(isSequence(undefined)).toBe(false);
	});

	it("deep copies", () => {
		const original = { a: [{ b: 1 }] };
		const copy = cloneRaw(original);

		expect(copy).toEqual(original);
		expect(copy.a).not.toBe(original.a);
	});
});

describe("warning levels", () => {
	it("orders the levels", () => {
		expect(WARNING_LEVELS).toEqual([20, 30, 35, 50]);
		expect(INFO < WARNING && WARNING < ALERT && ALERT < ERROR).toBe(true);
	});

	it("names the levels", () => {
		expect(WARNING_LEVELS.map(warningLevelName)).toEqual(["info", "warning", "alert", "error"]);
	});

	it("parses names and numbers", () => {
		expect(parseWarningLevel("Alert")).toBe(ALERT);
		expect(parseWarningLevel(" info ")).toBe(INFO);
		expect(parseWarningLevel("30")).toBe(WARNING);
		expect(parseWarningLevel(50)).toBe(ERROR);
	});

	it("rejects unknown levels", () => {
		expect(parseWarningLevel("critical")).toBeNull();
		expect(parseWarningLevel(40)).toBeNull();
		expect(parseWarningLevel("")).toBeNull();
		expect(isWarningLevel("30")).toBe(false);
	});
});

describe("format versions", () => {
	it("parses major.minor.patch", () => {
		expect(parseFormatVersion("0.4.10")?.patch).toBe(10);
		expect(parseFormatVersion("0.4")).toBeNull();
	});

	it("reads the series", () => {
		expect(formatVersionSeries("0.4.10")).toBe("0.4");
		expect(formatVersionSeries("0.3")).toBe("0.3");
		expect(formatVersionSeries("latest")).toBeNull();
	});

	it("compares numerically", () => {
		expect(compareFormatVersions("0.4.10", "0.4.9")).toBeGreaterThan(0);
		expect(sortFormatVersions(["0.4.10", "0.3.6", "0.4.2"])).toEqual(["0.3.6", "0.4.2", "0.4.10"]);
	});

	it("sorts unparseable versions first", () => {
		expect(sortFormatVersions(["0.2.0", "draft"])).toEqual(["draft", "0.2.0"]);
	});

	it("detects newer versions", () => {
		expect(isNewerFormatVersion("9999.0.0", "0.4.10")).toBe(true);
		expect(isNewerFormatVersion("0.4.1", "0.4.10")).toBe(false);
		expect(isNewerFormatVersion("draft", "0.4.10")).toBe(false);
	});

	it("expands patch versions", () => {
		expect(expandPatchVersions("0.4.2")).toEqual(["0.4.0", "0.4.1", "0.4.2"]);
		expect(expandPatchVersions("draft")).toEqual([]);
	});
});
