import { describe, it, expect } from "vitest";
import {
	DatetimeSyntax,
	DoiSyntax,
	HttpUrlSyntax,
	IdentifierSyntax,
	OrcidChecksum,
	SiUnitSyntax,
	VersionSyntax,
	getReservedWords,
	parseIsoDatetime,
} from "../../src/validation/syntax.js";

describe("VersionSyntax", () => {
	const validator = new VersionSyntax();

	it.each(["1", "1.2.0", "0.4.10", "2.0rc1", "1.0.post2", "1.0.dev3", "1!2.0", "1.0+local.7", " 1.0 "])(
		"accepts %s",
		(value) => {
			expect(validator.validate(value)).toBe(value);
		},
	);

	it.each(["", "one", "1..2", "1.0-", "v"])("rejects '%s'", (value) => {
		expect(() => validator.validate(value)).toThrow(`'${value}' is not a valid version string`);
	});
});

describe("IdentifierSyntax", () => {
	const validator = new IdentifierSyntax();

	it("accepts identifiers", () => {
		expect(validator.validate("raw_input")).toBe("raw_input");
		expect(validator.validate("_x2")).toBe("_x2");
	});

	it("rejects malformed identifiers", () => {
		expect(() => validator.validate("2x")).toThrow("'2x' is not a valid identifier");
		expect(() => validator.validate("raw-input")).toThrow("'raw-input' is not a valid identifier");
	});

	it("rejects reserved words", () => {
		expect(getReservedWords().has("class")).toBe(true);
		expect(() => validator.validate("class")).toThrow("'class' is a reserved keyword and not allowed here");
	});
});

describe("DatetimeSyntax", () => {
	const validator = new DatetimeSyntax();

	it("parses offsets", () => {
		expect(validator.validate("2019-12-11T12:22:32+01:00").toISOString()).toBe("2019-12-11T11:22:32.000Z");
	});

	it("reads Z as UTC", () => {
		expect(validator.validate("2019-12-11T12:22:32Z").toISOString()).toBe("2019-12-11T12:22:32.000Z");
	});

	it("treats datetimes without offset as UTC", () => {
		expect(validator.validate("2019-12-11 12:22:32.5").toISOString()).toBe("2019-12-11T12:22:32.500Z");
		expect(validator.validate("2019-12-11").toISOString()).toBe("2019-12-11T00:00:00.000Z");
	});

	it("accepts dates", () => {
		const date = new Date(Date.UTC(2020, 0, 1));

		expect(validator.validate(date)).toBe(date);
	});

	it("rejects impossible dates", () => {
		expect(parseIsoDatetime("2021-02-30")).toBeNull();
		expect(() => validator.validate("2021-13-01")).toThrow("'2021-13-01' is not a valid ISO 8601 datetime");
	});

	it("rejects other types", () => {
		expect(() => validator.validate(20191211)).toThrow("Expected a datetime or an ISO 8601 string, but got number");
	});
});

describe("OrcidChecksum", () => {
	const validator = new OrcidChecksum();
	const valid = "0000-0001-2345-6789";

	it("accepts a valid ORCID iD", () => {
		expect(validator.validate(valid)).toBe(valid);
		expect(validator.validate("0000-0002-1694-233X")).toBe("0000-0002-1694-233X");
	});

	it("rejects every single-digit change", () => {
		for (let index = 0; index < valid.length; index++) {
			if (valid[index] === "-") {
				continue;
			}
			const digit = Number(valid[index]);
			for (let replacement = 0; replacement <= 9; replacement++) {
				if (replacement === digit) {
					continue;
				}
				const changed = `${valid.slice(0, index)}${replacement}${valid.slice(index + 1)}`;
				expect(() => validator.validate(changed)).toThrow("checksum mismatch");
			}
		}
	});

	it("requires hyphenated groups", () => {
		expect(() => validator.validate("0000000123456789")).toThrow(
			"'0000000123456789' is not a valid ORCID iD in hyphenated groups of 4 digits",
		);
	});
});

describe("SiUnitSyntax", () => {
	const validator = new SiUnitSyntax();

	it.each(["m", "kg", "mol", "µm", "kg/m^2·s^-2", "m·s^-1", "kHz", "mm^3", "lx·s"])("accepts %s", (value) => {
		expect(validator.validate(value)).toBe(value);
	});

	it("normalises multiplication signs", () => {
		expect(validator.validate("kg*m")).toBe("kg·m");
		expect(validator.validate("N×m")).toBe("N·m");
	});

	it.each(["", "meter", "m^0", "kg/s^-2", "m··s", "m^", "lxs", " kg"])("rejects '%s'", (value) => {
		expect(() => validator.validate(value)).toThrow(`'${value}' is not a valid SI unit`);
	});
});

describe("DoiSyntax", () => {
	it("accepts bare DOIs and rejects resolver URLs", () => {
		const validator = new DoiSyntax();

		expect(validator.validate("10.5281/zenodo.5764892")).toBe("10.5281/zenodo.5764892");
		expect(() => validator.validate("https://doi.org/10.5281/zenodo.5764892")).toThrow("is not a valid DOI");
	});
});

describe("HttpUrlSyntax", () => {
	it("accepts http(s) URLs only", () => {
		const validator = new HttpUrlSyntax();

		expect(validator.validate("https://example.com/a")).toBe("https://example.com/a");
		expect(() => validator.validate("ftp://example.com/a")).toThrow("'ftp://example.com/a' is not a valid http(s) URL");
	});
});
