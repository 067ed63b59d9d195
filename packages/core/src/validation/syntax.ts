/**
 * @title Syntax Validators
 * @description String-grammar constraints: version strings, identifiers,
 * datetimes, ORCID iDs, SI units, DOIs and URLs.
 *
 * @module validation
 */

import * as fs from "node:fs";
import { ConstraintError, ResourceSpecError } from "../errors.js";
import { isHttpUrl } from "../references/file-source.js";
import type { Validator } from "./validator.js";
import { describeType } from "./validator.js";

// Public version identifiers: epoch, release, pre, post, dev and local segments.
const VERSION_REGEX =
	/^\s*v?(?:[0-9]+!)?[0-9]+(?:\.[0-9]+)*(?:[-_.]?(?:a|b|c|rc|alpha|beta|pre|preview)[-_.]?[0-9]*)?(?:-[0-9]+|[-_.]?(?:post|rev|r)[-_.]?[0-9]*)?(?:[-_.]?dev[-_.]?[0-9]*)?(?:\+[a-z0-9]+(?:[-_.][a-z0-9]+)*)?\s*$/i;

/**
 * Requires a public version string such as "1.2.0", "2.0rc1" or "1.0.post2+local.7".
 */
export class VersionSyntax implements Validator<string> {
	validate(value: string): string {
		if (!VERSION_REGEX.test(value)) {
			throw new ConstraintError(`'${value}' is not a valid version string`);
		}
		return value;
	}
}

const RESERVED_WORDS_URL = new URL("../../data/reserved-words.json", import.meta.url);
let reservedWords: ReadonlySet<string> | undefined;

/**
 * Words that may not be used as identifiers.
 */
export function getReservedWords(): ReadonlySet<string> {
	if (!reservedWords) {
		const parsed: unknown = JSON.parse(fs.readFileSync(RESERVED_WORDS_URL, "utf-8"));
		if (!Array.isArray(parsed) || !parsed.every((word) => typeof word === "string")) {
			throw new ResourceSpecError("Reserved word list must be an array of strings", "DATA_ERROR");
		}
		reservedWords = new Set(parsed);
	}
	return reservedWords;
}

/**
 * Requires a bare identifier that is not a reserved word, so that it can be
 * used unquoted as a key or attribute name in generated code.
 */
export class IdentifierSyntax implements Validator<string> {
	validate(value: string): string {
		if (!/^[\p{L}_][\p{L}\p{N}_]*$/u.test(value)) {
			throw new ConstraintError(`'${value}' is not a valid identifier`);
		}
		if (getReservedWords().has(value)) {
			throw new ConstraintError(`'${value}' is a reserved keyword and not allowed here`);
		}
		return value;
	}
}

const DATETIME_REGEX =
	/^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?)?$/i;

function parseOffsetMinutes(offset: string | undefined): number {
	if (!offset || offset.toUpperCase() === "Z") {
		return 0;
	}
	const sign = offset.startsWith("-") ? -1 : 1;
	const digits = offset.slice(1).replace(":", "");
	const hours = Number(digits.slice(0, 2));
	const minutes = digits.length > 2 ? Number(digits.slice(2)) : 0;
	if (hours > 23 || minutes > 59) {
		return Number.NaN;
	}
	return sign * (hours * 60 + minutes);
}

/**
 * Parse an ISO 8601 date or datetime string.
 *
 * "Z" is read as "+00:00"; datetimes without an offset are taken as UTC.
 *
 * @returns The parsed date, or null if the string is not a valid ISO 8601 datetime
 */
export function parseIsoDatetime(value: string): Date | null {
	const match = DATETIME_REGEX.exec(value.trim());
	if (!match) {
		return null;
	}

	const [, year, month, day, hour = "0", minute = "0", second = "0", fraction = "0", offset] = match;
	const parts = [year, month, day, hour, minute, second].map(Number);
	const [y, mo, d, h, mi, s] = parts;
	const offsetMinutes = parseOffsetMinutes(offset);
	if (mo < 1 || mo > 12 || d < 1 || h > 23 || mi > 59 || s > 59 || Number.isNaN(offsetMinutes)) {
		return null;
	}

	const milliseconds = Math.floor(Number(`0.${fraction}`) * 1000);
	const local = Date.UTC(y, mo - 1, d, h, mi, s, milliseconds);
	if (new Date(local).getUTCDate() !== d) {
		return null;
	}
	return new Date(local - offsetMinutes * 60_000);
}

/**
 * Accepts dates unchanged and parses ISO 8601 strings.
 */
export class DatetimeSyntax implements Validator<unknown, Date> {
	validate(value: unknown): Date {
		if (value instanceof Date) {
			if (Number.isNaN(value.getTime())) {
				throw new ConstraintError("Invalid date");
			}
			return value;
		}
		if (typeof value !== "string") {
			throw new ConstraintError(`Expected a datetime or an ISO 8601 string, but got ${describeType(value)}`);
		}

		const parsed = parseIsoDatetime(value);
		if (!parsed) {
			throw new ConstraintError(`'${value}' is not a valid ISO 8601 datetime`);
		}
		return parsed;
	}
}

const ORCID_SHAPE = /^\d{4}-\d{4}-\d{4}-\d{3}[\dX]$/;

/**
 * Requires an ORCID iD in hyphenated groups of four with a valid
 * ISO 7064 MOD 11-2 check character.
 */
export class OrcidChecksum implements Validator<string> {
	validate(value: string): string {
		if (!ORCID_SHAPE.test(value)) {
			throw new ConstraintError(`'${value}' is not a valid ORCID iD in hyphenated groups of 4 digits`);
		}

		let check = 0;
		for (const char of value.replaceAll("-", "")) {
			check = (2 * check + (char === "X" ? 10 : Number(char))) % 11;
		}
		if (check !== 1) {
			throw new ConstraintError(`'${value}' is not a valid ORCID iD: checksum mismatch`);
		}
		return value;
	}
}

const SI_PREFIX = "(?:Q|R|Y|Z|E|P|T|G|M|k|h|da|d|c|m|µ|n|p|f|a|z|y|r|q)";
const SI_UNIT = "(?:m|g|s|A|K|mol|cd|Hz|N|Pa|J|W|C|V|F|Ω|S|Wb|T|H|lm|lx|Bq|Gy|Sv|kat|l|L)";
const ANY_POWER = "(?:\\^[+-]?[1-9]\\d*)";
const POSITIVE_POWER = "(?:\\^\\+?[1-9]\\d*)";
const UNIT_ANY_POWER = `${SI_PREFIX}?${SI_UNIT}${ANY_POWER}?`;
const UNIT_POSITIVE_POWER = `${SI_PREFIX}?${SI_UNIT}${POSITIVE_POWER}?`;

/**
 * Grammar of compound SI units: terms joined by "·" (any exponent) or "/" (positive exponent).
 */
export const SI_UNIT_REGEX = new RegExp(`^${UNIT_ANY_POWER}(?:·${UNIT_ANY_POWER}|/${UNIT_POSITIVE_POWER})*$`, "u");

/**
 * Requires a compound SI unit such as "kg/m^2·s^-2".
 * "×" and "*" are normalised to "·".
 */
export class SiUnitSyntax implements Validator<string> {
	validate(value: string): string {
		const normalised = value.replace(/[×*]/g, "·");
		if (!SI_UNIT_REGEX.test(normalised)) {
			throw new ConstraintError(`'${value}' is not a valid SI unit`);
		}
		return normalised;
	}
}

/**
 * Requires a DOI without resolver prefix, e.g. "10.5281/zenodo.1234".
 */
export class DoiSyntax implements Validator<string> {
	validate(value: string): string {
		if (!/^10\.[0-9]{4}.+$/.test(value)) {
			throw new ConstraintError(`'${value}' is not a valid DOI`);
		}
		return value;
	}
}

/**
 * Requires an absolute http(s) URL.
 */
export class HttpUrlSyntax implements Validator<string> {
	validate(value: string): string {
		if (!isHttpUrl(value)) {
			throw new ConstraintError(`'${value}' is not a valid http(s) URL`, "url_parsing");
		}
		return value;
	}
}
