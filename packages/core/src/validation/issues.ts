/**
 * @title Validation Issues
 * @description Located errors and warnings collected while parsing a document.
 *
 * @module validation
 */

import type { WarningLevel } from "../types/warning-level.js";
import { ERROR } from "../types/warning-level.js";
import type { ConstraintError } from "../errors.js";
import { ValidationWarning } from "../errors.js";

/**
 * Path from the document root to a value: mapping keys and sequence indices.
 */
export type Loc = readonly (string | number)[];

/**
 * A blocking validation failure.
 */
export interface ErrorEntry {
	/** Location of the offending value. */
	loc: Loc;
	/** Human-readable message. */
	msg: string;
	/** Kind tag (e.g. "missing", "value_error"). */
	type: string;
	/** Stack trace lines of an unexpected exception. */
	traceback?: string[];
}

/**
 * A non-blocking validation finding.
 */
export interface WarningEntry {
	/** Location of the offending value. */
	loc: Loc;
	/** Human-readable message. */
	msg: string;
	/** Kind tag: the severity name. */
	type: string;
	/** Severity of the violated rule. */
	severity: WarningLevel;
}

/**
 * A file reference that belongs in a resource package.
 */
export interface PackageSourceEntry<S = unknown> {
	/** Location of the field holding the reference. */
	loc: Loc;
	/** The parsed reference. */
	source: S;
}

/**
 * Mutable record of everything found during one parse.
 */
export class ParseState {
	readonly errors: ErrorEntry[] = [];
	readonly warnings: WarningEntry[] = [];
	readonly packageSources: PackageSourceEntry[] = [];

	/**
	 * Whether any error has been recorded.
	 */
	get hasErrors(): boolean {
		return this.errors.length > 0;
	}

	addError(loc: Loc, msg: string, type = "value_error"): void {
		this.errors.push({ loc: [...loc], msg, type });
	}

	addWarning(loc: Loc, msg: string, severity: WarningLevel, type: string): void {
		this.warnings.push({ loc: [...loc], msg, type, severity });
	}

	addPackageSource(loc: Loc, source: unknown): void {
		this.packageSources.push({ loc: [...loc], source });
	}

	/**
	 * Record a caught validation failure at a location.
	 *
	 * @returns True if the failure was recorded as an error
	 */
	record(error: ConstraintError, loc: Loc): boolean {
		if (error instanceof ValidationWarning && error.severity < ERROR) {
			this.addWarning(loc, error.message, error.severity, error.type);
			return false;
		}
		this.addError(loc, error.message, error.type);
		return true;
	}

	/**
	 * Create an empty state for a tentative parse.
	 */
	fork(): ParseState {
		return new ParseState();
	}

	/**
	 * Append everything recorded in another state.
	 */
	merge(other: ParseState): void {
		this.errors.push(...other.errors);
		this.warnings.push(...other.warnings);
		this.packageSources.push(...other.packageSources);
	}
}

/**
 * Render a location as a dotted path.
 *
 * @example
 * ```typescript
 * formatLoc(["inputs", 0, "name"]); // "inputs.0.name"
 * ```
 */
export function formatLoc(loc: Loc): string {
	return loc.map((part) => String(part)).join(".");
}
