/**
 * @title Severity-Graded Warnings
 * @description Turn strict validators into rules whose failures are reported
 * according to the active warning level.
 *
 * A rule of severity S fails as follows under warning level L (ERROR when no
 * context is given):
 * - S >= L: a ValidationWarning is thrown (recorded as an error if S is ERROR)
 * - S < L: the failure is logged and the original value is returned
 *
 * @module validation
 */

import type { WarningLevel } from "../types/warning-level.js";
import { ERROR, WARNING, warningLevelName } from "../types/warning-level.js";
import { ConstraintError, ValidationWarning } from "../errors.js";
import { getSettings } from "../settings.js";
import { logMessage } from "../logging.js";
import type { ValidationContext } from "./context.js";
import type { Validator } from "./validator.js";
import { formatValue } from "./validator.js";

/**
 * Options for issuing a warning.
 */
export interface WarningOptions {
	/** Severity of the rule. */
	severity: WarningLevel;
	/** The value that violated the rule. */
	value: unknown;
	/** Active validation context, if any. */
	context?: ValidationContext;
	/** Metadata for the message template and the raised warning. */
	msgContext?: Record<string, unknown>;
}

/**
 * Fill `{value}` and `{key}` placeholders of a message template.
 *
 * Unknown placeholders are left as they are.
 */
export function formatWarningMessage(template: string, value: unknown, msgContext: Record<string, unknown> = {}): string {
	return template.replace(/\{(\w+)\}/g, (match, key: string) => {
		if (key === "value" && !Object.hasOwn(msgContext, "value")) {
			return formatValue(value);
		}
		return Object.hasOwn(msgContext, key) ? String(msgContext[key]) : match;
	});
}

/**
 * Report a rule violation according to the active warning level.
 *
 * @param message - Message template
 * @param options - Severity, value and context
 * @throws ValidationWarning if the severity reaches the warning level
 */
export function issueWarning(message: string, options: WarningOptions): void {
	const { severity, value, context, msgContext } = options;
	const text = formatWarningMessage(message, value, msgContext);

	if (severity >= (context?.warningLevel ?? ERROR)) {
		throw new ValidationWarning(text, { severity, value, context: msgContext });
	}

	if (context?.logWarnings ?? getSettings().logWarnings) {
		logMessage(`${warningLevelName(severity)}: ${text}`, "debug");
	}
}

/**
 * Options for wrapping a validator.
 */
export interface AsWarningOptions {
	/** Severity of the rule (default: WARNING). */
	severity?: WarningLevel;
	/** Message template replacing the inner validator's message. */
	msg?: string;
	/** Metadata for the message template. */
	msgContext?: Record<string, unknown>;
}

/**
 * Wrap a validator so that its failures become severity-graded warnings.
 *
 * The wrapped validator always returns its input unchanged.
 *
 * @example
 * ```typescript
 * const knownLicense = asWarning(new Predicate(isKnownLicense, "unknown license"), {
 * 	severity: WARNING,
 * 	msg: "{value} is not a known SPDX license identifier",
 * });
 * ```
 */
export function asWarning<T>(validator: Validator<T, unknown>, options: AsWarningOptions = {}): Validator<T> {
	const severity = options.severity ?? WARNING;

	return {
		validate(value: T, context?: ValidationContext): T {
			try {
				validator.validate(value, context);
			} catch (error) {
				if (!(error instanceof ConstraintError)) {
					throw error;
				}
				issueWarning(options.msg ?? error.message, { severity, value, context, msgContext: options.msgContext });
			}
			return value;
		},
	};
}
