/**
 * @title Format Registry
 * @description Lookup of description formats by resource type and format version.
 *
 * Resolution order for a declared version:
 * 1. the format of the version's series, if it knows the exact version
 * 2. any format of the type whose migration chain starts from the exact version
 * 3. the latest known version of the same series (future or unknown patch)
 * 4. the oldest version any chain migrates from, for versions predating it
 * 5. the latest format of the type
 *
 * Types without formats of their own resolve through the generic lineage.
 *
 * @module registry
 */

import {
	compareFormatVersions,
	formatVersionSeries,
	isNewerFormatVersion,
	parseFormatVersion,
	sortFormatVersions,
} from "@resource-spec/core";
import type { DescriptionFormat } from "./format.js";
import { getFormatVersions } from "./format.js";

/** Type whose formats validate resources of unknown types. */
export const GENERIC_TYPE = "generic";

/**
 * Outcome of resolving a declared format version.
 */
export interface FormatResolution {
	/** Format to validate with. */
	format: DescriptionFormat;
	/** Version the document is migrated from. */
	version: string;
	/** Whether `version` replaces the declared version. */
	substituted: boolean;
	/** Message describing the substitution, if any. */
	message?: string;
}

/**
 * Read-only table of description formats.
 */
export class FormatRegistry {
	private readonly formats: ReadonlyMap<string, readonly DescriptionFormat[]>;

	/**
	 * @param formats - Formats to register
	 * @throws Error if a type and series is registered twice
	 */
	constructor(formats: Iterable<DescriptionFormat>) {
		const byType = new Map<string, DescriptionFormat[]>();
		for (const format of formats) {
			const lineage = byType.get(format.type) ?? [];
			if (lineage.some((existing) => existing.series === format.series)) {
				throw new Error(`Duplicate format ${format.type} ${format.series}`);
			}
			lineage.push(format);
			byType.set(format.type, lineage);
		}
		for (const lineage of byType.values()) {
			lineage.sort((a, b) => compareFormatVersions(a.latestVersion, b.latestVersion));
		}
		this.formats = byType;
	}

	/**
	 * Registered resource types.
	 */
	get types(): string[] {
		return [...this.formats.keys()];
	}

	/**
	 * Check whether a type has formats of its own.
	 */
	has(type: string): boolean {
		return this.formats.has(type);
	}

	/**
	 * Formats of a type in ascending order, falling back to the generic lineage.
	 */
	lineage(type: string): readonly DescriptionFormat[] {
		return this.formats.get(type) ?? this.formats.get(GENERIC_TYPE) ?? [];
	}

	/**
	 * Latest format of a type.
	 *
	 * @throws Error if neither the type nor the generic lineage has formats
	 */
	latest(type: string): DescriptionFormat {
		const format = this.lineage(type).at(-1);
		if (!format) {
			throw new Error(`No description format registered for type '${type}'`);
		}
		return format;
	}

	/**
	 * Format of the given series of a type.
	 */
	getSeries(type: string, series: string): DescriptionFormat | undefined {
		return this.lineage(type).find((format) => format.series === series);
	}

	/**
	 * Resolve a declared format version to the format validating it.
	 */
	resolve(type: string, version: string): FormatResolution {
		const lineage = this.lineage(type);
		const series = formatVersionSeries(version);
		const own = series === null ? undefined : this.getSeries(type, series);

		if (own && getFormatVersions(own).includes(version)) {
			return { format: own, version, substituted: false };
		}

		const migrating = lineage.find((format) => getFormatVersions(format).includes(version));
		if (migrating && !own) {
			return { format: migrating, version, substituted: false };
		}

		if (series !== null) {
			const known = sortFormatVersions(
				lineage.flatMap((format) => getFormatVersions(format)).filter((v) => formatVersionSeries(v) === series),
			);
			const latestOfSeries = known.at(-1);
			if (latestOfSeries) {
				const format = own ?? lineage.find((candidate) => getFormatVersions(candidate).includes(latestOfSeries));
				if (format) {
					return substitute(format, version, own ? format.latestVersion : latestOfSeries);
				}
			}
		}

		const earliest = earliestFormat(lineage);
		if (earliest && parseFormatVersion(version) && compareFormatVersions(version, earliest.version) < 0) {
			return substitute(earliest.format, version, earliest.version);
		}

		const latest = this.latest(type);
		return substitute(latest, version, latest.latestVersion);
	}

	/**
	 * Every format version each type can validate, including versions only
	 * reachable through migration.
	 */
	getSupportedFormatVersions(): Record<string, readonly string[]> {
		const result: Record<string, readonly string[]> = {};
		for (const [type, lineage] of this.formats) {
			const versions = new Set(lineage.flatMap((format) => getFormatVersions(format)));
			result[type] = Object.freeze(sortFormatVersions(versions));
		}
		return result;
	}
}

function earliestFormat(
	lineage: readonly DescriptionFormat[],
): { format: DescriptionFormat; version: string } | undefined {
	let earliest: { format: DescriptionFormat; version: string } | undefined;
	for (const format of lineage) {
		const oldest = getFormatVersions(format)[0];
		if (oldest && (!earliest || compareFormatVersions(oldest, earliest.version) < 0)) {
			earliest = { format, version: oldest };
		}
	}
	return earliest;
}

function substitute(format: DescriptionFormat, declared: string, version: string): FormatResolution {
	const kind = isNewerFormatVersion(declared, version) ? "future patch" : "unknown format";
	return {
		format,
		version,
		substituted: true,
		message: `Treated ${kind} version ${declared} as ${version}.`,
	};
}
