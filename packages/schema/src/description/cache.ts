/**
 * @title Description Cache
 * @description In-memory cache of descriptions loaded from disk.
 *
 * Results are loaded lazily on first access and kept until invalidated;
 * changes to the files are not watched.
 *
 * @module description
 */

import * as path from "node:path";
import type { LoadDescriptionResult } from "./load.js";
import type { LoadDescriptionFromPathOptions } from "./path.js";
import { loadDescriptionFromPath } from "./path.js";

/**
 * Cache of load results by resolved path.
 */
export class DescriptionCache {
	private cache = new Map<string, LoadDescriptionResult>();

	/**
	 * @param options - Options used for every load
	 */
	constructor(private readonly options: LoadDescriptionFromPathOptions = {}) {}

	/**
	 * Get the load result for a description directory or file.
	 * Loads and caches it on first access.
	 *
	 * @throws DescriptionFileError if no description file is found or it cannot be parsed
	 */
	get(source: string): LoadDescriptionResult {
		const key = path.resolve(source);
		const cached = this.cache.get(key);
		if (cached) {
			return cached;
		}

		const result = loadDescriptionFromPath(key, this.options);
		this.cache.set(key, result);
		return result;
	}

	/**
	 * Check whether a result is cached for the given path.
	 */
	has(source: string): boolean {
		return this.cache.has(path.resolve(source));
	}

	/**
	 * Invalidate the cached result for a path.
	 */
	invalidate(source: string): void {
		this.cache.delete(path.resolve(source));
	}

	/**
	 * Invalidate all cached results.
	 */
	invalidateAll(): void {
		this.cache.clear();
	}
}
