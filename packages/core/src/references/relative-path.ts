/**
 * @title Relative References
 * @description Paths relative to a document root, resolved against a
 * filesystem directory or a base URL.
 *
 * A reference is constructed from a relative path and the root of the active
 * validation context. Existence is checked only for filesystem roots.
 *
 * @module references
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { ConstraintError } from "../errors.js";
import type { Root, ValidationContext } from "../validation/context.js";
import { isUrlRoot, resolveAgainstRoot } from "../validation/context.js";

/**
 * What a relative reference must point to.
 */
export type RelativePathKind = "path" | "file" | "directory";

/**
 * Normalise a relative path to posix form.
 *
 * @throws ConstraintError for empty, absolute or URL-like input
 */
export function normaliseRelativePath(input: string): string {
	if (input.trim() === "") {
		throw new ConstraintError("Relative path must not be empty");
	}
	if (/^[a-z][a-z0-9+.-]*:\/\//i.test(input)) {
		throw new ConstraintError(`${input} looks like a URL, not a relative path`);
	}
	if (path.posix.isAbsolute(input) || path.win32.isAbsolute(input)) {
		throw new ConstraintError(`${input} is an absolute path`);
	}

	const normalised = path.posix.normalize(input.replaceAll("\\", "/"));
	return normalised.startsWith("./") ? normalised.slice(2) : normalised;
}

/**
 * A path relative to a root.
 */
export class RelativePath {
	/** What the reference must point to. */
	readonly kind: RelativePathKind = "path";
	/** Posix-style relative path. */
	readonly path: string;
	/** Directory or base URL the path is relative to. */
	readonly root: Root;

	/**
	 * @param input - Relative path, or another reference whose relative part is copied
	 * @param context - Context providing the root
	 * @throws ConstraintError if no root is available or the path is not relative
	 */
	constructor(input: string | RelativePath, context?: ValidationContext) {
		const root = context?.root ?? (input instanceof RelativePath ? input.root : undefined);
		if (root === undefined) {
			throw new ConstraintError("A validation context with a root is required to resolve a relative path");
		}

		this.path = input instanceof RelativePath ? input.path : normaliseRelativePath(input);
		this.root = root;
	}

	/**
	 * The path resolved against the root.
	 */
	get absolute(): string | URL {
		return resolveAgainstRoot(this.root, this.path);
	}

	/**
	 * Check that the referenced path exists.
	 * Does nothing for URL roots.
	 *
	 * @throws ConstraintError if the path is missing or of the wrong kind
	 */
	checkExists(): void {
		const absolute = this.absolute;
		if (typeof absolute !== "string") {
			return;
		}

		const stats = fs.statSync(absolute, { throwIfNoEntry: false });
		if (!stats) {
			throw new ConstraintError(`${absolute} does not exist`, "path_not_found");
		}
		if (this.kind === "file" && !stats.isFile()) {
			throw new ConstraintError(`${absolute} is not a file`, "path_not_file");
		}
		if (this.kind === "directory" && !stats.isDirectory()) {
			throw new ConstraintError(`${absolute} is not a directory`, "path_not_directory");
		}
	}

	/**
	 * Check existence if the context asks for I/O checks.
	 *
	 * @returns This reference
	 */
	validate(context?: ValidationContext): this {
		if (context?.performIoChecks && !isUrlRoot(this.root)) {
			this.checkExists();
		}
		return this;
	}

	/**
	 * Whether two references share relative path and root.
	 */
	equals(other: RelativePath): boolean {
		return this.path === other.path && rootKey(this.root) === rootKey(other.root);
	}

	toString(): string {
		const absolute = this.absolute;
		return typeof absolute === "string" ? absolute : absolute.href;
	}

	toJSON(): string {
		return this.path;
	}
}

/**
 * A path relative to a root that must point to a file.
 */
export class RelativeFilePath extends RelativePath {
	override readonly kind: RelativePathKind = "file";
}

/**
 * A path relative to a root that must point to a directory.
 */
export class RelativeDirectory extends RelativePath {
	override readonly kind: RelativePathKind = "directory";
}

function rootKey(root: Root): string {
	return isUrlRoot(root) ? root.href : path.resolve(root);
}
