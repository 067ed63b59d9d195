/**
 * @resource-spec/schema - Versioned resource description schemas, format
 * migration and description loading.
 *
 * This library provides functionality for:
 * - Migration chains bringing older documents to the latest format version
 * - Declarative schemas of every resource type and format series
 * - The format registry resolving declared types and versions
 * - Loading and validating descriptions, from memory or from disk
 */

// Migration exports
export * from "./migration/index.js";

// Schema exports
export * from "./schemas/index.js";

// Registry exports
export * from "./registry/index.js";

// Description exports
export * from "./description/index.js";
