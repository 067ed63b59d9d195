/**
 * Library-wide constants.
 *
 * @module constants
 */

/** Version stamped into validation summaries. */
export const LIBRARY_VERSION = "0.1.0";

/** Description file names searched in a directory, in order of preference. */
export const DESCRIPTION_FILENAMES = ["bioimageio.yaml", "rdf.yaml", "model.yaml"] as const;
