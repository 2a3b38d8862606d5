// FORMAT THEOREM: ∀c: normalizeClassifier(normalizeClassifier(c)) = normalizeClassifier(c)
// PURITY: CORE
// INVARIANT: The classifier is joined to the base name by exactly one hyphen
// COMPLEXITY: O(n) where n = |path|

import * as path from "node:path";

/**
 * Turns a configured classifier into the suffix inserted before the
 * extension: "" when absent or blank, otherwise exactly one leading "-".
 *
 * @pure true
 *
 * @example
 * ```ts
 * normalizeClassifier("win64"); // "-win64"
 * normalizeClassifier("-win64"); // "-win64"
 * normalizeClassifier("  "); // ""
 * ```
 */
export function normalizeClassifier(classifier: string | undefined): string {
	if (classifier === undefined) return "";
	const bare = classifier.trim().replace(/^-+/u, "");
	return bare.length === 0 ? "" : `-${bare}`;
}

/**
 * Inserts a classifier into a file name before its last extension.
 *
 * @pure true
 *
 * @example
 * ```ts
 * withClassifier("app-setup.exe", "x64"); // "app-setup-x64.exe"
 * withClassifier("installer", "x64"); // "installer-x64"
 * ```
 */
export function withClassifier(
	fileName: string,
	classifier: string | undefined,
): string {
	const suffix = normalizeClassifier(classifier);
	const dot = fileName.lastIndexOf(".");
	if (dot <= 0) return fileName + suffix;
	return fileName.slice(0, dot) + suffix + fileName.slice(dot);
}

/**
 * Resolves the configured output file to an absolute path.
 *
 * @param buildDirectory - Absolute directory relative paths are resolved against
 * @param outputFile - Configured output file (absolute or relative)
 * @param classifier - Optional classifier inserted before the extension
 * @returns Absolute path of the installer makensis will write
 *
 * @pure true (path arithmetic only)
 * @complexity O(n)
 */
export function resolveOutputPath(
	buildDirectory: string,
	outputFile: string,
	classifier: string | undefined,
): string {
	const absolute = path.resolve(buildDirectory, outputFile);
	return path.join(
		path.dirname(absolute),
		withClassifier(path.basename(absolute), classifier),
	);
}
