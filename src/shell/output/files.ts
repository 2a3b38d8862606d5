// PURITY: SHELL
// EFFECT: Effect<ResolvedOutputFile, DirectoryCreationError>
// INVARIANT: The output directory exists before makensis is launched
// COMPLEXITY: O(1) file-system calls

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { Effect } from "effect";

import { DirectoryCreationError, toError } from "../../core/errors.js";
import type { ResolvedOutputFile } from "../../core/models.js";
import { resolveOutputPath } from "../../core/output/output-file.js";
import { debugLog } from "../utils/log.js";

/**
 * @pure false
 * @effect Effect<boolean, never>
 */
export const fileExists = (file: string): Effect.Effect<boolean> =>
	Effect.promise(() =>
		fs.stat(file).then(
			(stats) => stats.isFile(),
			() => false,
		),
	);

/**
 * Creates a directory and its parents.
 *
 * @effect Effect<void, DirectoryCreationError>
 */
export function ensureDirectory(
	directory: string,
): Effect.Effect<void, DirectoryCreationError> {
	return Effect.tryPromise({
		try: () => fs.mkdir(directory, { recursive: true }),
		catch: (error) =>
			new DirectoryCreationError({ directory, reason: toError(error) }),
	}).pipe(Effect.asVoid);
}

/**
 * Creates the parent directory of a file.
 *
 * @effect Effect<void, DirectoryCreationError>
 */
export const ensureParentDirectory = (
	file: string,
): Effect.Effect<void, DirectoryCreationError> =>
	ensureDirectory(path.dirname(file));

/**
 * Resolves the configured installer path and prepares its directory.
 *
 * @param buildDirectory - Base for relative output paths
 * @param outputFile - Configured output file
 * @param classifier - Optional classifier
 *
 * @pure false (creates directories)
 * @effect Effect<ResolvedOutputFile, DirectoryCreationError>
 * @postcondition result.parentDirectoryEnsuredToExist = true
 */
export function prepareOutputFile(
	buildDirectory: string,
	outputFile: string,
	classifier: string | undefined,
): Effect.Effect<ResolvedOutputFile, DirectoryCreationError> {
	const absolutePath = resolveOutputPath(buildDirectory, outputFile, classifier);
	return ensureParentDirectory(absolutePath).pipe(
		Effect.tap(() => Effect.sync(() => debugLog(`Output file: ${absolutePath}`))),
		Effect.as({ absolutePath, parentDirectoryEnsuredToExist: true }),
	);
}
