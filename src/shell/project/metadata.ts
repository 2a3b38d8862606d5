// PURITY: SHELL
// EFFECT: Effect<ProjectMetadata, MetadataError>
// INVARIANT: Reads <projectDir>/package.json only
// COMPLEXITY: O(n) where n = |package.json|

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { Effect, Either } from "effect";

import { MetadataError, toError } from "../../core/errors.js";
import type { ProjectMetadata } from "../../core/header/defines.js";
import {
	type MetadataContext,
	metadataFromPackageJson,
} from "../../core/header/package-json.js";

export const PACKAGE_JSON = "package.json";

const parseJson = (raw: string): Either.Either<unknown, string> =>
	Either.try({
		try: (): unknown => JSON.parse(raw),
		catch: (error) => toError(error).message,
	});

/**
 * Reads the project's package.json and derives the header metadata.
 *
 * @pure false (reads a file)
 * @effect Effect<ProjectMetadata, MetadataError>
 */
export function readProjectMetadata(
	projectDir: string,
	context: Omit<MetadataContext, "basedir">,
): Effect.Effect<ProjectMetadata, MetadataError> {
	const file = path.join(projectDir, PACKAGE_JSON);
	return Effect.tryPromise({
		try: () => fs.readFile(file, "utf8"),
		catch: (error) =>
			new MetadataError({ path: file, detail: toError(error).message }),
	}).pipe(
		Effect.flatMap((raw) =>
			Either.flatMap(parseJson(raw), (pkg) =>
				metadataFromPackageJson(pkg, { ...context, basedir: projectDir }),
			).pipe(Either.mapLeft((detail) => new MetadataError({ path: file, detail }))),
		),
	);
}
