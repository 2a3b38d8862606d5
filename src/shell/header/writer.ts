// PURITY: SHELL
// EFFECT: Effect<void, HeaderWriteError>
// INVARIANT: The parent directory is created before writing
// COMPLEXITY: O(n) where n = |content|

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { Effect } from "effect";

import { HeaderWriteError, toError } from "../../core/errors.js";
import {
	type ProjectMetadata,
	renderHeaderFile,
	renderHeaderLines,
} from "../../core/header/defines.js";

/**
 * Renders and writes the NSIS header file.
 *
 * @param headerFile - Absolute path of the file to (over)write
 * @param metadata - Project facts
 * @param defines - Extra defines
 * @param generatedAt - Banner timestamp
 *
 * @pure false
 * @effect Effect<void, HeaderWriteError>
 */
export function writeHeaderFile(
	headerFile: string,
	metadata: ProjectMetadata,
	defines: Readonly<Record<string, string>>,
	generatedAt: Date,
): Effect.Effect<void, HeaderWriteError> {
	const content = renderHeaderFile(
		renderHeaderLines(metadata, defines, generatedAt),
	);
	return Effect.tryPromise({
		try: async () => {
			await fs.mkdir(path.dirname(headerFile), { recursive: true });
			await fs.writeFile(headerFile, content, "utf8");
		},
		catch: (error) =>
			new HeaderWriteError({ path: headerFile, reason: toError(error) }),
	});
}
