// PURITY: APP
// EFFECT: Effect<ExitCode, never>
// INVARIANT: The header is rewritten from package.json on every run
// COMPLEXITY: O(l + d) where l = licenses, d = custom defines

import { Effect } from "effect";

import { buildDirectoryOf, headerFileOf } from "../core/config/settings.js";
import { type AppError, describeAppError } from "../core/errors.js";
import type { ExitCode } from "../core/models.js";
import type { CLIOptions } from "../core/types/index.js";
import { writeHeaderFile } from "../shell/header/writer.js";
import { readProjectMetadata } from "../shell/project/metadata.js";
import { reportError } from "../shell/utils/log.js";
import { effectiveSettings } from "./settings.js";

/**
 * Writes `project.nsh` with `!define`s describing the project.
 *
 * @param options - Parsed command line
 * @param now - Clock for the banner timestamp
 * @returns Effect<ExitCode, never>
 *
 * @pure false (reads package.json, writes the header)
 * @invariant ExitCode ∈ {0,1}
 */
export function runGenerateHeader(
	options: CLIOptions,
	now: () => Date = () => new Date(),
): Effect.Effect<ExitCode> {
	return Effect.gen(function* () {
		const settings = yield* effectiveSettings(options);
		if (settings.disabled === true) {
			console.log("NSIS generate-header: disabled, not doing anything");
			return 0 as const;
		}

		const metadata = yield* readProjectMetadata(options.projectDir, {
			buildDirectory: buildDirectoryOf(settings, options.projectDir),
			...(settings.classifier === undefined
				? {}
				: { classifier: settings.classifier }),
			...(settings.organization === undefined
				? {}
				: { organization: settings.organization }),
		});
		const headerFile = headerFileOf(settings, options.projectDir);
		yield* writeHeaderFile(headerFile, metadata, settings.defines ?? {}, now());

		console.log(`Generated NSIS header file ${headerFile}`);
		return 0 as const;
	}).pipe(
		Effect.catchAll((error: AppError) =>
			Effect.sync((): ExitCode => {
				reportError(describeAppError(error));
				return 1;
			}),
		),
	);
}
