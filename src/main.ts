// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value without terminating the process
// COMPLEXITY: O(1)

import { Effect, Either } from "effect";

import { runCommand } from "./app/run.js";
import { consoleSink } from "./app/runMake.js";
import { describeAppError } from "./core/errors.js";
import type { ExitCode } from "./core/models.js";
import { parseCLIArgs, USAGE } from "./shell/config/index.js";
import { hostPlatform } from "./shell/platform.js";
import { reportError } from "./shell/utils/log.js";

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @param args - Command-line arguments after the script name
 * @param signal - Aborting it stops a running compile
 * @returns ExitCode (0 | 1)
 *
 * @pure false (delegates to app orchestration), but does not call process.exit
 * @invariant ExitCode ∈ {0,1}
 */
export async function main(
	args: readonly string[] = process.argv.slice(2),
	signal?: AbortSignal,
): Promise<ExitCode> {
	const parsed = parseCLIArgs(args);
	if (Either.isLeft(parsed)) {
		reportError(describeAppError(parsed.left));
		console.error(USAGE);
		return 1;
	}
	return Effect.runPromise(
		runCommand(parsed.right, {
			platform: hostPlatform(),
			env: process.env,
			sink: consoleSink,
			...(signal === undefined ? {} : { signal }),
		}),
	);
}
