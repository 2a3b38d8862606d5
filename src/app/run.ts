// PURITY: APP
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Exactly one command runs per invocation
// COMPLEXITY: O(1) dispatch

import { Effect } from "effect";
import { match } from "ts-pattern";

import type { ExitCode } from "../core/models.js";
import type { CLIOptions } from "../core/types/index.js";
import { USAGE } from "../shell/config/index.js";
import { type MakeEnvironment, runMake } from "./runMake.js";
import { runGenerateHeader } from "./runGenerateHeader.js";

/**
 * Runs the command selected on the command line.
 *
 * @pure false
 * @invariant ExitCode ∈ {0,1}
 */
export const runCommand = (
	options: CLIOptions,
	environment: MakeEnvironment,
): Effect.Effect<ExitCode> =>
	match(options.command)
		.with("make", () => runMake(options, environment))
		.with("generate-header", () => runGenerateHeader(options))
		.with("help", () =>
			Effect.sync((): ExitCode => {
				console.log(USAGE);
				return 0;
			}),
		)
		.exhaustive();
