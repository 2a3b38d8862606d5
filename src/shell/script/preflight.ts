// PURITY: SHELL
// EFFECT: Effect<ValidatedInvocation, ScriptConflict>
// INVARIANT: A script that can't be read is not a conflict; makensis reports it
// COMPLEXITY: O(n·k) where n = script lines, k = |checks|

import * as fs from "node:fs/promises";
import { Effect, Option } from "effect";

import { ScriptConflict, toError } from "../../core/errors.js";
import type { InvocationConfig } from "../../core/models.js";
import {
	findScriptConflict,
	markValidated,
	preflightChecks,
	type ValidatedInvocation,
} from "../../core/script/preflight.js";
import { warn } from "../utils/log.js";

const readScript = (
	scriptFile: string,
): Effect.Effect<Option.Option<string>> =>
	Effect.tryPromise({
		try: () => fs.readFile(scriptFile, "utf8"),
		catch: toError,
	}).pipe(
		Effect.map(Option.some),
		Effect.catchAll((error) => {
			warn(
				`Unable to read "${scriptFile}" for preflight checks: ${error.message}`,
			);
			return Effect.succeed(Option.none<string>());
		}),
	);

/**
 * Checks that the script doesn't already contain directives the runner
 * injects on the command line.
 *
 * @param config - Invocation about to be built
 * @returns The same configuration, branded as validated
 *
 * @pure false (reads the script)
 * @effect Effect<ValidatedInvocation, ScriptConflict>
 */
export function validateScript(
	config: InvocationConfig,
): Effect.Effect<ValidatedInvocation, ScriptConflict> {
	const checks = preflightChecks(config);
	if (checks.length === 0) {
		return Effect.succeed(markValidated(config));
	}
	return Effect.gen(function* () {
		const text = yield* readScript(config.scriptFilePath);
		if (Option.isNone(text)) return markValidated(config);

		const conflict = findScriptConflict(text.value, checks);
		if (Option.isSome(conflict)) {
			return yield* Effect.fail(
				new ScriptConflict({
					file: config.scriptFilePath,
					line: conflict.value.line,
					directive: conflict.value.check.directive,
					setting: conflict.value.check.setting,
				}),
			);
		}
		return markValidated(config);
	});
}
