// FORMAT THEOREM: buildCommand(v, ctx) = [bin] ++ include? ++ outFile? ++ nocd? ++ [V] ++ compressor* ++ [script]
// PURITY: CORE
// INVARIANT: Token order is the wire contract with makensis and never changes
// COMPLEXITY: O(1)

import { formatArgument } from "../format/argument.js";
import type { Command, Platform, ResolvedOutputFile } from "../models.js";
import type { ValidatedInvocation } from "../script/preflight.js";
import { compressorFlags } from "./compression.js";
import { clampVerbosity } from "./verbosity.js";

/**
 * Facts resolved by the shell before the command can be assembled.
 *
 * @property executable Resolved path of the makensis binary
 * @property headerFileExists Whether the header file is present on disk
 * @property outputFile Resolved installer path, if one is configured
 */
export interface CommandContext {
	readonly platform: Platform;
	readonly executable: string;
	readonly headerFileExists: boolean;
	readonly outputFile?: ResolvedOutputFile;
}

/**
 * Assembled command plus the output location recorded for artifact hand-off.
 */
export interface BuiltCommand {
	readonly command: Command;
	readonly outputFile?: ResolvedOutputFile;
}

/**
 * Assembles the makensis argv.
 *
 * @param invocation - Configuration that already passed script preflight
 * @param context - Platform and resolved file-system facts
 * @returns Ordered tokens; the script path is always last and unformatted
 *
 * @pure true
 * @invariant result.command[0] = context.executable
 * @invariant result.command.at(-1) = invocation.scriptFilePath
 * @complexity O(1)
 *
 * @example
 * ```ts
 * buildCommand(validated, { platform: linux, executable: "/usr/bin/makensis", headerFileExists: false });
 * // { command: ["/usr/bin/makensis", "-V2", "setup.nsi"] }
 * ```
 */
export function buildCommand(
	invocation: ValidatedInvocation,
	context: CommandContext,
): BuiltCommand {
	const { platform } = context;
	const prefix = platform.optionPrefix;
	const tokens: string[] = [context.executable];

	if (invocation.injectHeaderFile && context.headerFileExists) {
		tokens.push(
			`${prefix}X!include ${formatArgument(platform, invocation.headerFilePath, false)}`,
		);
	}

	if (context.outputFile !== undefined) {
		tokens.push(
			`${prefix}XOutFile ${formatArgument(platform, context.outputFile.absolutePath, false)}`,
		);
	}

	// makensis would otherwise chdir into the script's directory
	if (invocation.workingFolder !== undefined) {
		tokens.push(`${prefix}NOCD`);
	}

	tokens.push(`${prefix}V${clampVerbosity(invocation.verbosityLevel)}`);
	tokens.push(...compressorFlags(platform, invocation.compression));
	tokens.push(invocation.scriptFilePath);

	return context.outputFile === undefined
		? { command: tokens }
		: { command: tokens, outputFile: context.outputFile };
}
