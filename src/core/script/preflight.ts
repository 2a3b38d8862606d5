// FORMAT THEOREM: findScriptConflict(text, C) = Some(l) ⇔ l = min{ i | ∃c ∈ C: c matches line_i }
// PURITY: CORE
// INVARIANT: Line numbers are 1-indexed; only enabled checks are evaluated
// COMPLEXITY: O(n·k) where n = lines, k = |checks|

import { Brand, Option } from "effect";

import type { InvocationConfig } from "../models.js";

/**
 * A script directive that would clash with a flag the runner injects.
 *
 * @property directive Human-readable directive, e.g. "SetCompressor /FINAL"
 * @property setting Configuration setting that triggers the injection
 * @property pattern Anchored, case-sensitive matcher for a single line
 */
export interface PreflightCheck {
	readonly directive: string;
	readonly setting: string;
	readonly pattern: RegExp;
}

export interface ScriptConflictLocation {
	readonly line: number;
	readonly check: PreflightCheck;
}

export const OUTFILE_CHECK: PreflightCheck = {
	directive: "OutFile",
	setting: "output file",
	pattern: /^\s*OutFile\b/u,
};

export const FINAL_COMPRESSION_CHECK: PreflightCheck = {
	directive: "SetCompressor /FINAL",
	setting: "final compression",
	pattern: /^\s*SetCompressor\b[^;#\r\n]*\s\/FINAL\b/u,
};

/**
 * An invocation whose script passed preflight. Only
 * {@link markValidated} creates one, so the command builder cannot be
 * reached with an unchecked configuration.
 */
export type ValidatedInvocation = InvocationConfig &
	Brand.Brand<"ValidatedInvocation">;

const ValidatedInvocation = Brand.nominal<ValidatedInvocation>();

/**
 * Selects the checks implied by the configuration.
 *
 * @pure true
 * @postcondition OUTFILE_CHECK ∈ result ⇔ config.outputFilePath is set
 * @postcondition FINAL_COMPRESSION_CHECK ∈ result ⇔ config.compression?.isFinal
 */
export function preflightChecks(
	config: InvocationConfig,
): readonly PreflightCheck[] {
	const checks: PreflightCheck[] = [];
	if (config.outputFilePath !== undefined) {
		checks.push(OUTFILE_CHECK);
	}
	if (config.compression?.isFinal === true) {
		checks.push(FINAL_COMPRESSION_CHECK);
	}
	return checks;
}

/**
 * Scans script text for the first line matching any enabled check.
 *
 * @pure true
 * @complexity O(n·k)
 */
export function findScriptConflict(
	text: string,
	checks: readonly PreflightCheck[],
): Option.Option<ScriptConflictLocation> {
	if (checks.length === 0) return Option.none();
	const lines = text.split(/\r\n|\r|\n/u);
	for (const [index, line] of lines.entries()) {
		const check = checks.find((c) => c.pattern.test(line));
		if (check !== undefined) {
			return Option.some({ line: index + 1, check });
		}
	}
	return Option.none();
}

/**
 * Brands a configuration as validated.
 *
 * @pure true
 * @precondition the script passed {@link findScriptConflict} (or could not be read)
 */
export function markValidated(config: InvocationConfig): ValidatedInvocation {
	return ValidatedInvocation(config);
}
