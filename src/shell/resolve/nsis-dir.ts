// FORMAT THEOREM: detect(bin) = first { d ∈ candidates(bin) | isDirectory(d/Stubs) }
// PURITY: SHELL
// EFFECT: Effect<Option<string>, never>
// INVARIANT: Detection never runs when NSISDIR is configured or inherited
// COMPLEXITY: O(c) stat calls where c = |candidates| ≤ 4

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { Effect, Option } from "effect";

import type { InvocationConfig, Platform } from "../../core/models.js";
import { debugLog, warn } from "../utils/log.js";
import { type Environment, readEnv } from "./executable.js";

export const NSISDIR_VARIABLE = "NSISDIR";

/**
 * Directories that may hold the NSIS data files (Stubs, Include, Plugins)
 * for a compiler binary, in probe order.
 *
 * @pure true
 *
 * @example
 * ```ts
 * nsisDirCandidates("/usr/bin/makensis", linux);
 * // ["/usr/share/nsis", "/usr/share/nsis", "/usr/local/share/nsis"]
 * ```
 */
export function nsisDirCandidates(
	executablePath: string,
	platform: Platform,
): readonly string[] {
	const binDir = path.dirname(executablePath);
	if (platform.isWindows) {
		return [binDir, path.dirname(binDir)];
	}
	const candidates = [
		path.resolve(binDir, "..", "share", "nsis"),
		"/usr/share/nsis",
		"/usr/local/share/nsis",
	];
	return platform.kind === "macos"
		? [...candidates, "/opt/homebrew/share/nsis"]
		: candidates;
}

const hasStubs = (directory: string): Effect.Effect<boolean> =>
	Effect.promise(() =>
		fs.stat(path.join(directory, "Stubs")).then(
			(stats) => stats.isDirectory(),
			() => false,
		),
	);

/**
 * Finds the NSIS data directory next to the resolved compiler binary.
 *
 * @pure false (file-system reads)
 * @effect Effect<Option<string>, never>
 */
export function detectNsisDir(
	executablePath: string,
	platform: Platform,
): Effect.Effect<Option.Option<string>> {
	return Effect.gen(function* () {
		for (const candidate of nsisDirCandidates(executablePath, platform)) {
			if (yield* hasStubs(candidate)) {
				debugLog(`Detected ${NSISDIR_VARIABLE}: ${candidate}`);
				return Option.some(candidate);
			}
		}
		return Option.none<string>();
	});
}

/**
 * Auto-detects the NSISDIR to inject into the compiler environment.
 *
 * Nothing is detected when detection is off or NSISDIR already has a value:
 * an explicit directory, an environment override or a variable the runner
 * inherited. A miss is logged as a warning.
 *
 * @effect Effect<Option<string>, never>
 */
export function autoDetectNsisDir(
	config: InvocationConfig,
	executablePath: string,
	platform: Platform,
	inherited: Environment,
): Effect.Effect<Option.Option<string>> {
	if (
		config.auxDirOverride !== undefined ||
		!config.autoDetectAuxDir ||
		readEnv(config.environmentOverrides, NSISDIR_VARIABLE, platform) !==
			undefined
	) {
		return Effect.succeed(Option.none());
	}
	const exported = readEnv(inherited, NSISDIR_VARIABLE, platform);
	if (exported !== undefined) {
		return Effect.sync(() => {
			debugLog(`Using inherited ${NSISDIR_VARIABLE}: ${exported}`);
			return Option.none<string>();
		});
	}
	return detectNsisDir(executablePath, platform).pipe(
		Effect.tap((found) =>
			Effect.sync(() => {
				if (Option.isNone(found)) {
					warn(
						`Unable to detect ${NSISDIR_VARIABLE} for ${executablePath}; makensis will use its built-in default`,
					);
				}
			}),
		),
	);
}
