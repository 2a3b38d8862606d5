// FORMAT THEOREM: resolve(n) = first { c ∈ ext × dir | isFile(c) }, iterating extensions (outer) then directories (inner)
// PURITY: SHELL
// EFFECT: Effect<Option<string>, never>
// INVARIANT: Not found is a value (Option.none), never a failure
// COMPLEXITY: O(e·d) stat calls where e = |extensions|, d = |directories|

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { Effect, Option } from "effect";

import { ExecutableNotFound, toError } from "../../core/errors.js";
import type { Platform } from "../../core/models.js";
import { debugLog, warn } from "../utils/log.js";

export type Environment = Readonly<Record<string, string | undefined>>;

export interface ResolveOptions {
	readonly platform: Platform;
	readonly env: Environment;
	readonly cwd: string;
}

/**
 * Reads an environment variable; Windows variable names are case-insensitive.
 *
 * @pure true
 */
export function readEnv(
	env: Environment,
	name: string,
	platform: Platform,
): string | undefined {
	const exact = env[name];
	if (exact !== undefined || !platform.isWindows) return exact;
	const upper = name.toUpperCase();
	const key = Object.keys(env).find((k) => k.toUpperCase() === upper);
	return key === undefined ? undefined : env[key];
}

/**
 * Splits a search-path value into directories, skipping blank entries and
 * warning about entries that can't denote a directory.
 *
 * @pure false (may log warnings)
 */
export function searchPathDirectories(
	value: string | undefined,
	platform: Platform,
): readonly string[] {
	if (value === undefined) return [];
	const directories: string[] = [];
	for (const entry of value.split(platform.pathDelimiter)) {
		if (entry.trim().length === 0) continue;
		if (entry.includes("\0")) {
			warn(
				`Unable to resolve PATH element "${entry.replaceAll("\0", "\\0")}" to a folder, it will be ignored`,
			);
			continue;
		}
		directories.push(entry);
	}
	return directories;
}

/**
 * True if the final path segment contains a dot.
 *
 * @pure true
 */
export function hasExtension(name: string): boolean {
	const base = name.split(/[\\/]/u).at(-1) ?? name;
	return base.includes(".");
}

/**
 * Extension suffixes to try, in order. On Windows, for names without
 * an extension, every PATHEXT entry comes first and the bare name last.
 * Extensions are lower-cased; Windows file names are case-insensitive.
 *
 * @pure true
 *
 * @example
 * ```ts
 * candidateExtensions("toolX", windows, ".EXE;.BAT"); // [".exe", ".bat", ""]
 * candidateExtensions("toolX", linux, ".EXE"); // [""]
 * ```
 */
export function candidateExtensions(
	name: string,
	platform: Platform,
	pathExt: string | undefined,
): readonly string[] {
	if (!platform.isWindows || hasExtension(name) || pathExt === undefined) {
		return [""];
	}
	const extensions = pathExt
		.split(platform.pathDelimiter)
		.map((e) => e.replaceAll(".", "").trim())
		.filter((e) => e.length > 0)
		.map((e) => `.${e.toLowerCase()}`);
	return [...extensions, ""];
}

const isRegularFile = (candidate: string): Effect.Effect<boolean> =>
	Effect.promise(() =>
		fs.stat(candidate).then(
			(stats) => stats.isFile(),
			() => false,
		),
	);

const canonicalize = (candidate: string): Effect.Effect<string> =>
	Effect.tryPromise({
		try: () => fs.realpath(candidate),
		catch: toError,
	}).pipe(
		Effect.catchAll((error) => {
			warn(`Could not get the real path of "${candidate}": ${error.message}`);
			return Effect.succeed(candidate);
		}),
	);

/**
 * Finds an executable the way a shell would: the working directory first,
 * then every PATH entry, probing PATHEXT extensions on Windows.
 *
 * `cwd` is the directory makensis will run in (the working folder, else the
 * project directory), not the runner's `process.cwd()`. Relative PATH
 * entries resolve against it too, the way the child would see them.
 * Absolute names are only checked for existence.
 *
 * @param name - Executable name, e.g. "makensis"
 * @returns Some(canonical path) of the first regular file found, else None
 *
 * @pure false (file-system reads)
 * @effect Effect<Option<string>, never>
 * @complexity O(e·d)
 */
export function resolveExecutable(
	name: string,
	options: ResolveOptions,
): Effect.Effect<Option.Option<string>> {
	return Effect.gen(function* () {
		if (path.isAbsolute(name)) {
			const exists = yield* isRegularFile(name);
			return exists
				? Option.some(yield* canonicalize(name))
				: Option.none<string>();
		}

		const { platform, env, cwd } = options;
		const directories = [
			cwd,
			...searchPathDirectories(readEnv(env, "PATH", platform), platform),
		];
		const extensions = candidateExtensions(
			name,
			platform,
			readEnv(env, "PATHEXT", platform),
		);

		for (const extension of extensions) {
			for (const directory of directories) {
				const candidate = path.resolve(cwd, directory, name + extension);
				if (yield* isRegularFile(candidate)) {
					debugLog(`Resolved "${candidate}" from "${name}" using OS path`);
					return Option.some(yield* canonicalize(candidate));
				}
			}
		}

		debugLog(`Failed to resolve "${name}" using OS path`);
		return Option.none<string>();
	});
}

/**
 * Resolves the compiler binary or fails.
 *
 * @effect Effect<string, ExecutableNotFound>
 */
export function locateExecutable(
	name: string,
	options: ResolveOptions,
): Effect.Effect<string, ExecutableNotFound> {
	return resolveExecutable(name, options).pipe(
		Effect.flatMap(
			Option.match({
				onNone: () => Effect.fail(new ExecutableNotFound({ executable: name })),
				onSome: (resolved) => Effect.succeed(resolved),
			}),
		),
	);
}
