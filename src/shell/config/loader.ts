// PURITY: SHELL
// EFFECT: Effect<RunnerSettings, ConfigError>
// INVARIANT: A missing default config file means "no settings"; a missing explicit one is an error
// COMPLEXITY: O(n) where n = |config file|

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { Effect, Either } from "effect";

import { parseSettings, unknownSettingKeys } from "../../core/config/validate.js";
import { ConfigError, toError } from "../../core/errors.js";
import type { RunnerSettings } from "../../core/types/index.js";
import { debugLog, warn } from "../utils/log.js";

export const CONFIG_FILE_NAME = "makensis.config.json";

const readConfigText = (
	configPath: string,
	required: boolean,
): Effect.Effect<string | undefined, ConfigError> =>
	Effect.tryPromise({
		try: () => fs.readFile(configPath, "utf8"),
		catch: toError,
	}).pipe(
		Effect.catchAll((error) => {
			const missing = "code" in error && error.code === "ENOENT";
			if (missing && !required) {
				debugLog(`No ${CONFIG_FILE_NAME} at ${configPath}`);
				return Effect.succeed(undefined);
			}
			return Effect.fail(
				new ConfigError({
					detail: `Unable to read configuration: ${error.message}`,
					path: configPath,
				}),
			);
		}),
	);

/**
 * Parses and validates configuration text.
 *
 * @pure false (warns about unknown keys)
 */
export function parseConfigText(
	text: string,
	configPath: string,
): Either.Either<RunnerSettings, ConfigError> {
	return Either.try({
		try: (): unknown => JSON.parse(text),
		catch: (error) =>
			new ConfigError({
				detail: `Invalid JSON: ${toError(error).message}`,
				path: configPath,
			}),
	}).pipe(
		Either.flatMap((json) => {
			for (const key of unknownSettingKeys(json)) {
				warn(`Unknown setting "${key}" in ${configPath} is ignored`);
			}
			return parseSettings(json).pipe(
				Either.mapLeft(
					(detail) => new ConfigError({ detail, path: configPath }),
				),
			);
		}),
	);
}

/**
 * Loads runner settings from `makensis.config.json`.
 *
 * @param projectDir - Directory searched for the default file
 * @param configPath - Explicit file; it must exist
 *
 * @pure false
 * @effect Effect<RunnerSettings, ConfigError>
 */
export function loadSettings(
	projectDir: string,
	configPath?: string,
): Effect.Effect<RunnerSettings, ConfigError> {
	const file =
		configPath === undefined
			? path.join(projectDir, CONFIG_FILE_NAME)
			: path.resolve(projectDir, configPath);
	return readConfigText(file, configPath !== undefined).pipe(
		Effect.flatMap(
			(text): Effect.Effect<RunnerSettings, ConfigError> =>
				text === undefined ? Effect.succeed({}) : parseConfigText(text, file),
		),
	);
}
