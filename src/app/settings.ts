// PURITY: APP
// EFFECT: Effect<RunnerSettings, ConfigError>
// INVARIANT: Command-line settings always win over the configuration file
// COMPLEXITY: O(k) where k = number of settings

import { Effect } from "effect";

import { mergeSettings } from "../core/config/settings.js";
import type { ConfigError } from "../core/errors.js";
import type { CLIOptions, RunnerSettings } from "../core/types/index.js";
import { loadSettings } from "../shell/config/index.js";

/**
 * Loads the configuration file and overlays the command-line settings.
 *
 * @effect Effect<RunnerSettings, ConfigError>
 */
export const effectiveSettings = (
	options: CLIOptions,
): Effect.Effect<RunnerSettings, ConfigError> =>
	loadSettings(options.projectDir, options.configPath).pipe(
		Effect.map((fromFile) => mergeSettings(fromFile, options.settings)),
	);
