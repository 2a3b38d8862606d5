// FORMAT THEOREM: ∀f, c: mergeSettings(f, c).k = c.k ?? f.k
// PURITY: CORE
// INVARIANT: Relative paths are resolved against the project directory exactly once
// COMPLEXITY: O(k) where k = number of settings

import * as path from "node:path";

import { DEFAULT_LZMA_DICT_SIZE } from "../command/compression.js";
import { DEFAULT_VERBOSITY } from "../command/verbosity.js";
import type { CompressionSpec, InvocationConfig } from "../models.js";
import type { RunnerSettings } from "../types/index.js";

export const DEFAULTS = {
	makensisBin: "makensis",
	scriptFile: "setup.nsi",
	buildDirectory: "dist",
	headerFileName: "project.nsh",
	verbosity: DEFAULT_VERBOSITY,
	compressionDictSize: DEFAULT_LZMA_DICT_SIZE,
} as const;

/**
 * Overlays command-line settings on file settings. Record-valued settings
 * are merged key by key.
 *
 * @pure true
 */
export function mergeSettings(
	fromFile: RunnerSettings,
	fromCli: RunnerSettings,
): RunnerSettings {
	const merged: RunnerSettings = { ...fromFile, ...fromCli };
	const environmentVariables = {
		...fromFile.environmentVariables,
		...fromCli.environmentVariables,
	};
	const defines = { ...fromFile.defines, ...fromCli.defines };
	return { ...merged, environmentVariables, defines };
}

/**
 * A compression spec exists when any compression setting is present.
 *
 * @pure true
 */
export function compressionOf(
	settings: RunnerSettings,
): CompressionSpec | undefined {
	const configured =
		settings.compression !== undefined ||
		settings.compressionIsFinal === true ||
		settings.compressionIsSolid === true;
	if (!configured) return undefined;
	return {
		algorithm: settings.compression ?? "zlib",
		isFinal: settings.compressionIsFinal ?? false,
		isSolid: settings.compressionIsSolid ?? false,
		dictionarySizeKB:
			settings.compressionDictSize ?? DEFAULTS.compressionDictSize,
	};
}

const resolveIn = (base: string, value: string | undefined): string | undefined =>
	value === undefined ? undefined : path.resolve(base, value);

/**
 * Resolves the build directory (default `dist`) against the project.
 *
 * @pure true
 */
export const buildDirectoryOf = (
	settings: RunnerSettings,
	projectDir: string,
): string =>
	path.resolve(projectDir, settings.buildDirectory ?? DEFAULTS.buildDirectory);

/**
 * Resolves the header file path (default `<buildDir>/project.nsh`).
 *
 * @pure true
 */
export const headerFileOf = (
	settings: RunnerSettings,
	projectDir: string,
): string =>
	settings.headerFile === undefined
		? path.join(
				buildDirectoryOf(settings, projectDir),
				DEFAULTS.headerFileName,
			)
		: path.resolve(projectDir, settings.headerFile);

/**
 * Builds the immutable invocation configuration.
 *
 * `makensisBin` is kept as given: bare names are looked up on the search
 * path later, only names containing a directory part are resolved here.
 *
 * @pure true
 * @postcondition all file-system fields except executablePath are absolute
 * @complexity O(k)
 */
export function toInvocationConfig(
	settings: RunnerSettings,
	projectDir: string,
): InvocationConfig {
	const root = path.resolve(projectDir);
	const bin = settings.makensisBin ?? DEFAULTS.makensisBin;
	const executablePath =
		path.isAbsolute(bin) || !/[\\/]/u.test(bin) ? bin : path.resolve(root, bin);
	const buildDirectory = buildDirectoryOf(settings, root);

	const compression = compressionOf(settings);
	const workingFolder = resolveIn(root, settings.workingDirectory);
	const auxDirOverride = resolveIn(root, settings.nsisDir);

	return {
		projectDirectory: root,
		executablePath,
		scriptFilePath: path.resolve(
			root,
			settings.scriptFile ?? DEFAULTS.scriptFile,
		),
		buildDirectory,
		verbosityLevel: settings.verbosity ?? DEFAULTS.verbosity,
		injectHeaderFile: settings.injectHeaderFile ?? true,
		headerFilePath: headerFileOf(settings, root),
		environmentOverrides: settings.environmentVariables ?? {},
		autoDetectAuxDir: settings.autoNsisDir ?? true,
		attachArtifact: settings.attachArtifact ?? true,
		// exactOptionalPropertyTypes: absent settings stay absent
		...(settings.outputFile === undefined
			? {}
			: { outputFilePath: settings.outputFile }),
		...(settings.classifier === undefined
			? {}
			: { classifier: settings.classifier }),
		...(workingFolder === undefined ? {} : { workingFolder }),
		...(compression === undefined ? {} : { compression }),
		...(auxDirOverride === undefined ? {} : { auxDirOverride }),
		...(settings.outputEncoding === undefined
			? {}
			: { outputEncoding: settings.outputEncoding }),
	};
}
