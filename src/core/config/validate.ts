// FORMAT THEOREM: parseSettings(j) = Right(s) ⇔ every known key of j has the expected JSON type
// PURITY: CORE
// INVARIANT: The first invalid field decides the error; unknown keys are reported, not rejected
// COMPLEXITY: O(k) where k = number of keys

import { Either } from "effect";

import { isCompressionAlgorithm } from "../command/compression.js";
import {
	isBoolean,
	isJSONObject,
	isNumber,
	isString,
	isStringRecord,
	type JSONObject,
	optionalString,
} from "../json.js";
import type { RunnerSettings } from "../types/index.js";

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

const BOOLEAN_KEYS = [
	"disabled",
	"compressionIsFinal",
	"compressionIsSolid",
	"injectHeaderFile",
	"autoNsisDir",
	"attachArtifact",
] as const satisfies ReadonlyArray<keyof RunnerSettings>;

const STRING_KEYS = [
	"makensisBin",
	"scriptFile",
	"outputFile",
	"classifier",
	"buildDirectory",
	"workingDirectory",
	"headerFile",
	"nsisDir",
	"outputEncoding",
] as const satisfies ReadonlyArray<keyof RunnerSettings>;

const RECORD_KEYS = ["environmentVariables", "defines"] as const satisfies ReadonlyArray<
	keyof RunnerSettings
>;

const KNOWN_KEYS: ReadonlySet<string> = new Set([
	"$schema",
	...BOOLEAN_KEYS,
	...STRING_KEYS,
	...RECORD_KEYS,
	"verbosity",
	"compression",
	"compressionDictSize",
	"organization",
]);

/**
 * Keys of a configuration object the runner doesn't know.
 *
 * @pure true
 */
export function unknownSettingKeys(json: unknown): readonly string[] {
	return isJSONObject(json)
		? Object.keys(json).filter((key) => !KNOWN_KEYS.has(key))
		: [];
}

function parseScalars(
	json: JSONObject,
	settings: Mutable<RunnerSettings>,
): string | undefined {
	for (const key of BOOLEAN_KEYS) {
		const value = json[key];
		if (value === undefined) continue;
		if (!isBoolean(value)) return `"${key}" must be true or false`;
		settings[key] = value;
	}
	for (const key of STRING_KEYS) {
		const value = json[key];
		if (value === undefined) continue;
		if (!isString(value)) return `"${key}" must be a string`;
		settings[key] = value;
	}
	for (const key of RECORD_KEYS) {
		const value = json[key];
		if (value === undefined) continue;
		if (!isStringRecord(value)) {
			return `"${key}" must be an object with string values`;
		}
		settings[key] = value;
	}
	return undefined;
}

function parseCompound(
	json: JSONObject,
	settings: Mutable<RunnerSettings>,
): string | undefined {
	const { verbosity, compression, compressionDictSize, organization } = json;
	if (verbosity !== undefined) {
		if (!isNumber(verbosity)) return '"verbosity" must be a number';
		settings.verbosity = verbosity;
	}
	if (compression !== undefined) {
		const algorithm = isString(compression) ? compression.toLowerCase() : "";
		if (!isCompressionAlgorithm(algorithm)) {
			return '"compression" must be one of zlib, bzip2, lzma';
		}
		settings.compression = algorithm;
	}
	if (compressionDictSize !== undefined) {
		if (
			!isNumber(compressionDictSize) ||
			!Number.isInteger(compressionDictSize) ||
			compressionDictSize <= 0
		) {
			return '"compressionDictSize" must be a positive integer (KB)';
		}
		settings.compressionDictSize = compressionDictSize;
	}
	if (organization !== undefined) {
		const name = isJSONObject(organization)
			? optionalString(organization, "name")
			: undefined;
		if (!isJSONObject(organization) || name === undefined) {
			return '"organization" must be an object with a "name"';
		}
		const url = optionalString(organization, "url");
		settings.organization = url === undefined ? { name } : { name, url };
	}
	return undefined;
}

/**
 * Validates a parsed makensis.config.json.
 *
 * @param json - Parsed JSON document
 * @returns Settings, or a message naming the first invalid field
 *
 * @pure true
 * @complexity O(k)
 */
export function parseSettings(
	json: unknown,
): Either.Either<RunnerSettings, string> {
	if (!isJSONObject(json)) {
		return Either.left("The configuration must be a JSON object");
	}
	const settings: Mutable<RunnerSettings> = {};
	const problem = parseScalars(json, settings) ?? parseCompound(json, settings);
	return problem === undefined ? Either.right(settings) : Either.left(problem);
}
