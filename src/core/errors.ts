// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";
import { match } from "ts-pattern";

/**
 * Invalid or unreadable runner configuration.
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
	readonly detail: string;
	readonly path?: string;
}> {}

/**
 * The script already contains a directive the runner is about to inject
 * on the command line.
 *
 * @pure true (Data class)
 * @invariant line ≥ 1
 */
export class ScriptConflict extends Data.TaggedError("ScriptConflict")<{
	readonly file: string;
	readonly line: number;
	readonly directive: string;
	readonly setting: string;
}> {}

/**
 * The compiler binary could not be found.
 *
 * @pure true (Data class)
 */
export class ExecutableNotFound extends Data.TaggedError("ExecutableNotFound")<{
	readonly executable: string;
}> {}

/**
 * A directory required before launch could not be created.
 *
 * @pure true (Data class)
 */
export class DirectoryCreationError extends Data.TaggedError(
	"DirectoryCreationError",
)<{
	readonly directory: string;
	readonly reason: Error;
}> {}

/**
 * The OS refused to start the child process.
 *
 * @pure true (Data class)
 */
export class LaunchError extends Data.TaggedError("LaunchError")<{
	readonly executable: string;
	readonly reason: Error;
}> {}

/**
 * The compiler ran but did not exit with 0.
 *
 * @pure true (Data class)
 * @invariant exitCode ≠ 0
 */
export class CompilerFailure extends Data.TaggedError("CompilerFailure")<{
	readonly exitCode: number;
}> {}

/**
 * The header file could not be written.
 *
 * @pure true (Data class)
 */
export class HeaderWriteError extends Data.TaggedError("HeaderWriteError")<{
	readonly path: string;
	readonly reason: Error;
}> {}

/**
 * Project metadata (package.json) could not be read.
 *
 * @pure true (Data class)
 */
export class MetadataError extends Data.TaggedError("MetadataError")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * The produced file could not be registered as a build artifact.
 *
 * @pure true (Data class)
 */
export class ArtifactError extends Data.TaggedError("ArtifactError")<{
	readonly file: string;
	readonly reason: Error;
}> {}

/**
 * Union type of all application errors for Effect signatures
 *
 * @pure true
 * @invariant All errors extend Data.TaggedError
 */
export type AppError =
	| ConfigError
	| ScriptConflict
	| ExecutableNotFound
	| DirectoryCreationError
	| LaunchError
	| CompilerFailure
	| HeaderWriteError
	| MetadataError
	| ArtifactError;

/**
 * Renders a user-facing, single-line description of an application error.
 *
 * @pure true
 * @invariant exhaustive over AppError["_tag"]
 * @complexity O(1)
 */
export const describeAppError = (error: AppError): string =>
	match(error)
		.with({ _tag: "ConfigError" }, (e) =>
			e.path === undefined ? e.detail : `${e.detail} (${e.path})`,
		)
		.with(
			{ _tag: "ScriptConflict" },
			(e) =>
				`${e.file}:${e.line} contains "${e.directive}", which conflicts with the configured ${e.setting}. Remove it from the script or from the configuration.`,
		)
		.with(
			{ _tag: "ExecutableNotFound" },
			(e) =>
				`Unable to find the NSIS compiler "${e.executable}". Install NSIS or set "makensisBin" to the full path of makensis.`,
		)
		.with(
			{ _tag: "DirectoryCreationError" },
			(e) => `Can't create directory ${e.directory}: ${e.reason.message}`,
		)
		.with(
			{ _tag: "LaunchError" },
			(e) => `Unable to execute ${e.executable}: ${e.reason.message}`,
		)
		.with(
			{ _tag: "CompilerFailure" },
			(e) =>
				`Execution of makensis failed with exit code ${e.exitCode}. See the output above for details.`,
		)
		.with(
			{ _tag: "HeaderWriteError" },
			(e) =>
				`An error occurred while writing header file "${e.path}": ${e.reason.message}`,
		)
		.with(
			{ _tag: "MetadataError" },
			(e) => `Unable to read project metadata from ${e.path}: ${e.detail}`,
		)
		.with(
			{ _tag: "ArtifactError" },
			(e) => `Unable to attach artifact ${e.file}: ${e.reason.message}`,
		)
		.exhaustive();

/**
 * Normalizes a thrown value into an Error.
 *
 * @pure true
 */
export function toError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value));
}
