// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, Effect-returning shell operations or typed interfaces
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATION (Programmatic Entry Points)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Compiles an NSIS script.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { consoleSink, hostPlatform, runMake } from "makensis-runner";
 *
 * const exitCode = await Effect.runPromise(
 *   runMake(
 *     { command: "make", projectDir: process.cwd(), settings: { outputFile: "app-setup.exe" } },
 *     { platform: hostPlatform(), env: process.env, sink: consoleSink },
 *   ),
 * );
 * ```
 *
 * @returns ExitCode (0 = installer built, 1 = failure reported)
 */
export { consoleSink, type MakeEnvironment, runMake } from "./app/runMake.js";
export { runGenerateHeader } from "./app/runGenerateHeader.js";
export { runCommand } from "./app/run.js";
export { main } from "./main.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES (Immutable Domain Models)
// ═══════════════════════════════════════════════════════════════════════════════

export type {
	Command,
	CompressionAlgorithm,
	CompressionSpec,
	ExitCode,
	InvocationConfig,
	LineSink,
	Platform,
	PlatformKind,
	ProcessResult,
	ResolvedOutputFile,
} from "./core/models.js";
export type {
	CLIOptions,
	RunnerCommand,
	RunnerSettings,
} from "./core/types/index.js";
export type {
	LicenseInfo,
	OrganizationInfo,
	ProjectMetadata,
} from "./core/header/defines.js";

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS (Tagged, matched by `_tag`)
// ═══════════════════════════════════════════════════════════════════════════════

export {
	type AppError,
	ArtifactError,
	CompilerFailure,
	ConfigError,
	DirectoryCreationError,
	describeAppError,
	ExecutableNotFound,
	HeaderWriteError,
	LaunchError,
	MetadataError,
	ScriptConflict,
} from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE FUNCTIONS (Pure)
// ═══════════════════════════════════════════════════════════════════════════════

export { createPlatform, detectPlatform } from "./core/platform.js";
export { formatArgument } from "./core/format/argument.js";
export { type BuiltCommand, buildCommand, type CommandContext } from "./core/command/builder.js";
export { compressorFlags, isDefaultCompression } from "./core/command/compression.js";
export { clampVerbosity } from "./core/command/verbosity.js";
export { normalizeClassifier, resolveOutputPath } from "./core/output/output-file.js";
export {
	findScriptConflict,
	preflightChecks,
	type ValidatedInvocation,
} from "./core/script/preflight.js";
export { renderHeaderFile, renderHeaderLines } from "./core/header/defines.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL OPERATIONS (Effect-returning)
// ═══════════════════════════════════════════════════════════════════════════════

export { hostPlatform } from "./shell/platform.js";
export { locateExecutable, resolveExecutable } from "./shell/resolve/executable.js";
export { validateScript } from "./shell/script/preflight.js";
export {
	type ChildProcessLike,
	launch,
	type RunningProcess,
	type Spawner,
} from "./shell/process/runner.js";
export { drainOutput } from "./shell/process/output.js";
export { evaluateExit } from "./shell/process/exit.js";
export { type ArtifactRegistry, manifestRegistry } from "./shell/artifacts/registry.js";
