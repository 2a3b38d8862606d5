// PURITY: APP (no process.exit; console output through shell helpers only)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: preflight → resolve → prepare output → build → launch → drain ∥ evaluate → attach
// COMPLEXITY: O(n) where n = lines of compiler output

import { Duration, Effect, Fiber } from "effect";

import { buildCommand } from "../core/command/builder.js";
import { toInvocationConfig } from "../core/config/settings.js";
import { computeExitCode } from "../core/decision.js";
import { type AppError, describeAppError } from "../core/errors.js";
import { normalizeClassifier } from "../core/output/output-file.js";
import { defaultOutputEncoding } from "../core/platform.js";
import type {
	ExitCode,
	InvocationConfig,
	LineSink,
	Platform,
	ProcessResult,
	ResolvedOutputFile,
} from "../core/models.js";
import type { CLIOptions } from "../core/types/index.js";
import {
	type ArtifactRegistry,
	manifestRegistry,
} from "../shell/artifacts/registry.js";
import { fileExists, prepareOutputFile } from "../shell/output/files.js";
import { evaluateExit } from "../shell/process/exit.js";
import { drainOutput } from "../shell/process/output.js";
import { buildEnvironment, launch, type Spawner } from "../shell/process/runner.js";
import {
	type Environment,
	locateExecutable,
} from "../shell/resolve/executable.js";
import { autoDetectNsisDir } from "../shell/resolve/nsis-dir.js";
import { validateScript } from "../shell/script/preflight.js";
import { debugLog, reportError } from "../shell/utils/log.js";
import { effectiveSettings } from "./settings.js";

/** Longest wait for trailing output once makensis has exited. */
export const DRAIN_TIMEOUT = Duration.seconds(5);

/**
 * Everything the make run takes from the outside world.
 *
 * @property sink Receives every compiler line and the completion message
 * @property signal Aborting it kills makensis
 * @property registry Defaults to `<buildDir>/artifacts.json`
 */
export interface MakeEnvironment {
	readonly platform: Platform;
	readonly env: Environment;
	readonly sink: LineSink;
	readonly spawner?: Spawner;
	readonly signal?: AbortSignal;
	readonly registry?: ArtifactRegistry;
	readonly now?: () => number;
}

/** Prints a compiler line the way the runner reports makensis output. */
export const consoleSink: LineSink = (line) => {
	console.log(`[MAKENSIS] ${line}`);
};

const prepareOutput = (
	config: InvocationConfig,
): Effect.Effect<ResolvedOutputFile | undefined, AppError> =>
	config.outputFilePath === undefined
		? Effect.succeed(undefined)
		: prepareOutputFile(
				config.buildDirectory,
				config.outputFilePath,
				config.classifier,
			);

const joinDrain = (fiber: Fiber.RuntimeFiber<void>): Effect.Effect<void> =>
	Fiber.join(fiber).pipe(
		Effect.timeout(DRAIN_TIMEOUT),
		Effect.catchAll(() => {
			debugLog("makensis output did not end in time, stopping the reader");
			return Fiber.interrupt(fiber);
		}),
		Effect.asVoid,
	);

const attachOutput = (
	config: InvocationConfig,
	outputFile: ResolvedOutputFile | undefined,
	registry: ArtifactRegistry,
): Effect.Effect<void, AppError> => {
	if (!config.attachArtifact) return Effect.void;
	if (outputFile === undefined) {
		debugLog("No output file configured, nothing to attach");
		return Effect.void;
	}
	const classifier = normalizeClassifier(config.classifier).slice(1);
	return registry.attach({
		file: outputFile.absolutePath,
		type: "exe",
		...(classifier.length === 0 ? {} : { classifier }),
	});
};

function compile(
	config: InvocationConfig,
	environment: MakeEnvironment,
): Effect.Effect<ProcessResult, AppError> {
	return Effect.gen(function* () {
		const { platform } = environment;
		const workingDirectory = config.workingFolder ?? config.projectDirectory;

		const validated = yield* validateScript(config);
		const executable = yield* locateExecutable(config.executablePath, {
			platform,
			env: environment.env,
			cwd: workingDirectory,
		});
		const outputFile = yield* prepareOutput(config);
		const headerFileExists = config.injectHeaderFile
			? yield* fileExists(config.headerFilePath)
			: false;

		const { command } = buildCommand(validated, {
			platform,
			executable,
			headerFileExists,
			...(outputFile === undefined ? {} : { outputFile }),
		});

		const nsisDir = yield* autoDetectNsisDir(
			config,
			executable,
			platform,
			environment.env,
		);
		const env = buildEnvironment(environment.env, config, nsisDir, platform);
		debugLog(`Working directory: ${workingDirectory}`);
		debugLog(`Command: ${command.join(" ")}`);
		debugLog(`NSISDIR: ${env["NSISDIR"] ?? "(makensis default)"}`);

		const now = environment.now ?? Date.now;
		const startedAt = now();
		const running = yield* launch(command, {
			platform,
			cwd: workingDirectory,
			env,
			...(environment.spawner === undefined
				? {}
				: { spawner: environment.spawner }),
		});
		const drain = yield* Effect.fork(
			drainOutput(running, environment.sink, {
				encoding: config.outputEncoding ?? defaultOutputEncoding(platform),
			}),
		);

		const result = yield* evaluateExit(running, {
			startedAt,
			sink: environment.sink,
			now,
			...(environment.signal === undefined
				? {}
				: { signal: environment.signal }),
		}).pipe(Effect.ensuring(joinDrain(drain)));

		yield* attachOutput(
			config,
			outputFile,
			environment.registry ?? manifestRegistry(config.buildDirectory),
		);
		return result;
	});
}

/**
 * Compiles the configured NSIS script and returns the runner's exit code.
 *
 * @param options - Parsed command line
 * @param environment - Platform, environment variables and output sink
 * @returns Effect<ExitCode, never>; every AppError is reported and mapped to 1
 *
 * @pure false (file system, child process, console)
 * @invariant ExitCode ∈ {0,1}
 * @postcondition result = 0 → makensis exited with 0
 */
export function runMake(
	options: CLIOptions,
	environment: MakeEnvironment,
): Effect.Effect<ExitCode> {
	return Effect.gen(function* () {
		const settings = yield* effectiveSettings(options);
		if (settings.disabled === true) {
			console.log("NSIS make: disabled, not doing anything");
			return 0 as const;
		}
		const config = toInvocationConfig(settings, options.projectDir);
		const result = yield* compile(config, environment);
		return computeExitCode(result.exitCode);
	}).pipe(
		Effect.catchAll((error: AppError) =>
			Effect.sync((): ExitCode => {
				reportError(describeAppError(error));
				return 1;
			}),
		),
	);
}
