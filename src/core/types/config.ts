import type { OrganizationInfo } from "../header/defines.js";
import type { CompressionAlgorithm } from "../models.js";

/**
 * Runner settings as they appear in makensis.config.json; every field is
 * optional, defaults are applied when the invocation is built.
 *
 * @property makensisBin Name or path of the compiler binary
 * @property scriptFile NSIS script to compile
 * @property outputFile Installer file to produce (relative to buildDirectory)
 * @property workingDirectory Directory makensis runs in; implies NOCD
 * @property nsisDir Explicit NSISDIR passed to makensis
 * @property autoNsisDir Detect NSISDIR from the binary location
 */
export interface RunnerSettings {
	readonly disabled?: boolean;
	readonly makensisBin?: string;
	readonly scriptFile?: string;
	readonly outputFile?: string;
	readonly classifier?: string;
	readonly buildDirectory?: string;
	readonly workingDirectory?: string;
	readonly verbosity?: number;
	readonly compression?: CompressionAlgorithm;
	readonly compressionIsFinal?: boolean;
	readonly compressionIsSolid?: boolean;
	readonly compressionDictSize?: number;
	readonly environmentVariables?: Readonly<Record<string, string>>;
	readonly injectHeaderFile?: boolean;
	readonly headerFile?: string;
	readonly autoNsisDir?: boolean;
	readonly nsisDir?: string;
	readonly attachArtifact?: boolean;
	readonly outputEncoding?: string;
	readonly defines?: Readonly<Record<string, string>>;
	readonly organization?: OrganizationInfo;
}

export type RunnerCommand = "make" | "generate-header" | "help";

/**
 * Parsed command line.
 *
 * @property command Sub-command to run
 * @property projectDir Directory relative settings are resolved against
 * @property configPath Explicit configuration file, if given
 * @property settings Settings given as flags; they override the file
 */
export interface CLIOptions {
	readonly command: RunnerCommand;
	readonly projectDir: string;
	readonly configPath?: string;
	readonly settings: RunnerSettings;
}
