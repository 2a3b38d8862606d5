// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code for the runner process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/** Host OS families relevant to locating and invoking makensis. */
export type PlatformKind = "linux" | "macos" | "windows" | "other";

/**
 * Platform facts every prefix/quoting/search decision depends on.
 * Constructed once and passed down explicitly.
 *
 * @remarks
 * - @pure true
 * - @invariant optionPrefix = "/" ⇔ kind = "windows"
 */
export interface Platform {
	readonly kind: PlatformKind;
	readonly isWindows: boolean;
	readonly optionPrefix: "/" | "-";
	readonly pathDelimiter: ";" | ":";
}

export type CompressionAlgorithm = "zlib" | "bzip2" | "lzma";

export interface CompressionSpec {
	readonly algorithm: CompressionAlgorithm;
	readonly isFinal: boolean;
	readonly isSolid: boolean;
	/** Only meaningful for lzma. */
	readonly dictionarySizeKB: number;
}

/**
 * Everything a single makensis invocation needs. Built once from
 * configuration, never mutated afterwards.
 */
export interface InvocationConfig {
	readonly projectDirectory: string;
	readonly executablePath: string;
	readonly scriptFilePath: string;
	readonly outputFilePath?: string;
	readonly classifier?: string;
	readonly buildDirectory: string;
	readonly workingFolder?: string;
	readonly verbosityLevel: number;
	readonly compression?: CompressionSpec;
	readonly injectHeaderFile: boolean;
	readonly headerFilePath: string;
	readonly environmentOverrides: Readonly<Record<string, string>>;
	readonly autoDetectAuxDir: boolean;
	readonly auxDirOverride?: string;
	readonly attachArtifact: boolean;
	readonly outputEncoding?: string;
}

/** Ordered compiler argv; index 0 is the binary, the last token is the script. */
export type Command = readonly string[];

export interface ResolvedOutputFile {
	readonly absolutePath: string;
	readonly parentDirectoryEnsuredToExist: boolean;
}

export interface ProcessResult {
	readonly exitCode: number;
	readonly elapsedMillis: number;
}

/** Receives one line of compiler output at a time. */
export type LineSink = (line: string) => void;
