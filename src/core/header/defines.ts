// FORMAT THEOREM: ∀m: renderHeaderFile(m, d, t) = banner(m, t) ++ defines(m, d) joined by CRLF
// PURITY: CORE
// INVARIANT: Defines whose value cannot be resolved are omitted, never written empty
// COMPLEXITY: O(n) where n = |licenses| + |defines|

export const HEADER_LINE_SEPARATOR = "\r\n";

export interface LicenseInfo {
	readonly name: string;
	readonly url?: string;
}

export interface OrganizationInfo {
	readonly name: string;
	readonly url?: string;
}

/**
 * Read-only project facts exposed to the installer script.
 */
export interface ProjectMetadata {
	readonly basedir: string;
	readonly buildDirectory: string;
	readonly finalName: string;
	readonly classifier?: string;
	readonly groupId?: string;
	readonly artifactId: string;
	readonly name: string;
	readonly version: string;
	readonly packaging: string;
	readonly url?: string;
	readonly licenses: readonly LicenseInfo[];
	readonly organization?: OrganizationInfo;
}

/** Escapes a value for use inside an NSIS double-quoted string. */
const nsisString = (value: string): string =>
	`"${value.replaceAll('"', '$\\"')}"`;

const define = (name: string, value: string): string =>
	`!define ${name} ${nsisString(value)}`;

const pad = (n: number): string => String(n).padStart(2, "0");

/**
 * Formats a timestamp as `YYYY-MM-DD HH:MM:SS` in local time.
 *
 * @pure true
 */
export function formatTimestamp(date: Date): string {
	const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
	const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
	return `${day} ${time}`;
}

function licenseDefines(licenses: readonly LicenseInfo[]): string[] {
	if (licenses.length === 1) {
		const [only] = licenses;
		if (only === undefined) return [];
		return only.url === undefined
			? [define("PROJECT_LICENSE", only.name)]
			: [
					define("PROJECT_LICENSE", only.name),
					define("PROJECT_LICENSE_URL", only.url),
				];
	}
	return licenses.flatMap((license, index) => {
		const n = index + 1;
		const lines = [define(`PROJECT_LICENSE${n}`, license.name)];
		if (license.url !== undefined) {
			lines.push(define(`PROJECT_LICENSE${n}_URL`, license.url));
		}
		return lines;
	});
}

function organizationDefines(metadata: ProjectMetadata): string[] {
	const org = metadata.organization;
	if (org === undefined) {
		return [
			"; The project organization is missing, add an author or organization to your configuration",
		];
	}
	const nameVersion = `${metadata.name} ${metadata.version}`;
	const lines = [define("PROJECT_ORGANIZATION_NAME", org.name)];
	if (org.url !== undefined) {
		lines.push(define("PROJECT_ORGANIZATION_URL", org.url));
	}
	lines.push(
		define(
			"PROJECT_REG_KEY",
			`SOFTWARE\\${org.name}\\${metadata.name}\\${metadata.version}`,
		),
		define(
			"PROJECT_REG_UNINSTALL_KEY",
			`Software\\Microsoft\\Windows\\CurrentVersion\\Uninstall\\${nameVersion}`,
		),
		define(
			"PROJECT_STARTMENU_FOLDER",
			`$SMPROGRAMS\\${org.name}\\${nameVersion}`,
		),
	);
	return lines;
}

/**
 * Produces the lines of the generated header file.
 *
 * @param metadata - Project facts
 * @param customDefines - Extra defines; names are upper-cased
 * @param generatedAt - Timestamp written into the banner
 *
 * @pure true
 * @complexity O(n)
 */
export function renderHeaderLines(
	metadata: ProjectMetadata,
	customDefines: Readonly<Record<string, string>>,
	generatedAt: Date,
): readonly string[] {
	const lines: string[] = [
		`; Header file with project details for ${metadata.name}`,
		`; Generated from package.json version ${metadata.version} on ${formatTimestamp(generatedAt)}`,
		"",
		define("PROJECT_BASEDIR", metadata.basedir),
		define("PROJECT_BUILD_DIR", metadata.buildDirectory),
		define("PROJECT_FINAL_NAME", metadata.finalName),
	];

	const classifier = metadata.classifier?.trim() ?? "";
	if (classifier.length > 0) {
		lines.push(define("PROJECT_CLASSIFIER", classifier));
	}
	if (metadata.groupId !== undefined) {
		lines.push(define("PROJECT_GROUP_ID", metadata.groupId));
	}
	lines.push(
		define("PROJECT_ARTIFACT_ID", metadata.artifactId),
		define("PROJECT_NAME", metadata.name),
		define("PROJECT_VERSION", metadata.version),
		define("PROJECT_PACKAGING", metadata.packaging),
	);
	if (metadata.url !== undefined && metadata.url.trim().length > 0) {
		lines.push(define("PROJECT_URL", metadata.url));
	}

	lines.push(...licenseDefines(metadata.licenses));
	lines.push(...organizationDefines(metadata));

	for (const [name, value] of Object.entries(customDefines)) {
		lines.push(define(name.toUpperCase(), value));
	}
	return lines;
}

/**
 * Joins header lines into file content (CRLF, trailing separator).
 *
 * @pure true
 */
export const renderHeaderFile = (lines: readonly string[]): string =>
	lines.map((line) => line + HEADER_LINE_SEPARATOR).join("");
