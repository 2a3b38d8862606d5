// FORMAT THEOREM: ∀p: valid(p) ⇒ Right(metadata(p)); ¬valid(p) ⇒ Left(reason)
// PURITY: CORE
// INVARIANT: name and version are mandatory; everything else is optional
// COMPLEXITY: O(l) where l = number of declared licenses

import { Either } from "effect";

import {
	isArray,
	isJSONObject,
	isString,
	type JSONObject,
	optionalString,
} from "../json.js";
import type {
	LicenseInfo,
	OrganizationInfo,
	ProjectMetadata,
} from "./defines.js";

export const NPM_PACKAGING = "npm";

/**
 * Build facts that don't come from package.json.
 */
export interface MetadataContext {
	readonly basedir: string;
	readonly buildDirectory: string;
	readonly classifier?: string;
	readonly organization?: OrganizationInfo;
}

/**
 * Splits a package name into scope and bare name.
 *
 * @pure true
 *
 * @example
 * ```ts
 * splitPackageName("@acme/setup"); // { scope: "acme", name: "setup" }
 * splitPackageName("setup"); // { name: "setup" }
 * ```
 */
export function splitPackageName(packageName: string): {
	readonly scope?: string;
	readonly name: string;
} {
	const scoped = /^@([^/]+)\/(.+)$/u.exec(packageName);
	const scope = scoped?.[1];
	const name = scoped?.[2];
	return scope === undefined || name === undefined
		? { name: packageName }
		: { scope, name };
}

/**
 * Parses the npm "person" shorthand `Name <email> (url)`.
 *
 * @pure true
 */
export function parsePerson(value: string): OrganizationInfo | undefined {
	const match = /^([^<(]*?)\s*(?:<[^>]*>)?\s*(?:\(([^)]*)\))?\s*$/u.exec(
		value.trim(),
	);
	const name = match?.[1]?.trim() ?? "";
	if (name.length === 0) return undefined;
	const url = match?.[2]?.trim();
	return url === undefined || url.length === 0 ? { name } : { name, url };
}

function personOf(value: unknown): OrganizationInfo | undefined {
	if (isString(value)) return parsePerson(value);
	if (!isJSONObject(value)) return undefined;
	const name = optionalString(value, "name");
	if (name === undefined) return undefined;
	const url = optionalString(value, "url");
	return url === undefined ? { name } : { name, url };
}

function licenseOf(value: unknown): LicenseInfo | undefined {
	if (isString(value)) {
		return value.trim().length > 0 ? { name: value } : undefined;
	}
	if (!isJSONObject(value)) return undefined;
	const name = optionalString(value, "type") ?? optionalString(value, "name");
	if (name === undefined) return undefined;
	const url = optionalString(value, "url");
	return url === undefined ? { name } : { name, url };
}

/**
 * Collects licenses from `license` (SPDX string or legacy object) and the
 * deprecated `licenses` array, in that order.
 *
 * @pure true
 */
export function licensesOf(pkg: JSONObject): readonly LicenseInfo[] {
	const legacy = pkg["licenses"];
	const declared = isArray(legacy) ? legacy : [];
	return [pkg["license"], ...declared]
		.map(licenseOf)
		.filter((license): license is LicenseInfo => license !== undefined);
}

/**
 * Maps a parsed package.json to the header metadata.
 *
 * The artifact id is the bare package name, the group id its scope, the
 * display name `productName` when present, and the final name
 * `<artifactId>-<version>`. The configured organization wins over
 * `author`.
 *
 * @param pkg - Parsed package.json
 * @param context - Build facts
 * @returns Metadata, or the reason it can't be derived
 *
 * @pure true
 * @complexity O(l)
 */
export function metadataFromPackageJson(
	pkg: unknown,
	context: MetadataContext,
): Either.Either<ProjectMetadata, string> {
	if (!isJSONObject(pkg)) {
		return Either.left("package.json must contain a JSON object");
	}
	const packageName = optionalString(pkg, "name");
	if (packageName === undefined) {
		return Either.left('"name" is missing');
	}
	const version = optionalString(pkg, "version");
	if (version === undefined) {
		return Either.left('"version" is missing');
	}

	const { scope, name: artifactId } = splitPackageName(packageName);
	const url = optionalString(pkg, "homepage");
	const organization = context.organization ?? personOf(pkg["author"]);

	return Either.right({
		basedir: context.basedir,
		buildDirectory: context.buildDirectory,
		finalName: `${artifactId}-${version}`,
		artifactId,
		name: optionalString(pkg, "productName") ?? artifactId,
		version,
		packaging: NPM_PACKAGING,
		licenses: licensesOf(pkg),
		...(context.classifier === undefined
			? {}
			: { classifier: context.classifier }),
		...(scope === undefined ? {} : { groupId: scope }),
		...(url === undefined ? {} : { url }),
		...(organization === undefined ? {} : { organization }),
	});
}
