// PURITY: CORE
// INVARIANT: Guards never throw; they only narrow parsed JSON
// COMPLEXITY: O(1) except isStringRecord, which is O(k)

/**
 * Object read from a JSON document.
 */
export type JSONObject = Readonly<Record<string, unknown>>;

/**
 * Type guard to check if value is a JSON object.
 *
 * @param value Value to check
 * @returns True if value is a non-null, non-array object
 */
export function isJSONObject(value: unknown): value is JSONObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

export const isString = (value: unknown): value is string =>
	typeof value === "string";

export const isBoolean = (value: unknown): value is boolean =>
	typeof value === "boolean";

export const isNumber = (value: unknown): value is number =>
	typeof value === "number" && Number.isFinite(value);

export const isArray = (value: unknown): value is readonly unknown[] =>
	Array.isArray(value);

/**
 * Type guard for `{ [key]: string }` maps such as environment overrides.
 *
 * @param value Value to check
 * @returns True if value is an object whose every property is a string
 */
export function isStringRecord(
	value: unknown,
): value is Readonly<Record<string, string>> {
	return isJSONObject(value) && Object.values(value).every(isString);
}

/**
 * Reads an optional string property; blank strings count as absent.
 *
 * @pure true
 */
export function optionalString(
	object: JSONObject,
	key: string,
): string | undefined {
	const value = object[key];
	return isString(value) && value.trim().length > 0 ? value : undefined;
}
