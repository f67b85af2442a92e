const FORBIDDEN_CHARS = /[<>:"/\\|?*]/;
const TRAILING_DOTS_OR_SPACES = /[.\s]+$/;
const MAX_NAME_LENGTH = 200;
const RESERVED_DIR_NAMES = new Set([
	".",
	"..",
	"CON",
	"PRN",
	"AUX",
	"NUL",
	"COM1",
	"LPT1",
]);

const hasControlChars = (value: string) => {
	for (const char of value) {
		const code = char.codePointAt(0);
		if (code !== undefined && (code <= 0x1f || code === 0x7f)) {
			return true;
		}
	}
	return false;
};

/**
 * Component names double as directory names under the components root, so
 * they must be a single, portable path segment.
 */
export const assertSafeComponentName = (
	value: unknown,
	label = "component name",
): string => {
	if (typeof value !== "string" || value.trim().length === 0) {
		throw new Error(`${label} must be a non-empty string.`);
	}
	if (value.length > MAX_NAME_LENGTH) {
		throw new Error(`${label} exceeds maximum length of ${MAX_NAME_LENGTH}.`);
	}
	if (hasControlChars(value)) {
		throw new Error(`${label} must not contain control characters.`);
	}
	if (TRAILING_DOTS_OR_SPACES.test(value)) {
		throw new Error(`${label} must not end with dots or spaces.`);
	}
	if (FORBIDDEN_CHARS.test(value)) {
		throw new Error(
			`${label} '${value}' must not contain path separators or reserved characters.`,
		);
	}
	if (RESERVED_DIR_NAMES.has(value.toUpperCase()) || value === ".git") {
		throw new Error(`${label} uses reserved name '${value}'.`);
	}
	return value;
};
