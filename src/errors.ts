/**
 * Error codes carried by every {@link PathError}.
 */
export type PathErrorCode =
	| "ERR_PATH_PARSE"
	| "ERR_PATH_INVALID_OPERATION"
	| "ERR_PATH_NOT_RELATIVE"
	| "ERR_PATH_FLAVOR_MISMATCH"
	| "ERR_PATH_PATTERN";

type PathErrorFields = {
	path?: unknown;
	other?: unknown;
	cause?: unknown;
};

/**
 * Base class for every error raised by the library.
 *
 * @remarks
 *
 * Mirrors the shape of Node's `ErrnoException`: a stable string `code` plus optional `path` and `other`
 * fields naming the values involved, rendered as strings so they survive serialization. All failures are
 * deterministic functions of the input; none is transient and none is retried.
 */
export class PathError extends Error {
	readonly code: PathErrorCode;
	path?: string;
	other?: string;

	constructor(message: string, code: PathErrorCode, fields?: PathErrorFields) {
		super(
			message,
			fields?.cause === undefined ? undefined : { cause: fields.cause },
		);
		this.name = "PathError";
		this.code = code;
		if (fields?.path !== undefined) this.path = formatField(fields.path);
		if (fields?.other !== undefined) this.other = formatField(fields.other);
	}
}

/**
 * Raised when input cannot be turned into a path: a fragment that is neither a string nor a path value,
 * or a malformed `file:` URI.
 */
export class ParseError extends PathError {
	constructor(message: string, fields?: PathErrorFields) {
		super(message, "ERR_PATH_PARSE", fields);
		this.name = "ParseError";
	}
}

/**
 * Raised when a derivation is not defined for the value, such as renaming a bare anchor.
 */
export class InvalidOperationError extends PathError {
	constructor(message: string, fields?: PathErrorFields) {
		super(message, "ERR_PATH_INVALID_OPERATION", fields);
		this.name = "InvalidOperationError";
	}
}

export class NotRelativeError extends PathError {
	constructor(message: string, fields?: PathErrorFields) {
		super(message, "ERR_PATH_NOT_RELATIVE", fields);
		this.name = "NotRelativeError";
	}
}

/**
 * Raised when an order or a shared anchor is requested between values of different flavors.
 *
 * @remarks
 *
 * Equality never raises this: values of different flavors are simply unequal.
 */
export class FlavorMismatchError extends PathError {
	constructor(message: string, fields?: PathErrorFields) {
		super(message, "ERR_PATH_FLAVOR_MISMATCH", fields);
		this.name = "FlavorMismatchError";
	}
}

export class PatternError extends PathError {
	constructor(message: string, fields?: PathErrorFields) {
		super(message, "ERR_PATH_PATTERN", fields);
		this.name = "PatternError";
	}
}

// Paths render through toString(); fall back to JSON so plain objects do not print as '[object Object]'.
function formatField(value: unknown): string {
	if (typeof value === "string") return value;
	if (value === null || typeof value !== "object") return String(value);
	const rendered = String(value);
	if (rendered !== "[object Object]") return rendered;
	try {
		return JSON.stringify(value);
	} catch {
		return rendered;
	}
}
