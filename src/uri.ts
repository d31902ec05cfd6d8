import { ParseError } from "./errors.js";

// Unreserved characters plus `/`; everything else is percent-encoded from its UTF-8 bytes.
const SAFE = /[A-Za-z0-9_.~/-]/;

/**
 * Percent-encodes a path for use in a `file:` URI.
 *
 * @example
 * ```ts
 * quotePath("/tmp/a b#c"); // '/tmp/a%20b%23c'
 * ```
 */
export function quotePath(value: string): string {
	let out = "";
	for (const char of value) {
		if (SAFE.test(char)) {
			out += char;
			continue;
		}
		for (const byte of Buffer.from(char, "utf8")) {
			out += `%${byte.toString(16).toUpperCase().padStart(2, "0")}`;
		}
	}
	return out;
}

/**
 * Builds a `file:` URI from the pieces of an absolute path.
 *
 * @param drive - Drive of the path, empty for POSIX paths.
 * @param posixText - The full path rendered with `/` separators.
 */
export function buildFileURI(drive: string, posixText: string): string {
	if (drive.length === 2 && drive.charAt(1) === ":") {
		return `file:///${drive}${quotePath(posixText.slice(2))}`;
	}
	if (drive) return `file:${quotePath(posixText)}`;
	return `file://${quotePath(posixText)}`;
}

/**
 * Extracts the path text from a `file:` URI.
 *
 * @remarks
 *
 * An empty or `localhost` authority is removed, as is the slash in front of a DOS drive (`/c:/x`) or a UNC
 * authority (`////server/share`). `|` after a drive letter is read as `:`.
 *
 * @throws {@link ParseError} If the URI does not use the `file:` scheme or holds malformed escapes.
 */
export function pathTextFromFileURI(uri: string): string {
	if (!uri.startsWith("file:")) {
		throw new ParseError(`URI does not start with 'file:': ${uri}`, {
			path: uri,
		});
	}
	let text = uri.slice("file:".length);
	if (text.startsWith("///")) {
		text = text.slice(2);
	} else if (text.startsWith("//localhost/")) {
		text = text.slice("//localhost".length);
	}
	if (
		text.startsWith("///") ||
		(text.startsWith("/") && [":", "|"].includes(text.charAt(2)))
	) {
		text = text.slice(1);
	}
	if (text.charAt(1) === "|") {
		text = `${text.charAt(0)}:${text.slice(2)}`;
	}
	try {
		return decodeURIComponent(text);
	} catch (error) {
		throw new ParseError(`URI contains malformed escapes: ${uri}`, {
			path: uri,
			cause: error,
		});
	}
}
