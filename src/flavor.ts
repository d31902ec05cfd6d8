import nodepath from "node:path";
import type { ParsedParts } from "./parts.js";

/**
 * Result of splitting a path string into its drive, root and remaining text.
 */
export type RootSplit = {
	drive: string;
	root: string;
	rest: string;
};

/**
 * Result of {@link Flavor.recognizeDrive}.
 */
export type DriveMatch = {
	/** Length of the drive prefix, `0` when the string has none. */
	length: number;
	/** `true` for UNC shares (`\\server\share`) and device or verbatim prefixes (`\\?\`, `\\.\`). */
	isUncOrVerbatim: boolean;
};

/**
 * Rule set governing separators, drives, roots and case folding for one family of paths.
 *
 * @remarks
 *
 * Only two flavors exist, {@link posixFlavor} and {@link windowsFlavor}. Both are frozen singletons, so
 * flavor identity can be checked with `===` or through {@link Flavor.name}.
 */
export interface Flavor {
	readonly name: "posix" | "windows";
	/** Primary separator used when formatting. */
	readonly sep: string;
	/** Separator accepted on input and rewritten to {@link Flavor.sep}, if the flavor has one. */
	readonly altSep: string | undefined;
	/** Whether comparisons and matching default to case-sensitive behaviour. */
	readonly caseSensitive: boolean;
	isSeparator(char: string): boolean;
	normalizeSeparators(value: string): string;
	foldCase(value: string): string;
	/**
	 * Splits a separator-normalized string into drive, root and the remainder.
	 *
	 * @remarks
	 *
	 * The input must already have passed through {@link Flavor.normalizeSeparators}; the remainder is
	 * returned untouched (repeated separators and dot segments are the parser's job).
	 */
	splitRoot(value: string): RootSplit;
	recognizeDrive(value: string): DriveMatch;
	isAbsolute(parts: ParsedParts): boolean;
	isReserved(parts: ParsedParts): boolean;
}

function splitPosixRoot(value: string): RootSplit {
	if (!value.startsWith("/")) return { drive: "", root: "", rest: value };
	// Exactly two leading slashes are implementation-defined and kept; one or three-plus collapse.
	if (value.charAt(1) !== "/" || value.charAt(2) === "/") {
		return { drive: "", root: "/", rest: value.replace(/^\/+/, "") };
	}
	return { drive: "", root: "//", rest: value.slice(2) };
}

export const posixFlavor: Flavor = Object.freeze<Flavor>({
	name: "posix",
	sep: "/",
	altSep: undefined,
	caseSensitive: true,
	isSeparator: (char: string) => char === "/",
	normalizeSeparators: (value: string) => value,
	foldCase: (value: string) => value,
	splitRoot: splitPosixRoot,
	recognizeDrive: () => ({ length: 0, isUncOrVerbatim: false }),
	isAbsolute: (parts: ParsedParts) => parts.root !== "",
	isReserved: () => false,
});

const UNC_VERBATIM_PREFIX = "\\\\?\\UNC\\";

function splitWindowsRoot(value: string): RootSplit {
	const sep = "\\";
	if (value.startsWith(sep)) {
		if (value.charAt(1) === sep) {
			const start =
				value.slice(0, UNC_VERBATIM_PREFIX.length).toUpperCase() ===
				UNC_VERBATIM_PREFIX
					? UNC_VERBATIM_PREFIX.length
					: 2;
			const index = value.indexOf(sep, start);
			if (index === -1) return { drive: value, root: "", rest: "" };
			const index2 = value.indexOf(sep, index + 1);
			if (index2 === -1) return { drive: value, root: "", rest: "" };
			return {
				drive: value.slice(0, index2),
				root: sep,
				rest: value.slice(index2 + 1),
			};
		}
		return { drive: "", root: sep, rest: value.slice(1) };
	}
	if (value.charAt(1) === ":") {
		const drive = value.slice(0, 2);
		if (value.charAt(2) === sep) {
			return { drive, root: sep, rest: value.slice(3) };
		}
		return { drive, root: "", rest: value.slice(2) };
	}
	return { drive: "", root: "", rest: value };
}

function buildReservedNames(): ReadonlySet<string> {
	const names = new Set(["CON", "PRN", "AUX", "NUL", "CONIN$", "CONOUT$"]);
	for (const digit of "123456789¹²³") {
		names.add(`COM${digit}`);
		names.add(`LPT${digit}`);
	}
	return names;
}

const WINDOWS_RESERVED_NAMES = buildReservedNames();

// Wildcards, pipe, colon (file streams) and ASCII control characters.
const WINDOWS_RESERVED_CHARS = /[*?"<>|:\u0000-\u001f]/;

function isReservedWindowsName(name: string): boolean {
	const last = name.charAt(name.length - 1);
	if (last === "." || last === " ") return name !== "." && name !== "..";
	if (WINDOWS_RESERVED_CHARS.test(name)) return true;
	const [base = ""] = name.split(".", 1);
	return WINDOWS_RESERVED_NAMES.has(base.replace(/ +$/, "").toUpperCase());
}

export const windowsFlavor: Flavor = Object.freeze<Flavor>({
	name: "windows",
	sep: "\\",
	altSep: "/",
	caseSensitive: false,
	isSeparator: (char: string) => char === "\\" || char === "/",
	normalizeSeparators: (value: string) => value.replace(/\//g, "\\"),
	foldCase: (value: string) => value.toLowerCase(),
	splitRoot: splitWindowsRoot,
	recognizeDrive: (value: string): DriveMatch => {
		const { drive } = splitWindowsRoot(value.replace(/\//g, "\\"));
		return { length: drive.length, isUncOrVerbatim: drive.startsWith("\\\\") };
	},
	// A root without a drive (`\Windows`) is still relative to the current drive.
	isAbsolute: (parts: ParsedParts) => parts.drive !== "" && parts.root !== "",
	isReserved: (parts: ParsedParts) => {
		if (parts.drive.startsWith("\\\\")) return false;
		return parts.segments.some(isReservedWindowsName);
	},
});

/**
 * Indicates whether the current runtime reports Windows-style path semantics.
 *
 * @remarks
 *
 * Derived from {@link nodepath.sep} once at module evaluation time.
 */
export const isWindows = nodepath.sep === "\\";

/**
 * Flavor used by {@link PurePath} itself: Windows on Windows hosts, POSIX everywhere else.
 */
export const hostFlavor: Flavor = isWindows ? windowsFlavor : posixFlavor;

export function flavorByName(name: Flavor["name"]): Flavor {
	return name === "windows" ? windowsFlavor : posixFlavor;
}
