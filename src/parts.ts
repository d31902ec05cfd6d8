import type { Flavor } from "./flavor.js";

/**
 * Structured form of a path: drive, root and the ordered segments after the anchor.
 *
 * @remarks
 *
 * Segments never contain separators, never equal `.` and are never empty. `..` is kept as written:
 * collapsing it lexically would change the meaning of paths that traverse symlinks.
 */
export type ParsedParts = {
	readonly drive: string;
	readonly root: string;
	readonly segments: readonly string[];
};

export const EMPTY_PARTS: ParsedParts = Object.freeze({
	drive: "",
	root: "",
	segments: Object.freeze([]),
});

function isSimpleName(flavor: Flavor, value: string): boolean {
	if (value === "." || value === "..") return false;
	if (value.includes(flavor.sep)) return false;
	if (flavor.altSep !== undefined) {
		return !value.includes(flavor.altSep) && !value.includes(":");
	}
	return true;
}

function splitSegments(flavor: Flavor, rest: string): string[] {
	return rest
		.split(flavor.sep)
		.filter((segment) => segment.length > 0 && segment !== ".");
}

/**
 * Parses a single fragment without any join context.
 */
export function parseFragment(flavor: Flavor, value: string): ParsedParts {
	if (!value) return EMPTY_PARTS;
	if (isSimpleName(flavor, value)) {
		return { drive: "", root: "", segments: [value] };
	}
	const normalized = flavor.normalizeSeparators(value);
	const { drive, root, rest } = flavor.splitRoot(normalized);
	return { drive, root, segments: splitSegments(flavor, rest) };
}

function joinParts(
	flavor: Flavor,
	acc: ParsedParts,
	next: ParsedParts,
): ParsedParts {
	if (next.root) {
		// A rooted fragment without its own drive stays on the accumulated drive.
		return {
			drive: next.drive || acc.drive,
			root: next.root,
			segments: next.segments,
		};
	}
	if (next.drive && next.drive !== acc.drive) {
		if (flavor.foldCase(next.drive) !== flavor.foldCase(acc.drive)) {
			return next;
		}
		return {
			drive: next.drive,
			root: acc.root,
			segments: [...acc.segments, ...next.segments],
		};
	}
	if (next.segments.length === 0) return acc;
	return {
		drive: acc.drive,
		root: acc.root,
		segments: [...acc.segments, ...next.segments],
	};
}

function finalizeDrive(flavor: Flavor, parts: ParsedParts): ParsedParts {
	const { drive, root, segments } = parts;
	const sep = flavor.sep;
	if (root || !drive.startsWith(sep)) return parts;
	if (segments.length > 0) {
		// Text after an incomplete UNC drive may complete it (`\\server` + `share`).
		const glue = drive.endsWith(sep) ? "" : sep;
		return reparse(flavor, drive + glue + segments.join(sep));
	}
	if (drive.endsWith(sep)) return parts;
	const driveParts = drive.split(sep);
	const server = driveParts[2] ?? "";
	if (
		(driveParts.length === 4 && !["", "?", ".", "?."].includes(server)) ||
		driveParts.length === 6
	) {
		return { drive, root: sep, segments };
	}
	return parts;
}

function reparse(flavor: Flavor, joined: string): ParsedParts {
	const { drive, root, rest } = flavor.splitRoot(joined);
	return finalizeDrive(flavor, {
		drive,
		root,
		segments: splitSegments(flavor, rest),
	});
}

/**
 * Parses an ordered list of fragments into a single {@link ParsedParts} value.
 *
 * @remarks
 *
 * Fragments are folded left to right. A fragment with a root replaces everything accumulated so far
 * except, on Windows, a drive it does not name itself; a fragment naming a different drive replaces
 * everything. Otherwise segments are appended. Passing `seed` starts the fold from parts that are already
 * known, which is how derived paths avoid re-parsing their origin.
 *
 * @param flavor - Rule set used to recognise separators, drives and roots.
 * @param fragments - Raw strings, or parts that were parsed earlier under the same flavor.
 * @param seed - Optional starting accumulator.
 */
export function parsePath(
	flavor: Flavor,
	fragments: Iterable<string | ParsedParts>,
	seed: ParsedParts = EMPTY_PARTS,
): ParsedParts {
	let acc = seed;
	for (const fragment of fragments) {
		const next =
			typeof fragment === "string" ? parseFragment(flavor, fragment) : fragment;
		if (next === EMPTY_PARTS) continue;
		acc = joinParts(flavor, acc, next);
	}
	return finalizeDrive(flavor, acc);
}

/**
 * Renders parts back into the canonical string for the flavor.
 *
 * @remarks
 *
 * Relative parts whose first segment would be read back as a drive (`c:foo` on Windows) are prefixed with
 * `.` and a separator so that {@link parsePath} returns the same parts. The empty string is returned for
 * empty relative parts; path values substitute `"."` for it.
 */
export function formatParsedParts(flavor: Flavor, parts: ParsedParts): string {
	const { drive, root, segments } = parts;
	const sep = flavor.sep;
	if (drive || root) return drive + root + segments.join(sep);
	const [first] = segments;
	if (first !== undefined && flavor.recognizeDrive(first).length > 0) {
		return `.${sep}${segments.join(sep)}`;
	}
	return segments.join(sep);
}

export function sameParts(left: ParsedParts, right: ParsedParts): boolean {
	if (left.drive !== right.drive || left.root !== right.root) return false;
	if (left.segments.length !== right.segments.length) return false;
	return left.segments.every(
		(segment, index) => segment === right.segments[index],
	);
}
