import { PatternError } from "./errors.js";
import type { Flavor } from "./flavor.js";
import type { ParsedParts } from "./parts.js";

/**
 * One segment of a compiled pattern.
 *
 * @remarks
 *
 * `recursive` is the whole-segment `**` wildcard. Segments without wildcard characters compile to
 * `literal` so that the common case is a string comparison rather than a regular expression test.
 */
export type PatternToken =
	| { kind: "recursive" }
	| { kind: "literal"; text: string }
	| { kind: "wildcard"; source: string; regex: RegExp };

export type CompiledPattern = {
	/** Drive and root of the pattern, already passed through {@link CompiledPattern.fold}. */
	anchor: string;
	tokens: PatternToken[];
	caseSensitive: boolean;
	/** Applied to subject text before comparison; the identity when matching is case-sensitive. */
	fold: (value: string) => string;
};

const ANY_CHAR = "[\\s\\S]";

function identity(value: string): string {
	return value;
}

function lowerCase(value: string): string {
	return value.toLowerCase();
}

// Syntax characters only: under the `u` flag any other escape is rejected.
function escapeRegExp(value: string): string {
	return value.replace(/[|\\{}()[\]^$+*?.\/]/g, "\\$&");
}

function escapeClassMember(char: string): string {
	return /[\\\]^-]/.test(char) ? `\\${char}` : char;
}

function hasWildcard(segment: string): boolean {
	return /[*?[]/.test(segment);
}

/**
 * Translates the members of a `[...]` set (without the brackets and without a leading `!`).
 */
function translateCharacterSet(members: readonly string[], negate: boolean): string {
	const items: string[] = [];
	let index = 0;
	while (index < members.length) {
		const char = members[index] ?? "";
		const end = members[index + 2];
		if (members[index + 1] === "-" && end !== undefined) {
			// Reversed ranges such as `z-a` match nothing.
			if ((char.codePointAt(0) ?? 0) <= (end.codePointAt(0) ?? 0)) {
				items.push(`${escapeClassMember(char)}-${escapeClassMember(end)}`);
			}
			index += 3;
			continue;
		}
		items.push(escapeClassMember(char));
		index += 1;
	}
	if (items.length === 0) return negate ? ANY_CHAR : "(?!)";
	return `[${negate ? "^" : ""}${items.join("")}]`;
}

/**
 * Translates one pattern segment (never `**` on its own) into a regular expression source for the `u` flag.
 *
 * @remarks
 *
 * The segment is read by code point, so `?` and set members stand for whole characters.
 *
 * @throws {@link PatternError} When a `[` has no closing `]`.
 */
export function translateSegment(segment: string): string {
	const chars = Array.from(segment);
	let source = "";
	let index = 0;
	while (index < chars.length) {
		const char = chars[index] ?? "";
		if (char === "*") {
			while (chars[index] === "*") index += 1;
			source += `${ANY_CHAR}*`;
			continue;
		}
		if (char === "?") {
			source += ANY_CHAR;
			index += 1;
			continue;
		}
		if (char === "[") {
			let cursor = index + 1;
			const negate = chars[cursor] === "!";
			if (negate) cursor += 1;
			// A `]` straight after the opening bracket is a member, not the terminator.
			const bodyStart = cursor;
			if (chars[cursor] === "]") cursor += 1;
			const close = chars.indexOf("]", cursor);
			if (close === -1) {
				throw new PatternError(
					`Unterminated character set in pattern segment ${JSON.stringify(segment)}`,
					{ path: segment },
				);
			}
			source += translateCharacterSet(chars.slice(bodyStart, close), negate);
			index = close + 1;
			continue;
		}
		source += escapeRegExp(char);
		index += 1;
	}
	return source;
}

function compileToken(segment: string): PatternToken {
	if (segment === "**") return { kind: "recursive" };
	if (!hasWildcard(segment)) return { kind: "literal", text: segment };
	const source = translateSegment(segment);
	return { kind: "wildcard", source, regex: new RegExp(`^${source}$`, "u") };
}

/**
 * Compiles parsed pattern parts into tokens.
 *
 * @remarks
 *
 * Runs of consecutive `**` segments collapse into one, since they match the same sequences. When matching
 * is case-insensitive the pattern is folded before translation and subjects are folded before comparison.
 *
 * @throws {@link PatternError} When the pattern is empty or a segment is malformed.
 */
export function compilePattern(
	flavor: Flavor,
	pattern: ParsedParts,
	caseSensitive: boolean = flavor.caseSensitive,
): CompiledPattern {
	const anchor = pattern.drive + pattern.root;
	if (!anchor && pattern.segments.length === 0) {
		throw new PatternError("Empty pattern");
	}
	// Insensitive matching folds the way equality does for the flavor.
	const fold = caseSensitive
		? identity
		: flavor.caseSensitive
			? lowerCase
			: flavor.foldCase;
	const tokens: PatternToken[] = [];
	for (const segment of pattern.segments) {
		const token = compileToken(fold(segment));
		const previous = tokens[tokens.length - 1];
		if (token.kind === "recursive" && previous?.kind === "recursive") continue;
		tokens.push(token);
	}
	return { anchor: fold(anchor), tokens, caseSensitive, fold };
}

function matchToken(token: PatternToken, segment: string): boolean {
	switch (token.kind) {
		case "recursive":
			return true;
		case "literal":
			return token.text === segment;
		case "wildcard":
			return token.regex.test(segment);
	}
}

/**
 * Matches tokens against the whole of `segments`.
 *
 * @remarks
 *
 * Segments are compared as given; fold them first for case-insensitive patterns.
 * A `recursive` token tries to consume 0, 1, 2, ... segments, bounded by the segments left. Failed
 * `(token, segment)` positions are remembered so that patterns with several `**` stay polynomial.
 */
export function matchTokens(
	tokens: readonly PatternToken[],
	segments: readonly string[],
): boolean {
	const failed = new Set<number>();
	const width = segments.length + 1;

	const visit = (tokenIndex: number, segmentIndex: number): boolean => {
		let ti = tokenIndex;
		let si = segmentIndex;
		while (ti < tokens.length) {
			const token = tokens[ti];
			if (token === undefined) return false;
			if (token.kind === "recursive") {
				if (ti === tokens.length - 1) return true;
				const key = ti * width + si;
				if (failed.has(key)) return false;
				for (let skip = si; skip <= segments.length; skip += 1) {
					if (visit(ti + 1, skip)) return true;
				}
				failed.add(key);
				return false;
			}
			const segment = segments[si];
			if (segment === undefined || !matchToken(token, segment)) {
				return false;
			}
			ti += 1;
			si += 1;
		}
		return si === segments.length;
	};

	return visit(0, 0);
}

/**
 * Evaluates a compiled pattern against a path's anchor and segments.
 *
 * @param full - `true` anchors the pattern at both ends. `false` lets a relative pattern match any trailing
 * run of segments; anchored patterns always match in full.
 */
export function matchCompiled(
	compiled: CompiledPattern,
	anchor: string,
	segments: readonly string[],
	full: boolean,
): boolean {
	const { fold, tokens } = compiled;
	const subject = segments.map(fold);
	if (!full && !compiled.anchor) {
		return matchTokens([{ kind: "recursive" }, ...tokens], subject);
	}
	if (fold(anchor) !== compiled.anchor) return false;
	return matchTokens(tokens, subject);
}
