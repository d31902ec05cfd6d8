/**
 * Result of a three-way comparison, usable directly as an `Array.prototype.sort` comparator value.
 */
export type Ordering = -1 | 0 | 1;

/**
 * Orders strings by Unicode code point.
 *
 * @remarks
 *
 * Relational operators compare UTF-16 code units, which puts astral characters before U+E000-U+FFFF.
 */
export function compareStrings(left: string, right: string): Ordering {
	if (left === right) return 0;
	let index = 0;
	while (index < left.length && index < right.length) {
		const a = left.codePointAt(index) ?? 0;
		const b = right.codePointAt(index) ?? 0;
		if (a !== b) return a < b ? -1 : 1;
		index += a > 0xffff ? 2 : 1;
	}
	return index >= left.length ? -1 : 1;
}

/**
 * Compares two string sequences element by element.
 *
 * @remarks
 *
 * The first differing element decides; when one sequence is a strict prefix of the other the shorter
 * sequence sorts first. This is what keeps `/a` before `/a/b` and before `/a-b`, which plain string
 * comparison of the joined forms would not.
 *
 * @example
 * ```ts
 * compareSequences(["", "a"], ["", "a", "b"]); // -1
 * compareSequences(["", "a", "b"], ["", "a-b"]); // -1
 * ```
 */
export function compareSequences(
	left: readonly string[],
	right: readonly string[],
): Ordering {
	const max = Math.min(left.length, right.length);
	for (let index = 0; index < max; index += 1) {
		const order = compareStrings(left[index] ?? "", right[index] ?? "");
		if (order !== 0) return order;
	}
	if (left.length === right.length) return 0;
	return left.length < right.length ? -1 : 1;
}

/**
 * Length of the common leading run of two sequences.
 */
export function commonPrefixLength(
	left: readonly string[],
	right: readonly string[],
): number {
	const max = Math.min(left.length, right.length);
	let index = 0;
	while (index < max && left[index] === right[index]) index += 1;
	return index;
}

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

/**
 * 32-bit FNV-1a hash over the UTF-16 code units of `value`, as an unsigned integer.
 */
export function hashString(value: string): number {
	let hash = FNV_OFFSET_BASIS;
	for (let index = 0; index < value.length; index += 1) {
		hash ^= value.charCodeAt(index);
		hash = Math.imul(hash, FNV_PRIME);
	}
	return hash >>> 0;
}
