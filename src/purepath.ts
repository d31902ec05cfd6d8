import {
	FlavorMismatchError,
	InvalidOperationError,
	NotRelativeError,
	ParseError,
} from "./errors.js";
import { type Flavor, hostFlavor, posixFlavor, windowsFlavor } from "./flavor.js";
import { compilePattern, matchCompiled } from "./glob.js";
import { formatParsedParts, type ParsedParts, parsePath } from "./parts.js";
import { buildFileURI, pathTextFromFileURI } from "./uri.js";
import {
	commonPrefixLength,
	compareSequences,
	hashString,
	type Ordering,
} from "./util.js";

/**
 * Union of inputs accepted by path constructors and helpers.
 *
 * @remarks
 *
 * A {@link PurePath} of the same flavor is reused without re-parsing. One of the other flavor contributes its
 * `/`-separated text, so `PureWindowsPath` accepts a `PurePosixPath` and vice versa.
 */
export type PathLike = string | PurePath;

export type MatchOptions = {
	/** Overrides the flavor's default (POSIX: sensitive, Windows: insensitive). */
	caseSensitive?: boolean;
};

export type RelativeToOptions = {
	/** Allow `..` segments to climb out of `other` towards a common ancestor. */
	walkUp?: boolean;
};

function toFragment(flavor: Flavor, source: PathLike): string | ParsedParts {
	if (typeof source === "string") return source;
	if (source.flavor.name === flavor.name) return source.toParsedParts();
	return source.asPosix();
}

function toRawFragment(flavor: Flavor, source: PathLike): string {
	if (typeof source === "string") return source;
	if (source.flavor.name === flavor.name) return source.toString();
	return source.asPosix();
}

function splitSuffix(name: string): [stem: string, suffix: string] {
	if (name === "..") return [name, ""];
	const index = name.lastIndexOf(".");
	// A leading dot names a hidden file, it does not start a suffix.
	if (index <= 0) return [name, ""];
	return [name.slice(0, index), name.slice(index)];
}

/**
 * Lazy, indexable view over the lexical ancestors of a path.
 *
 * @remarks
 *
 * Index `0` is the immediate parent and the last index is the anchor (or `.` for relative paths), so
 * `length` always equals the number of segments after the anchor. Ancestors are built on demand from the
 * origin's parsed parts; iterating twice yields equal sequences.
 *
 * @example
 * ```ts
 * const parents = new PurePosixPath("/usr/local/bin").parents;
 * parents.length; // 3
 * parents.at(0)?.toString(); // '/usr/local'
 * parents.at(-1)?.toString(); // '/'
 * ```
 */
export class PathParents<T extends PurePath = PurePath> implements Iterable<T> {
	private readonly origin: T;
	readonly length: number;

	constructor(origin: T) {
		this.origin = origin;
		this.length = origin.toParsedParts().segments.length;
	}

	/**
	 * Returns the ancestor at `index`, counting from the end when negative, or `undefined` when out of range.
	 */
	at(index: number): T | undefined {
		const position = index < 0 ? this.length + index : index;
		if (!Number.isInteger(position) || position < 0 || position >= this.length) {
			return undefined;
		}
		return this.origin.dropSegments(position + 1);
	}

	*[Symbol.iterator](): Iterator<T> {
		for (let index = 0; index < this.length; index += 1) {
			const ancestor = this.at(index);
			if (ancestor !== undefined) yield ancestor;
		}
	}
}

/**
 * Immutable path value that never performs I/O.
 *
 * @remarks
 *
 * A path is built from one or more fragments under a {@link Flavor}. Separators are normalised for the
 * flavor, drives and roots are recognised, `.` segments and repeated separators are dropped, and `..` is
 * kept as written. Every derived representation (parsed parts, string form, case-folded form, hash) is
 * computed on first use and cached; derived paths are seeded with parts that are already known.
 *
 * `PurePath` itself uses the host flavor. Use {@link PurePosixPath} and {@link PureWindowsPath} to work
 * with a specific flavor on any platform.
 *
 * @example Building and inspecting a path
 * ```ts
 * import { PurePosixPath } from "lexpath";
 *
 * const project = new PurePosixPath("/srv/app");
 * const config = project.joinpath("config", "settings.toml");
 *
 * console.log(config.toString()); // '/srv/app/config/settings.toml'
 * console.log(config.suffix); // '.toml'
 * console.log(config.relativeTo(project).toString()); // 'config/settings.toml'
 * ```
 */
export class PurePath {
	static flavor: Flavor = hostFlavor;

	protected sources: PathLike[];
	protected partsCache?: ParsedParts;
	protected strCache?: string;
	protected normCaseCache?: string;
	protected normPartsCache?: readonly string[];
	protected hashCache?: number;

	/**
	 * @param segments - Fragments joined left to right. A fragment with a root discards what came before it
	 * (on Windows it keeps an earlier drive unless it names its own).
	 * @throws {@link ParseError} If a fragment is neither a string nor a path (possible from untyped callers).
	 */
	constructor(...segments: PathLike[]) {
		for (const segment of segments) {
			if (typeof segment !== "string" && !(segment instanceof PurePath)) {
				throw new ParseError(
					`argument should be a string or a path, not ${typeof segment}`,
					{ path: segment },
				);
			}
		}
		this.sources = segments;
	}

	/**
	 * The flavor of this path's class.
	 */
	get flavor(): Flavor {
		return (this.constructor as typeof PurePath).flavor;
	}

	/**
	 * Returns the drive, root and segments of the path, parsing the raw fragments on first access.
	 */
	toParsedParts(): ParsedParts {
		if (this.partsCache === undefined) {
			const flavor = this.flavor;
			this.partsCache = parsePath(
				flavor,
				this.sources.map((source) => toFragment(flavor, source)),
			);
		}
		return this.partsCache;
	}

	/**
	 * The fragments this path was constructed from, unjoined.
	 *
	 * @remarks
	 *
	 * Passing them back to the same constructor (or to {@link construct}) rebuilds an equal path, which is what
	 * serialization adapters rely on. Paths derived from another path report that path's string form followed
	 * by the extra fragments.
	 */
	rawFragments(): string[] {
		const flavor = this.flavor;
		return this.sources.map((source) => toRawFragment(flavor, source));
	}

	/**
	 * Builds a path instance of the same type from the given fragments.
	 *
	 * @remarks
	 *
	 * Every derivation goes through this method (directly or through {@link PurePath.fromParsedParts}). Override
	 * it in subclasses that need to carry extra state onto derived paths.
	 */
	withSegments<T extends PurePath>(this: T, ...segments: PathLike[]): T {
		const ctor = this.constructor as new (...args: PathLike[]) => T;
		return new ctor(...segments);
	}

	protected fromParsedParts<T extends PurePath>(this: T, parts: ParsedParts): T {
		const formatted = formatParsedParts(this.flavor, parts) || ".";
		const instance = this.withSegments(formatted);
		const seeded: PurePath = instance;
		seeded.partsCache = parts;
		seeded.strCache = formatted;
		return instance;
	}

	/**
	 * Removes trailing segments while preserving the anchor.
	 *
	 * @param drop - Number of segments to discard. Values larger than the segment count clamp at the anchor.
	 */
	dropSegments<T extends PurePath>(this: T, drop: number): T {
		const { drive, root, segments } = this.toParsedParts();
		return this.fromParsedParts({
			drive,
			root,
			segments: segments.slice(0, Math.max(0, segments.length - drop)),
		});
	}

	/**
	 * Produces a new path by appending fragments to this one.
	 *
	 * @remarks
	 *
	 * The join starts from this path's already-parsed parts, so only the new fragments are parsed. Rooted and
	 * drive-carrying fragments override exactly as they would in the constructor.
	 *
	 * @example
	 * ```ts
	 * new PurePosixPath("/etc").joinpath("nginx", "nginx.conf").toString(); // '/etc/nginx/nginx.conf'
	 * new PurePosixPath("/etc").joinpath("/usr", "lib64").toString(); // '/usr/lib64'
	 * ```
	 */
	joinpath<T extends PurePath>(this: T, ...segments: PathLike[]): T {
		const joined = this.withSegments(this, ...segments);
		const flavor = this.flavor;
		const seeded: PurePath = joined;
		seeded.partsCache = parsePath(
			flavor,
			segments.map((segment) => toFragment(flavor, segment)),
			this.toParsedParts(),
		);
		return joined;
	}

	toString(): string {
		if (this.strCache === undefined) {
			this.strCache = formatParsedParts(this.flavor, this.toParsedParts()) || ".";
		}
		return this.strCache;
	}

	valueOf(): string {
		return this.toString();
	}

	toJSON(): string {
		return this.toString();
	}

	[Symbol.toPrimitive](): string {
		return this.toString();
	}

	/**
	 * Returns the string form with forward slashes regardless of flavor.
	 */
	asPosix(): string {
		const { sep } = this.flavor;
		const text = this.toString();
		return sep === "/" ? text : text.split(sep).join("/");
	}

	/**
	 * Drive prefix: a drive letter (`c:`), a UNC share (`\\server\share`) or a device prefix (`\\?\c:`).
	 * Always empty for POSIX paths.
	 */
	get drive(): string {
		return this.toParsedParts().drive;
	}

	/**
	 * The root following the drive: `/` (or `//`) for POSIX, `\` for Windows, or empty.
	 */
	get root(): string {
		return this.toParsedParts().root;
	}

	/**
	 * The concatenation of the drive and root, or ''.
	 */
	get anchor(): string {
		const { drive, root } = this.toParsedParts();
		return drive + root;
	}

	/**
	 * The path's components, with drive and root merged into a single leading element when present.
	 *
	 * @example
	 *
	 * ```ts
	 * new PurePosixPath("/usr/bin/node").parts; // ['/', 'usr', 'bin', 'node']
	 * new PureWindowsPath("c:/Program Files/nodejs").parts; // ['c:\\', 'Program Files', 'nodejs']
	 * ```
	 */
	get parts(): string[] {
		const { segments } = this.toParsedParts();
		const anchor = this.anchor;
		return anchor ? [anchor, ...segments] : [...segments];
	}

	/**
	 * The lexical parent. Anchors and `.` are their own parents (the same instance is returned).
	 *
	 * @remarks
	 *
	 * `..` segments are not resolved: the parent of `a/..` is `a`.
	 */
	get parent(): this {
		if (this.toParsedParts().segments.length === 0) return this;
		return this.dropSegments(1);
	}

	get parents(): PathParents<this> {
		return new PathParents(this);
	}

	/**
	 * The final segment, or '' for anchors and `.`.
	 */
	get name(): string {
		const { segments } = this.toParsedParts();
		return segments[segments.length - 1] ?? "";
	}

	/**
	 * The final suffix of the name, including its dot.
	 *
	 * @remarks
	 *
	 * The suffix starts at the last dot that is not the first character of the name, so `.bashrc` has no
	 * suffix while `archive.` has the suffix `.`.
	 */
	get suffix(): string {
		return splitSuffix(this.name)[1];
	}

	/**
	 * Every suffix of the name in left-to-right order, e.g. `['.tar', '.gz']` for `library.tar.gz`.
	 */
	get suffixes(): string[] {
		const result: string[] = [];
		let [stem, suffix] = splitSuffix(this.name);
		while (suffix) {
			result.unshift(suffix);
			[stem, suffix] = splitSuffix(stem);
		}
		return result;
	}

	get stem(): string {
		return splitSuffix(this.name)[0];
	}

	/**
	 * Returns a new path with the final segment replaced.
	 *
	 * @throws {@link InvalidOperationError} If the path has no name, or `name` is empty, `.`, or contains a
	 * separator.
	 */
	withName<T extends PurePath>(this: T, name: string): T {
		const flavor = this.flavor;
		if (
			!name ||
			name === "." ||
			[...name].some((char) => flavor.isSeparator(char))
		) {
			throw new InvalidOperationError(`Invalid name ${JSON.stringify(name)}`, {
				path: this,
			});
		}
		const { drive, root, segments } = this.toParsedParts();
		if (segments.length === 0) {
			throw new InvalidOperationError(`${JSON.stringify(this.toString())} has an empty name`, {
				path: this,
			});
		}
		return this.fromParsedParts({
			drive,
			root,
			segments: [...segments.slice(0, -1), name],
		});
	}

	/**
	 * Returns a new path with the stem changed and the suffix kept.
	 *
	 * @throws {@link InvalidOperationError} If `stem` is empty while the path has a suffix, or
	 * {@link PurePath.withName} rejects the result.
	 */
	withStem<T extends PurePath>(this: T, stem: string): T {
		const suffix = this.suffix;
		if (!suffix) return this.withName(stem);
		if (!stem) {
			throw new InvalidOperationError(
				`${JSON.stringify(this.toString())} has a non-empty suffix`,
				{ path: this },
			);
		}
		return this.withName(`${stem}${suffix}`);
	}

	/**
	 * Returns a new path with the suffix changed, added (when there was none) or removed (`""`).
	 *
	 * @throws {@link InvalidOperationError} If the path has no name or `suffix` is non-empty without a
	 * leading dot.
	 */
	withSuffix<T extends PurePath>(this: T, suffix: string): T {
		const stem = this.stem;
		if (!stem) {
			throw new InvalidOperationError(
				`${JSON.stringify(this.toString())} has an empty name`,
				{ path: this },
			);
		}
		if (suffix && !suffix.startsWith(".")) {
			throw new InvalidOperationError(`Invalid suffix ${JSON.stringify(suffix)}`, {
				path: this,
			});
		}
		return this.withName(`${stem}${suffix}`);
	}

	private coerce(other: PathLike): PurePath {
		return other instanceof PurePath ? other : this.withSegments(other);
	}

	private foldedSegments(): string[] {
		const flavor = this.flavor;
		return this.toParsedParts().segments.map((segment) => flavor.foldCase(segment));
	}

	private foldedAnchor(): string {
		return this.flavor.foldCase(this.anchor);
	}

	/**
	 * Returns this path expressed relative to `other`.
	 *
	 * @remarks
	 *
	 * Purely lexical. Without `walkUp`, `other` must be this path or one of its ancestors. With `walkUp`, the
	 * result climbs out of `other` with `..` segments until it reaches the common prefix; the anchors must
	 * still match. Segments are compared case-insensitively for Windows paths.
	 *
	 * @example
	 * ```ts
	 * new PurePosixPath("/etc/passwd").relativeTo("/etc").toString(); // 'passwd'
	 * new PurePosixPath("/a").relativeTo("/a/b/c", { walkUp: true }).toString(); // '../..'
	 * ```
	 *
	 * @throws {@link FlavorMismatchError} If `other` is a path of a different flavor.
	 * @throws {@link NotRelativeError} When the anchors differ, or `other` is not an ancestor and `walkUp` is
	 * off.
	 */
	relativeTo<T extends PurePath>(
		this: T,
		other: PathLike,
		options?: RelativeToOptions,
	): T {
		const target = this.coerce(other);
		if (target.flavor.name !== this.flavor.name) {
			throw new FlavorMismatchError(
				`Cannot relate a ${this.flavor.name} path to a ${target.flavor.name} path`,
				{ path: this, other: target },
			);
		}
		if (this.foldedAnchor() !== target.foldedAnchor()) {
			throw new NotRelativeError(
				`${this.toString()} and ${target.toString()} have different anchors`,
				{ path: this, other: target },
			);
		}
		const baseSegments = target.foldedSegments();
		const common = commonPrefixLength(this.foldedSegments(), baseSegments);
		if (common < baseSegments.length && !options?.walkUp) {
			throw new NotRelativeError(
				`${this.toString()} is not in the subpath of ${target.toString()}`,
				{ path: this, other: target },
			);
		}
		const ups = Array.from({ length: baseSegments.length - common }, () => "..");
		const remainder = this.toParsedParts().segments.slice(common);
		return this.fromParsedParts({
			drive: "",
			root: "",
			segments: [...ups, ...remainder],
		});
	}

	/**
	 * Returns `true` when `other` is this path or one of its lexical ancestors.
	 *
	 * @remarks
	 *
	 * Never throws: paths of another flavor are simply not related.
	 */
	isRelativeTo(other: PathLike): boolean {
		const target = this.coerce(other);
		if (target.flavor.name !== this.flavor.name) return false;
		if (this.foldedAnchor() !== target.foldedAnchor()) return false;
		const baseSegments = target.foldedSegments();
		return (
			commonPrefixLength(this.foldedSegments(), baseSegments) ===
			baseSegments.length
		);
	}

	/**
	 * Whether the path has a root and, for Windows, a drive.
	 */
	isAbsolute(): boolean {
		return this.flavor.isAbsolute(this.toParsedParts());
	}

	/**
	 * Whether any segment is a reserved Windows name (`NUL`, `com1.txt`, names ending in a dot or space,
	 * names with `:` or wildcards). Always `false` for POSIX paths and UNC paths.
	 */
	isReserved(): boolean {
		return this.flavor.isReserved(this.toParsedParts());
	}

	protected get normalizedString(): string {
		if (this.normCaseCache === undefined) {
			this.normCaseCache = this.flavor.foldCase(this.toString());
		}
		return this.normCaseCache;
	}

	protected get normalizedSegments(): readonly string[] {
		if (this.normPartsCache === undefined) {
			this.normPartsCache = this.normalizedString.split(this.flavor.sep);
		}
		return this.normPartsCache;
	}

	/**
	 * Flavor-aware equality. Total: returns `false` for non-paths and for paths of another flavor, even when
	 * the text is identical.
	 */
	equals(other: unknown): boolean {
		if (this === other) return true;
		if (!(other instanceof PurePath)) return false;
		return (
			this.flavor.name === other.flavor.name &&
			this.normalizedString === other.normalizedString
		);
	}

	/**
	 * Orders two paths of the same flavor by their case-folded segments.
	 *
	 * @throws {@link FlavorMismatchError} If the flavors differ; no order exists between them.
	 */
	compare(other: PurePath): Ordering {
		if (this.flavor.name !== other.flavor.name) {
			throw new FlavorMismatchError(
				`Cannot order a ${this.flavor.name} path against a ${other.flavor.name} path`,
				{ path: this, other },
			);
		}
		return compareSequences(this.normalizedSegments, other.normalizedSegments);
	}

	/**
	 * Comparator form of {@link PurePath.compare}, for `Array.prototype.sort`.
	 */
	static compare(left: PurePath, right: PurePath): Ordering {
		return left.compare(right);
	}

	/**
	 * Hash of the case-folded string form. Equal paths always share a hash.
	 */
	hashCode(): number {
		if (this.hashCache === undefined) {
			this.hashCache = hashString(this.normalizedString);
		}
		return this.hashCache;
	}

	private matchAgainst(
		pattern: PathLike,
		caseSensitive: boolean | undefined,
		full: boolean,
	): boolean {
		const flavor = this.flavor;
		const compiled = compilePattern(
			flavor,
			this.withSegments(pattern).toParsedParts(),
			caseSensitive ?? flavor.caseSensitive,
		);
		const { segments } = this.toParsedParts();
		return matchCompiled(compiled, this.anchor, segments, full);
	}

	/**
	 * Tests whether the whole path matches a glob-style pattern.
	 *
	 * @remarks
	 *
	 * `*` matches within a segment, `?` one character, `[seq]`/`[!seq]` a character set, and a `**` segment
	 * zero or more whole segments. The pattern's anchor must equal the path's.
	 *
	 * @example
	 * ```ts
	 * new PurePosixPath("a/b/c.py").fullMatch("**\/*.py"); // true
	 * new PurePosixPath("a/b/c.py").fullMatch("a/*.py"); // false
	 * ```
	 *
	 * @throws {@link PatternError} If the pattern is empty or malformed.
	 */
	fullMatch(pattern: PathLike, options?: MatchOptions): boolean {
		return this.matchAgainst(pattern, options?.caseSensitive, true);
	}

	/**
	 * Tests whether a trailing run of segments matches a relative pattern.
	 *
	 * @remarks
	 *
	 * `new PurePosixPath("/a/b/c.py").match("b/*.py")` is `true`. An anchored pattern must match the whole
	 * path, as with {@link PurePath.fullMatch}.
	 *
	 * @throws {@link PatternError} If the pattern is empty or malformed.
	 */
	match(pattern: PathLike, options?: MatchOptions): boolean {
		return this.matchAgainst(pattern, options?.caseSensitive, false);
	}

	/**
	 * Converts an absolute path to a `file:` URI.
	 *
	 * @example
	 * ```ts
	 * new PurePosixPath("/etc/hosts").asURI(); // 'file:///etc/hosts'
	 * new PureWindowsPath("c:/a b").asURI(); // 'file:///c:/a%20b'
	 * new PureWindowsPath("//server/share/x").asURI(); // 'file://server/share/x'
	 * ```
	 *
	 * @throws {@link InvalidOperationError} If the path is relative.
	 */
	asURI(): string {
		if (!this.isAbsolute()) {
			throw new InvalidOperationError(
				"relative path can't be expressed as a file URI",
				{ path: this },
			);
		}
		return buildFileURI(this.drive, this.asPosix());
	}

	/**
	 * Creates a path of the calling class from a `file:` URI.
	 *
	 * @throws {@link ParseError} If `uri` is not a `file:` URI or does not name an absolute path.
	 */
	static fromURI<T extends PurePath>(
		this: new (...args: PathLike[]) => T,
		uri: string,
	): T {
		const path = new this(pathTextFromFileURI(uri));
		if (!path.isAbsolute()) {
			throw new ParseError(`URI is not absolute: ${uri}`, { path: uri });
		}
		return path;
	}
}

/**
 * Path flavor using POSIX rules on every platform.
 */
export class PurePosixPath extends PurePath {
	static override flavor: Flavor = posixFlavor;
}

/**
 * Path flavor using Windows drive, UNC and separator rules on every platform.
 *
 * @remarks
 *
 * Both `\` and `/` are accepted as separators; the string form always uses `\`. Equality, ordering and
 * hashing ignore case.
 */
export class PureWindowsPath extends PurePath {
	static override flavor: Flavor = windowsFlavor;
}

/**
 * Builds a path value of the given flavor from raw fragments.
 *
 * @example Round-tripping through a serialized form
 * ```ts
 * const path = construct(windowsFlavor, ["c:/Users", "me"]);
 * const copy = construct(path.flavor, path.rawFragments());
 * copy.equals(path); // true
 * ```
 */
export function construct(
	flavor: Flavor,
	fragments: Iterable<PathLike>,
): PurePosixPath | PureWindowsPath {
	const args = [...fragments];
	return flavor.name === "windows"
		? new PureWindowsPath(...args)
		: new PurePosixPath(...args);
}
