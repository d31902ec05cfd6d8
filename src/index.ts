/**
 * Lexical POSIX and Windows paths for TypeScript runtimes.
 *
 * @remarks
 *
 * The primary entry points are:
 *
 * - {@link PurePath} for lexical operations in the host's flavor.
 * - {@link PurePosixPath} and {@link PureWindowsPath} for flavor-specific manipulation on any platform.
 * - {@link construct} for building a path from a {@link Flavor} chosen at run time.
 *
 * Nothing here touches the filesystem: symlinks are never resolved and `..` segments are never collapsed.
 * Filesystem access, the current directory and the home directory are left to the caller.
 */

import {
	FlavorMismatchError,
	InvalidOperationError,
	NotRelativeError,
	ParseError,
	PathError,
	PatternError,
} from "./errors.js";
import { hostFlavor, posixFlavor, windowsFlavor } from "./flavor.js";
import {
	construct,
	PathParents,
	PurePath,
	PurePosixPath,
	PureWindowsPath,
} from "./purepath.js";

export type { PathErrorCode } from "./errors.js";
export {
	FlavorMismatchError,
	InvalidOperationError,
	NotRelativeError,
	ParseError,
	PathError,
	PatternError,
} from "./errors.js";
export type { DriveMatch, Flavor, RootSplit } from "./flavor.js";
export {
	flavorByName,
	hostFlavor,
	isWindows,
	posixFlavor,
	windowsFlavor,
} from "./flavor.js";
export type { CompiledPattern, PatternToken } from "./glob.js";
export { compilePattern, matchCompiled, matchTokens } from "./glob.js";
export type { ParsedParts } from "./parts.js";
export { formatParsedParts, parseFragment, parsePath } from "./parts.js";
export type { MatchOptions, PathLike, RelativeToOptions } from "./purepath.js";
export {
	construct,
	PathParents,
	PurePath,
	PurePosixPath,
	PureWindowsPath,
} from "./purepath.js";
export type { Ordering } from "./util.js";

export default {
	PurePath,
	PurePosixPath,
	PureWindowsPath,
	PathParents,
	construct,
	posixFlavor,
	windowsFlavor,
	hostFlavor,
	PathError,
	ParseError,
	InvalidOperationError,
	NotRelativeError,
	FlavorMismatchError,
	PatternError,
};
