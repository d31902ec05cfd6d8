import { describe, expect, test } from "vitest";
import {
	type Flavor,
	flavorByName,
	posixFlavor,
	windowsFlavor,
} from "../src/flavor.js";
import {
	EMPTY_PARTS,
	formatParsedParts,
	parseFragment,
	parsePath,
	sameParts,
} from "../src/parts.js";

describe("parsePath (posix)", () => {
	test("a later rooted fragment discards earlier ones", () => {
		const parts = parsePath(posixFlavor, ["/etc", "/usr", "lib64"]);
		expect(parts).toEqual({ drive: "", root: "/", segments: ["usr", "lib64"] });
		expect(formatParsedParts(posixFlavor, parts)).toBe("/usr/lib64");
	});

	test("drops empty and dot segments but keeps '..'", () => {
		expect(parsePath(posixFlavor, ["foo//bar"]).segments).toEqual([
			"foo",
			"bar",
		]);
		expect(parsePath(posixFlavor, ["foo/./bar/."]).segments).toEqual([
			"foo",
			"bar",
		]);
		expect(parsePath(posixFlavor, ["foo/../bar"]).segments).toEqual([
			"foo",
			"..",
			"bar",
		]);
	});

	test("no fragments and empty fragments give empty parts", () => {
		expect(parsePath(posixFlavor, [])).toEqual(EMPTY_PARTS);
		expect(parsePath(posixFlavor, ["", "."])).toEqual({
			drive: "",
			root: "",
			segments: [],
		});
		expect(formatParsedParts(posixFlavor, EMPTY_PARTS)).toBe("");
	});

	test("backslashes are ordinary characters", () => {
		expect(parsePath(posixFlavor, ["a\\b"]).segments).toEqual(["a\\b"]);
	});

	test("starts from a seed", () => {
		const seed = { drive: "", root: "/", segments: ["a"] };
		expect(parsePath(posixFlavor, ["b", "c"], seed)).toEqual({
			drive: "",
			root: "/",
			segments: ["a", "b", "c"],
		});
	});

	test("accepts already parsed fragments", () => {
		const nested = parseFragment(posixFlavor, "x/y");
		expect(parsePath(posixFlavor, ["/base", nested])).toEqual({
			drive: "",
			root: "/",
			segments: ["base", "x", "y"],
		});
	});
});

describe("parsePath (windows)", () => {
	test("a different drive resets the accumulated parts", () => {
		const parts = parsePath(windowsFlavor, ["c:/Windows", "d:bar"]);
		expect(parts).toEqual({ drive: "d:", root: "", segments: ["bar"] });
		expect(formatParsedParts(windowsFlavor, parts)).toBe("d:bar");
	});

	test("a rooted fragment keeps the previous drive", () => {
		const parts = parsePath(windowsFlavor, ["c:/Windows", "/Program Files"]);
		expect(parts).toEqual({
			drive: "c:",
			root: "\\",
			segments: ["Program Files"],
		});
		expect(formatParsedParts(windowsFlavor, parts)).toBe("c:\\Program Files");
	});

	test("the same drive in another case appends and adopts the new spelling", () => {
		expect(parsePath(windowsFlavor, ["c:/Windows", "C:system32"])).toEqual({
			drive: "C:",
			root: "\\",
			segments: ["Windows", "system32"],
		});
	});

	test("a bare drive joined with a name stays drive-relative", () => {
		const parts = parsePath(windowsFlavor, ["c:", "x"]);
		expect(parts).toEqual({ drive: "c:", root: "", segments: ["x"] });
		expect(formatParsedParts(windowsFlavor, parts)).toBe("c:x");
	});

	test("a complete UNC drive gains a root", () => {
		const parts = parsePath(windowsFlavor, ["//server/share"]);
		expect(parts).toEqual({
			drive: "\\\\server\\share",
			root: "\\",
			segments: [],
		});
		expect(formatParsedParts(windowsFlavor, parts)).toBe("\\\\server\\share\\");
	});

	test("a UNC drive followed by a relative fragment", () => {
		expect(parsePath(windowsFlavor, ["//server/share", "x"])).toEqual({
			drive: "\\\\server\\share",
			root: "\\",
			segments: ["x"],
		});
	});

	test("later fragments complete an incomplete UNC drive", () => {
		expect(parsePath(windowsFlavor, ["\\\\server", "share", "x"])).toEqual({
			drive: "\\\\server\\share",
			root: "\\",
			segments: ["x"],
		});
	});

	test("an incomplete UNC drive alone is kept as it is", () => {
		expect(parsePath(windowsFlavor, ["\\\\server"])).toEqual({
			drive: "\\\\server",
			root: "",
			segments: [],
		});
	});
});

describe("formatParsedParts", () => {
	test("prefixes a relative path whose first segment looks like a drive", () => {
		const parts = { drive: "", root: "", segments: ["c:", "x"] };
		expect(formatParsedParts(windowsFlavor, parts)).toBe(".\\c:\\x");
		expect(formatParsedParts(posixFlavor, parts)).toBe("c:/x");
		expect(parsePath(windowsFlavor, [".\\c:\\x"])).toEqual(parts);
	});

	const cases: Array<[Flavor["name"], string]> = [
		["posix", "/a/b"],
		["posix", "//a/b"],
		["posix", "///a"],
		["posix", "a/../b"],
		["posix", "./a/"],
		["posix", ""],
		["windows", "c:\\a"],
		["windows", "c:a"],
		["windows", "\\a"],
		["windows", "//server/share/x"],
		["windows", "\\\\?\\c:\\x"],
		["windows", "\\\\?\\UNC\\srv\\shr\\y"],
		["windows", "\\\\.\\device"],
		["windows", "\\\\server"],
		["windows", "./c:x"],
	];

	test.each(cases)("%s round trip of %j", (name, input) => {
		const flavor = flavorByName(name);
		const parts = parsePath(flavor, [input]);
		const again = parsePath(flavor, [formatParsedParts(flavor, parts)]);
		expect(sameParts(again, parts)).toBe(true);
	});
});

describe("parseFragment", () => {
	test("splits drive, root and segments", () => {
		expect(parseFragment(windowsFlavor, "C:/Users/Name")).toEqual({
			drive: "C:",
			root: "\\",
			segments: ["Users", "Name"],
		});
		expect(parseFragment(posixFlavor, "name")).toEqual({
			drive: "",
			root: "",
			segments: ["name"],
		});
		expect(parseFragment(posixFlavor, "")).toBe(EMPTY_PARTS);
	});
});

describe("sameParts", () => {
	test("compares fields exactly", () => {
		const left = { drive: "c:", root: "\\", segments: ["a"] };
		expect(sameParts(left, { drive: "c:", root: "\\", segments: ["a"] })).toBe(
			true,
		);
		expect(sameParts(left, { drive: "C:", root: "\\", segments: ["a"] })).toBe(
			false,
		);
		expect(sameParts(left, { drive: "c:", root: "\\", segments: ["a", "b"] })).toBe(
			false,
		);
	});
});
