import { describe, expect, test } from "vitest";
import {
	InvalidOperationError,
	ParseError,
	PurePosixPath,
	PureWindowsPath,
} from "../src/index.js";
import { buildFileURI, pathTextFromFileURI, quotePath } from "../src/uri.js";

describe("quotePath", () => {
	test("percent-encodes UTF-8 bytes outside the safe set", () => {
		expect(quotePath("/tmp/a b#c")).toBe("/tmp/a%20b%23c");
		expect(quotePath("/tmp/é")).toBe("/tmp/%C3%A9");
		expect(quotePath("/a-b_c.d~e")).toBe("/a-b_c.d~e");
	});
});

describe("buildFileURI", () => {
	test("posix, drive letter and UNC forms", () => {
		expect(buildFileURI("", "/etc/hosts")).toBe("file:///etc/hosts");
		expect(buildFileURI("c:", "c:/a b")).toBe("file:///c:/a%20b");
		expect(buildFileURI("\\\\server\\share", "//server/share/x")).toBe(
			"file://server/share/x",
		);
	});
});

describe("pathTextFromFileURI", () => {
	test("strips empty and localhost authorities", () => {
		expect(pathTextFromFileURI("file:///etc/hosts")).toBe("/etc/hosts");
		expect(pathTextFromFileURI("file://localhost/etc/hosts")).toBe("/etc/hosts");
	});

	test("drive letters and UNC authorities", () => {
		expect(pathTextFromFileURI("file:///c:/a%20b")).toBe("c:/a b");
		expect(pathTextFromFileURI("file:///c|/x")).toBe("c:/x");
		expect(pathTextFromFileURI("file://server/share/x")).toBe(
			"//server/share/x",
		);
		expect(pathTextFromFileURI("file:////server/share/x")).toBe(
			"//server/share/x",
		);
	});

	test("rejects other schemes and malformed escapes", () => {
		expect(() => pathTextFromFileURI("http://example.test/x")).toThrow(
			ParseError,
		);
		try {
			pathTextFromFileURI("file:///%E0%A4%A");
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(ParseError);
			if (!(error instanceof ParseError)) return;
			expect(error.cause).toBeInstanceOf(URIError);
			expect(error.path).toBe("file:///%E0%A4%A");
		}
	});
});

describe("asURI and fromURI", () => {
	test("posix paths", () => {
		const p = new PurePosixPath("/a b/c#d");
		expect(p.asURI()).toBe("file:///a%20b/c%23d");
		const back = PurePosixPath.fromURI(p.asURI());
		expect(back).toBeInstanceOf(PurePosixPath);
		expect(back.equals(p)).toBe(true);
	});

	test("windows paths", () => {
		expect(PureWindowsPath.fromURI("file:///c:/a%20b").toString()).toBe(
			"c:\\a b",
		);
		expect(PureWindowsPath.fromURI("file:///c|/x").toString()).toBe("c:\\x");
		expect(PureWindowsPath.fromURI("file://server/share/x").toString()).toBe(
			"\\\\server\\share\\x",
		);
		const unc = new PureWindowsPath("//server/share/dir name/f.txt");
		expect(PureWindowsPath.fromURI(unc.asURI()).equals(unc)).toBe(true);
	});

	test("relative paths have no URI", () => {
		expect(() => new PurePosixPath("rel/path").asURI()).toThrow(
			InvalidOperationError,
		);
	});

	test("URIs must name absolute paths", () => {
		expect(() => PurePosixPath.fromURI("file:relative")).toThrow(
			"URI is not absolute: file:relative",
		);
		expect(() => PureWindowsPath.fromURI("file:///etc/hosts")).toThrow(
			ParseError,
		);
	});
});
