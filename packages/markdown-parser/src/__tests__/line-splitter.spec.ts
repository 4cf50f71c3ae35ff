import { describe, expect, it } from "vitest";
import { LineSplitter } from "../line-splitter";

describe("LineSplitter", () => {
	describe("split", () => {
		it("splits text with LF (\n) line endings", () => {
			expect(LineSplitter.split("Hello\nWorld\nTest")).toEqual([
				"Hello",
				"World",
				"Test",
			]);
		});

		it("splits text with CRLF (\r\n) line endings", () => {
			expect(LineSplitter.split("Hello\r\nWorld\r\nTest")).toEqual([
				"Hello",
				"World",
				"Test",
			]);
		});

		it("splits text with CR (\r) line endings", () => {
			expect(LineSplitter.split("Hello\rWorld\rTest")).toEqual([
				"Hello",
				"World",
				"Test",
			]);
		});

		it("splits text with mixed line endings", () => {
			expect(LineSplitter.split("Hello\nWorld\r\nTest\r")).toEqual([
				"Hello",
				"World",
				"Test",
			]);
		});

		it("returns no lines for empty input", () => {
			expect(LineSplitter.split("")).toEqual([]);
		});

		it("returns a single empty line for a lone line ending", () => {
			expect(LineSplitter.split("\n")).toEqual([""]);
			expect(LineSplitter.split("\r\n")).toEqual([""]);
			expect(LineSplitter.split("\r")).toEqual([""]);
		});

		it("keeps empty lines between consecutive line endings", () => {
			expect(LineSplitter.split("Line1\n\n\nLine2")).toEqual([
				"Line1",
				"",
				"",
				"Line2",
			]);
			expect(LineSplitter.split("Line1\r\r\rLine2")).toEqual([
				"Line1",
				"",
				"",
				"Line2",
			]);
		});

		it("does not add an empty line after a trailing line ending", () => {
			expect(LineSplitter.split("Line1\nLine2\n")).toEqual(["Line1", "Line2"]);
		});

		it("keeps a leading empty line", () => {
			expect(LineSplitter.split("\r\nLine1")).toEqual(["", "Line1"]);
		});

		it("replaces NUL characters with the replacement character", () => {
			expect(LineSplitter.split("a\0b")).toEqual(["a�b"]);
		});
	});

	describe("push and flush", () => {
		it("holds back a line that is not terminated yet", () => {
			const splitter = new LineSplitter();
			expect(splitter.push("Hello")).toEqual([]);
			expect(splitter.flush()).toEqual(["Hello"]);
		});

		it("accumulates partial lines across multiple chunks", () => {
			const splitter = new LineSplitter();
			expect(splitter.push("Hel")).toEqual([]);
			expect(splitter.push("lo\nWor")).toEqual(["Hello"]);
			expect(splitter.push("ld\n")).toEqual(["World"]);
			expect(splitter.flush()).toEqual([]);
		});

		it("treats CRLF split across two chunks as one line ending", () => {
			const splitter = new LineSplitter();
			expect(splitter.push("Line1\r")).toEqual(["Line1"]);
			expect(splitter.push("\nLine2")).toEqual([]);
			expect(splitter.push("\n")).toEqual(["Line2"]);
		});

		it("treats CR at the end of a chunk followed by other text as a line ending", () => {
			const splitter = new LineSplitter();
			expect(splitter.push("Line1\r")).toEqual(["Line1"]);
			expect(splitter.push("Line2\n")).toEqual(["Line2"]);
		});

		it("forgets a pending CR once an empty chunk arrives", () => {
			const splitter = new LineSplitter();
			expect(splitter.push("Line1\r")).toEqual(["Line1"]);
			expect(splitter.push("")).toEqual([]);
			expect(splitter.push("\nLine2")).toEqual([""]);
			expect(splitter.flush()).toEqual(["Line2"]);
		});
	});
});
