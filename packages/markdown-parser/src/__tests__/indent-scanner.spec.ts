import { describe, expect, it } from "vitest";
import {
	type TextLine,
	contentOf,
	scanAfter,
	scanIndent,
	stripColumns,
} from "../indent-scanner";

function scanText(text: string, column = 0): TextLine {
	const line = scanIndent({ text, column });
	if (line.kind !== "text") throw new Error(`expected text, got a blank line for "${text}"`);
	return line;
}

describe("scanIndent", () => {
	it("measures spaces one column each", () => {
		expect(scanIndent({ text: "   foo", column: 0 })).toMatchObject({
			kind: "text",
			indent: 3,
			first: "f",
			index: 3,
		});
	});

	it("advances tabs to the next multiple of 4", () => {
		expect(scanIndent({ text: "  \tfoo", column: 0 })).toMatchObject({
			kind: "text",
			indent: 4,
			first: "f",
			index: 3,
		});
	});

	it("computes tab stops from the absolute column", () => {
		expect(scanIndent({ text: "\tfoo", column: 1 })).toMatchObject({
			kind: "text",
			indent: 3,
			index: 1,
		});
	});

	it("reports blank lines with their width", () => {
		expect(scanIndent({ text: " \t ", column: 0 })).toMatchObject({
			kind: "blank",
			indent: 5,
		});
		expect(scanIndent({ text: "", column: 0 })).toMatchObject({
			kind: "blank",
			indent: 0,
		});
	});
});

describe("scanAfter", () => {
	it("rescans after a list marker at the updated column", () => {
		const line = scanText("-   foo");
		expect(scanAfter(line, 1)).toMatchObject({
			kind: "text",
			indent: 3,
			first: "f",
			source: { text: "   foo", column: 1 },
		});
	});

	it("lets a tab after a marker stop at the next tab stop", () => {
		const line = scanText("1.\tfoo");
		expect(scanAfter(line, 2)).toMatchObject({ kind: "text", indent: 2 });
	});
});

describe("contentOf", () => {
	it("starts the line at its first non-blank character", () => {
		expect(contentOf(scanText("  \tbar", 2))).toEqual({
			text: "bar",
			column: 8,
		});
	});
});

describe("stripColumns", () => {
	it("removes whole spaces", () => {
		expect(stripColumns({ text: "    foo", column: 0 }, 2)).toEqual({
			text: "  foo",
			column: 2,
		});
	});

	it("stops at the first non-blank character", () => {
		expect(stripColumns({ text: "  foo", column: 0 }, 4)).toEqual({
			text: "foo",
			column: 2,
		});
	});

	it("replaces a partially consumed tab with the spaces it still spans", () => {
		expect(stripColumns({ text: "\tfoo", column: 0 }, 1)).toEqual({
			text: "   foo",
			column: 1,
		});
		expect(stripColumns({ text: "\t\tbar", column: 0 }, 6)).toEqual({
			text: "  bar",
			column: 6,
		});
	});
});
