import type { Document } from "@doctree/markdown-parser";
import { describe, expect, it } from "vitest";
import {
	UnknownFormatError,
	WriterMap,
	convert,
	createReaderMap,
	readers,
	writers,
} from "../formats";

describe("format maps", () => {
	it("lists the built-in formats", () => {
		expect(writers.keys()).toEqual(["latex", "native", "typst"]);
		expect(readers.keys()).toEqual(["markdown", "native"]);
	});

	it("names the known formats when a format is missing", () => {
		expect(() => writers.get("html")).toThrow(UnknownFormatError);
		expect(() => writers.get("html")).toThrow(
			'no writer for "html", expected one of: latex, native, typst',
		);
		expect(() => readers.read("rst", "")).toThrow(
			'no reader for "rst", expected one of: markdown, native',
		);
	});

	it("creates a new writer for every lookup", () => {
		expect(writers.get("latex")).not.toBe(writers.get("latex"));
	});

	it("accepts custom writers", () => {
		const map = new WriterMap().add("count", () => ({
			format: "count",
			write: (document: Document) => String(document.blocks.length),
		}));
		expect(map.write("count", { meta: {}, blocks: [{ type: "thematic-break" }] })).toBe("1");
	});

	it("passes parse options to the markdown reader", () => {
		expect(createReaderMap({ tables: false }).read("markdown", "a|b\n-|-").blocks[0]?.type).toBe(
			"paragraph",
		);
		expect(readers.read("markdown", "a|b\n-|-").blocks[0]?.type).toBe("table");
	});
});

describe("convert", () => {
	it("converts between formats", () => {
		expect(convert("# Hi", { from: "markdown", to: "typst" })).toBe("\n= Hi\n");
	});

	it("reads native output back", () => {
		const native = convert("*a*", { from: "markdown", to: "native" });
		expect(convert(native, { from: "native", to: "native" })).toBe(native);
	});
});
