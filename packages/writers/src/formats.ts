import { type Document, MarkdownParser, type ParseOptions } from "@doctree/markdown-parser";
import { LatexWriter } from "./latex-writer";
import { NativeReader } from "./native-reader";
import { NativeWriter } from "./native-writer";
import { TypstWriter } from "./typst-writer";

export interface DocumentWriter {
	readonly format: string;
	write(document: Document): string;
}

export interface DocumentReader {
	readonly format: string;
	read(input: string): Document;
}

export class UnknownFormatError extends Error {
	readonly format: string;
	readonly known: Array<string>;

	constructor(kind: "reader" | "writer", format: string, known: Array<string>) {
		super(`no ${kind} for "${format}", expected one of: ${known.join(", ")}`);
		this.name = "UnknownFormatError";
		this.format = format;
		this.known = known;
	}
}

/**
 * Writers by format name. Each lookup creates a fresh writer, since writers hold state while they write.
 *
 * @example
 * ```ts
 * const writers = createWriterMap();
 * writers.keys();                     // ["latex", "native", "typst"]
 * writers.write("typst", document);
 * ```
 */
export class WriterMap {
	#creators = new Map<string, () => DocumentWriter>();

	add(format: string, create: () => DocumentWriter): this {
		this.#creators.set(format, create);
		return this;
	}

	keys(): Array<string> {
		return [...this.#creators.keys()].sort();
	}

	get(format: string): DocumentWriter {
		const create = this.#creators.get(format);
		if (create === undefined) throw new UnknownFormatError("writer", format, this.keys());
		return create();
	}

	write(format: string, document: Document): string {
		return this.get(format).write(document);
	}
}

export class ReaderMap {
	#creators = new Map<string, () => DocumentReader>();

	add(format: string, create: () => DocumentReader): this {
		this.#creators.set(format, create);
		return this;
	}

	keys(): Array<string> {
		return [...this.#creators.keys()].sort();
	}

	get(format: string): DocumentReader {
		const create = this.#creators.get(format);
		if (create === undefined) throw new UnknownFormatError("reader", format, this.keys());
		return create();
	}

	read(format: string, input: string): Document {
		return this.get(format).read(input);
	}
}

export function createWriterMap(): WriterMap {
	return new WriterMap()
		.add("latex", () => new LatexWriter())
		.add("typst", () => new TypstWriter())
		.add("native", () => new NativeWriter());
}

export function createReaderMap(options: ParseOptions = {}): ReaderMap {
	return new ReaderMap()
		.add("markdown", () => ({
			format: "markdown",
			read: (input) => new MarkdownParser(options).parse(input),
		}))
		.add("native", () => new NativeReader());
}

export const writers = createWriterMap();
export const readers = createReaderMap();

/**
 * Reads `input` in one format and writes it in another.
 *
 *   convert("# Hi", { from: "markdown", to: "typst" })  // "\n= Hi\n"
 */
export function convert(input: string, { from, to }: { from: string; to: string }): string {
	return writers.write(to, readers.read(from, input));
}
