/**
 * A line, or what remains of it once enclosing containers have consumed their markers.
 * `column` is the visual column at which `text` starts; tab stops are computed from it.
 */
export interface SourceLine {
	text: string;
	column: number;
}

export interface BlankLine {
	kind: "blank";
	/** Visual width of the whitespace, tabs expanded. */
	indent: number;
	source: SourceLine;
}

export interface TextLine {
	kind: "text";
	/** Visual width of the whitespace before `first`, tabs expanded. */
	indent: number;
	/** The first character that is neither a space nor a tab. */
	first: string;
	/** Index of `first` in `source.text`. */
	index: number;
	source: SourceLine;
}

export type ScannedLine = BlankLine | TextLine;

export const TAB_STOP = 4;

/**
 * Measures the leading whitespace of a line with tabs advancing to the next multiple of 4, counted from the line's own
 * starting column.
 *
 * "  \tfoo" at column 0 → { kind: "text", indent: 4, first: "f", index: 3 }
 * "\tfoo"   at column 1 → { kind: "text", indent: 3, first: "f", index: 1 }
 * " \t "    at column 0 → { kind: "blank", indent: 5 }
 */
export function scanIndent(source: SourceLine): ScannedLine {
	let column = source.column;
	let index = 0;
	while (index < source.text.length) {
		const character = source.text.charAt(index);
		if (character === " ") {
			column++;
		} else if (character === "\t") {
			column += TAB_STOP - (column % TAB_STOP);
		} else {
			return {
				kind: "text",
				indent: column - source.column,
				first: character,
				index,
				source,
			};
		}
		index++;
	}
	return { kind: "blank", indent: column - source.column, source };
}

/**
 * The visual column of the first non-blank character of the line.
 */
export function columnOf(line: TextLine): number {
	return line.source.column + line.indent;
}

/**
 * The line starting at its first non-blank character.
 */
export function contentOf(line: TextLine): SourceLine {
	return { text: line.source.text.slice(line.index), column: columnOf(line) };
}

/**
 * Scans again after the first `count` characters of the content, e.g. to measure the spaces that follow a list marker.
 * The skipped characters must not be tabs.
 */
export function scanAfter(line: TextLine, count: number): ScannedLine {
	return scanIndent({
		text: line.source.text.slice(line.index + count),
		column: columnOf(line) + count,
	});
}

/**
 * Removes up to `width` columns of leading whitespace. A tab that is only partially consumed is replaced by the spaces
 * it still spans, so the rest of the line keeps its visual layout.
 *
 * stripColumns({ text: "\tfoo", column: 0 }, 1) → { text: "   foo", column: 1 }
 * stripColumns({ text: "  foo", column: 0 }, 4) → { text: "foo", column: 2 }
 */
export function stripColumns(source: SourceLine, width: number): SourceLine {
	let column = source.column;
	let index = 0;
	const limit = source.column + width;
	while (index < source.text.length && column < limit) {
		const character = source.text.charAt(index);
		if (character === " ") {
			column++;
		} else if (character === "\t") {
			const next = column + TAB_STOP - (column % TAB_STOP);
			if (next > limit) {
				return {
					text: " ".repeat(next - limit) + source.text.slice(index + 1),
					column: limit,
				};
			}
			column = next;
		} else {
			break;
		}
		index++;
	}
	return { text: source.text.slice(index), column };
}
