import type { Alignment } from "../ast";
import {
	type BlockContext,
	type PendingBlock,
	type Transition,
	finishAndStart,
	unchanged,
} from "../block-context";
import { type TextLine, contentOf } from "../indent-scanner";

export interface TableState {
	type: "table";
	alignments: Array<Alignment>;
	header: Array<string>;
	rows: Array<Array<string>>;
}

/**
 * Turns the last line of a paragraph into a table header when the next line is a matching delimiter row.
 *
 * ```
 *  | foo  |  bar  |  baz  |      ← header row (the paragraph's last line)
 *  | :--- | :---: |  ---: |      ← delimiter row
 *     ▲       ▲        ▲
 *     left    center   right
 * ```
 *
 * The header must contain a pipe and have as many cells as the delimiter row.
 */
export function startTable(
	headerLine: string,
	delimiterLine: TextLine,
): TableState | null {
	if (delimiterLine.indent >= 4) return null;

	const delimiter = contentOf(delimiterLine).text.trim();
	const first = delimiter.charAt(0);
	if (first !== "|" && first !== ":" && first !== "-") return null;

	// "- foo" would be a list item.
	const second = delimiter.charAt(1);
	if (first === "-" && (second === " " || second === "\t")) return null;

	if (headerLine.indexOf("|") === -1) return null;
	if (!/^[|:\- \t]+$/.test(delimiter)) return null;

	const delimiterCells = delimiter.split("|");
	const alignments: Array<Alignment> = [];
	for (let i = 0; i < delimiterCells.length; i++) {
		const cell = (delimiterCells[i] ?? "").trim();
		if (cell.length === 0) {
			if (i === 0 || i === delimiterCells.length - 1) continue;
			return null;
		}
		if (!/^:?-+:?$/.test(cell)) return null;

		const left = cell.charAt(0) === ":";
		const right = cell.charAt(cell.length - 1) === ":";
		alignments.push(
			left && right ? "center" : right ? "right" : left ? "left" : "default",
		);
	}

	const header = parseTableRow(headerLine);
	if (header.length === 0 || header.length !== alignments.length) return null;

	return { type: "table", alignments, header, rows: [] };
}

/**
 * Every line is a row until a blank line or a line that starts another kind of block.
 */
export function nextTable(
	state: TableState,
	line: TextLine,
	context: BlockContext,
): Transition {
	if (line.indent < 4) {
		const started = context.start(line);
		if (started.type === "finished" || started.next.type !== "paragraph") {
			return finishAndStart(finishTable(state), started);
		}
	}
	state.rows.push(
		parseTableRow(contentOf(line).text).slice(0, state.alignments.length),
	);
	return unchanged;
}

export function finishTable(state: TableState): PendingBlock {
	return {
		type: "table",
		alignments: state.alignments,
		header: state.header,
		rows: state.rows,
	};
}

/**
 * Splits a row on unescaped pipes. A leading and a trailing pipe are optional. Backslash escapes are read in pairs, so
 * the pipe after an escaped backslash still separates cells.
 *
 * ```
 *  "a|b|c"         → ["a", "b", "c"]
 *  "| a\|b | c |"  → ["a|b", "c"]
 *  "| a\\| b |"   → ["a\\", "b"]
 * ```
 */
export function parseTableRow(line: string): Array<string> {
	const text = line.trim();
	const cells: Array<string> = [];
	let cell = "";
	for (let index = 0; index < text.length; index++) {
		const character = text.charAt(index);
		if (character === "\\" && index + 1 < text.length) {
			const next = text.charAt(index + 1);
			// Other escapes are left for the inline parser.
			cell += next === "|" ? "|" : character + next;
			index++;
		} else if (character === "|") {
			cells.push(cell.trim());
			cell = "";
		} else {
			cell += character;
		}
	}
	cells.push(cell.trim());

	if (cells[0] === "") cells.shift();
	if (cells.length > 0 && cells[cells.length - 1] === "") cells.pop();
	return cells;
}
