import { parseLinkDestination, unescapeString } from "./inline-parser";
import { blockLogger } from "./logger";

export interface LinkReference {
	destination: string;
	title?: string;
}

/**
 * Link reference definitions collected from the whole document. Labels are compared after normalization, and the
 * first definition of a label wins; later ones are ignored.
 *
 * ```ts
 * const references = new LinkReferenceTable();
 * references.define("Foo  Bar", { destination: "/url" });  // true
 * references.define("foo bar", { destination: "/other" });  // false
 * references.lookup("FOO BAR");                             // { destination: "/url" }
 * ```
 */
export class LinkReferenceTable {
	#entries = new Map<string, LinkReference>();

	constructor(entries?: Iterable<[string, LinkReference]>) {
		if (entries === undefined) return;
		for (const [label, reference] of entries) {
			this.define(label, reference);
		}
	}

	/**
	 * Returns `false` when the label was already defined.
	 */
	define(label: string, reference: LinkReference): boolean {
		const key = normalizeReference(label);
		if (key.length === 0 || this.#entries.has(key)) return false;
		this.#entries.set(key, reference);
		blockLogger("defined link reference [%s] → %s", key, reference.destination);
		return true;
	}

	lookup(label: string): LinkReference | undefined {
		return this.#entries.get(normalizeReference(label));
	}

	get size(): number {
		return this.#entries.size;
	}

	entries(): IterableIterator<[string, LinkReference]> {
		return this.#entries.entries();
	}
}

/**
 * Case-folds a label and collapses its internal whitespace, so that "Foo\n  BAR" and "foo bar" refer to the same
 * definition.
 */
export function normalizeReference(label: string): string {
	return label.trim().replace(/\s+/g, " ").toLowerCase().toUpperCase();
}

/**
 * Removes the link reference definitions at the start of a paragraph's lines and records them. Returns the lines that
 * remain; an empty array means the paragraph held nothing but definitions.
 */
export function extractLinkReferenceDefinitions(
	lines: Array<string>,
	references: LinkReferenceTable,
): Array<string> {
	let remaining = lines;
	while (remaining.length > 0) {
		const result = parseLinkReferenceDefinition(remaining);
		if (result === null) break;
		references.define(result.label, result.reference);
		remaining = remaining.slice(result.nextLineIndex);
	}
	return remaining;
}

/**
 * Parses one definition of the form `[label]: destination "title"`, which may span several lines.
 * `nextLineIndex` is the number of lines it took.
 *
 * A title that is not followed by the end of its line invalidates the definition, unless the destination ended its
 * own line; then the title line is left over as paragraph text:
 *
 *   [foo]: /url        →  definition of "foo", 1 line
 *   "title" ok            left over
 */
export function parseLinkReferenceDefinition(lines: Array<string>): {
	label: string;
	reference: LinkReference;
	nextLineIndex: number;
} | null {
	const firstLine = lines[0];
	if (firstLine === undefined) return null;

	let nextLineIndex = 1;
	let content = firstLine.trim() + "\n";

	// Appends the next line of the paragraph, or returns false at its end.
	const pullLine = (): boolean => {
		const nextLine = lines[nextLineIndex];
		if (nextLine === undefined) return false;
		content += nextLine.trim() + "\n";
		nextLineIndex++;
		return true;
	};

	if (content.charAt(0) !== "[") return null;

	let label = "";
	let characterCursor = 1;
	while (characterCursor < content.length) {
		const character = content.charAt(characterCursor);
		if (character === "\\") {
			const nextCharacter = content.charAt(characterCursor + 1);
			if (nextCharacter === "]" || nextCharacter === "[" || nextCharacter === "\\") {
				label += nextCharacter;
				characterCursor += 2;
			} else {
				label += character;
				characterCursor++;
			}
			continue;
		}

		if (character === "[") return null;
		if (character === "]") break;

		if (character === "\n") {
			if (!pullLine()) return null;
			label += "\n";
			characterCursor++;
			continue;
		}

		label += character;
		characterCursor++;
	}

	if (label.length > 999 || label.trim().length === 0) return null;

	// "]:"
	characterCursor++;
	if (content.charAt(characterCursor) !== ":") return null;
	characterCursor++;

	while (true) {
		const character = content.charAt(characterCursor);
		if (character === " " || character === "\t") {
			characterCursor++;
		} else if (character === "\n") {
			if (!pullLine()) return null;
			characterCursor++;
		} else {
			break;
		}
	}

	const destination = parseLinkDestination(content, {
		startIndex: characterCursor,
	});
	if (destination === null) return null;

	characterCursor = destination.endIndex + 1;
	const nextLineIndexAfterDestination = nextLineIndex;
	const destinationEndsLine = content.charAt(characterCursor) === "\n";

	const separator = content.charAt(characterCursor);
	if (!destinationEndsLine && separator !== " " && separator !== "\t") {
		return null;
	}

	while (true) {
		const character = content.charAt(characterCursor);
		if (character === " " || character === "\t") {
			characterCursor++;
		} else if (character === "\n") {
			if (!pullLine()) break;
			characterCursor++;
		} else {
			break;
		}
	}

	let title: string | undefined;
	const openingQuoteCharacter = content.charAt(characterCursor);
	if (['"', "'", "("].includes(openingQuoteCharacter)) {
		const closingQuoteCharacter =
			openingQuoteCharacter === "(" ? ")" : openingQuoteCharacter;
		characterCursor++;
		const titleStartIndex = characterCursor;
		while (characterCursor < content.length) {
			const character = content.charAt(characterCursor);
			if (character === closingQuoteCharacter) {
				title = unescapeString(content.slice(titleStartIndex, characterCursor));
				characterCursor++;
				break;
			}

			if (character === "(" && openingQuoteCharacter === "(") break;

			if (character === "\\" && characterCursor + 1 < content.length) {
				characterCursor += 2;
				continue;
			}

			// Titles may span lines, but not blank ones; those already ended the paragraph.
			if (character === "\n" && characterCursor === content.length - 1) {
				if (!pullLine()) break;
			}
			characterCursor++;
		}
	}

	// Only trailing whitespace may follow the title.
	while (content.charAt(characterCursor) === " " || content.charAt(characterCursor) === "\t") {
		characterCursor++;
	}
	if (content.charAt(characterCursor) !== "\n") {
		title = undefined;
	}

	if (title === undefined) {
		if (!destinationEndsLine) return null;
		nextLineIndex = nextLineIndexAfterDestination;
	}

	const reference: LinkReference =
		title === undefined
			? { destination: destination.href }
			: { destination: destination.href, title };
	return { label, reference, nextLineIndex };
}
