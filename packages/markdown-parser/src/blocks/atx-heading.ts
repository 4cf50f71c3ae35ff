import type { PendingBlock } from "../block-context";
import { type TextLine, contentOf } from "../indent-scanner";

/**
 * Parses an ATX heading: 1 to 6 "#" followed by a space, a tab or the end of the line. A closing sequence of "#" is
 * dropped when a space or tab precedes it.
 *
 * ```
 *  ┌───┬───┬───┬───┬───┬───┬───┬───┬───┐
 *  │ # | # | ␣ | f | o | o | ␣ | # | # |
 *  └───┴───┴───┴───┴───┴───┴───┴───┴───┘
 *    ▲   ▲       ▲       ▲       ▲   ▲
 *    └───┘       └───────┘       └───┘
 *    level 2     text            closing sequence
 * ```
 */
export function parseAtxHeading(line: TextLine): PendingBlock | null {
	if (line.indent >= 4 || line.first !== "#") return null;

	const text = contentOf(line).text.trim();

	let level = 1;
	while (level < text.length && text.charAt(level) === "#") level++;
	if (level > 6) return null;

	const afterOpening = text.charAt(level);
	if (level < text.length && afterOpening !== " " && afterOpening !== "\t") {
		return null;
	}

	let numOfClosingHashes = 0;
	while (
		text.length - numOfClosingHashes - 1 >= level &&
		text.charAt(text.length - numOfClosingHashes - 1) === "#"
	) {
		numOfClosingHashes++;
	}

	const beforeClosing = text.charAt(text.length - numOfClosingHashes - 1);
	const contentEndIndex =
		numOfClosingHashes > 0 && (beforeClosing === " " || beforeClosing === "\t")
			? text.length - numOfClosingHashes
			: text.length;

	return {
		type: "heading",
		level,
		text: text.slice(level, contentEndIndex).trim(),
	};
}
