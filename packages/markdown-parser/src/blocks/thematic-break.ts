import type { PendingBlock } from "../block-context";
import { type TextLine, contentOf } from "../indent-scanner";

/**
 * Three or more "-", "_" or "*" of one kind, optionally separated by spaces or tabs.
 *
 * ```
 *  * * *     ✓
 *  ---       ✓
 *  -- -      ✓
 *  --        ✗ (two markers)
 *  *-*       ✗ (mixed markers)
 * ```
 */
export function parseThematicBreak(line: TextLine): PendingBlock | null {
	if (line.indent >= 4) return null;

	const marker = line.first;
	if (marker !== "-" && marker !== "_" && marker !== "*") return null;

	let markerCount = 0;
	for (const character of contentOf(line).text) {
		if (character === " " || character === "\t") continue;
		if (character !== marker) return null;
		markerCount++;
	}
	if (markerCount < 3) return null;

	return { type: "thematic-break" };
}
