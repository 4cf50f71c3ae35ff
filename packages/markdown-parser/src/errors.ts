import type { Block, Inline } from "./ast";

/**
 * Thrown by a renderer when the document contains a node its output format has no counterpart for.
 * Renderers never drop such nodes silently.
 */
export class UnsupportedConstructError extends Error {
	readonly construct: Block["type"] | Inline["type"] | "table-cell";
	readonly format: string;

	constructor(
		construct: Block["type"] | Inline["type"] | "table-cell",
		format: string,
		detail?: string,
	) {
		super(
			detail === undefined
				? `"${construct}" is not supported by the ${format} writer`
				: `"${construct}" is not supported by the ${format} writer: ${detail}`,
		);
		this.name = "UnsupportedConstructError";
		this.construct = construct;
		this.format = format;
	}
}
