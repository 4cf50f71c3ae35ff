import z from "zod";

/**
 * The JSON interchange format of the document tree: every node is `{ "t": tag, "c": contents }`, and contents are
 * positional arrays.
 *
 *   { type: "heading", level: 1, attr, children: [str("Hi")] }
 *     →  { "t": "Header", "c": [1, ["", [], []], [{ "t": "Str", "c": "Hi" }]] }
 */
export const NATIVE_API_VERSION = [1, 23, 1] as const;

export type NativeAttr = [string, Array<string>, Array<[string, string]>];

export type NativeAlignment =
	| { t: "AlignLeft" }
	| { t: "AlignRight" }
	| { t: "AlignCenter" }
	| { t: "AlignDefault" };

export type NativeColWidth = { t: "ColWidth"; c: number } | { t: "ColWidthDefault" };

export type NativeColSpec = [NativeAlignment, NativeColWidth];

export type NativeListNumberStyle =
	| "DefaultStyle"
	| "Example"
	| "Decimal"
	| "LowerRoman"
	| "UpperRoman"
	| "LowerAlpha"
	| "UpperAlpha";

export type NativeListNumberDelim = "DefaultDelim" | "Period" | "OneParen" | "TwoParens";

export type NativeListAttributes = [
	number,
	{ t: NativeListNumberStyle },
	{ t: NativeListNumberDelim },
];

export type NativeCitationMode = "AuthorInText" | "SuppressAuthor" | "NormalCitation";

export interface NativeCitation {
	citationId: string;
	citationPrefix: Array<NativeInline>;
	citationSuffix: Array<NativeInline>;
	citationMode: { t: NativeCitationMode };
	citationNoteNum: number;
	citationHash: number;
}

export type NativeInline =
	| { t: "Str"; c: string }
	| { t: "Emph"; c: Array<NativeInline> }
	| { t: "Underline"; c: Array<NativeInline> }
	| { t: "Strong"; c: Array<NativeInline> }
	| { t: "Strikeout"; c: Array<NativeInline> }
	| { t: "Superscript"; c: Array<NativeInline> }
	| { t: "Subscript"; c: Array<NativeInline> }
	| { t: "SmallCaps"; c: Array<NativeInline> }
	| {
			t: "Quoted";
			c: [{ t: "SingleQuote" | "DoubleQuote" }, Array<NativeInline>];
	  }
	| { t: "Cite"; c: [Array<NativeCitation>, Array<NativeInline>] }
	| { t: "Code"; c: [NativeAttr, string] }
	| { t: "Space" }
	| { t: "SoftBreak" }
	| { t: "LineBreak" }
	| { t: "Math"; c: [{ t: "DisplayMath" | "InlineMath" }, string] }
	| { t: "RawInline"; c: [string, string] }
	| { t: "Link"; c: [NativeAttr, Array<NativeInline>, [string, string]] }
	| { t: "Image"; c: [NativeAttr, Array<NativeInline>, [string, string]] }
	| { t: "Note"; c: Array<NativeBlock> }
	| { t: "Span"; c: [NativeAttr, Array<NativeInline>] };

export type NativeCell = [NativeAttr, NativeAlignment, number, number, Array<NativeBlock>];
export type NativeRow = [NativeAttr, Array<NativeCell>];
export type NativeTableHead = [NativeAttr, Array<NativeRow>];
export type NativeTableBody = [NativeAttr, number, Array<NativeRow>, Array<NativeRow>];
export type NativeTableFoot = [NativeAttr, Array<NativeRow>];
export type NativeDefinition = [Array<NativeInline>, Array<Array<NativeBlock>>];
export type NativeCaption = [Array<NativeInline> | null, Array<NativeBlock>];

export type NativeBlock =
	| { t: "Plain"; c: Array<NativeInline> }
	| { t: "Para"; c: Array<NativeInline> }
	| { t: "LineBlock"; c: Array<Array<NativeInline>> }
	| { t: "CodeBlock"; c: [NativeAttr, string] }
	| { t: "RawBlock"; c: [string, string] }
	| { t: "BlockQuote"; c: Array<NativeBlock> }
	| { t: "OrderedList"; c: [NativeListAttributes, Array<Array<NativeBlock>>] }
	| { t: "BulletList"; c: Array<Array<NativeBlock>> }
	| { t: "DefinitionList"; c: Array<NativeDefinition> }
	| { t: "Header"; c: [number, NativeAttr, Array<NativeInline>] }
	| { t: "HorizontalRule" }
	| {
			t: "Table";
			c: [
				NativeAttr,
				NativeCaption,
				Array<NativeColSpec>,
				NativeTableHead,
				Array<NativeTableBody>,
				NativeTableFoot,
			];
	  }
	| { t: "Figure"; c: [NativeAttr, NativeCaption, Array<NativeBlock>] }
	| { t: "Div"; c: [NativeAttr, Array<NativeBlock>] };

export type NativeMetaValue =
	| { t: "MetaMap"; c: Record<string, NativeMetaValue> }
	| { t: "MetaList"; c: Array<NativeMetaValue> }
	| { t: "MetaBool"; c: boolean }
	| { t: "MetaString"; c: string }
	| { t: "MetaInlines"; c: Array<NativeInline> }
	| { t: "MetaBlocks"; c: Array<NativeBlock> };

export interface NativeDocument {
	"pandoc-api-version": Array<number>;
	meta: Record<string, NativeMetaValue>;
	blocks: Array<NativeBlock>;
}

const attrSchema = z.tuple([
	z.string(),
	z.array(z.string()),
	z.array(z.tuple([z.string(), z.string()])),
]);

const alignmentSchema = z.object({
	t: z.enum(["AlignLeft", "AlignRight", "AlignCenter", "AlignDefault"]),
});

const colWidthSchema = z.discriminatedUnion("t", [
	z.object({ t: z.literal("ColWidth"), c: z.number() }),
	z.object({ t: z.literal("ColWidthDefault") }),
]);

const targetSchema = z.tuple([z.string(), z.string()]);

export const nativeInlineSchema: z.ZodType<NativeInline> = z.lazy(() =>
	z.discriminatedUnion("t", [
		z.object({ t: z.literal("Str"), c: z.string() }),
		z.object({ t: z.literal("Emph"), c: z.array(nativeInlineSchema) }),
		z.object({ t: z.literal("Underline"), c: z.array(nativeInlineSchema) }),
		z.object({ t: z.literal("Strong"), c: z.array(nativeInlineSchema) }),
		z.object({ t: z.literal("Strikeout"), c: z.array(nativeInlineSchema) }),
		z.object({ t: z.literal("Superscript"), c: z.array(nativeInlineSchema) }),
		z.object({ t: z.literal("Subscript"), c: z.array(nativeInlineSchema) }),
		z.object({ t: z.literal("SmallCaps"), c: z.array(nativeInlineSchema) }),
		z.object({
			t: z.literal("Quoted"),
			c: z.tuple([
				z.object({ t: z.enum(["SingleQuote", "DoubleQuote"]) }),
				z.array(nativeInlineSchema),
			]),
		}),
		z.object({
			t: z.literal("Cite"),
			c: z.tuple([z.array(citationSchema), z.array(nativeInlineSchema)]),
		}),
		z.object({ t: z.literal("Code"), c: z.tuple([attrSchema, z.string()]) }),
		z.object({ t: z.literal("Space") }),
		z.object({ t: z.literal("SoftBreak") }),
		z.object({ t: z.literal("LineBreak") }),
		z.object({
			t: z.literal("Math"),
			c: z.tuple([z.object({ t: z.enum(["DisplayMath", "InlineMath"]) }), z.string()]),
		}),
		z.object({ t: z.literal("RawInline"), c: z.tuple([z.string(), z.string()]) }),
		z.object({
			t: z.literal("Link"),
			c: z.tuple([attrSchema, z.array(nativeInlineSchema), targetSchema]),
		}),
		z.object({
			t: z.literal("Image"),
			c: z.tuple([attrSchema, z.array(nativeInlineSchema), targetSchema]),
		}),
		z.object({ t: z.literal("Note"), c: z.array(nativeBlockSchema) }),
		z.object({
			t: z.literal("Span"),
			c: z.tuple([attrSchema, z.array(nativeInlineSchema)]),
		}),
	]),
);

const citationSchema: z.ZodType<NativeCitation> = z.lazy(() =>
	z.object({
		citationId: z.string(),
		citationPrefix: z.array(nativeInlineSchema),
		citationSuffix: z.array(nativeInlineSchema),
		citationMode: z.object({
			t: z.enum(["AuthorInText", "SuppressAuthor", "NormalCitation"]),
		}),
		citationNoteNum: z.number().int(),
		citationHash: z.number().int(),
	}),
);

const rowSchema: z.ZodType<NativeRow> = z.lazy(() =>
	z.tuple([
		attrSchema,
		z.array(
			z.tuple([
				attrSchema,
				alignmentSchema,
				z.number().int().positive(),
				z.number().int().positive(),
				z.array(nativeBlockSchema),
			]),
		),
	]),
);

const captionSchema: z.ZodType<NativeCaption> = z.lazy(() =>
	z.tuple([z.array(nativeInlineSchema).nullable(), z.array(nativeBlockSchema)]),
);

export const nativeBlockSchema: z.ZodType<NativeBlock> = z.lazy(() =>
	z.discriminatedUnion("t", [
		z.object({ t: z.literal("Plain"), c: z.array(nativeInlineSchema) }),
		z.object({ t: z.literal("Para"), c: z.array(nativeInlineSchema) }),
		z.object({ t: z.literal("LineBlock"), c: z.array(z.array(nativeInlineSchema)) }),
		z.object({ t: z.literal("CodeBlock"), c: z.tuple([attrSchema, z.string()]) }),
		z.object({ t: z.literal("RawBlock"), c: z.tuple([z.string(), z.string()]) }),
		z.object({ t: z.literal("BlockQuote"), c: z.array(nativeBlockSchema) }),
		z.object({
			t: z.literal("OrderedList"),
			c: z.tuple([
				z.tuple([
					z.number().int(),
					z.object({
						t: z.enum([
							"DefaultStyle",
							"Example",
							"Decimal",
							"LowerRoman",
							"UpperRoman",
							"LowerAlpha",
							"UpperAlpha",
						]),
					}),
					z.object({ t: z.enum(["DefaultDelim", "Period", "OneParen", "TwoParens"]) }),
				]),
				z.array(z.array(nativeBlockSchema)),
			]),
		}),
		z.object({ t: z.literal("BulletList"), c: z.array(z.array(nativeBlockSchema)) }),
		z.object({
			t: z.literal("DefinitionList"),
			c: z.array(
				z.tuple([z.array(nativeInlineSchema), z.array(z.array(nativeBlockSchema))]),
			),
		}),
		z.object({
			t: z.literal("Header"),
			c: z.tuple([z.number().int().min(1), attrSchema, z.array(nativeInlineSchema)]),
		}),
		z.object({ t: z.literal("HorizontalRule") }),
		z.object({
			t: z.literal("Table"),
			c: z.tuple([
				attrSchema,
				captionSchema,
				z.array(z.tuple([alignmentSchema, colWidthSchema])),
				z.tuple([attrSchema, z.array(rowSchema)]),
				z.array(
					z.tuple([
						attrSchema,
						z.number().int().nonnegative(),
						z.array(rowSchema),
						z.array(rowSchema),
					]),
				),
				z.tuple([attrSchema, z.array(rowSchema)]),
			]),
		}),
		z.object({
			t: z.literal("Figure"),
			c: z.tuple([attrSchema, captionSchema, z.array(nativeBlockSchema)]),
		}),
		z.object({ t: z.literal("Div"), c: z.tuple([attrSchema, z.array(nativeBlockSchema)]) }),
	]),
);

export const nativeMetaValueSchema: z.ZodType<NativeMetaValue> = z.lazy(() =>
	z.discriminatedUnion("t", [
		z.object({ t: z.literal("MetaMap"), c: z.record(z.string(), nativeMetaValueSchema) }),
		z.object({ t: z.literal("MetaList"), c: z.array(nativeMetaValueSchema) }),
		z.object({ t: z.literal("MetaBool"), c: z.boolean() }),
		z.object({ t: z.literal("MetaString"), c: z.string() }),
		z.object({ t: z.literal("MetaInlines"), c: z.array(nativeInlineSchema) }),
		z.object({ t: z.literal("MetaBlocks"), c: z.array(nativeBlockSchema) }),
	]),
);

export const nativeDocumentSchema = z.object({
	"pandoc-api-version": z.array(z.number().int().nonnegative()).min(2),
	meta: z.record(z.string(), nativeMetaValueSchema),
	blocks: z.array(nativeBlockSchema),
});
