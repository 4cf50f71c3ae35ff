import { createLogger } from "@doctree/markdown-parser";

export const writerLogger = createLogger("writer");
