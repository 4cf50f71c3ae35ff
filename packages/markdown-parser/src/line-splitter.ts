/**
 * Splits text into lines on LF, CRLF and CR. Text may arrive in chunks: a line that is not yet terminated is held back
 * until a later chunk ends it, or until `flush` is called.
 *
 * NUL characters are replaced with U+FFFD.
 *
 * @example
 * ```ts
 * const splitter = new LineSplitter();
 * splitter.push("Hello\r");  // ["Hello"]
 * splitter.push("\nWorld");  // []
 * splitter.flush();          // ["World"]
 * ```
 */
export class LineSplitter {
	#partialLine = "";
	// The previous chunk ended with "\r"; a "\n" at the start of the next one belongs to the same line ending.
	#hasPendingCR = false;

	/**
	 * Splits a whole text at once. A trailing line ending does not produce an extra empty line.
	 */
	static split(text: string): string[] {
		const splitter = new LineSplitter();
		return [...splitter.push(text), ...splitter.flush()];
	}

	push(chunk: string): string[] {
		const lines: string[] = [];
		let lineStartIndex = 0;

		if (this.#hasPendingCR) {
			if (chunk.charAt(0) === "\n") lineStartIndex = 1;
			this.#hasPendingCR = false;
		}

		for (let i = lineStartIndex; i < chunk.length; i++) {
			const character = chunk.charAt(i);
			if (character !== "\n" && character !== "\r") continue;

			lines.push(this.#takeLine(chunk.slice(lineStartIndex, i)));

			if (character === "\r") {
				if (i + 1 < chunk.length) {
					if (chunk.charAt(i + 1) === "\n") i++;
				} else {
					this.#hasPendingCR = true;
				}
			}
			lineStartIndex = i + 1;
		}

		this.#partialLine += chunk.slice(lineStartIndex);
		return lines;
	}

	/**
	 * Returns the unterminated last line, if there is one.
	 */
	flush(): string[] {
		this.#hasPendingCR = false;
		if (this.#partialLine.length === 0) return [];
		return [this.#takeLine("")];
	}

	#takeLine(tail: string): string {
		const line = (this.#partialLine + tail).replace(/\0/g, "�");
		this.#partialLine = "";
		return line;
	}
}
