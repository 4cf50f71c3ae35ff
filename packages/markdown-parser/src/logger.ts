import debug from "debug";

const namespace = "doctree";

export const blockLogger = debug(`${namespace}:block`);
export const inlineLogger = debug(`${namespace}:inline`);

export function createLogger(name: string): debug.Debugger {
	return debug(`${namespace}:${name}`);
}
