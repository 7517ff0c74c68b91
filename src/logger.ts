/** A callback is only evaluated when debug output is enabled. */
export type LogMessage = string | (() => string);

export interface Logger {
	info(msg: string): void;
	warn(msg: string): void;
	debug(msg: LogMessage): void;
}

const debugEnabled = process.env.UNITYFS_DEBUG === "1";

export const consoleLogger: Logger = {
	info: (msg) => console.log(msg),
	warn: (msg) => console.warn(`Warning: ${msg}`),
	debug: (msg) => {
		if (debugEnabled) console.log(`[debug] ${typeof msg === "function" ? msg() : msg}`);
	}
};

export const silentLogger: Logger = {
	info: () => {},
	warn: () => {},
	debug: () => {}
};

/** Hex dump of the first `maxBytes` bytes, 16 per line. */
export function hexdump(data: Uint8Array, maxBytes = 64): string {
	const lines: string[] = [];
	const end = Math.min(data.length, maxBytes);
	for (let i = 0; i < end; i += 16) {
		const row: string[] = [];
		for (let j = i; j < Math.min(i + 16, end); j++) {
			row.push(data[j].toString(16).toUpperCase().padStart(2, "0"));
		}
		lines.push(row.join(" "));
	}
	return lines.join("\n");
}
