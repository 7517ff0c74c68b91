import { afterEach, describe, expect, it, vi } from "vitest";
import { consoleLogger, hexdump } from "../logger.js";

describe("consoleLogger", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it.skipIf(process.env.UNITYFS_DEBUG === "1")("does not build deferred debug messages while debug output is off", () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => {});
		const message = vi.fn(() => "expensive");
		consoleLogger.debug(message);
		expect(message).not.toHaveBeenCalled();
		expect(log).not.toHaveBeenCalled();
	});

	it("prefixes warnings", () => {
		const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
		consoleLogger.warn("short block");
		expect(warn).toHaveBeenCalledWith("Warning: short block");
	});
});

describe("hexdump", () => {
	it("prints 16 bytes per line up to the limit", () => {
		const data = Uint8Array.from({ length: 20 }, (_, i) => i);
		expect(hexdump(data, 18)).toBe("00 01 02 03 04 05 06 07 08 09 0A 0B 0C 0D 0E 0F\n10 11");
	});
});
