import { describe, expect, it, vi } from "vitest";
import { loadClientOptions, parseClientOptions } from "../src/config.js";
import { createConsoleLogger } from "../src/logger.js";

describe("loadClientOptions", () => {
	it("should leave everything unset by default", () => {
		expect(loadClientOptions({})).toEqual({
			readTimeout: undefined,
			settleTime: undefined,
			forceRgba: undefined,
			debug: undefined,
		});
	});

	it("should read timeouts and flags", () => {
		const options = loadClientOptions({
			RFB_READ_TIMEOUT: "5000",
			RFB_SETTLE_TIME: "0",
			RFB_FORCE_RGBA: "true",
			RFB_DEBUG: "0",
		});

		expect(options).toEqual({ readTimeout: 5000, settleTime: 0, forceRgba: true, debug: false });
	});

	it("should treat empty variables as unset", () => {
		expect(loadClientOptions({ RFB_READ_TIMEOUT: "", RFB_DEBUG: "" }).readTimeout).toBeUndefined();
	});

	it("should name the variable that fails validation", () => {
		expect(() => loadClientOptions({ RFB_READ_TIMEOUT: "soon" })).toThrow(
			"Invalid RFB_READ_TIMEOUT: expected a whole number of milliseconds",
		);
		expect(() => loadClientOptions({ RFB_DEBUG: "yes" })).toThrow(/^Invalid RFB_DEBUG: /);
	});
});

describe("parseClientOptions", () => {
	it("should pass valid options and the logger through", () => {
		const logger = createConsoleLogger();
		expect(parseClientOptions({ readTimeout: 10, logger })).toEqual({ readTimeout: 10, logger });
	});

	it("should reject negative or fractional timeouts", () => {
		expect(() => parseClientOptions({ readTimeout: -1 })).toThrow();
		expect(() => parseClientOptions({ settleTime: 1.5 })).toThrow();
	});
});

describe("createConsoleLogger", () => {
	it("should write prefixed lines to stderr and hide debug output unless enabled", () => {
		const spy = vi.spyOn(console, "error").mockImplementation(() => {});
		try {
			const quiet = createConsoleLogger();
			quiet.debug("hidden");
			quiet.info("connected");
			quiet.warn("odd format");
			quiet.error("gone");
			createConsoleLogger(true).debug("shown");

			expect(spy.mock.calls).toEqual([
				["[rfb] connected"],
				["[rfb] warning: odd format"],
				["[rfb] error: gone"],
				["[rfb] shown"],
			]);
		} finally {
			spy.mockRestore();
		}
	});
});
