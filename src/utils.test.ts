import {
	type MockInstance,
	afterEach,
	beforeEach,
	describe,
	expect,
	it,
	vi,
} from "vitest";
import { env } from "./env.ts";
import {
	debug,
	error,
	errorMessage,
	info,
	randomHex,
	randomString,
	safeEqual,
	truncate,
	warn,
} from "./utils.ts";

describe("utils", () => {
	describe("debug", () => {
		const initial = env.OUTBOX_DEBUG;

		afterEach(() => {
			env.OUTBOX_DEBUG = initial;
			vi.restoreAllMocks();
		});

		it("should call console.error with provided arguments when enabled", () => {
			env.OUTBOX_DEBUG = true;
			const consoleSpy = vi
				.spyOn(console, "error")
				.mockImplementation(() => {});

			debug("test message", { data: "value" }, 123);

			expect(consoleSpy).toHaveBeenCalledWith(
				"test message",
				{ data: "value" },
				123,
			);
		});

		it("should stay silent when disabled", () => {
			env.OUTBOX_DEBUG = false;
			const consoleSpy = vi
				.spyOn(console, "error")
				.mockImplementation(() => {});

			debug("test message");

			expect(consoleSpy).not.toHaveBeenCalled();
		});
	});

	describe("info, warn and error", () => {
		let consoleSpy: MockInstance<typeof console.error>;

		beforeEach(() => {
			consoleSpy = vi.spyOn(console, "error").mockImplementation(() => {});
		});

		afterEach(() => {
			vi.restoreAllMocks();
		});

		it("should prefix the timestamp and level", () => {
			info("Daemon started");
			warn("Broker poll failed");
			error("Daemon failed");

			const lines = consoleSpy.mock.calls.map((call) => call[0]);
			expect(lines).toHaveLength(3);
			expect(lines[0]).toMatch(
				/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z \[INFO\] Daemon started$/,
			);
			expect(lines[1]).toMatch(/ \[WARN\] Broker poll failed$/);
			expect(lines[2]).toMatch(/ \[ERROR\] Daemon failed$/);
		});

		it("should pass context as a separate argument", () => {
			info("Approval queued", { requestId: "req-1" });

			expect(consoleSpy).toHaveBeenCalledWith(
				expect.stringMatching(/\[INFO\] Approval queued$/),
				{ requestId: "req-1" },
			);
		});
	});

	describe("errorMessage", () => {
		it("should read messages from errors and stringify anything else", () => {
			expect(errorMessage(new Error("boom"))).toBe("boom");
			expect(errorMessage("plain")).toBe("plain");
			expect(errorMessage(42)).toBe("42");
		});
	});

	describe("randomString", () => {
		it("should return URL-safe strings of the requested length", () => {
			const value = randomString(32);

			expect(value).toMatch(/^[A-Za-z0-9_-]{32}$/);
			expect(randomString(11)).toHaveLength(11);
			expect(randomString(32)).not.toBe(value);
		});
	});

	describe("randomHex", () => {
		it("should encode the requested number of bytes", () => {
			expect(randomHex(16)).toMatch(/^[0-9a-f]{32}$/);
		});
	});

	describe("safeEqual", () => {
		it("should compare exact strings", () => {
			expect(safeEqual("abc", "abc")).toBe(true);
			expect(safeEqual("abc", "abd")).toBe(false);
			expect(safeEqual("abc", "ab")).toBe(false);
			expect(safeEqual("", "")).toBe(true);
		});
	});

	describe("truncate", () => {
		it("should cut long text and mark the cut", () => {
			expect(truncate("hello world", 5)).toBe("hello...");
			expect(truncate("hello", 5)).toBe("hello");
		});
	});
});
