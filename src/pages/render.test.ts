import { describe, expect, it } from "vitest";
import { escapeHtml, renderPage } from "./render.ts";

describe("render", () => {
	describe("escapeHtml", () => {
		it("should escape markup characters", () => {
			expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
				"&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;",
			);
		});
	});

	describe("renderPage", () => {
		it("should fill the setup page placeholders", () => {
			const html = renderPage("setup", {
				topic: "outbox-guard-abc",
				subscribeUrl: "https://ntfy.test/outbox-guard-abc",
			});

			expect(html).toContain('<div class="topic">outbox-guard-abc</div>');
			expect(html).toContain(
				'<a href="https://ntfy.test/outbox-guard-abc" target="_blank">https://ntfy.test/outbox-guard-abc</a>',
			);
			expect(html).not.toContain("{{");
		});

		it("should escape values and blank out missing ones", () => {
			const html = renderPage("setup", { topic: "<script>" });

			expect(html).toContain('<div class="topic">&lt;script&gt;</div>');
			expect(html).toContain('<a href="" target="_blank"></a>');
		});

		it("should bind the dashboard to its session", () => {
			const html = renderPage("dashboard", { sessionId: "test-session" });

			expect(html).toContain('const sessionId = "test-session";');
		});
	});
});
