import { promises as fs } from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import {
	type Mock,
	afterEach,
	beforeEach,
	describe,
	expect,
	it,
	vi,
} from "vitest";
import { NtfyClient } from "../services/ntfy.ts";
import { type BootstrapConfig, ConfigStore } from "../storage.ts";
import { createSetupRouter } from "./setup.ts";

const config: BootstrapConfig = {
	ntfyTopic: "outbox-guard-test",
	signingSecret: "test-secret",
	setupComplete: false,
};

describe("Setup API", () => {
	let testDir: string;
	let store: ConfigStore;
	let fetch: Mock<typeof globalThis.fetch>;
	let onComplete: Mock<(config: BootstrapConfig) => void>;
	let app: ReturnType<typeof createSetupRouter>;

	beforeEach(async () => {
		vi.spyOn(console, "error").mockImplementation(() => {});
		testDir = await fs.mkdtemp(path.join(os.tmpdir(), "outbox-setup-"));
		store = new ConfigStore(testDir);
		fetch = vi.fn<typeof globalThis.fetch>();
		onComplete = vi.fn<(config: BootstrapConfig) => void>();
		app = createSetupRouter({
			config,
			store,
			ntfy: new NtfyClient({ baseUrl: "https://ntfy.test", fetch }),
			onComplete,
		});
	});

	afterEach(async () => {
		await fs.rm(testDir, { recursive: true, force: true });
		vi.restoreAllMocks();
	});

	describe("GET /", () => {
		it("should show the topic and its subscribe URL", async () => {
			const res = await app.request("/");
			const html = await res.text();

			expect(res.status).toBe(200);
			expect(html).toContain('<div class="topic">outbox-guard-test</div>');
			expect(html).toContain('href="https://ntfy.test/outbox-guard-test"');
		});
	});

	describe("POST /test", () => {
		it("should send a test notification to the topic", async () => {
			fetch.mockResolvedValueOnce(new Response("{}", { status: 200 }));

			const res = await app.request("/test", { method: "POST" });

			expect(await res.json()).toEqual({ success: true });
			const [, init] = fetch.mock.calls[0];
			expect(JSON.parse(String(init?.body))).toEqual({
				topic: "outbox-guard-test",
				title: "Test Notification",
				message: "If you see this, setup is working!",
			});
		});

		it("should report broker failures", async () => {
			fetch.mockResolvedValueOnce(new Response("slow down", { status: 429 }));

			const res = await app.request("/test", { method: "POST" });

			expect(await res.json()).toEqual({
				success: false,
				error: "ntfy returned status 429: slow down",
			});
		});
	});

	describe("POST /complete", () => {
		it("should persist the completed config and hand it over", async () => {
			const res = await app.request("/complete", { method: "POST" });

			expect(await res.json()).toEqual({ success: true });
			const completed = { ...config, setupComplete: true };
			expect(onComplete).toHaveBeenCalledWith(completed);
			await expect(store.load()).resolves.toEqual(completed);
		});

		it("should fail when the config cannot be written", async () => {
			// A regular file where the config directory should be
			const blocked = path.join(testDir, "blocked");
			await fs.writeFile(blocked, "");
			const failing = createSetupRouter({
				config,
				store: new ConfigStore(blocked),
				ntfy: new NtfyClient({ baseUrl: "https://ntfy.test", fetch }),
				onComplete,
			});

			const res = await failing.request("/complete", { method: "POST" });

			expect(res.status).toBe(500);
			expect(await res.json()).toEqual({
				success: false,
				error: "failed to save config",
			});
			expect(onComplete).not.toHaveBeenCalled();
		});
	});
});
