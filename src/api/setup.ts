import { Hono } from "hono";
import { renderPage } from "../pages/render.ts";
import type { NtfyClient } from "../services/ntfy.ts";
import type { BootstrapConfig, ConfigStore } from "../storage.ts";
import { error, errorMessage, info } from "../utils.ts";

interface SetupRouterOptions {
	config: BootstrapConfig;
	store: ConfigStore;
	ntfy: NtfyClient;
	onComplete: (config: BootstrapConfig) => void;
}

export function createSetupRouter(options: SetupRouterOptions) {
	const { config, store, ntfy, onComplete } = options;
	const app = new Hono();

	app.get("/", (c) =>
		c.html(
			renderPage("setup", {
				topic: config.ntfyTopic,
				subscribeUrl: ntfy.topicUrl(config.ntfyTopic),
			}),
		),
	);

	app.post("/test", async (c) => {
		try {
			await ntfy.notify(
				config.ntfyTopic,
				"Test Notification",
				"If you see this, setup is working!",
			);
		} catch (err) {
			return c.json({ success: false, error: errorMessage(err) });
		}
		return c.json({ success: true });
	});

	app.post("/complete", async (c) => {
		const completed = { ...config, setupComplete: true };
		try {
			await store.save(completed);
		} catch (err) {
			error("Failed to save config", { error: errorMessage(err) });
			return c.json({ success: false, error: "failed to save config" }, 500);
		}
		info("Setup completed", { topic: completed.ntfyTopic });
		onComplete(completed);
		return c.json({ success: true });
	});

	return app;
}
