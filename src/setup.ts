import { createServer } from "node:http";
import { getRequestListener } from "@hono/node-server";
import { createSetupRouter } from "./api/setup.ts";
import type { NtfyClient } from "./services/ntfy.ts";
import type { BootstrapConfig, ConfigStore } from "./storage.ts";
import { info } from "./utils.ts";

/**
 * Serves the one-shot setup page on an ephemeral loopback port and resolves
 * with the completed config once the user finishes it.
 */
export async function runSetup(options: {
	config: BootstrapConfig;
	store: ConfigStore;
	ntfy: NtfyClient;
}): Promise<BootstrapConfig> {
	let complete: (config: BootstrapConfig) => void = () => {};
	const completed = new Promise<BootstrapConfig>((resolve) => {
		complete = resolve;
	});

	const app = createSetupRouter({ ...options, onComplete: complete });
	const server = createServer(getRequestListener(app.fetch));
	await new Promise<void>((resolve, reject) => {
		server.once("error", reject);
		server.listen(0, "127.0.0.1", () => {
			server.off("error", reject);
			resolve();
		});
	});
	const address = server.address();
	if (address != null && typeof address === "object") {
		info("Open this URL to complete setup", {
			url: `http://127.0.0.1:${address.port}`,
		});
	}

	const config = await completed;
	server.closeAllConnections();
	await new Promise<void>((resolve, reject) => {
		server.close((err) => (err ? reject(err) : resolve()));
	});
	return config;
}
