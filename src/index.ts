#!/usr/bin/env tsx

import { VERSION } from "./constants.ts";
import { env, requireEnv } from "./env.ts";
import { sendToDaemon } from "./ipc/client.ts";
import { socketPathFor } from "./ipc/protocol.ts";
import { McpServer } from "./mcp.ts";
import { GmailDrafts } from "./services/gmail.ts";
import { error, errorMessage, info } from "./utils.ts";

async function main() {
	info("Application starting", {
		version: process.env.npm_package_version || VERSION,
		node: process.version,
	});

	const socketPath = socketPathFor(env.OUTBOX_CONFIG_DIR);
	const server = new McpServer({
		drafts: new GmailDrafts({ accessToken: requireEnv("GMAIL_ACCESS_TOKEN") }),
		requestApproval: (request) => sendToDaemon(request, { socketPath }),
	});

	// Handle graceful shutdown
	const shutdownSignals = ["SIGINT", "SIGTERM"];
	for (const signal of shutdownSignals) {
		process.on(signal, async () => {
			info("Graceful shutdown initiated", { signal });
			try {
				await server.shutdown();
				info("Graceful shutdown completed");
				process.exit(0);
			} catch (err) {
				error("Error during shutdown", { error: errorMessage(err) });
				process.exit(1);
			}
		});
	}

	try {
		await server.start();
		info("Application ready to receive requests");
	} catch (err) {
		error("Server failed to start", { error: errorMessage(err) });
		await server.shutdown();
		process.exitCode = 1;
	}
}

main().catch((err) => {
	error("Server failed to start", { error: errorMessage(err) });
	process.exit(1);
});
