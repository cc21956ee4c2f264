#!/usr/bin/env tsx

import { parseArgs } from "node:util";
import { NAME, VERSION } from "./constants.ts";
import { ApprovalDaemon } from "./daemon.ts";
import { env } from "./env.ts";
import { DaemonUnreachableError, sendToDaemon } from "./ipc/client.ts";
import { socketPathFor } from "./ipc/protocol.ts";
import { NtfyClient } from "./services/ntfy.ts";
import { runSetup } from "./setup.ts";
import { ConfigStore } from "./storage.ts";
import { error, errorMessage, info } from "./utils.ts";

const socketPath = socketPathFor(env.OUTBOX_CONFIG_DIR);

async function showStatus() {
	try {
		const res = await sendToDaemon(
			{ action: "status" },
			{ socketPath, deadlineMs: 5000 },
		);
		console.log(`Status: ${res.status ?? res.error ?? "unknown"}`);
	} catch (err) {
		if (err instanceof DaemonUnreachableError) {
			console.log("Status: not running");
			process.exitCode = 1;
			return;
		}
		throw err;
	}
}

async function main() {
	const { values } = parseArgs({
		options: {
			reset: { type: "boolean", default: false },
			status: { type: "boolean", default: false },
		},
	});

	if (values.status) {
		await showStatus();
		return;
	}

	const store = new ConfigStore();
	if (values.reset) {
		await store.reset();
		info("Configuration reset. Setup will run now.");
	}

	info("Approval daemon starting", { name: NAME, version: VERSION });

	const ntfy = new NtfyClient({
		baseUrl: env.NTFY_BASE_URL,
		token: env.NTFY_TOKEN,
	});

	let config = await store.loadOrCreate();
	if (!config.setupComplete) {
		config = await runSetup({ config, store, ntfy });
	}

	const daemon = new ApprovalDaemon({
		config,
		ntfy,
		socketPath,
		dashboardPort: env.OUTBOX_DASHBOARD_PORT,
	});

	// Handle graceful shutdown
	const shutdownSignals = ["SIGINT", "SIGTERM"];
	for (const signal of shutdownSignals) {
		process.on(signal, async () => {
			info("Graceful shutdown initiated", { signal });
			try {
				await daemon.shutdown();
				info("Graceful shutdown completed");
				process.exit(0);
			} catch (err) {
				error("Error during shutdown", { error: errorMessage(err) });
				process.exit(1);
			}
		});
	}

	try {
		await daemon.start();
	} catch (err) {
		await daemon.shutdown();
		throw err;
	}

	info("Approval daemon running", {
		topic: config.ntfyTopic,
		socket: socketPath,
	});
	// The agent never sees this URL; only the person at this terminal does
	info("Review dashboard", { url: daemon.dashboardUrl });
}

main().catch((err) => {
	error("Daemon failed to start", { error: errorMessage(err) });
	process.exit(1);
});
