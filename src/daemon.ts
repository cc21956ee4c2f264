import { type Server, createServer } from "node:http";
import { getRequestListener } from "@hono/node-server";
import { createDashboardRouter } from "./api/dashboard.ts";
import type { Clock } from "./clock.ts";
import { DashboardSession } from "./dashboard/session.ts";
import { IpcServer } from "./ipc/server.ts";
import { ApprovalQueue } from "./services/approval-queue.ts";
import { BrokerPoller } from "./services/broker-poller.ts";
import type { NtfyClient } from "./services/ntfy.ts";
import { NtfyApprovalNotifier } from "./services/ntfy-notifier.ts";
import type { BootstrapConfig } from "./storage.ts";
import type { EmailPayload } from "./types.ts";
import { debug, error, errorMessage, info } from "./utils.ts";

export interface ApprovalDaemonOptions {
	config: BootstrapConfig;
	ntfy: NtfyClient;
	socketPath: string;
	dashboardPort: number;
	clock?: Clock;
}

/**
 * Owns the single approval queue and hands it to each front-end: the IPC
 * endpoint for requesters, the broker poller and the dashboard for humans.
 */
export class ApprovalDaemon {
	readonly queue: ApprovalQueue<EmailPayload>;
	readonly session: DashboardSession;
	private ipc: IpcServer;
	private poller: BrokerPoller<EmailPayload>;
	private dashboardPort: number;
	private dashboard: Server | undefined;
	private clock: Clock | undefined;
	private isShuttingDown = false;

	constructor(options: ApprovalDaemonOptions) {
		const { config, ntfy } = options;
		this.clock = options.clock;
		this.queue = new ApprovalQueue({
			notifier: new NtfyApprovalNotifier(ntfy, config.ntfyTopic),
			clock: options.clock,
		});
		this.poller = new BrokerPoller({
			client: ntfy,
			topic: config.ntfyTopic,
			queue: this.queue,
			clock: options.clock,
		});
		this.ipc = new IpcServer({
			socketPath: options.socketPath,
			queue: this.queue,
		});
		this.session = new DashboardSession(this.queue, undefined, options.clock);
		this.dashboardPort = options.dashboardPort;
	}

	get dashboardUrl() {
		return `http://localhost:${this.dashboardPort}/outbox/${this.session.id}`;
	}

	async start() {
		await this.ipc.listen();
		this.poller.start();
		await this.startDashboard();
	}

	async shutdown() {
		if (this.isShuttingDown) {
			return;
		}
		this.isShuttingDown = true;

		debug("Stopping broker poller...");
		this.poller.stop();
		this.session.close();

		debug("Closing IPC server...");
		await this.ipc.close();

		const dashboard = this.dashboard;
		this.dashboard = undefined;
		if (dashboard) {
			debug("Closing dashboard...");
			// Event streams never end on their own
			dashboard.closeAllConnections();
			await new Promise<void>((resolve) => {
				dashboard.close((err) => {
					if (err) error("Error closing dashboard", { error: errorMessage(err) });
					resolve();
				});
			});
		}
	}

	private async startDashboard() {
		const app = createDashboardRouter({
			session: this.session,
			queue: this.queue,
			clock: this.clock,
		});
		const server = createServer(getRequestListener(app.fetch));
		await new Promise<void>((resolve, reject) => {
			server.once("error", reject);
			server.listen(this.dashboardPort, "127.0.0.1", () => {
				server.off("error", reject);
				resolve();
			});
		});
		const address = server.address();
		if (address != null && typeof address === "object") {
			this.dashboardPort = address.port;
		}
		this.dashboard = server;
		info("Dashboard listening", { url: this.dashboardUrl });
	}
}
