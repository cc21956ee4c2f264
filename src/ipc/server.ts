import { promises as fs } from "node:fs";
import * as net from "node:net";
import * as path from "node:path";
import type { ApprovalQueue } from "../services/approval-queue.ts";
import type { EmailPayload } from "../types.ts";
import { debug, error, errorMessage, info } from "../utils.ts";
import {
	INVALID_REQUEST,
	type IpcResponse,
	MessageTooLargeError,
	REQUEST_TOO_LARGE,
	UNKNOWN_ACTION,
	decodeRequest,
	queueEmailSchema,
	readMessage,
	responseFor,
} from "./protocol.ts";

export interface IpcServerOptions {
	socketPath: string;
	queue: ApprovalQueue<EmailPayload>;
}

/**
 * Owner-only Unix socket in front of the approval queue. Each connection
 * carries one request and one response; `queue_email` holds its connection
 * open until the approval settles.
 */
export class IpcServer {
	readonly socketPath: string;
	private queue: ApprovalQueue<EmailPayload>;
	private server: net.Server | undefined;
	private connections = new Set<net.Socket>();

	constructor(options: IpcServerOptions) {
		this.socketPath = options.socketPath;
		this.queue = options.queue;
	}

	async listen(): Promise<void> {
		await fs.mkdir(path.dirname(this.socketPath), {
			recursive: true,
			mode: 0o700,
		});
		await fs.rm(this.socketPath, { force: true });

		const server = net.createServer({ allowHalfOpen: true }, (socket) => {
			this.connections.add(socket);
			socket.once("close", () => this.connections.delete(socket));
			this.handleConnection(socket).catch((err) => {
				error("IPC connection failed", { error: errorMessage(err) });
				socket.destroy();
			});
		});

		await new Promise<void>((resolve, reject) => {
			server.once("error", reject);
			server.listen(this.socketPath, () => {
				server.off("error", reject);
				resolve();
			});
		});
		server.on("error", (err) => {
			error("IPC server error", { error: errorMessage(err) });
		});

		try {
			await fs.chmod(this.socketPath, 0o600);
		} catch (err) {
			server.close();
			throw err;
		}

		this.server = server;
		info("IPC server listening", { socket: this.socketPath });
	}

	async close(): Promise<void> {
		const server = this.server;
		if (!server) return;
		this.server = undefined;

		// Blocked requesters get no answer; they treat that as "do not proceed"
		for (const socket of this.connections) socket.destroy();
		await new Promise<void>((resolve) => server.close(() => resolve()));
		await fs.rm(this.socketPath, { force: true });
		debug("IPC server closed", { socket: this.socketPath });
	}

	async handleRequest(line: string): Promise<IpcResponse> {
		const request = decodeRequest(line);
		if (!request) {
			return INVALID_REQUEST;
		}

		switch (request.action) {
			case "queue_email": {
				const email = queueEmailSchema.safeParse(request);
				if (!email.success) {
					return INVALID_REQUEST;
				}
				info("Email queued for approval", {
					action: "queue_email",
					to: email.data.to,
					subject: email.data.subject,
				});
				const outcome = await this.queue.enqueue({
					to: email.data.to,
					subject: email.data.subject,
					body: email.data.body,
					draftId: email.data.draft_id,
				});
				return responseFor(outcome);
			}
			case "status":
				return { success: true, status: "running" };
			default:
				debug("Unknown IPC action", { action: request.action });
				return UNKNOWN_ACTION;
		}
	}

	private async handleConnection(socket: net.Socket) {
		socket.on("error", (err) => {
			debug("IPC socket error", { error: errorMessage(err) });
		});

		let response: IpcResponse;
		try {
			response = await this.handleRequest(await readMessage(socket));
		} catch (err) {
			debug("Unreadable IPC request", { error: errorMessage(err) });
			response =
				err instanceof MessageTooLargeError ? REQUEST_TOO_LARGE : INVALID_REQUEST;
		}

		if (socket.destroyed || !socket.writable) {
			debug("Requester disconnected before the response", { response });
			return;
		}
		socket.end(`${JSON.stringify(response)}\n`);
	}
}
