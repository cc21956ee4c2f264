import * as net from "node:net";
import { IPC_DEADLINE_MS } from "../constants.ts";
import { errorMessage } from "../utils.ts";
import {
	type IpcRequest,
	type IpcResponse,
	ipcResponseSchema,
	readMessage,
} from "./protocol.ts";

export class DaemonUnreachableError extends Error {
	constructor(socketPath: string) {
		super(
			`approval daemon not running (no socket at ${socketPath}). Start it with: npm run daemon`,
		);
		this.name = "DaemonUnreachableError";
	}
}

export class DaemonTimeoutError extends Error {
	constructor(deadlineMs: number) {
		super(`approval daemon did not answer within ${deadlineMs / 1000}s`);
		this.name = "DaemonTimeoutError";
	}
}

export interface SendToDaemonOptions {
	socketPath: string;
	deadlineMs?: number;
}

const UNREACHABLE_CODES = new Set(["ENOENT", "ECONNREFUSED", "ENOTSOCK"]);

/**
 * Sends one request to the daemon and waits for its answer. A missing or
 * refused socket fails at once with `DaemonUnreachableError`.
 */
export async function sendToDaemon(
	request: IpcRequest,
	options: SendToDaemonOptions,
): Promise<IpcResponse> {
	const deadlineMs = options.deadlineMs ?? IPC_DEADLINE_MS;
	const socket = net.createConnection(options.socketPath);

	try {
		await new Promise<void>((resolve, reject) => {
			socket.once("connect", () => {
				socket.off("error", reject);
				resolve();
			});
			socket.once("error", reject);
		});
	} catch (err) {
		socket.destroy();
		if (
			typeof err === "object" &&
			err != null &&
			"code" in err &&
			typeof err.code === "string" &&
			UNREACHABLE_CODES.has(err.code)
		) {
			throw new DaemonUnreachableError(options.socketPath);
		}
		throw err;
	}

	let timer: NodeJS.Timeout | undefined;
	const deadline = new Promise<never>((_, reject) => {
		timer = setTimeout(
			() => reject(new DaemonTimeoutError(deadlineMs)),
			deadlineMs,
		);
	});

	try {
		socket.write(`${JSON.stringify(request)}\n`);
		const line = await Promise.race([readMessage(socket), deadline]);

		let json: unknown;
		try {
			json = JSON.parse(line);
		} catch (err) {
			throw new Error(`failed to read daemon response: ${errorMessage(err)}`);
		}
		const response = ipcResponseSchema.safeParse(json);
		if (!response.success) {
			throw new Error("failed to read daemon response: unexpected shape");
		}
		return response.data;
	} finally {
		clearTimeout(timer);
		socket.destroy();
	}
}
