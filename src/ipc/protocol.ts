import * as path from "node:path";
import type { Socket } from "node:net";
import z from "zod";
import { SOCKET_FILE_NAME } from "../constants.ts";
import type { ApprovalOutcome } from "../services/approval-queue.ts";

export const MAX_MESSAGE_BYTES = 1024 * 1024;

export const ipcRequestSchema = z.object({
	action: z.string(),
	to: z.string().optional(),
	subject: z.string().optional(),
	body: z.string().optional(),
	draft_id: z.string().optional(),
});

export type IpcRequest = z.infer<typeof ipcRequestSchema>;

export const queueEmailSchema = z.object({
	action: z.literal("queue_email"),
	to: z.string().min(1),
	subject: z.string(),
	body: z.string(),
	draft_id: z.string().optional(),
});

export const ipcResponseSchema = z.object({
	success: z.boolean(),
	error: z.string().optional(),
	status: z.string().optional(),
});

export type IpcResponse = z.infer<typeof ipcResponseSchema>;

export const INVALID_REQUEST: IpcResponse = {
	success: false,
	error: "invalid request",
};

export const REQUEST_TOO_LARGE: IpcResponse = {
	success: false,
	error: "request too large",
};

export const UNKNOWN_ACTION: IpcResponse = {
	success: false,
	error: "unknown action",
};

export function socketPathFor(configDir: string) {
	return path.join(configDir, SOCKET_FILE_NAME);
}

export function decodeRequest(line: string): IpcRequest | undefined {
	let json: unknown;
	try {
		json = JSON.parse(line);
	} catch {
		return undefined;
	}
	const parsed = ipcRequestSchema.safeParse(json);
	return parsed.success ? parsed.data : undefined;
}

export function responseFor<P>(outcome: ApprovalOutcome<P>): IpcResponse {
	switch (outcome.status) {
		case "approved":
			return { success: true, status: "approved" };
		case "rejected":
			return { success: false, status: "rejected", error: "rejected by user" };
		case "timeout":
			return { success: false, status: "timeout", error: "approval timed out" };
		case "busy":
			return {
				success: false,
				status: "busy",
				error: "another email is pending approval - only one at a time",
			};
		case "dispatch_failed":
			return {
				success: false,
				status: "dispatch_failed",
				error: `failed to send notification: ${outcome.reason}`,
			};
	}
}

export class MessageTooLargeError extends Error {
	constructor() {
		super(`message exceeds ${MAX_MESSAGE_BYTES} bytes`);
		this.name = "MessageTooLargeError";
	}
}

const NEWLINE = 0x0a;

/**
 * Resolves with the first newline-terminated message on `socket`, or with
 * whatever arrived before the peer ended its side. A message longer than
 * `MAX_MESSAGE_BYTES` rejects with `MessageTooLargeError`.
 */
export function readMessage(socket: Socket): Promise<string> {
	return new Promise((resolve, reject) => {
		// Bytes are kept undecoded so a character split across chunks survives
		const chunks: Buffer[] = [];
		let length = 0;

		const cleanup = () => {
			socket.off("data", onData);
			socket.off("end", onEnd);
			socket.off("error", onError);
		};
		const finish = (message: Buffer) => {
			cleanup();
			if (message.length > MAX_MESSAGE_BYTES) {
				reject(new MessageTooLargeError());
				return;
			}
			resolve(message.toString("utf-8"));
		};
		const onData = (chunk: Buffer) => {
			const newline = chunk.indexOf(NEWLINE);
			if (newline !== -1) {
				chunks.push(chunk.subarray(0, newline));
				finish(Buffer.concat(chunks));
				return;
			}
			chunks.push(chunk);
			length += chunk.length;
			if (length > MAX_MESSAGE_BYTES) {
				cleanup();
				reject(new MessageTooLargeError());
			}
		};
		const onEnd = () => finish(Buffer.concat(chunks));
		const onError = (err: Error) => {
			cleanup();
			reject(err);
		};

		socket.on("data", onData);
		socket.on("end", onEnd);
		socket.on("error", onError);
	});
}
