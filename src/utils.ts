import { randomBytes, timingSafeEqual } from "node:crypto";
import { env } from "./env.ts";

type LogContext = Record<string, unknown>;

// stdout belongs to the MCP stdio transport, so every log line goes to stderr
export function debug(...args: unknown[]) {
	if (!env.OUTBOX_DEBUG) return;
	console.error(...args);
}

export function info(message: string, context?: LogContext) {
	log("INFO", message, context);
}

export function warn(message: string, context?: LogContext) {
	log("WARN", message, context);
}

export function error(message: string, context?: LogContext) {
	log("ERROR", message, context);
}

function log(level: string, message: string, context?: LogContext) {
	const line = `${new Date().toISOString()} [${level}] ${message}`;
	if (context == null) {
		console.error(line);
		return;
	}
	console.error(line, context);
}

export function errorMessage(err: unknown) {
	return err instanceof Error ? err.message : String(err);
}

/** URL-safe random string of exactly `length` characters. */
export function randomString(length: number) {
	return randomBytes(length).toString("base64url").slice(0, length);
}

export function randomHex(bytes: number) {
	return randomBytes(bytes).toString("hex");
}

/** Exact string equality without an early exit on the first differing byte. */
export function safeEqual(a: string, b: string) {
	const left = Buffer.from(a);
	const right = Buffer.from(b);
	if (left.length !== right.length) return false;
	return timingSafeEqual(left, right);
}

export function truncate(text: string, limit: number) {
	return text.length > limit ? `${text.slice(0, limit)}...` : text;
}
