import * as os from "node:os";
import * as path from "node:path";
import dotenv from "dotenv";
import {
	DEFAULT_DASHBOARD_PORT,
	DEFAULT_NTFY_BASE_URL,
	NAME,
} from "./constants.ts";

dotenv.config();

export const env = {
	NTFY_BASE_URL: process.env.NTFY_BASE_URL || DEFAULT_NTFY_BASE_URL,
	NTFY_TOKEN: process.env.NTFY_TOKEN || undefined,
	OUTBOX_CONFIG_DIR: process.env.OUTBOX_CONFIG_DIR || defaultConfigDir(),
	OUTBOX_DASHBOARD_PORT: parsePort(
		"OUTBOX_DASHBOARD_PORT",
		process.env.OUTBOX_DASHBOARD_PORT,
		DEFAULT_DASHBOARD_PORT,
	),
	OUTBOX_DEBUG: process.env.OUTBOX_DEBUG != null,
};

export function requireEnv(name: string) {
	const value = process.env[name];
	if (!value) {
		throw new Error(`Missing required environment variable: ${name}`);
	}
	return value;
}

export function parsePort(
	name: string,
	value: string | undefined,
	fallback: number,
) {
	if (value == null || value === "") return fallback;
	const port = Number(value);
	if (!Number.isInteger(port) || port < 0 || port > 65535) {
		throw new Error(`Invalid port in environment variable ${name}: ${value}`);
	}
	return port;
}

function defaultConfigDir() {
	const xdgConfigHome =
		process.env.XDG_CONFIG_HOME || path.join(os.homedir(), ".config");
	return path.join(xdgConfigHome, NAME);
}
