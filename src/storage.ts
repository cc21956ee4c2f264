import { promises as fs } from "node:fs";
import * as path from "node:path";
import z from "zod";
import { CONFIG_FILE_NAME, TOPIC_PREFIX } from "./constants.ts";
import { env } from "./env.ts";
import { randomString } from "./utils.ts";

const bootstrapConfigSchema = z.object({
	ntfyTopic: z.string().min(1),
	signingSecret: z.string().min(1),
	setupComplete: z.boolean(),
});

export type BootstrapConfig = z.infer<typeof bootstrapConfigSchema>;

export function createBootstrapConfig(): BootstrapConfig {
	return {
		ntfyTopic: `${TOPIC_PREFIX}${randomString(32)}`,
		signingSecret: randomString(32),
		setupComplete: false,
	};
}

function isNotFound(error: unknown) {
	return (
		typeof error === "object" &&
		error != null &&
		"code" in error &&
		error.code === "ENOENT"
	);
}

class ConfigStore {
	readonly dataDir: string;
	readonly filePath: string;

	constructor(customDataDir?: string) {
		this.dataDir = customDataDir ?? env.OUTBOX_CONFIG_DIR;
		this.filePath = path.join(this.dataDir, CONFIG_FILE_NAME);
	}

	async ensureDataDir(): Promise<void> {
		await fs.mkdir(this.dataDir, { recursive: true, mode: 0o700 });
	}

	/** The saved config, or `undefined` when setup has never run. */
	async load(): Promise<BootstrapConfig | undefined> {
		let content: string;
		try {
			content = await fs.readFile(this.filePath, "utf-8");
		} catch (error: unknown) {
			if (isNotFound(error)) {
				return undefined;
			}
			throw error;
		}

		let json: unknown;
		try {
			json = JSON.parse(content);
		} catch (error: unknown) {
			throw new Error(`Failed to parse config ${this.filePath}`, {
				cause: error,
			});
		}
		const parsed = bootstrapConfigSchema.safeParse(json);
		if (!parsed.success) {
			throw new Error(
				`Invalid config ${this.filePath}: ${parsed.error.issues[0]?.message}`,
			);
		}
		return parsed.data;
	}

	async save(config: BootstrapConfig): Promise<void> {
		await this.ensureDataDir();
		const tempPath = `${this.filePath}.tmp`;

		// Write to temp file first for atomic operation
		await fs.writeFile(tempPath, JSON.stringify(config, null, 2), {
			encoding: "utf-8",
			mode: 0o600,
		});
		await fs.rename(tempPath, this.filePath);
	}

	async loadOrCreate(): Promise<BootstrapConfig> {
		const existing = await this.load();
		if (existing) return existing;

		const config = createBootstrapConfig();
		await this.save(config);
		return config;
	}

	async reset(): Promise<void> {
		try {
			await fs.unlink(this.filePath);
		} catch (error: unknown) {
			if (!isNotFound(error)) throw error;
		}
	}
}

export { ConfigStore };
