import z from "zod";
import { debug, errorMessage } from "../utils.ts";

export interface NtfyAction {
	action: "http";
	label: string;
	url: string;
	method: "POST";
	body: string;
	headers?: Record<string, string>;
}

export interface NtfyMessage {
	topic: string;
	title?: string;
	message: string;
	priority?: number;
	tags?: string[];
	actions?: NtfyAction[];
}

const ntfyEventSchema = z.object({
	id: z.string(),
	time: z.number(),
	event: z.string(),
	topic: z.string(),
	message: z.string().optional(),
});

export interface NtfyEvent {
	id: string;
	time: number;
	event: "message";
	topic: string;
	message: string;
}

export class NtfyError extends Error {
	readonly status: number | undefined;

	constructor(message: string, status?: number) {
		super(message);
		this.name = "NtfyError";
		this.status = status;
	}
}

export interface NtfyClientOptions {
	baseUrl: string;
	token?: string;
	fetch?: typeof fetch;
}

const APPROVAL_PRIORITY = 4;
const APPROVAL_TAGS = ["email", "outgoing_envelope"];

export class NtfyClient {
	readonly baseUrl: string;
	private readonly token: string | undefined;
	private readonly fetch: typeof fetch;

	constructor(options: NtfyClientOptions) {
		this.baseUrl = options.baseUrl.replace(/\/+$/, "");
		this.token = options.token;
		this.fetch = options.fetch ?? globalThis.fetch;
	}

	topicUrl(topic: string) {
		return `${this.baseUrl}/${encodeURIComponent(topic)}`;
	}

	/** High-priority message carrying approve/reject actions. */
	async send(
		topic: string,
		title: string,
		message: string,
		actions: NtfyAction[],
	) {
		await this.publish({
			topic,
			title,
			message,
			priority: APPROVAL_PRIORITY,
			tags: APPROVAL_TAGS,
			actions,
		});
	}

	async notify(topic: string, title: string, message: string) {
		await this.publish({ topic, title, message });
	}

	async publish(message: NtfyMessage) {
		const res = await this.request(this.baseUrl, {
			method: "POST",
			headers: { ...this.authHeaders(), "Content-Type": "application/json" },
			body: JSON.stringify(message),
		});
		if (!res.ok) {
			throw new NtfyError(
				`ntfy returned status ${res.status}: ${await res.text()}`,
				res.status,
			);
		}
		debug("ntfy message published", { topic: message.topic });
	}

	/** Cached `message` events on `topic` at or after `since`. */
	async poll(topic: string, since: Date): Promise<NtfyEvent[]> {
		const seconds = Math.floor(since.getTime() / 1000);
		const url = `${this.topicUrl(topic)}/json?poll=1&since=${seconds}`;
		const res = await this.request(url, { headers: this.authHeaders() });
		if (!res.ok) {
			throw new NtfyError(
				`ntfy poll returned status ${res.status}: ${await res.text()}`,
				res.status,
			);
		}
		return parseEvents(await res.text());
	}

	/** Credentials the topic expects, for publishes made on the client's behalf. */
	authHeaders(): Record<string, string> {
		return this.token ? { Authorization: `Bearer ${this.token}` } : {};
	}

	private async request(url: string, init: RequestInit) {
		try {
			return await this.fetch(url, init);
		} catch (err) {
			throw new NtfyError(`ntfy request failed: ${errorMessage(err)}`);
		}
	}
}

/** Decodes a newline-delimited poll response, dropping lines that do not parse. */
export function parseEvents(body: string): NtfyEvent[] {
	const events: NtfyEvent[] = [];
	for (const line of body.split("\n")) {
		if (line.trim() === "") continue;

		let json: unknown;
		try {
			json = JSON.parse(line);
		} catch {
			debug("Skipping malformed ntfy record", { line });
			continue;
		}
		const record = ntfyEventSchema.safeParse(json);
		if (!record.success) {
			debug("Skipping malformed ntfy record", { line });
			continue;
		}

		const { id, time, event, topic, message } = record.data;
		if (event !== "message" || message == null) continue;
		events.push({ id, time, event, topic, message });
	}
	return events;
}
