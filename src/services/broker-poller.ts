import { type Clock, systemClock } from "../clock.ts";
import { POLL_INTERVAL_MS } from "../constants.ts";
import { parseDecision } from "../ntfy-messages.ts";
import { debug, error, errorMessage, warn } from "../utils.ts";
import type { ApprovalQueue } from "./approval-queue.ts";
import type { NtfyClient, NtfyEvent } from "./ntfy.ts";

/**
 * Restartable view of a topic's events. Each `pull()` polls from the cursor,
 * yields only records not seen before and moves the cursor forward.
 */
export class BrokerCursor {
	private client: NtfyClient;
	private topic: string;
	private since: number; // unix seconds, inclusive
	private seen = new Map<string, number>();

	constructor(client: NtfyClient, topic: string, start: Date) {
		this.client = client;
		this.topic = topic;
		this.since = toSeconds(start);
	}

	get position() {
		return new Date(this.since * 1000);
	}

	advanceTo(date: Date) {
		const seconds = toSeconds(date);
		if (seconds <= this.since) return;
		this.since = seconds;
		for (const [id, time] of this.seen) {
			if (time < seconds) this.seen.delete(id);
		}
	}

	async *pull(): AsyncGenerator<NtfyEvent> {
		const events = await this.client.poll(this.topic, this.position);
		events.sort((a, b) => a.time - b.time);
		for (const event of events) {
			if (event.time < this.since || this.seen.has(event.id)) continue;
			this.advanceTo(new Date(event.time * 1000));
			this.seen.set(event.id, event.time);
			yield event;
		}
	}
}

export interface BrokerPollerOptions<P> {
	client: NtfyClient;
	topic: string;
	queue: ApprovalQueue<P>;
	intervalMs?: number;
	clock?: Clock;
}

/** Feeds APPROVE/REJECT replies from the broker into the queue while a request is pending. */
export class BrokerPoller<P> {
	private queue: ApprovalQueue<P>;
	private intervalMs: number;
	private cursor: BrokerCursor;
	private timer: NodeJS.Timeout | undefined;
	private unsubscribe: (() => void) | undefined;
	private polling = false;

	constructor(options: BrokerPollerOptions<P>) {
		this.queue = options.queue;
		this.intervalMs = options.intervalMs ?? POLL_INTERVAL_MS;
		const clock = options.clock ?? systemClock;
		this.cursor = new BrokerCursor(options.client, options.topic, clock.now());
	}

	start() {
		if (this.timer) return;
		// Replies can only follow the notification, so skip anything older
		this.unsubscribe = this.queue.subscribe((event) => {
			if (event.type === "queued") this.cursor.advanceTo(event.approval.queuedAt);
		});
		this.timer = setInterval(() => {
			this.tick().catch((err) => {
				error("Broker poll tick failed", { error: errorMessage(err) });
			});
		}, this.intervalMs);
	}

	stop() {
		if (this.timer) clearInterval(this.timer);
		this.timer = undefined;
		this.unsubscribe?.();
		this.unsubscribe = undefined;
	}

	/** Polls once; answers how many events retired the pending request. */
	async tick() {
		if (this.polling || this.queue.state !== "pending") return 0;
		this.polling = true;

		let resolved = 0;
		try {
			for await (const event of this.cursor.pull()) {
				const decision = parseDecision(event.message);
				if (!decision) continue;
				debug("Broker decision received", {
					eventId: event.id,
					verdict: decision.verdict,
				});
				if (this.queue.resolve(decision.token, decision.verdict, "broker")) {
					resolved++;
				}
			}
		} catch (err) {
			warn("Broker poll failed", {
				action: "broker_poll_failed",
				error: errorMessage(err),
			});
		} finally {
			this.polling = false;
		}
		return resolved;
	}
}

function toSeconds(date: Date) {
	return Math.floor(date.getTime() / 1000);
}
