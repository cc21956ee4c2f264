import { randomBytes } from "node:crypto";
import { type Clock, systemClock } from "../clock.ts";
import type { ApprovalQueue, QueueEvent } from "../services/approval-queue.ts";
import type {
	EmailPayload,
	ResolutionSource,
	TerminalStatus,
} from "../types.ts";
import { error, errorMessage, safeEqual } from "../utils.ts";

export interface HistoryEntry {
	id: string;
	to: string;
	subject: string;
	outcome: TerminalStatus;
	via: ResolutionSource;
	timestamp: string;
}

type Viewer = (event: QueueEvent<EmailPayload>) => void;

/**
 * One dashboard per daemon process, reachable only through its random URL.
 * Keeps an append-only log of settled approvals and relays queue transitions
 * to connected viewers.
 */
export class DashboardSession {
	readonly id: string;
	readonly createdAt: Date;
	private entries: HistoryEntry[] = [];
	private viewers = new Set<Viewer>();
	private detach: () => void;
	private clock: Clock;

	constructor(
		queue: ApprovalQueue<EmailPayload>,
		id = newSessionId(),
		clock: Clock = systemClock,
	) {
		this.id = id;
		this.clock = clock;
		this.createdAt = clock.now();
		this.detach = queue.subscribe((event) => this.onQueueEvent(event));
	}

	matches(candidate: string) {
		return safeEqual(candidate, this.id);
	}

	get history(): readonly HistoryEntry[] {
		return this.entries;
	}

	get viewerCount() {
		return this.viewers.size;
	}

	subscribe(viewer: Viewer) {
		this.viewers.add(viewer);
		return () => {
			this.viewers.delete(viewer);
		};
	}

	close() {
		this.detach();
		this.viewers.clear();
	}

	private onQueueEvent(event: QueueEvent<EmailPayload>) {
		if (event.type === "resolved") {
			this.entries.push({
				id: event.approval.id,
				to: event.approval.payload.to,
				subject: event.approval.payload.subject,
				outcome: event.status,
				via: event.via,
				timestamp: this.clock.now().toISOString(),
			});
		}
		for (const viewer of this.viewers) {
			try {
				viewer(event);
			} catch (err) {
				error("Dashboard viewer failed", { error: errorMessage(err) });
			}
		}
	}
}

export function newSessionId() {
	return randomBytes(32).toString("base64url");
}
