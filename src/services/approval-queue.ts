import { type Clock, systemClock } from "../clock.ts";
import { APPROVAL_TIMEOUT_MS } from "../constants.ts";
import type { ResolutionSource, TerminalStatus, Verdict } from "../types.ts";
import {
	debug,
	error,
	errorMessage,
	info,
	randomHex,
	randomString,
	safeEqual,
	warn,
} from "../utils.ts";

export interface ApprovalSnapshot<P> {
	id: string;
	payload: P;
	queuedAt: Date;
	deadline: Date;
}

/** What a notifier needs to reach the human: display fields plus both one-time tokens. */
export interface ApprovalNotice<P> extends ApprovalSnapshot<P> {
	approveToken: string;
	rejectToken: string;
}

export interface ApprovalNotifier<P> {
	notify(notice: ApprovalNotice<P>): Promise<void>;
}

export type ApprovalOutcome<P> =
	| { status: TerminalStatus; approval: ApprovalSnapshot<P> }
	| { status: "busy" }
	| { status: "dispatch_failed"; reason: string };

export type QueueEvent<P> =
	| { type: "queued"; approval: ApprovalSnapshot<P> }
	| {
			type: "resolved";
			approval: ApprovalSnapshot<P>;
			status: TerminalStatus;
			via: ResolutionSource;
	  };

export type QueueState = "idle" | "dispatching" | "pending";

type QueueListener<P> = (event: QueueEvent<P>) => void;

interface PendingApproval<P> extends ApprovalNotice<P> {
	settle: (status: TerminalStatus) => void;
	cancelTimer: () => void;
}

export interface ApprovalQueueOptions<P> {
	notifier: ApprovalNotifier<P>;
	timeoutMs?: number;
	clock?: Clock;
}

/**
 * Single-slot approval queue. At most one request is reserved or pending at
 * any time; a second `enqueue` answers `busy` without touching the slot.
 *
 * Every state change runs inside one synchronous section, so the event loop
 * is the lock. The only await is the notifier call, made while the slot is
 * reserved but before its tokens are installed.
 */
export class ApprovalQueue<P> {
	private readonly notifier: ApprovalNotifier<P>;
	private readonly timeoutMs: number;
	private readonly clock: Clock;
	private reserved = false;
	private pending: PendingApproval<P> | undefined;
	private listeners = new Set<QueueListener<P>>();

	constructor(options: ApprovalQueueOptions<P>) {
		this.notifier = options.notifier;
		this.timeoutMs = options.timeoutMs ?? APPROVAL_TIMEOUT_MS;
		this.clock = options.clock ?? systemClock;
	}

	get state(): QueueState {
		if (this.pending) return "pending";
		return this.reserved ? "dispatching" : "idle";
	}

	/**
	 * Queues `payload` for a human verdict and resolves once the request is
	 * approved, rejected or timed out. Answers `busy` immediately when the slot
	 * is taken and `dispatch_failed` when the notification could not be sent.
	 */
	async enqueue(payload: P): Promise<ApprovalOutcome<P>> {
		if (this.state !== "idle") {
			warn("Approval rejected: slot busy", { action: "approval_busy" });
			return { status: "busy" };
		}
		this.reserved = true;

		const queuedAt = this.clock.now();
		const notice: ApprovalNotice<P> = {
			id: randomString(11),
			payload,
			queuedAt,
			deadline: new Date(queuedAt.getTime() + this.timeoutMs),
			approveToken: randomHex(16),
			rejectToken: randomHex(16),
		};

		try {
			await this.notifier.notify(notice);
		} catch (err) {
			this.reserved = false;
			error("Approval notification failed", {
				action: "approval_dispatch_failed",
				requestId: notice.id,
				error: errorMessage(err),
			});
			return { status: "dispatch_failed", reason: errorMessage(err) };
		}

		const result = new Promise<TerminalStatus>((resolve) => {
			const pending: PendingApproval<P> = {
				...notice,
				settle: resolve,
				cancelTimer: this.clock.setTimeout(
					() => this.retire(pending, "timeout", "timeout"),
					this.timeoutMs,
				),
			};
			this.reserved = false;
			this.pending = pending;
		});

		info("Approval queued", {
			action: "approval_queued",
			requestId: notice.id,
			deadline: notice.deadline.toISOString(),
		});
		this.emit({ type: "queued", approval: snapshotOf(notice) });

		const status = await result;
		return { status, approval: snapshotOf(notice) };
	}

	/**
	 * Retires the pending approval when `token` is the one minted for
	 * `verdict`. Stale, duplicate or mismatched tokens are ignored; the return
	 * value only tells whether this call retired the request.
	 */
	resolve(token: string, verdict: Verdict, via: ResolutionSource): boolean {
		const pending = this.pending;
		if (!pending) {
			debug("Ignoring resolution: nothing pending", { verdict, via });
			return false;
		}

		const expected =
			verdict === "approve" ? pending.approveToken : pending.rejectToken;
		if (!safeEqual(token, expected)) {
			debug("Ignoring resolution: token mismatch", {
				requestId: pending.id,
				verdict,
				via,
			});
			return false;
		}

		this.retire(pending, verdict === "approve" ? "approved" : "rejected", via);
		return true;
	}

	/** The installed request including its tokens, for in-process adapters. */
	current(): ApprovalNotice<P> | undefined {
		const pending = this.pending;
		if (!pending) return undefined;
		return {
			...snapshotOf(pending),
			approveToken: pending.approveToken,
			rejectToken: pending.rejectToken,
		};
	}

	snapshot(): ApprovalSnapshot<P> | undefined {
		return this.pending && snapshotOf(this.pending);
	}

	subscribe(listener: QueueListener<P>) {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	private retire(
		pending: PendingApproval<P>,
		status: TerminalStatus,
		via: ResolutionSource,
	) {
		// The first writer wins; later timers or tokens find a different slot
		if (this.pending !== pending) return;
		this.pending = undefined;
		pending.cancelTimer();

		const elapsed = this.clock.now().getTime() - pending.queuedAt.getTime();
		const context = {
			action: `approval_${status}`,
			requestId: pending.id,
			via,
			responseTime: elapsed,
		};
		if (status === "timeout") {
			warn("Approval timed out", context);
		} else {
			info(`Approval ${status}`, context);
		}

		pending.settle(status);
		this.emit({
			type: "resolved",
			approval: snapshotOf(pending),
			status,
			via,
		});
	}

	private emit(event: QueueEvent<P>) {
		for (const listener of this.listeners) {
			try {
				listener(event);
			} catch (err) {
				error("Queue listener failed", {
					event: event.type,
					error: errorMessage(err),
				});
			}
		}
	}
}

function snapshotOf<P>(approval: ApprovalSnapshot<P>): ApprovalSnapshot<P> {
	return {
		id: approval.id,
		payload: approval.payload,
		queuedAt: approval.queuedAt,
		deadline: approval.deadline,
	};
}
