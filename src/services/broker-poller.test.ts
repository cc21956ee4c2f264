import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { email, flush, ndjson, recordingNotifier } from "../testing/helpers.ts";
import { ManualClock } from "../testing/manual-clock.ts";
import type { EmailPayload } from "../types.ts";
import { ApprovalQueue } from "./approval-queue.ts";
import { BrokerCursor, BrokerPoller } from "./broker-poller.ts";
import { NtfyClient, type NtfyEvent } from "./ntfy.ts";

// 2026-01-01T00:00:00Z, the ManualClock default
const T0 = 1767225600;

const message = (id: string, time: number, text: string) => ({
	id,
	time,
	event: "message",
	topic: "topic-1",
	message: text,
});

async function collect(events: AsyncGenerator<NtfyEvent>) {
	const ids: string[] = [];
	for await (const event of events) ids.push(event.id);
	return ids;
}

function createClient() {
	const fetch = vi.fn<typeof globalThis.fetch>();
	const client = new NtfyClient({ baseUrl: "https://ntfy.test", fetch });
	return { client, fetch };
}

describe("BrokerCursor", () => {
	it("should yield new events in time order and skip older ones", async () => {
		const { client, fetch } = createClient();
		fetch.mockResolvedValueOnce(
			ndjson([
				message("e2", T0 + 2, "b"),
				message("e1", T0 + 1, "a"),
				message("old", T0 - 1, "stale"),
			]),
		);
		const cursor = new BrokerCursor(client, "topic-1", new Date(T0 * 1000));

		expect(await collect(cursor.pull())).toEqual(["e1", "e2"]);
		expect(cursor.position).toEqual(new Date((T0 + 2) * 1000));
	});

	it("should not yield the same event twice", async () => {
		const { client, fetch } = createClient();
		fetch
			.mockResolvedValueOnce(ndjson([message("e1", T0 + 1, "a")]))
			.mockResolvedValueOnce(
				ndjson([message("e1", T0 + 1, "a"), message("e2", T0 + 1, "b")]),
			);
		const cursor = new BrokerCursor(client, "topic-1", new Date(T0 * 1000));

		expect(await collect(cursor.pull())).toEqual(["e1"]);
		expect(await collect(cursor.pull())).toEqual(["e2"]);
		expect(fetch.mock.calls[1][0]).toBe(
			`https://ntfy.test/topic-1/json?poll=1&since=${T0 + 1}`,
		);
	});

	it("should only move forward", () => {
		const { client } = createClient();
		const cursor = new BrokerCursor(client, "topic-1", new Date(T0 * 1000));

		cursor.advanceTo(new Date((T0 - 60) * 1000));
		expect(cursor.position).toEqual(new Date(T0 * 1000));

		cursor.advanceTo(new Date((T0 + 60) * 1000 + 500));
		expect(cursor.position).toEqual(new Date((T0 + 60) * 1000));
	});
});

describe("BrokerPoller", () => {
	let poller: BrokerPoller<EmailPayload> | undefined;

	beforeEach(() => {
		vi.spyOn(console, "error").mockImplementation(() => {});
	});

	afterEach(() => {
		poller?.stop();
		poller = undefined;
		vi.restoreAllMocks();
	});

	function setup() {
		const clock = new ManualClock();
		const notifier = recordingNotifier();
		const queue = new ApprovalQueue<EmailPayload>({ notifier, clock });
		const { client, fetch } = createClient();
		const created = new BrokerPoller({
			client,
			topic: "topic-1",
			queue,
			intervalMs: 60_000,
			clock,
		});
		created.start();
		poller = created;
		return { poller: created, queue, notifier, fetch, clock };
	}

	it("should not poll while nothing is pending", async () => {
		const { poller, fetch } = setup();

		expect(await poller.tick()).toBe(0);
		expect(fetch).not.toHaveBeenCalled();
	});

	it("should approve the pending request from a broker reply", async () => {
		const { poller, queue, notifier, fetch } = setup();
		const result = queue.enqueue(email("a@x.com"));
		await flush();
		const token = notifier.notices[0].approveToken;
		fetch.mockResolvedValueOnce(
			ndjson([
				message("n1", T0, "To: a@x.com"),
				message("r1", T0 + 3, `APPROVE:${token}`),
			]),
		);

		expect(await poller.tick()).toBe(1);
		await expect(result).resolves.toMatchObject({
			status: "approved",
			approval: { payload: { to: "a@x.com" } },
		});
		expect(queue.state).toBe("idle");
	});

	it("should reject the pending request from a broker reply", async () => {
		const { poller, queue, notifier, fetch } = setup();
		const result = queue.enqueue(email("a@x.com"));
		await flush();
		const token = notifier.notices[0].rejectToken;
		fetch.mockResolvedValueOnce(ndjson([message("r1", T0 + 1, `REJECT:${token}`)]));

		expect(await poller.tick()).toBe(1);
		await expect(result).resolves.toMatchObject({ status: "rejected" });
	});

	it("should ignore replies carrying unknown tokens", async () => {
		const { poller, queue, fetch } = setup();
		void queue.enqueue(email("a@x.com"));
		await flush();
		fetch.mockResolvedValueOnce(
			ndjson([
				message("r1", T0 + 1, "APPROVE:not-the-token"),
				message("r2", T0 + 1, "REJECT:not-the-token"),
			]),
		);

		expect(await poller.tick()).toBe(0);
		expect(queue.state).toBe("pending");
	});

	it("should skip replies older than the pending request", async () => {
		const { poller, queue, notifier, fetch, clock } = setup();
		clock.advance(120_000);
		void queue.enqueue(email("a@x.com"));
		await flush();
		const token = notifier.notices[0].approveToken;
		fetch.mockResolvedValueOnce(ndjson([message("r1", T0 + 60, `APPROVE:${token}`)]));

		expect(await poller.tick()).toBe(0);
		expect(fetch.mock.calls[0][0]).toBe(
			`https://ntfy.test/topic-1/json?poll=1&since=${T0 + 120}`,
		);
		expect(queue.state).toBe("pending");
	});

	it("should keep the request pending when the broker is unreachable", async () => {
		const { poller, queue, fetch } = setup();
		void queue.enqueue(email("a@x.com"));
		await flush();
		fetch.mockRejectedValueOnce(new Error("getaddrinfo ENOTFOUND"));

		expect(await poller.tick()).toBe(0);
		expect(queue.state).toBe("pending");
	});

	it("should stop following the queue once stopped", async () => {
		const { poller, queue, fetch, clock } = setup();
		poller.stop();
		clock.advance(120_000);
		void queue.enqueue(email("a@x.com"));
		await flush();
		fetch.mockResolvedValueOnce(ndjson([]));

		await poller.tick();

		// The cursor was not moved to the new request's queue time
		expect(fetch.mock.calls[0][0]).toBe(
			`https://ntfy.test/topic-1/json?poll=1&since=${T0}`,
		);
	});
});
