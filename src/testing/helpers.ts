import type { ApprovalNotice } from "../services/approval-queue.ts";
import type { DraftRequest, MailDrafts } from "../services/gmail.ts";
import type { EmailPayload } from "../types.ts";

/** Lets pending promise callbacks run before the test continues. */
export const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

export function deferred<T>() {
	let resolve: (value: T) => void = () => {};
	let reject: (reason: unknown) => void = () => {};
	const promise = new Promise<T>((res, rej) => {
		resolve = res;
		reject = rej;
	});
	return { promise, resolve, reject };
}

export const email = (
	to: string,
	subject = "S1",
	body = "Hello there",
): EmailPayload => ({ to, subject, body });

/** Notifier that records every notice it is asked to deliver. */
export function recordingNotifier() {
	const notices: ApprovalNotice<EmailPayload>[] = [];
	return {
		notices,
		notify: async (notice: ApprovalNotice<EmailPayload>) => {
			notices.push(notice);
		},
	};
}

export function ndjson(records: unknown[]) {
	return new Response(records.map((r) => JSON.stringify(r)).join("\n"), {
		status: 200,
	});
}

/** In-memory mail provider recording drafts and sends. */
export function fakeDrafts() {
	const created: DraftRequest[] = [];
	const sent: string[] = [];
	const drafts: MailDrafts = {
		createDraft: async (email) => {
			created.push(email);
			return `draft-${created.length}`;
		},
		sendDraft: async (draftId) => {
			sent.push(draftId);
		},
	};
	return { drafts, created, sent };
}
