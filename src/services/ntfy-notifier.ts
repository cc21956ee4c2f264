import { APPROVAL_TITLE, action, approvalMessage } from "../ntfy-messages.ts";
import type { EmailPayload } from "../types.ts";
import type { ApprovalNotice, ApprovalNotifier } from "./approval-queue.ts";
import type { NtfyClient } from "./ntfy.ts";

export class NtfyApprovalNotifier implements ApprovalNotifier<EmailPayload> {
	private client: NtfyClient;
	private topic: string;

	constructor(client: NtfyClient, topic: string) {
		this.client = client;
		this.topic = topic;
	}

	async notify(notice: ApprovalNotice<EmailPayload>) {
		// Action buttons post straight back to the topic the poller reads
		const topicUrl = this.client.topicUrl(this.topic);
		const headers = this.client.authHeaders();
		await this.client.send(
			this.topic,
			APPROVAL_TITLE,
			approvalMessage(notice.payload),
			[
				action({
					verdict: "approve",
					token: notice.approveToken,
					topicUrl,
					headers,
				}),
				action({
					verdict: "reject",
					token: notice.rejectToken,
					topicUrl,
					headers,
				}),
			],
		);
	}
}
