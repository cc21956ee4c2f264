import { PREVIEW_LIMIT } from "./constants.ts";
import type { NtfyAction } from "./services/ntfy.ts";
import type { EmailPayload, Verdict } from "./types.ts";
import { truncate } from "./utils.ts";

export const APPROVAL_TITLE = "📧 Approve email?";

const PREFIXES = {
	approve: "APPROVE:",
	reject: "REJECT:",
} as const satisfies Record<Verdict, string>;

export const action = (args: {
	verdict: Verdict;
	token: string;
	topicUrl: string;
	headers?: Record<string, string>;
}): NtfyAction => {
	const labels = {
		approve: "✓ Approve",
		reject: "✗ Reject",
	};
	return {
		action: "http",
		label: labels[args.verdict],
		url: args.topicUrl,
		method: "POST",
		body: `${PREFIXES[args.verdict]}${args.token}`,
		// Posted by the subscriber's device, not by this client
		...(args.headers && Object.keys(args.headers).length > 0
			? { headers: args.headers }
			: {}),
	};
};

export const approvalMessage = (payload: EmailPayload) =>
	`To: ${payload.to}
Subject: ${payload.subject}

${truncate(payload.body, PREVIEW_LIMIT)}`;

/** Reads a broker message posted back by one of the approval actions. */
export const parseDecision = (
	message: string,
): { verdict: Verdict; token: string } | undefined => {
	if (message.startsWith(PREFIXES.approve)) {
		return {
			verdict: "approve",
			token: message.slice(PREFIXES.approve.length),
		};
	}
	if (message.startsWith(PREFIXES.reject)) {
		return { verdict: "reject", token: message.slice(PREFIXES.reject.length) };
	}
	return undefined;
};
