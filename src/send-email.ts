import type { IpcRequest, IpcResponse } from "./ipc/protocol.ts";
import { type MailDrafts, replySubject } from "./services/gmail.ts";
import { errorMessage, info, warn } from "./utils.ts";

export type DaemonRequester = (request: IpcRequest) => Promise<IpcResponse>;

export interface ToolResult {
	[key: string]: unknown;
	content: { type: "text"; text: string }[];
	isError?: boolean;
}

const text = (value: string): ToolResult => ({
	content: [{ type: "text", text: value }],
});

const toolError = (message: string): ToolResult => ({
	content: [{ type: "text", text: message }],
	isError: true,
});

export async function handleSendEmail(
	args: {
		to: string;
		subject: string;
		body: string;
		thread_id?: string;
	},
	deps: {
		drafts: MailDrafts;
		requestApproval: DaemonRequester;
	},
): Promise<ToolResult> {
	const subject = replySubject(args.subject, args.thread_id);

	let draftId: string;
	try {
		draftId = await deps.drafts.createDraft({
			to: args.to,
			subject,
			body: args.body,
			threadId: args.thread_id,
		});
	} catch (err) {
		return toolError(`Failed to create draft: ${errorMessage(err)}`);
	}
	info("Draft created", { action: "draft_created", draftId, to: args.to });

	let res: IpcResponse;
	try {
		res = await deps.requestApproval({
			action: "queue_email",
			to: args.to,
			subject,
			body: args.body,
			draft_id: draftId,
		});
	} catch (err) {
		return toolError(errorMessage(err));
	}

	// Anything short of an explicit approval means the email stays a draft
	if (!res.success || res.status !== "approved") {
		warn("Email not approved", { draftId, status: res.status });
		return toolError(res.error ?? `Email not approved (${res.status ?? "no status"})`);
	}

	try {
		await deps.drafts.sendDraft(draftId);
	} catch (err) {
		return toolError(`approved but failed to send: ${errorMessage(err)}`);
	}
	info("Email sent", { action: "email_sent", draftId, to: args.to });

	return text(
		JSON.stringify(
			{
				status: "sent",
				message: "Email approved and sent successfully",
				to: args.to,
				subject,
			},
			null,
			2,
		),
	);
}

export async function handleDaemonStatus(deps: {
	requestApproval: DaemonRequester;
}): Promise<ToolResult> {
	try {
		const res = await deps.requestApproval({ action: "status" });
		return res.success
			? text(`Approval daemon: ${res.status ?? "running"}`)
			: toolError(res.error ?? "Approval daemon returned an error");
	} catch (err) {
		return toolError(errorMessage(err));
	}
}
