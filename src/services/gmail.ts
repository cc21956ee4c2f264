import z from "zod";

export interface DraftRequest {
	to: string;
	subject: string;
	body: string;
	threadId?: string;
}

/** The mail provider as seen by the requester: draft now, send after approval. */
export interface MailDrafts {
	createDraft(email: DraftRequest): Promise<string>;
	sendDraft(draftId: string): Promise<void>;
}

const draftResponseSchema = z.object({
	id: z.string(),
});

export interface GmailDraftsOptions {
	accessToken: string;
	baseUrl?: string;
	fetch?: typeof fetch;
}

const GMAIL_USER_URL = "https://gmail.googleapis.com/gmail/v1/users/me";

export class GmailDrafts implements MailDrafts {
	private accessToken: string;
	private baseUrl: string;
	private fetch: typeof fetch;

	constructor(options: GmailDraftsOptions) {
		this.accessToken = options.accessToken;
		this.baseUrl = options.baseUrl ?? GMAIL_USER_URL;
		this.fetch = options.fetch ?? globalThis.fetch;
	}

	async createDraft(email: DraftRequest): Promise<string> {
		const json = await this.post("/drafts", {
			message: {
				raw: rawMessage(email),
				...(email.threadId ? { threadId: email.threadId } : {}),
			},
		});
		const draft = draftResponseSchema.safeParse(json);
		if (!draft.success) {
			throw new Error("Failed to create draft: response has no draft id");
		}
		return draft.data.id;
	}

	async sendDraft(draftId: string): Promise<void> {
		await this.post("/drafts/send", { id: draftId });
	}

	private async post(path: string, body: unknown): Promise<unknown> {
		const res = await this.fetch(`${this.baseUrl}${path}`, {
			method: "POST",
			headers: {
				Authorization: `Bearer ${this.accessToken}`,
				"Content-Type": "application/json",
			},
			body: JSON.stringify(body),
		});
		if (!res.ok) {
			throw new Error(`Gmail API ${path} returned ${res.status}: ${await res.text()}`);
		}
		return res.json();
	}
}

/** Replies get a `Re: ` subject unless they already carry one. */
export function replySubject(subject: string, threadId?: string) {
	if (!threadId || subject.toLowerCase().startsWith("re:")) return subject;
	return `Re: ${subject}`;
}

export function rawMessage(email: DraftRequest) {
	for (const header of [email.to, email.subject]) {
		if (/[\r\n]/.test(header)) {
			throw new Error("Email headers must not contain line breaks");
		}
	}
	const message = `To: ${email.to}\r\nSubject: ${email.subject}\r\n\r\n${email.body}`;
	return Buffer.from(message, "utf-8").toString("base64url");
}
