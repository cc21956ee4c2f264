export interface EmailPayload {
	to: string;
	subject: string;
	body: string;
	draftId?: string;
}

export type Verdict = "approve" | "reject";

export type TerminalStatus = "approved" | "rejected" | "timeout";

/** Channel through which a pending approval was retired. */
export type ResolutionSource = "broker" | "dashboard" | "timeout";

export type { BootstrapConfig } from "./storage.ts";
