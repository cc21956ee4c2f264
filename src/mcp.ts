import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
	CallToolRequestSchema,
	ErrorCode,
	ListToolsRequestSchema,
	McpError,
} from "@modelcontextprotocol/sdk/types.js";
import z from "zod";
import { NAME, VERSION } from "./constants.ts";
import {
	type DaemonRequester,
	handleDaemonStatus,
	handleSendEmail,
} from "./send-email.ts";
import type { MailDrafts } from "./services/gmail.ts";
import { debug, error, info } from "./utils.ts";

const sendEmailSchema = z.object({
	to: z.string().min(1),
	subject: z.string(),
	body: z.string(),
	thread_id: z.string().optional(),
});

export const TOOLS = [
	{
		name: "send_email_ato",
		description: `Send an email after the user approves it out of band.

The email is saved as a draft and an approval request goes to the user's phone
(and their local review dashboard). This call blocks for up to 5 minutes until
the user approves or rejects it. The email is sent only on approval; a
rejection or timeout returns an error and the draft stays unsent.`,
		inputSchema: {
			type: "object" as const,
			properties: {
				to: { type: "string", description: "Recipient email address" },
				subject: { type: "string", description: "Email subject line" },
				body: { type: "string", description: "Email body content" },
				thread_id: {
					type: "string",
					description: "Thread ID when replying (optional)",
				},
			},
			required: ["to", "subject", "body"],
		},
	},
	{
		name: "approval_daemon_status",
		description: "Check whether the approval daemon is running",
		inputSchema: {
			type: "object" as const,
			properties: {},
		},
	},
];

export class McpServer {
	private server: Server;
	private drafts: MailDrafts;
	private requestApproval: DaemonRequester;
	private isShuttingDown = false;

	constructor(deps: { drafts: MailDrafts; requestApproval: DaemonRequester }) {
		this.drafts = deps.drafts;
		this.requestApproval = deps.requestApproval;
		this.server = new Server(
			{
				name: NAME,
				version: VERSION,
			},
			{
				capabilities: {
					tools: {},
				},
			},
		);
		this.registerTools();
	}

	async connect(transport: Transport) {
		await this.server.connect(transport);
	}

	async start() {
		await this.connect(new StdioServerTransport());
		info("MCP server started", { transport: "stdio" });

		// Handle stdin close when the client terminates
		process.stdin.on("end", () => {
			debug("Client process ended, shutting down...");
			this.shutdown().catch((err) => {
				error("Error during shutdown", { error: err });
			});
		});
	}

	async shutdown() {
		if (this.isShuttingDown) {
			return;
		}
		this.isShuttingDown = true;

		debug("Closing MCP server...");
		await this.server.close();
	}

	private registerTools() {
		this.server.setRequestHandler(ListToolsRequestSchema, async () => {
			return { tools: TOOLS };
		});

		this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
			if (this.isShuttingDown) {
				throw new McpError(ErrorCode.InternalError, "Server is shutting down");
			}

			switch (request.params.name) {
				case "send_email_ato": {
					const arg = sendEmailSchema.safeParse(request.params.arguments);
					if (!arg.success) {
						throw new McpError(ErrorCode.InvalidParams, "Invalid arguments");
					}
					return await handleSendEmail(arg.data, {
						drafts: this.drafts,
						requestApproval: this.requestApproval,
					});
				}
				case "approval_daemon_status":
					return await handleDaemonStatus({
						requestApproval: this.requestApproval,
					});
				default:
					throw new McpError(
						ErrorCode.MethodNotFound,
						`Unknown tool: ${request.params.name}`,
					);
			}
		});
	}
}
