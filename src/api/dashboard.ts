import { zValidator } from "@hono/zod-validator";
import { type Context, Hono } from "hono";
import { streamSSE } from "hono/streaming";
import { z } from "zod";
import { type Clock, systemClock } from "../clock.ts";
import type { DashboardSession } from "../dashboard/session.ts";
import { renderPage } from "../pages/render.ts";
import type { ApprovalQueue } from "../services/approval-queue.ts";
import type { EmailPayload, Verdict } from "../types.ts";
import { debug, errorMessage, info } from "../utils.ts";

const sessionParamSchema = z.object({
	sessionId: z.string().min(1),
});

interface DashboardRouterOptions {
	session: DashboardSession;
	queue: ApprovalQueue<EmailPayload>;
	clock?: Clock;
}

const forbidden = (c: Context) => c.json({ error: "invalid session" }, 403);

const nothingPending = (c: Context) =>
	c.json({ success: false, error: "no email pending approval" }, 409);

export function createDashboardRouter(options: DashboardRouterOptions) {
	const { session, queue } = options;
	const clock = options.clock ?? systemClock;
	const app = new Hono();

	app.get("/outbox/:sessionId", zValidator("param", sessionParamSchema), (c) => {
		if (!session.matches(c.req.valid("param").sessionId)) {
			return forbidden(c);
		}
		return c.html(renderPage("dashboard", { sessionId: session.id }));
	});

	app.get(
		"/api/pending/:sessionId",
		zValidator("param", sessionParamSchema),
		(c) => {
			if (!session.matches(c.req.valid("param").sessionId)) {
				return forbidden(c);
			}

			const pending = queue.snapshot();
			if (!pending) {
				return c.json({ pending: false });
			}
			const remainingMs = pending.deadline.getTime() - clock.now().getTime();
			return c.json({
				pending: true,
				id: pending.id,
				to: pending.payload.to,
				subject: pending.payload.subject,
				body: pending.payload.body,
				draftId: pending.payload.draftId,
				queuedAt: pending.queuedAt.toISOString(),
				expiresIn: Math.max(0, Math.round(remainingMs / 1000)),
			});
		},
	);

	app.get(
		"/api/history/:sessionId",
		zValidator("param", sessionParamSchema),
		(c) => {
			if (!session.matches(c.req.valid("param").sessionId)) {
				return forbidden(c);
			}
			return c.json(session.history);
		},
	);

	const decide = (verdict: Verdict) => (c: Context) => {
		const current = queue.current();
		if (!current) {
			return nothingPending(c);
		}
		const token =
			verdict === "approve" ? current.approveToken : current.rejectToken;
		if (!queue.resolve(token, verdict, "dashboard")) {
			return nothingPending(c);
		}
		info(`Email ${verdict === "approve" ? "approved" : "rejected"} via dashboard`, {
			requestId: current.id,
		});
		return c.json({
			success: true,
			message: verdict === "approve" ? "Email approved" : "Email rejected",
		});
	};

	app.post(
		"/api/approve/:sessionId",
		zValidator("param", sessionParamSchema),
		(c) => {
			if (!session.matches(c.req.valid("param").sessionId)) {
				return forbidden(c);
			}
			return decide("approve")(c);
		},
	);

	app.post(
		"/api/reject/:sessionId",
		zValidator("param", sessionParamSchema),
		(c) => {
			if (!session.matches(c.req.valid("param").sessionId)) {
				return forbidden(c);
			}
			return decide("reject")(c);
		},
	);

	app.get("/events/:sessionId", zValidator("param", sessionParamSchema), (c) => {
		if (!session.matches(c.req.valid("param").sessionId)) {
			return forbidden(c);
		}

		return streamSSE(c, async (stream) => {
			await stream.writeSSE({ data: "connected" });
			await new Promise<void>((resolve) => {
				const unsubscribe = session.subscribe(() => {
					stream.writeSSE({ data: "update" }).catch((err) => {
						debug("Dashboard event write failed", { error: errorMessage(err) });
					});
				});
				const finish = () => {
					unsubscribe();
					resolve();
				};
				if (stream.aborted) {
					finish();
					return;
				}
				stream.onAbort(finish);
			});
		});
	});

	return app;
}
