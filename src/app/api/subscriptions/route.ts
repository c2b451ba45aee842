import type { FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { getAccountFromRequest } from "@/lib/auth";
import { MissingCredentialsError, errorMessage } from "@/lib/errors";
import type { SubscriptionService } from "@/lib/subscriptions";
import type { Subscription } from "@/lib/types";

const subscriptionBodySchema = z.object({
	calendarId: z.string().min(1),
	kind: z.enum(["reminder", "invite"]),
	target: z.string().min(1),
});

export function createSubscriptionsRoute(
	subscriptions: SubscriptionService,
	jwtSecret: string
) {
	type Parsed =
		| { ok: true; subscription: Subscription }
		| { ok: false; code: number; body: Record<string, unknown> };

	function parseSubscription(request: FastifyRequest): Parsed {
		const account = getAccountFromRequest(request, jwtSecret);
		if (!account) {
			return {
				ok: false,
				code: 401,
				body: { success: false, message: "Please login first" },
			};
		}

		const body = subscriptionBodySchema.safeParse(request.body);
		if (!body.success) {
			return {
				ok: false,
				code: 400,
				body: {
					success: false,
					message: "calendarId, kind and target are required",
					error: body.error.issues
						.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
						.join("; "),
				},
			};
		}

		return {
			ok: true,
			subscription: { accountId: account.id, ...body.data },
		};
	}

	function failure(reply: FastifyReply, action: string, error: unknown) {
		console.error(`${action} failed:`, errorMessage(error));
		if (error instanceof MissingCredentialsError) {
			return reply.code(400).send({
				success: false,
				message: "Google not connected. Please connect first.",
			});
		}
		return reply.code(500).send({
			success: false,
			message: `${action} failed`,
			error: errorMessage(error),
		});
	}

	async function GET(request: FastifyRequest, reply: FastifyReply) {
		const account = getAccountFromRequest(request, jwtSecret);
		if (!account) {
			return reply
				.code(401)
				.send({ success: false, message: "Please login first" });
		}

		try {
			return reply.send({
				success: true,
				subscriptions: await subscriptions.list(account.id),
			});
		} catch (error) {
			return failure(reply, "Listing subscriptions", error);
		}
	}

	async function POST(request: FastifyRequest, reply: FastifyReply) {
		const parsed = parseSubscription(request);
		if (!parsed.ok) return reply.code(parsed.code).send(parsed.body);
		const { subscription } = parsed;

		try {
			const created = await subscriptions.add(subscription);
			return reply.code(created ? 201 : 200).send({
				success: true,
				message: created
					? `Subscribed to calendar ${subscription.calendarId}`
					: "Subscription already exists",
				subscription,
			});
		} catch (error) {
			return failure(reply, "Subscribing", error);
		}
	}

	async function DELETE(request: FastifyRequest, reply: FastifyReply) {
		const parsed = parseSubscription(request);
		if (!parsed.ok) return reply.code(parsed.code).send(parsed.body);
		const { subscription } = parsed;

		try {
			const removed = await subscriptions.remove(subscription);
			if (!removed) {
				return reply
					.code(404)
					.send({ success: false, message: "Subscription not found" });
			}
			return reply.send({
				success: true,
				message: `Unsubscribed from calendar ${subscription.calendarId}`,
			});
		} catch (error) {
			return failure(reply, "Unsubscribing", error);
		}
	}

	return { GET, POST, DELETE };
}
