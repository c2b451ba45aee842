import type { FastifyReply, FastifyRequest } from "fastify";
import { ChannelTokenError, errorMessage } from "@/lib/errors";
import type { WebhookReconciler } from "@/lib/reconciler";
import { header } from "@/app/api/request";

export function createWebhookRoute(reconciler: WebhookReconciler) {
	async function POST(request: FastifyRequest, reply: FastifyReply) {
		const channelId = header(request, "x-goog-channel-id");
		const resourceState = header(request, "x-goog-resource-state");
		const resourceId = header(request, "x-goog-resource-id");
		const channelToken = header(request, "x-goog-channel-token");
		const messageNumber = header(request, "x-goog-message-number");

		if (!channelId || !resourceState) {
			console.log("❌ Missing required webhook headers");
			return reply
				.code(400)
				.send({ success: false, error: "Invalid headers" });
		}

		try {
			const outcome = await reconciler.reconcile({
				channelId,
				resourceId,
				resourceState,
				token: channelToken,
				messageNumber,
			});
			return reply.send({ success: true, outcome });
		} catch (error) {
			console.error(
				`❌ Error in event update webhook for channel ${channelId} (message ${messageNumber}): ${errorMessage(error)}`
			);
			if (error instanceof ChannelTokenError) {
				return reply.code(403).send({ success: false, error: "Invalid token" });
			}
			return reply.code(500).send({
				success: false,
				error: "Webhook processing failed",
				details: errorMessage(error),
			});
		}
	}

	// Lets a deployment check that the callback address is reachable
	async function GET(_request: FastifyRequest, reply: FastifyReply) {
		return reply.send({
			success: true,
			message: "Google Calendar Webhook endpoint is active",
			timestamp: new Date().toISOString(),
		});
	}

	return { POST, GET };
}
