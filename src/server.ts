import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import { createRenewChannelsRoute } from "@/app/api/cron/renew-channels/route";
import { createWebhookRoute } from "@/app/api/google/calendar/webhook/route";
import { createSubscriptionsRoute } from "@/app/api/subscriptions/route";
import type { WebhookReconciler } from "@/lib/reconciler";
import type { RenewalScheduler } from "@/lib/renewal";
import type { SubscriptionService } from "@/lib/subscriptions";

export interface ServerOptions {
	reconciler: WebhookReconciler;
	subscriptions: SubscriptionService;
	renewal: RenewalScheduler;
	jwtSecret: string;
	/** The renewal route is only mounted when a secret is configured. */
	cronSecret?: string;
	logger?: FastifyServerOptions["logger"];
}

export function createServer(options: ServerOptions): FastifyInstance {
	const fastify = Fastify({ logger: options.logger ?? false });

	const webhook = createWebhookRoute(options.reconciler);
	fastify.post("/api/google/calendar/webhook", webhook.POST);
	fastify.get("/api/google/calendar/webhook", webhook.GET);

	const subscriptions = createSubscriptionsRoute(
		options.subscriptions,
		options.jwtSecret
	);
	fastify.get("/api/subscriptions", subscriptions.GET);
	fastify.post("/api/subscriptions", subscriptions.POST);
	fastify.delete("/api/subscriptions", subscriptions.DELETE);

	if (options.cronSecret) {
		const renew = createRenewChannelsRoute(options.renewal, options.cronSecret);
		fastify.get("/api/cron/renew-channels", renew.GET);
	}

	return fastify;
}
