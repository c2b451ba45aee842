import { ChannelManager } from "@/lib/channels";
import { loadConfig } from "@/lib/config";
import { createGatewayFactory } from "@/lib/google";
import { MongoInviteSender } from "@/lib/invites";
import { closeDatabase, connectToDatabase } from "@/lib/mongodb";
import { WebhookReconciler } from "@/lib/reconciler";
import { MongoReminderScheduler } from "@/lib/reminders";
import { RenewalScheduler } from "@/lib/renewal";
import { MongoCalendarStore } from "@/lib/store";
import { SubscriptionService } from "@/lib/subscriptions";
import { createServer } from "./server";

async function main() {
	const config = loadConfig();

	const db = await connectToDatabase(config.MONGODB_URI);
	const store = new MongoCalendarStore(db);
	await store.ensureIndexes();

	const gateways = createGatewayFactory(store, {
		clientId: config.GOOGLE_CLIENT_ID,
		clientSecret: config.GOOGLE_CLIENT_SECRET,
		redirectUri: config.GOOGLE_REDIRECT_URI,
	});
	const reminders = new MongoReminderScheduler(db);
	const invites = new MongoInviteSender(db);

	const channels = new ChannelManager(store, gateways, {
		webhookAddress: config.WEBHOOK_ADDRESS,
	});
	const renewal = new RenewalScheduler(store, channels, {
		intervalMs: config.RENEW_INTERVAL_MS,
		horizonMs: config.RENEW_HORIZON_MS,
	});

	const server = createServer({
		reconciler: new WebhookReconciler(store, gateways, reminders, invites),
		subscriptions: new SubscriptionService(store, channels, reminders),
		renewal,
		jwtSecret: config.JWT_SECRET,
		cronSecret: config.CRON_SECRET,
		logger: { level: config.LOG_LEVEL },
	});

	let shuttingDown = false;
	const shutdown = async (signal: string) => {
		if (shuttingDown) return;
		shuttingDown = true;
		console.log(`${signal} received, shutting down`);
		try {
			await renewal.stop();
			await server.close();
			await closeDatabase();
			process.exit(0);
		} catch (err) {
			console.error("Error during shutdown:", err);
			process.exit(1);
		}
	};
	process.on("SIGINT", () => void shutdown("SIGINT"));
	process.on("SIGTERM", () => void shutdown("SIGTERM"));

	renewal.start();
	await server.listen({ port: config.PORT, host: config.HOST });
}

main().catch((err) => {
	console.error("Failed to start:", err);
	process.exit(1);
});
