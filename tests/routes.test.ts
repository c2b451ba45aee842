import type { FastifyInstance } from "fastify";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createAccountToken } from "@/lib/auth";
import { ChannelManager } from "@/lib/channels";
import { MissingCredentialsError } from "@/lib/errors";
import { WebhookReconciler } from "@/lib/reconciler";
import { RenewalScheduler } from "@/lib/renewal";
import { SubscriptionService } from "@/lib/subscriptions";
import { createServer } from "@/server";
import { FakeGateway } from "./helpers/fake-gateway";
import {
	ACCOUNT,
	CALENDAR,
	channel,
	fakeInvites,
	fakeReminders,
} from "./helpers/fixtures";
import { MemoryCalendarStore } from "./helpers/memory-store";

const JWT_SECRET = "test-secret";
const CRON_SECRET = "test-cron-secret";

describe("HTTP routes", () => {
	let store: MemoryCalendarStore;
	let gateway: FakeGateway;
	let server: FastifyInstance;

	const token = createAccountToken(
		{ id: ACCOUNT, email: "me@example.com", name: "Me" },
		JWT_SECRET
	);
	const auth = { authorization: `Bearer ${token}` };

	beforeEach(() => {
		store = new MemoryCalendarStore();
		gateway = new FakeGateway();
		const gateways = async (accountId: string) => {
			if (accountId !== ACCOUNT) throw new MissingCredentialsError(accountId);
			return gateway;
		};
		const reminders = fakeReminders();
		const channels = new ChannelManager(store, gateways, {
			webhookAddress: "https://hooks.example.com/api/google/calendar/webhook",
		});

		server = createServer({
			reconciler: new WebhookReconciler(
				store,
				gateways,
				reminders,
				fakeInvites()
			),
			subscriptions: new SubscriptionService(store, channels, reminders),
			renewal: new RenewalScheduler(store, channels),
			jwtSecret: JWT_SECRET,
			cronSecret: CRON_SECRET,
		});
	});

	afterEach(async () => {
		await server.close();
	});

	describe("webhook", () => {
		const notification = {
			"x-goog-channel-id": "channel-1",
			"x-goog-resource-id": "resource-1",
			"x-goog-resource-state": "exists",
			"x-goog-channel-token": "channel-token",
			"x-goog-message-number": "7",
		};

		beforeEach(async () => {
			await store.insertChannel(channel());
		});

		it("rejects requests without channel headers", async () => {
			const response = await server.inject({
				method: "POST",
				url: "/api/google/calendar/webhook",
			});

			expect(response.statusCode).toBe(400);
			expect(response.json()).toEqual({ success: false, error: "Invalid headers" });
		});

		it("acknowledges the sync handshake", async () => {
			const response = await server.inject({
				method: "POST",
				url: "/api/google/calendar/webhook",
				headers: { ...notification, "x-goog-resource-state": "sync" },
			});

			expect(response.statusCode).toBe(200);
			expect(response.json()).toEqual({
				success: true,
				outcome: { status: "ignored", reason: "sync" },
			});
		});

		it("acknowledges notifications for unknown channels", async () => {
			const response = await server.inject({
				method: "POST",
				url: "/api/google/calendar/webhook",
				headers: { ...notification, "x-goog-channel-id": "gone" },
			});

			expect(response.statusCode).toBe(200);
			expect(response.json().outcome).toEqual({
				status: "ignored",
				reason: "unknown-channel",
			});
		});

		it("processes a change and advances the cursor", async () => {
			gateway.deltas.set("sync-1", { events: [], nextSyncToken: "sync-2" });

			const response = await server.inject({
				method: "POST",
				url: "/api/google/calendar/webhook",
				headers: notification,
			});

			expect(response.statusCode).toBe(200);
			expect(response.json().outcome).toEqual({
				status: "processed",
				events: 0,
				reminders: 0,
				invites: 0,
			});
			expect((await store.getChannelById("channel-1"))?.syncToken).toBe("sync-2");
		});

		it("answers 403 to a forged channel token", async () => {
			const response = await server.inject({
				method: "POST",
				url: "/api/google/calendar/webhook",
				headers: { ...notification, "x-goog-channel-token": "forged" },
			});

			expect(response.statusCode).toBe(403);
		});

		it("answers 500 when the resource id does not match", async () => {
			const response = await server.inject({
				method: "POST",
				url: "/api/google/calendar/webhook",
				headers: { ...notification, "x-goog-resource-id": "resource-2" },
			});

			expect(response.statusCode).toBe(500);
			expect(response.json()).toMatchObject({
				success: false,
				error: "Webhook processing failed",
			});
		});

		it("responds to a liveness probe", async () => {
			const response = await server.inject({
				method: "GET",
				url: "/api/google/calendar/webhook",
			});

			expect(response.statusCode).toBe(200);
			expect(response.json().success).toBe(true);
		});
	});

	describe("subscriptions", () => {
		const body = { calendarId: CALENDAR, kind: "reminder", target: "conv-a" };

		it("requires a valid token", async () => {
			const missing = await server.inject({
				method: "POST",
				url: "/api/subscriptions",
				payload: body,
			});
			const forged = await server.inject({
				method: "POST",
				url: "/api/subscriptions",
				headers: {
					authorization: `Bearer ${createAccountToken(
						{ id: ACCOUNT, email: "me@example.com", name: "Me" },
						"wrong-secret"
					)}`,
				},
				payload: body,
			});

			expect(missing.statusCode).toBe(401);
			expect(forged.statusCode).toBe(401);
			expect(gateway.watchCalls).toHaveLength(0);
		});

		it("validates the body", async () => {
			const response = await server.inject({
				method: "POST",
				url: "/api/subscriptions",
				headers: auth,
				payload: { calendarId: CALENDAR, kind: "digest", target: "conv-a" },
			});

			expect(response.statusCode).toBe(400);
			expect(response.json().message).toBe(
				"calendarId, kind and target are required"
			);
		});

		it("creates a subscription once and opens its channel", async () => {
			const created = await server.inject({
				method: "POST",
				url: "/api/subscriptions",
				headers: auth,
				payload: body,
			});
			const repeated = await server.inject({
				method: "POST",
				url: "/api/subscriptions",
				headers: auth,
				payload: body,
			});

			expect(created.statusCode).toBe(201);
			expect(repeated.statusCode).toBe(200);
			expect(repeated.json().message).toBe("Subscription already exists");
			expect(gateway.watchCalls).toHaveLength(1);

			const listed = await server.inject({
				method: "GET",
				url: "/api/subscriptions",
				headers: auth,
			});
			expect(listed.json().subscriptions).toEqual([
				{ accountId: ACCOUNT, ...body },
			]);
		});

		it("removes a subscription and releases the channel", async () => {
			await server.inject({
				method: "POST",
				url: "/api/subscriptions",
				headers: auth,
				payload: body,
			});

			const removed = await server.inject({
				method: "DELETE",
				url: "/api/subscriptions",
				headers: auth,
				payload: body,
			});
			const again = await server.inject({
				method: "DELETE",
				url: "/api/subscriptions",
				headers: auth,
				payload: body,
			});

			expect(removed.statusCode).toBe(200);
			expect(again.statusCode).toBe(404);
			expect(gateway.stopCalls).toHaveLength(1);
			expect(store.channels.size).toBe(0);
		});

		it("reports accounts without Google credentials", async () => {
			const stranger = createAccountToken(
				{ id: "account-2", email: "you@example.com", name: "You" },
				JWT_SECRET
			);

			const response = await server.inject({
				method: "POST",
				url: "/api/subscriptions",
				headers: { authorization: `Bearer ${stranger}` },
				payload: body,
			});

			expect(response.statusCode).toBe(400);
			expect(response.json().message).toBe(
				"Google not connected. Please connect first."
			);
		});
	});

	describe("renewal trigger", () => {
		it("requires the cron secret", async () => {
			const response = await server.inject({
				method: "GET",
				url: "/api/cron/renew-channels",
			});

			expect(response.statusCode).toBe(401);
		});

		it("runs one renewal pass", async () => {
			await store.insertChannel(
				channel({ expiresAt: new Date(Date.now() + 60 * 60 * 1000) })
			);

			const response = await server.inject({
				method: "GET",
				url: "/api/cron/renew-channels",
				headers: { authorization: `Bearer ${CRON_SECRET}` },
			});

			expect(response.statusCode).toBe(200);
			expect(response.json()).toEqual({
				success: true,
				message: "Processed 1 channels",
				renewed: 1,
				failed: 0,
			});
			expect(await store.getChannelById("channel-1")).toBeNull();
		});
	});
});
