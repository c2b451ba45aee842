import type { InviteSender, ReminderScheduler } from "./collaborators";
import { ChannelTokenError, ResourceMismatchError } from "./errors";
import type { GatewayFactory } from "./gateway";
import type { CalendarStore } from "./store";
import { parseEventTime } from "./time";
import type { EventSnapshot, Subscription, WatchChannel } from "./types";

// Only events starting within this window are registered for reminders.
export const REMINDER_WINDOW_MS = 3 * 60 * 60 * 1000;

export interface ChannelNotification {
	channelId: string;
	resourceId: string | null;
	resourceState: string;
	token: string | null;
	messageNumber?: string | null;
}

export type ReconcileOutcome =
	| { status: "ignored"; reason: "sync" | "unknown-channel" }
	| {
			status: "processed";
			events: number;
			reminders: number;
			invites: number;
	  };

interface Cycle {
	channel: WatchChannel;
	reminderSubscriptions: Subscription[];
	inviteSubscriptions: Subscription[];
	reminders: number;
	invites: number;
}

/**
 * Turns one push notification into reminder registrations and invite
 * prompts. Any failure aborts the cycle before the sync token is stored, so
 * the next notification replays the same delta.
 */
export class WebhookReconciler {
	constructor(
		private readonly store: CalendarStore,
		private readonly gateways: GatewayFactory,
		private readonly reminders: ReminderScheduler,
		private readonly invites: InviteSender
	) {}

	async reconcile(notification: ChannelNotification): Promise<ReconcileOutcome> {
		if (notification.resourceState === "sync") {
			return { status: "ignored", reason: "sync" };
		}

		const channel = await this.store.getChannelById(notification.channelId);
		if (!channel) {
			console.log(`Channel not found: ${notification.channelId}`);
			return { status: "ignored", reason: "unknown-channel" };
		}

		if (notification.token !== channel.token) {
			throw new ChannelTokenError(channel.channelId);
		}
		if (channel.resourceId !== notification.resourceId) {
			throw new ResourceMismatchError(
				channel.channelId,
				channel.resourceId,
				notification.resourceId
			);
		}

		const { accountId, calendarId } = channel;
		const [reminderSubscriptions, inviteSubscriptions] = await Promise.all([
			this.store.getSubscriptionsByKind(accountId, calendarId, "reminder"),
			this.store.getSubscriptionsByKind(accountId, calendarId, "invite"),
		]);

		const gateway = await this.gateways(accountId);
		const delta = await gateway.listEventsSince(calendarId, channel.syncToken);

		const cycle: Cycle = {
			channel,
			reminderSubscriptions,
			inviteSubscriptions,
			reminders: 0,
			invites: 0,
		};
		for (const event of delta.events) {
			await this.processEvent(cycle, event);
		}

		await this.store.updateChannelSyncToken(
			channel.channelId,
			delta.nextSyncToken ?? channel.syncToken
		);

		console.log(
			`📊 Channel ${channel.channelId} (account ${accountId}, calendar ${calendarId}): ${delta.events.length} changed events, ${cycle.reminders} reminders, ${cycle.invites} invites`
		);
		return {
			status: "processed",
			events: delta.events.length,
			reminders: cycle.reminders,
			invites: cycle.invites,
		};
	}

	private async processEvent(cycle: Cycle, event: EventSnapshot) {
		if (event.status === "cancelled") {
			// the reminder scheduler drops reminders of cancelled events
			await this.dispatchReminders(cycle, event);
			return;
		}

		const { start, end, isAllDay } = parseEventTime(event.start, event.end);

		if (event.attendees.length === 0) {
			// no attendees: the user created the event
			await this.registerForReminders(cycle, event, start, isAllDay);
		}

		for (const attendee of event.attendees) {
			if (!attendee.self) continue;

			if (
				attendee.responseStatus === "accepted" ||
				attendee.responseStatus === "tentative"
			) {
				await this.registerForReminders(cycle, event, start, isAllDay);
			} else if (
				attendee.responseStatus === "needsAction" &&
				!attendee.organizer
			) {
				await this.sendInvites(cycle, event, end);
			}
		}
	}

	private async registerForReminders(
		cycle: Cycle,
		event: EventSnapshot,
		start: Date,
		isAllDay: boolean
	) {
		// TODO: all-day events need a reminder time of their own before they
		// can be registered
		if (isAllDay) return;

		const now = Date.now();
		if (start.getTime() > now && start.getTime() < now + REMINDER_WINDOW_MS) {
			await this.dispatchReminders(cycle, event);
		}
	}

	private async dispatchReminders(cycle: Cycle, event: EventSnapshot) {
		for (const subscription of cycle.reminderSubscriptions) {
			await this.reminders.registerOrUpdateReminder(event, subscription);
			cycle.reminders++;
		}
	}

	private async sendInvites(cycle: Cycle, event: EventSnapshot, end: Date) {
		if (event.recurringEventId && event.recurringEventId !== event.id) {
			// instances of a recurring event are handled through their series
			return;
		}
		if (Date.now() > end.getTime()) return;
		if (cycle.inviteSubscriptions.length === 0) return;

		const { channel } = cycle;
		const exists = await this.store.existsInvite(
			channel.accountId,
			channel.calendarId,
			event.id
		);
		if (exists) return;

		for (const subscription of cycle.inviteSubscriptions) {
			await this.invites.sendInvite(
				channel.calendarId,
				channel,
				event,
				subscription
			);
			cycle.invites++;
		}
		await this.store.insertInvite(channel.accountId, channel.calendarId, event.id);
	}
}
