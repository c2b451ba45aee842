import type { EventSnapshot, Subscription, WatchChannel } from "./types";

/**
 * Consumes subscription changes and event updates. Registration is
 * update-or-create: repeating it for the same event and subscription must
 * leave a single reminder.
 */
export interface ReminderScheduler {
	registerOrUpdateReminder(
		event: EventSnapshot,
		subscription: Subscription
	): Promise<void>;
	onSubscriptionAdded(subscription: Subscription): Promise<void>;
	onSubscriptionRemoved(subscription: Subscription): Promise<void>;
}

export interface InviteSender {
	sendInvite(
		calendarId: string,
		channel: WatchChannel,
		event: EventSnapshot,
		subscription: Subscription
	): Promise<void>;
}
