import type { ChannelManager } from "./channels";
import type { ReminderScheduler } from "./collaborators";
import type { CalendarStore } from "./store";
import type { Subscription } from "./types";

export class SubscriptionService {
	constructor(
		private readonly store: CalendarStore,
		private readonly channels: ChannelManager,
		private readonly reminders: ReminderScheduler
	) {}

	list(accountId: string) {
		return this.store.listSubscriptions(accountId);
	}

	/**
	 * Resolves false when the subscription already existed. The channel is
	 * opened before the subscription is written, so a crash in between leaves
	 * at worst an unreferenced channel.
	 */
	async add(subscription: Subscription) {
		if (await this.store.existsSubscription(subscription)) return false;

		await this.channels.ensureChannel(
			subscription.accountId,
			subscription.calendarId
		);
		await this.store.insertSubscription(subscription);
		await this.reminders.onSubscriptionAdded(subscription);

		console.log(
			`➕ ${subscription.kind} subscription added for account ${subscription.accountId}, calendar ${subscription.calendarId}`
		);
		return true;
	}

	/** Resolves false when there was no such subscription. */
	async remove(subscription: Subscription) {
		const removed = await this.store.deleteSubscription(subscription);
		if (!removed) return false;

		await this.reminders.onSubscriptionRemoved(subscription);
		console.log(
			`➖ ${subscription.kind} subscription removed for account ${subscription.accountId}, calendar ${subscription.calendarId}`
		);

		const remaining = await this.store.countSubscriptions(
			subscription.accountId,
			subscription.calendarId
		);
		if (remaining === 0) {
			await this.channels.releaseChannel(
				subscription.accountId,
				subscription.calendarId
			);
		}
		return true;
	}
}
