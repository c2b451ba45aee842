import type { Collection, Db } from "mongodb";
import type { ReminderScheduler } from "./collaborators";
import { getCollection } from "./mongodb";
import { parseEventTime } from "./time";
import type { EventSnapshot, Subscription } from "./types";

export interface ReminderDocument {
	accountId: string;
	calendarId: string;
	eventId: string;
	target: string;
	summary: string;
	startsAt: Date;
	htmlLink: string | null;
	updatedAt: Date;
}

/**
 * Keeps one `Reminders` document per (event, subscription). The delivery
 * transport polls this collection and fires at `startsAt`.
 */
export class MongoReminderScheduler implements ReminderScheduler {
	private readonly Reminders: Collection<ReminderDocument>;

	constructor(db: Db) {
		this.Reminders = getCollection<ReminderDocument>(db, "Reminders");
	}

	async registerOrUpdateReminder(
		event: EventSnapshot,
		subscription: Subscription
	) {
		const key = {
			accountId: subscription.accountId,
			calendarId: subscription.calendarId,
			eventId: event.id,
			target: subscription.target,
		};

		if (event.status === "cancelled") {
			await this.Reminders.deleteOne(key);
			console.log(`🗑️ Removed reminder for cancelled event ${event.id}`);
			return;
		}

		const { start } = parseEventTime(event.start, event.end);

		await this.Reminders.updateOne(
			key,
			{
				$set: {
					summary: event.summary || "No Title",
					startsAt: start,
					htmlLink: event.htmlLink ?? null,
					updatedAt: new Date(),
				},
			},
			{ upsert: true }
		);
		console.log(
			`⏰ Reminder set for "${event.summary || "No Title"}" (${event.id}) -> ${subscription.target}`
		);
	}

	async onSubscriptionAdded(subscription: Subscription) {
		if (subscription.kind !== "reminder") return;
		console.log(
			`⏰ Reminders enabled for account ${subscription.accountId}, calendar ${subscription.calendarId}`
		);
	}

	async onSubscriptionRemoved(subscription: Subscription) {
		if (subscription.kind !== "reminder") return;
		const result = await this.Reminders.deleteMany({
			accountId: subscription.accountId,
			calendarId: subscription.calendarId,
			target: subscription.target,
		});
		console.log(
			`🗑️ Dropped ${result.deletedCount} reminders for account ${subscription.accountId}, calendar ${subscription.calendarId}`
		);
	}
}
