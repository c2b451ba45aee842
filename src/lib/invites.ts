import type { Collection, Db } from "mongodb";
import type { InviteSender } from "./collaborators";
import { getCollection } from "./mongodb";
import type { EventSnapshot, Subscription, WatchChannel } from "./types";

export interface InvitePromptDocument {
	accountId: string;
	calendarId: string;
	eventId: string;
	target: string;
	summary: string;
	htmlLink: string | null;
	start: string | null;
	createdAt: Date;
}

// Appends to the `InvitePrompts` outbox; delivery happens elsewhere.
export class MongoInviteSender implements InviteSender {
	private readonly InvitePrompts: Collection<InvitePromptDocument>;

	constructor(db: Db) {
		this.InvitePrompts = getCollection<InvitePromptDocument>(
			db,
			"InvitePrompts"
		);
	}

	async sendInvite(
		calendarId: string,
		channel: WatchChannel,
		event: EventSnapshot,
		subscription: Subscription
	) {
		await this.InvitePrompts.insertOne({
			accountId: channel.accountId,
			calendarId,
			eventId: event.id,
			target: subscription.target,
			summary: event.summary || "No Title",
			htmlLink: event.htmlLink ?? null,
			start: event.start?.dateTime ?? event.start?.date ?? null,
			createdAt: new Date(),
		});
		console.log(
			`📨 Invite prompt queued for "${event.summary || "No Title"}" (${event.id}) -> ${subscription.target}`
		);
	}
}
