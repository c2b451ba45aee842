import type { Collection, Db } from "mongodb";
import { getCollection } from "./mongodb";
import type {
	ChannelRenewal,
	GoogleDetails,
	InviteRecord,
	Subscription,
	SubscriptionKind,
	User,
	WatchChannel,
} from "./types";

/**
 * Persistence contract for subscriptions, watch channels and invite markers.
 * Each call is atomic on a single record; nothing spans records.
 */
export interface CalendarStore {
	existsSubscription(subscription: Subscription): Promise<boolean>;
	insertSubscription(subscription: Subscription): Promise<void>;
	/** Resolves false when there was nothing to delete. */
	deleteSubscription(subscription: Subscription): Promise<boolean>;
	listSubscriptions(accountId: string): Promise<Subscription[]>;
	getSubscriptionsByKind(
		accountId: string,
		calendarId: string,
		kind: SubscriptionKind
	): Promise<Subscription[]>;
	countSubscriptions(accountId: string, calendarId: string): Promise<number>;

	getChannelById(channelId: string): Promise<WatchChannel | null>;
	getChannelByCalendar(
		accountId: string,
		calendarId: string
	): Promise<WatchChannel | null>;
	insertChannel(channel: WatchChannel): Promise<void>;
	deleteChannel(channelId: string): Promise<void>;
	updateChannelSyncToken(channelId: string, syncToken: string): Promise<void>;
	/**
	 * Replaces identifiers and expiry in place; the sync token is untouched.
	 * Resolves false when no channel has that id any more.
	 */
	swapChannel(channelId: string, renewal: ChannelRenewal): Promise<boolean>;
	listChannelsExpiringBefore(before: Date): Promise<WatchChannel[]>;

	existsInvite(
		accountId: string,
		calendarId: string,
		eventId: string
	): Promise<boolean>;
	insertInvite(
		accountId: string,
		calendarId: string,
		eventId: string
	): Promise<void>;

	getGoogleCredentials(accountId: string): Promise<GoogleDetails | null>;
}

function subscriptionFilter(subscription: Subscription) {
	return {
		accountId: subscription.accountId,
		calendarId: subscription.calendarId,
		kind: subscription.kind,
		target: subscription.target,
	};
}

function toSubscription(doc: Subscription): Subscription {
	return {
		accountId: doc.accountId,
		calendarId: doc.calendarId,
		kind: doc.kind,
		target: doc.target,
	};
}

export class MongoCalendarStore implements CalendarStore {
	private readonly Subscriptions: Collection<Subscription>;
	private readonly Channels: Collection<WatchChannel>;
	private readonly Invites: Collection<InviteRecord>;
	private readonly Users: Collection<User>;

	constructor(db: Db) {
		this.Subscriptions = getCollection<Subscription>(db, "Subscriptions");
		this.Channels = getCollection<WatchChannel>(db, "WatchChannel");
		this.Invites = getCollection<InviteRecord>(db, "Invites");
		this.Users = getCollection<User>(db, "Users");
	}

	async ensureIndexes() {
		await this.Subscriptions.createIndex(
			{ accountId: 1, calendarId: 1, kind: 1, target: 1 },
			{ unique: true }
		);
		await this.Channels.createIndex({ channelId: 1 }, { unique: true });
		await this.Channels.createIndex(
			{ accountId: 1, calendarId: 1 },
			{ unique: true }
		);
		await this.Channels.createIndex({ expiresAt: 1 });
		await this.Invites.createIndex(
			{ accountId: 1, calendarId: 1, eventId: 1 },
			{ unique: true }
		);
	}

	async existsSubscription(subscription: Subscription) {
		const count = await this.Subscriptions.countDocuments(
			subscriptionFilter(subscription),
			{ limit: 1 }
		);
		return count > 0;
	}

	async insertSubscription(subscription: Subscription) {
		await this.Subscriptions.insertOne(toSubscription(subscription));
	}

	async deleteSubscription(subscription: Subscription) {
		const result = await this.Subscriptions.deleteOne(
			subscriptionFilter(subscription)
		);
		return result.deletedCount > 0;
	}

	async listSubscriptions(accountId: string) {
		const docs = await this.Subscriptions.find({ accountId }).toArray();
		return docs.map(toSubscription);
	}

	async getSubscriptionsByKind(
		accountId: string,
		calendarId: string,
		kind: SubscriptionKind
	) {
		const docs = await this.Subscriptions.find({
			accountId,
			calendarId,
			kind,
		}).toArray();
		return docs.map(toSubscription);
	}

	async countSubscriptions(accountId: string, calendarId: string) {
		return this.Subscriptions.countDocuments({ accountId, calendarId });
	}

	async getChannelById(channelId: string) {
		return this.Channels.findOne({ channelId });
	}

	async getChannelByCalendar(accountId: string, calendarId: string) {
		return this.Channels.findOne({ accountId, calendarId });
	}

	async insertChannel(channel: WatchChannel) {
		await this.Channels.insertOne({ ...channel });
	}

	async deleteChannel(channelId: string) {
		await this.Channels.deleteOne({ channelId });
	}

	async updateChannelSyncToken(channelId: string, syncToken: string) {
		await this.Channels.updateOne(
			{ channelId },
			{ $set: { syncToken, lastSyncedAt: new Date() } }
		);
	}

	async swapChannel(channelId: string, renewal: ChannelRenewal) {
		const result = await this.Channels.updateOne(
			{ channelId },
			{
				$set: {
					channelId: renewal.channelId,
					resourceId: renewal.resourceId,
					expiresAt: renewal.expiresAt,
					renewedAt: new Date(),
				},
			}
		);
		return result.matchedCount > 0;
	}

	async listChannelsExpiringBefore(before: Date) {
		return this.Channels.find({ expiresAt: { $lt: before } }).toArray();
	}

	async existsInvite(accountId: string, calendarId: string, eventId: string) {
		const count = await this.Invites.countDocuments(
			{ accountId, calendarId, eventId },
			{ limit: 1 }
		);
		return count > 0;
	}

	async insertInvite(accountId: string, calendarId: string, eventId: string) {
		await this.Invites.updateOne(
			{ accountId, calendarId, eventId },
			{ $setOnInsert: { createdAt: new Date() } },
			{ upsert: true }
		);
	}

	async getGoogleCredentials(accountId: string) {
		const user = await this.Users.findOne({ _id: accountId });
		return user?.Details?.Google ?? null;
	}
}
