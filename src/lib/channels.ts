import { v4 as uuid } from "uuid";
import type { GatewayFactory } from "./gateway";
import type { CalendarStore } from "./store";
import type { WatchChannel } from "./types";

export interface ChannelManagerOptions {
	webhookAddress: string;
}

/**
 * Owns the single watch channel per (account, calendar). Channels are opened
 * on the first subscription, closed after the last one, and swapped for a
 * fresh registration before they expire.
 */
export class ChannelManager {
	// Opens in progress, keyed by account and calendar
	private readonly opening = new Map<string, Promise<WatchChannel>>();

	constructor(
		private readonly store: CalendarStore,
		private readonly gateways: GatewayFactory,
		private readonly options: ChannelManagerOptions
	) {}

	/**
	 * Resolves to the channel for the pair, opening one if needed. Concurrent
	 * callers for the same pair share a single open.
	 */
	ensureChannel(accountId: string, calendarId: string): Promise<WatchChannel> {
		const key = `${accountId}|${calendarId}`;
		const pending = this.opening.get(key);
		if (pending) return pending;

		const open = this.openChannel(accountId, calendarId).finally(() => {
			this.opening.delete(key);
		});
		this.opening.set(key, open);
		return open;
	}

	private async openChannel(accountId: string, calendarId: string) {
		const existing = await this.store.getChannelByCalendar(accountId, calendarId);
		if (existing) return existing;

		const gateway = await this.gateways(accountId);

		// TODO: seed the invite markers from the current listing so that
		// invites pending before the first subscription are not missed
		const syncToken = await gateway.initialSyncToken(calendarId);

		const channelId = uuid();
		const token = uuid();
		const registration = await gateway.watch(calendarId, {
			channelId,
			address: this.options.webhookAddress,
			token,
		});

		const channel: WatchChannel = {
			channelId,
			accountId,
			calendarId,
			resourceId: registration.resourceId,
			token,
			expiresAt: registration.expiresAt,
			syncToken,
			createdAt: new Date(),
		};
		await this.store.insertChannel(channel);

		console.log(
			`✅ Watch channel ${channelId} opened for account ${accountId}, calendar ${calendarId}`
		);
		return channel;
	}

	/**
	 * Stops and forgets the channel for the pair. Resolves false when there
	 * was no channel to release.
	 */
	async releaseChannel(accountId: string, calendarId: string) {
		const channel = await this.store.getChannelByCalendar(accountId, calendarId);
		if (!channel) return false;

		const gateway = await this.gateways(accountId);
		const result = await gateway.stopWatch(channel.channelId, channel.resourceId);
		if (result.status === "failed") {
			throw result.error;
		}
		if (result.status === "already-absent") {
			console.log(`Channel ${channel.channelId} was already gone on Google's side`);
		}

		await this.store.deleteChannel(channel.channelId);
		console.log(
			`🗑️ Watch channel ${channel.channelId} released for account ${accountId}, calendar ${calendarId}`
		);
		return true;
	}

	/**
	 * Opens a replacement registration, swaps it into the stored record and
	 * then stops the old one. The sync token is carried over untouched.
	 * Resolves null when the channel was released while renewing; the
	 * replacement registration is stopped again.
	 */
	async renew(channel: WatchChannel): Promise<WatchChannel | null> {
		const gateway = await this.gateways(channel.accountId);

		const channelId = uuid();
		const registration = await gateway.watch(channel.calendarId, {
			channelId,
			address: this.options.webhookAddress,
			token: channel.token,
		});

		const swapped = await this.store.swapChannel(channel.channelId, {
			channelId,
			resourceId: registration.resourceId,
			expiresAt: registration.expiresAt,
		});
		if (!swapped) {
			console.log(
				`Channel ${channel.channelId} was released during renewal, stopping ${channelId}`
			);
			const result = await gateway.stopWatch(channelId, registration.resourceId);
			if (result.status === "failed") {
				throw result.error;
			}
			return null;
		}

		const renewed: WatchChannel = {
			...channel,
			channelId,
			resourceId: registration.resourceId,
			expiresAt: registration.expiresAt,
		};

		const result = await gateway.stopWatch(channel.channelId, channel.resourceId);
		if (result.status === "failed") {
			throw result.error;
		}

		console.log(
			`✅ Renewed channel for calendar ${channel.calendarId}: ${channel.channelId} -> ${channelId}`
		);
		return renewed;
	}
}
