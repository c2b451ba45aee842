import { vi } from "vitest";
import type { InviteSender, ReminderScheduler } from "@/lib/collaborators";
import type {
	EventAttendee,
	EventSnapshot,
	ResponseStatus,
	Subscription,
	WatchChannel,
} from "@/lib/types";

export const NOW = new Date("2026-10-19T12:00:00.000Z");
export const HOUR = 60 * 60 * 1000;

export const ACCOUNT = "account-1";
export const CALENDAR = "primary";

export function subscription(
	kind: Subscription["kind"],
	target: string,
	calendarId = CALENDAR
): Subscription {
	return { accountId: ACCOUNT, calendarId, kind, target };
}

export function channel(overrides: Partial<WatchChannel> = {}): WatchChannel {
	return {
		channelId: "channel-1",
		accountId: ACCOUNT,
		calendarId: CALENDAR,
		resourceId: "resource-1",
		token: "channel-token",
		expiresAt: new Date(NOW.getTime() + 7 * 24 * HOUR),
		syncToken: "sync-1",
		createdAt: NOW,
		...overrides,
	};
}

/** A one-hour event starting `startInHours` after NOW. */
export function timedEvent(
	id: string,
	startInHours: number,
	overrides: Partial<EventSnapshot> = {}
): EventSnapshot {
	const start = new Date(NOW.getTime() + startInHours * HOUR);
	const end = new Date(start.getTime() + HOUR);
	return {
		id,
		status: "confirmed",
		summary: `Event ${id}`,
		start: { dateTime: start.toISOString() },
		end: { dateTime: end.toISOString() },
		attendees: [],
		...overrides,
	};
}

export function self(
	responseStatus: ResponseStatus,
	organizer = false
): EventAttendee {
	return { email: "me@example.com", self: true, organizer, responseStatus };
}

export function other(responseStatus: ResponseStatus): EventAttendee {
	return {
		email: "colleague@example.com",
		self: false,
		organizer: true,
		responseStatus,
	};
}

export function fakeReminders() {
	return {
		registerOrUpdateReminder: vi.fn(
			async (_event: EventSnapshot, _subscription: Subscription) => {}
		),
		onSubscriptionAdded: vi.fn(async (_subscription: Subscription) => {}),
		onSubscriptionRemoved: vi.fn(async (_subscription: Subscription) => {}),
	} satisfies ReminderScheduler;
}

export function fakeInvites() {
	return {
		sendInvite: vi.fn(
			async (
				_calendarId: string,
				_channel: WatchChannel,
				_event: EventSnapshot,
				_subscription: Subscription
			) => {}
		),
	} satisfies InviteSender;
}
