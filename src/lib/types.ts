export interface GoogleDetails {
	Connected: boolean;
	GoogleUserId: string | null;
	AccessToken: string | null;
	RefreshToken: string | null;
	ExpiryDate: Date | null;
	TokenType: string;
	Scopes: string[];
	IdToken: string | null;
	ConnectedAt: Date;
	UpdatedTime: Date;
}

export interface User {
	_id: string;
	email: string;
	name: string;
	Details: {
		Google?: GoogleDetails;
	};
}

export type SubscriptionKind = "reminder" | "invite";

export interface Subscription {
	accountId: string;
	calendarId: string;
	kind: SubscriptionKind;
	// Where reminders or invite prompts for this subscription are delivered
	target: string;
}

export interface WatchChannel {
	channelId: string;
	accountId: string;
	calendarId: string;
	resourceId: string;
	// Echoed back by Google as x-goog-channel-token on every notification
	token: string;
	expiresAt: Date;
	syncToken: string;
	createdAt: Date;
	renewedAt?: Date;
	lastSyncedAt?: Date;
}

export interface ChannelRenewal {
	channelId: string;
	resourceId: string;
	expiresAt: Date;
}

export interface InviteRecord {
	accountId: string;
	calendarId: string;
	eventId: string;
	createdAt: Date;
}

export type EventStatus = "confirmed" | "tentative" | "cancelled";

export type ResponseStatus =
	| "needsAction"
	| "declined"
	| "tentative"
	| "accepted";

export interface EventTime {
	date?: string;
	dateTime?: string;
	timeZone?: string;
}

export interface EventAttendee {
	email?: string;
	self: boolean;
	organizer: boolean;
	// absent when Google reports no response; such an attendee triggers nothing
	responseStatus?: ResponseStatus;
}

/**
 * A calendar event as returned by one delta fetch. Never persisted by the
 * reconciler; cancelled events from an incremental sync may carry nothing
 * but their id and status.
 */
export interface EventSnapshot {
	id: string;
	status: EventStatus;
	summary?: string;
	htmlLink?: string;
	start?: EventTime;
	end?: EventTime;
	recurringEventId?: string;
	attendees: EventAttendee[];
}
