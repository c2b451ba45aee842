import type { EventSnapshot } from "./types";

export interface EventDelta {
	events: EventSnapshot[];
	// Absent when Google returned no nextSyncToken on the last page
	nextSyncToken?: string;
}

export interface WatchRequest {
	channelId: string;
	address: string;
	token: string;
}

export interface WatchRegistration {
	resourceId: string;
	expiresAt: Date;
}

/**
 * Outcome of stopping a watch channel. Google answers 404 for a channel that
 * already expired or was stopped; callers treat that like a clean stop.
 */
export type StopResult =
	| { status: "stopped" }
	| { status: "already-absent" }
	| { status: "failed"; error: Error };

export interface CalendarGateway {
	/** Pages a field-less listing only to learn the current sync token. */
	initialSyncToken(calendarId: string): Promise<string>;
	/** Rejects with CursorExpiredError when the sync token is no longer valid. */
	listEventsSince(calendarId: string, syncToken: string): Promise<EventDelta>;
	watch(calendarId: string, request: WatchRequest): Promise<WatchRegistration>;
	stopWatch(channelId: string, resourceId: string): Promise<StopResult>;
}

export type GatewayFactory = (accountId: string) => Promise<CalendarGateway>;
