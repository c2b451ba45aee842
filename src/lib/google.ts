import { google, type calendar_v3 } from "googleapis";
import {
	CursorExpiredError,
	GatewayError,
	MissingCredentialsError,
	errorMessage,
} from "./errors";
import type {
	CalendarGateway,
	EventDelta,
	GatewayFactory,
	StopResult,
	WatchRequest,
} from "./gateway";
import type { CalendarStore } from "./store";
import type {
	EventAttendee,
	EventSnapshot,
	EventStatus,
	EventTime,
	GoogleDetails,
	ResponseStatus,
} from "./types";

export interface OAuthClientConfig {
	clientId: string;
	clientSecret: string;
	redirectUri: string;
}

export function createCalendarClient(
	oauth: OAuthClientConfig,
	tokens: Pick<GoogleDetails, "AccessToken" | "RefreshToken" | "ExpiryDate">
) {
	const oauth2 = new google.auth.OAuth2(
		oauth.clientId,
		oauth.clientSecret,
		oauth.redirectUri
	);

	oauth2.setCredentials({
		access_token: tokens.AccessToken || undefined,
		refresh_token: tokens.RefreshToken || undefined,
		expiry_date: tokens.ExpiryDate
			? new Date(tokens.ExpiryDate).getTime()
			: undefined,
	});

	return google.calendar({ version: "v3", auth: oauth2 });
}

/**
 * HTTP status of a failed googleapis call. Older clients put it on `code`,
 * newer ones only on `response.status`.
 */
export function statusOf(error: unknown): number | undefined {
	if (typeof error !== "object" || error === null) return undefined;
	if (
		"response" in error &&
		typeof error.response === "object" &&
		error.response !== null &&
		"status" in error.response &&
		typeof error.response.status === "number"
	) {
		return error.response.status;
	}
	if ("code" in error) {
		const code = Number(error.code);
		if (Number.isInteger(code) && code >= 100 && code < 600) return code;
	}
	return undefined;
}

function toGatewayError(action: string, error: unknown) {
	return new GatewayError(`${action} failed: ${errorMessage(error)}`, statusOf(error), {
		cause: error,
	});
}

const RESPONSE_STATUSES = new Set<string>([
	"needsAction",
	"declined",
	"tentative",
	"accepted",
]);

function isResponseStatus(value: string): value is ResponseStatus {
	return RESPONSE_STATUSES.has(value);
}

function toEventStatus(status: string | null | undefined): EventStatus {
	if (status === "cancelled" || status === "tentative") return status;
	return "confirmed";
}

function toEventTime(
	time: calendar_v3.Schema$EventDateTime | undefined
): EventTime | undefined {
	if (!time) return undefined;
	return {
		date: time.date ?? undefined,
		dateTime: time.dateTime ?? undefined,
		timeZone: time.timeZone ?? undefined,
	};
}

function toAttendee(attendee: calendar_v3.Schema$EventAttendee): EventAttendee {
	const { responseStatus } = attendee;
	return {
		email: attendee.email ?? undefined,
		self: attendee.self === true,
		organizer: attendee.organizer === true,
		responseStatus:
			responseStatus && isResponseStatus(responseStatus)
				? responseStatus
				: undefined,
	};
}

export function toEventSnapshot(event: calendar_v3.Schema$Event): EventSnapshot {
	return {
		id: event.id ?? "",
		status: toEventStatus(event.status),
		summary: event.summary ?? undefined,
		htmlLink: event.htmlLink ?? undefined,
		start: toEventTime(event.start),
		end: toEventTime(event.end),
		recurringEventId: event.recurringEventId ?? undefined,
		attendees: (event.attendees ?? []).map(toAttendee),
	};
}

/** The slice of `calendar_v3.Calendar` the gateway calls. */
export interface CalendarApi {
	events: {
		list(
			params: calendar_v3.Params$Resource$Events$List
		): Promise<{ data: calendar_v3.Schema$Events }>;
		watch(
			params: calendar_v3.Params$Resource$Events$Watch
		): Promise<{ data: calendar_v3.Schema$Channel }>;
	};
	channels: {
		stop(params: calendar_v3.Params$Resource$Channels$Stop): Promise<unknown>;
	};
}

export class GoogleCalendarGateway implements CalendarGateway {
	constructor(private readonly calendar: CalendarApi) {}

	async initialSyncToken(calendarId: string) {
		let pageToken: string | undefined;
		let nextSyncToken: string | undefined;

		try {
			do {
				const response = await this.calendar.events.list({
					calendarId,
					pageToken,
					// request no event fields so the pages stay tiny
					fields: "nextPageToken,nextSyncToken",
				});
				pageToken = response.data.nextPageToken || undefined;
				if (!pageToken) {
					nextSyncToken = response.data.nextSyncToken || undefined;
				}
			} while (pageToken);
		} catch (error) {
			throw toGatewayError(`Initial listing of ${calendarId}`, error);
		}

		if (!nextSyncToken) {
			throw new GatewayError(
				`Initial listing of ${calendarId} returned no sync token`,
				undefined
			);
		}
		return nextSyncToken;
	}

	async listEventsSince(calendarId: string, syncToken: string) {
		const delta: EventDelta = { events: [] };
		let pageToken: string | undefined;

		try {
			do {
				const response = await this.calendar.events.list({
					calendarId,
					syncToken,
					pageToken,
				});

				if (response.data.items) {
					delta.events.push(...response.data.items.map(toEventSnapshot));
				}

				pageToken = response.data.nextPageToken || undefined;
				if (!pageToken) {
					delta.nextSyncToken = response.data.nextSyncToken || undefined;
				}
			} while (pageToken);
		} catch (error) {
			if (statusOf(error) === 410) {
				throw new CursorExpiredError(calendarId, { cause: error });
			}
			throw toGatewayError(`Delta listing of ${calendarId}`, error);
		}

		return delta;
	}

	async watch(calendarId: string, request: WatchRequest) {
		try {
			const response = await this.calendar.events.watch({
				calendarId,
				requestBody: {
					id: request.channelId,
					type: "web_hook",
					address: request.address,
					token: request.token,
				},
			});

			if (!response.data.resourceId || !response.data.expiration) {
				throw new Error("watch response carried no resourceId or expiration");
			}
			return {
				resourceId: response.data.resourceId,
				expiresAt: new Date(Number(response.data.expiration)),
			};
		} catch (error) {
			throw toGatewayError(`Watch of ${calendarId}`, error);
		}
	}

	async stopWatch(channelId: string, resourceId: string): Promise<StopResult> {
		try {
			await this.calendar.channels.stop({
				requestBody: { id: channelId, resourceId },
			});
			return { status: "stopped" };
		} catch (error) {
			if (statusOf(error) === 404) {
				return { status: "already-absent" };
			}
			return {
				status: "failed",
				error: toGatewayError(`Stop of channel ${channelId}`, error),
			};
		}
	}
}

export function createGatewayFactory(
	store: CalendarStore,
	oauth: OAuthClientConfig
): GatewayFactory {
	return async (accountId) => {
		const credentials = await store.getGoogleCredentials(accountId);
		if (!credentials?.RefreshToken) {
			throw new MissingCredentialsError(accountId);
		}
		return new GoogleCalendarGateway(createCalendarClient(oauth, credentials));
	};
}
