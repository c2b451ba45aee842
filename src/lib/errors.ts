export class CalendarWatchError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
	}
}

export class ConfigError extends CalendarWatchError {
	constructor(readonly issues: string[]) {
		super(`Invalid configuration: ${issues.join("; ")}`);
	}
}

/**
 * Raised for any failed call to the Google Calendar API. `status` is the
 * HTTP status the API answered with, when there was one.
 */
export class GatewayError extends CalendarWatchError {
	constructor(
		message: string,
		readonly status: number | undefined,
		options?: ErrorOptions
	) {
		super(message, options);
	}
}

// Google answers 410 Gone once a sync token is too old to resume from.
export class CursorExpiredError extends GatewayError {
	constructor(readonly calendarId: string, options?: ErrorOptions) {
		super(`Sync token expired for calendar ${calendarId}`, 410, options);
	}
}

export class ResourceMismatchError extends CalendarWatchError {
	constructor(
		readonly channelId: string,
		readonly expected: string,
		readonly received: string | null
	) {
		super(
			`Channel ${channelId} and request resourceIds do not match: ${expected} != ${received}`
		);
	}
}

export class ChannelTokenError extends CalendarWatchError {
	constructor(readonly channelId: string) {
		super(`Invalid channel token for channel ${channelId}`);
	}
}

export class MissingCredentialsError extends CalendarWatchError {
	constructor(readonly accountId: string) {
		super(`No Google credentials stored for account ${accountId}`);
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
