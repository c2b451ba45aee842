import type { EventTime } from "./types";

export interface EventTiming {
	start: Date;
	end: Date;
	isAllDay: boolean;
}

function parseDate(date: string) {
	// all-day dates are YYYY-MM-DD, taken as local midnight
	return new Date(`${date}T00:00:00`);
}

function isValid(date: Date) {
	return !Number.isNaN(date.getTime());
}

export function parseEventTime(
	start: EventTime | undefined,
	end: EventTime | undefined
): EventTiming {
	if (start?.dateTime && end?.dateTime) {
		const timing = {
			start: new Date(start.dateTime),
			end: new Date(end.dateTime),
			isAllDay: false,
		};
		if (isValid(timing.start) && isValid(timing.end)) return timing;
	} else if (start?.date && end?.date) {
		const timing = {
			start: parseDate(start.date),
			end: parseDate(end.date),
			isAllDay: true,
		};
		if (isValid(timing.start) && isValid(timing.end)) return timing;
	}

	throw new Error(
		`Unable to parse event time: start=${JSON.stringify(start)} end=${JSON.stringify(end)}`
	);
}
