/**
 * Time utility functions
 */

export function delay(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

function pad(value: number): string {
	return String(value).padStart(2, '0');
}

/**
 * `YYYY-MM-DD HH:mm:ss` in local time
 */
export function formatLocalTimestamp(date: Date): string {
	return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} `
		+ `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * `YYYY-MM-DD HH:mm:ss` in UTC
 */
export function formatUtcTimestamp(date: Date): string {
	return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} `
		+ `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
}

/**
 * Reformat a remote ISO-8601 timestamp (e.g. `2024-05-01T10:20:30Z`).
 * Unparsable input is returned verbatim.
 */
export function formatRemoteTimestamp(value: string): string {
	const parsed = new Date(value);
	return Number.isNaN(parsed.getTime()) ? value : formatUtcTimestamp(parsed);
}
