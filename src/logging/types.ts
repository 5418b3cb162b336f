export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogContext {
	component?: string;
	operation?: string;
	[key: string]: unknown;
}

export function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}
