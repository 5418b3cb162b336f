/**
 * Custom Error Classes
 */

export class ConfigurationError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'ConfigurationError';
	}
}

export class ChannelNotFoundError extends Error {
	constructor(channelName: string) {
		super(`Channel not found: ${channelName}`);
		this.name = 'ChannelNotFoundError';
	}
}

export class ChannelExistsError extends Error {
	constructor(channelName: string) {
		super(`Channel already exists: ${channelName}`);
		this.name = 'ChannelExistsError';
	}
}

export class ChannelReadOnlyError extends Error {
	constructor(channelName: string) {
		super(`Channel is read-only: ${channelName}`);
		this.name = 'ChannelReadOnlyError';
	}
}

export class ChannelValueError extends Error {
	constructor(channelName: string, reason: string) {
		super(`Invalid value for ${channelName}: ${reason}`);
		this.name = 'ChannelValueError';
	}
}

export class ChannelNameError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'ChannelNameError';
	}
}

export class UnknownTaskModuleError extends Error {
	constructor(moduleId: string) {
		super(`Unknown task module: ${moduleId}`);
		this.name = 'UnknownTaskModuleError';
	}
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}
