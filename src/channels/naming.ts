/**
 * Channel naming convention shared with display tooling.
 *
 * Entity channels are `<prefix>:<task>:<ENTITY>_<SUFFIX>`. Channel names are the
 * join key between the controller and generated displays, so the truncation
 * below must stay byte-for-byte stable.
 */

import { ChannelNameError } from '../errors';

export const MAX_RECORD_NAME_LENGTH = 60;

export const ENTITY_CHANNEL_SUFFIXES = [
	'APP_STATUS',
	'SYNC_STATUS',
	'HEALTH_STATUS',
	'LAST_SYNC',
	'LAST_HEALTH',
	'START',
	'STOP',
	'RESTART',
] as const;

export type EntityChannelSuffix = (typeof ENTITY_CHANNEL_SUFFIXES)[number];

// Reserved suffix overhead. `_HEALTH_STATUS` is longer and may run past the limit.
const RESERVED_SUFFIX_LENGTH = '_LAST_HEALTH'.length;

export function normalizeEntityName(name: string): string {
	return name.toUpperCase().replace(/-/g, '_');
}

/**
 * Room left for the entity segment once `<prefix>:<task>:` and `_LAST_HEALTH` are reserved
 */
export function entitySegmentBudget(
	prefix: string,
	taskName: string,
	maxLength: number = MAX_RECORD_NAME_LENGTH
): number {
	const budget = maxLength - taskPrefix(prefix, taskName).length - 1 - RESERVED_SUFFIX_LENGTH;
	if (budget < 1) {
		throw new ChannelNameError(
			`Prefix "${taskPrefix(prefix, taskName)}" leaves no room for entity names within ${maxLength} characters`
		);
	}
	return budget;
}

/**
 * Normalize and cut an entity name to `maxLength`. Idempotent.
 */
export function truncateEntityName(name: string, maxLength: number): string {
	const normalized = normalizeEntityName(name);
	return normalized.length > maxLength ? normalized.slice(0, maxLength) : normalized;
}

export function taskPrefix(prefix: string, taskName: string): string {
	return `${prefix}:${taskName.toUpperCase()}`;
}

export function entityChannelName(segment: string, suffix: EntityChannelSuffix): string {
	return `${segment}_${suffix}`;
}
