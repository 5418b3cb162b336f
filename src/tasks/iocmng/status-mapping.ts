/**
 * Remote status strings -> channel enumerations.
 *
 * Both mappings are total: a string the remote side invents later lands in the
 * last slot instead of failing the cycle.
 */

import type { EntityStatus } from './types';

export const NEVER = 'Never';

export const SYNC_STATUS_LABELS: readonly string[] = ['Synced', 'OutOfSync', 'Unknown', 'Error'];

export const HEALTH_STATUS_LABELS: readonly string[] = [
	'Healthy',
	'Progressing',
	'Degraded',
	'Missing',
	'Unknown',
	'Warning',
];

const SYNC_CODES: Readonly<Record<string, number>> = {
	Synced: 0,
	OutOfSync: 1,
	Unknown: 2,
};

const HEALTH_CODES: Readonly<Record<string, number>> = {
	Healthy: 0,
	Progressing: 1,
	Degraded: 2,
	Missing: 3,
	Unknown: 4,
};

export function mapSyncStatus(status: string): number {
	return Object.prototype.hasOwnProperty.call(SYNC_CODES, status) ? SYNC_CODES[status] : 3;
}

export function mapHealthStatus(status: string): number {
	return Object.prototype.hasOwnProperty.call(HEALTH_CODES, status) ? HEALTH_CODES[status] : 5;
}

export function initialEntityStatus(): EntityStatus {
	return {
		appStatus: 'Unknown',
		syncStatus: 'Unknown',
		healthStatus: 'Unknown',
		lastSync: NEVER,
		lastHealthChange: NEVER,
	};
}

/**
 * Status of an entity whose application does not exist remotely
 */
export const MISSING_STATUS = {
	appStatus: 'Missing',
	syncStatus: 'Unknown',
	healthStatus: 'Missing',
} as const;
