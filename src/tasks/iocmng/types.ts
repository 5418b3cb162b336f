/**
 * IOC MANAGER TYPES
 * =================
 */

export type EntityKind = 'ioc' | 'service';

export type ControlVerb = 'START' | 'STOP' | 'RESTART';

export const CONTROL_VERBS: readonly ControlVerb[] = ['START', 'STOP', 'RESTART'];

/**
 * One IOC or service, tracked from values.yaml
 */
export interface TrackedEntity {
	/** Name as it appears in the inventory */
	name: string;
	kind: EntityKind;
	devgroup: string;
	/** Remote application identifier: `<name>-<namespace>-<suffix>` */
	appId: string;
	/** Entity part of the channel names, normalized and truncated */
	channelSegment: string;
}

/**
 * Canonical status of one entity, as last observed
 */
export interface EntityStatus {
	appStatus: string;
	syncStatus: string;
	healthStatus: string;
	lastSync: string;
	lastHealthChange: string;
}

export interface ControlAction {
	entity: string;
	verb: ControlVerb;
}

export interface AggregateCounts {
	total: number;
	healthy: number;
	progressing: number;
	other: number;
}

export interface TelemetrySample {
	total: number;
	connected: number;
	disconnected: number;
}
