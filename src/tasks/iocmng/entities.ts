/**
 * Build the tracked entity list from the beamline inventory
 */

import { entitySegmentBudget, truncateEntityName } from '../../channels/naming';
import type { BeamlineValues, InventoryEntry } from '../../config/schema';
import { parseInventory } from '../../config/schema';
import { ConfigurationError } from '../../errors';
import type { ComponentLogger } from '../../logging/component-logger';
import type { EntityKind, TrackedEntity } from './types';

export interface EntityNamingOptions {
	/** `<BEAMLINE>:<NAMESPACE>` or the configured override */
	prefix: string;
	taskName: string;
	/** Kubernetes namespace baked into application ids */
	namespace: string;
	iocAppSuffix: string;
	serviceAppSuffix: string;
}

const DEFAULT_DEVGROUP: Record<EntityKind, string> = {
	ioc: 'default',
	service: 'services',
};

export function applicationId(name: string, namespace: string, suffix: string): string {
	return `${name}-${namespace}-${suffix}`.toLowerCase();
}

export function buildTrackedEntities(
	values: BeamlineValues,
	options: EntityNamingOptions,
	logger?: ComponentLogger
): TrackedEntity[] {
	const budget = entitySegmentBudget(options.prefix, options.taskName);
	const entities: TrackedEntity[] = [];
	const byName = new Set<string>();
	const bySegment = new Map<string, string>();

	const add = (entry: InventoryEntry, kind: EntityKind): void => {
		if (entry.disable === true) {
			logger?.debug(`Skipping disabled ${kind}: ${entry.name}`);
			return;
		}

		if (byName.has(entry.name)) {
			throw new ConfigurationError(`Duplicate entity name: ${entry.name}`);
		}

		const channelSegment = truncateEntityName(entry.name, budget);
		if (channelSegment.length < entry.name.length) {
			logger?.warn(`Channel name truncated: ${entry.name} -> ${channelSegment}`);
		}

		const clash = bySegment.get(channelSegment);
		if (clash !== undefined) {
			throw new ConfigurationError(
				`Entities ${clash} and ${entry.name} map to the same channel name ${channelSegment}`
			);
		}

		byName.add(entry.name);
		bySegment.set(channelSegment, entry.name);
		entities.push({
			name: entry.name,
			kind,
			devgroup: entry.devgroup ?? DEFAULT_DEVGROUP[kind],
			appId: applicationId(
				entry.name,
				options.namespace,
				kind === 'ioc' ? options.iocAppSuffix : options.serviceAppSuffix
			),
			channelSegment,
		});
	};

	for (const entry of parseInventory(values.epicsConfiguration.iocs, 'IOC')) {
		add(entry, 'ioc');
	}
	for (const entry of parseInventory(values.epicsConfiguration.services, 'service')) {
		add(entry, 'service');
	}

	return entities;
}

/**
 * devgroup -> entity names, in inventory order
 */
export function groupByDevgroup(entities: readonly TrackedEntity[]): Map<string, string[]> {
	const groups = new Map<string, string[]>();
	for (const entity of entities) {
		const members = groups.get(entity.devgroup) ?? [];
		members.push(entity.name);
		groups.set(entity.devgroup, members);
	}
	return groups;
}
