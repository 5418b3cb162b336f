/**
 * DEVICE REGISTRY
 * ===============
 *
 * Lookup table from (device group, device type) to a device constructor.
 * Integrations register themselves explicitly; an unregistered pair is a
 * configuration concern and yields `null`.
 */

import { toError } from '../errors';
import type { AgentLogger } from '../logging/agent-logger';
import type { DeviceConstructor, DeviceFactory, DeviceHandle } from './types';

const GENERIC_TYPE = 'generic';

function key(group: string, type: string): string {
	return `${group}/${type}`;
}

export class DeviceRegistry implements DeviceFactory {
	private readonly constructors = new Map<string, { group: string; type: string; construct: DeviceConstructor }>();
	private readonly logger?: AgentLogger;

	constructor(logger?: AgentLogger) {
		this.logger = logger;
	}

	public register(group: string, type: string, construct: DeviceConstructor): void {
		this.constructors.set(key(group, type), { group, type, construct });
		this.logger?.info(`Registered device type: ${group}/${type}`, { component: 'DeviceRegistry' });
	}

	/**
	 * Exact (group, type) first, then (group, 'generic')
	 */
	public create(
		group: string,
		type: string | undefined,
		prefix: string,
		name: string,
		config: Record<string, unknown>
	): DeviceHandle | null {
		const construct = (type !== undefined ? this.constructors.get(key(group, type)) : undefined)?.construct
			?? this.constructors.get(key(group, GENERIC_TYPE))?.construct;

		if (!construct) {
			this.logger?.warn(`No device type registered for ${group}/${type ?? '-'}, device ${name} will not be created`, {
				component: 'DeviceRegistry',
			});
			return null;
		}

		try {
			const poi = config.poi ?? config.iocinit;
			const device = construct({
				prefix,
				name,
				config,
				...(poi !== undefined && { poi }),
			});
			this.logger?.debug(`Created device ${name} with prefix ${prefix}`, { component: 'DeviceRegistry' });
			return device;
		} catch (error) {
			this.logger?.error(`Failed to create device ${name} (${group}/${type ?? '-'})`, toError(error), {
				component: 'DeviceRegistry',
			});
			return null;
		}
	}

	public getSupportedTypes(): Array<{ group: string; type: string }> {
		return [...this.constructors.values()].map(({ group, type }) => ({ group, type }));
	}
}
