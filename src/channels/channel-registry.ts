/**
 * CHANNEL REGISTRY
 * ================
 *
 * Owns every channel of the controller process. Tasks create their channels
 * through a ChannelNamespace scoped to their own prefix, so namespaces of
 * different tasks never overlap. The I/O layer (channel API) delivers external
 * writes through `write()`.
 */

import { ChannelExistsError, ChannelNameError, ChannelNotFoundError } from '../errors';
import type { AgentLogger } from '../logging/agent-logger';
import { Channel } from './channel';
import type { ChannelDefinition, ChannelValue } from './types';

const CHANNEL_NAME_PATTERN = /^[^\s]+$/;

export class ChannelRegistry {
	private readonly channels = new Map<string, Channel>();
	private readonly logger?: AgentLogger;

	constructor(logger?: AgentLogger) {
		this.logger = logger;
	}

	public create(name: string, definition: ChannelDefinition): Channel {
		if (!CHANNEL_NAME_PATTERN.test(name)) {
			throw new ChannelNameError(`Invalid channel name: "${name}"`);
		}
		if (this.channels.has(name)) {
			throw new ChannelExistsError(name);
		}

		const channel = new Channel(name, definition);
		this.channels.set(name, channel);

		this.logger?.debug('Channel created', {
			component: 'ChannelRegistry',
			channel: name,
			type: definition.type,
			writable: channel.writable,
		});

		return channel;
	}

	public has(name: string): boolean {
		return this.channels.has(name);
	}

	public find(name: string): Channel | undefined {
		return this.channels.get(name);
	}

	public get(name: string): Channel {
		const channel = this.channels.get(name);
		if (!channel) {
			throw new ChannelNotFoundError(name);
		}
		return channel;
	}

	/**
	 * All channels, ordered by name
	 */
	public list(): Channel[] {
		return [...this.channels.values()].sort((a, b) => a.name.localeCompare(b.name));
	}

	public get size(): number {
		return this.channels.size;
	}

	/**
	 * Task-side update (read-only channels included)
	 */
	public set(name: string, value: unknown): void {
		this.get(name).set(value);
	}

	/**
	 * External write. Rejects read-only channels and fires the update callback once.
	 */
	public write(name: string, value: unknown): Channel {
		const channel = this.get(name);
		channel.write(value);

		this.logger?.debug('Channel written', {
			component: 'ChannelRegistry',
			channel: name,
			value: channel.value,
		});

		return channel;
	}

	public namespace(prefix: string): ChannelNamespace {
		return new ChannelNamespace(this, prefix);
	}
}

/**
 * View of the registry restricted to `<prefix>:*`
 */
export class ChannelNamespace {
	private readonly owned = new Set<string>();

	constructor(
		private readonly registry: ChannelRegistry,
		readonly prefix: string
	) {}

	public fullName(name: string): string {
		return `${this.prefix}:${name}`;
	}

	public create(name: string, definition: ChannelDefinition): Channel {
		const channel = this.registry.create(this.fullName(name), definition);
		this.owned.add(name);
		return channel;
	}

	public has(name: string): boolean {
		return this.owned.has(name);
	}

	public get(name: string): Channel {
		return this.registry.get(this.fullName(name));
	}

	public value(name: string): ChannelValue {
		return this.get(name).value;
	}

	public set(name: string, value: unknown): void {
		this.get(name).set(value);
	}

	/**
	 * Short names of the channels created through this namespace
	 */
	public names(): string[] {
		return [...this.owned];
	}
}
