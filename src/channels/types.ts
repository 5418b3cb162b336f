/**
 * CHANNEL TYPES
 * =============
 *
 * A channel is a named, externally readable (and optionally writable) attribute
 * owned by a task. Names are fully qualified: `<prefix>:<task>:<name>`.
 */

import type { Channel } from './channel';

export type ChannelType = 'float' | 'int' | 'bool' | 'string';

export interface ChannelValueMap {
	float: number;
	int: number;
	bool: boolean;
	string: string;
}

export type ChannelValue = ChannelValueMap[ChannelType];

/**
 * Invoked once per external write, after the value has been stored
 */
export type ChannelUpdateHandler = (value: ChannelValue, channel: Channel) => void;

export interface ChannelDefinition {
	type: ChannelType;
	initial?: ChannelValue;
	writable?: boolean;
	description?: string;
	unit?: string;
	/** State labels for small enumerations encoded as `int` */
	enumStrings?: readonly string[];
	/** String channels only: stored values are cut to this length */
	maxLength?: number;
	onUpdate?: ChannelUpdateHandler;
}

export interface ChannelSnapshot {
	name: string;
	type: ChannelType;
	value: ChannelValue;
	writable: boolean;
	description?: string;
	unit?: string;
	enumStrings?: readonly string[];
}
