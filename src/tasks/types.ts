/**
 * TASK TYPES
 * ==========
 */

import type { ChannelRegistry } from '../channels/channel-registry';
import type { BeamlineValues, TaskChannelsConfig } from '../config/schema';
import type { DeviceHandle } from '../devices/types';
import type { AgentLogger } from '../logging/agent-logger';

/**
 * Lifecycle state, published on the STATUS channel as its numeric value
 */
export enum TaskState {
	INIT = 0,
	RUN = 1,
	PAUSED = 2,
	END = 3,
	ERROR = 4,
}

export const TASK_STATE_LABELS: readonly string[] = ['INIT', 'RUN', 'PAUSED', 'END', 'ERROR'];

export type TaskMode = 'continuous' | 'triggered';

/**
 * Everything a task receives from the controller at construction time
 */
export interface TaskContext {
	name: string;
	parameters: Record<string, unknown>;
	channels: TaskChannelsConfig;
	values: BeamlineValues;
	/** `<BEAMLINE>:<NAMESPACE>` or the configured override */
	prefix: string;
	registry: ChannelRegistry;
	devices: ReadonlyMap<string, DeviceHandle>;
	logger: AgentLogger;
}

/**
 * Capabilities every concrete task provides
 */
export interface TaskHooks {
	initialize(): Promise<void>;
	cleanup(): Promise<void>;
}

/**
 * What the controller needs to drive a task
 */
export interface Task {
	readonly name: string;
	readonly mode: TaskMode;
	start(): Promise<void>;
	stop(): Promise<void>;
	getState(): TaskState;
	onStateChange(listener: (state: TaskState, previous: TaskState) => void): this;
}
