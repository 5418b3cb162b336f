/**
 * Base Task Class
 *
 * Provides the lifecycle shared by every controller task:
 * - Standard channels (ENABLE, STATUS, MESSAGE, CYCLE_COUNT / RUN)
 * - State machine INIT -> RUN <-> PAUSED -> END, with ERROR on failures
 * - Continuous mode: a cooperative loop, one cycle every 1/update_rate seconds
 * - Triggered mode: a momentary RUN channel spawning one guarded worker
 * - User channels declared in the task's `pvs` configuration
 */

import { EventEmitter } from 'events';
import { z } from 'zod';
import type { Channel } from '../channels/channel';
import type { ChannelNamespace } from '../channels/channel-registry';
import { taskPrefix } from '../channels/naming';
import type { ChannelDefinition, ChannelValue } from '../channels/types';
import type { BeamlineValues, ChannelConfig, TaskChannelsConfig } from '../config/schema';
import { formatIssues } from '../config/schema';
import type { DeviceHandle } from '../devices/types';
import { ConfigurationError, toError } from '../errors';
import { ComponentLogger } from '../logging/component-logger';
import { delay } from '../utils/time';
import { TASK_STATE_LABELS, TaskState } from './types';
import type { Task, TaskContext, TaskHooks, TaskMode } from './types';

export const MESSAGE_MAX_LENGTH = 40;

const baseParametersSchema = z.object({
	update_rate: z.number().positive().optional(),
	settle_delay: z.number().nonnegative().default(0.5),
}).passthrough();

/**
 * `mode` wins over the legacy `triggered: true` flag; anything unknown is continuous
 */
export function resolveTaskMode(parameters: Record<string, unknown>): TaskMode {
	const mode = parameters.mode ?? (parameters.triggered === true ? 'triggered' : 'continuous');
	return typeof mode === 'string' && mode.toLowerCase() === 'triggered' ? 'triggered' : 'continuous';
}

export abstract class TaskBase extends EventEmitter implements Task, TaskHooks {
	readonly name: string;
	readonly mode: TaskMode;
	protected readonly parameters: Record<string, unknown>;
	protected readonly values: BeamlineValues;
	protected readonly devices: ReadonlyMap<string, DeviceHandle>;
	protected readonly prefix: string;
	protected readonly channels: ChannelNamespace;
	protected readonly logger: ComponentLogger;

	/** Cycles per second when `update_rate` is not configured */
	protected defaultUpdateRate = 1;
	protected updateRate = 1;
	protected settleDelayMs = 500;

	private readonly channelConfig: TaskChannelsConfig;
	private state: TaskState = TaskState.INIT;
	private enabled = true;
	private running = false;
	private channelsCreated = false;
	private cycleCount = 0;
	private loopPromise?: Promise<void>;
	private triggerPromise?: Promise<void>;
	private triggerBusy = false;
	private wake?: () => void;

	constructor(context: TaskContext) {
		super();
		this.name = context.name;
		this.parameters = context.parameters;
		this.values = context.values;
		this.devices = context.devices;
		this.prefix = context.prefix;
		this.channelConfig = context.channels;
		this.mode = resolveTaskMode(context.parameters);
		this.channels = context.registry.namespace(taskPrefix(context.prefix, context.name));
		this.logger = new ComponentLogger(context.logger, context.name);
	}

	// ============================================================================
	// HOOKS
	// ============================================================================

	/**
	 * Task-specific initialization; throwing leaves the task in ERROR
	 */
	public abstract initialize(): Promise<void>;

	public abstract cleanup(): Promise<void>;

	/**
	 * One continuous-mode cycle. Default is a no-op.
	 */
	protected async processCycle(): Promise<void> {
		this.logger.debug('No cycle implemented for this task');
	}

	/**
	 * One-shot action for triggered mode
	 */
	protected async triggered(): Promise<void> {
		this.logger.info('No triggered action implemented for this task');
	}

	/**
	 * Writes to ENABLE and to user input channels land here
	 */
	protected handleChannelWrite(name: string, value: ChannelValue): void {
		this.logger.debug(`Channel ${name} set to ${String(value)}`);
	}

	// ============================================================================
	// LIFECYCLE
	// ============================================================================

	public async start(): Promise<void> {
		if (this.running) {
			this.logger.warn('Task already running');
			return;
		}

		this.logger.info(`Starting task: ${this.name}`, { mode: this.mode });

		try {
			if (!this.channelsCreated) {
				this.createChannels();
			}
			this.applyBaseParameters();
			await this.initialize();
		} catch (error) {
			const err = toError(error);
			this.logger.error('Task initialization failed', err);
			this.setState(TaskState.ERROR);
			this.setMessage(`Error: ${err.message}`);
			return;
		}

		this.running = true;

		if (this.mode === 'continuous') {
			this.setState(this.enabled ? TaskState.RUN : TaskState.PAUSED);
			this.loopPromise = this.run();
		} else {
			this.setState(TaskState.INIT);
			this.logger.info('Triggered mode: no continuous run loop started. Use RUN to trigger execution.');
		}
	}

	public async stop(): Promise<void> {
		if (this.state === TaskState.END) {
			return;
		}

		this.logger.info(`Stopping task: ${this.name}`);
		this.running = false;
		this.wake?.();

		await this.loopPromise;
		await this.triggerPromise;

		try {
			await this.cleanup();
		} catch (error) {
			this.logger.error('Task cleanup failed', toError(error));
		}

		this.setState(TaskState.END);
		this.setMessage('Stopped');
		this.logger.info(`Task stopped: ${this.name}`);
	}

	/**
	 * Cooperative loop: one tick, then sleep until the next cycle or until stop()
	 */
	protected async run(): Promise<void> {
		this.logger.info('Run loop started', { updateRate: this.updateRate });

		while (this.running) {
			await this.tick();
			if (!this.running) {
				break;
			}
			await this.sleep(1000 / this.updateRate);
		}

		this.logger.info('Run loop exited');
	}

	/**
	 * Run one loop iteration. Returns false when the task is disabled and the cycle was skipped.
	 * A failing cycle leaves the task in ERROR; the next cycle is still attempted.
	 */
	public async tick(): Promise<boolean> {
		if (!this.enabled) {
			this.logger.debug('Task disabled, skipping cycle');
			return false;
		}

		try {
			await this.processCycle();
		} catch (error) {
			const err = toError(error);
			this.logger.error('Error in processing cycle', err);
			this.setState(TaskState.ERROR);
			this.setMessage(`Error: ${err.message}`);
		}

		this.stepCycle();
		return true;
	}

	// ============================================================================
	// STATE
	// ============================================================================

	public getState(): TaskState {
		return this.state;
	}

	public isEnabled(): boolean {
		return this.enabled;
	}

	public isRunning(): boolean {
		return this.running;
	}

	public isTriggerBusy(): boolean {
		return this.triggerBusy;
	}

	public getCycleCount(): number {
		return this.cycleCount;
	}

	/**
	 * Resolves once the in-flight triggered run (if any) has finished
	 */
	public async whenTriggerSettled(): Promise<void> {
		await this.triggerPromise;
	}

	public onStateChange(listener: (state: TaskState, previous: TaskState) => void): this {
		return this.on('state-changed', listener);
	}

	protected setState(state: TaskState): void {
		const previous = this.state;
		if (previous === state) {
			return;
		}

		this.state = state;
		this.setChannel('STATUS', state);
		this.logger.debug(`State ${TASK_STATE_LABELS[previous]} -> ${TASK_STATE_LABELS[state]}`);
		this.emit('state-changed', state, previous);
	}

	protected setMessage(message: string): void {
		this.setChannel('MESSAGE', message);
	}

	/**
	 * Publish a computed value. A failed write is logged and dropped so it never aborts a cycle.
	 */
	protected setChannel(name: string, value: ChannelValue): void {
		try {
			this.channels.set(name, value);
		} catch (error) {
			this.logger.debug(`Error setting ${name}: ${toError(error).message}`);
		}
	}

	// ============================================================================
	// CHANNELS
	// ============================================================================

	private applyBaseParameters(): void {
		const result = baseParametersSchema.safeParse(this.parameters);
		if (!result.success) {
			throw new ConfigurationError(`Invalid task parameters: ${formatIssues(result.error)}`);
		}

		this.updateRate = result.data.update_rate ?? this.defaultUpdateRate;
		this.settleDelayMs = result.data.settle_delay * 1000;
	}

	private createChannels(): void {
		this.channels.create('ENABLE', {
			type: 'bool',
			initial: true,
			writable: true,
			description: 'Enable/disable task processing',
			onUpdate: (value) => this.onEnableChanged(value),
		});

		this.channels.create('STATUS', {
			type: 'int',
			initial: this.state,
			enumStrings: TASK_STATE_LABELS,
		});

		this.channels.create('MESSAGE', {
			type: 'string',
			maxLength: MESSAGE_MAX_LENGTH,
		});

		if (this.mode === 'triggered') {
			this.channels.create('RUN', {
				type: 'bool',
				initial: false,
				writable: true,
				description: 'Trigger a one-shot run',
				onUpdate: (value, channel) => this.onRunTrigger(value, channel),
			});
		} else {
			this.channels.create('CYCLE_COUNT', { type: 'int', initial: 0 });
		}

		for (const [name, config] of Object.entries(this.channelConfig.inputs)) {
			this.channels.create(name, {
				...this.toDefinition(config),
				writable: true,
				onUpdate: (value) => this.handleChannelWrite(name, value),
			});
		}

		for (const [name, config] of Object.entries(this.channelConfig.outputs)) {
			this.channels.create(name, this.toDefinition(config));
		}

		this.channelsCreated = true;
		this.logger.info(`Created ${this.channels.names().length} channels with prefix: ${this.channels.prefix}`);
	}

	private toDefinition(config: ChannelConfig): ChannelDefinition {
		return {
			type: config.type,
			...(config.value !== undefined && { initial: config.value }),
			...(config.unit !== undefined && { unit: config.unit }),
			...(config.description !== undefined && { description: config.description }),
		};
	}

	private onEnableChanged(value: ChannelValue): void {
		this.enabled = value === true;
		this.logger.info(`Task ${this.enabled ? 'enabled' : 'disabled'}`);

		if (this.running) {
			if (!this.enabled) {
				this.setState(TaskState.PAUSED);
			} else if (!this.triggerBusy) {
				this.setState(this.mode === 'continuous' ? TaskState.RUN : TaskState.INIT);
			}
		}

		this.handleChannelWrite('ENABLE', value);
	}

	private stepCycle(): void {
		if (this.mode !== 'continuous') {
			return;
		}
		this.cycleCount++;
		this.setChannel('CYCLE_COUNT', this.cycleCount);
	}

	// ============================================================================
	// TRIGGERED MODE
	// ============================================================================

	private onRunTrigger(value: ChannelValue, channel: Channel): void {
		if (value !== true) {
			return;
		}

		// Momentary: reset before anything else
		channel.set(false);

		if (!this.running) {
			this.logger.warn('Trigger ignored: task not running');
			return;
		}
		if (!this.enabled) {
			this.logger.warn('Trigger ignored: task disabled');
			return;
		}
		if (this.state === TaskState.ERROR) {
			this.logger.warn('Trigger ignored: task in ERROR, re-enable to clear');
			return;
		}
		if (this.triggerBusy) {
			this.logger.warn('Trigger ignored: previous run still in progress');
			return;
		}

		this.triggerBusy = true;
		this.triggerPromise = this.executeTrigger();
	}

	private async executeTrigger(): Promise<void> {
		this.logger.info('Triggered run started');
		this.setState(TaskState.RUN);
		this.setMessage('Running');

		try {
			await this.triggered();
			this.setMessage('Triggered run completed');
			await delay(this.settleDelayMs);
			this.setState(this.enabled ? TaskState.INIT : TaskState.PAUSED);
		} catch (error) {
			const err = toError(error);
			this.logger.error('Error in triggered run', err);
			this.setState(TaskState.ERROR);
			this.setMessage(`ERROR: ${err.message}`);
		} finally {
			this.triggerBusy = false;
			this.logger.info('Triggered run finished');
		}
	}

	private sleep(ms: number): Promise<void> {
		return new Promise((resolve) => {
			const timer = setTimeout(() => {
				this.wake = undefined;
				resolve();
			}, ms);
			this.wake = () => {
				clearTimeout(timer);
				this.wake = undefined;
				resolve();
			};
		});
	}
}
