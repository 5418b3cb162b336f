/**
 * Beamline Controller
 *
 * Orchestrates the controller process:
 * - Device handles built from the beamline inventory
 * - Tasks built from config.yaml through the task registry
 * - Channel API exposing the channel registry
 */

import { ChannelAPI } from './channel-api';
import { ChannelRegistry } from './channels/channel-registry';
import { channelPrefix } from './config/config-loader';
import type { BeamlineValues, ControllerConfig } from './config/schema';
import { parseInventory } from './config/schema';
import type { DeviceFactory, DeviceHandle } from './devices/types';
import { toError } from './errors';
import type { AgentLogger } from './logging/agent-logger';
import { ComponentLogger } from './logging/component-logger';
import type { TaskRegistry } from './tasks/task-registry';
import { TASK_STATE_LABELS } from './tasks/types';
import type { Task } from './tasks/types';

export interface BeamlineControllerOptions {
	config: ControllerConfig;
	values: BeamlineValues;
	logger: AgentLogger;
	taskRegistry: TaskRegistry;
	deviceFactory: DeviceFactory;
	channelRegistry?: ChannelRegistry;
	/** Overrides `channelApi.port` from config.yaml */
	apiPort?: number;
}

export class BeamlineController {
	readonly prefix: string;
	private readonly config: ControllerConfig;
	private readonly values: BeamlineValues;
	private readonly agentLogger: AgentLogger;
	private readonly logger: ComponentLogger;
	private readonly taskRegistry: TaskRegistry;
	private readonly deviceFactory: DeviceFactory;
	private readonly channelRegistry: ChannelRegistry;
	private readonly apiPort?: number;

	private readonly devices = new Map<string, DeviceHandle>();
	private readonly tasks: Task[] = [];
	private channelAPI?: ChannelAPI;
	private started = false;

	constructor(options: BeamlineControllerOptions) {
		this.config = options.config;
		this.values = options.values;
		this.agentLogger = options.logger;
		this.logger = new ComponentLogger(options.logger, 'BeamlineController');
		this.taskRegistry = options.taskRegistry;
		this.deviceFactory = options.deviceFactory;
		this.channelRegistry = options.channelRegistry ?? new ChannelRegistry(options.logger);
		this.apiPort = options.apiPort;
		this.prefix = channelPrefix(options.config, options.values);
	}

	// ============================================================================
	// DEVICES
	// ============================================================================

	/**
	 * Single-device IOCs get `<BEAMLINE>:<NAMESPACE>:<iocprefix>`;
	 * each device of a multi-device IOC gets `<iocprefix>:<device>`.
	 */
	public initializeDevices(): void {
		this.logger.info('Initializing devices from beamline configuration...');

		const beamline = this.values.beamline.toUpperCase();
		const namespace = this.values.namespace.toUpperCase();

		for (const ioc of parseInventory(this.values.epicsConfiguration.iocs, 'IOC')) {
			if (ioc.disable === true) {
				this.logger.debug(`Skipping disabled IOC: ${ioc.name}`);
				continue;
			}
			if (!ioc.devgroup) {
				this.logger.debug(`IOC ${ioc.name} has no devgroup, skipping device creation`);
				continue;
			}

			const iocPrefix = ioc.iocprefix ?? '';
			const devices = ioc.devices ?? [];

			if (devices.length > 0) {
				for (const device of devices) {
					this.addDevice(
						`${ioc.name}_${device.name}`,
						this.deviceFactory.create(ioc.devgroup, ioc.devtype, `${iocPrefix}:${device.name}`, device.name, device)
					);
				}
			} else {
				this.addDevice(
					ioc.name,
					this.deviceFactory.create(ioc.devgroup, ioc.devtype, `${beamline}:${namespace}:${iocPrefix}`, ioc.name, ioc)
				);
			}
		}

		this.logger.info(`Created ${this.devices.size} devices`);
	}

	private addDevice(key: string, device: DeviceHandle | null): void {
		if (device) {
			this.devices.set(key, device);
			this.logger.info(`Created device: ${key} (${device.prefix})`);
		}
	}

	public getDevices(): ReadonlyMap<string, DeviceHandle> {
		return this.devices;
	}

	// ============================================================================
	// TASKS
	// ============================================================================

	/**
	 * A task that cannot be built is logged and skipped; the others still run
	 */
	public initializeTasks(): void {
		this.logger.info('Initializing tasks...');

		for (const taskConfig of this.config.tasks) {
			try {
				const task = this.taskRegistry.create(taskConfig.module, {
					name: taskConfig.name,
					parameters: taskConfig.parameters,
					channels: taskConfig.pvs,
					values: this.values,
					prefix: this.prefix,
					registry: this.channelRegistry,
					devices: this.devices,
					logger: this.agentLogger,
				});

				task.onStateChange((state, previous) => {
					this.logger.info(`Task ${task.name}: ${TASK_STATE_LABELS[previous]} -> ${TASK_STATE_LABELS[state]}`);
				});

				this.tasks.push(task);
				this.logger.info(`Initialized task: ${taskConfig.name} (${taskConfig.module})`);
			} catch (error) {
				this.logger.error(`Failed to initialize task ${taskConfig.name}`, toError(error));
			}
		}
	}

	public getTasks(): readonly Task[] {
		return this.tasks;
	}

	public getChannelRegistry(): ChannelRegistry {
		return this.channelRegistry;
	}

	// ============================================================================
	// LIFECYCLE
	// ============================================================================

	public async start(): Promise<void> {
		if (this.started) {
			return;
		}
		this.started = true;

		this.logger.info(`Starting beamline controller with prefix ${this.prefix}`);

		this.initializeDevices();
		this.initializeTasks();

		for (const task of this.tasks) {
			await task.start();
			this.logger.info(`Started task: ${task.name}`);
		}

		if (this.config.channelApi.enabled) {
			this.channelAPI = new ChannelAPI(this.channelRegistry, this.agentLogger);
			await this.channelAPI.listen(this.apiPort ?? this.config.channelApi.port, this.config.channelApi.host);
		}

		this.logger.info(`Beamline controller running: ${this.tasks.length} tasks, ${this.channelRegistry.size} channels`);
	}

	public async stop(): Promise<void> {
		this.logger.info('Stopping tasks...');

		for (const task of this.tasks) {
			try {
				await task.stop();
			} catch (error) {
				this.logger.error(`Error stopping task ${task.name}`, toError(error));
			}
		}

		if (this.channelAPI) {
			await this.channelAPI.stop();
			this.channelAPI = undefined;
		}

		this.started = false;
		this.logger.info('All tasks stopped');
	}
}
