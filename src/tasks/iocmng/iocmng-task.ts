/**
 * IOC MANAGER TASK
 * ================
 *
 * Mirrors the state of Argo CD applications backing the beamline IOCs and
 * services onto channels, and turns operator START / STOP / RESTART writes
 * into application mutations.
 *
 * One cycle:
 *  1. list applications (single call) and index them by name
 *  2. derive each entity's status (Missing when its application is absent)
 *  3. stamp health transitions, publish entity and aggregate channels
 *  4. drain the control queue, refreshing status after every action
 *  5. poll dependent-service telemetry and feed the remediation governor
 *  6. publish a one-line summary
 */

import _ from 'lodash';
import { z } from 'zod';
import type { Channel } from '../../channels/channel';
import { entityChannelName, normalizeEntityName } from '../../channels/naming';
import type { EntityChannelSuffix } from '../../channels/naming';
import type { ChannelValue } from '../../channels/types';
import { formatIssues } from '../../config/schema';
import { ConfigurationError, toError } from '../../errors';
import { delay, formatLocalTimestamp, formatRemoteTimestamp } from '../../utils/time';
import { TaskBase } from '../task-base';
import type { TaskContext } from '../types';
import {
	createKubernetesApplicationClient,
	SUSPEND_PATCH,
	SYNC_PATCH,
} from './application-client';
import type { Application, ApplicationClient, ApplicationClientFactory } from './application-client';
import { ControlActionQueue } from './control-queue';
import { applicationId, buildTrackedEntities, groupByDevgroup } from './entities';
import { RemediationGovernor } from './remediation-governor';
import {
	HEALTH_STATUS_LABELS,
	initialEntityStatus,
	mapHealthStatus,
	mapSyncStatus,
	MISSING_STATUS,
	NEVER,
	SYNC_STATUS_LABELS,
} from './status-mapping';
import { HttpTelemetryClient } from './telemetry-client';
import type { HttpTelemetryClientConfig, TelemetryClient } from './telemetry-client';
import { CONTROL_VERBS } from './types';
import type {
	AggregateCounts,
	ControlAction,
	ControlVerb,
	EntityKind,
	EntityStatus,
	TelemetrySample,
	TrackedEntity,
} from './types';

const DEFAULT_UPDATE_RATE = 0.05;

const telemetryParametersSchema = z.object({
	url: z.string().url(),
	appliance: z.string().min(1),
	/** Service entity restarted by the governor */
	service: z.string().min(1),
	restart_threshold: z.number().nonnegative().nullable().default(null),
	/** Seconds */
	restart_cooldown: z.number().nonnegative().nullable().default(null),
	/** Seconds */
	timeout: z.number().positive().optional(),
});

const iocManagerParametersSchema = z.object({
	argocd_namespace: z.string().min(1).default('argocd'),
	ioc_app_suffix: z.string().min(1).default('ioc'),
	service_app_suffix: z.string().min(1).default('srv'),
	action_refresh_delay: z.number().nonnegative().default(1),
	telemetry: telemetryParametersSchema.optional(),
}).passthrough();

type IocManagerParameters = z.infer<typeof iocManagerParametersSchema>;

export type TelemetryClientFactory = (config: HttpTelemetryClientConfig) => TelemetryClient;

export interface IocManagerDependencies {
	createApplicationClient?: ApplicationClientFactory;
	createTelemetryClient?: TelemetryClientFactory;
	/** Wall clock in milliseconds */
	now?: () => number;
}

interface TelemetryBinding {
	client: TelemetryClient;
	appliance: string;
	governor: RemediationGovernor;
}

const AGGREGATE_PREFIX: Record<EntityKind, string> = {
	ioc: 'IOC',
	service: 'SRV',
};

export class IocManagerTask extends TaskBase {
	private readonly createApplicationClient: ApplicationClientFactory;
	private readonly createTelemetryClient: TelemetryClientFactory;
	private readonly now: () => number;

	private readonly queue = new ControlActionQueue();
	/** Command channel short name -> action, looked up when the write arrives */
	private readonly dispatch = new Map<string, ControlAction>();
	private readonly entities = new Map<string, TrackedEntity>();
	private readonly status = new Map<string, EntityStatus>();
	private readonly lastHealth = new Map<string, string>();
	private readonly observed = new Set<string>();

	private client?: ApplicationClient;
	private telemetry?: TelemetryBinding;
	private actionRefreshDelayMs = 1000;
	private channelsReady = false;

	constructor(context: TaskContext, dependencies: IocManagerDependencies = {}) {
		super(context);
		this.defaultUpdateRate = DEFAULT_UPDATE_RATE;
		this.createApplicationClient = dependencies.createApplicationClient ?? createKubernetesApplicationClient;
		this.createTelemetryClient = dependencies.createTelemetryClient ?? ((config) => new HttpTelemetryClient(config));
		this.now = dependencies.now ?? Date.now;
	}

	// ============================================================================
	// LIFECYCLE HOOKS
	// ============================================================================

	public async initialize(): Promise<void> {
		const params = this.parseParameters();
		this.actionRefreshDelayMs = params.action_refresh_delay * 1000;

		const entities = buildTrackedEntities(
			this.values,
			{
				prefix: this.prefix,
				taskName: this.name,
				namespace: this.values.namespace,
				iocAppSuffix: params.ioc_app_suffix,
				serviceAppSuffix: params.service_app_suffix,
			},
			this.logger
		);

		this.client = this.createApplicationClient(params.argocd_namespace);

		this.entities.clear();
		for (const entity of entities) {
			this.entities.set(entity.name, entity);
			if (!this.status.has(entity.name)) {
				this.status.set(entity.name, initialEntityStatus());
			}
		}

		if (!this.channelsReady) {
			this.createEntityChannels(entities);
			this.createDevgroupChannels(entities);
			this.createAggregateChannels();
			if (params.telemetry) {
				this.createTelemetryChannels();
			}
			this.channelsReady = true;
		}

		this.telemetry = params.telemetry ? this.bindTelemetry(params.telemetry, params.service_app_suffix) : undefined;

		const iocCount = entities.filter((entity) => entity.kind === 'ioc').length;
		this.logger.info(
			`Monitoring ${iocCount} IOCs and ${entities.length - iocCount} services `
			+ `in ${groupByDevgroup(entities).size} devgroups`
		);
		this.logger.info(`Update rate: ${this.updateRate} Hz`);
		this.logger.info(`Argo CD namespace: ${params.argocd_namespace}`);
	}

	public async cleanup(): Promise<void> {
		const dropped = this.queue.drain();
		if (dropped.length > 0) {
			this.logger.warn(`Discarding ${dropped.length} queued control actions`);
		}
		this.logger.info('Cleaning up IOC manager task');
	}

	protected async processCycle(): Promise<void> {
		await this.refreshStatus();
		await this.processControlQueue();
		await this.updateTelemetry();

		const { total, healthy } = this.totals();
		this.setMessage(`Monitoring ${total} apps (${healthy} healthy)`);
	}

	protected async triggered(): Promise<void> {
		await this.processCycle();
	}

	// ============================================================================
	// STATUS
	// ============================================================================

	/**
	 * List applications once and update every tracked entity. A failed listing
	 * keeps the last known status of entities already observed.
	 */
	public async refreshStatus(): Promise<void> {
		const client = this.requireClient();

		let applications: Map<string, Application>;
		try {
			const items = await client.listApplications();
			applications = new Map(items.map((app) => [app.metadata.name, app]));
		} catch (error) {
			this.logger.error('Error listing Argo CD applications', toError(error));
			for (const entity of this.entities.values()) {
				if (!this.observed.has(entity.name)) {
					this.applyStatus(entity, { ...MISSING_STATUS });
				}
			}
			this.publishAggregates();
			return;
		}

		for (const entity of this.entities.values()) {
			this.observed.add(entity.name);
			this.applyStatus(entity, this.deriveStatus(applications.get(entity.appId)));
		}
		this.publishAggregates();
	}

	private deriveStatus(app: Application | undefined): Partial<EntityStatus> & { healthStatus: string } {
		if (!app) {
			return { ...MISSING_STATUS };
		}

		const operationState = app.status?.operationState;
		const finishedAt = operationState?.finishedAt;

		return {
			appStatus: operationState?.phase ?? 'Unknown',
			syncStatus: app.status?.sync?.status ?? 'Unknown',
			healthStatus: app.status?.health?.status ?? 'Unknown',
			...(finishedAt ? { lastSync: formatRemoteTimestamp(finishedAt) } : {}),
		};
	}

	private applyStatus(entity: TrackedEntity, update: Partial<EntityStatus> & { healthStatus: string }): void {
		const current = this.status.get(entity.name) ?? initialEntityStatus();
		const next: EntityStatus = { ...current, ...update };

		const previousHealth = this.lastHealth.get(entity.name) ?? 'Unknown';
		if (next.healthStatus !== previousHealth) {
			this.lastHealth.set(entity.name, next.healthStatus);
			next.lastHealthChange = formatLocalTimestamp(new Date(this.now()));
			this.logger.info(`${entity.kind.toUpperCase()} ${entity.name} health changed: ${previousHealth} -> ${next.healthStatus}`);
		}

		this.status.set(entity.name, next);
		this.publishEntity(entity, next);
	}

	private publishEntity(entity: TrackedEntity, status: EntityStatus): void {
		const channel = (suffix: EntityChannelSuffix): string => entityChannelName(entity.channelSegment, suffix);

		this.setChannel(channel('APP_STATUS'), status.appStatus);
		this.setChannel(channel('SYNC_STATUS'), mapSyncStatus(status.syncStatus));
		this.setChannel(channel('HEALTH_STATUS'), mapHealthStatus(status.healthStatus));
		this.setChannel(channel('LAST_SYNC'), status.lastSync);
		this.setChannel(channel('LAST_HEALTH'), status.lastHealthChange);
	}

	public getAggregates(kind: EntityKind): AggregateCounts {
		const counts: AggregateCounts = { total: 0, healthy: 0, progressing: 0, other: 0 };
		for (const entity of this.entities.values()) {
			if (entity.kind !== kind) {
				continue;
			}
			counts.total++;
			const health = this.status.get(entity.name)?.healthStatus;
			if (health === 'Healthy') {
				counts.healthy++;
			} else if (health === 'Progressing') {
				counts.progressing++;
			} else {
				counts.other++;
			}
		}
		return counts;
	}

	private publishAggregates(): void {
		for (const kind of ['ioc', 'service'] as const) {
			const counts = this.getAggregates(kind);
			const prefix = AGGREGATE_PREFIX[kind];
			this.setChannel(`${prefix}_TOTAL`, counts.total);
			this.setChannel(`${prefix}_HEALTHY`, counts.healthy);
			this.setChannel(`${prefix}_PROGRESSING`, counts.progressing);
			this.setChannel(`${prefix}_OTHER`, counts.other);
		}
	}

	private totals(): { total: number; healthy: number } {
		const iocs = this.getAggregates('ioc');
		const services = this.getAggregates('service');
		return {
			total: iocs.total + services.total,
			healthy: iocs.healthy + services.healthy,
		};
	}

	/**
	 * Copy of the current per-entity status, keyed by entity name
	 */
	public getStatusSnapshot(): Record<string, EntityStatus> {
		return _.cloneDeep(Object.fromEntries(this.status));
	}

	public getEntities(): TrackedEntity[] {
		return [...this.entities.values()];
	}

	// ============================================================================
	// CONTROL ACTIONS
	// ============================================================================

	private onControlWrite(channelName: string, value: ChannelValue, channel: Channel): void {
		if (value !== true) {
			return;
		}

		// Momentary: the command channel reads back false straight away
		channel.set(false);

		const action = this.dispatch.get(channelName);
		if (!action) {
			this.logger.warn(`No control action bound to ${channelName}`);
			return;
		}

		this.queue.enqueue(action.entity, action.verb);
		this.logger.info(`Queued ${action.verb} action for ${action.entity}`);
	}

	private async processControlQueue(): Promise<void> {
		const actions = this.queue.drain();
		for (const action of actions) {
			await this.executeAction(action);
			await delay(this.actionRefreshDelayMs);
			await this.refreshStatus();
		}
	}

	private async executeAction(action: ControlAction): Promise<void> {
		const entity = this.entities.get(action.entity);
		if (!entity) {
			this.logger.warn(`Ignoring ${action.verb} for unknown entity ${action.entity}`);
			return;
		}

		this.logger.info(`Processing ${action.verb} for ${entity.kind} ${entity.name}`);

		switch (action.verb) {
			case 'START':
				await this.startApplication(entity.appId);
				break;
			case 'STOP':
				await this.stopApplication(entity);
				break;
			case 'RESTART':
				await this.restartApplication(entity.appId);
				break;
		}
	}

	private async startApplication(appId: string): Promise<void> {
		try {
			await this.requireClient().patchApplication(appId, SYNC_PATCH);
			this.logger.info(`Started (synced) application: ${appId}`);
		} catch (error) {
			this.logger.error(`Error starting application ${appId}`, toError(error));
		}
	}

	/**
	 * IOCs are stopped by deleting their application; services keep theirs and
	 * only lose automated sync.
	 */
	private async stopApplication(entity: TrackedEntity): Promise<void> {
		const client = this.requireClient();
		try {
			if (entity.kind === 'ioc') {
				await client.deleteApplication(entity.appId);
				this.logger.info(`Stopped (deleted) application: ${entity.appId}`);
			} else {
				await client.patchApplication(entity.appId, SUSPEND_PATCH);
				this.logger.info(`Stopped (suspended auto-sync) application: ${entity.appId}`);
			}
		} catch (error) {
			this.logger.error(`Error stopping application ${entity.appId}`, toError(error));
		}
	}

	private async restartApplication(appId: string): Promise<void> {
		const client = this.requireClient();
		try {
			await client.deleteApplication(appId);
		} catch (error) {
			this.logger.debug(`Delete before restart failed for ${appId}: ${toError(error).message}`);
		}

		try {
			await client.patchApplication(appId, SYNC_PATCH);
			this.logger.info(`Restarted application: ${appId}`);
		} catch (error) {
			this.logger.error(`Error restarting application ${appId}`, toError(error));
		}
	}

	// ============================================================================
	// TELEMETRY
	// ============================================================================

	private bindTelemetry(
		config: z.infer<typeof telemetryParametersSchema>,
		serviceAppSuffix: string
	): TelemetryBinding {
		const target = this.entities.get(config.service)?.appId
			?? applicationId(config.service, this.values.namespace, serviceAppSuffix);

		const governor = new RemediationGovernor(
			{
				threshold: config.restart_threshold,
				cooldownMs: config.restart_cooldown === null ? null : config.restart_cooldown * 1000,
			},
			async () => {
				await this.restartApplication(target);
				this.setChannel('TELEMETRY_LAST_RESTART', formatLocalTimestamp(new Date(this.now())));
			},
			this.logger.child('governor')
		);

		if (!governor.isEnabled()) {
			this.logger.info('Automatic restart disabled: restart_threshold or restart_cooldown not set');
		}

		return {
			client: this.createTelemetryClient({
				url: config.url,
				...(config.timeout !== undefined && { timeoutMs: config.timeout * 1000 }),
			}),
			appliance: config.appliance,
			governor,
		};
	}

	private async updateTelemetry(): Promise<void> {
		if (!this.telemetry) {
			return;
		}

		let sample: TelemetrySample;
		try {
			sample = await this.telemetry.client.fetch(this.telemetry.appliance);
		} catch (error) {
			this.logger.warn(`Telemetry unavailable for ${this.telemetry.appliance}: ${toError(error).message}`);
			return;
		}

		this.setChannel('TELEMETRY_TOTAL', sample.total);
		this.setChannel('TELEMETRY_CONNECTED', sample.connected);
		this.setChannel('TELEMETRY_DISCONNECTED', sample.disconnected);

		await this.telemetry.governor.observe(sample, this.now());
	}

	// ============================================================================
	// CHANNELS
	// ============================================================================

	private createEntityChannels(entities: readonly TrackedEntity[]): void {
		for (const entity of entities) {
			const name = (suffix: EntityChannelSuffix): string => entityChannelName(entity.channelSegment, suffix);

			this.channels.create(name('APP_STATUS'), { type: 'string', initial: 'Unknown' });
			this.channels.create(name('SYNC_STATUS'), {
				type: 'int',
				initial: mapSyncStatus('Unknown'),
				enumStrings: SYNC_STATUS_LABELS,
			});
			this.channels.create(name('HEALTH_STATUS'), {
				type: 'int',
				initial: mapHealthStatus('Unknown'),
				enumStrings: HEALTH_STATUS_LABELS,
			});
			this.channels.create(name('LAST_SYNC'), { type: 'string', initial: NEVER });
			this.channels.create(name('LAST_HEALTH'), { type: 'string', initial: NEVER });

			for (const verb of CONTROL_VERBS) {
				this.createControlChannel(name(verb), entity.name, verb);
			}

			this.logger.debug(`Created channels for ${entity.kind}: ${entity.name}`);
		}
	}

	private createControlChannel(channelName: string, entity: string, verb: ControlVerb): void {
		this.dispatch.set(channelName, { entity, verb });
		this.channels.create(channelName, {
			type: 'bool',
			initial: false,
			writable: true,
			description: `${verb} ${entity}`,
			onUpdate: (value, channel) => this.onControlWrite(channelName, value, channel),
		});
	}

	private createDevgroupChannels(entities: readonly TrackedEntity[]): void {
		for (const [devgroup, members] of groupByDevgroup(entities)) {
			const channelName = `DEVGROUP_${normalizeEntityName(devgroup)}_IOCS`;
			this.channels.create(channelName, { type: 'string', initial: members.join(',') });
			this.logger.info(`Created devgroup channel: ${channelName} with ${members.length} entries`);
		}
	}

	private createAggregateChannels(): void {
		for (const prefix of Object.values(AGGREGATE_PREFIX)) {
			for (const counter of ['TOTAL', 'HEALTHY', 'PROGRESSING', 'OTHER']) {
				this.channels.create(`${prefix}_${counter}`, { type: 'int', initial: 0 });
			}
		}
	}

	private createTelemetryChannels(): void {
		this.channels.create('TELEMETRY_TOTAL', { type: 'int', initial: 0 });
		this.channels.create('TELEMETRY_CONNECTED', { type: 'int', initial: 0 });
		this.channels.create('TELEMETRY_DISCONNECTED', { type: 'int', initial: 0 });
		this.channels.create('TELEMETRY_LAST_RESTART', { type: 'string', initial: NEVER });
	}

	// ============================================================================
	// HELPERS
	// ============================================================================

	private parseParameters(): IocManagerParameters {
		const result = iocManagerParametersSchema.safeParse(this.parameters);
		if (!result.success) {
			throw new ConfigurationError(`Invalid iocmng parameters: ${formatIssues(result.error)}`);
		}
		return result.data;
	}

	private requireClient(): ApplicationClient {
		if (!this.client) {
			throw new Error('Application client not initialized');
		}
		return this.client;
	}
}
