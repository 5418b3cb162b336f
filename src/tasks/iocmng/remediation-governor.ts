/**
 * REMEDIATION GOVERNOR
 * ====================
 *
 * Restarts a dependent service when its connection counts say it is stuck:
 * `connected < threshold` and `disconnected > threshold`, at most once per
 * cooldown window. Without both a threshold and a cooldown it never acts.
 */

import type { ComponentLogger } from '../../logging/component-logger';
import type { TelemetrySample } from './types';

export interface RemediationConfig {
	threshold: number | null;
	cooldownMs: number | null;
}

export type RestartAction = () => Promise<void>;

export class RemediationGovernor {
	private lastRestart: number | null = null;

	constructor(
		private readonly config: RemediationConfig,
		private readonly restart: RestartAction,
		private readonly logger?: ComponentLogger
	) {}

	public isEnabled(): boolean {
		return this.config.threshold !== null && this.config.cooldownMs !== null;
	}

	/**
	 * Feed one observation. Resolves to true when a restart was issued.
	 */
	public async observe(sample: Pick<TelemetrySample, 'connected' | 'disconnected'>, now: number): Promise<boolean> {
		const { threshold, cooldownMs } = this.config;
		if (threshold === null || cooldownMs === null) {
			return false;
		}

		if (!(sample.connected < threshold && sample.disconnected > threshold)) {
			return false;
		}

		if (this.lastRestart !== null && now - this.lastRestart < cooldownMs) {
			this.logger?.debug('Restart condition met but cooldown has not elapsed', {
				connected: sample.connected,
				disconnected: sample.disconnected,
				remainingMs: cooldownMs - (now - this.lastRestart),
			});
			return false;
		}

		this.logger?.warn(
			`Restarting dependent service: connected=${sample.connected}, disconnected=${sample.disconnected}, threshold=${threshold}`
		);
		this.lastRestart = now;
		await this.restart();
		return true;
	}

	public getLastRestart(): number | null {
		return this.lastRestart;
	}
}
