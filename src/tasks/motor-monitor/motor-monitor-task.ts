/**
 * Motor monitor task
 *
 * Watches motor devices, logs when they start and stop moving and mirrors
 * position / moving state onto `<MOTOR>_POS` and `<MOTOR>_MOVING` when those
 * output channels are configured.
 */

import { z } from 'zod';
import { formatIssues } from '../../config/schema';
import { isMotorDevice } from '../../devices/types';
import type { MotorDevice } from '../../devices/types';
import { ConfigurationError, toError } from '../../errors';
import { TaskBase } from '../task-base';

const motorMonitorParametersSchema = z.object({
	motor_names: z.array(z.string().min(1)).default([]),
}).passthrough();

export class MotorMonitorTask extends TaskBase {
	private readonly motors = new Map<string, MotorDevice>();
	private readonly moving = new Map<string, boolean>();

	public async initialize(): Promise<void> {
		const result = motorMonitorParametersSchema.safeParse(this.parameters);
		if (!result.success) {
			throw new ConfigurationError(`Invalid motor_monitor parameters: ${formatIssues(result.error)}`);
		}

		this.motors.clear();
		this.moving.clear();

		for (const motorName of result.data.motor_names) {
			const device = this.devices.get(motorName);
			if (!device) {
				this.logger.warn(`Motor device not found: ${motorName}`);
			} else if (!isMotorDevice(device)) {
				this.logger.warn(`Device ${motorName} is not a motor`);
			} else {
				this.motors.set(motorName, device);
				this.moving.set(motorName, false);
				this.logger.info(`Found motor device: ${motorName}`);
			}
		}

		if (this.motors.size === 0) {
			this.logger.warn('No motor devices found');
		}
		this.logger.info(`Available devices: ${[...this.devices.keys()].join(', ') || '-'}`);
		this.logger.info(`Initialized with ${this.motors.size} motors`);
	}

	public async cleanup(): Promise<void> {
		this.logger.info('Cleaning up motor monitor task');
	}

	protected async processCycle(): Promise<void> {
		for (const [motorName, motor] of this.motors) {
			try {
				await this.checkMotor(motorName, motor);
			} catch (error) {
				this.logger.error(`Error monitoring ${motorName}`, toError(error));
			}
		}
	}

	protected async triggered(): Promise<void> {
		await this.processCycle();
	}

	private async checkMotor(motorName: string, motor: MotorDevice): Promise<void> {
		const [isMoving, position] = await Promise.all([motor.isMoving(), motor.getPosition()]);
		const wasMoving = this.moving.get(motorName) ?? false;

		if (isMoving && !wasMoving) {
			this.logger.info(`Motor ${motorName} started moving - Position: ${position}`);
		} else if (!isMoving && wasMoving) {
			this.logger.info(`Motor ${motorName} stopped - Final position: ${position}`);
		} else if (isMoving) {
			this.logger.debug(`Motor ${motorName} is moving - Current position: ${position}`);
		}
		this.moving.set(motorName, isMoving);

		if (this.channels.has(`${motorName}_POS`)) {
			this.setChannel(`${motorName}_POS`, position);
		}
		if (this.channels.has(`${motorName}_MOVING`)) {
			this.setChannel(`${motorName}_MOVING`, isMoving ? 1 : 0);
		}
	}

	public isMotorMoving(motorName: string): boolean {
		return this.moving.get(motorName) ?? false;
	}
}
