/**
 * TASK REGISTRY
 * =============
 *
 * Maps the `module` field of a task configuration to a task constructor.
 * Task modules register explicitly; nothing is loaded by path at run time.
 */

import { UnknownTaskModuleError } from '../errors';
import { IocManagerTask } from './iocmng/iocmng-task';
import type { IocManagerDependencies } from './iocmng/iocmng-task';
import { MotorMonitorTask } from './motor-monitor/motor-monitor-task';
import type { Task, TaskContext } from './types';

export type TaskFactory = (context: TaskContext) => Task;

export class TaskRegistry {
	private readonly factories = new Map<string, TaskFactory>();

	public register(moduleId: string, factory: TaskFactory): this {
		this.factories.set(moduleId, factory);
		return this;
	}

	public has(moduleId: string): boolean {
		return this.factories.has(moduleId);
	}

	public create(moduleId: string, context: TaskContext): Task {
		const factory = this.factories.get(moduleId);
		if (!factory) {
			throw new UnknownTaskModuleError(moduleId);
		}
		return factory(context);
	}

	public modules(): string[] {
		return [...this.factories.keys()].sort();
	}
}

export interface DefaultTaskDependencies {
	iocmng?: IocManagerDependencies;
}

export function createDefaultTaskRegistry(dependencies: DefaultTaskDependencies = {}): TaskRegistry {
	return new TaskRegistry()
		.register('iocmng', (context) => new IocManagerTask(context, dependencies.iocmng))
		.register('motor_monitor', (context) => new MotorMonitorTask(context));
}
