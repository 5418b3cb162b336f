/**
 * CONTROL ACTION QUEUE
 * ====================
 *
 * FIFO between the channel-write path and the reconciliation cycle.
 * `drain()` swaps the backing array out in one step, so an action enqueued
 * while the drained batch is being executed waits for the next drain.
 */

import type { ControlAction, ControlVerb } from './types';

export class ControlActionQueue {
	private pending: ControlAction[] = [];

	public enqueue(entity: string, verb: ControlVerb): void {
		this.pending.push({ entity, verb });
	}

	/**
	 * Take every queued action. Each action is returned by exactly one drain.
	 */
	public drain(): ControlAction[] {
		const batch = this.pending;
		this.pending = [];
		return batch;
	}

	public get size(): number {
		return this.pending.length;
	}
}
