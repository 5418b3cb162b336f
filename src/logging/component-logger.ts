/**
 * Component Logger
 * ================
 *
 * Wrapper around AgentLogger that automatically includes component name in all log calls.
 *
 * Usage:
 *   const logger = new ComponentLogger(agentLogger, 'iocmng');
 *   logger.info('Monitoring started'); // component: 'iocmng' auto-added
 *   logger.error('Failed to patch', error, { app: 'motor-a-sparc-ioc' });
 */

import type { AgentLogger } from './agent-logger';
import type { LogContext } from './types';

export class ComponentLogger {
	constructor(
		private readonly agentLogger: AgentLogger,
		private readonly component: string
	) {}

	private mergeContext(context?: LogContext): LogContext {
		return {
			component: this.component,
			...context,
		};
	}

	debug(message: string, context?: LogContext): void {
		this.agentLogger.debug(message, this.mergeContext(context));
	}

	info(message: string, context?: LogContext): void {
		this.agentLogger.info(message, this.mergeContext(context));
	}

	warn(message: string, context?: LogContext): void {
		this.agentLogger.warn(message, this.mergeContext(context));
	}

	error(message: string, error?: Error, context?: LogContext): void {
		this.agentLogger.error(message, error, this.mergeContext(context));
	}

	/**
	 * Derive a logger for a sub-component (e.g. "iocmng/governor")
	 */
	child(name: string): ComponentLogger {
		return new ComponentLogger(this.agentLogger, `${this.component}/${name}`);
	}
}
