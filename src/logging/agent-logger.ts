/**
 * Agent Logger
 * =============
 *
 * Structured logging for controller-level events (controller, tasks, channel registry, channel API).
 * Backed by a winston logger writing one line per event to the console.
 *
 * Usage:
 *   const logger = createAgentLogger({ level: 'debug' });
 *   logger.info('Task started', { component: 'iocmng' });
 *   logger.error('List failed', error, { component: 'iocmng', operation: 'poll' });
 */

import winston from 'winston';
import type { LogContext, LogLevel } from './types';

export interface AgentLoggerOptions {
	level?: LogLevel;
	/** Drop every event (used by tests) */
	silent?: boolean;
}

const consoleFormat = winston.format.printf((info) => {
	const { timestamp, level, message, component, ...context } = info;
	const name = typeof component === 'string' ? component : 'controller';
	let output = `${String(timestamp)} [${level.toUpperCase()}] [${name}] ${String(message)}`;

	if (Object.keys(context).length > 0) {
		output += ` ${JSON.stringify(context)}`;
	}

	return output;
});

export class AgentLogger {
	constructor(private readonly winstonLogger: winston.Logger) {}

	/**
	 * Update the minimum log level
	 */
	public setLogLevel(level: LogLevel): void {
		const oldLevel = this.getLogLevel();
		this.winstonLogger.level = level;
		this.winstonLogger.log('info', `Log level changed: ${oldLevel} -> ${level}`, {
			component: 'AgentLogger',
		});
	}

	public getLogLevel(): LogLevel {
		const level = this.winstonLogger.level;
		return level === 'debug' || level === 'warn' || level === 'error' ? level : 'info';
	}

	public debug(message: string, context?: LogContext): void {
		this.log('debug', message, context);
	}

	public info(message: string, context?: LogContext): void {
		this.log('info', message, context);
	}

	public warn(message: string, context?: LogContext): void {
		this.log('warn', message, context);
	}

	public error(message: string, error?: Error, context?: LogContext): void {
		const errorContext = error ? {
			error: {
				name: error.name,
				message: error.message,
				stack: error.stack,
			},
		} : {};

		this.log('error', message, {
			...context,
			...errorContext,
		});
	}

	private log(level: LogLevel, message: string, context?: LogContext): void {
		this.winstonLogger.log(level, message, { ...context });
	}
}

export function createAgentLogger(options: AgentLoggerOptions = {}): AgentLogger {
	const winstonLogger = winston.createLogger({
		level: options.level ?? 'info',
		silent: options.silent ?? false,
		format: winston.format.combine(
			winston.format.timestamp(),
			consoleFormat,
		),
		transports: [
			new winston.transports.Console({
				stderrLevels: ['warn', 'error'],
			}),
		],
	});

	return new AgentLogger(winstonLogger);
}
