#!/usr/bin/env node
/**
 * Beamline controller entry point
 */

import * as dotenv from 'dotenv';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { ConfigLoader } from './config/config-loader';
import { BeamlineController } from './controller';
import { DeviceRegistry } from './devices/device-registry';
import { toError } from './errors';
import { createAgentLogger, LOG_LEVELS } from './logging';
import { createDefaultTaskRegistry } from './tasks/task-registry';

// Load environment variables
dotenv.config();

async function main(): Promise<void> {
	const argv = await yargs(hideBin(process.argv))
		.scriptName('beamline-controller')
		.option('config', {
			alias: 'c',
			description: 'Path to config.yaml (tasks and controller settings)',
			type: 'string',
		})
		.option('values', {
			alias: 'b',
			description: 'Path to values.yaml (beamline inventory)',
			type: 'string',
		})
		.option('log-level', {
			alias: 'l',
			description: 'Log level',
			type: 'string',
			choices: LOG_LEVELS,
		})
		.option('api-port', {
			description: 'Channel API port',
			type: 'number',
		})
		.help()
		.alias('help', 'h')
		.version()
		.alias('version', 'v')
		.parse();

	const loader = new ConfigLoader({
		...(argv.config !== undefined && { config: argv.config }),
		...(argv.values !== undefined && { values: argv.values }),
		...(argv.logLevel !== undefined && { logLevel: argv.logLevel }),
		...(argv.apiPort !== undefined && { apiPort: argv.apiPort }),
	});
	const { settings, config, values } = loader.load();

	const logger = createAgentLogger({ level: settings.logLevel ?? config.logLevel ?? 'info' });
	logger.info('Configuration loaded', {
		component: 'main',
		config: settings.configPath,
		values: settings.valuesPath,
	});

	const controller = new BeamlineController({
		config,
		values,
		logger,
		taskRegistry: createDefaultTaskRegistry(),
		deviceFactory: new DeviceRegistry(logger),
		...(settings.apiPort !== undefined && { apiPort: settings.apiPort }),
	});

	let shuttingDown = false;
	const gracefulShutdown = async (signal: string): Promise<void> => {
		if (shuttingDown) {
			logger.warn(`Already shutting down, ignoring ${signal}`, { component: 'main' });
			return;
		}
		shuttingDown = true;
		logger.info(`${signal} received. Starting graceful shutdown...`, { component: 'main' });

		try {
			await controller.stop();
			process.exit(0);
		} catch (error) {
			logger.error('Error during shutdown', toError(error), { component: 'main' });
			process.exit(1);
		}
	};

	process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
	process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

	await controller.start();
	logger.info('Beamline controller running. Press Ctrl+C to stop.', { component: 'main' });
}

main().catch((error: unknown) => {
	console.error('Failed to start beamline controller:', toError(error).message);
	process.exit(1);
});
