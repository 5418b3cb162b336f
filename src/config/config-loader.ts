/**
 * Controller Configuration Loader
 * ===============================
 * Resolves file locations and runtime settings with priority:
 * 1. Command-line flags - highest priority
 * 2. Environment variables (a .env file is honoured)
 * 3. Default values
 *
 * Then reads and validates config.yaml and values.yaml.
 */

import * as fs from 'fs';
import * as path from 'path';
import yaml from 'js-yaml';
import type { z } from 'zod';
import { ConfigurationError, toError } from '../errors';
import { isLogLevel } from '../logging/types';
import type { LogLevel } from '../logging/types';
import {
	beamlineValuesSchema,
	controllerConfigSchema,
	formatIssues,
} from './schema';
import type { BeamlineValues, ControllerConfig } from './schema';

export interface CliOptions {
	config?: string;
	values?: string;
	logLevel?: string;
	apiPort?: number;
}

export interface RuntimeSettings {
	configPath: string;
	valuesPath: string;
	logLevel?: LogLevel;
	apiPort?: number;
}

export interface LoadedConfiguration {
	settings: RuntimeSettings;
	config: ControllerConfig;
	values: BeamlineValues;
}

const DEFAULT_CONFIG_FILE = 'config.yaml';
const DEFAULT_VALUES_FILE = 'values.yaml';

export class ConfigLoader {
	private readonly settings: RuntimeSettings;

	constructor(cli: CliOptions = {}, env: NodeJS.ProcessEnv = process.env) {
		this.settings = ConfigLoader.resolveSettings(cli, env);
	}

	/**
	 * Merge CLI flags over environment over defaults
	 */
	public static resolveSettings(cli: CliOptions, env: NodeJS.ProcessEnv): RuntimeSettings {
		const logLevel = (cli.logLevel ?? env.LOG_LEVEL)?.toLowerCase();
		if (logLevel !== undefined && !isLogLevel(logLevel)) {
			throw new ConfigurationError(`Invalid log level: ${logLevel}`);
		}

		const apiPort = cli.apiPort ?? ConfigLoader.parseNumber(env.CHANNEL_API_PORT);

		return {
			configPath: path.resolve(cli.config ?? env.CONFIG_PATH ?? DEFAULT_CONFIG_FILE),
			valuesPath: path.resolve(cli.values ?? env.VALUES_PATH ?? DEFAULT_VALUES_FILE),
			...(logLevel !== undefined && isLogLevel(logLevel) && { logLevel }),
			...(apiPort !== undefined && { apiPort }),
		};
	}

	public getSettings(): RuntimeSettings {
		return { ...this.settings };
	}

	public load(): LoadedConfiguration {
		return {
			settings: this.getSettings(),
			config: ConfigLoader.loadControllerConfig(this.settings.configPath),
			values: ConfigLoader.loadBeamlineValues(this.settings.valuesPath),
		};
	}

	public static loadControllerConfig(filePath: string): ControllerConfig {
		return ConfigLoader.parseFile(filePath, controllerConfigSchema);
	}

	public static loadBeamlineValues(filePath: string): BeamlineValues {
		return ConfigLoader.parseFile(filePath, beamlineValuesSchema);
	}

	/**
	 * Read a YAML document and validate it. An empty document counts as `{}`.
	 */
	private static parseFile<T extends z.ZodTypeAny>(filePath: string, schema: T): z.output<T> {
		let document: unknown;
		try {
			document = yaml.load(fs.readFileSync(filePath, 'utf-8'));
		} catch (error) {
			throw new ConfigurationError(`Failed to load ${filePath}: ${toError(error).message}`);
		}

		const result = schema.safeParse(document ?? {});
		if (!result.success) {
			throw new ConfigurationError(`Invalid configuration in ${filePath}: ${formatIssues(result.error)}`);
		}
		return result.data;
	}

	private static parseNumber(value: string | undefined): number | undefined {
		if (value === undefined || value.trim() === '') {
			return undefined;
		}
		const parsed = Number(value);
		if (!Number.isInteger(parsed)) {
			throw new ConfigurationError(`Expected an integer, got "${value}"`);
		}
		return parsed;
	}
}

/**
 * Channel prefix shared by every task: `<BEAMLINE>:<NAMESPACE>` unless overridden
 */
export function channelPrefix(config: ControllerConfig, values: BeamlineValues): string {
	return config.prefix ?? `${values.beamline.toUpperCase()}:${values.namespace.toUpperCase()}`;
}
