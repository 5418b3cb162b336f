/**
 * Configuration schemas
 *
 * config.yaml  - controller settings and the task list
 * values.yaml  - beamline identity and the IOC / service inventory
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors';
import { LOG_LEVELS } from '../logging/types';

export const DEFAULT_CHANNEL_API_PORT = 48485;

const scalarSchema = z.union([z.number(), z.boolean(), z.string()]);

export const channelConfigSchema = z.object({
	type: z.enum(['float', 'int', 'bool', 'string']).catch('float'),
	value: scalarSchema.optional(),
	unit: z.string().optional(),
	description: z.string().optional(),
});

export const taskChannelsSchema = z.object({
	inputs: z.record(channelConfigSchema).default({}),
	outputs: z.record(channelConfigSchema).default({}),
});

export const taskConfigSchema = z.object({
	name: z.string().min(1),
	module: z.string().min(1),
	parameters: z.record(z.unknown()).default({}),
	pvs: taskChannelsSchema.default({}),
});

export const controllerConfigSchema = z.object({
	prefix: z.string().min(1).optional(),
	logLevel: z.enum(LOG_LEVELS).optional(),
	channelApi: z.object({
		enabled: z.boolean().default(true),
		host: z.string().default('0.0.0.0'),
		port: z.number().int().min(0).max(65535).default(DEFAULT_CHANNEL_API_PORT),
	}).default({}),
	tasks: z.array(taskConfigSchema).default([]),
});

export const beamlineValuesSchema = z.object({
	beamline: z.string().min(1).default('BEAMLINE'),
	namespace: z.string().min(1).default('DEFAULT'),
	epicsConfiguration: z.object({
		iocs: z.unknown().optional(),
		services: z.unknown().optional(),
	}).passthrough().default({}),
}).passthrough();

export type ChannelConfig = z.infer<typeof channelConfigSchema>;
export type TaskChannelsConfig = z.infer<typeof taskChannelsSchema>;
export type TaskConfig = z.infer<typeof taskConfigSchema>;
export type ControllerConfig = z.infer<typeof controllerConfigSchema>;
export type BeamlineValues = z.infer<typeof beamlineValuesSchema>;

// ============================================================================
// Inventory entries (IOCs and services)
// ============================================================================

const deviceEntrySchema = z.object({
	name: z.string().min(1),
}).passthrough();

const inventoryFieldsSchema = z.object({
	devgroup: z.string().min(1).optional(),
	devtype: z.string().min(1).optional(),
	iocprefix: z.string().optional(),
	disable: z.boolean().optional(),
	devices: z.array(deviceEntrySchema).optional(),
}).passthrough();

const inventoryListSchema = z.array(inventoryFieldsSchema.extend({ name: z.string().min(1) }));
const inventoryMapSchema = z.record(inventoryFieldsSchema.nullable());

export type InventoryEntry = z.infer<typeof inventoryFieldsSchema> & { name: string };
export type DeviceEntry = z.infer<typeof deviceEntrySchema>;

/**
 * Accepts either a list of `{ name, ... }` objects or a `name -> { ... }` map.
 * A missing collection is an empty inventory.
 */
export function parseInventory(raw: unknown, label: string): InventoryEntry[] {
	if (raw === undefined || raw === null) {
		return [];
	}

	const asList = inventoryListSchema.safeParse(raw);
	if (asList.success) {
		return asList.data;
	}

	const asMap = inventoryMapSchema.safeParse(raw);
	if (asMap.success) {
		return Object.entries(asMap.data).map(([name, entry]) => ({ ...entry, name }));
	}

	throw new ConfigurationError(`Invalid ${label} inventory: ${formatIssues(asList.error)}`);
}

export function formatIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
		.join('; ');
}
