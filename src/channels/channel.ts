import { z } from 'zod';
import { ChannelReadOnlyError, ChannelValueError } from '../errors';
import type {
	ChannelDefinition,
	ChannelSnapshot,
	ChannelType,
	ChannelUpdateHandler,
	ChannelValue,
} from './types';

const boolSchema = z
	.union([z.boolean(), z.literal(0), z.literal(1), z.enum(['true', 'false', '0', '1'])])
	.transform((value) => value === true || value === 1 || value === 'true' || value === '1');

const intSchema = z.union([
	z.number().int().safe(),
	z.string().trim().regex(/^-?\d+$/).transform(Number).pipe(z.number().int().safe()),
	z.boolean().transform((value) => (value ? 1 : 0)),
]);

const floatSchema = z.union([
	z.number().finite(),
	z.string().trim().min(1).transform(Number).pipe(z.number().finite()),
]);

const stringSchema = z.union([z.string(), z.number(), z.boolean()]).transform(String);

const VALUE_SCHEMAS: Record<ChannelType, z.ZodType<ChannelValue, z.ZodTypeDef, unknown>> = {
	float: floatSchema,
	int: intSchema,
	bool: boolSchema,
	string: stringSchema,
};

const DEFAULT_VALUES: Record<ChannelType, ChannelValue> = {
	float: 0,
	int: 0,
	bool: false,
	string: '',
};

export class Channel {
	readonly name: string;
	readonly type: ChannelType;
	readonly writable: boolean;
	readonly description?: string;
	readonly unit?: string;
	readonly enumStrings?: readonly string[];
	private readonly maxLength?: number;
	private readonly onUpdate?: ChannelUpdateHandler;
	private current: ChannelValue;

	constructor(name: string, definition: ChannelDefinition) {
		this.name = name;
		this.type = definition.type;
		this.writable = definition.writable ?? false;
		this.description = definition.description;
		this.unit = definition.unit;
		this.enumStrings = definition.enumStrings;
		this.maxLength = definition.maxLength;
		this.onUpdate = definition.onUpdate;
		this.current = this.coerce(definition.initial ?? DEFAULT_VALUES[definition.type]);
	}

	get value(): ChannelValue {
		return this.current;
	}

	/**
	 * Task-side update. Never invokes the write callback.
	 */
	set(value: unknown): void {
		this.current = this.coerce(value);
	}

	/**
	 * External write: store the value, then run the update callback exactly once
	 */
	write(value: unknown): void {
		if (!this.writable) {
			throw new ChannelReadOnlyError(this.name);
		}

		this.current = this.coerce(value);
		this.onUpdate?.(this.current, this);
	}

	snapshot(): ChannelSnapshot {
		return {
			name: this.name,
			type: this.type,
			value: this.current,
			writable: this.writable,
			...(this.description !== undefined && { description: this.description }),
			...(this.unit !== undefined && { unit: this.unit }),
			...(this.enumStrings !== undefined && { enumStrings: this.enumStrings }),
		};
	}

	private coerce(value: unknown): ChannelValue {
		const result = VALUE_SCHEMAS[this.type].safeParse(value);
		if (!result.success) {
			throw new ChannelValueError(this.name, `expected ${this.type}, got ${JSON.stringify(value)}`);
		}

		const parsed = result.data;
		if (typeof parsed === 'string' && this.maxLength !== undefined && parsed.length > this.maxLength) {
			return parsed.slice(0, this.maxLength);
		}
		return parsed;
	}
}
