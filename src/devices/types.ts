/**
 * Device abstraction contract.
 *
 * Hardware proxies live outside this project; the controller only reaches them
 * through a DeviceFactory and the narrow handle interfaces below.
 */

export interface DeviceHandle {
	readonly name: string;
	readonly prefix: string;
}

export interface MotorDevice extends DeviceHandle {
	isMoving(): Promise<boolean>;
	getPosition(): Promise<number>;
}

export interface DeviceOptions {
	prefix: string;
	name: string;
	config: Record<string, unknown>;
	/** Points of interest (motors) */
	poi?: unknown;
}

export type DeviceConstructor = (options: DeviceOptions) => DeviceHandle;

export interface DeviceFactory {
	create(
		group: string,
		type: string | undefined,
		prefix: string,
		name: string,
		config: Record<string, unknown>
	): DeviceHandle | null;
}

export function isMotorDevice(device: DeviceHandle): device is MotorDevice {
	return 'isMoving' in device
		&& typeof device.isMoving === 'function'
		&& 'getPosition' in device
		&& typeof device.getPosition === 'function';
}
