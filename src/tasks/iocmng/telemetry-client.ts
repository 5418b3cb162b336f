/**
 * Connection telemetry of the dependent service (e.g. a gateway in front of the IOCs)
 */

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { formatIssues } from '../../config/schema';
import type { TelemetrySample } from './types';

const DEFAULT_TIMEOUT_MS = 5000;

const telemetrySampleSchema = z.object({
	total: z.number().int().nonnegative(),
	connected: z.number().int().nonnegative(),
	disconnected: z.number().int().nonnegative(),
});

export interface TelemetryClient {
	fetch(appliance: string): Promise<TelemetrySample>;
}

export interface HttpTelemetryClientConfig {
	url: string;
	timeoutMs?: number;
}

export function parseTelemetrySample(body: unknown): TelemetrySample {
	const result = telemetrySampleSchema.safeParse(body);
	if (!result.success) {
		throw new Error(`Unexpected telemetry response: ${formatIssues(result.error)}`);
	}
	return result.data;
}

export class HttpTelemetryClient implements TelemetryClient {
	private readonly httpClient: AxiosInstance;

	constructor(config: HttpTelemetryClientConfig) {
		this.httpClient = axios.create({
			baseURL: config.url.replace(/\/+$/, ''),
			timeout: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
			headers: {
				'Accept': 'application/json',
				'User-Agent': 'beamline-controller',
			},
		});
	}

	/**
	 * `GET <url>/<appliance>` -> `{ total, connected, disconnected }`
	 */
	async fetch(appliance: string): Promise<TelemetrySample> {
		const response = await this.httpClient.get<unknown>(`/${encodeURIComponent(appliance)}`);
		return parseTelemetrySample(response.data);
	}
}
