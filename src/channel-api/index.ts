/**
 * Channel API
 * ===========
 *
 * HTTP access to the channel registry: the I/O layer through which operators
 * and display tools read channels and deliver writes.
 */

import express from 'express';
import type { Server } from 'http';
import type { ChannelRegistry } from '../channels/channel-registry';
import type { AgentLogger } from '../logging/agent-logger';
import { ComponentLogger } from '../logging/component-logger';
import { createErrorHandler } from './middleware/errors';
import { createV1Router } from './v1';

export class ChannelAPI {
	private api = express();
	private server: Server | null = null;
	private readonly logger: ComponentLogger;

	public constructor(registry: ChannelRegistry, agentLogger: AgentLogger) {
		this.logger = new ComponentLogger(agentLogger, 'ChannelAPI');

		this.api.disable('x-powered-by');
		this.api.get('/ping', (_req, res) => res.send('OK'));
		this.api.use(express.json({ limit: '1mb' }));
		this.api.use(createV1Router(registry));
		this.api.use(createErrorHandler(this.logger));
	}

	/**
	 * Start listening; resolves with the bound port (useful with port 0)
	 */
	public async listen(port: number, host: string = '0.0.0.0'): Promise<number> {
		return new Promise((resolve, reject) => {
			const server = this.api.listen(port, host, () => {
				const address = server.address();
				const boundPort = typeof address === 'object' && address !== null ? address.port : port;
				this.logger.info(`Channel API started on port ${boundPort}`);
				resolve(boundPort);
			});
			server.once('error', reject);
			this.server = server;
		});
	}

	public async stop(): Promise<void> {
		if (this.server == null) {
			this.logger.warn('Channel API already stopped, ignoring further requests');
			return;
		}

		const server = this.server;
		this.server = null;
		return new Promise((resolve, reject) => {
			server.close((err?: Error) => {
				if (err) {
					this.server = server;
					return reject(err);
				}
				this.logger.info('Stopped Channel API');
				return resolve();
			});
		});
	}
}
