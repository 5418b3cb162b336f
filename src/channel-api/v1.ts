/**
 * Channel API v1 Router
 */

import express from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { ChannelRegistry } from '../channels/channel-registry';

export function createV1Router(registry: ChannelRegistry): express.Router {
	const router = express.Router();

	/**
	 * GET /v1/channels
	 * List every channel with its current value
	 */
	router.get('/v1/channels', (_req: Request, res: Response) => {
		res.json(registry.list().map((channel) => channel.snapshot()));
	});

	/**
	 * GET /v1/channels/:name
	 */
	router.get('/v1/channels/:name', (req: Request, res: Response, next: NextFunction) => {
		try {
			res.json(registry.get(req.params.name).snapshot());
		} catch (error) {
			next(error);
		}
	});

	/**
	 * PUT /v1/channels/:name
	 * External write: { "value": ... }
	 */
	router.put('/v1/channels/:name', (req: Request, res: Response, next: NextFunction) => {
		try {
			const body: unknown = req.body;
			if (typeof body !== 'object' || body === null || !('value' in body)) {
				return res.status(400).json({
					error: 'Bad request',
					message: 'Request body must contain a value',
				});
			}

			const channel = registry.write(req.params.name, body.value);
			return res.status(200).json(channel.snapshot());
		} catch (error) {
			return next(error);
		}
	});

	return router;
}
