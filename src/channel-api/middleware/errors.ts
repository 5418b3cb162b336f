/**
 * Error handling middleware
 */

import type { Request, Response, NextFunction } from 'express';
import {
	ChannelNotFoundError,
	ChannelReadOnlyError,
	ChannelValueError,
} from '../../errors';
import type { ComponentLogger } from '../../logging/component-logger';

export function createErrorHandler(logger: ComponentLogger) {
	return function errors(
		err: Error,
		_req: Request,
		res: Response,
		next: NextFunction
	) {
		if (res.headersSent) {
			return next(err);
		}

		if (err instanceof ChannelNotFoundError) {
			return res.status(404).json({ error: 'Not found', message: err.message });
		}

		if (err instanceof ChannelReadOnlyError) {
			return res.status(403).json({ error: 'Forbidden', message: err.message });
		}

		if (err instanceof ChannelValueError || err instanceof SyntaxError) {
			return res.status(400).json({ error: 'Bad request', message: err.message });
		}

		logger.error('Channel API error', err);
		return res.status(500).json({
			error: 'Internal server error',
			message: err.message,
		});
	};
}
