import pino from 'pino';

export const logger = pino({
	name: 'room-access',
	level: process.env.LOG_LEVEL || 'info',
	transport:
		process.env.NODE_ENV === 'development'
			? {
					target: 'pino-pretty',
					options: { colorize: true },
				}
			: undefined,
});

export type Logger = ReturnType<typeof createLogger>;

export function createLogger(name: string) {
	return logger.child({ name });
}
