import { createLogger } from '@room-access/core';
import { singleton } from 'tsyringe';
import { z } from 'zod';

export interface AppConfig {
	serverName: string;
	// server names whose users may not be invited into restricted rooms
	domainsForbiddenWhenRestricted: string[];
	// base URL of the identity server, scheme included
	idServer: string;
	identityLookupTimeout: number;
	// only needed when room state is read from MongoDB
	database?: {
		uri: string;
		name: string;
		poolSize: number;
	};
}

function isHttpUrl(value: string): boolean {
	try {
		const { protocol } = new URL(value);
		return protocol === 'http:' || protocol === 'https:';
	} catch {
		return false;
	}
}

export const AppConfigSchema = z.object({
	serverName: z.string().min(1, 'Server name is required'),
	domainsForbiddenWhenRestricted: z
		.array(z.string().min(1, 'Forbidden domain cannot be empty'))
		.default([]),
	idServer: z
		.string()
		.min(1, 'Identity server is required')
		.transform((value) => (value.includes('://') ? value : `https://${value}`))
		.refine(isHttpUrl, 'Identity server must be a valid http(s) address'),
	identityLookupTimeout: z
		.number()
		.int()
		.min(1, 'Identity lookup timeout must be at least 1ms')
		.default(5000),
	database: z
		.object({
			uri: z.string().min(1, 'Database URI is required'),
			name: z.string().min(1, 'Database name is required'),
			poolSize: z.number().int().min(1, 'Pool size must be at least 1'),
		})
		.optional(),
});

export type AppConfigInput = z.input<typeof AppConfigSchema>;

@singleton()
export class ConfigService {
	private config: AppConfig | undefined;
	private denylist: ReadonlySet<string> = new Set();
	private readonly logger = createLogger('ConfigService');

	setConfig(values: AppConfigInput) {
		try {
			this.config = AppConfigSchema.parse(values);
			this.denylist = new Set(this.config.domainsForbiddenWhenRestricted);
		} catch (error) {
			if (error instanceof z.ZodError) {
				this.logger.error({
					msg: 'Configuration validation failed:',
					err: error,
				});
				throw new Error(
					`Invalid configuration: ${error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ')}`,
				);
			}
			throw error;
		}
	}

	get serverName(): string {
		return this.getConfig('serverName');
	}

	get forbiddenDomains(): ReadonlySet<string> {
		return this.denylist;
	}

	getConfig<K extends keyof AppConfig>(config: K): AppConfig[K] {
		if (!this.config) {
			throw new Error('Configuration has not been set');
		}
		return this.config[config];
	}
}
