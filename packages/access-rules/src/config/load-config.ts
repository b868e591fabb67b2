import fs from 'node:fs';
import path from 'node:path';

import { z } from 'zod';

import type { AppConfigInput } from '../services/config.service';

// the options as they are written in the homeserver's configuration file
const configFileSchema = z.object({
	server_name: z.string(),
	domains_forbidden_when_restricted: z.array(z.string()).optional(),
	id_server: z.string(),
	identity_lookup_timeout_ms: z.number().optional(),
	database: z
		.object({
			uri: z.string(),
			name: z.string(),
			pool_size: z.number().default(10),
		})
		.optional(),
});

export type ConfigFile = z.input<typeof configFileSchema>;

export function fromConfigFile(raw: unknown): AppConfigInput {
	const file = configFileSchema.parse(raw);

	return {
		serverName: file.server_name,
		domainsForbiddenWhenRestricted: file.domains_forbidden_when_restricted,
		idServer: file.id_server,
		identityLookupTimeout: file.identity_lookup_timeout_ms,
		database: file.database && {
			uri: file.database.uri,
			name: file.database.name,
			poolSize: file.database.pool_size,
		},
	};
}

export function loadConfigFile(
	configPath = path.join(process.env.CONFIG_FOLDER || '.', 'config.json'),
): AppConfigInput {
	if (!fs.existsSync(configPath)) {
		throw new Error(`Config file not found: ${configPath}`);
	}

	const content: unknown = JSON.parse(fs.readFileSync(configPath, 'utf8'));

	return fromConfigFile(content);
}
