import path from 'node:path';

import { fromConfigFile, loadConfigFile } from './load-config';

describe('loadConfigFile', () => {
	it('maps the configuration file onto the application config', () => {
		const config = loadConfigFile(
			path.join(__dirname, '__fixtures__', 'config.json'),
		);

		expect(config).toEqual({
			serverName: 'test',
			domainsForbiddenWhenRestricted: ['forbidden_domain'],
			idServer: 'testis',
			identityLookupTimeout: undefined,
			database: {
				uri: 'mongodb://localhost:27017',
				name: 'room_access_test',
				poolSize: 10,
			},
		});
	});

	it('fails when the file does not exist', () => {
		const missing = path.join(__dirname, '__fixtures__', 'missing.json');

		expect(() => loadConfigFile(missing)).toThrow(
			`Config file not found: ${missing}`,
		);
	});
});

describe('fromConfigFile', () => {
	it('reads the optional lookup timeout', () => {
		const config = fromConfigFile({
			server_name: 'test',
			id_server: 'https://id.test',
			identity_lookup_timeout_ms: 250,
			database: { uri: 'mongodb://localhost', name: 'db', pool_size: 5 },
		});

		expect(config.identityLookupTimeout).toBe(250);
		expect(config.domainsForbiddenWhenRestricted).toBeUndefined();
		expect(config.database?.poolSize).toBe(5);
	});

	it('leaves the database out when the file has none', () => {
		const config = fromConfigFile({ server_name: 'test', id_server: 'id.test' });

		expect(config.database).toBeUndefined();
	});

	it('rejects files without an identity server', () => {
		expect(() =>
			fromConfigFile({
				server_name: 'test',
				database: { uri: 'mongodb://localhost', name: 'db' },
			}),
		).toThrow();
	});
});
