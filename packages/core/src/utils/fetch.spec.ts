import http from 'node:http';

import { fetch } from './fetch';

describe('fetch', () => {
	let server: http.Server;
	let baseUrl: string;

	beforeAll(async () => {
		server = http.createServer((req, res) => {
			if (req.url === '/json') {
				res.writeHead(200, { 'content-type': 'application/json' });
				res.end(JSON.stringify({ hs: 'example.org' }));
				return;
			}

			if (req.url === '/missing') {
				res.writeHead(404, { 'content-type': 'application/json' });
				res.end(JSON.stringify({ errcode: 'M_NOT_FOUND' }));
				return;
			}

			if (req.url === '/html') {
				res.writeHead(200, { 'content-type': 'text/html' });
				res.end('<p>hi</p>');
				return;
			}

			if (req.url === '/drip') {
				res.writeHead(200, { 'content-type': 'application/json' });
				const payload = JSON.stringify({ hs: 'example.org' });
				let sent = 0;
				const timer = setInterval(() => {
					if (sent === payload.length || res.destroyed) {
						clearInterval(timer);
						res.end();
						return;
					}
					res.write(payload[sent]);
					sent += 1;
				}, 20);
				return;
			}

			// /slow never answers
		});

		await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
		const address = server.address();
		if (!address || typeof address === 'string') {
			throw new Error('server is not listening on a TCP port');
		}
		baseUrl = `http://127.0.0.1:${address.port}`;
	});

	afterAll(async () => {
		server.closeAllConnections();
		await new Promise<void>((resolve) => server.close(() => resolve()));
	});

	it('parses a JSON body', async () => {
		const response = await fetch<{ hs: string }>(new URL(`${baseUrl}/json`), {
			timeout: 1000,
		});

		expect(response.ok).toBe(true);
		expect(response.status).toBe(200);
		expect(await response.json()).toEqual({ hs: 'example.org' });
	});

	it('reports non-2xx statuses as not ok', async () => {
		const response = await fetch(new URL(`${baseUrl}/missing`), {
			timeout: 1000,
		});

		expect(response.ok).toBe(false);
		expect(response.status).toBe(404);
		expect(await response.text()).toBe('{"errcode":"M_NOT_FOUND"}');
	});

	it('refuses to parse a body that is not JSON', async () => {
		const response = await fetch(new URL(`${baseUrl}/html`), {
			timeout: 1000,
		});

		await expect(response.json()).rejects.toThrow(
			'Content-Type is not application/json',
		);
	});

	it('rejects when the server does not answer in time', async () => {
		await expect(
			fetch(new URL(`${baseUrl}/slow`), { timeout: 50 }),
		).rejects.toThrow('Request timed out after 50ms');
	});

	it('bounds the whole exchange, not only idle periods', async () => {
		const startedAt = Date.now();
		const response = await fetch(new URL(`${baseUrl}/drip`), { timeout: 100 });

		await expect(response.json()).rejects.toThrow(
			'Request timed out after 100ms',
		);
		expect(Date.now() - startedAt).toBeLessThan(400);
	});

	it('releases a response whose body is discarded', async () => {
		const response = await fetch(new URL(`${baseUrl}/missing`), {
			timeout: 1000,
		});

		response.discard();

		expect(response.ok).toBe(false);
	});

	it('rejects on connection errors', async () => {
		await expect(
			fetch(new URL('http://127.0.0.1:1/unreachable'), { timeout: 1000 }),
		).rejects.toThrow();
	});
});
