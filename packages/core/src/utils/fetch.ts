import http, { type IncomingHttpHeaders, type IncomingMessage } from 'node:http';
import https from 'node:https';

const MAX_RESPONSE_BYTES = 1024 * 1024; // 1 MB

export type FetchOptions = {
	method?: 'GET' | 'POST';
	headers?: Record<string, string>;
	body?: string;
	// deadline in milliseconds for the whole exchange, body included
	timeout: number;
	signal?: AbortSignal;
};

export type FetchResponse<T> = {
	ok: boolean;
	status: number | undefined;
	headers: IncomingHttpHeaders;
	json: () => Promise<T>;
	text: () => Promise<string>;
	// drops an unread body so the socket is released
	discard: () => void;
};

async function handleJson<T>(
	contentType: string,
	body: () => Promise<Buffer>,
): Promise<T> {
	if (!contentType.includes('application/json')) {
		throw new Error('Content-Type is not application/json');
	}

	const buffer = await body();
	try {
		return JSON.parse(buffer.toString());
	} catch {
		throw new Error('Failed to parse JSON response');
	}
}

async function handleText(
	contentType: string,
	body: () => Promise<Buffer>,
): Promise<string> {
	if (!contentType.includes('text/') && !contentType.includes('json')) {
		return '';
	}

	return (await body()).toString();
}

/**
 * Small request helper over node:http and node:https. Every call runs under a
 * single deadline covering the connection, the headers and the body; when it
 * passes, both the request and the response are destroyed. Transport failures
 * reject the returned promise instead of resolving to a response.
 */
export async function fetch<T>(
	url: URL,
	options: FetchOptions,
): Promise<FetchResponse<T>> {
	const response: {
		statusCode: number | undefined;
		body: () => Promise<Buffer>;
		headers: IncomingHttpHeaders;
		discard: () => void;
	} = await new Promise((resolve, reject) => {
		let activeResponse: IncomingMessage | undefined;
		let failure: Error | undefined;

		const requestOptions: https.RequestOptions = {
			// for ipv6 remove square brackets as they come due to url standard
			host: url.hostname.replace(/^\[|\]$/g, ''),
			port: url.port,
			method: options.method ?? 'GET',
			path: url.pathname + url.search,
			headers: options.headers,
		};

		const onResponse = (res: IncomingMessage) => {
			const chunks: Buffer[] = [];

			activeResponse = res;

			res.once('error', (err) => {
				failure ??= err;
				reject(err);
			});
			res.once('close', () => clearTimeout(deadline));

			res.pause();

			let body: Promise<Buffer> | undefined;

			resolve({
				statusCode: res.statusCode,
				headers: res.headers,
				discard() {
					res.resume();
				},
				body() {
					if (!body) {
						body = new Promise<Buffer>((resBody, rejBody) => {
							if (failure) {
								rejBody(failure);
								return;
							}

							let total = 0;

							const onData = (chunk: Buffer) => {
								total += chunk.length;
								if (total > MAX_RESPONSE_BYTES) {
									const err = new Error('Response exceeds size limit');
									res.destroy(err);
									cleanup();
									rejBody(err);
									return;
								}
								chunks.push(chunk);
							};
							const onEnd = () => {
								cleanup();
								resBody(Buffer.concat(chunks));
							};
							const onErr = (err: Error) => {
								cleanup();
								rejBody(failure ?? err);
							};
							const onAborted = () => onErr(new Error('Response aborted'));
							const cleanup = () => {
								clearTimeout(deadline);
								res.off('data', onData);
								res.off('end', onEnd);
								res.off('error', onErr);
								res.off('aborted', onAborted);
							};
							res.on('data', onData);
							res.once('end', onEnd);
							res.once('error', onErr);
							res.once('aborted', onAborted);
							res.resume();
						});
					}

					return body;
				},
			});
		};

		const request =
			url.protocol === 'http:'
				? http.request(requestOptions, onResponse)
				: https.request(requestOptions, onResponse);

		const deadline = setTimeout(() => {
			failure = new Error(`Request timed out after ${options.timeout}ms`);
			activeResponse?.destroy(failure);
			request.destroy(failure);
		}, options.timeout);

		const signal = options.signal;
		if (signal) {
			const onAbort = () => request.destroy(new Error('Aborted'));
			signal.addEventListener('abort', onAbort, { once: true });
			request.once('close', () =>
				signal.removeEventListener('abort', onAbort),
			);
		}

		request.on('error', (err) => {
			clearTimeout(deadline);
			reject(err);
		});

		request.end(options.body);
	});

	const contentType = response.headers['content-type'] || '';

	return {
		ok: response.statusCode
			? response.statusCode >= 200 && response.statusCode < 300
			: false,
		json: () => handleJson<T>(contentType, response.body),
		text: () => handleText(contentType, response.body),
		discard: response.discard,
		status: response.statusCode,
		headers: response.headers,
	};
}
