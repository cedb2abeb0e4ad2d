/**
 * HTTP Client Interface
 * =====================
 *
 * Abstraction layer over fetch() so the inverter client and the uptime
 * heartbeat can be tested without stubbing global fetch.
 */

export interface HttpResponse {
	ok: boolean;
	status: number;
	statusText: string;
	text(): Promise<string>;
}

export interface HttpRequestOptions {
	headers?: Record<string, string>;
	/** Request timeout in milliseconds */
	timeout?: number;
}

export interface HttpClient {
	get(url: string, options?: HttpRequestOptions): Promise<HttpResponse>;
}

export interface HttpClientOptions {
	/** Default headers to include in all requests */
	defaultHeaders?: Record<string, string>;
	/** Default timeout for all requests in milliseconds */
	defaultTimeout?: number;
}

/**
 * Default implementation using native fetch
 */
export class FetchHttpClient implements HttpClient {
	private defaultHeaders: Record<string, string>;
	private defaultTimeout?: number;

	constructor(options?: HttpClientOptions) {
		this.defaultHeaders = options?.defaultHeaders || {};
		this.defaultTimeout = options?.defaultTimeout;
	}

	async get(url: string, options?: HttpRequestOptions): Promise<HttpResponse> {
		const timeout = options?.timeout ?? this.defaultTimeout;
		const response = await fetch(url, {
			method: 'GET',
			headers: { ...this.defaultHeaders, ...options?.headers },
			signal: timeout ? AbortSignal.timeout(timeout) : undefined,
		});

		return {
			ok: response.ok,
			status: response.status,
			statusText: response.statusText,
			text: () => response.text(),
		};
	}
}

export function basicAuthHeader(username: string, password: string): string {
	return `Basic ${Buffer.from(`${username}:${password}`, 'utf8').toString('base64')}`;
}
