// src/ecp/ecp-client.ts
// Stateless request/response wrapper over the device's control API.
//
// Every call is a single round-trip with a fixed timeout. Nothing is retried
// here; the coordinator decides when to try again.

import {
	EcpHttpStatusError,
	EcpTimeoutError,
	EcpUnreachableError,
	isEcpError,
} from './errors.js';
import type { EcpLogger } from './logger.js';
import { consoleLogger } from './logger.js';
import { DEFAULT_ECP_PORT } from './types.js';
import { parseXmlDocument } from './xml.js';
import type { XmlObject } from './xml.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type HttpMethod = 'GET' | 'POST';

export interface EcpClientOptions {
	host: string;
	port?: number;
	requestTimeoutMs?: number;
	// Injected in tests; defaults to the global fetch.
	fetch?: FetchLike;
	logger?: EcpLogger;
}

export const DEFAULT_REQUEST_TIMEOUT_MS = 5_000;

function isAbortLike(err: unknown): boolean {
	return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

export class EcpClient {
	public readonly host: string;
	public readonly port: number;
	public readonly requestTimeoutMs: number;

	private readonly fetchImpl: FetchLike;
	private readonly log: EcpLogger;

	constructor(options: EcpClientOptions) {
		this.host = options.host;
		this.port = options.port ?? DEFAULT_ECP_PORT;
		this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
		this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
		this.log = options.logger ?? consoleLogger('ecp-client');
	}

	public get baseUrl(): string {
		return `http://${this.host}:${this.port}`;
	}

	public urlFor(path: string): string {
		return `${this.baseUrl}/${path.replace(/^\/+/, '')}`;
	}

	public iconUrl(appId: string): string {
		return this.urlFor(`query/icon/${encodeURIComponent(appId)}`);
	}

	/**
	 * GET a query endpoint and parse the XML body.
	 */
	public async fetch(path: string): Promise<XmlObject> {
		const url = this.urlFor(path);
		const body = await this.request(url, 'GET');
		return parseXmlDocument(body, url);
	}

	/**
	 * Fire a control action. The device acknowledges with an empty 200, so the
	 * body is read (to release the connection) and discarded.
	 */
	public async command(path: string, method: HttpMethod = 'POST'): Promise<void> {
		const url = this.urlFor(path);
		await this.request(url, method);
	}

	private async request(url: string, method: HttpMethod): Promise<string> {
		this.log.debug('%s %s', method, url);

		try {
			const res = await this.fetchImpl(url, {
				method,
				signal: AbortSignal.timeout(this.requestTimeoutMs),
			});

			if (!res.ok) {
				// Drain so the socket can be reused; the text itself is not interesting.
				await res.text().catch(() => '');
				throw new EcpHttpStatusError(url, res.status);
			}

			return await res.text();
		} catch (err) {
			if (isEcpError(err)) {
				throw err;
			}
			if (isAbortLike(err)) {
				throw new EcpTimeoutError(url, this.requestTimeoutMs);
			}
			throw new EcpUnreachableError(url, err);
		}
	}
}
