// src/ecp/errors.ts

export type EcpErrorKind =
	| 'unreachable'
	| 'timeout'
	| 'http-status'
	| 'malformed-response'
	| 'invalid-content-reference'
	| 'session-conflict'
	| 'unknown-source';

/**
 * Base class for every failure the control layer reports. `kind` lets callers
 * switch on the failure without a chain of instanceof checks.
 */
export abstract class EcpError extends Error {
	public abstract readonly kind: EcpErrorKind;

	protected constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

// Connection refused, no route, DNS failure.
export class EcpUnreachableError extends EcpError {
	public readonly kind = 'unreachable';

	public constructor(
		public readonly url: string,
		cause?: unknown,
	) {
		super(`Device unreachable at ${url}`, { cause });
	}
}

export class EcpTimeoutError extends EcpError {
	public readonly kind = 'timeout';

	public constructor(
		public readonly url: string,
		public readonly timeoutMs: number,
	) {
		super(`Request to ${url} timed out after ${timeoutMs} ms`);
	}
}

export class EcpHttpStatusError extends EcpError {
	public readonly kind = 'http-status';

	public constructor(
		public readonly url: string,
		public readonly status: number,
	) {
		super(`Device answered ${url} with HTTP ${status}`);
	}
}

export class EcpMalformedResponseError extends EcpError {
	public readonly kind = 'malformed-response';

	public constructor(message: string, cause?: unknown) {
		super(message, { cause });
	}
}

export class InvalidContentReferenceError extends EcpError {
	public readonly kind = 'invalid-content-reference';

	public constructor(
		public readonly input: string,
		reason: string,
	) {
		super(`Invalid content reference "${input}": ${reason}`);
	}
}

export class SessionConflictError extends EcpError {
	public readonly kind = 'session-conflict';

	public constructor(
		public readonly activeSessionId: string,
		public readonly activeStatus: string,
	) {
		super(`A cast session is already ${activeStatus} (id=${activeSessionId})`);
	}
}

export class UnknownSourceError extends EcpError {
	public readonly kind = 'unknown-source';

	public constructor(public readonly source: string) {
		super(`No installed application matches source "${source}"`);
	}
}

export function isEcpError(value: unknown): value is EcpError {
	return value instanceof EcpError;
}

/**
 * Failures that mean the device could not be talked to at all, as opposed to
 * a device that answered with something unexpected.
 */
export function isTransportFailure(err: EcpError): boolean {
	return err.kind === 'unreachable' || err.kind === 'timeout';
}

export function describeError(err: unknown): string {
	if (err instanceof Error) {
		return err.message;
	}
	return String(err);
}
