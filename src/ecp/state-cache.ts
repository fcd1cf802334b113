// src/ecp/state-cache.ts
import type { EcpError } from './errors.js';
import type { DeviceState, StateCacheView } from './types.js';

/**
 * Last known device snapshot plus bookkeeping about how fresh it is.
 *
 * The whole view is swapped as one frozen object. A failure keeps the
 * previous snapshot (stale but available).
 */
export class StateCache {
	private view: StateCacheView = Object.freeze({
		state: null,
		consecutiveFailures: 0,
		lastAttemptAt: null,
		lastSuccessAt: null,
		lastError: null,
	});

	public read(): StateCacheView {
		return this.view;
	}

	public applySuccess(state: DeviceState, at: Date = new Date()): void {
		this.view = Object.freeze({
			state,
			consecutiveFailures: 0,
			lastAttemptAt: at,
			lastSuccessAt: at,
			lastError: null,
		});
	}

	public applyFailure(error: EcpError, at: Date = new Date()): void {
		const prev = this.view;
		this.view = Object.freeze({
			state: prev.state,
			consecutiveFailures: prev.consecutiveFailures + 1,
			lastAttemptAt: at,
			lastSuccessAt: prev.lastSuccessAt,
			lastError: error,
		});
	}
}
