import { EcpTimeoutError } from '../errors.js';
import { StateCache } from '../state-cache.js';
import type { DeviceState } from '../types.js';

const snapshot = (name: string): DeviceState => ({
	info: {
		serialNumber: 'SN0000000001',
		deviceId: null,
		vendorName: 'Acme',
		modelName: 'Streamer 4K',
		modelNumber: null,
		friendlyName: name,
		softwareVersion: null,
		isTv: false,
		powerMode: 'PowerOn',
	},
	power: 'on',
	activeApp: null,
	playback: { status: 'idle', positionMs: null, durationMs: null, isLive: false, pluginId: null },
	volume: null,
	muted: null,
	channel: null,
	fetchedAt: new Date('2024-01-01T00:00:00Z'),
});

describe('StateCache', () => {
	const timeout = new EcpTimeoutError('http://192.168.1.20:8060/query/device-info', 5000);

	it('starts empty', () => {
		expect(new StateCache().read()).toEqual({
			state: null,
			consecutiveFailures: 0,
			lastAttemptAt: null,
			lastSuccessAt: null,
			lastError: null,
		});
	});

	it('counts consecutive failures and resets on success', () => {
		const cache = new StateCache();
		for (let i = 0; i < 4; i += 1) {
			cache.applyFailure(timeout);
		}
		expect(cache.read().consecutiveFailures).toBe(4);
		expect(cache.read().lastError).toBe(timeout);

		const at = new Date('2024-01-01T00:01:00Z');
		cache.applySuccess(snapshot('Den'), at);

		expect(cache.read()).toMatchObject({
			consecutiveFailures: 0,
			lastError: null,
			lastAttemptAt: at,
			lastSuccessAt: at,
		});
	});

	it('keeps the last snapshot through failures', () => {
		const cache = new StateCache();
		const state = snapshot('Den');
		const okAt = new Date('2024-01-01T00:00:00Z');
		const failAt = new Date('2024-01-01T00:00:10Z');

		cache.applySuccess(state, okAt);
		cache.applyFailure(timeout, failAt);

		const view = cache.read();
		expect(view.state).toBe(state);
		expect(view.lastSuccessAt).toBe(okAt);
		expect(view.lastAttemptAt).toBe(failAt);
	});

	it('replaces the view instead of mutating it', () => {
		const cache = new StateCache();
		const before = cache.read();

		cache.applyFailure(timeout);

		expect(before.consecutiveFailures).toBe(0);
		expect(Object.isFrozen(cache.read())).toBe(true);
	});
});
