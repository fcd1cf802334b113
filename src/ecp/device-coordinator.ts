// src/ecp/device-coordinator.ts
// Keeps the state cache reasonably fresh without hammering the device.
//
// One timer drives the periodic refresh. Callers can also ask for an
// out-of-band refresh; while a cycle is in flight every request joins it
// instead of starting another one.

import { ENDPOINTS, TV_TUNER_APP_ID } from './constants.js';
import type { EcpClient } from './ecp-client.js';
import {
	EcpMalformedResponseError,
	describeError,
	isEcpError,
	isTransportFailure,
} from './errors.js';
import type { EcpError } from './errors.js';
import type { EcpLogger } from './logger.js';
import { consoleLogger } from './logger.js';
import type { StateCache } from './state-cache.js';
import type { DeviceState, RefreshResult, StateCacheView, TvChannel } from './types.js';
import {
	parseActiveApp,
	parseDeviceInfo,
	parseMediaPlayer,
	parseTvChannel,
	powerStateFromMode,
} from './xml.js';

export interface CoordinatorOptions {
	pollIntervalMs?: number;
	backoffFactor?: number;
	maxPollIntervalMs?: number;
	logger?: EcpLogger;
}

export const DEFAULT_POLL_INTERVAL_MS = 10_000;
export const DEFAULT_BACKOFF_FACTOR = 2;
export const DEFAULT_MAX_POLL_INTERVAL_MS = 300_000;

export type RefreshListener = (state: DeviceState, cycle: number) => void;

export class DeviceCoordinator {
	public readonly pollIntervalMs: number;
	public readonly backoffFactor: number;
	public readonly maxPollIntervalMs: number;

	private readonly client: EcpClient;
	private readonly cache: StateCache;
	private readonly log: EcpLogger;
	private readonly listeners = new Set<RefreshListener>();

	private inFlight: Promise<RefreshResult> | null = null;
	private timer: NodeJS.Timeout | null = null;
	private running = false;
	private cycles = 0;
	// Grows only on transport failures.
	private backoffLevel = 0;

	constructor(client: EcpClient, cache: StateCache, options: CoordinatorOptions = {}) {
		this.client = client;
		this.cache = cache;
		this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
		this.backoffFactor = Math.max(1, options.backoffFactor ?? DEFAULT_BACKOFF_FACTOR);
		this.maxPollIntervalMs = Math.max(
			this.pollIntervalMs,
			options.maxPollIntervalMs ?? DEFAULT_MAX_POLL_INTERVAL_MS,
		);
		this.log = options.logger ?? consoleLogger('ecp-coordinator');
	}

	/**
	 * Run the first refresh and start the periodic schedule. Resolves with the
	 * first refresh's outcome; a failure does not stop the schedule.
	 */
	public async start(): Promise<RefreshResult> {
		this.running = true;
		const result = await this.refresh();
		this.scheduleNext();
		return result;
	}

	public stop(): void {
		this.running = false;
		if (this.timer) {
			clearTimeout(this.timer);
			this.timer = null;
		}
	}

	public get isRunning(): boolean {
		return this.running;
	}

	// Number of refresh cycles started so far; listeners receive the cycle's number.
	public get cycleCount(): number {
		return this.cycles;
	}

	public currentState(): StateCacheView {
		return this.cache.read();
	}

	/**
	 * Refresh now, joining the in-flight cycle if there is one. Never rejects;
	 * failures come back as { ok: false } and are recorded in the cache.
	 */
	public forceRefresh(): Promise<RefreshResult> {
		return this.refresh();
	}

	/**
	 * Delay before the next scheduled cycle:
	 * base * factor^level, capped at the configured ceiling.
	 */
	public nextDelayMs(): number {
		return this.delayForLevel(this.backoffLevel);
	}

	public onRefresh(listener: RefreshListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	private delayForLevel(level: number): number {
		return Math.min(this.pollIntervalMs * this.backoffFactor ** level, this.maxPollIntervalMs);
	}

	private refresh(): Promise<RefreshResult> {
		if (this.inFlight) {
			return this.inFlight;
		}

		this.cycles += 1;
		const cycle = this.cycles;
		const pending = this.runCycle(cycle).finally(() => {
			this.inFlight = null;
		});
		this.inFlight = pending;
		return pending;
	}

	private scheduleNext(): void {
		if (!this.running) {
			return;
		}
		if (this.timer) {
			clearTimeout(this.timer);
		}

		const delay = this.nextDelayMs();
		this.log.debug('Next refresh of %s in %d ms', this.client.host, delay);

		this.timer = setTimeout(() => {
			this.timer = null;
			void this.runScheduled();
		}, delay);
	}

	private async runScheduled(): Promise<void> {
		await this.refresh();
		this.scheduleNext();
	}

	private async runCycle(cycle: number): Promise<RefreshResult> {
		const previousFailures = this.cache.read().consecutiveFailures;

		try {
			const state = await this.fetchState();
			this.cache.applySuccess(state, state.fetchedAt);
			const wasBackedOff = this.backoffLevel > 0;
			this.backoffLevel = 0;
			if (wasBackedOff && this.timer) {
				// The armed timer still carries the backed-off delay.
				this.scheduleNext();
			}

			if (previousFailures > 0) {
				this.log.info(
					'Device %s reachable again after %d failed refresh(es)',
					this.client.host,
					previousFailures,
				);
			} else {
				this.log.debug(
					'Refreshed %s: power=%s app=%s playback=%s',
					this.client.host,
					state.power,
					state.activeApp?.name ?? 'none',
					state.playback.status,
				);
			}

			this.notify(state, cycle);
			return { ok: true, state };
		} catch (err) {
			const error = this.toEcpError(err);
			this.cache.applyFailure(error);
			this.recordFailure(error);
			return { ok: false, error, state: this.cache.read().state };
		}
	}

	private recordFailure(error: EcpError): void {
		const failures = this.cache.read().consecutiveFailures;

		if (isTransportFailure(error)) {
			if (this.delayForLevel(this.backoffLevel) < this.maxPollIntervalMs) {
				this.backoffLevel += 1;
			}
			const message = 'Refresh of %s failed (%s, %d in a row); next attempt in %d ms';
			const args = [this.client.host, error.message, failures, this.nextDelayMs()];
			if (failures === 1) {
				this.log.warn(message, ...args);
			} else {
				this.log.debug(message, ...args);
			}
			return;
		}

		this.log.warn(
			'Refresh of %s returned an unexpected response (%s); keeping the current schedule',
			this.client.host,
			error.message,
		);
	}

	private toEcpError(err: unknown): EcpError {
		if (isEcpError(err)) {
			return err;
		}
		this.log.error('Unexpected error while refreshing %s: %o', this.client.host, err);
		return new EcpMalformedResponseError(`Unexpected refresh failure: ${describeError(err)}`, err);
	}

	private notify(state: DeviceState, cycle: number): void {
		for (const listener of this.listeners) {
			try {
				listener(state, cycle);
			} catch (err) {
				this.log.error('Refresh listener threw: %s', describeError(err));
			}
		}
	}

	private async fetchState(): Promise<DeviceState> {
		const [infoDoc, activeAppDoc, playerDoc] = await Promise.all([
			this.client.fetch(ENDPOINTS.deviceInfo),
			this.client.fetch(ENDPOINTS.activeApp),
			this.client.fetch(ENDPOINTS.mediaPlayer),
		]);

		const info = Object.freeze(parseDeviceInfo(infoDoc));
		const activeApp = parseActiveApp(activeAppDoc);
		const playback = Object.freeze(parseMediaPlayer(playerDoc));

		let channel: TvChannel | null = null;
		if (info.isTv && activeApp?.id === TV_TUNER_APP_ID) {
			channel = parseTvChannel(await this.client.fetch(ENDPOINTS.tvActiveChannel));
		}

		return Object.freeze({
			info,
			power: powerStateFromMode(info.powerMode),
			activeApp: activeApp ? Object.freeze(activeApp) : null,
			playback,
			volume: null,
			muted: null,
			channel: channel ? Object.freeze(channel) : null,
			fetchedAt: new Date(),
		});
	}
}
