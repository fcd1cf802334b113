// src/ecp/ecp-device.ts
// One controllable device: protocol client, state cache, coordinator,
// dispatcher and cast manager wired together. Devices share nothing, so any
// number of them can run side by side.

import { CastSessionManager } from './cast-session-manager.js';
import { CommandDispatcher } from './command-dispatcher.js';
import { ENDPOINTS } from './constants.js';
import { DeviceCoordinator } from './device-coordinator.js';
import { EcpClient } from './ecp-client.js';
import type { FetchLike } from './ecp-client.js';
import type { EcpLogger } from './logger.js';
import { consoleLogger } from './logger.js';
import { StateCache } from './state-cache.js';
import type {
	CastSession,
	DeviceIdentity,
	DeviceIntent,
	InstalledApp,
	RefreshResult,
	StateCacheView,
} from './types.js';
import { parseDeviceInfo } from './xml.js';

export interface EcpDeviceSettings {
	host: string;
	port?: number;
	requestTimeoutMs?: number;
	pollIntervalMs?: number;
	backoffFactor?: number;
	maxPollIntervalMs?: number;
	receiverAppId?: string;
	// Overrides the name the device reports about itself.
	name?: string;
	fetch?: FetchLike;
}

export class EcpDevice {
	public readonly identity: DeviceIdentity;

	private readonly client: EcpClient;
	private readonly coordinator: DeviceCoordinator;
	private readonly dispatcher: CommandDispatcher;
	private readonly cast: CastSessionManager;

	constructor(
		identity: DeviceIdentity,
		client: EcpClient,
		settings: EcpDeviceSettings,
		logger: EcpLogger,
	) {
		this.identity = identity;
		this.client = client;
		this.coordinator = new DeviceCoordinator(client, new StateCache(), {
			pollIntervalMs: settings.pollIntervalMs,
			backoffFactor: settings.backoffFactor,
			maxPollIntervalMs: settings.maxPollIntervalMs,
			logger,
		});
		this.dispatcher = new CommandDispatcher(client, this.coordinator, logger);
		this.cast = new CastSessionManager(this.dispatcher, this.coordinator, identity, {
			receiverAppId: settings.receiverAppId,
			logger,
		});
	}

	public start(): Promise<RefreshResult> {
		return this.coordinator.start();
	}

	public shutdown(): void {
		this.coordinator.stop();
		this.cast.dispose();
	}

	public currentState(): StateCacheView {
		return this.coordinator.currentState();
	}

	public forceRefresh(): Promise<RefreshResult> {
		return this.coordinator.forceRefresh();
	}

	public dispatch(intent: DeviceIntent): Promise<void> {
		return this.dispatcher.dispatch(intent);
	}

	public listApps(): Promise<InstalledApp[]> {
		return this.dispatcher.listApps();
	}

	public startCast(streamUrl: string, format?: string): Promise<CastSession> {
		return this.cast.start(streamUrl, format);
	}

	public stopCast(): Promise<CastSession | null> {
		return this.cast.stop();
	}

	public castSession(): CastSession | null {
		return this.cast.current();
	}

	public onStateChange(listener: (view: StateCacheView) => void): () => void {
		return this.coordinator.onRefresh(() => listener(this.coordinator.currentState()));
	}

	public onCastChange(listener: (session: CastSession) => void): () => void {
		return this.cast.onChange(listener);
	}

	public iconUrl(appId: string): string {
		return this.client.iconUrl(appId);
	}
}

/**
 * Ask the device who it is, then build an EcpDevice around that identity.
 * The coordinator is not started; call start() when ready to poll.
 */
export async function openDevice(settings: EcpDeviceSettings, logger?: EcpLogger): Promise<EcpDevice> {
	const log = logger ?? consoleLogger('ecp-device');
	const client = new EcpClient({
		host: settings.host,
		port: settings.port,
		requestTimeoutMs: settings.requestTimeoutMs,
		fetch: settings.fetch,
		logger: log,
	});

	const info = parseDeviceInfo(await client.fetch(ENDPOINTS.deviceInfo));
	const identity: DeviceIdentity = Object.freeze({
		host: client.host,
		port: client.port,
		serialNumber: info.serialNumber,
		model: info.modelNumber ? `${info.modelName} (${info.modelNumber})` : info.modelName,
		name: settings.name?.trim() || info.friendlyName,
	});

	log.info(
		'Connected to %s at %s:%d (serial=%s)',
		identity.name,
		identity.host,
		identity.port,
		identity.serialNumber,
	);

	return new EcpDevice(identity, client, settings, log);
}
