// src/platform.ts
import type {
	API,
	DynamicPlatformPlugin,
	Logger,
	PlatformAccessory,
	PlatformConfig,
} from 'homebridge';

import { PLATFORM_NAME, PLUGIN_NAME } from './settings.js';
import { resolvePlatformConfig } from './ecp/config.js';
import type { EcpDeviceConfig, EcpPlatformSettings } from './ecp/config.js';
import type { EcpAccessoryEnv } from './ecp/ecp-accessory-helpers.js';
import { openDevice } from './ecp/ecp-device.js';
import type { EcpDevice } from './ecp/ecp-device.js';
import { configureEcpTelevisionAccessory } from './ecp/ecp-television-accessory.js';
import { describeError } from './ecp/errors.js';
import type { EcpLogger } from './ecp/logger.js';
import type { InstalledApp } from './ecp/types.js';

const toEcpLogger = (log: Logger): EcpLogger => ({
	debug: log.debug.bind(log),
	info: log.info.bind(log),
	warn: log.warn.bind(log),
	error: log.error.bind(log),
});

export class EcpPlayerPlatform implements DynamicPlatformPlugin {
	public readonly accessories: PlatformAccessory[] = [];
	public configureAccessory(accessory: PlatformAccessory): void {
		this.log.info('Restoring cached accessory', accessory.displayName);
		this.accessories.push(accessory);
	}
	private readonly log: Logger;
	private readonly api: API;
	private readonly ecpLog: EcpLogger;
	private readonly settings: EcpPlatformSettings;
	private readonly accessoryEnv: EcpAccessoryEnv;

	private readonly devices = new Map<string, EcpDevice>();
	private readonly connectTimers = new Map<string, NodeJS.Timeout>();
	private readonly connectAttempts = new Map<string, number>();
	private shuttingDown = false;

	constructor(log: Logger, config: PlatformConfig, api: API) {
		this.log = log;
		this.api = api;
		this.ecpLog = toEcpLogger(log);
		this.settings = resolvePlatformConfig(config, PLATFORM_NAME, this.ecpLog);
		this.accessoryEnv = {
			log: this.log,
			api: this.api,
		};

		this.log.info(this.settings.name, 'initialized');

		this.api.on('didFinishLaunching', () => {
			this.log.info(PLATFORM_NAME, 'didFinishLaunching');
			if (this.settings.devices.length === 0) {
				this.log.warn('ECP: no devices configured; add at least one "host" under "devices".');
				return;
			}
			for (const deviceConfig of this.settings.devices) {
				void this.connectDevice(deviceConfig);
			}
		});

		this.api.on('shutdown', () => {
			this.shuttingDown = true;
			for (const timer of this.connectTimers.values()) {
				clearTimeout(timer);
			}
			this.connectTimers.clear();
			for (const device of this.devices.values()) {
				device.shutdown();
			}
		});
	}

	private deviceKey(config: EcpDeviceConfig): string {
		return `${config.host}:${config.port}`;
	}

	/**
	 * Identify the device, start its coordinator and expose it as a
	 * Television accessory. A device that is unreachable at startup is tried
	 * again later, backing off the same way the coordinator does.
	 */
	private async connectDevice(config: EcpDeviceConfig): Promise<void> {
		const key = this.deviceKey(config);
		this.connectTimers.delete(key);

		let device: EcpDevice;
		try {
			device = await openDevice(
				{
					host: config.host,
					port: config.port,
					name: config.name,
					requestTimeoutMs: config.requestTimeoutMs,
					pollIntervalMs: config.pollIntervalMs,
					backoffFactor: config.backoffFactor,
					maxPollIntervalMs: config.maxPollIntervalMs,
					receiverAppId: config.receiverAppId,
				},
				this.ecpLog,
			);
		} catch (err) {
			this.scheduleReconnect(config, err);
			return;
		}

		if (this.shuttingDown) {
			return;
		}

		this.connectAttempts.delete(key);
		this.devices.set(key, device);

		const first = await device.start();
		if (!first.ok) {
			this.log.warn(
				'ECP: first refresh of %s failed: %s',
				device.identity.name,
				first.error.message,
			);
		}

		let apps: InstalledApp[] = [];
		try {
			apps = await device.listApps();
		} catch (err) {
			this.log.warn(
				'ECP: could not list apps on %s; inputs limited to Home: %s',
				device.identity.name,
				describeError(err),
			);
		}

		this.registerTelevision(device, config, apps);
	}

	private scheduleReconnect(config: EcpDeviceConfig, err: unknown): void {
		if (this.shuttingDown) {
			return;
		}

		const key = this.deviceKey(config);
		const attempt = (this.connectAttempts.get(key) ?? 0) + 1;
		this.connectAttempts.set(key, attempt);

		const delay = Math.min(
			config.pollIntervalMs * config.backoffFactor ** (attempt - 1),
			config.maxPollIntervalMs,
		);

		const message = 'ECP: cannot reach %s (%s); retrying in %d s';
		const args = [key, describeError(err), Math.round(delay / 1000)];
		if (attempt === 1) {
			this.log.warn(message, ...args);
		} else {
			this.log.debug(message, ...args);
		}

		const timer = setTimeout(() => {
			void this.connectDevice(config);
		}, delay);
		this.connectTimers.set(key, timer);
	}

	private registerTelevision(device: EcpDevice, config: EcpDeviceConfig, apps: readonly InstalledApp[]): void {
		const deviceName = device.identity.name;
		const uuidSeed = `ecp-${device.identity.serialNumber}`;
		const uuid = this.api.hap.uuid.generate(uuidSeed);

		let accessory = this.accessories.find(acc => acc.UUID === uuid);

		if (accessory) {
			this.log.info('ECP: using cached accessory for %s (%s)', deviceName, uuidSeed);
		} else {
			this.log.info('ECP: registering new accessory for %s (%s)', deviceName, uuidSeed);

			accessory = new this.api.platformAccessory(
				deviceName,
				uuid,
				this.api.hap.Categories.TELEVISION,
			);

			this.api.registerPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);

			this.accessories.push(accessory);
		}

		this.log.info(
			'ECP: configuring %s as Television (%d apps, %d cast streams)',
			deviceName,
			apps.length,
			config.castStreams.length,
		);

		configureEcpTelevisionAccessory(this.accessoryEnv, device, accessory, apps, config.castStreams);
	}
}
