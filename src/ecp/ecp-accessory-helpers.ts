// src/ecp/ecp-accessory-helpers.ts
import type { API, Logger, PlatformAccessory } from 'homebridge';

import { HOME_SOURCE_NAME } from './constants.js';
import type { EcpDevice } from './ecp-device.js';
import type { CastSession, DeviceState, InstalledApp } from './types.js';

// Minimal runtime "env" that accessory modules need from the platform
export interface EcpAccessoryEnv {
	log: Logger;
	api: API;
}

// HomeKit caps a single accessory's service count; leave room for the TV,
// speaker, info and cast switches.
export const MAX_INPUT_SOURCES = 40;

export type DeviceActivity = 'standby' | 'idle' | 'home' | 'playing' | 'paused' | 'on';

/**
 * Coarse activity of the device, the way a media-player UI would label it.
 * null means there is not enough information (nothing fetched yet, or no
 * foreground app reported).
 */
export function describeActivity(state: DeviceState | null): DeviceActivity | null {
	if (!state) {
		return null;
	}
	if (state.power !== 'on') {
		return 'standby';
	}

	const app = state.activeApp;
	if (!app) {
		return null;
	}
	if (app.screensaver || app.name === 'Power Saver') {
		return 'idle';
	}
	if (app.id === null) {
		return 'home';
	}

	switch (state.playback.status) {
	case 'paused':
		return 'paused';
	case 'playing':
	case 'loading':
		return 'playing';
	default:
		return 'on';
	}
}

export type MediaStateTag = 'play' | 'pause' | 'stop' | 'loading';

export function mediaStateFor(state: DeviceState | null): MediaStateTag {
	switch (state?.playback.status) {
	case 'playing':
		return 'play';
	case 'paused':
		return 'pause';
	case 'loading':
		return 'loading';
	default:
		return 'stop';
	}
}

// Values of HomeKit's RemoteKey characteristic.
export const HAP_REMOTE_KEY = {
	REWIND: 0,
	FAST_FORWARD: 1,
	NEXT_TRACK: 2,
	PREVIOUS_TRACK: 3,
	ARROW_UP: 4,
	ARROW_DOWN: 5,
	ARROW_LEFT: 6,
	ARROW_RIGHT: 7,
	SELECT: 8,
	BACK: 9,
	EXIT: 10,
	PLAY_PAUSE: 11,
	INFORMATION: 15,
} as const;

const REMOTE_KEY_TO_ECP: ReadonlyMap<number, string> = new Map([
	[HAP_REMOTE_KEY.REWIND, 'reverse'],
	[HAP_REMOTE_KEY.FAST_FORWARD, 'forward'],
	[HAP_REMOTE_KEY.NEXT_TRACK, 'forward'],
	[HAP_REMOTE_KEY.PREVIOUS_TRACK, 'reverse'],
	[HAP_REMOTE_KEY.ARROW_UP, 'up'],
	[HAP_REMOTE_KEY.ARROW_DOWN, 'down'],
	[HAP_REMOTE_KEY.ARROW_LEFT, 'left'],
	[HAP_REMOTE_KEY.ARROW_RIGHT, 'right'],
	[HAP_REMOTE_KEY.SELECT, 'select'],
	[HAP_REMOTE_KEY.BACK, 'back'],
	[HAP_REMOTE_KEY.EXIT, 'home'],
	[HAP_REMOTE_KEY.PLAY_PAUSE, 'play'],
	[HAP_REMOTE_KEY.INFORMATION, 'info'],
]);

export function remoteKeyToEcpKey(remoteKey: number): string | null {
	return REMOTE_KEY_TO_ECP.get(remoteKey) ?? null;
}

export interface InputSourceEntry {
	identifier: number;
	name: string;
	// null for the home screen
	appId: string | null;
}

/**
 * Home first (identifier 1), then installed apps in device order. Identifiers
 * are 1-based because HomeKit treats 0 as "no input".
 */
export function buildInputSources(apps: readonly InstalledApp[]): InputSourceEntry[] {
	const sources: InputSourceEntry[] = [{ identifier: 1, name: HOME_SOURCE_NAME, appId: null }];
	for (const app of apps.slice(0, MAX_INPUT_SOURCES - 1)) {
		sources.push({ identifier: sources.length + 1, name: app.name, appId: app.id });
	}
	return sources;
}

export function activeInputIdentifier(
	sources: readonly InputSourceEntry[],
	state: DeviceState | null,
): number {
	const app = state?.activeApp;
	if (!app) {
		return 0;
	}
	const match = app.id === null
		? sources.find((source) => source.appId === null)
		: sources.find((source) => source.appId === app.id);
	return match?.identifier ?? 0;
}

export function isCastingStream(session: CastSession | null, streamUrl: string): boolean {
	return session !== null &&
		session.streamUrl === streamUrl &&
		(session.status === 'starting' || session.status === 'active');
}

/**
 * Populate the standard Accessory Information service from what the device
 * reported about itself.
 */
export function applyAccessoryInformation(
	api: API,
	accessory: PlatformAccessory,
	device: EcpDevice,
): void {
	const infoService = accessory.getService(api.hap.Service.AccessoryInformation);
	if (!infoService) {
		return;
	}

	const Characteristic = api.hap.Characteristic;
	const { identity } = device;
	const info = device.currentState().state?.info;

	infoService.updateCharacteristic(Characteristic.Name, identity.name);
	infoService.updateCharacteristic(Characteristic.Manufacturer, info?.vendorName ?? 'Unknown');
	infoService.updateCharacteristic(Characteristic.Model, identity.model);
	infoService.updateCharacteristic(Characteristic.SerialNumber, identity.serialNumber);

	if (info?.softwareVersion) {
		infoService.updateCharacteristic(Characteristic.FirmwareRevision, info.softwareVersion);
		infoService.updateCharacteristic(Characteristic.SoftwareRevision, info.softwareVersion);
	}
}
