// src/ecp/ecp-television-accessory.ts
import type { CharacteristicValue, PlatformAccessory, Service } from 'homebridge';

import type { CastStreamConfig } from './config.js';
import type { EcpAccessoryEnv, InputSourceEntry, MediaStateTag } from './ecp-accessory-helpers.js';
import {
	activeInputIdentifier,
	applyAccessoryInformation,
	buildInputSources,
	describeActivity,
	isCastingStream,
	mediaStateFor,
	remoteKeyToEcpKey,
} from './ecp-accessory-helpers.js';
import type { EcpDevice } from './ecp-device.js';
import { describeError } from './errors.js';
import type { InstalledApp } from './types.js';

const INPUT_SUBTYPE_PREFIX = 'input-';
const CAST_SUBTYPE_PREFIX = 'cast-';

export function configureEcpTelevisionAccessory(
	env: EcpAccessoryEnv,
	device: EcpDevice,
	accessory: PlatformAccessory,
	apps: readonly InstalledApp[],
	castStreams: readonly CastStreamConfig[],
): void {
	const { Service, Characteristic, Categories } = env.api.hap;
	const deviceName = device.identity.name;

	if (accessory.category !== Categories.TELEVISION) {
		accessory.category = Categories.TELEVISION;
	}

	applyAccessoryInformation(env.api, accessory, device);

	accessory.context.ecp = {
		host: device.identity.host,
		port: device.identity.port,
		serialNumber: device.identity.serialNumber,
	};

	// Wrap a characteristic write so device failures surface to HomeKit as
	// "not responding" instead of an unhandled rejection.
	const guarded = (label: string, action: (value: CharacteristicValue) => Promise<void>) =>
		async (value: CharacteristicValue): Promise<void> => {
			try {
				await action(value);
			} catch (err) {
				env.log.warn('ECP: %s failed for %s: %s', label, deviceName, describeError(err));
				throw new env.api.hap.HapStatusError(env.api.hap.HAPStatus.SERVICE_COMMUNICATION_FAILURE);
			}
		};

	const television =
		accessory.getService(Service.Television) ||
		accessory.addService(Service.Television, deviceName);

	television.setCharacteristic(Characteristic.ConfiguredName, deviceName);
	television.setCharacteristic(
		Characteristic.SleepDiscoveryMode,
		Characteristic.SleepDiscoveryMode.ALWAYS_DISCOVERABLE,
	);

	const isActive = (): number =>
		device.currentState().state?.power === 'on'
			? Characteristic.Active.ACTIVE
			: Characteristic.Active.INACTIVE;

	const toCurrentMediaState = (tag: MediaStateTag): number => {
		switch (tag) {
		case 'play':
			return Characteristic.CurrentMediaState.PLAY;
		case 'pause':
			return Characteristic.CurrentMediaState.PAUSE;
		case 'loading':
			return Characteristic.CurrentMediaState.LOADING;
		default:
			return Characteristic.CurrentMediaState.STOP;
		}
	};

	// ----- Power -----
	television
		.getCharacteristic(Characteristic.Active)
		.onGet(isActive)
		.onSet(guarded('Active.set', async (value) => {
			const on = value === Characteristic.Active.ACTIVE || value === true;
			env.log.info('ECP: Active.set -> %s for %s', on ? 'ON' : 'OFF', deviceName);
			await device.dispatch({ type: 'power', on });
		}));

	// ----- Inputs -----
	const sources = buildInputSources(apps);
	syncInputSources(env, accessory, television, sources);

	television
		.getCharacteristic(Characteristic.ActiveIdentifier)
		.onGet(() => activeInputIdentifier(sources, device.currentState().state))
		.onSet(guarded('ActiveIdentifier.set', async (value) => {
			const source = sources.find((candidate) => candidate.identifier === value);
			if (!source) {
				env.log.debug('ECP: ActiveIdentifier.set with unknown identifier %s', String(value));
				return;
			}
			env.log.info('ECP: switching %s to %s', deviceName, source.name);
			await device.dispatch(
				source.appId === null
					? { type: 'select-source', source: source.name }
					: { type: 'launch', appId: source.appId },
			);
		}));

	// ----- Remote -----
	television
		.getCharacteristic(Characteristic.RemoteKey)
		.onSet(guarded('RemoteKey.set', async (value) => {
			const key = typeof value === 'number' ? remoteKeyToEcpKey(value) : null;
			if (!key) {
				env.log.debug('ECP: unmapped remote key %s for %s', String(value), deviceName);
				return;
			}
			if (key === 'play') {
				await device.dispatch({ type: 'media', action: 'play-pause' });
				return;
			}
			await device.dispatch({ type: 'keypress', key });
		}));

	television
		.getCharacteristic(Characteristic.PowerModeSelection)
		.onSet(guarded('PowerModeSelection.set', async () => {
			await device.dispatch({ type: 'keypress', key: 'info' });
		}));

	// ----- Media state -----
	television
		.getCharacteristic(Characteristic.CurrentMediaState)
		.onGet(() => toCurrentMediaState(mediaStateFor(device.currentState().state)));

	television
		.getCharacteristic(Characteristic.TargetMediaState)
		.onGet(() =>
			mediaStateFor(device.currentState().state) === 'pause'
				? Characteristic.TargetMediaState.PAUSE
				: Characteristic.TargetMediaState.PLAY,
		)
		.onSet(guarded('TargetMediaState.set', async (value) => {
			const action = value === Characteristic.TargetMediaState.PLAY ? 'play' : 'pause';
			await device.dispatch({ type: 'media', action });
		}));

	// ----- Speaker -----
	const speaker =
		accessory.getService(Service.TelevisionSpeaker) ||
		accessory.addService(Service.TelevisionSpeaker, `${deviceName} Speaker`);

	speaker.setCharacteristic(Characteristic.VolumeControlType, Characteristic.VolumeControlType.RELATIVE);

	speaker
		.getCharacteristic(Characteristic.Mute)
		.onGet(() => device.currentState().state?.muted ?? false)
		.onSet(guarded('Mute.set', async () => {
			await device.dispatch({ type: 'keypress', key: 'volume_mute' });
		}));

	speaker
		.getCharacteristic(Characteristic.VolumeSelector)
		.onSet(guarded('VolumeSelector.set', async (value) => {
			const key = value === Characteristic.VolumeSelector.INCREMENT ? 'volume_up' : 'volume_down';
			await device.dispatch({ type: 'keypress', key });
		}));

	television.addLinkedService(speaker);

	// ----- Cast switches -----
	const castSwitches = syncCastSwitches(env, accessory, castStreams);
	castSwitches.forEach(({ service, stream }) => {
		service
			.getCharacteristic(Characteristic.On)
			.onGet(() => isCastingStream(device.castSession(), stream.url))
			.onSet(guarded(`Cast "${stream.name}"`, async (value) => {
				if (value === true || value === 1) {
					await device.startCast(stream.url, stream.format);
					return;
				}
				if (isCastingStream(device.castSession(), stream.url)) {
					await device.stopCast();
				}
			}));
	});

	// ----- Push updates -----
	device.onStateChange((view) => {
		const state = view.state;
		television.updateCharacteristic(Characteristic.Active, isActive());
		television.updateCharacteristic(Characteristic.ActiveIdentifier, activeInputIdentifier(sources, state));
		television.updateCharacteristic(Characteristic.CurrentMediaState, toCurrentMediaState(mediaStateFor(state)));

		env.log.debug(
			'ECP: %s is %s (app=%s)',
			deviceName,
			describeActivity(state) ?? 'unknown',
			state?.activeApp?.name ?? 'none',
		);
	});

	device.onCastChange((session) => {
		for (const { service, stream } of castSwitches) {
			service.updateCharacteristic(Characteristic.On, isCastingStream(session, stream.url));
		}
	});
}

function syncInputSources(
	env: EcpAccessoryEnv,
	accessory: PlatformAccessory,
	television: Service,
	sources: readonly InputSourceEntry[],
): void {
	const { Service, Characteristic } = env.api.hap;
	const wanted = new Set(sources.map((source) => `${INPUT_SUBTYPE_PREFIX}${source.identifier}`));

	for (const existing of accessory.services.filter((service) => service.UUID === Service.InputSource.UUID)) {
		if (!existing.subtype || !wanted.has(existing.subtype)) {
			accessory.removeService(existing);
		}
	}

	for (const source of sources) {
		const subtype = `${INPUT_SUBTYPE_PREFIX}${source.identifier}`;
		const input =
			accessory.getServiceById(Service.InputSource, subtype) ||
			accessory.addService(Service.InputSource, source.name, subtype);

		input
			.setCharacteristic(Characteristic.Identifier, source.identifier)
			.setCharacteristic(Characteristic.ConfiguredName, source.name)
			.setCharacteristic(Characteristic.IsConfigured, Characteristic.IsConfigured.CONFIGURED)
			.setCharacteristic(
				Characteristic.InputSourceType,
				source.appId === null
					? Characteristic.InputSourceType.HOME_SCREEN
					: Characteristic.InputSourceType.APPLICATION,
			)
			.setCharacteristic(Characteristic.CurrentVisibilityState, Characteristic.CurrentVisibilityState.SHOWN);

		television.addLinkedService(input);
	}
}

function syncCastSwitches(
	env: EcpAccessoryEnv,
	accessory: PlatformAccessory,
	castStreams: readonly CastStreamConfig[],
): Array<{ service: Service; stream: CastStreamConfig }> {
	const { Service } = env.api.hap;
	const wanted = new Set(castStreams.map((_stream, index) => `${CAST_SUBTYPE_PREFIX}${index}`));

	for (const existing of accessory.services.filter((service) => service.UUID === Service.Switch.UUID)) {
		if (!existing.subtype || !wanted.has(existing.subtype)) {
			env.log.info('ECP: removing stale cast switch %s', existing.displayName);
			accessory.removeService(existing);
		}
	}

	return castStreams.map((stream, index) => {
		const subtype = `${CAST_SUBTYPE_PREFIX}${index}`;
		const service =
			accessory.getServiceById(Service.Switch, subtype) ||
			accessory.addService(Service.Switch, stream.name, subtype);
		return { service, stream };
	});
}
