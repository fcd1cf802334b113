import type { DeviceActivity } from '../ecp-accessory-helpers.js';
import {
	HAP_REMOTE_KEY,
	MAX_INPUT_SOURCES,
	activeInputIdentifier,
	buildInputSources,
	describeActivity,
	isCastingStream,
	mediaStateFor,
	remoteKeyToEcpKey,
} from '../ecp-accessory-helpers.js';
import type {
	ActiveApp,
	CastSession,
	DeviceState,
	InstalledApp,
	PlaybackStatus,
	PowerState,
} from '../types.js';
import { TEST_IDENTITY } from '../../test/fake-device.js';

function state(
	power: PowerState,
	activeApp: ActiveApp | null,
	status: PlaybackStatus = 'idle',
): DeviceState {
	return {
		info: {
			serialNumber: 'SN0000000001',
			deviceId: null,
			vendorName: 'Acme',
			modelName: 'Streamer 4K',
			modelNumber: null,
			friendlyName: 'Living Room',
			softwareVersion: null,
			isTv: false,
			powerMode: null,
		},
		power,
		activeApp,
		playback: { status, positionMs: null, durationMs: null, isLive: false, pluginId: null },
		volume: null,
		muted: null,
		channel: null,
		fetchedAt: new Date('2024-01-01T00:00:00Z'),
	};
}

const home: ActiveApp = { id: null, name: 'Home', screensaver: false };
const netflix: ActiveApp = { id: '12', name: 'Netflix', screensaver: false };

const app = (id: string, name: string): InstalledApp => ({
	id,
	name,
	type: 'appl',
	version: '1.0.0',
	iconUrl: `http://192.168.1.20:8060/query/icon/${id}`,
});

describe('describeActivity', () => {
	const cases: Array<[string, DeviceState | null, DeviceActivity | null]> = [
		['nothing fetched', null, null],
		['standby', state('standby', netflix, 'playing'), 'standby'],
		['no app reported', state('on', null), null],
		['screensaver', state('on', { ...home, screensaver: true }), 'idle'],
		['power saver', state('on', { id: '562859', name: 'Power Saver', screensaver: false }), 'idle'],
		['home screen', state('on', home), 'home'],
		['paused', state('on', netflix, 'paused'), 'paused'],
		['loading', state('on', netflix, 'loading'), 'playing'],
		['app open, nothing playing', state('on', netflix), 'on'],
	];

	it.each(cases)('%s', (_label, input, expected) => {
		expect(describeActivity(input)).toBe(expected);
	});
});

describe('mediaStateFor', () => {
	it('maps playback status to a media state', () => {
		expect(mediaStateFor(state('on', netflix, 'playing'))).toBe('play');
		expect(mediaStateFor(state('on', netflix, 'paused'))).toBe('pause');
		expect(mediaStateFor(state('on', netflix, 'loading'))).toBe('loading');
		expect(mediaStateFor(state('on', netflix))).toBe('stop');
		expect(mediaStateFor(null)).toBe('stop');
	});
});

describe('remoteKeyToEcpKey', () => {
	it('maps HomeKit remote keys to key names', () => {
		expect(remoteKeyToEcpKey(HAP_REMOTE_KEY.ARROW_UP)).toBe('up');
		expect(remoteKeyToEcpKey(HAP_REMOTE_KEY.EXIT)).toBe('home');
		expect(remoteKeyToEcpKey(HAP_REMOTE_KEY.PLAY_PAUSE)).toBe('play');
		expect(remoteKeyToEcpKey(HAP_REMOTE_KEY.INFORMATION)).toBe('info');
		expect(remoteKeyToEcpKey(42)).toBeNull();
	});
});

describe('input sources', () => {
	const apps = [app('12', 'Netflix'), app('837', 'YouTube')];

	it('puts Home first and numbers apps after it', () => {
		expect(buildInputSources(apps)).toEqual([
			{ identifier: 1, name: 'Home', appId: null },
			{ identifier: 2, name: 'Netflix', appId: '12' },
			{ identifier: 3, name: 'YouTube', appId: '837' },
		]);
	});

	it('caps the number of inputs', () => {
		const many = Array.from({ length: 60 }, (_v, i) => app(String(1000 + i), `App ${i}`));

		const sources = buildInputSources(many);

		expect(sources).toHaveLength(MAX_INPUT_SOURCES);
		expect(sources[sources.length - 1]).toEqual({ identifier: 40, name: 'App 38', appId: '1038' });
	});

	it('finds the identifier of the foreground app', () => {
		const sources = buildInputSources(apps);

		expect(activeInputIdentifier(sources, state('on', netflix))).toBe(2);
		expect(activeInputIdentifier(sources, state('on', home))).toBe(1);
		expect(activeInputIdentifier(sources, state('on', { id: '999', name: 'Other', screensaver: false }))).toBe(0);
		expect(activeInputIdentifier(sources, null)).toBe(0);
	});
});

describe('isCastingStream', () => {
	const session = (status: CastSession['status']): CastSession => ({
		id: 'cast_1_1',
		streamUrl: 'http://cam.local/porch.m3u8',
		format: 'hls',
		target: TEST_IDENTITY,
		status,
		startedAt: new Date('2024-01-01T00:00:00Z'),
		endedAt: null,
		error: null,
	});

	it('is true only for a live session of the same stream', () => {
		expect(isCastingStream(session('active'), 'http://cam.local/porch.m3u8')).toBe(true);
		expect(isCastingStream(session('starting'), 'http://cam.local/porch.m3u8')).toBe(true);
		expect(isCastingStream(session('stopped'), 'http://cam.local/porch.m3u8')).toBe(false);
		expect(isCastingStream(session('active'), 'http://cam.local/yard.m3u8')).toBe(false);
		expect(isCastingStream(null, 'http://cam.local/porch.m3u8')).toBe(false);
	});
});
