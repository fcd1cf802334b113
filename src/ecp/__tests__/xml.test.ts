import { EcpMalformedResponseError } from '../errors.js';
import {
	parseActiveApp,
	parseApps,
	parseDeviceInfo,
	parseMediaPlayer,
	parseMilliseconds,
	parseTvChannel,
	parseXmlDocument,
	playbackStatusFromPlayerState,
	powerStateFromMode,
} from '../xml.js';
import {
	activeAppXml,
	appsXml,
	deviceInfoXml,
	mediaPlayerXml,
	tvChannelXml,
} from '../../test/fake-device.js';

const doc = (xml: string) => parseXmlDocument(xml, 'test');

describe('parseXmlDocument', () => {
	it('rejects documents that are not well-formed', () => {
		expect(() => doc('<device-info><serial-number>X</device-info>')).toThrow(EcpMalformedResponseError);
	});
});

describe('parseDeviceInfo', () => {
	it('reads identity fields as strings', () => {
		expect(parseDeviceInfo(doc(deviceInfoXml()))).toEqual({
			serialNumber: 'SN0000000001',
			deviceId: 'DEV000000001',
			vendorName: 'Acme',
			modelName: 'Streamer 4K',
			modelNumber: '4800X',
			friendlyName: 'Living Room',
			softwareVersion: '11.5.0',
			isTv: false,
			powerMode: 'PowerOn',
		});
	});

	it('prefers the user-assigned name and falls back to the model name', () => {
		const named = doc(
			'<device-info><serial-number>A1</serial-number><user-device-name>Den</user-device-name>' +
			'<friendly-device-name>Ignored</friendly-device-name></device-info>',
		);
		expect(parseDeviceInfo(named).friendlyName).toBe('Den');

		const bare = doc('<device-info><serial-number>A1</serial-number><model-name>Stick</model-name></device-info>');
		expect(parseDeviceInfo(bare).friendlyName).toBe('Stick');
	});

	it('requires a serial number', () => {
		expect(() => parseDeviceInfo(doc('<device-info><model-name>Stick</model-name></device-info>')))
			.toThrow('<device-info> is missing <serial-number>');
	});

	it('rejects a different document', () => {
		expect(() => parseDeviceInfo(doc(appsXml([])))).toThrow(EcpMalformedResponseError);
	});
});

describe('parseActiveApp', () => {
	it('reports the home screen without an id', () => {
		expect(parseActiveApp(doc(activeAppXml({ name: 'Home' })))).toEqual({
			id: null,
			name: 'Home',
			screensaver: false,
		});
	});

	it('reads the app id attribute', () => {
		expect(parseActiveApp(doc(activeAppXml({ id: '12', name: 'Netflix' })))).toEqual({
			id: '12',
			name: 'Netflix',
			screensaver: false,
		});
	});

	it('flags a running screensaver', () => {
		expect(parseActiveApp(doc(activeAppXml({ name: 'Home' }, true)))?.screensaver).toBe(true);
	});

	it('returns null when no app is reported', () => {
		expect(parseActiveApp(doc('<active-app/>'))).toBeNull();
		expect(parseActiveApp(doc(activeAppXml(null)))).toBeNull();
	});
});

describe('parseMediaPlayer', () => {
	it('reads position and duration while playing', () => {
		const xml = mediaPlayerXml('play', { pluginId: '837', positionMs: 12345, durationMs: 600000 });
		expect(parseMediaPlayer(doc(xml))).toEqual({
			status: 'playing',
			positionMs: 12345,
			durationMs: 600000,
			isLive: false,
			pluginId: '837',
		});
	});

	it('reports live streams', () => {
		expect(parseMediaPlayer(doc(mediaPlayerXml('buffer', { live: true }))).isLive).toBe(true);
	});

	it('drops timing when idle', () => {
		expect(parseMediaPlayer(doc(mediaPlayerXml('close')))).toEqual({
			status: 'idle',
			positionMs: null,
			durationMs: null,
			isLive: false,
			pluginId: null,
		});
	});

	it('treats an empty player element as idle', () => {
		expect(parseMediaPlayer(doc('<player/>')).status).toBe('idle');
	});
});

describe('parseApps', () => {
	const icon = (id: string) => `http://device/query/icon/${id}`;

	it('keeps device order and builds icon URLs', () => {
		const apps = parseApps(doc(appsXml([
			{ id: '2285', name: 'Hulu' },
			{ id: '12', name: 'Netflix' },
			{ id: 'tvinput.dtv', name: 'Live TV', type: 'tvin' },
		])), icon);

		expect(apps.map((app) => app.id)).toEqual(['2285', '12', 'tvinput.dtv']);
		expect(apps[2]).toEqual({
			id: 'tvinput.dtv',
			name: 'Live TV',
			type: 'tvin',
			version: '1.0.0',
			iconUrl: 'http://device/query/icon/tvinput.dtv',
		});
	});

	it('wraps a single app in a list', () => {
		expect(parseApps(doc(appsXml([{ id: '12', name: 'Netflix' }])), icon)).toHaveLength(1);
	});

	it('returns an empty list when nothing is installed', () => {
		expect(parseApps(doc('<apps/>'), icon)).toEqual([]);
	});

	it('skips entries without an id', () => {
		const apps = parseApps(doc('<apps><app>Orphan</app><app id="12">Netflix</app></apps>'), icon);
		expect(apps.map((app) => app.name)).toEqual(['Netflix']);
	});
});

describe('parseTvChannel', () => {
	it('reads the tuned channel', () => {
		expect(parseTvChannel(doc(tvChannelXml('5.1', 'WXYZ', 'Evening News')))).toEqual({
			number: '5.1',
			name: 'WXYZ',
			programTitle: 'Evening News',
		});
	});

	it('returns null without a channel', () => {
		expect(parseTvChannel(doc('<tv-channel/>'))).toBeNull();
	});
});

describe('value mappings', () => {
	it('parses millisecond strings', () => {
		expect(parseMilliseconds('12345 ms')).toBe(12345);
		expect(parseMilliseconds('42')).toBe(42);
		expect(parseMilliseconds('soon')).toBeNull();
		expect(parseMilliseconds(null)).toBeNull();
	});

	it('maps power modes', () => {
		expect(powerStateFromMode('PowerOn')).toBe('on');
		expect(powerStateFromMode(null)).toBe('on');
		expect(powerStateFromMode('PowerOff')).toBe('off');
		expect(powerStateFromMode('DisplayOff')).toBe('standby');
		expect(powerStateFromMode('Ready')).toBe('standby');
	});

	it('maps player states', () => {
		expect(playbackStatusFromPlayerState('play')).toBe('playing');
		expect(playbackStatusFromPlayerState('pause')).toBe('paused');
		expect(playbackStatusFromPlayerState('startup')).toBe('loading');
		expect(playbackStatusFromPlayerState('stop')).toBe('idle');
		expect(playbackStatusFromPlayerState(null)).toBe('idle');
	});
});
