import { openDevice } from '../ecp-device.js';
import { EcpUnreachableError } from '../errors.js';
import { silentLogger } from '../logger.js';
import type { StateCacheView } from '../types.js';
import {
	FakeEcpDevice,
	activeAppXml,
	deviceInfoXml,
	unreachableError,
} from '../../test/fake-device.js';

describe('openDevice', () => {
	it('identifies the device without starting to poll', async () => {
		const fake = new FakeEcpDevice();

		const device = await openDevice({ host: '192.168.1.20', fetch: fake.fetch }, silentLogger);

		expect(device.identity).toEqual({
			host: '192.168.1.20',
			port: 8060,
			serialNumber: 'SN0000000001',
			model: 'Streamer 4K (4800X)',
			name: 'Living Room',
		});
		expect(fake.requests).toEqual([{ method: 'GET', path: 'query/device-info' }]);
		expect(device.currentState().state).toBeNull();
	});

	it('lets the configured name win over the reported one', async () => {
		const fake = new FakeEcpDevice();

		const device = await openDevice({ host: '192.168.1.20', name: '  Den TV ', fetch: fake.fetch }, silentLogger);

		expect(device.identity.name).toBe('Den TV');
	});

	it('fails when the device cannot be reached', async () => {
		const fake = new FakeEcpDevice().fail(unreachableError);

		await expect(openDevice({ host: '192.168.1.20', fetch: fake.fetch }, silentLogger))
			.rejects.toBeInstanceOf(EcpUnreachableError);
	});
});

describe('EcpDevice', () => {
	it('refreshes, dispatches and casts through one handle', async () => {
		const fake = new FakeEcpDevice();
		const device = await openDevice({ host: '192.168.1.20', port: 8061, fetch: fake.fetch }, silentLogger);
		const views: StateCacheView[] = [];
		device.onStateChange((view) => views.push(view));

		const first = await device.start();
		await device.dispatch({ type: 'launch', appId: '12' });
		fake.reply('query/active-app', activeAppXml({ id: 'dev', name: 'Receiver' }));
		const session = await device.startCast('http://cam.local/porch.m3u8');
		const stopped = await device.stopCast();
		device.shutdown();

		expect(first.ok).toBe(true);
		expect(views).toHaveLength(4);
		expect(views[3]).toBe(device.currentState());
		expect(session.target).toBe(device.identity);
		expect(stopped?.status).toBe('stopped');
		expect(device.castSession()).toBe(stopped);
		expect(device.iconUrl('12')).toBe('http://192.168.1.20:8061/query/icon/12');
		expect(fake.commands()).toEqual([
			'launch/12',
			'launch/dev?contentId=http%3A%2F%2Fcam.local%2Fporch.m3u8&mediaType=hls',
			'input/dev?command=stop',
		]);
	});

	it('keeps devices independent', async () => {
		const den = new FakeEcpDevice();
		const bedroom = new FakeEcpDevice().reply('query/device-info', deviceInfoXml({ serial: 'SN0000000002' }));
		const a = await openDevice({ host: '10.0.0.5', fetch: den.fetch }, silentLogger);
		const b = await openDevice({ host: '10.0.0.6', fetch: bedroom.fetch }, silentLogger);

		await a.dispatch({ type: 'keypress', key: 'home' });
		bedroom.fail(unreachableError);
		const result = await b.forceRefresh();

		expect(b.identity.serialNumber).toBe('SN0000000002');
		expect(result.ok).toBe(false);
		expect(a.currentState().consecutiveFailures).toBe(0);
		expect(b.currentState().consecutiveFailures).toBe(1);
		expect(bedroom.commands()).toEqual([]);
	});
});
