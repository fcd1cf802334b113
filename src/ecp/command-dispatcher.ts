// src/ecp/command-dispatcher.ts
// Turns one high-level intent into correctly sequenced protocol calls.
// Errors from the client propagate unchanged; nothing here retries.

import {
	ENDPOINTS,
	HOME_SOURCE_NAME,
	KEY_ALIASES,
	MEDIA_PLAYER_APP_ID,
	MIME_TYPES_BY_EXTENSION,
	TV_TUNER_APP_ID,
} from './constants.js';
import {
	buildQuery,
	contentReferenceToLaunchPath,
	parseContentReference,
} from './content-reference.js';
import type { DeviceCoordinator } from './device-coordinator.js';
import type { EcpClient } from './ecp-client.js';
import { InvalidContentReferenceError, UnknownSourceError } from './errors.js';
import type { EcpLogger } from './logger.js';
import { consoleLogger } from './logger.js';
import type { DeviceIntent, InstalledApp } from './types.js';
import { parseApps } from './xml.js';

export function resolveKeyName(key: string): string {
	const normalized = key.trim();
	const lower = normalized.toLowerCase();
	return Object.hasOwn(KEY_ALIASES, lower) ? KEY_ALIASES[lower] : normalized;
}

function isAbsoluteUrl(value: string): boolean {
	try {
		new URL(value);
		return true;
	} catch {
		return false;
	}
}

export function mimeTypeForUrl(url: string): string | null {
	let pathname: string;
	try {
		pathname = new URL(url).pathname;
	} catch {
		return null;
	}

	const dot = pathname.lastIndexOf('.');
	if (dot === -1 || dot < pathname.lastIndexOf('/')) {
		return null;
	}

	const ext = pathname.slice(dot + 1).toLowerCase();
	return Object.hasOwn(MIME_TYPES_BY_EXTENSION, ext) ? MIME_TYPES_BY_EXTENSION[ext] : null;
}

// Media kind flag the "Play on" channel expects: v(ideo), a(udio) or p(icture).
function mediaKindFor(mimeType: string | null): 'v' | 'a' | 'p' {
	if (mimeType?.startsWith('audio/')) {
		return 'a';
	}
	if (mimeType?.startsWith('image/')) {
		return 'p';
	}
	return 'v';
}

export class CommandDispatcher {
	private readonly client: EcpClient;
	private readonly coordinator: DeviceCoordinator;
	private readonly log: EcpLogger;

	constructor(client: EcpClient, coordinator: DeviceCoordinator, logger?: EcpLogger) {
		this.client = client;
		this.coordinator = coordinator;
		this.log = logger ?? consoleLogger('ecp-dispatcher');
	}

	public async dispatch(intent: DeviceIntent): Promise<void> {
		switch (intent.type) {
		case 'keypress':
			return this.keypress(intent.key);
		case 'keys':
			return this.sendKeys(intent.keys, intent.repeats);
		case 'launch':
			return this.launchApp(intent.appId);
		case 'play-content':
			return this.playContent(intent.contentReference);
		case 'play-url':
			return this.playUrl(intent.url);
		case 'play-media':
			return this.playMedia(intent.mediaType, intent.mediaId);
		case 'tune':
			return this.tune(intent.channel);
		case 'search':
			return this.search(intent.keyword);
		case 'select-source':
			return this.selectSource(intent.source);
		case 'media':
			if (intent.action === 'play') {
				return this.mediaPlay();
			}
			if (intent.action === 'pause') {
				return this.mediaPause();
			}
			return this.mediaPlayPause();
		case 'power':
			return intent.on ? this.powerOn() : this.powerOff();
		}
	}

	public async keypress(key: string): Promise<void> {
		await this.pressKey(key);
		await this.refreshAfterCommand();
	}

	/**
	 * Press each key in order, the whole sequence `repeats` times, then
	 * refresh once.
	 */
	public async sendKeys(keys: readonly string[], repeats = 1): Promise<void> {
		const rounds = Math.max(1, Math.floor(repeats));
		for (let round = 0; round < rounds; round += 1) {
			for (const key of keys) {
				await this.pressKey(key);
			}
		}
		await this.refreshAfterCommand();
	}

	public async launchApp(appId: string): Promise<void> {
		this.log.info('Launching app %s on %s', appId, this.client.host);
		await this.client.command(`launch/${encodeURIComponent(appId)}`);
		await this.refreshAfterCommand();
	}

	/**
	 * Deep link: "appId,contentId[,key=value]*". A malformed reference is
	 * rejected before anything is sent to the device.
	 */
	public async playContent(compositeId: string): Promise<void> {
		const ref = parseContentReference(compositeId);
		this.log.info('Launching app %s with deep link %s', ref.appId, ref.contentId);
		await this.client.command(contentReferenceToLaunchPath(ref));
		await this.refreshAfterCommand();
	}

	public async playUrl(url: string): Promise<void> {
		if (!isAbsoluteUrl(url)) {
			throw new InvalidContentReferenceError(url, 'not an absolute URL');
		}

		const mimeType = mimeTypeForUrl(url);
		const params: Record<string, string> = { t: mediaKindFor(mimeType), u: url };
		if (mimeType) {
			params.contentType = mimeType;
		}

		this.log.info('Playing %s on %s (type=%s)', url, this.client.host, mimeType ?? 'unknown');
		await this.client.command(`input/${MEDIA_PLAYER_APP_ID}?${buildQuery(params)}`);
		await this.refreshAfterCommand();
	}

	/**
	 * Entry point matching the media-player "play media" call: `app` ids with a
	 * comma are deep links, plain ones just launch the app.
	 */
	public async playMedia(mediaType: string, mediaId: string): Promise<void> {
		switch (mediaType) {
		case 'app':
			if (mediaId.includes(',')) {
				return this.playContent(mediaId);
			}
			return this.launchApp(mediaId.trim());
		case 'channel':
			return this.tune(mediaId);
		case 'url':
			return this.playUrl(mediaId);
		default:
			throw new InvalidContentReferenceError(
				mediaId,
				`unsupported media type "${mediaType}" (expected app, channel or url)`,
			);
		}
	}

	public async tune(channel: string): Promise<void> {
		this.log.info('Tuning %s to channel %s', this.client.host, channel);
		await this.client.command(
			`launch/${encodeURIComponent(TV_TUNER_APP_ID)}?${buildQuery({ ch: channel.trim() })}`,
		);
		await this.refreshAfterCommand();
	}

	public async search(keyword: string): Promise<void> {
		await this.client.command(`search/browse?${buildQuery({ keyword })}`);
		await this.refreshAfterCommand();
	}

	/**
	 * Switch to "Home" or to an installed app named by its display name or id.
	 */
	public async selectSource(source: string): Promise<void> {
		if (source === HOME_SOURCE_NAME) {
			return this.keypress('home');
		}

		const apps = await this.listApps();
		const app = apps.find((candidate) => candidate.name === source || candidate.id === source);
		if (!app) {
			throw new UnknownSourceError(source);
		}

		return this.launchApp(app.id);
	}

	public async mediaPlay(): Promise<void> {
		const state = this.coordinator.currentState().state;
		if (state && (state.power !== 'on' || state.playback.status === 'playing')) {
			this.log.debug('Play ignored on %s: already %s', this.client.host, this.describe());
			return;
		}
		await this.keypress('play');
	}

	public async mediaPause(): Promise<void> {
		const state = this.coordinator.currentState().state;
		if (state && (state.power !== 'on' || state.playback.status === 'paused')) {
			this.log.debug('Pause ignored on %s: already %s', this.client.host, this.describe());
			return;
		}
		await this.keypress('play');
	}

	public async mediaPlayPause(): Promise<void> {
		const state = this.coordinator.currentState().state;
		if (state && state.power !== 'on') {
			this.log.debug('Play/pause ignored on %s: %s', this.client.host, this.describe());
			return;
		}
		await this.keypress('play');
	}

	public async powerOn(): Promise<void> {
		await this.keypress('poweron');
	}

	public async powerOff(): Promise<void> {
		await this.keypress('poweroff');
	}

	/**
	 * Installed applications, in the order the device lists them. Rebuilt on
	 * every call.
	 */
	public async listApps(): Promise<InstalledApp[]> {
		const doc = await this.client.fetch(ENDPOINTS.apps);
		return parseApps(doc, (appId) => this.client.iconUrl(appId));
	}

	/**
	 * Ask the receiver app to open a stream. Used by the cast session manager.
	 */
	public async openReceiverStream(receiverAppId: string, streamUrl: string, format: string): Promise<void> {
		this.log.info('Casting %s (%s) to %s via %s', streamUrl, format, this.client.host, receiverAppId);
		await this.client.command(
			`launch/${encodeURIComponent(receiverAppId)}?${buildQuery({ contentId: streamUrl, mediaType: format })}`,
		);
		await this.refreshAfterCommand();
	}

	public async stopReceiverStream(receiverAppId: string): Promise<void> {
		this.log.info('Stopping cast on %s via %s', this.client.host, receiverAppId);
		await this.client.command(`input/${encodeURIComponent(receiverAppId)}?${buildQuery({ command: 'stop' })}`);
		await this.refreshAfterCommand();
	}

	private async pressKey(key: string): Promise<void> {
		const resolved = resolveKeyName(key);
		this.log.debug('Keypress %s on %s', resolved, this.client.host);
		await this.client.command(`keypress/${encodeURIComponent(resolved)}`);
	}

	private async refreshAfterCommand(): Promise<void> {
		const result = await this.coordinator.forceRefresh();
		if (!result.ok) {
			this.log.debug('Refresh after command failed: %s', result.error.message);
		}
	}

	private describe(): string {
		const state = this.coordinator.currentState().state;
		if (!state) {
			return 'unknown';
		}
		if (state.power === 'on') {
			return state.playback.status;
		}
		return state.power === 'off' ? 'powered off' : 'in standby';
	}
}
