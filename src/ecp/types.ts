// src/ecp/types.ts
import type { EcpError } from './errors.js';

export const DEFAULT_ECP_PORT = 8060;

/**
 * Where a device lives and what it said it was the first time we asked.
 * Created once by openDevice() and frozen.
 */
export interface DeviceIdentity {
	readonly host: string;
	readonly port: number;
	readonly serialNumber: string;
	readonly model: string;
	readonly name: string;
}

export type PowerState = 'on' | 'off' | 'standby';

export type PlaybackStatus = 'idle' | 'playing' | 'paused' | 'loading';

export interface DeviceInfo {
	readonly serialNumber: string;
	readonly deviceId: string | null;
	readonly vendorName: string | null;
	readonly modelName: string;
	readonly modelNumber: string | null;
	readonly friendlyName: string;
	readonly softwareVersion: string | null;
	readonly isTv: boolean;
	// Raw <power-mode>, e.g. PowerOn / DisplayOff / Ready
	readonly powerMode: string | null;
}

export interface ActiveApp {
	// null for the home screen, which the device reports without an id
	readonly id: string | null;
	readonly name: string;
	readonly screensaver: boolean;
}

export interface PlaybackInfo {
	readonly status: PlaybackStatus;
	// Only meaningful while status !== 'idle'.
	readonly positionMs: number | null;
	readonly durationMs: number | null;
	readonly isLive: boolean;
	// App id the player reports as owning the stream, if any
	readonly pluginId: string | null;
}

export interface TvChannel {
	readonly number: string;
	readonly name: string | null;
	readonly programTitle: string | null;
}

export interface InstalledApp {
	readonly id: string;
	readonly name: string;
	readonly type: string | null;
	readonly version: string | null;
	readonly iconUrl: string;
}

/**
 * One immutable picture of the device. A refresh never edits a snapshot;
 * it builds a new one and swaps it into the cache.
 */
export interface DeviceState {
	readonly info: DeviceInfo;
	readonly power: PowerState;
	readonly activeApp: ActiveApp | null;
	readonly playback: PlaybackInfo;
	// The control protocol does not report audio levels, so these stay null
	// unless a future firmware starts to.
	readonly volume: number | null;
	readonly muted: boolean | null;
	readonly channel: TvChannel | null;
	readonly fetchedAt: Date;
}

export interface StateCacheView {
	readonly state: DeviceState | null;
	readonly consecutiveFailures: number;
	readonly lastAttemptAt: Date | null;
	readonly lastSuccessAt: Date | null;
	readonly lastError: EcpError | null;
}

export type RefreshResult =
	| { readonly ok: true; readonly state: DeviceState }
	| { readonly ok: false; readonly error: EcpError; readonly state: DeviceState | null };

export interface ContentReference {
	readonly appId: string;
	readonly contentId: string;
	readonly params: Readonly<Record<string, string>>;
}

export type CastStatus = 'starting' | 'active' | 'stopped' | 'failed';

export interface CastSession {
	readonly id: string;
	readonly streamUrl: string;
	readonly format: string;
	readonly target: DeviceIdentity;
	readonly status: CastStatus;
	readonly startedAt: Date;
	readonly endedAt: Date | null;
	readonly error: EcpError | null;
}

export type MediaType = 'app' | 'channel' | 'url';

export type DeviceIntent =
	| { readonly type: 'keypress'; readonly key: string }
	| { readonly type: 'keys'; readonly keys: readonly string[]; readonly repeats?: number }
	| { readonly type: 'launch'; readonly appId: string }
	| { readonly type: 'play-content'; readonly contentReference: string }
	| { readonly type: 'play-url'; readonly url: string }
	| { readonly type: 'play-media'; readonly mediaType: string; readonly mediaId: string }
	| { readonly type: 'tune'; readonly channel: string }
	| { readonly type: 'search'; readonly keyword: string }
	| { readonly type: 'select-source'; readonly source: string }
	| { readonly type: 'media'; readonly action: 'play' | 'pause' | 'play-pause' }
	| { readonly type: 'power'; readonly on: boolean };
