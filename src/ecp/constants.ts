// src/ecp/constants.ts

// App id the device uses for its built-in antenna tuner.
export const TV_TUNER_APP_ID = 'tvinput.dtv';

// Built-in "Play on" channel that accepts a bare media URL over /input.
export const MEDIA_PLAYER_APP_ID = '15985';

// Side-loaded developer channel; the default cast receiver.
export const DEFAULT_RECEIVER_APP_ID = 'dev';

export const HOME_SOURCE_NAME = 'Home';

export const ENDPOINTS = {
	deviceInfo: 'query/device-info',
	activeApp: 'query/active-app',
	mediaPlayer: 'query/media-player',
	apps: 'query/apps',
	tvActiveChannel: 'query/tv-active-channel',
} as const;

/**
 * Friendly key names (as used by existing automations) mapped to the key
 * names the keypress endpoint expects. Anything not listed is sent as given.
 */
export const KEY_ALIASES: Readonly<Record<string, string>> = {
	back: 'Back',
	backspace: 'Backspace',
	channel_down: 'ChannelDown',
	channel_up: 'ChannelUp',
	down: 'Down',
	enter: 'Enter',
	find_remote: 'FindRemote',
	forward: 'Fwd',
	home: 'Home',
	info: 'Info',
	input_av1: 'InputAV1',
	input_hdmi1: 'InputHDMI1',
	input_hdmi2: 'InputHDMI2',
	input_hdmi3: 'InputHDMI3',
	input_hdmi4: 'InputHDMI4',
	input_tuner: 'InputTuner',
	left: 'Left',
	play: 'Play',
	poweroff: 'PowerOff',
	poweron: 'PowerOn',
	replay: 'InstantReplay',
	reverse: 'Rev',
	right: 'Right',
	search: 'Search',
	select: 'Select',
	up: 'Up',
	volume_down: 'VolumeDown',
	volume_mute: 'VolumeMute',
	volume_up: 'VolumeUp',
};

// Extension -> MIME type hint for direct URL playback.
export const MIME_TYPES_BY_EXTENSION: Readonly<Record<string, string>> = {
	m3u8: 'application/x-mpegURL',
	mpd: 'application/dash+xml',
	ism: 'application/vnd.ms-sstr+xml',
	mp4: 'video/mp4',
	m4v: 'video/mp4',
	mkv: 'video/x-matroska',
	mov: 'video/quicktime',
	ts: 'video/mp2t',
	mp3: 'audio/mpeg',
	m4a: 'audio/mp4',
	aac: 'audio/aac',
	flac: 'audio/flac',
	wma: 'audio/x-ms-wma',
	jpg: 'image/jpeg',
	jpeg: 'image/jpeg',
	png: 'image/png',
	gif: 'image/gif',
};
