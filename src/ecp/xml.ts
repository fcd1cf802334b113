// src/ecp/xml.ts
// Readers for the XML documents the device serves under /query/*.
// Each reader takes the parsed document (root element keyed by tag name) and
// throws EcpMalformedResponseError when the shape is not what it expects.

import { XMLParser, XMLValidator } from 'fast-xml-parser';

import { EcpMalformedResponseError } from './errors.js';
import type {
	ActiveApp,
	DeviceInfo,
	InstalledApp,
	PlaybackInfo,
	PlaybackStatus,
	PowerState,
	TvChannel,
} from './types.js';

export type XmlValue = string | XmlObject | XmlValue[];

export interface XmlObject {
	[key: string]: XmlValue;
}

const ATTR_PREFIX = '@_';
const TEXT_NODE = '#text';

const parser = new XMLParser({
	ignoreAttributes: false,
	ignoreDeclaration: true,
	attributeNamePrefix: ATTR_PREFIX,
	textNodeName: TEXT_NODE,
	parseTagValue: false,
	parseAttributeValue: false,
	trimValues: true,
	// Only the installed-apps listing repeats <app>; everywhere else it is a single node.
	isArray: (_tagName: string, jPath: string) => jPath === 'apps.app',
});

export function isXmlObject(value: unknown): value is XmlObject {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a response body into a document object. Anything that is not
 * well-formed XML becomes an EcpMalformedResponseError.
 */
export function parseXmlDocument(body: string, source: string): XmlObject {
	const validation = XMLValidator.validate(body);
	if (validation !== true) {
		throw new EcpMalformedResponseError(
			`Unparsable XML from ${source}: ${validation.err.msg} (line ${validation.err.line})`,
		);
	}

	let parsed: unknown;
	try {
		parsed = parser.parse(body);
	} catch (err) {
		throw new EcpMalformedResponseError(`Unparsable XML from ${source}`, err);
	}

	if (!isXmlObject(parsed) || Object.keys(parsed).length === 0) {
		throw new EcpMalformedResponseError(`Empty XML document from ${source}`);
	}

	return parsed;
}

function textOf(value: XmlValue | undefined): string | null {
	if (value === undefined) {
		return null;
	}
	if (typeof value === 'string') {
		const trimmed = value.trim();
		return trimmed.length > 0 ? trimmed : null;
	}
	if (Array.isArray(value)) {
		return textOf(value[0]);
	}
	return textOf(value[TEXT_NODE]);
}

function attrOf(value: XmlValue | undefined, name: string): string | null {
	if (!isXmlObject(value)) {
		return null;
	}
	const raw = value[ATTR_PREFIX + name];
	return typeof raw === 'string' && raw.trim().length > 0 ? raw.trim() : null;
}

function requireRoot(doc: XmlObject, tag: string): XmlObject {
	const root = doc[tag];
	if (!isXmlObject(root)) {
		throw new EcpMalformedResponseError(`Expected a <${tag}> document`);
	}
	return root;
}

// Like requireRoot, but an empty element (<tag/>) reads as null.
function optionalRoot(doc: XmlObject, tag: string): XmlObject | null {
	const root = doc[tag];
	if (root === undefined || Array.isArray(root)) {
		throw new EcpMalformedResponseError(`Expected a <${tag}> document`);
	}
	return isXmlObject(root) ? root : null;
}

// "12345 ms" -> 12345
export function parseMilliseconds(raw: string | null): number | null {
	if (raw === null) {
		return null;
	}
	const match = /^(\d+)\s*(?:ms)?$/i.exec(raw.trim());
	return match ? Number.parseInt(match[1], 10) : null;
}

export function powerStateFromMode(mode: string | null): PowerState {
	if (mode === null || mode === 'PowerOn') {
		// Older firmware omits <power-mode>; a device that answers is on.
		return 'on';
	}
	if (mode === 'PowerOff') {
		return 'off';
	}
	return 'standby';
}

export function playbackStatusFromPlayerState(state: string | null): PlaybackStatus {
	switch (state) {
	case 'play':
		return 'playing';
	case 'pause':
		return 'paused';
	case 'open':
	case 'startup':
	case 'buffer':
		return 'loading';
	default:
		return 'idle';
	}
}

export function parseDeviceInfo(doc: XmlObject): DeviceInfo {
	const root = requireRoot(doc, 'device-info');

	const serialNumber = textOf(root['serial-number']);
	if (!serialNumber) {
		throw new EcpMalformedResponseError('<device-info> is missing <serial-number>');
	}

	const modelName = textOf(root['model-name']) ?? 'Unknown model';

	return {
		serialNumber,
		deviceId: textOf(root['device-id']),
		vendorName: textOf(root['vendor-name']),
		modelName,
		modelNumber: textOf(root['model-number']),
		friendlyName:
			textOf(root['user-device-name']) ??
			textOf(root['friendly-device-name']) ??
			textOf(root['default-device-name']) ??
			modelName,
		softwareVersion: textOf(root['software-version']),
		isTv: textOf(root['is-tv']) === 'true',
		powerMode: textOf(root['power-mode']),
	};
}

export function parseActiveApp(doc: XmlObject): ActiveApp | null {
	const root = optionalRoot(doc, 'active-app');
	if (root === null) {
		return null;
	}
	const app = root.app;
	const name = textOf(app);
	if (name === null) {
		return null;
	}

	return {
		id: attrOf(app, 'id'),
		name,
		screensaver: root.screensaver !== undefined,
	};
}

export function parseMediaPlayer(doc: XmlObject): PlaybackInfo {
	const root = doc.player;
	if (root === undefined || Array.isArray(root)) {
		throw new EcpMalformedResponseError('Expected a <player> document');
	}

	const status = playbackStatusFromPlayerState(attrOf(root, 'state'));
	if (!isXmlObject(root) || status === 'idle') {
		return {
			status,
			positionMs: null,
			durationMs: null,
			isLive: false,
			pluginId: attrOf(isXmlObject(root) ? root.plugin : undefined, 'id'),
		};
	}

	return {
		status,
		positionMs: parseMilliseconds(textOf(root.position)),
		durationMs: parseMilliseconds(textOf(root.duration)),
		isLive: textOf(root.is_live) === 'true',
		pluginId: attrOf(root.plugin, 'id'),
	};
}

export function parseApps(doc: XmlObject, iconUrl: (appId: string) => string): InstalledApp[] {
	const root = doc.apps;
	if (root === undefined) {
		throw new EcpMalformedResponseError('Expected an <apps> document');
	}
	if (!isXmlObject(root)) {
		// <apps/> with nothing installed
		return [];
	}

	const entries = Array.isArray(root.app) ? root.app : [];
	const apps: InstalledApp[] = [];
	for (const entry of entries) {
		const id = attrOf(entry, 'id');
		const name = textOf(entry);
		if (!id || !name) {
			continue;
		}
		apps.push({
			id,
			name,
			type: attrOf(entry, 'type'),
			version: attrOf(entry, 'version'),
			iconUrl: iconUrl(id),
		});
	}
	return apps;
}

export function parseTvChannel(doc: XmlObject): TvChannel | null {
	const root = optionalRoot(doc, 'tv-channel');
	const channel = root?.channel;
	if (!isXmlObject(channel)) {
		return null;
	}

	const number = textOf(channel.number);
	if (!number) {
		return null;
	}

	return {
		number,
		name: textOf(channel.name),
		programTitle: textOf(channel['program-title']),
	};
}
