// src/ecp/config.ts
// Platform config (config.json) -> typed settings, with defaults applied.

import { DEFAULT_RECEIVER_APP_ID } from './constants.js';
import { DEFAULT_CAST_FORMAT } from './cast-session-manager.js';
import {
	DEFAULT_BACKOFF_FACTOR,
	DEFAULT_MAX_POLL_INTERVAL_MS,
	DEFAULT_POLL_INTERVAL_MS,
} from './device-coordinator.js';
import { DEFAULT_REQUEST_TIMEOUT_MS } from './ecp-client.js';
import type { EcpLogger } from './logger.js';
import { DEFAULT_ECP_PORT } from './types.js';

export interface CastStreamConfig {
	name: string;
	url: string;
	format: string;
}

export interface EcpDeviceConfig {
	name?: string;
	host: string;
	port: number;
	pollIntervalMs: number;
	backoffFactor: number;
	maxPollIntervalMs: number;
	requestTimeoutMs: number;
	receiverAppId: string;
	castStreams: CastStreamConfig[];
}

export interface EcpPlatformSettings {
	name: string;
	devices: EcpDeviceConfig[];
}

const MIN_POLL_INTERVAL_MS = 2_000;
const MIN_REQUEST_TIMEOUT_MS = 1_000;

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(raw: Record<string, unknown>, key: string): string | undefined {
	const value = raw[key];
	return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
}

function readNumber(raw: Record<string, unknown>, key: string): number | undefined {
	const value = raw[key];
	if (typeof value === 'number' && Number.isFinite(value)) {
		return value;
	}
	if (typeof value === 'string' && value.trim() !== '') {
		const parsed = Number(value.trim());
		return Number.isFinite(parsed) ? parsed : undefined;
	}
	return undefined;
}

function secondsToMs(seconds: number | undefined, fallbackMs: number, minMs: number): number {
	if (seconds === undefined) {
		return fallbackMs;
	}
	return Math.max(minMs, Math.round(seconds * 1000));
}

function resolveCastStreams(raw: unknown, host: string, log: EcpLogger): CastStreamConfig[] {
	if (!Array.isArray(raw)) {
		return [];
	}

	const streams: CastStreamConfig[] = [];
	for (const entry of raw) {
		if (!isRecord(entry)) {
			continue;
		}
		const name = readString(entry, 'name');
		const url = readString(entry, 'url');
		if (!name || !url) {
			log.warn('ECP: ignoring cast stream for %s without a name and url', host);
			continue;
		}
		streams.push({ name, url, format: readString(entry, 'format') ?? DEFAULT_CAST_FORMAT });
	}
	return streams;
}

export function resolveDeviceConfig(raw: Record<string, unknown>, log: EcpLogger): EcpDeviceConfig | null {
	const host = readString(raw, 'host');
	if (!host) {
		log.warn('ECP: device entry without "host" ignored');
		return null;
	}

	const port = readNumber(raw, 'port');
	const pollIntervalMs = secondsToMs(
		readNumber(raw, 'pollIntervalSeconds'),
		DEFAULT_POLL_INTERVAL_MS,
		MIN_POLL_INTERVAL_MS,
	);

	return {
		name: readString(raw, 'name'),
		host,
		port: port !== undefined && port > 0 && port < 65536 ? Math.floor(port) : DEFAULT_ECP_PORT,
		pollIntervalMs,
		backoffFactor: Math.max(1, readNumber(raw, 'backoffFactor') ?? DEFAULT_BACKOFF_FACTOR),
		maxPollIntervalMs: Math.max(
			pollIntervalMs,
			secondsToMs(readNumber(raw, 'maxPollIntervalSeconds'), DEFAULT_MAX_POLL_INTERVAL_MS, MIN_POLL_INTERVAL_MS),
		),
		requestTimeoutMs: secondsToMs(
			readNumber(raw, 'requestTimeoutSeconds'),
			DEFAULT_REQUEST_TIMEOUT_MS,
			MIN_REQUEST_TIMEOUT_MS,
		),
		receiverAppId: readString(raw, 'receiverAppId') ?? DEFAULT_RECEIVER_APP_ID,
		castStreams: resolveCastStreams(raw.castStreams, host, log),
	};
}

export function resolvePlatformConfig(
	raw: Record<string, unknown>,
	defaultName: string,
	log: EcpLogger,
): EcpPlatformSettings {
	const devices: EcpDeviceConfig[] = [];
	const entries = Array.isArray(raw.devices) ? raw.devices : [];

	for (const entry of entries) {
		if (!isRecord(entry)) {
			log.warn('ECP: ignoring device entry that is not an object');
			continue;
		}
		const device = resolveDeviceConfig(entry, log);
		if (device) {
			devices.push(device);
		}
	}

	// A lone top-level "host" is accepted as shorthand for a single device.
	if (devices.length === 0 && readString(raw, 'host')) {
		const device = resolveDeviceConfig(raw, log);
		if (device) {
			devices.push(device);
		}
	}

	return {
		name: readString(raw, 'name') ?? defaultName,
		devices,
	};
}
