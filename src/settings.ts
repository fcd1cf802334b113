// src/settings.ts

/**
 * Name the platform is registered under; users reference it as
 * "platform" in config.json.
 */
export const PLATFORM_NAME = 'EcpPlayer';

/**
 * Must match the "name" field in package.json.
 */
export const PLUGIN_NAME = 'homebridge-ecp-player';
