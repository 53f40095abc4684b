/**
 * The name users put in the "platform" field of their Homebridge config.
 */
export const PLATFORM_NAME = 'DeconzLights';

/**
 * Must match the "name" field in package.json.
 */
export const PLUGIN_NAME = 'homebridge-deconz-lights';
