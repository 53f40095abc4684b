import { DeconzError } from './DeconzError';
import type { ILight, ILightCapabilities, ILightColor } from './types';

const MAX_LIGHT_ID = 0xffffffff;

const COLOR_LIMITS: Record<keyof ILightColor, number> = {
	hue: 65535,
	bri: 255,
	sat: 255,
};

/**
 * Light ids arrive as the keys of the bridge's light list and must be
 * base-10 unsigned 32-bit integers.
 */
export function parseLightId(key: string): number {
	if (!/^\d+$/.test(key)) {
		throw new DeconzError('IdParseError', `Invalid light id "${key}"`);
	}
	const id = Number(key);
	if (id > MAX_LIGHT_ID) {
		throw new DeconzError('IdParseError', `Light id "${key}" is out of range`);
	}
	return id;
}

/**
 * Returns the request body for a colour change: only the fields that are set.
 */
export function validateLightColor(color: ILightColor): ILightColor {
	const body: ILightColor = {};
	for (const field of ['hue', 'bri', 'sat'] as const) {
		const value = color[field];
		if (value === undefined) {
			continue;
		}
		if (!Number.isInteger(value) || value < 0 || value > COLOR_LIMITS[field]) {
			throw new DeconzError('InvalidArgument', `${field} must be an integer between 0 and ${COLOR_LIMITS[field]}, got ${value}`);
		}
		body[field] = value;
	}
	if (Object.keys(body).length === 0) {
		throw new DeconzError('InvalidArgument', 'No color values given');
	}
	return body;
}

export function apiPath(username: string, resource: string): string {
	return `api/${encodeURIComponent(username)}/${resource}`;
}

export function lightResource(light: ILight): string {
	return `lights/${light.id}`;
}

export function lightStateResource(light: ILight): string {
	return `${lightResource(light)}/state`;
}

export function searchLights(lights: ILight[], query: string): ILight[] {
	const needle = query.trim().toLowerCase();
	if (needle.length === 0) {
		return [...lights];
	}
	return lights.filter((light) => light.name.toLowerCase().includes(needle));
}

/**
 * Finds a light by id (all digits) or by name: an exact name first, then a
 * unique partial match.
 */
export function resolveLight(lights: ILight[], ref: string): ILight {
	const trimmed = ref.trim();
	if (/^\d+$/.test(trimmed)) {
		const byId = lights.find((light) => light.id === Number(trimmed));
		if (byId) {
			return byId;
		}
		throw new DeconzError('InvalidArgument', `No light with id ${trimmed}`);
	}

	const lowered = trimmed.toLowerCase();
	const exact = lights.find((light) => light.name.toLowerCase() === lowered);
	if (exact) {
		return exact;
	}

	const matches = searchLights(lights, trimmed);
	if (matches.length === 1) {
		return matches[0];
	}
	if (matches.length === 0) {
		throw new DeconzError('InvalidArgument', `No light matches "${trimmed}"`);
	}
	const names = matches.map((light) => light.name).join(', ');
	throw new DeconzError('InvalidArgument', `"${trimmed}" matches several lights: ${names}`);
}

export function lightCapabilities(light: ILight): ILightCapabilities {
	const type = (light.type ?? '').toLowerCase();
	const isSwitch = type.includes('plug-in unit') || type.includes('on/off') || type.includes('switch');
	return {
		hasColor: light.hasColor ?? (type.includes('color') && !type.includes('temperature')),
		hasBrightness: !isSwitch,
	};
}
