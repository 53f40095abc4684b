import type { PlatformConfig } from 'homebridge';
import { z } from 'zod';
import { DEFAULT_TIMEOUT_MS } from '../../deconz-interface/DeconzClient';
import { HOMEBRIDGE_CONFIG_KEYS } from '../types/constants';
import { DCLogger } from './DCLogger';

// largest edit distance at which a misspelled key is still recognised
const MAX_KEY_DISTANCE = 2;
// setInterval delays above 2^31-1 ms fire immediately
const MAX_REFRESH_INTERVAL_SECONDS = 86400;

function withDefault<T extends z.ZodTypeAny>(schema: T, fallback: z.infer<T>, key: string) {
	return schema.catch(({ input }: { input: unknown }) => {
		if (input !== undefined) {
			DCLogger.warn(`Invalid value for "${key}": ${JSON.stringify(input)}. Using ${JSON.stringify(fallback)} instead.`);
		}
		return fallback;
	});
}

const connectionSchema = z.object({
	url: withDefault(z.string().trim(), '', 'url'),
	token: withDefault(z.string().trim(), '', 'token'),
	demoMode: withDefault(z.boolean(), false, 'demoMode'),
	timeoutMS: withDefault(z.number().int().positive(), DEFAULT_TIMEOUT_MS, 'timeoutMS'),
});

const deviceManagementSchema = z.object({
	blacklistOrWhitelist: withDefault(z.enum(['blacklist', 'whitelist']), 'blacklist', 'blacklistOrWhitelist'),
	listedLights: withDefault(z.array(z.union([z.string(), z.number()]).transform(String)), [], 'listedLights'),
});

const pruningSchema = z.object({
	pruneMissingLights: withDefault(z.boolean(), false, 'pruneMissingLights'),
	restartsBeforeMissingLightsPruned: withDefault(z.number().int().min(1), 3, 'restartsBeforeMissingLightsPruned'),
});

const advancedOptionsSchema = z.object({
	logLevel: withDefault(z.number().int().min(0).max(5), 3, 'logLevel'),
	refreshIntervalSeconds: withDefault(z.number().min(0).max(MAX_REFRESH_INTERVAL_SECONDS), 30, 'refreshIntervalSeconds'),
});

export const configSchema = z.object({
	connection: connectionSchema,
	deviceManagement: deviceManagementSchema,
	pruning: pruningSchema,
	advancedOptions: advancedOptionsSchema,
});

export type CorrectedDCConfig = z.infer<typeof configSchema>;
export type ConfigSection = keyof CorrectedDCConfig;

export const EXPECTED_CONFIG_KEYS: Record<ConfigSection, readonly string[]> = {
	connection: Object.keys(connectionSchema.shape),
	deviceManagement: Object.keys(deviceManagementSchema.shape),
	pruning: Object.keys(pruningSchema.shape),
	advancedOptions: Object.keys(advancedOptionsSchema.shape),
};

const SECTIONS: ConfigSection[] = ['connection', 'deviceManagement', 'pruning', 'advancedOptions'];

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function levenshteinDistance(a: string, b: string): number {
	if (a.length === 0) return b.length;
	if (b.length === 0) return a.length;

	const matrix: number[][] = [];
	for (let i = 0; i <= b.length; i++) {
		matrix[i] = [i];
	}
	for (let j = 0; j <= a.length; j++) {
		matrix[0][j] = j;
	}

	for (let i = 1; i <= b.length; i++) {
		for (let j = 1; j <= a.length; j++) {
			if (b.charAt(i - 1) === a.charAt(j - 1)) {
				matrix[i][j] = matrix[i - 1][j - 1];
			} else {
				matrix[i][j] = Math.min(matrix[i - 1][j - 1] + 1, matrix[i][j - 1] + 1, matrix[i - 1][j] + 1);
			}
		}
	}

	return matrix[b.length][a.length];
}

function closestSection(key: string): ConfigSection | null {
	let closest: ConfigSection | null = null;
	let minDistance = Infinity;
	for (const section of SECTIONS) {
		const distance = levenshteinDistance(key, section);
		if (distance < minDistance) {
			minDistance = distance;
			closest = section;
		}
	}
	return minDistance <= MAX_KEY_DISTANCE ? closest : null;
}

function closestKey(key: string): { section: ConfigSection; key: string } | null {
	let closest: { section: ConfigSection; key: string } | null = null;
	let minDistance = Infinity;
	for (const section of SECTIONS) {
		for (const expectedKey of EXPECTED_CONFIG_KEYS[section]) {
			const distance = levenshteinDistance(key, expectedKey);
			if (distance < minDistance) {
				minDistance = distance;
				closest = { section, key: expectedKey };
			}
		}
	}
	return minDistance <= MAX_KEY_DISTANCE ? closest : null;
}

/**
 * Moves misplaced and misspelled keys to where they belong and fills in
 * defaults for everything missing or invalid.
 */
export function correctConfig(config: Record<string, unknown>): CorrectedDCConfig {
	const raw: Record<ConfigSection, Record<string, unknown>> = {
		connection: {},
		deviceManagement: {},
		pruning: {},
		advancedOptions: {},
	};

	const place = (key: string, value: unknown) => {
		const match = closestKey(key);
		if (match === null) {
			DCLogger.warn(`Unexpected config key "${key}" ignored.`);
			return;
		}
		if (match.key !== key) {
			DCLogger.warn(`Config key "${key}" read as "${match.section}.${match.key}".`);
		}
		raw[match.section][match.key] = value;
	};

	const sections: [ConfigSection, Record<string, unknown>][] = [];

	// loose keys first, so that values given inside their proper section win
	for (const [key, value] of Object.entries(config)) {
		if (HOMEBRIDGE_CONFIG_KEYS.includes(key)) {
			continue;
		}
		const section = isRecord(value) ? closestSection(key) : null;
		if (section !== null && isRecord(value)) {
			sections.push([section, value]);
		} else {
			place(key, value);
		}
	}

	for (const [section, values] of sections) {
		for (const [key, value] of Object.entries(values)) {
			if (EXPECTED_CONFIG_KEYS[section].includes(key)) {
				raw[section][key] = value;
			} else {
				place(key, value);
			}
		}
	}

	return configSchema.parse(raw);
}

export function withEnvironmentFallback(config: CorrectedDCConfig, env: NodeJS.ProcessEnv): CorrectedDCConfig {
	return {
		...config,
		connection: {
			...config.connection,
			url: config.connection.url || (env.DECONZ_URL ?? '').trim(),
			token: config.connection.token || (env.DECONZ_TOKEN ?? '').trim(),
		},
	};
}

export class DCConfig {
	public static connection: CorrectedDCConfig['connection'];
	public static deviceManagement: CorrectedDCConfig['deviceManagement'];
	public static pruning: CorrectedDCConfig['pruning'];
	public static advancedOptions: CorrectedDCConfig['advancedOptions'];

	constructor(hbConfig: PlatformConfig, env: NodeJS.ProcessEnv = process.env) {
		const correctedConfig = withEnvironmentFallback(correctConfig(hbConfig), env);

		DCConfig.connection = correctedConfig.connection;
		DCConfig.deviceManagement = correctedConfig.deviceManagement;
		DCConfig.pruning = correctedConfig.pruning;
		DCConfig.advancedOptions = correctedConfig.advancedOptions;
	}
}
