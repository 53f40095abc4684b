import type { API, Characteristic, DynamicPlatformPlugin, Logging, PlatformAccessory, PlatformConfig, Service } from 'homebridge';
import { z } from 'zod';
import { createLightClient } from './deconz-interface';
import type { ILightClient } from './deconz-interface/types';
import { AccessoryGenerator } from './Generators/AccessoryGenerator';
import { DCConfig } from './misc/helpers/DCConfig';
import { DCLogger } from './misc/helpers/DCLogger';
import type { HomebridgeAccessory } from './misc/types/types';
import { PLATFORM_NAME, PLUGIN_NAME } from './settings';

const accessoryContextSchema = z.object({
	displayName: z.string(),
	light: z.object({
		id: z.number().int().nonnegative(),
		name: z.string(),
	}),
	latestUpdate: z.number(),
	isOnline: z.boolean(),
	restartsSinceSeen: z.number().int().nonnegative(),
});

export function isLightAccessory(accessory: PlatformAccessory): accessory is HomebridgeAccessory {
	return accessoryContextSchema.safeParse(accessory.context).success;
}

/**
 * DeconzDynamicPlatform
 * Parses the user config and registers one accessory per bridge light.
 */
export class DeconzDynamicPlatform implements DynamicPlatformPlugin {
	public readonly Service: typeof Service;
	public readonly Characteristic: typeof Characteristic;

	public readonly hbAccessoriesFromDisk: Map<string, HomebridgeAccessory> = new Map();
	public readonly staleAccessories: PlatformAccessory[] = [];
	private accessoryGenerator: AccessoryGenerator | null = null;

	constructor(public readonly log: Logging, public readonly config: PlatformConfig, public readonly api: API) {
		this.Service = api.hap.Service;
		this.Characteristic = api.hap.Characteristic;

		// report config problems at the default level, then switch to the configured one
		new DCLogger(log);
		new DCConfig(config);
		new DCLogger(log, DCConfig.advancedOptions.logLevel);

		let client: ILightClient | null = null;
		try {
			client = createLightClient(DCConfig.connection);
		} catch (error) {
			DCLogger.error('Unable to set up the deCONZ connection. No lights will be loaded.', error);
		}
		if (DCConfig.connection.demoMode) {
			DCLogger.warn('Demo mode: light state is simulated and requests are only logged.');
		}

		api.on('didFinishLaunching', () => {
			DCLogger.debug('deCONZ platform didFinishLaunching');
			if (client === null) {
				this.removeStaleAccessories();
				return;
			}
			this.initializePlatform(client).catch((error) => {
				DCLogger.error('Failed to initialize the deCONZ platform:', error);
			});
		});

		api.on('shutdown', () => {
			this.accessoryGenerator?.stopRefresh();
		});
	}

	/**
	 * Invoked when homebridge restores cached accessories from disk at startup.
	 */
	configureAccessory(accessory: PlatformAccessory) {
		if (isLightAccessory(accessory)) {
			this.hbAccessoriesFromDisk.set(accessory.UUID, accessory);
			DCLogger.info(`${this.hbAccessoriesFromDisk.size} - Loading accessory from cache: ${accessory.context.displayName}`);
		} else {
			DCLogger.warn(`Cached accessory ${accessory.displayName} has an unknown format and will be removed.`);
			this.staleAccessories.push(accessory);
		}
	}

	async initializePlatform(client: ILightClient) {
		this.accessoryGenerator = new AccessoryGenerator(this, this.hbAccessoriesFromDisk, client);
		this.removeStaleAccessories();
		await this.accessoryGenerator.discoverAccessories();
		this.accessoryGenerator.startRefresh(DCConfig.advancedOptions.refreshIntervalSeconds);
	}

	/**
	 * Unregisters cached accessories whose context this version cannot read.
	 */
	removeStaleAccessories() {
		const staleAccessories = this.staleAccessories.splice(0);
		if (staleAccessories.length === 0) {
			return;
		}
		this.api.unregisterPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, staleAccessories);
		DCLogger.warn(`Removed ${staleAccessories.length} cached accessories with an unknown format.`);
	}
}
