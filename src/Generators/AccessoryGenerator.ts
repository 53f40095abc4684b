import type { ILight, ILightClient } from '../deconz-interface/types';
import type { CorrectedDCConfig } from '../misc/helpers/DCConfig';
import { DCConfig } from '../misc/helpers/DCConfig';
import { DCLogger } from '../misc/helpers/DCLogger';
import type { HomebridgeAccessory, IAccessoryContext } from '../misc/types/types';
import type { DeconzDynamicPlatform } from '../platform';
import { DeconzLightAccessory } from '../platformAccessory';
import { PLATFORM_NAME, PLUGIN_NAME } from '../settings';

export interface IPartitionedLights<A> {
	onlineHBAccessories: [A, ILight][];
	offlineHBAccessories: A[];
	disallowedHBAccessories: A[];
	newLights: ILight[];
}

/**
 * The stable key an accessory UUID is generated from.
 */
export function lightKey(light: ILight): string {
	return light.uniqueId ?? `deconz-light-${light.id}`;
}

export function isAllowed(light: ILight, deviceManagement: CorrectedDCConfig['deviceManagement']): boolean {
	const { listedLights, blacklistOrWhitelist } = deviceManagement;
	const name = light.name.toLowerCase();
	const onList = listedLights.some((entry) => entry === String(light.id) || entry.toLowerCase() === name);

	return blacklistOrWhitelist === 'whitelist' ? onList : !onList;
}

/**
 * Sorts the bridge's lights and the cached accessories into what is still
 * there, what went missing, what is no longer allowed and what is new.
 */
export function partitionLights<A>(
	lights: ILight[],
	hbAccessories: Map<string, A>,
	uuidFor: (light: ILight) => string,
	allowed: (light: ILight) => boolean,
): IPartitionedLights<A> {
	const onlineHBAccessories: [A, ILight][] = [];
	const disallowedHBAccessories: A[] = [];
	const newLights: ILight[] = [];
	const seen = new Set<string>();

	for (const light of lights) {
		const uuid = uuidFor(light);
		seen.add(uuid);
		const hbAccessory = hbAccessories.get(uuid);
		if (!allowed(light)) {
			if (hbAccessory) disallowedHBAccessories.push(hbAccessory);
		} else if (hbAccessory) {
			onlineHBAccessories.push([hbAccessory, light]);
		} else {
			newLights.push(light);
		}
	}

	const offlineHBAccessories = [...hbAccessories.entries()]
		.filter(([uuid]) => !seen.has(uuid))
		.map(([, hbAccessory]) => hbAccessory);

	return { onlineHBAccessories, offlineHBAccessories, disallowedHBAccessories, newLights };
}

export class AccessoryGenerator {
	private readonly activeAccessories: Map<string, DeconzLightAccessory> = new Map();
	private refreshTimer: NodeJS.Timeout | null = null;
	private refreshing = false;

	constructor(
		private readonly platform: DeconzDynamicPlatform,
		public readonly hbAccessoriesFromDisk: Map<string, HomebridgeAccessory>,
		private readonly client: ILightClient,
	) {
		DCLogger.info('Accessory Generator Initialized');
	}

	/**
	 * @param isLaunch - counts missing lights towards pruning; false for periodic rescans
	 */
	public async discoverAccessories(isLaunch = true) {
		DCLogger.info('Loading lights from the deCONZ bridge...');

		let lights: ILight[];
		try {
			lights = await this.client.getLightList();
		} catch (error) {
			DCLogger.error('Unable to load lights from the deCONZ bridge:', error);
			if (isLaunch) {
				this.generateOfflineAccessories([...this.hbAccessoriesFromDisk.values()], false);
			}
			return;
		}

		const { onlineHBAccessories, offlineHBAccessories, disallowedHBAccessories, newLights } = partitionLights(
			lights,
			this.hbAccessoriesFromDisk,
			(light) => this.uuidFor(light),
			(light) => isAllowed(light, DCConfig.deviceManagement),
		);

		for (const hbAccessory of disallowedHBAccessories) {
			this.unregisterAccessory(hbAccessory, 'Light is excluded by the device list. Removing accessory.');
		}

		for (const [hbAccessory, light] of onlineHBAccessories) {
			hbAccessory.context.restartsSinceSeen = 0;
			const active = this.activeAccessories.get(hbAccessory.UUID);
			if (active) {
				active.updateLight(light);
			} else {
				hbAccessory.context.light = light;
				this.processAccessory(hbAccessory, 'Registering existing accessory.');
			}
		}

		const newHBAccessories = newLights.map((light) => this.generateNewHBAccessory(light));
		for (const hbAccessory of newHBAccessories) {
			this.processAccessory(hbAccessory, 'Registering new accessory.');
		}
		this.registerNewAccessories(newHBAccessories);

		if (isLaunch) {
			this.generateOfflineAccessories(offlineHBAccessories, true);
		}
		this.updateExistingAccessories(onlineHBAccessories.map(([hbAccessory]) => hbAccessory));
	}

	public startRefresh(intervalSeconds: number) {
		if (intervalSeconds <= 0) {
			return;
		}
		DCLogger.debug(`Refreshing lights every ${intervalSeconds} seconds.`);
		this.refreshTimer = setInterval(() => {
			void this.refreshAccessories();
		}, intervalSeconds * 1000);
	}

	public stopRefresh() {
		if (this.refreshTimer) {
			clearInterval(this.refreshTimer);
			this.refreshTimer = null;
		}
		this.activeAccessories.forEach((accessory) => accessory.dispose());
	}

	/**
	 * Picks up added and renamed lights, then reloads every light's state. Never rejects.
	 */
	public async refreshAccessories() {
		if (this.refreshing) {
			return;
		}
		this.refreshing = true;
		try {
			await this.discoverAccessories(false);
			await Promise.all([...this.activeAccessories.values()].map((accessory) => accessory.fetchDeviceState()));
		} catch (error) {
			DCLogger.error('Refreshing lights failed:', error);
		} finally {
			this.refreshing = false;
		}
	}

	private uuidFor(light: ILight): string {
		return this.platform.api.hap.uuid.generate(lightKey(light));
	}

	/**
	 * Lights that are cached but were not reported by the bridge. They stay
	 * in HomeKit as unreachable until pruned.
	 */
	private generateOfflineAccessories(offlineHBAccessories: HomebridgeAccessory[], countMissing: boolean) {
		const { pruneMissingLights, restartsBeforeMissingLightsPruned } = DCConfig.pruning;
		const keep: HomebridgeAccessory[] = [];

		for (const hbAccessory of offlineHBAccessories) {
			if (this.activeAccessories.has(hbAccessory.UUID)) {
				continue;
			}
			if (countMissing) {
				hbAccessory.context.restartsSinceSeen++;
			}
			if (pruneMissingLights && hbAccessory.context.restartsSinceSeen >= restartsBeforeMissingLightsPruned) {
				this.unregisterAccessory(hbAccessory, `Light has been missing for ${hbAccessory.context.restartsSinceSeen} restarts. Removing accessory.`);
				continue;
			}
			hbAccessory.context.isOnline = false;
			this.processAccessory(hbAccessory, 'Light unreachable. Registering accessory with cached information.');
			keep.push(hbAccessory);
		}
		this.updateExistingAccessories(keep);
	}

	private processAccessory(hbAccessory: HomebridgeAccessory, accessoryText: string) {
		const { displayName, light } = hbAccessory.context;
		DCLogger.info(`[${displayName}] [ID: ${light.id}] - ${accessoryText}`);
		try {
			const accessory = new DeconzLightAccessory(this.platform, hbAccessory, this.client);
			this.activeAccessories.set(hbAccessory.UUID, accessory);
		} catch (error) {
			DCLogger.error(`Error generating accessory for [${displayName}] [ID: ${light.id}]`, error);
		}
	}

	private generateNewHBAccessory(light: ILight): HomebridgeAccessory {
		const { api } = this.platform;
		const homebridgeUUID = this.uuidFor(light);
		const newHBAccessory = new api.platformAccessory<IAccessoryContext>(light.name, homebridgeUUID, api.hap.Categories.LIGHTBULB);
		newHBAccessory.context = {
			displayName: light.name,
			light,
			latestUpdate: Date.now(),
			isOnline: true,
			restartsSinceSeen: 0,
		};
		this.hbAccessoriesFromDisk.set(homebridgeUUID, newHBAccessory);
		return newHBAccessory;
	}

	private registerNewAccessories(newAccessories: HomebridgeAccessory[]) {
		if (newAccessories.length > 0) {
			this.platform.api.registerPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, newAccessories);
		}
	}

	private updateExistingAccessories(existingAccessories: HomebridgeAccessory[]) {
		if (existingAccessories.length > 0) {
			this.platform.api.updatePlatformAccessories(existingAccessories);
		}
	}

	private unregisterAccessory(existingAccessory: HomebridgeAccessory, reason: string) {
		this.platform.api.unregisterPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [existingAccessory]);
		this.activeAccessories.get(existingAccessory.UUID)?.dispose();
		this.activeAccessories.delete(existingAccessory.UUID);
		this.hbAccessoriesFromDisk.delete(existingAccessory.UUID);

		DCLogger.warn(`[${existingAccessory.context.displayName}] - ${reason}`);
	}
}
