import type { CharacteristicValue, Service } from 'homebridge';
import { cloneDeep, isEqual } from 'lodash';
import type { ILight, ILightCapabilities, ILightClient } from './deconz-interface/types';
import { lightCapabilities } from './deconz-interface/utils';
import { LightStateMachine } from './LightStateMachine';
import { DCLogger } from './misc/helpers/DCLogger';
import { accessoryStateToLightColor, lightStateToAccessoryState, sleep } from './misc/helpers/utils';
import { COMMAND_DEBOUNCE_MS, DEFAULT_ACCESSORY_STATE, FETCH_DEBOUNCE_MS, FETCH_RETRY_DELAY_MS } from './misc/types/constants';
import type { HomebridgeAccessory, IAccessoryState } from './misc/types/types';
import type { DeconzDynamicPlatform } from './platform';

export class DeconzLightAccessory {
	protected service: Service;
	protected readonly capabilities: ILightCapabilities;

	// what the user asked for
	public accessoryState: IAccessoryState;
	// what we believe the light is doing
	protected deviceState: IAccessoryState;

	protected sendStateDebounce: NodeJS.Timeout | null = null;
	protected fetchStateDebounce: NodeJS.Timeout | null = null;
	// commands sent to the bridge that have not been answered yet
	protected commandsInFlight = 0;

	constructor(
		protected readonly platform: DeconzDynamicPlatform,
		public hbAccessory: HomebridgeAccessory,
		protected readonly client: ILightClient,
	) {
		this.capabilities = lightCapabilities(hbAccessory.context.light);
		this.accessoryState = cloneDeep(DEFAULT_ACCESSORY_STATE);
		this.deviceState = cloneDeep(DEFAULT_ACCESSORY_STATE);
		this.service = this.initializeCharacteristics();
		this.scheduleFetchDeviceState();
	}

	/**
	 * Stops pending debounced work; used on Homebridge shutdown.
	 */
	dispose() {
		for (const timer of [this.sendStateDebounce, this.fetchStateDebounce]) {
			if (timer) {
				clearTimeout(timer);
			}
		}
		this.sendStateDebounce = null;
		this.fetchStateDebounce = null;
	}

	get displayName(): string {
		return this.hbAccessory.context.displayName;
	}

	setOn(value: CharacteristicValue) {
		this.accessoryState.isOn = Boolean(value);
		this.scheduleAccessoryCommand();
	}

	setHue(value: CharacteristicValue) {
		this.accessoryState.HSV.hue = Number(value);
		this.scheduleAccessoryCommand();
	}

	setSaturation(value: CharacteristicValue) {
		this.accessoryState.HSV.saturation = Number(value);
		this.scheduleAccessoryCommand();
	}

	setBrightness(value: CharacteristicValue) {
		this.accessoryState.HSV.value = Number(value);
		this.scheduleAccessoryCommand();
	}

	getOn(): boolean {
		this.assertReachable();
		this.scheduleFetchDeviceState();
		return this.accessoryState.isOn;
	}

	getHue(): number {
		this.assertReachable();
		this.scheduleFetchDeviceState();
		return this.accessoryState.HSV.hue;
	}

	getSaturation(): number {
		this.assertReachable();
		this.scheduleFetchDeviceState();
		return this.accessoryState.HSV.saturation;
	}

	getBrightness(): number {
		this.assertReachable();
		this.scheduleFetchDeviceState();
		return this.accessoryState.HSV.value;
	}

	private assertReachable() {
		if (!this.hbAccessory.context.isOnline) {
			this.scheduleFetchDeviceState();
			const { hap } = this.platform.api;
			throw new hap.HapStatusError(hap.HAPStatus.SERVICE_COMMUNICATION_FAILURE);
		}
	}

	private scheduleAccessoryCommand() {
		if (this.sendStateDebounce) {
			clearTimeout(this.sendStateDebounce);
		}

		this.sendStateDebounce = setTimeout(() => {
			this.sendStateDebounce = null;
			void this.processAccessoryCommand();
		}, COMMAND_DEBOUNCE_MS);
	}

	private scheduleFetchDeviceState() {
		if (this.fetchStateDebounce) {
			clearTimeout(this.fetchStateDebounce);
		}

		this.fetchStateDebounce = setTimeout(() => {
			this.fetchStateDebounce = null;
			void this.fetchDeviceState(2);
		}, FETCH_DEBOUNCE_MS);
	}

	/**
	 * Sends whatever the state machine decides is needed to move the light
	 * from its last known state to the requested one. Never rejects.
	 */
	protected async processAccessoryCommand(): Promise<void> {
		const targetState = cloneDeep(this.accessoryState);
		const { nextState, message } = LightStateMachine.nextState(targetState, this.deviceState);
		DCLogger.debug(`[${this.displayName}] - ${message}`);

		if (nextState === 'keepState') {
			return;
		}

		const { light } = this.hbAccessory.context;
		this.commandsInFlight++;
		try {
			if (nextState === 'setPower') {
				await this.client.setOnState(light, targetState.isOn);
				// colour changes made in the same burst were not sent
				this.deviceState.isOn = targetState.isOn;
			} else {
				if (!this.deviceState.isOn) {
					await this.client.setOnState(light, true);
					this.deviceState.isOn = true;
				}
				await this.client.setLightColor(light, accessoryStateToLightColor(targetState, this.capabilities.hasColor));
				this.deviceState = targetState;
			}
			this.markOnline(true);
		} catch (error) {
			this.markOnline(false);
			DCLogger.error(`[${this.displayName}] - Failed to update light:`, error);
		} finally {
			this.commandsInFlight--;
		}
	}

	public async fetchDeviceState(attempts = 1): Promise<void> {
		const { light } = this.hbAccessory.context;
		try {
			const lightState = await this.client.getLightState(light);
			const state = lightStateToAccessoryState(lightState);
			this.deviceState = cloneDeep(state);
			// a waiting or unanswered user change is newer than what the bridge reports
			if (this.sendStateDebounce === null && this.commandsInFlight === 0) {
				this.accessoryState = state;
			}
			this.markOnline(lightState.reachable);
		} catch (error) {
			if (attempts > 1) {
				await sleep(FETCH_RETRY_DELAY_MS);
				return this.fetchDeviceState(attempts - 1);
			}
			this.markOnline(false);
			DCLogger.debug(`[${this.displayName}] - Failed to fetch light state:`, error);
		}
		this.updateStateHomekitCharacteristic();
	}

	private markOnline(isOnline: boolean) {
		if (this.hbAccessory.context.isOnline !== isOnline) {
			DCLogger.info(`[${this.displayName}] - Light is now ${isOnline ? 'reachable' : 'unreachable'}.`);
		}
		this.hbAccessory.context.isOnline = isOnline;
		this.hbAccessory.context.latestUpdate = Date.now();
	}

	/**
	 * Called after a rescan found the light again, possibly renamed.
	 */
	public updateLight(light: ILight) {
		if (isEqual(light, this.hbAccessory.context.light)) {
			return;
		}
		this.hbAccessory.context.light = light;
		this.addAccessoryInformationCharacteristic();
	}

	updateStateHomekitCharacteristic() {
		const { isOn, HSV: { hue, saturation, value } } = this.accessoryState;
		const { Characteristic } = this.platform;
		this.service.updateCharacteristic(Characteristic.On, isOn);
		if (this.capabilities.hasBrightness) {
			this.service.updateCharacteristic(Characteristic.Brightness, value);
		}
		if (this.capabilities.hasColor) {
			this.service.updateCharacteristic(Characteristic.Hue, hue);
			this.service.updateCharacteristic(Characteristic.Saturation, saturation);
		}
	}

	initializeCharacteristics(): Service {
		const { Lightbulb, Switch } = this.platform.Service;
		this.addAccessoryInformationCharacteristic();

		let service: Service;
		if (this.capabilities.hasBrightness) {
			service = this.hbAccessory.getService(Lightbulb) ?? this.hbAccessory.addService(Lightbulb);
		} else {
			// on/off only, register it as a switch
			service = this.hbAccessory.getService(Switch) ?? this.hbAccessory.addService(Switch);
		}
		service.setCharacteristic(this.platform.Characteristic.Name, this.displayName);

		this.addOnCharacteristic(service);
		if (this.capabilities.hasBrightness) {
			this.addBrightnessCharacteristic(service);
		}
		if (this.capabilities.hasColor) {
			this.addHueCharacteristic(service);
			this.addSaturationCharacteristic(service);
		}
		return service;
	}

	addOnCharacteristic(service: Service) {
		service
			.getCharacteristic(this.platform.Characteristic.On)
			.onSet(this.setOn.bind(this))
			.onGet(this.getOn.bind(this));
	}

	addBrightnessCharacteristic(service: Service) {
		service
			.getCharacteristic(this.platform.Characteristic.Brightness)
			.onSet(this.setBrightness.bind(this))
			.onGet(this.getBrightness.bind(this));
	}

	addHueCharacteristic(service: Service) {
		service
			.getCharacteristic(this.platform.Characteristic.Hue)
			.onSet(this.setHue.bind(this))
			.onGet(this.getHue.bind(this));
	}

	addSaturationCharacteristic(service: Service) {
		service
			.getCharacteristic(this.platform.Characteristic.Saturation)
			.onSet(this.setSaturation.bind(this))
			.onGet(this.getSaturation.bind(this));
	}

	addAccessoryInformationCharacteristic() {
		const { light } = this.hbAccessory.context;
		const { Characteristic } = this.platform;
		this.hbAccessory
			.getService(this.platform.Service.AccessoryInformation)
			?.setCharacteristic(Characteristic.Manufacturer, light.manufacturer ?? 'deCONZ')
			.setCharacteristic(Characteristic.Model, light.model ?? light.type ?? 'Light')
			.setCharacteristic(Characteristic.SerialNumber, light.uniqueId ?? `deconz-light-${light.id}`);
	}
}
