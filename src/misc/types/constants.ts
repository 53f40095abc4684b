/*----------------------[DEFAULT VALUES]----------------------*/
import type { IAccessoryState } from './types';

export const DEFAULT_ACCESSORY_STATE: IAccessoryState = {
	isOn: true,
	HSV: {
		hue: 0,
		saturation: 0,
		value: 100,
	},
};

// keys Homebridge itself puts into every platform config
export const HOMEBRIDGE_CONFIG_KEYS = ['platform', 'name', '_bridge'];

export const COMMAND_DEBOUNCE_MS = 100;
export const FETCH_DEBOUNCE_MS = 100;
export const FETCH_RETRY_DELAY_MS = 500;
