import type { PlatformAccessory } from 'homebridge';
import type { ILight } from '../../deconz-interface/types';

export type HomebridgeAccessory = PlatformAccessory<IAccessoryContext>;

// a type alias, not an interface: PlatformAccessory needs a context with an index signature
export type IAccessoryContext = {
	displayName: string;
	light: ILight;
	latestUpdate: number;
	isOnline: boolean;
	restartsSinceSeen: number;
};

export interface IAccessoryState {
	isOn: boolean;
	HSV: IColorHSV;
}

export interface IColorHSV {
	hue: number;
	saturation: number;
	value: number;
}

export interface IColorRGB {
	red: number;
	green: number;
	blue: number;
}
