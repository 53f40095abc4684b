export interface ILight {
	id: number;
	name: string;
	type?: string;
	manufacturer?: string;
	model?: string;
	uniqueId?: string;
	hasColor?: boolean;
}

/**
 * hue: 0-65535, bri and sat: 0-255.
 * Absent when the bridge does not report them for the light.
 */
export interface ILightState {
	on: boolean;
	reachable: boolean;
	hue?: number;
	bri?: number;
	sat?: number;
}

export interface ILightColor {
	hue?: number;
	bri?: number;
	sat?: number;
}

export interface ILightCapabilities {
	hasColor: boolean;
	hasBrightness: boolean;
}

export interface ILightClient {
	getLightList(): Promise<ILight[]>;
	setOnState(light: ILight, on: boolean): Promise<void>;
	setLightColor(light: ILight, color: ILightColor): Promise<void>;
	getLightState(light: ILight): Promise<ILightState>;
}

export interface IConnectionOptions {
	url: string;
	token: string;
	demoMode: boolean;
	timeoutMS: number;
}

export type RequestMethod = 'GET' | 'PUT';

export interface IBridgeRequest {
	method: RequestMethod;
	path: string;
	body?: object;
}
