import type { ILightColor, ILightState } from '../../deconz-interface/types';
import type { IAccessoryState, IColorHSV, IColorRGB } from '../types/types';

const DECONZ_MAX_HUE = 65535;
const DECONZ_MAX_LEVEL = 255;

export function clamp(value: number, min: number, max: number) {
	return Math.min(max, Math.max(min, value));
}

export const sleep = (ms: number) =>
	new Promise<void>((resolve) => {
		setTimeout(resolve, ms);
	});

/*
HSV to RGB conversion formula
When 0 ≤ H < 360, 0 ≤ S ≤ 1 and 0 ≤ V ≤ 1:
C = V × S
X = C × (1 - |(H / 60°) mod 2 - 1|)
m = V - C
(R,G,B) = ((R'+m)×255, (G'+m)×255, (B'+m)×255)
*/
export function HSVtoRGB(HSV: IColorHSV): IColorRGB {
	const H = clamp(HSV.hue, 0, 360);
	const S = clamp(HSV.saturation, 0, 100) / 100.0;
	const V = clamp(HSV.value, 0, 100) / 100.0;

	const C = V * S;
	const X = C * (1 - Math.abs(((H / 60) % 2) - 1));
	const m = V - C;

	let order: [number, number, number];
	if (H < 60) order = [C, X, 0];
	else if (H < 120) order = [X, C, 0];
	else if (H < 180) order = [0, C, X];
	else if (H < 240) order = [0, X, C];
	else if (H < 300) order = [X, 0, C];
	else order = [C, 0, X];

	const [dR, dG, dB] = order;
	return {
		red: Math.round((dR + m) * 255),
		green: Math.round((dG + m) * 255),
		blue: Math.round((dB + m) * 255),
	};
}

export function RGBtoHSV(RGB: IColorRGB): IColorHSV {
	const { red, green, blue } = RGB;
	const [dR, dG, dB] = [red / 255, green / 255, blue / 255];

	const Dmax = Math.max(dR, dG, dB);
	const Dmin = Math.min(dR, dG, dB);
	const D = Dmax - Dmin;

	let H: number;
	if (D === 0) H = 0;
	else if (Dmax === dR) H = ((dG - dB) / D) % 6;
	else if (Dmax === dG) H = (dB - dR) / D + 2;
	else H = (dR - dG) / D + 4;
	H *= 60;
	if (H < 0) H += 360;

	const V = Dmax;
	const S = V === 0 ? 0 : D / V;

	return { hue: H, saturation: S * 100, value: V * 100 };
}

/**
 * Accepts `#rrggbb` or `rrggbb`.
 */
export function hexToRGB(hex: string): IColorRGB {
	const match = /^#?([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(hex.trim());
	if (!match) {
		throw new Error(`Invalid color "${hex}", expected #rrggbb`);
	}
	return {
		red: parseInt(match[1], 16),
		green: parseInt(match[2], 16),
		blue: parseInt(match[3], 16),
	};
}

export function RGBtoHex({ red, green, blue }: IColorRGB): string {
	const toHex = (channel: number) => Math.round(clamp(channel, 0, 255)).toString(16).padStart(2, '0');
	return `#${toHex(red)}${toHex(green)}${toHex(blue)}`;
}

export function hsvToLightColor(HSV: IColorHSV): Required<ILightColor> {
	return {
		hue: Math.round((clamp(HSV.hue, 0, 360) / 360) * DECONZ_MAX_HUE),
		sat: Math.round((clamp(HSV.saturation, 0, 100) / 100) * DECONZ_MAX_LEVEL),
		bri: Math.round((clamp(HSV.value, 0, 100) / 100) * DECONZ_MAX_LEVEL),
	};
}

/**
 * Lights without colour report no hue/sat; plug-in units report no bri either.
 */
export function lightColorToHSV({ hue, sat, bri }: ILightColor): IColorHSV {
	return {
		hue: Math.round(((hue ?? 0) / DECONZ_MAX_HUE) * 360),
		saturation: Math.round(((sat ?? 0) / DECONZ_MAX_LEVEL) * 100),
		value: bri === undefined ? 100 : Math.round((bri / DECONZ_MAX_LEVEL) * 100),
	};
}

export function lightStateToAccessoryState(state: ILightState): IAccessoryState {
	return {
		isOn: state.on,
		HSV: lightColorToHSV(state),
	};
}

export function accessoryStateToLightColor(state: IAccessoryState, hasColor: boolean): ILightColor {
	const { hue, sat, bri } = hsvToLightColor(state.HSV);
	return hasColor ? { hue, sat, bri } : { bri };
}
