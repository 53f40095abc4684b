import { expect } from 'chai';
import {
	accessoryStateToLightColor,
	hexToRGB,
	hsvToLightColor,
	HSVtoRGB,
	lightColorToHSV,
	lightStateToAccessoryState,
	RGBtoHex,
	RGBtoHSV,
} from '../src/misc/helpers/utils';
import { catchSyncError } from './support';

describe('colour conversion', () => {
	describe('hex', () => {
		it('reads #rrggbb with or without the hash', () => {
			expect(hexToRGB('#ff8000')).deep.equals({ red: 255, green: 128, blue: 0 });
			expect(hexToRGB('00FF7f')).deep.equals({ red: 0, green: 255, blue: 127 });
		});

		it('rejects anything else', () => {
			const error = catchSyncError(() => hexToRGB('#fff'));
			expect(error).property('message', 'Invalid color "#fff", expected #rrggbb');
		});

		it('writes lower case hex', () => {
			expect(RGBtoHex({ red: 255, green: 128, blue: 0 })).equals('#ff8000');
			expect(RGBtoHex({ red: 300, green: -4, blue: 10.4 })).equals('#ff000a');
		});
	});

	describe('HSV and RGB', () => {
		it('converts HSV to RGB', () => {
			expect(HSVtoRGB({ hue: 0, saturation: 100, value: 100 })).deep.equals({ red: 255, green: 0, blue: 0 });
			expect(HSVtoRGB({ hue: 120, saturation: 100, value: 50 })).deep.equals({ red: 0, green: 128, blue: 0 });
			expect(HSVtoRGB({ hue: 200, saturation: 0, value: 100 })).deep.equals({ red: 255, green: 255, blue: 255 });
		});

		it('converts RGB to HSV', () => {
			expect(RGBtoHSV({ red: 0, green: 0, blue: 255 })).deep.equals({ hue: 240, saturation: 100, value: 100 });
			expect(RGBtoHSV({ red: 0, green: 255, blue: 0 })).deep.equals({ hue: 120, saturation: 100, value: 100 });
			expect(RGBtoHSV({ red: 0, green: 0, blue: 0 })).deep.equals({ hue: 0, saturation: 0, value: 0 });
		});
	});

	describe('deCONZ colour', () => {
		it('scales HSV to the bridge ranges', () => {
			expect(hsvToLightColor({ hue: 0, saturation: 100, value: 100 })).deep.equals({ hue: 0, sat: 255, bri: 255 });
			expect(hsvToLightColor({ hue: 120, saturation: 100, value: 100 })).deep.equals({ hue: 21845, sat: 255, bri: 255 });
			expect(hsvToLightColor({ hue: 240, saturation: 0, value: 50 })).deep.equals({ hue: 43690, sat: 0, bri: 128 });
		});

		it('clamps out of range values', () => {
			expect(hsvToLightColor({ hue: 400, saturation: -5, value: 150 })).deep.equals({ hue: 65535, sat: 0, bri: 255 });
		});

		it('scales bridge values back to HSV', () => {
			expect(lightColorToHSV({ hue: 21845, sat: 255, bri: 128 })).deep.equals({ hue: 120, saturation: 100, value: 50 });
		});

		it('reads missing fields as white at full brightness', () => {
			expect(lightColorToHSV({})).deep.equals({ hue: 0, saturation: 0, value: 100 });
		});

		it('maps a light state to an accessory state', () => {
			expect(lightStateToAccessoryState({ on: false, reachable: true, bri: 0 }))
				.deep.equals({ isOn: false, HSV: { hue: 0, saturation: 0, value: 0 } });
		});

		it('sends only brightness to lights without colour', () => {
			const state = { isOn: true, HSV: { hue: 120, saturation: 100, value: 50 } };
			expect(accessoryStateToLightColor(state, true)).deep.equals({ hue: 21845, sat: 255, bri: 128 });
			expect(accessoryStateToLightColor(state, false)).deep.equals({ bri: 128 });
		});
	});
});
