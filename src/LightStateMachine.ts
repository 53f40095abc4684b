import { isEqual } from 'lodash';
import type { IAccessoryState } from './misc/types/types';

export type LightCommand = 'setColor' | 'setPower' | 'keepState';

export interface ILightStateMachine {
	nextState: LightCommand;
	message: string;
}

function describeTransition(from: IAccessoryState, to: IAccessoryState): string {
	return `on ${from.isOn}>${to.isOn}, hue ${from.HSV.hue}>${to.HSV.hue}, sat ${from.HSV.saturation}>${to.HSV.saturation}, bri ${from.HSV.value}>${to.HSV.value}`;
}

/**
 * Picks the request that takes a light from the state the bridge last
 * confirmed to the one HomeKit asked for.
 */
export class LightStateMachine {
	static nextState(target: IAccessoryState, current: IAccessoryState): ILightStateMachine {
		const transition = describeTransition(current, target);
		const colorChanged = !isEqual(target.HSV, current.HSV);

		if (!target.isOn) {
			// a light that is off has no colour to show; it is sent when switched on
			return current.isOn
				? { nextState: 'setPower', message: `Switch off (${transition})` }
				: { nextState: 'keepState', message: `Stays off (${transition})` };
		}
		if (!colorChanged) {
			return current.isOn
				? { nextState: 'keepState', message: `Nothing to send (${transition})` }
				: { nextState: 'setPower', message: `Switch on (${transition})` };
		}
		return { nextState: 'setColor', message: `Set color (${transition})` };
	}
}
