import { cloneDeep } from 'lodash';
import { DCLogger } from '../misc/helpers/DCLogger';
import { DeconzError } from './DeconzError';
import type { IBridgeRequest, ILight, ILightClient, ILightColor, ILightState } from './types';
import { apiPath, lightResource, lightStateResource, validateLightColor } from './utils';

export const DEMO_USERNAME = 'demo';

export const DEMO_LIGHTS: readonly ILight[] = [
	{ id: 1, name: 'Bathroom light', type: 'Extended color light', hasColor: true },
	{ id: 2, name: 'Outside lighting', type: 'Extended color light', hasColor: true },
	{ id: 3, name: 'Studio lamp', type: 'Extended color light', hasColor: true },
];

export const DEMO_INITIAL_STATE: Readonly<ILightState> = {
	on: true,
	reachable: true,
	hue: 0,
	bri: 255,
	sat: 200,
};

export type RequestSink = (request: IBridgeRequest) => void;

export function formatRequest({ method, path, body }: IBridgeRequest): string {
	return body === undefined ? `${method} ${path}` : `${method} ${path} ${JSON.stringify(body)}`;
}

const logRequest: RequestSink = (request) => DCLogger.info(`[Demo] ${formatRequest(request)}`);

/**
 * Stands in for a bridge: light state lives in memory and every request that
 * would have been sent is handed to the request sink instead.
 */
export class DemoLightClient implements ILightClient {
	private readonly states = new Map<number, ILightState>();

	constructor(private readonly onRequest: RequestSink = logRequest) {
		for (const light of DEMO_LIGHTS) {
			this.states.set(light.id, { ...DEMO_INITIAL_STATE });
		}
	}

	async getLightList(): Promise<ILight[]> {
		this.report('GET', 'lights');
		return cloneDeep([...DEMO_LIGHTS]);
	}

	async setOnState(light: ILight, on: boolean): Promise<void> {
		const state = this.stateOf(light);
		this.report('PUT', lightStateResource(light), { on });
		state.on = on;
	}

	async setLightColor(light: ILight, color: ILightColor): Promise<void> {
		const body = validateLightColor(color);
		const state = this.stateOf(light);
		this.report('PUT', lightStateResource(light), body);
		Object.assign(state, body);
	}

	async getLightState(light: ILight): Promise<ILightState> {
		const state = this.stateOf(light);
		this.report('GET', lightResource(light));
		return { ...state };
	}

	private stateOf(light: ILight): ILightState {
		const state = this.states.get(light.id);
		if (!state) {
			throw new DeconzError('HttpError', `Light ${light.id} does not exist`, { status: 404 });
		}
		return state;
	}

	private report(method: IBridgeRequest['method'], resource: string, body?: object) {
		const path = `/${apiPath(DEMO_USERNAME, resource)}`;
		this.onRequest(body === undefined ? { method, path } : { method, path, body });
	}
}
