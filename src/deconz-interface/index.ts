import { DeconzClient } from './DeconzClient';
import { DeconzError } from './DeconzError';
import { DemoLightClient } from './DemoLightClient';
import type { IConnectionOptions, ILightClient } from './types';

export * from './types';
export { DeconzClient, DEFAULT_TIMEOUT_MS } from './DeconzClient';
export type { IDeconzClientOptions } from './DeconzClient';
export { DeconzError } from './DeconzError';
export type { DeconzErrorKind } from './DeconzError';
export { DemoLightClient, DEMO_LIGHTS, DEMO_INITIAL_STATE, formatRequest } from './DemoLightClient';
export type { RequestSink } from './DemoLightClient';
export { searchLights, resolveLight, lightCapabilities, parseLightId, validateLightColor } from './utils';

export function createLightClient(connection: IConnectionOptions): ILightClient {
	if (connection.demoMode) {
		return new DemoLightClient();
	}
	if (connection.url.length === 0) {
		throw new DeconzError('InvalidArgument', 'Missing deCONZ url: configure it or set DECONZ_URL');
	}
	if (connection.token.length === 0) {
		throw new DeconzError('InvalidArgument', 'Missing deCONZ API token: configure it or set DECONZ_TOKEN');
	}
	return DeconzClient.loginWithToken(connection.url, connection.token, { timeoutMS: connection.timeoutMS });
}
