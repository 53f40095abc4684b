import type { API } from 'homebridge';
import { DeconzDynamicPlatform } from './platform';
import { PLATFORM_NAME } from './settings';

export = (api: API) => {
	api.registerPlatform(PLATFORM_NAME, DeconzDynamicPlatform);
};
