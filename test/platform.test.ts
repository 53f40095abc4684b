import { expect } from 'chai';
import { DEMO_LIGHTS, DemoLightClient } from '../src/deconz-interface/DemoLightClient';
import { cachedAccessory, createPlatform, QUIET_DEMO_CONFIG } from './homebridge';

describe('DeconzDynamicPlatform', () => {
	it('restores cached lights and sets aside accessories it cannot read', () => {
		const { api, platform } = createPlatform();
		const bathroom = cachedAccessory(api, DEMO_LIGHTS[0]);
		const stale = new api.platformAccessory('Old strip', api.hap.uuid.generate('old-strip'));

		platform.configureAccessory(bathroom);
		platform.configureAccessory(stale);

		expect([...platform.hbAccessoriesFromDisk.keys()]).deep.equals([bathroom.UUID]);
		expect(platform.staleAccessories).length(1);
		expect(platform.staleAccessories[0]).equals(stale);
	});

	it('removes unreadable accessories on launch', async () => {
		const { api, platform, calls } = createPlatform();
		platform.configureAccessory(new api.platformAccessory('Old strip', api.hap.uuid.generate('old-strip')));

		await platform.initializePlatform(new DemoLightClient(() => {}));
		api.emit('shutdown');

		expect(calls.unregistered).deep.equals(['Old strip']);
		expect(calls.registered).deep.equals(['Bathroom light', 'Outside lighting', 'Studio lamp']);
		expect(platform.staleAccessories).deep.equals([]);
	});

	it('still cleans up the cache when the connection is not configured', () => {
		const { api, platform, calls } = createPlatform({
			platform: 'DeconzLights',
			advancedOptions: { logLevel: 0, refreshIntervalSeconds: 0 },
		});
		platform.configureAccessory(new api.platformAccessory('Old strip', api.hap.uuid.generate('old-strip')));

		api.emit('didFinishLaunching');

		expect(calls.unregistered).deep.equals(['Old strip']);
		expect(calls.registered).deep.equals([]);
	});

	it('registers the demo lights once Homebridge has launched', async () => {
		const { api, calls } = createPlatform(QUIET_DEMO_CONFIG);

		api.emit('didFinishLaunching');
		await new Promise<void>((resolve) => setImmediate(resolve));
		api.emit('shutdown');

		expect(calls.registered).deep.equals(['Bathroom light', 'Outside lighting', 'Studio lamp']);
	});
});
