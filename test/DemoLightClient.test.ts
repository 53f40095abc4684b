import { expect } from 'chai';
import { DeconzError } from '../src/deconz-interface/DeconzError';
import { DEMO_LIGHTS, DemoLightClient, formatRequest } from '../src/deconz-interface/DemoLightClient';
import type { IBridgeRequest } from '../src/deconz-interface/types';
import { catchError } from './support';

function demoClient() {
	const requests: IBridgeRequest[] = [];
	const client = new DemoLightClient((request) => requests.push(request));
	return { client, requests };
}

describe('DemoLightClient', () => {
	it('lists the demo lights', async () => {
		const { client, requests } = demoClient();

		const lights = await client.getLightList();

		expect(lights.map((light) => light.name)).deep.equals(['Bathroom light', 'Outside lighting', 'Studio lamp']);
		expect(requests).deep.equals([{ method: 'GET', path: '/api/demo/lights' }]);
	});

	it('does not share the light list with callers', async () => {
		const { client } = demoClient();
		const lights = await client.getLightList();
		lights[0].name = 'Renamed';
		expect((await client.getLightList())[0].name).equals('Bathroom light');
	});

	it('starts every light on at full brightness', async () => {
		const { client, requests } = demoClient();
		const state = await client.getLightState(DEMO_LIGHTS[1]);
		expect(state).deep.equals({ on: true, reachable: true, hue: 0, bri: 255, sat: 200 });
		expect(requests).deep.equals([{ method: 'GET', path: '/api/demo/lights/2' }]);
	});

	it('remembers power changes', async () => {
		const { client, requests } = demoClient();

		await client.setOnState(DEMO_LIGHTS[1], false);

		expect(requests).deep.equals([{ method: 'PUT', path: '/api/demo/lights/2/state', body: { on: false } }]);
		expect((await client.getLightState(DEMO_LIGHTS[1])).on).equals(false);
		expect((await client.getLightState(DEMO_LIGHTS[0])).on).equals(true);
	});

	it('merges colour changes into the state', async () => {
		const { client, requests } = demoClient();

		await client.setLightColor(DEMO_LIGHTS[2], { hue: 1000 });

		expect(requests[0]).deep.equals({ method: 'PUT', path: '/api/demo/lights/3/state', body: { hue: 1000 } });
		expect(await client.getLightState(DEMO_LIGHTS[2])).deep.equals({ on: true, reachable: true, hue: 1000, bri: 255, sat: 200 });
	});

	it('rejects an invalid colour without a request', async () => {
		const { client, requests } = demoClient();
		const error = await catchError(client.setLightColor(DEMO_LIGHTS[0], { hue: 70000 }));
		expect(error).property('kind', 'InvalidArgument');
		expect(requests).length(0);
	});

	it('fails for a light it does not have', async () => {
		const { client, requests } = demoClient();

		const error = await catchError(client.setOnState({ id: 9, name: 'Garage' }, true));

		expect(error).instanceOf(DeconzError);
		expect(error).property('kind', 'HttpError');
		expect(error).property('status', 404);
		expect(error).property('message', 'Light 9 does not exist');
		expect(requests).length(0);
	});

	it('formats requests as one line', () => {
		expect(formatRequest({ method: 'GET', path: '/api/demo/lights' })).equals('GET /api/demo/lights');
		expect(formatRequest({ method: 'PUT', path: '/api/demo/lights/1/state', body: { on: true } }))
			.equals('PUT /api/demo/lights/1/state {"on":true}');
	});
});
