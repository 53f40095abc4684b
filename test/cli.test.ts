import { expect } from 'chai';
import { runCli } from '../src/cli/commands';
import type { ICliDependencies } from '../src/cli/commands';
import { DemoLightClient } from '../src/deconz-interface/DemoLightClient';
import type { IConnectionOptions } from '../src/deconz-interface/types';

async function run(args: string[], overrides: Partial<ICliDependencies> = {}) {
	const stdout: string[] = [];
	const stderr: string[] = [];
	const exitCode = await runCli(args, {
		env: {},
		stdout: (line) => stdout.push(line),
		stderr: (line) => stderr.push(line),
		...overrides,
	});
	return { exitCode, stdout, stderr };
}

const demo = (...args: string[]) => run(['--demo', '--log-level', '0', ...args]);

describe('deconz-lights', () => {
	describe('list', () => {
		it('prints every light', async () => {
			const { exitCode, stdout, stderr } = await demo('list');
			expect(exitCode).equals(0);
			expect(stderr).deep.equals([]);
			expect(stdout).deep.equals([
				'[Demo] GET /api/demo/lights',
				'1: Bathroom light',
				'2: Outside lighting',
				'3: Studio lamp',
			]);
		});

		it('filters by name', async () => {
			expect((await demo('list', 'LAMP')).stdout).deep.equals(['[Demo] GET /api/demo/lights', '3: Studio lamp']);
		});

		it('says so when nothing matches', async () => {
			expect((await demo('list', 'garage')).stdout).deep.equals(['[Demo] GET /api/demo/lights', 'No lights found.']);
		});
	});

	it('prints the state of a light', async () => {
		const { exitCode, stdout } = await demo('state', '2');
		expect(exitCode).equals(0);
		expect(stdout).deep.equals([
			'[Demo] GET /api/demo/lights',
			'[Demo] GET /api/demo/lights/2',
			'Outside lighting (2): on, reachable hue=0 sat=200 bri=255',
		]);
	});

	it('switches a light off by name', async () => {
		const { exitCode, stdout } = await demo('off', 'bathroom');
		expect(exitCode).equals(0);
		expect(stdout).deep.equals([
			'[Demo] GET /api/demo/lights',
			'[Demo] PUT /api/demo/lights/1/state {"on":false}',
			'Bathroom light is now off',
		]);
	});

	it('switches a light on', async () => {
		expect((await demo('on', 'studio')).stdout.slice(1)).deep.equals([
			'[Demo] PUT /api/demo/lights/3/state {"on":true}',
			'Studio lamp is now on',
		]);
	});

	it('toggles a light from its current state', async () => {
		const { stdout } = await demo('toggle', '1');
		expect(stdout).deep.equals([
			'[Demo] GET /api/demo/lights',
			'[Demo] GET /api/demo/lights/1',
			'[Demo] PUT /api/demo/lights/1/state {"on":false}',
			'Bathroom light is now off',
		]);
	});

	describe('color', () => {
		it('sends the colour with the given brightness', async () => {
			const { exitCode, stdout } = await demo('color', 'studio', '#00ff00', '--brightness', '50');
			expect(exitCode).equals(0);
			expect(stdout).deep.equals([
				'[Demo] GET /api/demo/lights',
				'[Demo] PUT /api/demo/lights/3/state {"hue":21845,"bri":128,"sat":255}',
				'Studio lamp set to hue=21845 sat=255 bri=128',
			]);
		});

		it('uses the brightness of the colour by default', async () => {
			const { stdout } = await demo('color', '3', '0000ff');
			expect(stdout[2]).equals('Studio lamp set to hue=43690 sat=255 bri=255');
		});

		it('rejects an invalid colour', async () => {
			const { exitCode, stdout, stderr } = await demo('color', '1', 'blue');
			expect(exitCode).equals(1);
			expect(stdout).deep.equals([]);
			expect(stderr).deep.equals(['Error: Invalid color "blue", expected #rrggbb']);
		});

		it('rejects a brightness out of range', async () => {
			const { exitCode, stderr } = await demo('color', '1', '#ffffff', '--brightness', '120');
			expect(exitCode).equals(1);
			expect(stderr).deep.equals(['Error: --brightness must be between 0 and 100, got 120']);
		});
	});

	describe('errors', () => {
		it('names the lights an ambiguous name matches', async () => {
			const { exitCode, stderr } = await demo('on', 'light');
			expect(exitCode).equals(1);
			expect(stderr).deep.equals(['Error: "light" matches several lights: Bathroom light, Outside lighting']);
		});

		it('needs a url outside demo mode', async () => {
			const { exitCode, stderr } = await run(['--log-level', '0', 'list']);
			expect(exitCode).equals(1);
			expect(stderr).deep.equals(['Error: Missing deCONZ url: configure it or set DECONZ_URL']);
		});

		it('needs a command', async () => {
			const { exitCode, stderr } = await run([]);
			expect(exitCode).equals(1);
			expect(stderr).deep.equals(['Error: Specify a command']);
		});

		it('rejects an unknown log level', async () => {
			const { exitCode, stderr } = await run(['--demo', '--log-level', '9', 'list']);
			expect(exitCode).equals(1);
			expect(stderr).deep.equals(['Error: --log-level must be an integer between 0 and 5, got 9']);
		});
	});

	describe('connection', () => {
		async function connectionFor(args: string[], env: NodeJS.ProcessEnv) {
			const connections: IConnectionOptions[] = [];
			const { exitCode } = await run(args, {
				env,
				createClient: (connection) => {
					connections.push(connection);
					return new DemoLightClient(() => {});
				},
			});
			expect(exitCode).equals(0);
			return connections;
		}

		it('reads url and token from the environment', async () => {
			const connections = await connectionFor(['--log-level', '0', 'list'], {
				DECONZ_URL: 'http://bridge.test',
				DECONZ_TOKEN: 'test-secret',
			});
			expect(connections).deep.equals([{ url: 'http://bridge.test', token: 'test-secret', demoMode: false, timeoutMS: 5000 }]);
		});

		it('prefers the command line over the environment', async () => {
			const connections = await connectionFor(['--url', 'http://other.test', '--token', 'other-secret', '--log-level', '0', 'list'], {
				DECONZ_URL: 'http://bridge.test',
				DECONZ_TOKEN: 'test-secret',
			});
			expect(connections[0]).include({ url: 'http://other.test', token: 'other-secret' });
		});
	});
});
