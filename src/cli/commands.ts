import type { Argv } from 'yargs';
import yargs from 'yargs/yargs';
import { createLightClient, DEFAULT_TIMEOUT_MS, DeconzError, DemoLightClient, formatRequest } from '../deconz-interface';
import type { IConnectionOptions, ILight, ILightClient, ILightState } from '../deconz-interface/types';
import { resolveLight, searchLights } from '../deconz-interface/utils';
import type { LogSink } from '../misc/helpers/DCLogger';
import { DCLogger } from '../misc/helpers/DCLogger';
import { hexToRGB, hsvToLightColor, RGBtoHSV } from '../misc/helpers/utils';

export interface ICliDependencies {
	env: NodeJS.ProcessEnv;
	stdout: (line: string) => void;
	stderr: (line: string) => void;
	logger?: LogSink;
	createClient?: (connection: IConnectionOptions) => ILightClient;
}

interface IGlobalOptions {
	url?: string;
	token?: string;
	demo: boolean;
	logLevel: number;
}

export function formatLightState(light: ILight, state: ILightState): string {
	const colorFields = (['hue', 'sat', 'bri'] as const)
		.filter((field) => state[field] !== undefined)
		.map((field) => ` ${field}=${state[field]}`)
		.join('');
	return `${light.name} (${light.id}): ${state.on ? 'on' : 'off'}, ${state.reachable ? 'reachable' : 'unreachable'}${colorFields}`;
}

function globalOptions(parser: Argv) {
	return parser.options({
		url: { type: 'string', describe: 'deCONZ REST API url, e.g. http://192.168.1.10 (env DECONZ_URL)' },
		token: { type: 'string', describe: 'deCONZ API token (env DECONZ_TOKEN)' },
		demo: { type: 'boolean', default: false, describe: 'Simulate a bridge and print the requests instead of sending them' },
		'log-level': { type: 'number', default: 3, describe: '0 silent, 1 error, 2 warn, 3 info, 4 debug, 5 trace' },
	});
}

/**
 * Runs one command line and resolves to the process exit code.
 */
export async function runCli(args: string[], deps: ICliDependencies): Promise<number> {
	const { env, stdout, stderr } = deps;
	const createClient = deps.createClient ?? ((connection: IConnectionOptions) => (
		connection.demoMode
			? new DemoLightClient((request) => stdout(`[Demo] ${formatRequest(request)}`))
			: createLightClient(connection)
	));

	const connect = (argv: IGlobalOptions): ILightClient => {
		new DCLogger(deps.logger ?? console, argv.logLevel);
		return createClient({
			url: (argv.url ?? env.DECONZ_URL ?? '').trim(),
			token: (argv.token ?? env.DECONZ_TOKEN ?? '').trim(),
			demoMode: argv.demo,
			timeoutMS: DEFAULT_TIMEOUT_MS,
		});
	};

	const findLight = async (client: ILightClient, ref: string): Promise<ILight> => resolveLight(await client.getLightList(), ref);

	const setPower = async (argv: IGlobalOptions & { light: string }, on: boolean) => {
		const client = connect(argv);
		const light = await findLight(client, argv.light);
		await client.setOnState(light, on);
		stdout(`${light.name} is now ${on ? 'on' : 'off'}`);
	};

	const parser = globalOptions(yargs(args))
		.scriptName('deconz-lights')
		.usage('$0 <command> [options]')
		.command(
			'list [query]',
			'List the lights, optionally only those whose name contains the query',
			(command) => command.positional('query', { type: 'string', default: '' }),
			async (argv) => {
				const lights = searchLights(await connect(argv).getLightList(), argv.query);
				if (lights.length === 0) {
					stdout('No lights found.');
					return;
				}
				lights.forEach((light) => stdout(`${light.id}: ${light.name}`));
			},
		)
		.command(
			'state <light>',
			'Show the state of a light, given by id or name',
			(command) => command.positional('light', { type: 'string', demandOption: true }),
			async (argv) => {
				const client = connect(argv);
				const light = await findLight(client, argv.light);
				stdout(formatLightState(light, await client.getLightState(light)));
			},
		)
		.command(
			'on <light>',
			'Switch a light on',
			(command) => command.positional('light', { type: 'string', demandOption: true }),
			(argv) => setPower(argv, true),
		)
		.command(
			'off <light>',
			'Switch a light off',
			(command) => command.positional('light', { type: 'string', demandOption: true }),
			(argv) => setPower(argv, false),
		)
		.command(
			'toggle <light>',
			'Switch a light on when it is off and off when it is on',
			(command) => command.positional('light', { type: 'string', demandOption: true }),
			async (argv) => {
				const client = connect(argv);
				const light = await findLight(client, argv.light);
				const { on } = await client.getLightState(light);
				await client.setOnState(light, !on);
				stdout(`${light.name} is now ${on ? 'off' : 'on'}`);
			},
		)
		.command(
			'color <light> <hex>',
			'Set the colour of a light from #rrggbb',
			(command) => command
				.positional('light', { type: 'string', demandOption: true })
				.positional('hex', { type: 'string', demandOption: true })
				.option('brightness', { type: 'number', describe: 'Brightness 0-100, overrides the brightness of the colour' }),
			async (argv) => {
				const hsv = RGBtoHSV(hexToRGB(argv.hex));
				if (argv.brightness !== undefined) {
					if (!(argv.brightness >= 0 && argv.brightness <= 100)) {
						throw new DeconzError('InvalidArgument', `--brightness must be between 0 and 100, got ${argv.brightness}`);
					}
					hsv.value = argv.brightness;
				}
				const color = hsvToLightColor(hsv);

				const client = connect(argv);
				const light = await findLight(client, argv.light);
				await client.setLightColor(light, color);
				stdout(`${light.name} set to hue=${color.hue} sat=${color.sat} bri=${color.bri}`);
			},
		)
		.check((argv) => {
			const logLevel = argv['log-level'];
			if (!Number.isInteger(logLevel) || logLevel < 0 || logLevel > 5) {
				throw new Error(`--log-level must be an integer between 0 and 5, got ${logLevel}`);
			}
			return true;
		})
		.demandCommand(1, 'Specify a command')
		.strict()
		.version(false)
		.exitProcess(false)
		.fail((message, error) => {
			throw error ?? new Error(message);
		});

	try {
		await parser.parseAsync();
		return 0;
	} catch (error) {
		stderr(`Error: ${error instanceof Error ? error.message : String(error)}`);
		return 1;
	}
}
