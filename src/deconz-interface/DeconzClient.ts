import axios from 'axios';
import type { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';
import Queue from 'promise-queue';
import { DCLogger } from '../misc/helpers/DCLogger';
import { DeconzError } from './DeconzError';
import { bridgeErrorListSchema, describeIssues, lightDetailsSchema, lightListSchema } from './schemas';
import type { ILight, ILightClient, ILightColor, ILightState, RequestMethod } from './types';
import { apiPath, lightResource, lightStateResource, parseLightId, validateLightColor } from './utils';

export const DEFAULT_TIMEOUT_MS = 5000;

export interface IDeconzClientOptions {
	timeoutMS?: number;
	adapter?: AxiosAdapter;
}

/**
 * An authorized client for a deCONZ bridge.
 */
export class DeconzClient implements ILightClient {
	private readonly http: AxiosInstance;
	// state writes go out one at a time, in call order
	private readonly queue = new Queue(1, Infinity);

	constructor(public readonly url: URL, public readonly username: string, options: IDeconzClientOptions = {}) {
		this.http = axios.create({
			baseURL: url.toString(),
			timeout: options.timeoutMS ?? DEFAULT_TIMEOUT_MS,
			headers: { 'Content-Type': 'application/json' },
			// status codes are checked in request() so bridge error bodies can be read
			validateStatus: () => true,
			...(options.adapter ? { adapter: options.adapter } : {}),
		});
	}

	/**
	 * Creates a client from an existing API token ("username").
	 * The token is not checked against the bridge.
	 */
	static loginWithToken(url: string, token: string, options: IDeconzClientOptions = {}): DeconzClient {
		let parsed: URL;
		try {
			parsed = new URL(url);
		} catch (error) {
			throw new DeconzError('InvalidArgument', `Invalid deCONZ url "${url}"`, { cause: error });
		}
		if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
			throw new DeconzError('InvalidArgument', `Unsupported protocol "${parsed.protocol}" in deCONZ url`);
		}
		if (token.trim().length === 0) {
			throw new DeconzError('InvalidArgument', 'The deCONZ API token must not be empty');
		}
		return new DeconzClient(parsed, token.trim(), options);
	}

	async getLightList(): Promise<ILight[]> {
		const response = await this.request('GET', 'lights');
		const parsed = lightListSchema.safeParse(response.data);
		if (!parsed.success) {
			throw new DeconzError('ResponseParseError', `Unexpected light list: ${describeIssues(parsed.error)}`);
		}

		const lights: ILight[] = Object.entries(parsed.data).map(([key, entry]) => ({
			id: parseLightId(key),
			name: entry.name,
			type: entry.type,
			manufacturer: entry.manufacturername,
			model: entry.modelid,
			uniqueId: entry.uniqueid,
			hasColor: entry.hascolor,
		}));
		return lights.sort((a, b) => a.id - b.id);
	}

	async setOnState(light: ILight, on: boolean): Promise<void> {
		await this.queue.add(() => this.request('PUT', lightStateResource(light), { on }));
	}

	async setLightColor(light: ILight, color: ILightColor): Promise<void> {
		const body = validateLightColor(color);
		await this.queue.add(() => this.request('PUT', lightStateResource(light), body));
	}

	async getLightState(light: ILight): Promise<ILightState> {
		DCLogger.debug(`Loading light state for light id ${light.id}`);
		const response = await this.request('GET', lightResource(light));
		const parsed = lightDetailsSchema.safeParse(response.data);
		if (!parsed.success) {
			throw new DeconzError('ResponseParseError', `Unexpected state for light ${light.id}: ${describeIssues(parsed.error)}`);
		}
		return parsed.data.state;
	}

	/**
	 * Sends a request for `resource` (relative to the token's API root, e.g. `lights/3`).
	 * Error messages name the resource only, never the token.
	 */
	private async request(method: RequestMethod, resource: string, body?: object): Promise<AxiosResponse<unknown>> {
		const path = `/${resource}`;
		DCLogger.trace(`${method} ${path}`, body ?? '');
		let response: AxiosResponse<unknown>;
		try {
			response = await this.http.request<unknown>({ method, url: apiPath(this.username, resource), data: body });
		} catch (error) {
			const reason = error instanceof Error ? error.message : String(error);
			throw new DeconzError('HttpError', `${method} ${path} failed: ${reason}`, { cause: error });
		}

		if (response.status < 200 || response.status >= 300) {
			const bridgeErrors = bridgeErrorListSchema.safeParse(response.data);
			const reason = bridgeErrors.success ? bridgeErrors.data[0].error.description : `HTTP ${response.status}`;
			throw new DeconzError('HttpError', `${method} ${path} failed: ${reason}`, { status: response.status });
		}
		return response;
	}
}
