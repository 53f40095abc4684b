import type { AxiosAdapter } from 'axios';
import type { LogSink } from '../src/misc/helpers/DCLogger';

export async function catchError(promise: Promise<unknown>): Promise<unknown> {
	try {
		await promise;
	} catch (error) {
		return error;
	}
	throw new Error('Expected the promise to reject');
}

export function catchSyncError(fn: () => unknown): unknown {
	try {
		fn();
	} catch (error) {
		return error;
	}
	throw new Error('Expected the call to throw');
}

export interface IRecordedRequest {
	method: string;
	url: string;
	body: unknown;
}

export interface IFakeResponse {
	status: number;
	data: unknown;
}

/**
 * An in-process bridge: answers every request through `respond` and keeps
 * what was asked for.
 */
export function fakeBridge(respond: (request: IRecordedRequest) => IFakeResponse | Promise<IFakeResponse>) {
	const requests: IRecordedRequest[] = [];
	const adapter: AxiosAdapter = async (config) => {
		const request: IRecordedRequest = {
			method: (config.method ?? 'get').toUpperCase(),
			url: config.url ?? '',
			body: typeof config.data === 'string' ? JSON.parse(config.data) : undefined,
		};
		requests.push(request);
		const { status, data } = await respond(request);
		return { data, status, statusText: String(status), headers: {}, config };
	};
	return { adapter, requests };
}

export function captureLog() {
	const lines: string[] = [];
	const record = (message: string, ...parameters: unknown[]) => {
		lines.push([message, ...parameters].map(String).join(' '));
	};
	const sink: LogSink = { info: record, warn: record, error: record };
	return { sink, lines };
}
