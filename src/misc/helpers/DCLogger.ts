import type { Logging } from 'homebridge';

/**
 * Where log lines end up: the Homebridge `Logging` instance when running as a
 * plugin, `console` when running from the command line.
 */
export type LogSink = Pick<Logging, 'info' | 'warn' | 'error'>;

export class DCLogger {
	private static instance: DCLogger | undefined;

	constructor(private readonly logger: LogSink, private readonly level = 3) {
		DCLogger.instance = this;
	}

	static get level(): number {
		return DCLogger.instance?.level ?? 0;
	}

	static trace(message: string, ...parameters: unknown[]) {
		if (DCLogger.level >= 5) {
			DCLogger.instance?.logger.info('[Trace]', message, ...parameters);
		}
	}

	static debug(message: string, ...parameters: unknown[]) {
		if (DCLogger.level >= 4) {
			DCLogger.instance?.logger.info('[Debug]', message, ...parameters);
		}
	}

	static info(message: string, ...parameters: unknown[]) {
		if (DCLogger.level >= 3) {
			DCLogger.instance?.logger.info('[Info]', message, ...parameters);
		}
	}

	static warn(message: string, ...parameters: unknown[]) {
		if (DCLogger.level >= 2) {
			DCLogger.instance?.logger.warn('[Warning]', message, ...parameters);
		}
	}

	static error(message: string, ...parameters: unknown[]) {
		if (DCLogger.level >= 1) {
			DCLogger.instance?.logger.error('[Error]', message, ...parameters);
		}
	}
}
