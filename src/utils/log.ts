import { runtimeConfig } from '../config';

export interface Logger {
	debug(...args: unknown[]): void;
	warn(...args: unknown[]): void;
	error(...args: unknown[]): void;
}

/**
 * Scoped console logger. Lines are prefixed with `[scope]`;
 * debug output only appears when debugging is enabled.
 */
export function createLogger(
	scope: string,
	debug: boolean = runtimeConfig.debug,
): Logger {
	const prefix = `[${scope}]`;
	return {
		debug(...args: unknown[]) {
			if (debug) console.log(prefix, ...args);
		},
		warn(...args: unknown[]) {
			console.warn(prefix, ...args);
		},
		error(...args: unknown[]) {
			console.error(prefix, ...args);
		},
	};
}
