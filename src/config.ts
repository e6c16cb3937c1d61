/**
 * Layout defaults and runtime configuration.
 *
 * Every value here can be overridden through the options of the function
 * that uses it; the environment only supplies process-wide defaults.
 */

import type { RoundingPolicy } from './types';

/** Column counts the gallery lays out for, smallest first */
export const DEFAULT_BREAKPOINTS: readonly number[] = [3, 4, 5, 8, 12];

/** Cells on the short edge of a photo */
export const DEFAULT_SHORT_EDGE = 2;

export const DEFAULT_ROUNDING: RoundingPolicy = 'ceil';

export interface RuntimeConfig {
	/** Emit debug log lines */
	debug: boolean;
	/** Track item consumption while resolving placements */
	checkInvariants: boolean;
}

function readFlag(value: string | undefined): boolean | undefined {
	if (value === undefined || value === '') return undefined;
	return !['0', 'false', 'off', 'no'].includes(value.toLowerCase());
}

/**
 * Resolve runtime configuration from an environment map.
 * Invariant checks are on unless NODE_ENV is production.
 */
export function resolveRuntimeConfig(
	env: Record<string, string | undefined> = process.env,
): RuntimeConfig {
	return {
		debug: readFlag(env.PHOTOGRID_DEBUG) ?? false,
		checkInvariants:
			readFlag(env.PHOTOGRID_CHECK_INVARIANTS) ?? env.NODE_ENV !== 'production',
	};
}

export const runtimeConfig: Readonly<RuntimeConfig> = resolveRuntimeConfig();
