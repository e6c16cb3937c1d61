/**
 * Text forms of aspect ratios (`W:H`) and dimensions (`WxH`), as found in
 * configuration and image metadata strings.
 */

import { err, ok, type Result } from 'neverthrow';
import type { ParseError } from './errors';
import type { AspectRatio, Dimension } from './types';

const DIGITS = /^\d+$/;

function parseInteger(part: string, input: string): Result<number, ParseError> {
	const value = Number(part);
	if (!DIGITS.test(part) || !Number.isSafeInteger(value)) {
		return err({
			type: 'ParseInt',
			input,
			message: `"${part}" is not a non-negative integer`,
		});
	}
	return ok(value);
}

function parsePair(
	input: string,
	separator: string,
): Result<{ width: number; height: number }, ParseError> {
	const parts = input.split(separator);
	if (parts.length !== 2) {
		return err({
			type: 'Separator',
			input,
			message:
				parts.length < 2
					? `missing "${separator}" separator`
					: `unexpected content after "${parts.slice(0, 2).join(separator)}"`,
		});
	}

	const [first, second] = parts;
	return parseInteger(first, input).andThen((width) =>
		parseInteger(second, input).map((height) => ({ width, height })),
	);
}

/**
 * Parse `W:H`, e.g. `3:2`
 */
export function parseAspectRatio(input: string): Result<AspectRatio, ParseError> {
	return parsePair(input, ':');
}

/**
 * Parse `WxH`, e.g. `3600x2401`
 */
export function parseDimension(input: string): Result<Dimension, ParseError> {
	return parsePair(input, 'x');
}

export function formatAspectRatio(ratio: AspectRatio): string {
	return `${ratio.width}:${ratio.height}`;
}

export function formatDimension(dimension: Dimension): string {
	return `${dimension.width}x${dimension.height}`;
}
