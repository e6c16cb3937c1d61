/**
 * Cell sizing for photos.
 *
 * Converts pixel dimensions and aspect ratios into small integer cell
 * footprints. Everything here is pure and returns fresh values.
 */

import { DEFAULT_ROUNDING, DEFAULT_SHORT_EDGE } from './config';
import { LayoutInvariantError } from './errors';
import type {
	AspectRatio,
	ClampConfig,
	Dimension,
	Orientation,
	RoundingPolicy,
	Size,
} from './types';

export function gcd(a: number, b: number): number {
	let x = Math.abs(a);
	let y = Math.abs(b);
	while (y !== 0) {
		[x, y] = [y, x % y];
	}
	return x;
}

/**
 * Fixed cell size
 */
export function cellSize(width: number, height: number): Size {
	return {
		width: () => width,
		height: () => height,
	};
}

export function dimensionSize(dimension: Dimension): Size {
	return cellSize(dimension.width, dimension.height);
}

export function toDimension(size: Size): Dimension {
	return { width: size.width(), height: size.height() };
}

/**
 * Landscape when width >= height, so squares count as landscape
 */
export function orientationOf(size: Size): Orientation {
	return size.width() >= size.height() ? 'landscape' : 'portrait';
}

function reduce(width: number, height: number): AspectRatio {
	const divisor = gcd(width, height);
	if (divisor === 0) return { width: 0, height: 0 };
	return { width: width / divisor, height: height / divisor };
}

export function aspectRatioOf(size: Size): AspectRatio {
	return reduce(size.width(), size.height());
}

export function dimensionAspectRatio(dimension: Dimension): AspectRatio {
	return reduce(dimension.width, dimension.height);
}

function ratioOrientation(ratio: AspectRatio): Orientation {
	return ratio.width >= ratio.height ? 'landscape' : 'portrait';
}

function assertPositiveRatio(ratio: AspectRatio): void {
	if (ratio.width <= 0 || ratio.height <= 0) {
		throw new LayoutInvariantError(
			'ZERO_EXTENT',
			`aspect ratio ${ratio.width}:${ratio.height} has a zero side`,
		);
	}
}

// ============================================================================
// Normalized and rounded aspect ratios
// ============================================================================

/**
 * A size anchored to the short edge of an image: the short edge is a fixed
 * number of cells and the long edge is derived from the ratio.
 */
export interface EdgeSize extends Size {
	readonly orientation: Orientation;
	readonly shortEdge: number;
	readonly longEdge: number;
}

function edgeSize(orientation: Orientation, shortEdge: number, longEdge: number): EdgeSize {
	return {
		orientation,
		shortEdge,
		longEdge,
		width: () => (orientation === 'portrait' ? shortEdge : longEdge),
		height: () => (orientation === 'portrait' ? longEdge : shortEdge),
	};
}

/**
 * Short edge of one cell, long edge rounded up to a whole multiple
 */
export function normalizedAspectRatio(ratio: AspectRatio): EdgeSize {
	assertPositiveRatio(ratio);
	const orientation = ratioOrientation(ratio);
	const [min, max] =
		orientation === 'portrait' ? [ratio.width, ratio.height] : [ratio.height, ratio.width];

	let longEdge = Math.floor(max / min);
	if (max % min > 0) longEdge += 1;

	return edgeSize(orientation, 1, longEdge);
}

export interface RoundedAspectRatioOptions {
	/** Cells on the short edge (default: DEFAULT_SHORT_EDGE) */
	shortEdge?: number;
	/** Remainder handling for the long edge (default: DEFAULT_ROUNDING) */
	rounding?: RoundingPolicy;
}

/**
 * Size an aspect ratio with `shortEdge` cells on its short side.
 *
 * The short side is split into `shortEdge` parts of `floor(min / shortEdge)`
 * units each; the long edge is how many such parts fit along the long side,
 * rounded per policy. Ratios whose short side is smaller than `shortEdge`
 * are scaled up first so the part size never reaches zero.
 *
 * @example
 * roundedAspectRatio({ width: 856, height: 1280 }) // 2 wide, 3 tall
 */
export function roundedAspectRatio(
	ratio: AspectRatio,
	options: RoundedAspectRatioOptions = {},
): EdgeSize {
	const { shortEdge = DEFAULT_SHORT_EDGE, rounding = DEFAULT_ROUNDING } = options;

	if (!Number.isInteger(shortEdge) || shortEdge < 1) {
		throw new LayoutInvariantError(
			'ZERO_EXTENT',
			`short edge must be a positive integer, got ${shortEdge}`,
		);
	}
	assertPositiveRatio(ratio);

	const orientation = ratioOrientation(ratio);
	let [min, max] =
		orientation === 'portrait' ? [ratio.width, ratio.height] : [ratio.height, ratio.width];

	if (min < shortEdge) {
		min *= shortEdge;
		max *= shortEdge;
	}

	const divisor = Math.floor(min / shortEdge);
	const remainder = max % divisor;
	let longEdge = Math.floor(max / divisor);

	if (rounding === 'ceil' ? remainder > 0 : remainder * 2 >= divisor) {
		longEdge += 1;
	}

	return edgeSize(orientation, shortEdge, longEdge);
}

// ============================================================================
// Clamping
// ============================================================================

/**
 * Scale a size down so it is at most `maxWidth` cells wide.
 * Height is scaled by the same factor, floored, and never below one cell.
 */
export function clampWidthTo(size: Size, maxWidth: number): Size {
	const width = size.width();
	const height = size.height();

	if (width <= maxWidth) return cellSize(width, height);

	const scaled = Math.floor((height * maxWidth) / width);
	return cellSize(maxWidth, Math.max(1, scaled));
}

/**
 * Apply a max clamp, then scale up to `minWidth` if the result is narrower.
 * Scaling up rounds the height to the nearest cell.
 */
export function clampSize(size: Size, config: ClampConfig): Size {
	const { minWidth, maxWidth } = config;
	const clamped = maxWidth === undefined ? dimensionSize(toDimension(size)) : clampWidthTo(size, maxWidth);

	const width = clamped.width();
	if (minWidth === undefined || width >= minWidth || width === 0) return clamped;

	const height = Math.round((clamped.height() * minWidth) / width);
	return cellSize(minWidth, Math.max(1, height));
}
