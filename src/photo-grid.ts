/**
 * Single-breakpoint photo grid.
 *
 * A PhotoGrid is a pure function of (items, column count, sizing rule):
 * items are packed by ordinal, the packed grid is read back as rectangles,
 * and each ordinal is swapped for the item it stands for.
 */

import { packItems } from './algorithms/bin-pack';
import { collectRegions } from './algorithms/regions';
import { runtimeConfig } from './config';
import { LayoutInvariantError } from './errors';
import type { GridContent, PhotoGrid, SizeFn } from './types';
import { rangesIntersect } from './utils/range';

export interface CreatePhotoGridOptions {
	/** Verify every item is placed exactly once (default: runtime config) */
	checkInvariants?: boolean;
}

/**
 * Tracks which items have been moved into a placement
 */
export class ConsumptionSet {
	private readonly taken: Uint8Array;
	private count = 0;

	constructor(size: number) {
		this.taken = new Uint8Array(size);
	}

	take(ordinal: number): void {
		if (this.taken[ordinal]) {
			throw new LayoutInvariantError(
				'ITEM_CONSUMED_TWICE',
				`item ${ordinal} was placed more than once`,
			);
		}
		this.taken[ordinal] = 1;
		this.count++;
	}

	assertComplete(): void {
		if (this.count === this.taken.length) return;
		const missing = this.taken.findIndex((flag) => flag === 0);
		throw new LayoutInvariantError('ITEM_NOT_PLACED', `item ${missing} has no placement`);
	}
}

export function mapGridContent<T, U>(content: GridContent<T>, fn: (data: T) => U): GridContent<U> {
	return {
		data: fn(content.data),
		size: { ...content.size },
		origin: { ...content.origin },
	};
}

export function mapPhotoGrid<T, U>(grid: PhotoGrid<T>, fn: (data: T) => U): PhotoGrid<U> {
	return {
		grid: grid.grid.map((content) => mapGridContent(content, fn)),
		width: grid.width,
	};
}

/**
 * Lay out `items` in a `width`-column grid, sizing each with `sizeOf`.
 * Placements come back in row-major order of their origins.
 *
 * @throws LayoutInvariantError when the sizing rule returns an unusable size
 * or an item would be placed twice
 */
export function createPhotoGrid<T>(
	items: readonly T[],
	width: number,
	sizeOf: SizeFn<T>,
	options: CreatePhotoGridOptions = {},
): PhotoGrid<T> {
	const { checkInvariants = runtimeConfig.checkInvariants } = options;

	const packed = packItems(items.map(sizeOf), width);
	const regions = collectRegions(packed);

	const consumed = checkInvariants ? new ConsumptionSet(items.length) : null;
	const grid = regions.map((region) =>
		mapGridContent(region, (ordinal) => {
			consumed?.take(ordinal);
			return items[ordinal];
		}),
	);
	consumed?.assertComplete();

	return { grid, width };
}

function rowRange(content: GridContent<unknown>): [number, number] {
	return [content.origin.y, content.origin.y + content.size.height];
}

/**
 * Widen every placement that has nothing to its right on any of its rows
 * so it reaches the right edge of the grid. Returns a new grid; heights and
 * origins are unchanged.
 */
export function growNonIntersecting<T>(photoGrid: PhotoGrid<T>): PhotoGrid<T> {
	const { grid, width } = photoGrid;

	const grown = grid.map((content, index) => {
		const rows = rowRange(content);
		const blocked = grid.some(
			(other, otherIndex) =>
				otherIndex !== index &&
				other.origin.x > content.origin.x &&
				rangesIntersect(rowRange(other), rows),
		);

		const next = mapGridContent(content, (data) => data);
		if (!blocked) next.size.width = width - content.origin.x;
		return next;
	});

	return { grid: grown, width };
}
