/**
 * Responsive Photo Grid
 *
 * One PhotoGrid per configured column count over a single item array.
 * Each breakpoint stores item identities (positions in the item array)
 * rather than items, so every breakpoint can be resolved back to the same
 * logical photo.
 *
 * Breakpoints are computed independently of one another; nothing is shared
 * between them except the read-only item array. The returned object never
 * changes after construction.
 */

import { LayoutInvariantError } from './errors';
import {
	createPhotoGrid,
	growNonIntersecting,
	mapPhotoGrid,
	type CreatePhotoGridOptions,
} from './photo-grid';
import type {
	BreakpointContent,
	BreakpointSizeFn,
	GridContent,
	PhotoGrid,
	ResponsivePhotoGrid,
} from './types';
import { createLogger } from './utils/log';

const log = createLogger('responsive-grid');

function freezeGrid(grid: PhotoGrid<number>): PhotoGrid<number> {
	for (const content of grid.grid) {
		Object.freeze(content.size);
		Object.freeze(content.origin);
		Object.freeze(content);
	}
	Object.freeze(grid.grid);
	return Object.freeze(grid);
}

/**
 * Position of each identity's placement within a breakpoint
 */
function indexPlacements(grid: PhotoGrid<number>, itemCount: number): Int32Array {
	const slots = new Int32Array(itemCount).fill(-1);
	grid.grid.forEach((content, position) => {
		if (content.data < 0 || content.data >= itemCount) {
			throw new LayoutInvariantError(
				'UNKNOWN_ITEM',
				`placement ${position} at ${grid.width} columns refers to item ${content.data} of ${itemCount}`,
			);
		}
		slots[content.data] = position;
	});
	return slots;
}

function assertBreakpoint(columns: number): void {
	if (!Number.isInteger(columns) || columns < 1) {
		throw new LayoutInvariantError(
			'INVALID_BREAKPOINT',
			`breakpoint column counts must be positive integers, got ${columns}`,
		);
	}
}

/**
 * Wrap already computed identity grids. The grids must reference items by
 * their position in `items`; serialize.ts validates documents before calling
 * this.
 */
export function assembleResponsivePhotoGrid<T>(
	items: readonly T[],
	identityGrids: readonly PhotoGrid<number>[],
): ResponsivePhotoGrid<T> {
	const data: readonly T[] = Object.freeze([...items]);
	const grids: readonly PhotoGrid<number>[] = Object.freeze(
		identityGrids.map((grid) => freezeGrid(mapPhotoGrid(grid, (id) => id))),
	);
	const breakpoints: readonly number[] = Object.freeze(grids.map((grid) => grid.width));
	const slots = grids.map((grid) => indexPlacements(grid, data.length));

	const responsive: ResponsivePhotoGrid<T> = {
		get items() {
			return data;
		},
		get breakpoints() {
			return breakpoints;
		},

		rawGrids(): readonly PhotoGrid<number>[] {
			return grids;
		},

		grids(): PhotoGrid<T>[] {
			return grids.map((grid) => mapPhotoGrid(grid, (id) => data[id]));
		},

		contentsAt(n: number): BreakpointContent<T>[] {
			if (!Number.isInteger(n) || n < 0 || n >= data.length) return [];

			const result: BreakpointContent<T>[] = [];
			grids.forEach((grid, index) => {
				const position = slots[index][n];
				const placement: GridContent<number> | undefined = grid.grid[position];
				if (position < 0 || !placement) return;
				result.push({ item: data[n], placement, columns: grid.width });
			});
			return result;
		},

		contentsLen(): number {
			return data.length;
		},

		growToWidth(): ResponsivePhotoGrid<T> {
			return assembleResponsivePhotoGrid(data, grids.map(growNonIntersecting));
		},
	};

	return responsive;
}

/**
 * Build one grid per breakpoint. `sizeOf` receives the item together with the
 * breakpoint it is being sized for, so sizes can vary with column count.
 *
 * @example
 * const layout = createResponsivePhotoGrid(photos, [3, 4, 5, 8, 12], (photo, { columns }) =>
 *   clampWidthTo(roundedAspectRatio(photo.ratio), columns),
 * ).growToWidth();
 */
export function createResponsivePhotoGrid<T>(
	items: readonly T[],
	breakpoints: Iterable<number>,
	sizeOf: BreakpointSizeFn<T>,
	options: CreatePhotoGridOptions = {},
): ResponsivePhotoGrid<T> {
	const ids = items.map((_, id) => id);

	const grids = Array.from(breakpoints, (columns, index) => {
		assertBreakpoint(columns);
		return createPhotoGrid(ids, columns, (id) => sizeOf(items[id], { index, columns }), options);
	});

	log.debug(
		`built ${grids.length} breakpoints for ${items.length} items`,
		grids.map((grid) => grid.width),
	);

	return assembleResponsivePhotoGrid(items, grids);
}
