/**
 * First-fit bin packing - no rendering dependencies
 *
 * Items are placed in input order. Each one takes the first allocated cell
 * (row-major) where its rectangle stays inside the right edge and covers
 * only empty cells; rows below the allocated height count as empty. When no
 * such cell exists the item starts a new row at the end of the grid.
 * There is no backtracking, so the result depends only on input order.
 */

import { LayoutInvariantError } from '../errors';
import { OccupancyGrid } from '../occupancy-grid';
import type { Size } from '../types';
import { createLogger } from '../utils/log';

const log = createLogger('bin-pack');

/** Identity of the placing item, or null for an empty cell */
export type Occupant = number | null;

interface Extent {
	width: number;
	height: number;
}

function extentOf(size: Size, ordinal: number, columns: number): Extent {
	const width = size.width();
	const height = size.height();

	if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
		throw new LayoutInvariantError(
			'ZERO_EXTENT',
			`item ${ordinal} has a ${width}x${height} extent; sizing rules must return positive whole cells`,
		);
	}
	if (width > columns) {
		throw new LayoutInvariantError(
			'ITEM_TOO_WIDE',
			`item ${ordinal} is ${width} cells wide but the grid has ${columns} columns`,
		);
	}
	return { width, height };
}

/**
 * Cell indices covered by a rectangle whose top-left is at `offset`
 */
function coveredIndices(grid: OccupancyGrid<Occupant>, offset: number, extent: Extent): number[] {
	const indices: number[] = [];
	for (let dy = 0; dy < extent.height; dy++) {
		for (let dx = 0; dx < extent.width; dx++) {
			indices.push(offset + dy * grid.width + dx);
		}
	}
	return indices;
}

/**
 * Whether a rectangle fits with its top-left at `index`
 */
export function fitsAt(grid: OccupancyGrid<Occupant>, index: number, extent: Extent): boolean {
	if (grid.toCoord(index).x + extent.width > grid.width) return false;

	for (let dy = 0; dy < extent.height; dy++) {
		for (let dx = 0; dx < extent.width; dx++) {
			const cell = grid.getAt(index + dy * grid.width + dx);
			if (cell !== undefined && cell !== null) return false;
		}
	}
	return true;
}

function findFirstFit(grid: OccupancyGrid<Occupant>, extent: Extent): number | undefined {
	const cells = grid.cells();
	for (let index = 0; index < cells.length; index++) {
		if (cells[index] === null && fitsAt(grid, index, extent)) return index;
	}
	return undefined;
}

function insertAt(
	grid: OccupancyGrid<Occupant>,
	index: number,
	ordinal: number,
	extent: Extent,
): void {
	const indices = coveredIndices(grid, index, extent);
	grid.extendTo(indices[indices.length - 1] ?? index);
	for (const cell of indices) {
		grid.set(grid.toCoord(cell), ordinal);
	}
}

/**
 * Pack items into a `columns`-wide grid. Cells hold the ordinal of the item
 * covering them.
 *
 * @throws LayoutInvariantError when an item has a non-positive extent or is
 * wider than the grid
 */
export function packItems(items: Iterable<Size>, columns: number): OccupancyGrid<Occupant> {
	const grid = new OccupancyGrid<Occupant>(columns, null);

	let ordinal = 0;
	for (const item of items) {
		const extent = extentOf(item, ordinal, columns);
		const fit = findFirstFit(grid, extent);

		if (fit !== undefined) {
			insertAt(grid, fit, ordinal, extent);
		} else {
			const end = grid.length;
			grid.extendTo(end);
			insertAt(grid, end, ordinal, extent);
		}
		ordinal++;
	}

	log.debug(`packed ${ordinal} items into ${columns}x${grid.height}`);
	return grid;
}
