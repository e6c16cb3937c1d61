/**
 * Region reconstruction
 *
 * Turns a packed occupancy grid back into placement rectangles. Assumes every
 * occupied region is an axis-aligned rectangle of one value that does not
 * overlap another region of the same value, which is what packItems
 * produces. The rectangle's width is read along its top row and its height
 * down its left column; nothing checks the cells in between.
 */

import type { OccupancyGrid } from '../occupancy-grid';
import type { Coord, GridContent } from '../types';

/**
 * Bottom-right corner of the rectangle whose top-left is `origin`
 */
function farCorner<T>(grid: OccupancyGrid<T | null>, origin: Coord, value: T): Coord {
	let x = origin.x;
	while (x + 1 < grid.width && grid.get({ x: x + 1, y: origin.y }) === value) {
		x++;
	}

	let y = origin.y;
	while (grid.get({ x: origin.x, y: y + 1 }) === value) {
		y++;
	}

	return { x, y };
}

/**
 * Collect placements in row-major order of their origins
 */
export function collectRegions<T>(grid: OccupancyGrid<T | null>): GridContent<T>[] {
	const cells = grid.cells();
	const seen = new Uint8Array(cells.length);
	const regions: GridContent<T>[] = [];

	let cursor = 0;
	while (cursor < cells.length) {
		if (seen[cursor]) {
			cursor++;
			continue;
		}

		const value = cells[cursor];
		if (value === null || value === undefined) {
			cursor++;
			continue;
		}

		const origin = grid.toCoord(cursor);
		const corner = farCorner(grid, origin, value);
		const size = {
			width: corner.x - origin.x + 1,
			height: corner.y - origin.y + 1,
		};

		for (let y = origin.y; y <= corner.y; y++) {
			for (let x = origin.x; x <= corner.x; x++) {
				seen[grid.toIndex({ x, y })] = 1;
			}
		}

		regions.push({ data: value, size, origin });
		cursor += size.width;
	}

	return regions;
}
