/**
 * Layout verifiers for tests.
 *
 * Production code relies on the packer producing genuine rectangles; these
 * helpers check that directly so tests can assert it over many inputs.
 */

import type { OccupancyGrid } from '../occupancy-grid';
import type { GridContent, PhotoGrid } from '../types';

export function placementsOverlap(a: GridContent<unknown>, b: GridContent<unknown>): boolean {
	return !(
		a.origin.x + a.size.width <= b.origin.x ||
		b.origin.x + b.size.width <= a.origin.x ||
		a.origin.y + a.size.height <= b.origin.y ||
		b.origin.y + b.size.height <= a.origin.y
	);
}

/**
 * Every overlapping pair of placements, empty when the layout is valid
 */
export function findOverlaps<T>(placements: GridContent<T>[]): Array<[GridContent<T>, GridContent<T>]> {
	const overlaps: Array<[GridContent<T>, GridContent<T>]> = [];
	for (let i = 0; i < placements.length; i++) {
		for (let j = i + 1; j < placements.length; j++) {
			if (placementsOverlap(placements[i], placements[j])) {
				overlaps.push([placements[i], placements[j]]);
			}
		}
	}
	return overlaps;
}

/**
 * Values whose cells in an occupancy grid do not form one filled rectangle
 */
export function findNonRectangularRegions<T>(grid: OccupancyGrid<T | null>): T[] {
	const bounds = new Map<T, { minX: number; minY: number; maxX: number; maxY: number; count: number }>();

	for (const coord of grid.coords()) {
		const value = grid.get(coord);
		if (value === null || value === undefined) continue;

		const box = bounds.get(value);
		if (!box) {
			bounds.set(value, { minX: coord.x, minY: coord.y, maxX: coord.x, maxY: coord.y, count: 1 });
			continue;
		}
		box.minX = Math.min(box.minX, coord.x);
		box.minY = Math.min(box.minY, coord.y);
		box.maxX = Math.max(box.maxX, coord.x);
		box.maxY = Math.max(box.maxY, coord.y);
		box.count++;
	}

	const broken: T[] = [];
	for (const [value, box] of bounds) {
		const area = (box.maxX - box.minX + 1) * (box.maxY - box.minY + 1);
		if (area !== box.count) broken.push(value);
	}
	return broken;
}

/**
 * Problems with an identity grid: placements past the right edge, overlaps,
 * and identities in 0..itemCount-1 placed zero or several times
 */
export function verifyPhotoGrid(grid: PhotoGrid<number>, itemCount: number): string[] {
	const problems: string[] = [];

	for (const content of grid.grid) {
		if (content.origin.x + content.size.width > grid.width) {
			problems.push(`item ${content.data} crosses the right edge`);
		}
		if (content.size.width < 1 || content.size.height < 1) {
			problems.push(`item ${content.data} has an empty span`);
		}
	}

	for (const [a, b] of findOverlaps(grid.grid)) {
		problems.push(`items ${a.data} and ${b.data} overlap`);
	}

	const counts = new Array<number>(itemCount).fill(0);
	for (const content of grid.grid) {
		if (content.data < 0 || content.data >= itemCount) {
			problems.push(`unknown item ${content.data}`);
		} else {
			counts[content.data]++;
		}
	}
	counts.forEach((count, id) => {
		if (count !== 1) problems.push(`item ${id} placed ${count} times`);
	});

	return problems;
}
