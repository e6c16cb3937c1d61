import { describe, expect, it } from 'vitest';
import { LayoutInvariantError } from '../errors';
import { cellSize, normalizedAspectRatio } from '../size';
import { SeededRNG } from '../testing/rng';
import { findNonRectangularRegions } from '../testing/verify';
import type { Size } from '../types';
import { fitsAt, packItems } from './bin-pack';

const landscape = (longEdge: number): Size => cellSize(longEdge, 1);
const portrait = (longEdge: number): Size => cellSize(1, longEdge);

function randomSizes(rng: SeededRNG, count: number, maxWidth: number): Size[] {
	return Array.from({ length: count }, () => cellSize(rng.int(1, maxWidth), rng.int(1, 4)));
}

// ============================================================================
// Scenarios
// ============================================================================

describe('packItems', () => {
	it('places a single landscape item at the origin', () => {
		const grid = packItems([landscape(2)], 4);
		expect(grid.cells()).toEqual([0, 0, null, null]);
	});

	it('fills columns left to right before starting a new row', () => {
		const grid = packItems([portrait(2), portrait(2), landscape(2), landscape(2)], 4);
		expect(grid.cells()).toEqual([0, 1, 2, 2, 0, 1, 3, 3]);
	});

	it('starts a new row when nothing fits in the allocated cells', () => {
		const grid = packItems([landscape(2), landscape(2), portrait(2), portrait(2)], 4);
		expect(grid.cells()).toEqual([0, 0, 1, 1, 2, 3, null, null, 2, 3, null, null]);
	});

	it('leaves a hole rather than crossing the right edge', () => {
		const grid = packItems([landscape(3), landscape(2)], 4);
		expect(grid.cells()).toEqual([0, 0, 0, null, 1, 1, null, null]);
	});

	it('backfills earlier holes with later items', () => {
		const grid = packItems([landscape(3), landscape(2), cellSize(1, 1)], 4);
		expect(grid.cells()).toEqual([0, 0, 0, 2, 1, 1, null, null]);
	});

	it('sizes from normalized aspect ratios', () => {
		const grid = packItems([normalizedAspectRatio({ width: 16, height: 9 })], 3);
		expect(grid.cells()).toEqual([0, 0, null]);
	});

	it('returns an empty grid for no items', () => {
		const grid = packItems([], 5);
		expect(grid.height).toBe(0);
	});

	// ==========================================================================
	// Contract violations
	// ==========================================================================

	it('rejects zero extents', () => {
		expect(() => packItems([cellSize(0, 1)], 4)).toThrow(LayoutInvariantError);
		expect(() => packItems([cellSize(1, 0)], 4)).toThrow(
			'item 0 has a 1x0 extent; sizing rules must return positive whole cells',
		);
	});

	it('rejects fractional extents', () => {
		expect(() => packItems([cellSize(1.5, 1)], 4)).toThrow(LayoutInvariantError);
	});

	it('rejects items wider than the grid', () => {
		try {
			packItems([landscape(2), landscape(5)], 4);
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(LayoutInvariantError);
			if (error instanceof LayoutInvariantError) {
				expect(error.code).toBe('ITEM_TOO_WIDE');
				expect(error.message).toBe('item 1 is 5 cells wide but the grid has 4 columns');
			}
		}
	});

	// ==========================================================================
	// Properties
	// ==========================================================================

	it('is deterministic', () => {
		const sizes = randomSizes(new SeededRNG(7), 40, 4);
		expect(packItems(sizes, 6).cells()).toEqual(packItems(sizes, 6).cells());
	});

	it('keeps every item a single rectangle', () => {
		for (let seed = 1; seed <= 50; seed++) {
			const rng = new SeededRNG(seed);
			const columns = rng.int(1, 12);
			const sizes = randomSizes(rng, rng.int(1, 30), columns);
			const grid = packItems(sizes, columns);

			expect(findNonRectangularRegions(grid)).toEqual([]);
			expect(grid.length).toBe(grid.width * grid.height);

			const placed = new Set(grid.cells().filter((cell) => cell !== null));
			expect(placed.size).toBe(sizes.length);
		}
	});

	it('covers exactly the area of every item', () => {
		const rng = new SeededRNG(99);
		const sizes = randomSizes(rng, 25, 5);
		const grid = packItems(sizes, 5);

		sizes.forEach((size, ordinal) => {
			const area = grid.cells().filter((cell) => cell === ordinal).length;
			expect(area).toBe(size.width() * size.height());
		});
	});
});

describe('fitsAt', () => {
	const grid = packItems([landscape(2)], 4);

	it('accepts empty cells inside the right edge', () => {
		expect(fitsAt(grid, 2, { width: 2, height: 1 })).toBe(true);
	});

	it('rejects positions that cross the right edge', () => {
		expect(fitsAt(grid, 3, { width: 2, height: 1 })).toBe(false);
	});

	it('rejects occupied cells', () => {
		expect(fitsAt(grid, 1, { width: 1, height: 1 })).toBe(false);
	});

	it('treats rows past the allocated height as empty', () => {
		expect(fitsAt(grid, 2, { width: 2, height: 3 })).toBe(true);
	});
});
