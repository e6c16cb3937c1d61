/**
 * Occupancy Grid
 *
 * A fixed number of columns over a single flat, row-major array that grows
 * a row at a time. `cells.length === width * height` always holds and the
 * height never shrinks.
 */

import { LayoutInvariantError } from './errors';
import type { Coord } from './types';

/**
 * - plus: the four orthogonal neighbours
 * - cross: the four diagonal neighbours
 * - all: all eight
 */
export type NeighbourMode = 'plus' | 'cross' | 'all';

const PLUS_OFFSETS: ReadonlyArray<readonly [number, number]> = [
	[0, -1],
	[1, 0],
	[0, 1],
	[-1, 0],
];

const CROSS_OFFSETS: ReadonlyArray<readonly [number, number]> = [
	[1, -1],
	[1, 1],
	[-1, 1],
	[-1, -1],
];

const NEIGHBOUR_OFFSETS: Record<NeighbourMode, ReadonlyArray<readonly [number, number]>> = {
	plus: PLUS_OFFSETS,
	cross: CROSS_OFFSETS,
	all: [...PLUS_OFFSETS, ...CROSS_OFFSETS],
};

export class OccupancyGrid<T> {
	readonly width: number;
	private readonly fill: T;
	private readonly contents: T[] = [];
	private rows = 0;

	constructor(width: number, fill: T) {
		if (!Number.isInteger(width) || width < 1) {
			throw new LayoutInvariantError(
				'INVALID_GRID_WIDTH',
				`grid width must be a positive integer, got ${width}`,
			);
		}
		this.width = width;
		this.fill = fill;
	}

	/**
	 * Create a grid with `height` rows already allocated
	 */
	static withHeight<T>(width: number, height: number, fill: T): OccupancyGrid<T> {
		const grid = new OccupancyGrid(width, fill);
		if (height > 0) grid.extendTo(height * width - 1);
		return grid;
	}

	get height(): number {
		return this.rows;
	}

	get length(): number {
		return this.contents.length;
	}

	/** Read-only view of the backing array */
	cells(): readonly T[] {
		return this.contents;
	}

	toIndex({ x, y }: Coord): number {
		return y * this.width + x;
	}

	toCoord(index: number): Coord {
		return { x: index % this.width, y: Math.floor(index / this.width) };
	}

	contains({ x, y }: Coord): boolean {
		return x >= 0 && y >= 0 && x < this.width && y < this.rows;
	}

	/**
	 * Grow with fill cells up to and including the row containing `index`.
	 * Indices that are already allocated leave the grid unchanged.
	 */
	extendTo(index: number): void {
		const end = (Math.floor(index / this.width) + 1) * this.width;
		while (this.contents.length < end) {
			this.contents.push(this.fill);
		}
		this.rows = this.contents.length / this.width;
	}

	/** Cell at `index`, or undefined beyond the allocated rows */
	getAt(index: number): T | undefined {
		return index >= 0 && index < this.contents.length ? this.contents[index] : undefined;
	}

	get(coord: Coord): T | undefined {
		return this.contains(coord) ? this.contents[this.toIndex(coord)] : undefined;
	}

	/**
	 * Write a cell, growing the grid when the row is not allocated yet
	 */
	set(coord: Coord, value: T): void {
		if (coord.x < 0 || coord.x >= this.width || coord.y < 0) {
			throw new RangeError(`(${coord.x}, ${coord.y}) is outside a ${this.width}-wide grid`);
		}
		const index = this.toIndex(coord);
		this.extendTo(index);
		this.contents[index] = value;
	}

	/** Every allocated coordinate in row-major order */
	*coords(): IterableIterator<Coord> {
		for (let index = 0; index < this.contents.length; index++) {
			yield this.toCoord(index);
		}
	}

	/**
	 * In-bounds neighbours of a cell. Edges do not wrap.
	 */
	neighbours(coord: Coord, mode: NeighbourMode = 'plus'): Coord[] {
		const result: Coord[] = [];
		for (const [dx, dy] of NEIGHBOUR_OFFSETS[mode]) {
			const next = { x: coord.x + dx, y: coord.y + dy };
			if (this.contains(next)) result.push(next);
		}
		return result;
	}
}
