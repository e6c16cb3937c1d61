// ============================================================================
// Geometry
// ============================================================================

/** A cell position, zero-indexed from the top-left corner */
export interface Coord {
	x: number;
	y: number;
}

/** Width and height in pixels or grid cells depending on context */
export interface Dimension {
	width: number;
	height: number;
}

/** Width:height pair of positive integers */
export interface AspectRatio {
	width: number;
	height: number;
}

export type Orientation = 'portrait' | 'landscape';

/**
 * Anything with an extent in grid cells.
 * Methods rather than fields so sizing rules can derive extents lazily.
 */
export interface Size {
	width(): number;
	height(): number;
}

/**
 * How the long edge of a rounded aspect ratio treats a remainder:
 * - ceil: round up on any nonzero remainder
 * - half-up: round up only once the remainder reaches half the divisor
 */
export type RoundingPolicy = 'ceil' | 'half-up';

/** Bounds applied to a size after rounding */
export interface ClampConfig {
	minWidth?: number;
	maxWidth?: number;
}

// ============================================================================
// Placements
// ============================================================================

/**
 * One placed rectangle: payload, span in cells, and top-left origin.
 * `origin.x + size.width` never exceeds the width of the owning grid.
 */
export interface GridContent<T> {
	data: T;
	size: Dimension;
	origin: Coord;
}

/** All placements for one breakpoint */
export interface PhotoGrid<T> {
	grid: GridContent<T>[];
	/** Column count of this breakpoint */
	width: number;
}

/** Passed to sizing rules of a responsive grid */
export interface BreakpointContext {
	/** Position in the breakpoint list */
	index: number;
	/** Column count of the breakpoint */
	columns: number;
}

export type SizeFn<T> = (item: T) => Size;

export type BreakpointSizeFn<T> = (item: T, breakpoint: BreakpointContext) => Size;

/** An item's placement at one breakpoint */
export interface BreakpointContent<T> {
	item: T;
	placement: GridContent<number>;
	columns: number;
}

/**
 * Placements for every breakpoint over one shared item array.
 * Built once; every method is read-only.
 */
export interface ResponsivePhotoGrid<T> {
	readonly items: readonly T[];
	readonly breakpoints: readonly number[];
	/** Identity placements as stored, one grid per breakpoint */
	rawGrids(): readonly PhotoGrid<number>[];
	/** Placements with identities resolved to items */
	grids(): PhotoGrid<T>[];
	/** Placements of item `n` at every breakpoint */
	contentsAt(n: number): BreakpointContent<T>[];
	contentsLen(): number;
	/** Copy with trailing row space closed at every breakpoint */
	growToWidth(): ResponsivePhotoGrid<T>;
}

// ============================================================================
// Serialized form
// ============================================================================

export interface SerializedPlacement {
	data: number;
	size: Dimension;
	origin: Coord;
}

export interface SerializedBreakpoint {
	placements: SerializedPlacement[];
	width: number;
}

export interface ResponsiveGridDocument<T> {
	breakpoints: SerializedBreakpoint[];
	data: T[];
}
