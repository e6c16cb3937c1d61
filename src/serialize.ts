/**
 * Document form of a responsive grid.
 *
 * ```json
 * {
 *   "breakpoints": [
 *     { "placements": [{ "data": 0, "size": { "width": 2, "height": 3 }, "origin": { "x": 0, "y": 0 } }], "width": 3 }
 *   ],
 *   "data": [{ "...": "item" }]
 * }
 * ```
 *
 * Placement `data` is the item's position in the top-level `data` array.
 * Documents are validated with valibot before a grid is rebuilt from them;
 * placements are taken as stored, never re-packed.
 */

import { err, ok, Result } from 'neverthrow';
import * as v from 'valibot';
import type { DeserializeError } from './errors';
import { assembleResponsivePhotoGrid } from './responsive-grid';
import type {
	ResponsiveGridDocument,
	ResponsivePhotoGrid,
	SerializedBreakpoint,
	SerializedPlacement,
} from './types';
import { rangesIntersect, type Range } from './utils/range';

// ============================================================================
// Schemas
// ============================================================================

const cellCount = (min: number) =>
	v.pipe(v.number(), v.integer(), v.minValue(min), v.maxValue(Number.MAX_SAFE_INTEGER));

export const dimensionSchema = v.object({
	width: cellCount(1),
	height: cellCount(1),
});

export const coordSchema = v.object({
	x: cellCount(0),
	y: cellCount(0),
});

export const placementSchema = v.object({
	data: cellCount(0),
	size: dimensionSchema,
	origin: coordSchema,
});

function columnsOf({ size, origin }: SerializedPlacement): Range {
	return [origin.x, origin.x + size.width];
}

function rowsOf({ size, origin }: SerializedPlacement): Range {
	return [origin.y, origin.y + size.height];
}

/**
 * Whether no two placements cover the same cell. Compares bounds pairwise,
 * so the cost does not depend on extents.
 */
function placementsAreDisjoint(placements: SerializedPlacement[]): boolean {
	for (let i = 0; i < placements.length; i++) {
		for (let j = i + 1; j < placements.length; j++) {
			const a = placements[i];
			const b = placements[j];
			if (rangesIntersect(columnsOf(a), columnsOf(b)) && rangesIntersect(rowsOf(a), rowsOf(b))) {
				return false;
			}
		}
	}
	return true;
}

export const breakpointSchema = v.pipe(
	v.object({
		placements: v.array(placementSchema),
		width: cellCount(1),
	}),
	v.check(
		(breakpoint) =>
			breakpoint.placements.every(
				(placement) => placement.origin.x + placement.size.width <= breakpoint.width,
			),
		'A placement extends past the right edge of its breakpoint',
	),
	v.check(
		(breakpoint) => placementsAreDisjoint(breakpoint.placements),
		'Placements overlap',
	),
);

function placesEachItemOnce(breakpoint: SerializedBreakpoint, itemCount: number): boolean {
	if (breakpoint.placements.length !== itemCount) return false;
	const seen = new Uint8Array(itemCount);
	for (const { data } of breakpoint.placements) {
		if (data >= itemCount || seen[data]) return false;
		seen[data] = 1;
	}
	return true;
}

/**
 * Schema for a whole document; `itemSchema` validates each entry of `data`
 */
export function responsiveGridDocumentSchema<T>(
	itemSchema: v.GenericSchema<unknown, T>,
): v.GenericSchema<unknown, ResponsiveGridDocument<T>> {
	return v.pipe(
		v.object({
			breakpoints: v.array(breakpointSchema),
			data: v.array(itemSchema),
		}),
		v.check(
			(document) =>
				document.breakpoints.every((breakpoint) =>
					placesEachItemOnce(breakpoint, document.data.length),
				),
			'Every breakpoint must place each item exactly once',
		),
	);
}

// ============================================================================
// Conversion
// ============================================================================

export function toDocument<T>(grid: ResponsivePhotoGrid<T>): ResponsiveGridDocument<T> {
	return {
		breakpoints: grid.rawGrids().map((photoGrid) => ({
			placements: photoGrid.grid.map((content) => ({
				data: content.data,
				size: { width: content.size.width, height: content.size.height },
				origin: { x: content.origin.x, y: content.origin.y },
			})),
			width: photoGrid.width,
		})),
		data: [...grid.items],
	};
}

function formatIssue(issue: v.BaseIssue<unknown>): string {
	const path = v.getDotPath(issue);
	return path ? `${path}: ${issue.message}` : issue.message;
}

/**
 * Rebuild a responsive grid from an already parsed document. Without
 * `itemSchema` the items are accepted as they are.
 */
export function fromDocument(input: unknown): Result<ResponsivePhotoGrid<unknown>, DeserializeError>;
export function fromDocument<T>(
	input: unknown,
	itemSchema: v.GenericSchema<unknown, T>,
): Result<ResponsivePhotoGrid<T>, DeserializeError>;
export function fromDocument(
	input: unknown,
	itemSchema: v.GenericSchema<unknown, unknown> = v.unknown(),
): Result<ResponsivePhotoGrid<unknown>, DeserializeError> {
	const parsed = v.safeParse(responsiveGridDocumentSchema(itemSchema), input);
	if (!parsed.success) {
		const issues = parsed.issues.map(formatIssue);
		return err({
			type: 'ValidationError',
			message: `Invalid responsive grid document: ${issues[0] ?? 'unknown issue'}`,
			issues,
		});
	}

	const { breakpoints, data } = parsed.output;
	return ok(
		assembleResponsivePhotoGrid(
			data,
			breakpoints.map((breakpoint) => ({ grid: breakpoint.placements, width: breakpoint.width })),
		),
	);
}

export function serializeResponsiveGrid<T>(grid: ResponsivePhotoGrid<T>): string {
	return JSON.stringify(toDocument(grid));
}

const parseJson = Result.fromThrowable(
	(text: string): unknown => JSON.parse(text),
	(error): DeserializeError => ({
		type: 'JsonError',
		message: error instanceof Error ? error.message : 'Unknown error',
	}),
);

/**
 * Parse and validate a JSON document produced by serializeResponsiveGrid
 */
export function deserializeResponsiveGrid(
	text: string,
): Result<ResponsivePhotoGrid<unknown>, DeserializeError>;
export function deserializeResponsiveGrid<T>(
	text: string,
	itemSchema: v.GenericSchema<unknown, T>,
): Result<ResponsivePhotoGrid<T>, DeserializeError>;
export function deserializeResponsiveGrid(
	text: string,
	itemSchema: v.GenericSchema<unknown, unknown> = v.unknown(),
): Result<ResponsivePhotoGrid<unknown>, DeserializeError> {
	return parseJson(text).andThen((document) => fromDocument(document, itemSchema));
}
