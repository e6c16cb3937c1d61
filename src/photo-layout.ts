/**
 * Gallery photos and the sizing rule the gallery lays them out with.
 */

import * as v from 'valibot';
import { DEFAULT_BREAKPOINTS, DEFAULT_ROUNDING, DEFAULT_SHORT_EDGE } from './config';
import { LayoutInvariantError } from './errors';
import type { CreatePhotoGridOptions } from './photo-grid';
import { createResponsivePhotoGrid } from './responsive-grid';
import { clampSize, roundedAspectRatio } from './size';
import type { BreakpointSizeFn, Dimension, ResponsivePhotoGrid, RoundingPolicy } from './types';

// ============================================================================
// Photo data
// ============================================================================

export const srcSetSchema = v.object({
	dimensions: v.object({
		width: v.pipe(v.number(), v.integer(), v.minValue(0)),
		height: v.pipe(v.number(), v.integer(), v.minValue(0)),
	}),
	url: v.pipe(v.string(), v.url()),
});

export const photoLayoutDataSchema = v.object({
	srcs: v.array(srcSetSchema),
	metadata: v.record(v.string(), v.string()),
});

/** One rendition of a photo */
export type SrcSet = v.InferOutput<typeof srcSetSchema>;

/**
 * A photo as listed from storage: its renditions plus free-form string
 * metadata (`timestamp`, `rating`, ...)
 */
export type PhotoLayoutData = v.InferOutput<typeof photoLayoutDataSchema>;

/**
 * Dimensions of the widest rendition
 *
 * @throws LayoutInvariantError when the photo has no renditions
 */
export function largestSource(photo: PhotoLayoutData): Dimension {
	let largest: Dimension | undefined;
	for (const { dimensions } of photo.srcs) {
		if (!largest || dimensions.width > largest.width) largest = dimensions;
	}
	if (!largest) {
		throw new LayoutInvariantError('MISSING_SOURCE', 'a photo must have at least one src set');
	}
	return largest;
}

// ============================================================================
// Sizing
// ============================================================================

export interface GallerySizingOptions {
	/** Cells on the short edge of every photo (default: DEFAULT_SHORT_EDGE) */
	shortEdge?: number;
	rounding?: RoundingPolicy;
}

/**
 * Size photos from their largest rendition.
 *
 * The first breakpoint is a single-column feed: every photo spans exactly its
 * column count. Later breakpoints only cap photos at the column count.
 */
export function gallerySizing(options: GallerySizingOptions = {}): BreakpointSizeFn<PhotoLayoutData> {
	const { shortEdge = DEFAULT_SHORT_EDGE, rounding = DEFAULT_ROUNDING } = options;

	return (photo, { index, columns }) => {
		const rounded = roundedAspectRatio(largestSource(photo), { shortEdge, rounding });
		return index === 0
			? clampSize(rounded, { minWidth: columns, maxWidth: columns })
			: clampSize(rounded, { maxWidth: columns });
	};
}

export interface CreateGalleryLayoutOptions extends GallerySizingOptions, CreatePhotoGridOptions {
	/** Column counts, smallest first (default: DEFAULT_BREAKPOINTS) */
	breakpoints?: readonly number[];
}

/**
 * Lay out photos at every breakpoint with trailing row space closed
 */
export function createGalleryLayout(
	photos: readonly PhotoLayoutData[],
	options: CreateGalleryLayoutOptions = {},
): ResponsivePhotoGrid<PhotoLayoutData> {
	const { breakpoints = DEFAULT_BREAKPOINTS, shortEdge, rounding, checkInvariants } = options;

	return createResponsivePhotoGrid(photos, breakpoints, gallerySizing({ shortEdge, rounding }), {
		checkInvariants,
	}).growToWidth();
}
