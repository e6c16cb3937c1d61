// Layout primitives
export {
	aspectRatioOf,
	cellSize,
	clampSize,
	clampWidthTo,
	dimensionAspectRatio,
	dimensionSize,
	gcd,
	normalizedAspectRatio,
	orientationOf,
	roundedAspectRatio,
	toDimension,
	type EdgeSize,
	type RoundedAspectRatioOptions,
} from './size';
export { formatAspectRatio, formatDimension, parseAspectRatio, parseDimension } from './parse';
export { OccupancyGrid, type NeighbourMode } from './occupancy-grid';
export { fitsAt, packItems, type Occupant } from './algorithms/bin-pack';
export { collectRegions } from './algorithms/regions';

// Grids
export {
	createPhotoGrid,
	growNonIntersecting,
	mapGridContent,
	mapPhotoGrid,
	type CreatePhotoGridOptions,
} from './photo-grid';
export { assembleResponsivePhotoGrid, createResponsivePhotoGrid } from './responsive-grid';
export {
	breakpointSchema,
	deserializeResponsiveGrid,
	fromDocument,
	responsiveGridDocumentSchema,
	serializeResponsiveGrid,
	toDocument,
} from './serialize';

// Gallery
export {
	createGalleryLayout,
	gallerySizing,
	largestSource,
	photoLayoutDataSchema,
	srcSetSchema,
	type CreateGalleryLayoutOptions,
	type GallerySizingOptions,
	type PhotoLayoutData,
	type SrcSet,
} from './photo-layout';
export { filterPhotos, matchesFilter, photoRating, photoTimestamp, type SearchFilter } from './search-filter';

export { DEFAULT_BREAKPOINTS, DEFAULT_ROUNDING, DEFAULT_SHORT_EDGE, resolveRuntimeConfig, runtimeConfig, type RuntimeConfig } from './config';
export { LayoutInvariantError, type DeserializeError, type LayoutInvariantCode, type ParseError } from './errors';
export { createLogger, type Logger } from './utils/log';
export type * from './types';
