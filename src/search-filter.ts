/**
 * Filter photos by capture time and rating.
 *
 * Both values come from string metadata. A missing or malformed timestamp
 * reads as the unix epoch and a missing or malformed rating reads as 0.
 */

import type { PhotoLayoutData } from './photo-layout';
import { createLogger, type Logger } from './utils/log';

const defaultLog = createLogger('search-filter');

export interface SearchFilter {
	/** Latest capture time, unix seconds, inclusive */
	before?: number;
	/** Earliest capture time, unix seconds, inclusive */
	after?: number;
	/** Minimum rating, 0-255 */
	rating?: number;
}

const MAX_RATING = 255;

/** Full date-time with an explicit offset */
const RFC3339 = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:\d{2})$/;

/**
 * Capture time in unix seconds from `metadata.timestamp`. Only RFC 3339
 * date-times with a `Z` or `+hh:mm` offset are read; anything else, including
 * a local time without an offset, counts as malformed.
 */
export function photoTimestamp(photo: PhotoLayoutData, log: Logger = defaultLog): number {
	const raw: string | undefined = photo.metadata.timestamp;
	if (raw === undefined) return 0;

	const millis = RFC3339.test(raw) ? Date.parse(raw) : Number.NaN;
	if (Number.isNaN(millis)) {
		log.warn(`ignoring malformed timestamp "${raw}"`);
		return 0;
	}
	return Math.floor(millis / 1000);
}

/**
 * Rating from `metadata.rating`
 */
export function photoRating(photo: PhotoLayoutData, log: Logger = defaultLog): number {
	const raw: string | undefined = photo.metadata.rating;
	if (raw === undefined) return 0;

	const rating = /^\d+$/.test(raw) ? Number(raw) : Number.NaN;
	if (Number.isNaN(rating) || rating > MAX_RATING) {
		log.warn(`ignoring malformed rating "${raw}"`);
		return 0;
	}
	return rating;
}

export function matchesFilter(
	filter: SearchFilter,
	photo: PhotoLayoutData,
	log: Logger = defaultLog,
): boolean {
	const { before, after, rating } = filter;

	if (before !== undefined || after !== undefined) {
		const timestamp = photoTimestamp(photo, log);
		if (before !== undefined && timestamp > before) return false;
		if (after !== undefined && timestamp < after) return false;
	}

	return rating === undefined || photoRating(photo, log) >= rating;
}

export function filterPhotos(
	photos: readonly PhotoLayoutData[],
	filter: SearchFilter,
	log: Logger = defaultLog,
): PhotoLayoutData[] {
	return photos.filter((photo) => matchesFilter(filter, photo, log));
}
