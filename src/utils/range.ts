/** Half-open interval [start, end) */
export type Range = readonly [start: number, end: number];

/**
 * Whether two half-open ranges share at least one value.
 * Touching ranges such as [5, 10) and [10, 12) do not intersect.
 */
export function rangesIntersect(a: Range, b: Range): boolean {
	return a[0] < b[1] && b[0] < a[1];
}
