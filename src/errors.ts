/**
 * Error types.
 *
 * Malformed input text and documents are reported as values (neverthrow
 * Results carrying one of the discriminated error objects below).
 * Broken layout contracts throw LayoutInvariantError.
 */

export type ParseError =
	| { type: 'Separator'; input: string; message: string }
	| { type: 'ParseInt'; input: string; message: string };

export type DeserializeError =
	| { type: 'JsonError'; message: string }
	| { type: 'ValidationError'; message: string; issues: string[] };

export type LayoutInvariantCode =
	| 'INVALID_GRID_WIDTH'
	| 'ZERO_EXTENT'
	| 'ITEM_TOO_WIDE'
	| 'ITEM_CONSUMED_TWICE'
	| 'ITEM_NOT_PLACED'
	| 'UNKNOWN_ITEM'
	| 'INVALID_BREAKPOINT'
	| 'MISSING_SOURCE';

/**
 * Thrown when a sizing rule, breakpoint list or solver step breaks a layout
 * contract. These are bugs in the caller, not malformed data.
 */
export class LayoutInvariantError extends Error {
	readonly code: LayoutInvariantCode;

	constructor(code: LayoutInvariantCode, message: string) {
		super(message);
		this.name = 'LayoutInvariantError';
		this.code = code;
	}
}
