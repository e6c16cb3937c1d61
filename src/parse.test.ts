import { describe, expect, it } from 'vitest';
import { formatAspectRatio, formatDimension, parseAspectRatio, parseDimension } from './parse';

describe('parseAspectRatio', () => {
	it('parses W:H', () => {
		expect(parseAspectRatio('3:2')._unsafeUnwrap()).toEqual({ width: 3, height: 2 });
		expect(parseAspectRatio('3600:2401')._unsafeUnwrap()).toEqual({ width: 3600, height: 2401 });
	});

	it('reports a missing separator', () => {
		const error = parseAspectRatio('32')._unsafeUnwrapErr();
		expect(error.type).toBe('Separator');
		expect(error.message).toBe('missing ":" separator');
	});

	it('reports trailing content as a separator error', () => {
		const error = parseAspectRatio('1:2:3')._unsafeUnwrapErr();
		expect(error.type).toBe('Separator');
		expect(error.message).toBe('unexpected content after "1:2"');
	});

	it('reports an empty string as a separator error', () => {
		expect(parseAspectRatio('')._unsafeUnwrapErr().type).toBe('Separator');
	});

	it('reports non-integer sides', () => {
		for (const input of ['a:2', '3:', '-1:2', ' 3:2', '1.5:2']) {
			const error = parseAspectRatio(input)._unsafeUnwrapErr();
			expect(error.type).toBe('ParseInt');
			expect(error.input).toBe(input);
		}
	});

	it('rejects values past the safe integer range', () => {
		expect(parseAspectRatio('99999999999999999999:1')._unsafeUnwrapErr().type).toBe('ParseInt');
	});
});

describe('parseDimension', () => {
	it('parses WxH', () => {
		expect(parseDimension('3600x2401')._unsafeUnwrap()).toEqual({ width: 3600, height: 2401 });
		expect(parseDimension('0x5')._unsafeUnwrap()).toEqual({ width: 0, height: 5 });
	});

	it('only accepts a lowercase x', () => {
		expect(parseDimension('3600X2401')._unsafeUnwrapErr().type).toBe('Separator');
		expect(parseDimension('3600:2401')._unsafeUnwrapErr().type).toBe('Separator');
	});

	it('rejects more than two parts', () => {
		expect(parseDimension('12x3x4')._unsafeUnwrapErr().type).toBe('Separator');
	});

	it('reports the offending side', () => {
		expect(parseDimension('12xfoo')._unsafeUnwrapErr().message).toBe(
			'"foo" is not a non-negative integer',
		);
	});
});

describe('formatting', () => {
	it('writes the canonical text forms', () => {
		expect(formatAspectRatio({ width: 16, height: 9 })).toBe('16:9');
		expect(formatDimension({ width: 1920, height: 1080 })).toBe('1920x1080');
	});
});
