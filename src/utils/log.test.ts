import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger } from './log';

describe('createLogger', () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it('prefixes debug output with its scope', () => {
		const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
		createLogger('bin-pack', true).debug('packed', 3);
		expect(spy).toHaveBeenCalledWith('[bin-pack]', 'packed', 3);
	});

	it('drops debug output when debugging is off', () => {
		const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
		createLogger('bin-pack', false).debug('packed');
		expect(spy).not.toHaveBeenCalled();
	});

	it('always writes warnings', () => {
		const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});
		createLogger('search-filter', false).warn('odd rating');
		expect(spy).toHaveBeenCalledWith('[search-filter]', 'odd rating');
	});
});
