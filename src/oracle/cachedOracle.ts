import {type WidthOracle} from '../core/types';

const DEFAULT_CAPACITY = 512;

/**
 * Memoize an oracle. The cache holds at most `capacity` units and evicts the
 * oldest insertion first. Undefined widths are cached too.
 */
export function createCachedWidthOracle(
	oracle: WidthOracle,
	capacity = DEFAULT_CAPACITY,
): WidthOracle {
	if (!Number.isInteger(capacity) || capacity < 1) {
		throw new RangeError(
			`capacity must be a positive integer, got ${String(capacity)}`,
		);
	}
	const cache = new Map<string, number | undefined>();

	return unit => {
		if (cache.has(unit)) return cache.get(unit);
		const width = oracle(unit);
		if (cache.size >= capacity) {
			const oldest = cache.keys().next();
			if (!oldest.done) cache.delete(oldest.value);
		}
		cache.set(unit, width);
		return width;
	};
}
