/**
 * Width arithmetic shared by every strategy: argument normalization,
 * overflow-checked sums and the unit streams the strategies fold over.
 */

import {type EngineConfig} from './config';
import {type MeasuredUnit, type Segment, type TruncationResult} from './types';

export function emptyResult(): TruncationResult {
	return {text: '', width: 0};
}

/**
 * Clamp a caller-supplied width to a non-negative integer.
 * Infinity is kept and means "no limit".
 */
export function normalizeWidth(value: number, name = 'maxWidth'): number {
	if (Number.isNaN(value)) {
		throw new RangeError(`${name} must be a number, got NaN`);
	}
	if (value <= 0) return 0;
	if (value === Number.POSITIVE_INFINITY) return value;
	return Math.floor(value);
}

/**
 * Add two widths, or return undefined once the sum leaves the safe-integer
 * range. Callers treat undefined as "at least the limit" and stop extending.
 */
export function checkedAdd(a: number, b: number): number | undefined {
	const sum = a + b;
	return Number.isSafeInteger(sum) ? sum : undefined;
}

function* measure(
	text: string,
	segments: Iterable<Segment>,
	config: EngineConfig,
): Generator<MeasuredUnit> {
	for (const {offset, length} of segments) {
		yield {
			offset,
			length,
			width: config.widthOf(text.slice(offset, offset + length)),
		};
	}
}

export function unitsForward(
	text: string,
	config: EngineConfig,
): Generator<MeasuredUnit> {
	return measure(text, config.segmenter.forward(text), config);
}

export function unitsBackward(
	text: string,
	config: EngineConfig,
): Generator<MeasuredUnit> {
	return measure(text, config.backward(text), config);
}

/**
 * Total width of `text`, or undefined when the sum overflows.
 */
export function totalWidth(
	text: string,
	config: EngineConfig,
): number | undefined {
	let total = 0;
	for (const unit of unitsForward(text, config)) {
		const next = checkedAdd(total, unit.width);
		if (next === undefined) return undefined;
		total = next;
	}
	return total;
}
