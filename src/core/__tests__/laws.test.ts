import {describe, it, expect} from 'vitest';
import stringWidth from 'string-width';
import {displayWidth} from '../displayWidth';
import {pad} from '../pad';
import {truncateCentered} from '../truncateCentered';
import {truncateEnd} from '../truncateEnd';
import {truncateStart} from '../truncateStart';
import {
	type Alignment,
	type TruncateOptions,
	type TruncationResult,
} from '../types';

const PRINTABLE = [
	'hello world',
	'你好吗',
	'boundaryboundary',
	'ab\u{1F3F3}\uFE0F\u200D\u{1F308}cd',
	'mix 中文 and ascii',
	'\u{1F468}\u200D\u{1F469}\u200D\u{1F467} family',
	'café au lait',
	'ab\u200Bcd\u200Bef',
	'한국어 텍스트',
	'\u{1F600}x\u{1F600}y\u{1F600}',
];

// Control characters have no width of their own.
const CORPUS = [...PRINTABLE, 'tab\there', 'crlf\r\nnext', '\u0007bell\u0007'];

const STRATEGIES: Array<
	[
		string,
		(
			text: string,
			maxWidth: number,
			options?: TruncateOptions,
		) => TruncationResult,
	]
> = [
	['truncateEnd', truncateEnd],
	['truncateStart', truncateStart],
	['truncateCentered', truncateCentered],
];

const POLICIES: Array<[string, TruncateOptions]> = [
	['graphemes', {}],
	['code points', {granularity: 'codePoint'}],
	['undefined width 0', {undefinedWidth: 0}],
];

const ALIGNMENTS: Alignment[] = ['left', 'center', 'right'];

const segmenter = new Intl.Segmenter(undefined, {granularity: 'grapheme'});

function units(text: string, options: TruncateOptions): string[] {
	if (options.granularity === 'codePoint') return Array.from(text);
	return Array.from(segmenter.segment(text), part => part.segment);
}

function isUnitRun(part: string[], whole: string[]): boolean {
	if (part.length === 0) return true;
	for (let start = 0; start + part.length <= whole.length; start++) {
		if (part.every((unit, index) => unit === whole[start + index])) {
			return true;
		}
	}
	return false;
}

describe.each(POLICIES)('with %s', (_policy, options) => {
	describe.each(STRATEGIES)('%s', (_name, truncate) => {
		it.each(CORPUS)('keeps within the limit for %j', text => {
			const total = displayWidth(text, options);
			for (let maxWidth = 0; maxWidth <= total + 1; maxWidth++) {
				const result = truncate(text, maxWidth, options);
				expect(result.width).toBeLessThanOrEqual(maxWidth);
				expect(displayWidth(result.text, options)).toBe(result.width);
			}
		});

		it.each(CORPUS)('cuts on unit boundaries for %j', text => {
			const whole = units(text, options);
			const total = displayWidth(text, options);
			for (let maxWidth = 0; maxWidth <= total; maxWidth++) {
				const {text: kept} = truncate(text, maxWidth, options);
				expect(isUnitRun(units(kept, options), whole)).toBe(true);
			}
		});

		it.each(CORPUS)('returns fitting text unchanged for %j', text => {
			const total = displayWidth(text, options);
			expect(truncate(text, total, options)).toEqual({text, width: total});
			expect(truncate(text, total + 5, options)).toEqual({
				text,
				width: total,
			});
		});

		it.each(CORPUS)('returns empty for max width 0 on %j', text => {
			expect(truncate(text, 0, options)).toEqual({text: '', width: 0});
		});

		it.each(CORPUS)('is idempotent on %j', text => {
			const total = displayWidth(text, options);
			for (let maxWidth = 0; maxWidth <= total; maxWidth++) {
				const once = truncate(text, maxWidth, options);
				expect(truncate(once.text, maxWidth, options)).toEqual(once);
			}
		});
	});

	describe('pad', () => {
		it.each(CORPUS)('hits the target width exactly for %j', text => {
			const total = displayWidth(text, options);
			for (const alignment of ALIGNMENTS) {
				for (let target = 0; target <= total + 2; target++) {
					const padded = pad(text, target, alignment, true, options);
					expect(displayWidth(padded, options)).toBe(target);
				}
			}
		});
	});
});

describe('default width measure', () => {
	it.each(PRINTABLE)('agrees with string-width on %j', text => {
		const total = displayWidth(text);
		expect(total).toBe(stringWidth(text));
		for (let maxWidth = 0; maxWidth <= total; maxWidth++) {
			for (const truncate of [truncateEnd, truncateStart, truncateCentered]) {
				const result = truncate(text, maxWidth);
				expect(stringWidth(result.text)).toBe(result.width);
			}
		}
	});
});
