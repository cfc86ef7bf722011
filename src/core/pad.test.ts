import {describe, it, expect} from 'vitest';
import stringWidth from 'string-width';
import {pad, padding} from './pad';

describe('padding', () => {
	it('splits the missing width by alignment', () => {
		expect(padding(4, 'left')).toEqual([0, 4]);
		expect(padding(4, 'right')).toEqual([4, 0]);
		expect(padding(4, 'center')).toEqual([2, 2]);
	});

	it('puts the odd column on the right when centering', () => {
		expect(padding(5, 'center')).toEqual([2, 3]);
		expect(padding(1, 'center')).toEqual([0, 1]);
	});
});

describe('pad', () => {
	it('returns empty for target 0 when truncating', () => {
		expect(pad('你好', 0, 'left', true)).toBe('');
	});

	it('leaves wider text alone without truncate', () => {
		expect(pad('你好', 0, 'left', false)).toBe('你好');
		expect(pad('你好吗', 4, 'left', false)).toBe('你好吗');
		expect(pad('abc', 3, 'right', false)).toBe('abc');
	});

	it('pads narrower text', () => {
		expect(pad('你', 4, 'left', true)).toBe('你  ');
		expect(pad('你', 4, 'left', false)).toBe('你  ');
		expect(pad('ab', 5, 'right', false)).toBe('   ab');
		expect(pad('ab', 7, 'center', false)).toBe('  ab   ');
	});

	it('returns the truncated slice when it fills the target', () => {
		expect(pad('你好吗', 4, 'left', true)).toBe('你好');
		expect(pad('boundary', 5, 'right', true)).toBe('ndary');
	});

	it('fills the gap a straddling wide glyph leaves', () => {
		expect(pad('你好吗', 3, 'left', true)).toBe('你 ');
		expect(pad('你好吗', 1, 'left', true)).toBe(' ');
		expect(pad('你好吗', 5, 'left', true)).toBe('你好 ');
		expect(pad('你好吗', 3, 'right', true)).toBe(' 吗');
		expect(pad('你好吗', 5, 'center', true)).toBe('你好 ');
	});

	it('always reaches the target width when truncating', () => {
		for (const alignment of ['left', 'center', 'right'] as const) {
			for (let target = 0; target <= 8; target++) {
				const result = pad('你a好b吗', target, alignment, true);
				expect(stringWidth(result), `${alignment}/${target}`).toBe(target);
			}
		}
	});

	it('rejects widths that cannot be padded to', () => {
		expect(() => pad('x', Number.POSITIVE_INFINITY, 'left', true)).toThrow(
			RangeError,
		);
		expect(() => pad('x', Number.NaN, 'left', true)).toThrow(
			'targetWidth must be a number, got NaN',
		);
	});
});
