import {type Segment, type Segmenter} from '../core/types';

// Shared instance; Intl.Segmenter is stateless between segment() calls.
const intlSegmenter = new Intl.Segmenter(undefined, {granularity: 'grapheme'});

/**
 * Extended grapheme clusters. Walking backward asks `containing()` for the
 * cluster ending at the current cut, so neither direction materializes the
 * whole segment list.
 */
export const graphemeSegmenter: Segmenter = {
	*forward(text: string): Iterable<Segment> {
		for (const {index, segment} of intlSegmenter.segment(text)) {
			yield {offset: index, length: segment.length};
		}
	},
	*backward(text: string): Iterable<Segment> {
		const segments = intlSegmenter.segment(text);
		let end = text.length;
		while (end > 0) {
			const data = segments.containing(end - 1);
			if (!data) return;
			yield {offset: data.index, length: end - data.index};
			end = data.index;
		}
	},
};

function isHighSurrogate(code: number): boolean {
	return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
	return code >= 0xdc00 && code <= 0xdfff;
}

/**
 * One unit per code point. A surrogate pair stays together; a lone surrogate
 * is a unit of its own.
 */
export const codePointSegmenter: Segmenter = {
	*forward(text: string): Iterable<Segment> {
		let offset = 0;
		while (offset < text.length) {
			const code = text.charCodeAt(offset);
			const length =
				isHighSurrogate(code) &&
				offset + 1 < text.length &&
				isLowSurrogate(text.charCodeAt(offset + 1))
					? 2
					: 1;
			yield {offset, length};
			offset += length;
		}
	},
	*backward(text: string): Iterable<Segment> {
		let end = text.length;
		while (end > 0) {
			const code = text.charCodeAt(end - 1);
			const length =
				isLowSurrogate(code) &&
				end - 2 >= 0 &&
				isHighSurrogate(text.charCodeAt(end - 2))
					? 2
					: 1;
			yield {offset: end - length, length};
			end -= length;
		}
	},
};

/**
 * Backward iteration for segmenters that only walk forward.
 */
export function backwardOf(
	segmenter: Segmenter,
): (text: string) => Iterable<Segment> {
	const {backward} = segmenter;
	if (backward) return text => backward.call(segmenter, text);
	return text => Array.from(segmenter.forward(text)).reverse();
}
