import {traced} from '../shared/utils/perf';
import {configFor, type EngineConfig} from './config';
import {truncateAlignedWith} from './truncateAligned';
import {type Alignment, type PadOptions} from './types';
import {normalizeWidth, totalWidth} from './width';

/**
 * Spaces on each side of a text that is `diff` columns short. Centered text
 * puts the odd column on the right.
 */
export function padding(
	diff: number,
	alignment: Alignment,
): [left: number, right: number] {
	switch (alignment) {
		case 'left':
			return [0, diff];
		case 'right':
			return [diff, 0];
		case 'center': {
			const left = Math.floor(diff / 2);
			return [left, diff - left];
		}
		default:
			throw new Error(`Unknown alignment "${String(alignment)}"`);
	}
}

export function padWith(
	text: string,
	targetWidth: number,
	alignment: Alignment,
	truncate: boolean,
	config: EngineConfig,
): string {
	let kept = text;
	let width: number;
	if (truncate) {
		({text: kept, width} = truncateAlignedWith(
			text,
			targetWidth,
			alignment,
			config,
		));
	} else {
		// An overflowing sum is wider than any target.
		width = totalWidth(text, config) ?? Number.POSITIVE_INFINITY;
		if (width >= targetWidth) return text;
	}

	if (width === targetWidth) return kept;

	const [left, right] = padding(targetWidth - width, alignment);
	return ' '.repeat(left) + kept + ' '.repeat(right);
}

/**
 * Pad `text` with spaces to exactly `targetWidth` columns. With `truncate`,
 * wider text is cut first the way `truncateAligned` cuts it; without it,
 * wider text is returned unchanged.
 *
 * @example
 * pad('你', 4, 'left', true) // '你  '
 * pad('你好吗', 5, 'center', true) // '你好 '
 */
export function pad(
	text: string,
	targetWidth: number,
	alignment: Alignment,
	truncate: boolean,
	options?: PadOptions,
): string {
	const target = normalizeWidth(targetWidth, 'targetWidth');
	if (target === Number.POSITIVE_INFINITY) {
		throw new RangeError('targetWidth must be finite');
	}
	return traced(
		{operation: 'pad', text, limit: target, alignment, truncate},
		() => padWith(text, target, alignment, truncate, configFor(options)),
	);
}
