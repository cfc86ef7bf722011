import {resolveConfig} from './config';
import {displayWidthWith} from './displayWidth';
import {padWith} from './pad';
import {truncateAlignedWith} from './truncateAligned';
import {truncateCenteredWith} from './truncateCentered';
import {truncateEndWith} from './truncateEnd';
import {truncateStartWith} from './truncateStart';
import {
	type Alignment,
	type TruncateOptions,
	type TruncationResult,
} from './types';
import {normalizeWidth} from './width';
import {traced} from '../shared/utils/perf';

export type Truncator = {
	displayWidth(text: string): number;
	truncateEnd(text: string, maxWidth: number): TruncationResult;
	truncateStart(text: string, maxWidth: number): TruncationResult;
	truncateCentered(text: string, maxWidth: number): TruncationResult;
	truncateAligned(
		text: string,
		maxWidth: number,
		alignment: Alignment,
	): TruncationResult;
	pad(
		text: string,
		targetWidth: number,
		alignment: Alignment,
		truncate: boolean,
	): string;
};

/**
 * Resolve `options` once and bind every operation to the result. Useful when
 * many strings are fitted with the same segmenter and width policy.
 *
 * Usage:
 *   const fit = createTruncator({granularity: 'codePoint', undefinedWidth: 0});
 *   fit.pad(label, 12, 'center', true);
 */
export function createTruncator(options: TruncateOptions = {}): Truncator {
	const config = resolveConfig(options);

	return {
		displayWidth: text => displayWidthWith(text, config),
		truncateEnd(text, maxWidth) {
			const limit = normalizeWidth(maxWidth);
			return traced({operation: 'truncate.end', text, limit}, () =>
				truncateEndWith(text, limit, config),
			);
		},
		truncateStart(text, maxWidth) {
			const limit = normalizeWidth(maxWidth);
			return traced({operation: 'truncate.start', text, limit}, () =>
				truncateStartWith(text, limit, config),
			);
		},
		truncateCentered(text, maxWidth) {
			const limit = normalizeWidth(maxWidth);
			return traced({operation: 'truncate.centered', text, limit}, () =>
				truncateCenteredWith(text, limit, config),
			);
		},
		truncateAligned(text, maxWidth, alignment) {
			const limit = normalizeWidth(maxWidth);
			return traced(
				{operation: 'truncate.aligned', text, limit, alignment},
				() => truncateAlignedWith(text, limit, alignment, config),
			);
		},
		pad(text, targetWidth, alignment, truncate) {
			const target = normalizeWidth(targetWidth, 'targetWidth');
			if (target === Number.POSITIVE_INFINITY) {
				throw new RangeError('targetWidth must be finite');
			}
			return traced(
				{operation: 'pad', text, limit: target, alignment, truncate},
				() => padWith(text, target, alignment, truncate, config),
			);
		},
	};
}
