import {configFor, type EngineConfig} from './config';
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

export function truncateAlignedWith(
	text: string,
	maxWidth: number,
	alignment: Alignment,
	config: EngineConfig,
): TruncationResult {
	switch (alignment) {
		case 'left':
			return truncateEndWith(text, maxWidth, config);
		case 'right':
			return truncateStartWith(text, maxWidth, config);
		case 'center':
			return truncateCenteredWith(text, maxWidth, config);
		default:
			throw new Error(`Unknown alignment "${String(alignment)}"`);
	}
}

/**
 * Truncate so that the kept text sits where `alignment` would place it:
 * left-aligned text loses its end, right-aligned text its start, centered
 * text both.
 */
export function truncateAligned(
	text: string,
	maxWidth: number,
	alignment: Alignment,
	options?: TruncateOptions,
): TruncationResult {
	const limit = normalizeWidth(maxWidth);
	return traced({operation: 'truncate.aligned', text, limit, alignment}, () =>
		truncateAlignedWith(text, limit, alignment, configFor(options)),
	);
}
