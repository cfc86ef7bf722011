import {traced} from '../shared/utils/perf';
import {configFor, type EngineConfig} from './config';
import {type TruncateOptions, type TruncationResult} from './types';
import {checkedAdd, emptyResult, normalizeWidth, unitsForward} from './width';

export function truncateEndWith(
	text: string,
	maxWidth: number,
	config: EngineConfig,
): TruncationResult {
	if (maxWidth === 0) return emptyResult();

	let cut = 0;
	let cutWidth = 0;
	let width = 0;
	let exhausted = true;
	for (const unit of unitsForward(text, config)) {
		if (width > maxWidth) {
			exhausted = false;
			break;
		}
		// Boundary before this unit; zero-width units after a fitting unit
		// keep moving the cut forward.
		cut = unit.offset;
		cutWidth = width;
		const next = checkedAdd(width, unit.width);
		if (next === undefined) {
			exhausted = false;
			break;
		}
		width = next;
	}

	if (exhausted && width <= maxWidth) return {text, width};
	return {text: text.slice(0, cut), width: cutWidth};
}

/**
 * Keep the longest prefix of `text` whose display width is at most
 * `maxWidth`. The returned width may be less than `maxWidth` when a wide
 * unit straddles the limit.
 *
 * @example
 * truncateEnd('你好吗', 5) // {text: '你好', width: 4}
 */
export function truncateEnd(
	text: string,
	maxWidth: number,
	options?: TruncateOptions,
): TruncationResult {
	const limit = normalizeWidth(maxWidth);
	return traced({operation: 'truncate.end', text, limit}, () =>
		truncateEndWith(text, limit, configFor(options)),
	);
}
