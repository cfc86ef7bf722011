import {traced} from '../shared/utils/perf';
import {configFor, type EngineConfig} from './config';
import {type TruncateOptions, type TruncationResult} from './types';
import {checkedAdd, emptyResult, normalizeWidth, unitsBackward} from './width';

export function truncateStartWith(
	text: string,
	maxWidth: number,
	config: EngineConfig,
): TruncationResult {
	if (maxWidth === 0) return emptyResult();

	let cut = text.length;
	let cutWidth = 0;
	let width = 0;
	for (const unit of unitsBackward(text, config)) {
		const next = checkedAdd(width, unit.width);
		if (next === undefined || next > maxWidth) {
			return {text: text.slice(cut), width: cutWidth};
		}
		width = next;
		// Zero-width units only enter the result behind a visible unit.
		if (unit.width > 0) {
			cut = unit.offset;
			cutWidth = width;
		}
	}

	return {text, width};
}

/**
 * Keep the longest suffix of `text` whose display width is at most
 * `maxWidth`. Zero-width units left at the front by the cut are dropped
 * along with the unit they belonged to.
 *
 * @example
 * truncateStart('你好吗', 4) // {text: '好吗', width: 4}
 */
export function truncateStart(
	text: string,
	maxWidth: number,
	options?: TruncateOptions,
): TruncationResult {
	const limit = normalizeWidth(maxWidth);
	return traced({operation: 'truncate.start', text, limit}, () =>
		truncateStartWith(text, limit, configFor(options)),
	);
}
