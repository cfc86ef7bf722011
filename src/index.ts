/**
 * Public API.
 *
 * Usage:
 *   import {truncateEnd, pad} from 'column-trim';
 *   truncateEnd('你好吗', 5)         // {text: '你好', width: 4}
 *   pad('你', 4, 'left', true)       // '你  '
 */

export {displayWidth} from './core/displayWidth';
export {pad, padding} from './core/pad';
export {truncateAligned} from './core/truncateAligned';
export {truncateCentered} from './core/truncateCentered';
export {truncateEnd} from './core/truncateEnd';
export {truncateStart} from './core/truncateStart';
export {createTruncator, type Truncator} from './core/truncator';
export type {
	Alignment,
	Granularity,
	MeasuredUnit,
	PadOptions,
	Segment,
	Segmenter,
	TruncateOptions,
	TruncationResult,
	WidthOracle,
} from './core/types';

export {createCachedWidthOracle} from './oracle/cachedOracle';
export {
	createStringWidthOracle,
	defaultWidthOracle,
	type StringWidthOracleOptions,
} from './oracle/stringWidthOracle';
export {codePointSegmenter, graphemeSegmenter} from './segment/segmenters';

export {
	flushPerfLog,
	getPerfLogPath,
	isPerfEnabled,
} from './shared/utils/perf';
