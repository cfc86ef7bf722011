import {
	createStringWidthOracle,
	defaultWidthOracle,
} from '../oracle/stringWidthOracle';
import {
	backwardOf,
	codePointSegmenter,
	graphemeSegmenter,
} from '../segment/segmenters';
import {
	type Segment,
	type Segmenter,
	type TruncateOptions,
	type WidthOracle,
} from './types';

export type EngineConfig = {
	segmenter: Segmenter;
	backward: (text: string) => Iterable<Segment>;
	/** Oracle result with the undefined-width policy applied. */
	widthOf: (unit: string) => number;
};

function pickSegmenter({granularity, segmenter}: TruncateOptions): Segmenter {
	if (segmenter) return segmenter;
	switch (granularity) {
		case undefined:
		case 'grapheme':
			return graphemeSegmenter;
		case 'codePoint':
			return codePointSegmenter;
		default:
			throw new Error(`Unknown granularity "${String(granularity)}"`);
	}
}

function pickOracle({
	widthOracle,
	ambiguousIsNarrow,
}: TruncateOptions): WidthOracle {
	if (widthOracle) return widthOracle;
	if (ambiguousIsNarrow === undefined || ambiguousIsNarrow) {
		return defaultWidthOracle;
	}
	return createStringWidthOracle({ambiguousIsNarrow});
}

export function resolveConfig(options: TruncateOptions = {}): EngineConfig {
	const undefinedWidth = options.undefinedWidth ?? 1;
	if (undefinedWidth !== 0 && undefinedWidth !== 1) {
		throw new RangeError(
			`undefinedWidth must be 0 or 1, got ${String(undefinedWidth)}`,
		);
	}

	const segmenter = pickSegmenter(options);
	const oracle = pickOracle(options);

	return {
		segmenter,
		backward: backwardOf(segmenter),
		widthOf(unit) {
			const width = oracle(unit);
			if (width === undefined || !Number.isSafeInteger(width) || width < 0) {
				return undefinedWidth;
			}
			return width;
		},
	};
}

let defaultConfig: EngineConfig | undefined;

/**
 * Options are resolved per call unless they are absent, in which case the
 * shared default configuration is reused.
 */
export function configFor(options?: TruncateOptions): EngineConfig {
	if (options) return resolveConfig(options);
	defaultConfig ??= resolveConfig();
	return defaultConfig;
}
