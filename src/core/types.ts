/**
 * Shared types for the truncation engine.
 *
 * All offsets and lengths are UTF-16 code units into the input string.
 */

export type Alignment = 'left' | 'center' | 'right';

export type Granularity = 'grapheme' | 'codePoint';

export type Segment = {
	offset: number;
	length: number;
};

/**
 * Splits a text into atomic units. `backward` yields the same segments in
 * reverse order; when omitted it is derived from `forward`.
 */
export type Segmenter = {
	forward(text: string): Iterable<Segment>;
	backward?(text: string): Iterable<Segment>;
};

/**
 * Column width of one unit. `undefined` means the unit has no assigned width
 * (typically a control character).
 */
export type WidthOracle = (unit: string) => number | undefined;

export type MeasuredUnit = Segment & {
	width: number;
};

export type TruncationResult = {
	text: string;
	width: number;
};

export type TruncateOptions = {
	granularity?: Granularity;
	/** Takes precedence over `granularity`. */
	segmenter?: Segmenter;
	widthOracle?: WidthOracle;
	/** Width charged for units the oracle leaves undefined. Defaults to 1. */
	undefinedWidth?: 0 | 1;
	/** Passed to the default oracle only. Defaults to true. */
	ambiguousIsNarrow?: boolean;
};

export type PadOptions = TruncateOptions;
