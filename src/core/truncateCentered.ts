import {traced} from '../shared/utils/perf';
import {configFor, type EngineConfig} from './config';
import {
	type MeasuredUnit,
	type TruncateOptions,
	type TruncationResult,
} from './types';
import {
	checkedAdd,
	emptyResult,
	normalizeWidth,
	totalWidth,
	unitsBackward,
	unitsForward,
} from './width';

/** A candidate cut and the width it removes from its side of the text. */
type CutPoint = {
	offset: number;
	removed: number;
};

/**
 * Start cuts: each visible unit, paired with the width before it.
 */
function* startCuts(units: Iterable<MeasuredUnit>): Generator<CutPoint> {
	let removed = 0;
	for (const unit of units) {
		if (unit.width > 0) yield {offset: unit.offset, removed};
		const next = checkedAdd(removed, unit.width);
		if (next === undefined) return;
		removed = next;
	}
}

/**
 * End cuts, walking backward: each visible unit, paired with the width from
 * it to the end of the text.
 */
function* endCuts(units: Iterable<MeasuredUnit>): Generator<CutPoint> {
	let removed = 0;
	for (const unit of units) {
		const next = checkedAdd(removed, unit.width);
		if (next === undefined) return;
		removed = next;
		if (unit.width > 0) yield {offset: unit.offset, removed};
	}
}

type View = {
	/** Last cut consumed so far. */
	current: CutPoint;
	/** Next cut to consume, if any. */
	head: CutPoint | undefined;
	rest: Iterator<CutPoint>;
};

/**
 * Consume every cut removing less than `threshold`. The last one consumed
 * becomes the view's current cut, so the merge continues from exactly the
 * state it would have reached by consuming those cuts one at a time.
 */
function fastForward(
	cuts: Iterator<CutPoint>,
	initial: CutPoint,
	threshold: number,
): View {
	let current = initial;
	let step = cuts.next();
	while (!step.done && step.value.removed < threshold) {
		current = step.value;
		step = cuts.next();
	}
	return {current, head: step.done ? undefined : step.value, rest: cuts};
}

function advance(view: View, head: CutPoint): void {
	view.current = head;
	const step = view.rest.next();
	view.head = step.done ? undefined : step.value;
}

export function truncateCenteredWith(
	text: string,
	maxWidth: number,
	config: EngineConfig,
): TruncationResult {
	if (maxWidth === 0) return emptyResult();

	const total = totalWidth(text, config);
	if (total === undefined) return emptyResult();
	if (total <= maxWidth) return {text, width: total};

	const minRemoval = total - maxWidth;
	// Both sides remove less than half of minRemoval before the merge can
	// stop, so everything below this threshold is consumed unconditionally.
	const threshold = Math.floor(Math.max(0, minRemoval - 2) / 2);

	const start = fastForward(
		startCuts(unitsForward(text, config)),
		{offset: 0, removed: 0},
		threshold,
	);
	const end = fastForward(
		endCuts(unitsBackward(text, config)),
		{offset: text.length, removed: 0},
		threshold,
	);

	while (start.head ?? end.head) {
		// Ties trim the end first.
		if (
			start.head &&
			(end.head === undefined || start.head.removed < end.head.removed)
		) {
			advance(start, start.head);
		} else if (end.head) {
			advance(end, end.head);
		}

		const removed = start.current.removed + end.current.removed;
		if (removed >= minRemoval) {
			if (start.current.offset > end.current.offset) return emptyResult();
			return {
				text: text.slice(start.current.offset, end.current.offset),
				width: total - removed,
			};
		}
	}

	return emptyResult();
}

/**
 * Remove at least `width(text) - maxWidth` columns, split between both ends
 * so the remaining text stays centered. When both ends have removed the
 * same width, the end loses the next unit.
 *
 * @example
 * truncateCentered('boundaryboundary', 5) // {text: 'arybo', width: 5}
 */
export function truncateCentered(
	text: string,
	maxWidth: number,
	options?: TruncateOptions,
): TruncationResult {
	const limit = normalizeWidth(maxWidth);
	return traced({operation: 'truncate.centered', text, limit}, () =>
		truncateCenteredWith(text, limit, configFor(options)),
	);
}
