import fs from 'node:fs';
import path from 'node:path';
import process from 'node:process';
import {performance} from 'node:perf_hooks';
import {type Alignment, type TruncationResult} from '../../core/types';

export type TracedOperation =
	| 'truncate.end'
	| 'truncate.start'
	| 'truncate.centered'
	| 'truncate.aligned'
	| 'pad';

export type OperationTrace = {
	operation: TracedOperation;
	text: string;
	/** Normalized `maxWidth`, or the target width for `pad`. */
	limit: number;
	alignment?: Alignment;
	truncate?: boolean;
};

/** A truncation result, or the string `pad` produced. */
export type TraceOutcome = TruncationResult | string;

type SlowOperationEvent = {
	type: 'slow.op';
	ts: number;
	operation: TracedOperation;
	alignment?: Alignment;
	truncate?: boolean;
	input_units: number;
	limit: number;
	kept_units: number;
	width?: number;
	duration_ms: number;
	threshold_ms: number;
};

type OpenLog = {path: string; stream: fs.WriteStream};

const DEFAULT_SLOW_MS = 8;

// `failed` sticks until the next flush.
let log: OpenLog | 'failed' | undefined;

function profiling(): boolean {
	return process.env['COLUMN_TRIM_PROFILE'] === '1';
}

function slowThresholdMs(): number {
	const raw = process.env['COLUMN_TRIM_PROFILE_SLOW_MS'];
	const value = raw ? Number(raw) : Number.NaN;
	return Number.isFinite(value) ? value : DEFAULT_SLOW_MS;
}

function logFilePath(): string {
	const configured = process.env['COLUMN_TRIM_PROFILE_LOG'];
	if (configured) return path.resolve(configured);
	const stamp = new Date().toISOString().replace(/[:.]/g, '-');
	return path.resolve('.profiles', `column-trim-perf-${stamp}.ndjson`);
}

function openLog(): OpenLog | undefined {
	if (log === 'failed') return undefined;
	if (log) return log;

	const target = logFilePath();
	try {
		fs.mkdirSync(path.dirname(target), {recursive: true});
	} catch {
		log = 'failed';
		return undefined;
	}
	const stream = fs.createWriteStream(target, {flags: 'a'});
	stream.on('error', () => {
		log = 'failed';
	});
	log = {path: target, stream};
	return log;
}

function record(event: SlowOperationEvent): void {
	// Optional fields left undefined are dropped by JSON.stringify.
	openLog()?.stream.write(`${JSON.stringify(event)}\n`);
}

function slowEvent(
	trace: OperationTrace,
	outcome: TraceOutcome,
	durationMs: number,
	thresholdMs: number,
): SlowOperationEvent {
	const kept = typeof outcome === 'string' ? outcome : outcome.text;
	return {
		type: 'slow.op',
		ts: Date.now(),
		operation: trace.operation,
		alignment: trace.alignment,
		truncate: trace.truncate,
		input_units: trace.text.length,
		limit: trace.limit,
		kept_units: kept.length,
		width: typeof outcome === 'string' ? undefined : outcome.width,
		duration_ms: Math.round(durationMs * 1000) / 1000,
		threshold_ms: thresholdMs,
	};
}

export function isPerfEnabled(): boolean {
	return profiling();
}

export function getPerfLogPath(): string | null {
	if (!profiling()) return null;
	return openLog()?.path ?? null;
}

/**
 * Run one engine operation. With `COLUMN_TRIM_PROFILE=1`, a run that takes
 * at least `COLUMN_TRIM_PROFILE_SLOW_MS` (8ms by default) is logged as a
 * `slow.op` event describing what was kept.
 */
export function traced<T extends TraceOutcome>(
	trace: OperationTrace,
	run: () => T,
): T {
	if (!profiling()) return run();

	const thresholdMs = slowThresholdMs();
	const startedAt = performance.now();
	const outcome = run();
	const durationMs = performance.now() - startedAt;
	if (durationMs >= thresholdMs) {
		record(slowEvent(trace, outcome, durationMs, thresholdMs));
	}
	return outcome;
}

/**
 * Close the log once pending writes are flushed. The next slow operation
 * opens a fresh one.
 */
export async function flushPerfLog(): Promise<void> {
	const current = log;
	log = undefined;
	if (current === undefined || current === 'failed') return;
	await new Promise<void>((resolve, reject) => {
		current.stream.once('error', reject);
		current.stream.end(() => {
			resolve();
		});
	});
}
