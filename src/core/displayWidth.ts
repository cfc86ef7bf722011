import {configFor, type EngineConfig} from './config';
import {type TruncateOptions} from './types';
import {totalWidth} from './width';

export function displayWidthWith(text: string, config: EngineConfig): number {
	return totalWidth(text, config) ?? Number.MAX_SAFE_INTEGER;
}

/**
 * Display width of `text` in terminal columns, measured unit by unit the
 * same way the truncation functions measure it.
 */
export function displayWidth(text: string, options?: TruncateOptions): number {
	return displayWidthWith(text, configFor(options));
}
