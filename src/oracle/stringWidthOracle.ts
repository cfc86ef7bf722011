import stringWidth from 'string-width';
import {type WidthOracle} from '../core/types';

export type StringWidthOracleOptions = {
	ambiguousIsNarrow?: boolean;
};

const CONTROL_START = /^[\u0000-\u001f\u007f-\u009f]/;

function isPrintableAscii(unit: string): boolean {
	if (unit.length !== 1) return false;
	const code = unit.charCodeAt(0);
	return code >= 0x20 && code <= 0x7e;
}

/**
 * Column widths from string-width. Units starting with a C0/C1 control
 * character have no assigned width; string-width would report 0 for them.
 */
export function createStringWidthOracle({
	ambiguousIsNarrow = true,
}: StringWidthOracleOptions = {}): WidthOracle {
	return unit => {
		if (isPrintableAscii(unit)) return 1;
		if (CONTROL_START.test(unit)) return undefined;
		return stringWidth(unit, {ambiguousIsNarrow, countAnsiEscapeCodes: true});
	};
}

export const defaultWidthOracle: WidthOracle = createStringWidthOracle();
