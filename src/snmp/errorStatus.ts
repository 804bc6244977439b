/** Error-status texts of RFC 3416, indexed by code. */
const errorText: Record<number, string> = {
	0: 'no error',
	1: 'too big',
	2: 'no such name',
	3: 'bad value',
	4: 'read only',
	5: 'gen err',
	6: 'no access',
	7: 'wrong type',
	8: 'wrong length',
	9: 'wrong encoding',
	10: 'wrong value',
	11: 'no creation',
	12: 'inconsistent value',
	13: 'resource unavailable',
	14: 'commit failed',
	15: 'undo failed',
	16: 'authorization error',
	17: 'not writable',
	18: 'inconsistent name',
}

/**
 * Describe a response error-status code, e.g. `2` → `no such name`.
 * Codes outside the table render as `code <n>`.
 */
export const errorStatusText = (code: number): string => errorText[code] ?? `code ${code}`
