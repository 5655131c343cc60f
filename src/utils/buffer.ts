/**
 * Bounds-checked little-endian readers. Every reader takes an `end`
 * limit so callers can decode a prefix of a larger backing buffer
 * without ever touching bytes past it.
 */

/** Helper to safely read a byte with bounds checking */
function safeReadByte(
	data: Uint8Array,
	offset: number,
	end: number,
): number | undefined {
	const limit = Math.min(end, data.length);
	if (offset < 0 || offset >= limit) {
		return undefined;
	}
	return data[offset];
}

/**
 * Reads a single byte, returning undefined for offsets outside `[0, end)`.
 * Unlike a plain index, this distinguishes actual zero values from
 * read errors.
 */
export function readByteChecked(
	data: Uint8Array,
	offset: number,
	end: number = data.length,
): number | undefined {
	return safeReadByte(data, offset, end);
}

/**
 * Reads a 16-bit little-endian value, returning undefined unless both
 * bytes lie inside `[0, end)`.
 */
export function readUint16LEChecked(
	data: Uint8Array,
	offset: number,
	end: number = data.length,
): number | undefined {
	const b0 = safeReadByte(data, offset, end);
	const b1 = safeReadByte(data, offset + 1, end);
	if (b0 === undefined || b1 === undefined) {
		return undefined;
	}
	return b0 | (b1 << 8);
}

/**
 * Copies `source` into `target` starting at offset 0.
 * Returns the number of bytes copied.
 */
export function copyInto(target: Uint8Array, source: Uint8Array): number {
	const count = Math.min(target.length, source.length);
	target.set(source.subarray(0, count));
	return count;
}
