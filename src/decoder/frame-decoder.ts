import {
	ContactSensorStatus,
	type HeartRateMeasurement,
	HeartRateFlags,
} from "../types";
import { readByteChecked, readUint16LEChecked } from "../utils/buffer";

/**
 * Decodes a Heart Rate Measurement (0x2A37) frame.
 *
 * Layout, little-endian:
 *
 * | Offset | Field | Encoding |
 * |---|---|---|
 * | 0 | flags | bit0 IsShort, bits1-2 contact status, bit3 energy, bit4 RR |
 * | 1 | BPM | u8, or u16 when IsShort |
 * | next | energy expended | u16, iff flagged |
 * | rest | RR intervals | u16 each, iff flagged |
 *
 * Only the first `length` bytes are read, so a reused scratch buffer
 * larger than the frame is safe to pass. An odd trailing byte in the
 * RR section is discarded.
 *
 * @param bytes - Frame bytes, possibly a larger backing buffer
 * @param length - Number of valid bytes (default: `bytes.length`)
 * @returns The decoded measurement, or `null` if the frame is shorter
 *   than its own flags require
 *
 * @example
 * ```typescript
 * decodeHeartRateMeasurement(new Uint8Array([0x00, 0x4b]));
 * // { isError: false, flags: 0, status: NotSupported, beatsPerMinute: 75, rrIntervals: [] }
 * ```
 */
export function decodeHeartRateMeasurement(
	bytes: Uint8Array,
	length: number = bytes.length,
): HeartRateMeasurement | null {
	const end = Math.max(0, Math.min(length, bytes.length));
	const flags = readByteChecked(bytes, 0, end);
	if (flags === undefined) return null;

	const isShort = (flags & HeartRateFlags.IsShort) !== 0;
	const hasEnergyExpended = (flags & HeartRateFlags.HasEnergyExpended) !== 0;
	const hasRRInterval = (flags & HeartRateFlags.HasRRInterval) !== 0;
	const status: ContactSensorStatus = (flags >> 1) & 0b11;

	const minLength = isShort ? 3 : 2;
	if (end < minLength) return null;

	let offset = 1;
	const beatsPerMinute = isShort
		? readUint16LEChecked(bytes, offset, end)
		: readByteChecked(bytes, offset, end);
	if (beatsPerMinute === undefined) return null;
	offset += isShort ? 2 : 1;

	let energyExpended: number | undefined;
	if (hasEnergyExpended) {
		energyExpended = readUint16LEChecked(bytes, offset, end);
		// Flagged but truncated
		if (energyExpended === undefined) return null;
		offset += 2;
	}

	const rrIntervals: number[] = [];
	if (hasRRInterval) {
		const count = Math.floor((end - offset) / 2);
		for (let i = 0; i < count; i++) {
			const value = readUint16LEChecked(bytes, offset + i * 2, end);
			if (value === undefined) break;
			rrIntervals.push(value);
		}
	}

	return {
		isError: false,
		flags,
		status,
		beatsPerMinute,
		...(energyExpended === undefined ? {} : { energyExpended }),
		rrIntervals,
	};
}

/** RR intervals are reported in units of 1/1024 second. */
export const RR_INTERVAL_UNITS_PER_SECOND = 1024;

/**
 * Converts raw RR interval values to milliseconds.
 */
export function rrIntervalsToMilliseconds(
	values: readonly number[],
): number[] {
	return values.map((v) => (v * 1000) / RR_INTERVAL_UNITS_PER_SECOND);
}
