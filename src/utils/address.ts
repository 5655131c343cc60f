/** Largest 48-bit device address. */
export const MAX_BLUETOOTH_ADDRESS = 0xffff_ffff_ffff;

const COLON_FORM = /^[0-9a-f]{2}(:[0-9a-f]{2}){5}$/i;
const BARE_HEX_FORM = /^[0-9a-f]{12}$/i;
const DECIMAL_FORM = /^\d+$/;

function isValidAddress(value: number): boolean {
	return (
		Number.isSafeInteger(value) && value >= 0 && value <= MAX_BLUETOOTH_ADDRESS
	);
}

/**
 * Parses a 48-bit Bluetooth device address.
 *
 * Accepts an integer, a decimal string, `AA:BB:CC:DD:EE:FF` or
 * `aabbccddeeff`.
 *
 * @returns The address, or `null` if the value isn't a valid address
 *
 * @example
 * ```typescript
 * parseBluetoothAddress("c0:ff:ee:00:00:01"); // 0xc0ffee000001
 * parseBluetoothAddress("212205442170881");   // 0xc0ffee000001
 * parseBluetoothAddress("nope");              // null
 * ```
 */
export function parseBluetoothAddress(value: number | string): number | null {
	if (typeof value === "number") {
		return isValidAddress(value) ? value : null;
	}

	const trimmed = value.trim();
	let parsed: number;

	if (COLON_FORM.test(trimmed)) {
		parsed = Number.parseInt(trimmed.replace(/:/g, ""), 16);
	} else if (BARE_HEX_FORM.test(trimmed) && !DECIMAL_FORM.test(trimmed)) {
		parsed = Number.parseInt(trimmed, 16);
	} else if (DECIMAL_FORM.test(trimmed)) {
		parsed = Number(trimmed);
	} else {
		return null;
	}

	return isValidAddress(parsed) ? parsed : null;
}

/**
 * Formats an address as lowercase colon-separated hex, the form
 * Linux Bluetooth stacks report.
 *
 * @throws RangeError if the value isn't a 48-bit address
 */
export function formatBluetoothAddress(address: number): string {
	if (!isValidAddress(address)) {
		throw new RangeError(`Not a 48-bit Bluetooth address: ${address}`);
	}
	const hex = address.toString(16).padStart(12, "0");
	return hex.match(/../g)?.join(":") ?? hex;
}
