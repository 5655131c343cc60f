/** Bluetooth Base UUID suffix shared by every 16-bit UUID */
export const BLUETOOTH_UUID_BASE = "-0000-1000-8000-00805f9b34fb";

/**
 * Checks if a UUID matches a short UUID identifier.
 * Accepts short IDs, dashed 128-bit UUIDs and the undashed 32-character
 * form noble reports.
 *
 * @example
 * ```typescript
 * uuidMatches("0000180d-0000-1000-8000-00805f9b34fb", "180d"); // true
 * uuidMatches("0000180d00001000800000805f9b34fb", "180d");     // true
 * uuidMatches("180D", "180d");                                 // true
 * ```
 */
export function uuidMatches(uuid: string, shortId: string): boolean {
	const normalized = uuid.toLowerCase().replace(/-/g, "");
	const shortNormalized = shortId.toLowerCase().padStart(4, "0");

	if (normalized.length <= 4) {
		return normalized.padStart(4, "0") === shortNormalized;
	}

	// Full form: 0000XXXX00001000800000805f9b34fb
	if (normalized.length === 32) {
		const base = BLUETOOTH_UUID_BASE.replace(/-/g, "");
		return (
			normalized.startsWith("0000") &&
			normalized.endsWith(base) &&
			normalized.substring(4, 8) === shortNormalized
		);
	}

	return false;
}
