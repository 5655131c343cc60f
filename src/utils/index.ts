export {
	formatBluetoothAddress,
	MAX_BLUETOOTH_ADDRESS,
	parseBluetoothAddress,
} from "./address";

export { copyInto, readByteChecked, readUint16LEChecked } from "./buffer";

export { BLUETOOTH_UUID_BASE, uuidMatches } from "./uuid";
