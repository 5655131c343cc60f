import { EventEmitter } from "node:events";
import noble from "@abandonware/noble";
import { beforeEach, describe, expect, it, type Mock, vi } from "vitest";
import { createMockLogger } from "../__tests__/fakes/mock-backend";
import { TimeoutError } from "../errors/errors";
import { createNobleBackend } from "./noble";

vi.mock("@abandonware/noble", async () => {
	const { EventEmitter: Emitter } = await import("node:events");
	const fake = Object.assign(new Emitter(), {
		_state: "poweredOn",
		startScanningAsync: vi.fn(async (): Promise<void> => {}),
		stopScanningAsync: vi.fn(async (): Promise<void> => {}),
	});
	return { default: fake };
});

type FakeNoble = EventEmitter & {
	_state: string;
	startScanningAsync: Mock<
		(serviceUuids?: string[], allowDuplicates?: boolean) => Promise<void>
	>;
	stopScanningAsync: Mock<() => Promise<void>>;
};

const fakeNoble = noble as unknown as FakeNoble;

class FakeCharacteristic extends EventEmitter {
	properties = ["read", "notify"];
	subscribeAsync = vi.fn(async (): Promise<void> => {});
	unsubscribeAsync = vi.fn(async (): Promise<void> => {});

	constructor(public uuid: string) {
		super();
	}
}

class FakeService {
	characteristic = new FakeCharacteristic("2a37");
	discoverCharacteristicsAsync = vi.fn(
		async (): Promise<FakeCharacteristic[]> => [this.characteristic],
	);

	constructor(public uuid: string) {}
}

class FakePeripheral extends EventEmitter {
	state = "disconnected";
	rssi = -55;
	advertisement: { localName: string; serviceUuids: string[] };
	service = new FakeService("0000180d00001000800000805f9b34fb");

	connectAsync = vi.fn(async (): Promise<void> => {
		this.state = "connected";
	});
	disconnectAsync = vi.fn(async (): Promise<void> => {
		this.state = "disconnected";
	});
	discoverServicesAsync = vi.fn(async (): Promise<FakeService[]> => [this.service]);

	constructor(
		public id: string,
		public address: string,
		localName = "HRM",
		serviceUuids: string[] = ["180d"],
	) {
		super();
		this.advertisement = { localName, serviceUuids };
	}
}

/** Makes the next scan report `peripherals` as soon as it starts. */
function discoverOnScan(...peripherals: FakePeripheral[]): void {
	fakeNoble.startScanningAsync.mockImplementationOnce(async () => {
		for (const peripheral of peripherals) {
			fakeNoble.emit("discover", peripheral);
		}
	});
}

describe("createNobleBackend", () => {
	beforeEach(() => {
		vi.clearAllMocks();
		fakeNoble.removeAllListeners();
		fakeNoble._state = "poweredOn";
	});

	describe("findDevices", () => {
		it("scans for heart-rate devices until the scan times out", async () => {
			const sensor = new FakePeripheral("p1", "c0:ff:ee:00:00:01");
			const other = new FakePeripheral("p2", "11:22:33:44:55:66", "Lamp", ["fff0"]);
			discoverOnScan(sensor, other);
			const backend = createNobleBackend({ scanTimeoutMs: 10 });

			const candidates = await backend.findDevices({});

			expect(fakeNoble.startScanningAsync).toHaveBeenCalledWith(["180d"], false);
			expect(fakeNoble.stopScanningAsync).toHaveBeenCalledTimes(1);
			expect(candidates).toHaveLength(1);
			expect(candidates[0]).toMatchObject({
				id: "p1",
				name: "HRM",
				address: 0xc0ffee000001,
				rssi: -55,
			});
			expect(fakeNoble.listenerCount("discover")).toBe(0);
		});

		it("reports each device once", async () => {
			const sensor = new FakePeripheral("p1", "c0:ff:ee:00:00:01");
			discoverOnScan(sensor, sensor);
			const backend = createNobleBackend({ scanTimeoutMs: 10 });

			await expect(backend.findDevices({})).resolves.toHaveLength(1);
		});

		it("shares a scan already in flight for the same target", async () => {
			discoverOnScan(new FakePeripheral("p1", "c0:ff:ee:00:00:01"));
			const backend = createNobleBackend({ scanTimeoutMs: 10 });

			const [first, second] = await Promise.all([
				backend.findDevices({}),
				backend.findDevices({}),
			]);

			expect(fakeNoble.startScanningAsync).toHaveBeenCalledTimes(1);
			expect(fakeNoble.stopScanningAsync).toHaveBeenCalledTimes(1);
			expect(first.map((c) => c.id)).toEqual(["p1"]);
			expect(second.map((c) => c.id)).toEqual(["p1"]);
		});

		it("keeps scanning until the last overlapping scan ends", async () => {
			const short = createNobleBackend({ scanTimeoutMs: 10 });
			const long = createNobleBackend({ scanTimeoutMs: 50 });

			const longScan = long.findDevices({});
			await short.findDevices({});

			expect(fakeNoble.startScanningAsync).toHaveBeenCalledTimes(2);
			expect(fakeNoble.stopScanningAsync).not.toHaveBeenCalled();

			await longScan;
			expect(fakeNoble.stopScanningAsync).toHaveBeenCalledTimes(1);
		});

		it("leaves out a blank name and an unknown address", async () => {
			discoverOnScan(new FakePeripheral("p1", "", ""));
			const backend = createNobleBackend({ scanTimeoutMs: 10 });

			const [candidate] = await backend.findDevices({});

			expect(candidate?.name).toBeUndefined();
			expect(candidate?.address).toBeUndefined();
		});

		it("stops at the configured address", async () => {
			const decoy = new FakePeripheral("p1", "11:22:33:44:55:66");
			const sensor = new FakePeripheral("p2", "C0:FF:EE:00:00:01", "HRM", []);
			discoverOnScan(decoy, sensor);
			const backend = createNobleBackend({ scanTimeoutMs: 60_000 });

			const candidates = await backend.findDevices({ address: 0xc0ffee000001 });

			expect(fakeNoble.startScanningAsync).toHaveBeenCalledWith([], false);
			expect(candidates.map((c) => c.id)).toEqual(["p2"]);
		});

		it("rejects when scanning can't start", async () => {
			fakeNoble.startScanningAsync.mockRejectedValueOnce(new Error("adapter busy"));
			const backend = createNobleBackend({ scanTimeoutMs: 60_000 });

			await expect(backend.findDevices({})).rejects.toThrow("adapter busy");
			expect(fakeNoble.listenerCount("discover")).toBe(0);
		});

		it("logs a failure to stop scanning", async () => {
			const logger = createMockLogger();
			fakeNoble.stopScanningAsync.mockRejectedValueOnce(new Error("already stopped"));
			const backend = createNobleBackend({ scanTimeoutMs: 10, logger });

			await backend.findDevices({});
			await vi.waitFor(() =>
				expect(logger.warn).toHaveBeenCalledWith(
					"Error stopping scan:",
					"already stopped",
				),
			);
		});

		it("waits for the adapter to power on", async () => {
			fakeNoble._state = "poweredOff";
			const backend = createNobleBackend({ scanTimeoutMs: 10 });

			const finding = backend.findDevices({});
			expect(fakeNoble.startScanningAsync).not.toHaveBeenCalled();
			fakeNoble.emit("stateChange", "poweredOn");

			await expect(finding).resolves.toEqual([]);
			expect(fakeNoble.startScanningAsync).toHaveBeenCalledTimes(1);
			expect(fakeNoble.listenerCount("stateChange")).toBe(0);
		});

		it("times out when the adapter stays off", async () => {
			fakeNoble._state = "poweredOff";
			const backend = createNobleBackend({ powerOnTimeoutMs: 10 });

			const finding = backend.findDevices({});

			await expect(finding).rejects.toBeInstanceOf(TimeoutError);
			await expect(finding).rejects.toThrow(
				"Bluetooth adapter power on timed out after 10ms",
			);
			expect(fakeNoble.listenerCount("stateChange")).toBe(0);
		});
	});

	describe("sessions", () => {
		async function openSession(options: { connectionTimeoutMs?: number } = {}) {
			const peripheral = new FakePeripheral("p1", "c0:ff:ee:00:00:01");
			discoverOnScan(peripheral);
			const backend = createNobleBackend({ scanTimeoutMs: 10, ...options });
			const [candidate] = await backend.findDevices({});
			if (!candidate) throw new Error("no candidate");
			return { peripheral, candidate };
		}

		it("connects and resolves the heart-rate characteristic", async () => {
			const { peripheral, candidate } = await openSession();

			const session = await candidate.openSession();
			const service = await session?.getService("180d");
			const characteristic = await service?.getCharacteristic("2a37");

			expect(peripheral.connectAsync).toHaveBeenCalledTimes(1);
			expect(peripheral.discoverServicesAsync).toHaveBeenCalledWith(["180d"]);
			expect(session?.device.id).toBe("p1");
			expect(characteristic?.properties).toEqual(["read", "notify"]);
		});

		it("returns null for a service the device lacks", async () => {
			const { peripheral, candidate } = await openSession();
			peripheral.discoverServicesAsync.mockResolvedValueOnce([]);

			const session = await candidate.openSession();

			await expect(session?.getService("180d")).resolves.toBeNull();
		});

		it("returns null when the link doesn't come up", async () => {
			const { peripheral, candidate } = await openSession();
			peripheral.connectAsync.mockImplementationOnce(async () => {});

			await expect(candidate.openSession()).resolves.toBeNull();
		});

		it("abandons a connection that times out", async () => {
			const { peripheral, candidate } = await openSession({
				connectionTimeoutMs: 10,
			});
			peripheral.connectAsync.mockReturnValueOnce(new Promise<void>(() => {}));

			await expect(candidate.openSession()).rejects.toThrow(
				"GATT connection timed out after 10ms",
			);
			expect(peripheral.disconnectAsync).toHaveBeenCalledTimes(1);
		});

		it("closes the link once", async () => {
			const { peripheral, candidate } = await openSession();
			const session = await candidate.openSession();

			await session?.close();
			await session?.close();

			expect(peripheral.disconnectAsync).toHaveBeenCalledTimes(1);
		});

		it("reports link loss until unregistered", async () => {
			const { peripheral, candidate } = await openSession();
			const session = await candidate.openSession();
			const onDisconnect = vi.fn();

			const unregister = session?.onDisconnect?.(onDisconnect);
			peripheral.emit("disconnect");
			unregister?.();
			peripheral.emit("disconnect");

			expect(onDisconnect).toHaveBeenCalledTimes(1);
		});
	});

	describe("characteristics", () => {
		async function resolveCharacteristic(logger = createMockLogger()) {
			const peripheral = new FakePeripheral("p1", "c0:ff:ee:00:00:01");
			discoverOnScan(peripheral);
			const backend = createNobleBackend({ scanTimeoutMs: 10, logger });
			const [candidate] = await backend.findDevices({});
			const session = await candidate?.openSession();
			const service = await session?.getService("180d");
			const characteristic = await service?.getCharacteristic("2a37");
			if (!characteristic) throw new Error("no characteristic");
			return { fake: peripheral.service.characteristic, characteristic };
		}

		it("subscribes and reports success", async () => {
			const { fake, characteristic } = await resolveCharacteristic();

			await expect(characteristic.enableNotifications()).resolves.toBe("success");
			expect(fake.subscribeAsync).toHaveBeenCalledTimes(1);
		});

		it("reports a failed subscription as a protocol error", async () => {
			const logger = createMockLogger();
			const { fake, characteristic } = await resolveCharacteristic(logger);
			fake.subscribeAsync.mockRejectedValueOnce(new Error("write failed"));

			await expect(characteristic.enableNotifications()).resolves.toBe(
				"protocolError",
			);
			expect(logger.warn).toHaveBeenCalledWith("Subscribe failed:", "write failed");
		});

		it("unsubscribes", async () => {
			const { fake, characteristic } = await resolveCharacteristic();

			await characteristic.disableNotifications();

			expect(fake.unsubscribeAsync).toHaveBeenCalledTimes(1);
		});

		it("forwards notifications but not read responses", async () => {
			const { fake, characteristic } = await resolveCharacteristic();
			const listener = vi.fn();

			const unregister = characteristic.onValueChanged(listener);
			fake.emit("data", Buffer.from([0x00, 0x4b]), true);
			fake.emit("data", Buffer.from([0x00, 0x4c]), false);
			unregister();
			fake.emit("data", Buffer.from([0x00, 0x4d]), true);

			expect(listener).toHaveBeenCalledTimes(1);
			expect(listener).toHaveBeenCalledWith(Buffer.from([0x00, 0x4b]));
		});
	});
});
