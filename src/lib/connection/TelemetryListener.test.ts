import dgram, { type Socket } from "node:dgram";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { TelemetryListener, type ListenerStatus } from "./TelemetryListener";
import { TruncatedBufferError, UnknownPacketError } from "../packets/errors";
import { packetAs } from "../packets/PacketRegistry";
import {
  createListenerStatsStore,
  type ListenerStatsStore,
} from "../../store/useListenerStatsStore";
import { blankPacketBytes } from "../../tests/fixtures";

const LOOPBACK = "127.0.0.1";

describe("TelemetryListener", () => {
  let sender: Socket;
  let stats: ListenerStatsStore;
  let listeners: TelemetryListener[];

  function makeListener(
    config: ConstructorParameters<typeof TelemetryListener>[0] = {},
  ): TelemetryListener {
    const listener = new TelemetryListener({ stats, ...config });
    listeners.push(listener);
    return listener;
  }

  async function bound(
    config: ConstructorParameters<typeof TelemetryListener>[0] = {},
  ): Promise<{ listener: TelemetryListener; port: number }> {
    const listener = makeListener(config);
    const address = await listener.bind(LOOPBACK, 0);
    return { listener, port: address.port };
  }

  function send(bytes: Uint8Array, port: number): Promise<void> {
    return new Promise((resolve, reject) => {
      sender.send(bytes, port, LOOPBACK, (err) => (err ? reject(err) : resolve()));
    });
  }

  beforeEach(() => {
    sender = dgram.createSocket("udp4");
    stats = createListenerStatsStore();
    listeners = [];
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await Promise.all(listeners.map((listener) => listener.close()));
    await new Promise<void>((resolve) => sender.close(() => resolve()));
  });

  it("binds and reports status changes", async () => {
    const listener = makeListener();
    const statuses: ListenerStatus[] = [];
    listener.onStatus((status) => statuses.push(status));

    const address = await listener.bind(LOOPBACK, 0);
    expect(address.port).toBeGreaterThan(0);
    expect(listener.address()?.port).toBe(address.port);

    await listener.close();
    expect(statuses).toEqual(["binding", "listening", "closed"]);
    expect(listener.address()).toBeNull();
  });

  it("decodes one datagram per receiveOne call", async () => {
    const { listener, port } = await bound();
    const pending = listener.receiveOne();
    await send(blankPacketBytes("carTelemetry", { frameIdentifier: 77 }), port);

    const decoded = await pending;
    expect(decoded.name).toBe("carTelemetry");
    expect(packetAs(decoded, "carTelemetry").header.frameIdentifier).toBe(77);
    expect(stats.getState()).toMatchObject({
      received: 1,
      decoded: 1,
      byType: { carTelemetry: 1 },
    });
  });

  it("serves concurrent calls in order", async () => {
    const { listener, port } = await bound();
    const first = listener.receiveOne();
    const second = listener.receiveOne();

    await send(blankPacketBytes("lapData", { frameIdentifier: 1 }), port);
    await send(blankPacketBytes("lapData", { frameIdentifier: 2 }), port);

    expect((await first).packet.header.frameIdentifier).toBe(1);
    expect((await second).packet.header.frameIdentifier).toBe(2);
  });

  it("rejects only the call whose datagram fails to decode", async () => {
    const { listener, port } = await bound();

    const bad = listener.receiveOne();
    await send(new Uint8Array(10), port);
    await expect(bad).rejects.toThrow(TruncatedBufferError);

    const unknown = listener.receiveOne();
    await send(blankPacketBytes("motion", { packetId: 40 }), port);
    await expect(unknown).rejects.toThrow(UnknownPacketError);

    const good = listener.receiveOne();
    await send(blankPacketBytes("session"), port);
    expect((await good).name).toBe("session");

    expect(listener.status).toBe("listening");
    expect(stats.getState()).toMatchObject({
      received: 3,
      decoded: 1,
      failed: 2,
      failuresByKind: { TruncatedBufferError: 1, UnknownPacketError: 1 },
    });
  });

  it("queues datagrams that arrive before a receive", async () => {
    const { listener, port } = await bound();
    await send(blankPacketBytes("carStatus", { frameIdentifier: 10 }), port);
    await send(blankPacketBytes("carDamage", { frameIdentifier: 11 }), port);

    await vi.waitFor(() => expect(listener.getPendingCount()).toBe(2));

    expect((await listener.receiveOne()).name).toBe("carStatus");
    expect((await listener.receiveOne()).name).toBe("carDamage");
    expect(listener.getPendingCount()).toBe(0);
  });

  it("drops the oldest queued datagram past the cap", async () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    const { listener, port } = await bound({
      config: { maxPendingDatagrams: 2 },
    });

    for (const frameIdentifier of [1, 2, 3]) {
      await send(blankPacketBytes("motion", { frameIdentifier }), port);
    }
    await vi.waitFor(() => expect(stats.getState().dropped).toBe(1));

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(listener.getPendingCount()).toBe(2);
    expect((await listener.receiveOne()).packet.header.frameIdentifier).toBe(2);
    expect((await listener.receiveOne()).packet.header.frameIdentifier).toBe(3);
  });

  it("cuts datagrams longer than the receive size", async () => {
    const { listener, port } = await bound({ config: { maxDatagramSize: 100 } });

    const pending = listener.receiveOne();
    await send(blankPacketBytes("motion"), port);

    await expect(pending).rejects.toThrow(
      "PacketMotionData: need 1464 byte(s), buffer has 100",
    );
    expect(stats.getState().bytesReceived).toBe(1464);
  });

  it("rejects bind when the port is taken", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const { port } = await bound();
    const second = makeListener();

    await expect(second.bind(LOOPBACK, port)).rejects.toMatchObject({
      code: "EADDRINUSE",
    });
    expect(second.status).toBe("error");
  });

  it.each([70000, -1, 1.5, Number.NaN])(
    "refuses port %s without opening a socket",
    async (port) => {
      const listener = makeListener();

      await expect(listener.bind(LOOPBACK, port)).rejects.toThrow(RangeError);
      expect(listener.status).toBe("idle");
      expect(listener.address()).toBeNull();
    },
  );

  it("still binds after refusing a port", async () => {
    const listener = makeListener();
    await expect(listener.bind(LOOPBACK, 65536)).rejects.toThrow(
      "Invalid port 65536: expected 0 or 1-65535",
    );

    const address = await listener.bind(LOOPBACK, 0);
    expect(address.port).toBeGreaterThan(0);
    expect(listener.status).toBe("listening");
  });

  it("refuses to bind twice", async () => {
    const { listener } = await bound();
    await expect(listener.bind(LOOPBACK, 0)).rejects.toThrow(
      "Listener is already bound",
    );
  });

  it("rejects receiveOne before bind and pending calls on close", async () => {
    const idle = makeListener();
    await expect(idle.receiveOne()).rejects.toThrow("status: idle");

    const { listener } = await bound();
    const pending = expect(listener.receiveOne()).rejects.toThrow(
      "Listener closed",
    );
    await listener.close();
    await pending;
    expect(listener.status).toBe("closed");
  });
});
