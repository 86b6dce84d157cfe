import dgram, { type Socket } from "node:dgram";
import type { AddressInfo } from "node:net";
import { listenerLog } from "../logger";
import {
  DEFAULT_LISTENER_CONFIG,
  isValidPort,
  type ListenerConfig,
} from "../config/listenerConfig";
import {
  createPacketRegistry,
  decodePacket,
  type DecodedPacket,
  type PacketRegistry,
} from "../packets/PacketRegistry";
import {
  useListenerStatsStore,
  type ListenerStatsStore,
} from "../../store/useListenerStatsStore";

export type ListenerStatus =
  | "idle"
  | "binding"
  | "listening"
  | "closed"
  | "error";

export interface TelemetryListenerOptions {
  /** Defaults to the 2021 registry */
  registry?: PacketRegistry;
  config?: Partial<ListenerConfig>;
  stats?: ListenerStatsStore;
}

interface Waiter {
  resolve: (packet: DecodedPacket) => void;
  reject: (error: unknown) => void;
}

/**
 * One UDP socket receiving game telemetry. `receiveOne()` is the only
 * suspension point: it settles with exactly one decoded datagram, in call
 * order. Decode failures reject that call only.
 */
export class TelemetryListener {
  status: ListenerStatus = "idle";

  private readonly registry: PacketRegistry;
  private readonly config: ListenerConfig;
  private readonly stats: ListenerStatsStore;

  private socket: Socket | null = null;
  private pending: Uint8Array[] = [];
  private waiters: Waiter[] = [];

  private _onStatus: ((status: ListenerStatus) => void) | null = null;

  constructor(options: TelemetryListenerOptions = {}) {
    this.registry = options.registry ?? createPacketRegistry();
    this.config = { ...DEFAULT_LISTENER_CONFIG, ...options.config };
    this.stats = options.stats ?? useListenerStatsStore;
  }

  onStatus(callback: (status: ListenerStatus) => void) {
    this._onStatus = callback;
  }

  private setStatus(status: ListenerStatus) {
    this.status = status;
    if (this._onStatus) this._onStatus(status);
  }

  /** Bound address, or null before bind / after close. */
  address(): AddressInfo | null {
    return this.socket && this.status === "listening"
      ? this.socket.address()
      : null;
  }

  /**
   * Binds the socket. Port 0 picks an ephemeral port. Rejects with the
   * socket's error when the address is unavailable; there is no retry.
   */
  bind(
    host: string = this.config.host,
    port: number = this.config.port,
  ): Promise<AddressInfo> {
    if (this.socket) {
      return Promise.reject(new Error("Listener is already bound"));
    }
    if (port !== 0 && !isValidPort(port)) {
      return Promise.reject(
        new RangeError(`Invalid port ${port}: expected 0 or 1-65535`),
      );
    }

    const socket = dgram.createSocket("udp4");
    this.socket = socket;
    this.setStatus("binding");

    return new Promise<AddressInfo>((resolve, reject) => {
      const onBindError = (err: Error) => {
        socket.off("listening", onListening);
        this.socket = null;
        socket.close();
        listenerLog.error(`Unable to bind ${host}:${port}`, err);
        this.setStatus("error");
        reject(err);
      };

      const onListening = () => {
        socket.off("error", onBindError);
        socket.on("error", this.handleSocketError);
        socket.on("message", this.handleMessage);
        const address = socket.address();
        listenerLog.info(`Listening on ${address.address}:${address.port}`);
        this.setStatus("listening");
        resolve(address);
      };

      socket.once("error", onBindError);
      socket.once("listening", onListening);
      socket.bind(port, host);
    });
  }

  /** Resolves with the next datagram, decoded through the registry. */
  receiveOne(): Promise<DecodedPacket> {
    if (this.status !== "listening") {
      return Promise.reject(
        new Error(`Listener is not receiving (status: ${this.status})`),
      );
    }

    return new Promise<DecodedPacket>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject };
      const queued = this.pending.shift();
      if (queued) {
        this.settle(waiter, queued);
      } else {
        this.waiters.push(waiter);
      }
    });
  }

  /** Datagrams received but not yet handed to a receiveOne() call. */
  getPendingCount(): number {
    return this.pending.length;
  }

  async close(): Promise<void> {
    const socket = this.socket;
    this.socket = null;
    this.pending = [];
    this.rejectWaiters(new Error("Listener closed"));
    if (!socket) {
      this.setStatus("closed");
      return;
    }

    socket.off("message", this.handleMessage);
    socket.off("error", this.handleSocketError);
    await new Promise<void>((resolve) => socket.close(() => resolve()));
    listenerLog.debug("Socket closed");
    this.setStatus("closed");
  }

  private readonly handleMessage = (message: Buffer) => {
    this.stats.getState().recordReceived(message.length);

    const length = Math.min(message.length, this.config.maxDatagramSize);
    if (length < message.length) {
      listenerLog.debug(
        `Datagram of ${message.length} bytes cut to ${length}`,
      );
    }
    const bytes = Uint8Array.from(message.subarray(0, length));

    const waiter = this.waiters.shift();
    if (waiter) {
      this.settle(waiter, bytes);
      return;
    }
    this.enqueue(bytes);
  };

  private readonly handleSocketError = (err: Error) => {
    listenerLog.error("Socket error", err);
    this.setStatus("error");
    this.rejectWaiters(err);
  };

  private enqueue(bytes: Uint8Array) {
    this.pending.push(bytes);
    const overflow = this.pending.length - this.config.maxPendingDatagrams;
    if (overflow <= 0) return;

    this.pending.splice(0, overflow);
    this.stats.getState().recordDropped(overflow);
    listenerLog.warn(
      `Pending datagram queue overflow. Dropped ${overflow} oldest datagram(s).`,
    );
  }

  private settle(waiter: Waiter, bytes: Uint8Array) {
    let decoded: DecodedPacket;
    try {
      decoded = decodePacket(bytes, this.registry);
    } catch (err) {
      const kind = err instanceof Error ? err.name : "Error";
      this.stats.getState().recordFailure(kind);
      listenerLog.debug(`Decode failed (${kind})`, err);
      waiter.reject(err);
      return;
    }
    this.stats.getState().recordDecoded(decoded.name);
    waiter.resolve(decoded);
  }

  private rejectWaiters(error: Error) {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.reject(error);
    }
  }
}
