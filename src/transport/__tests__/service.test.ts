/**
 * Transport Service Integration Tests
 *
 * TCP round trips against an in-process server on the loopback interface,
 * UDP broadcasts against a fake socket.
 */
import { type Server, type Socket, createServer } from "node:net";
import { afterEach, describe, expect, test, vi } from "vitest";

// Mock logger to reduce noise in tests
vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
  logOperationStart: vi.fn(),
  logOperationComplete: vi.fn(),
  logOperationFailed: vi.fn(),
}));

// Import after mocks
import type { DatagramSocket, DeviceAddress } from "../schema.js";
import {
  createTcpTransport,
  exchangeFrame,
  sendBroadcastProbe,
} from "../service.js";
import { decodeFrame, encodeFrame } from "../transform.js";

const CONFIG = { timeoutMs: 1000, maxFrameBytes: 1024 };
const SYSINFO_COMMAND = { system: { get_sysinfo: {} } };

type ConnectionHandler = (connection: Socket, request: Buffer) => void;

const servers: Server[] = [];
const connections: Socket[] = [];

/**
 * Start a loopback server that reads one request frame per connection and
 * hands the decoded request to `handler`.
 */
async function startServer(
  handler: ConnectionHandler,
): Promise<DeviceAddress> {
  const server = createServer((connection) => {
    connections.push(connection);
    // the client tears the connection down once it has its frame
    connection.on("error", () => undefined);
    let received = Buffer.alloc(0);

    connection.on("data", (chunk: Buffer) => {
      received = Buffer.concat([received, chunk]);
      if (received.length < 4) {
        return;
      }
      const frameLength = 4 + received.readUInt32BE(0);
      if (received.length >= frameLength) {
        const request = decodeFrame(received.subarray(0, frameLength), 1024);
        handler(connection, request._unsafeUnwrap());
      }
    });
  });
  servers.push(server);

  return { host: "127.0.0.1", port: await listen(server) };
}

async function listen(server: Server): Promise<number> {
  await new Promise<void>((resolve) => {
    server.listen(0, "127.0.0.1", resolve);
  });

  const info = server.address();
  if (info === null || typeof info === "string") {
    throw new Error("Server is not listening on a TCP port");
  }
  return info.port;
}

async function unusedPort(): Promise<number> {
  const server = createServer();
  const port = await listen(server);
  await new Promise<void>((resolve) => {
    server.close(() => resolve());
  });
  return port;
}

describe("Transport Service", () => {
  afterEach(async () => {
    for (const connection of connections.splice(0)) {
      connection.destroy();
    }
    await Promise.all(
      servers.splice(0).map(
        (server) =>
          new Promise<void>((resolve) => {
            server.close(() => resolve());
          }),
      ),
    );
  });

  // ===========================================================================
  // exchangeFrame
  // ===========================================================================

  describe("exchangeFrame", () => {
    test("returns the decoded response frame", async () => {
      const address = await startServer((connection) => {
        connection.write(encodeFrame(Buffer.from('{"ok":true}')));
      });

      const result = await exchangeFrame(address, Buffer.from("{}"), CONFIG);

      expect(result._unsafeUnwrap().toString("utf8")).toBe('{"ok":true}');
    });

    test("sends the request as one encoded frame", async () => {
      const requests: string[] = [];
      const address = await startServer((connection, request) => {
        requests.push(request.toString("utf8"));
        connection.write(encodeFrame(Buffer.from("{}")));
      });

      await exchangeFrame(address, Buffer.from('{"a":1}'), CONFIG);

      expect(requests).toEqual(['{"a":1}']);
    });

    test("reassembles a response split across writes", async () => {
      const frame = encodeFrame(Buffer.from('{"alias":"Desk lamp"}'));
      const address = await startServer((connection) => {
        connection.write(frame.subarray(0, 2));
        setTimeout(() => connection.write(frame.subarray(2, 9)), 10);
        setTimeout(() => connection.write(frame.subarray(9)), 20);
      });

      const result = await exchangeFrame(address, Buffer.from("{}"), CONFIG);

      expect(result._unsafeUnwrap().toString("utf8")).toBe(
        '{"alias":"Desk lamp"}',
      );
    });

    test("returns FRAMING_ERROR when the peer closes mid-frame", async () => {
      const address = await startServer((connection) => {
        const frame = encodeFrame(Buffer.from('{"truncated":1}'));
        connection.end(frame.subarray(0, 7));
      });

      const result = await exchangeFrame(address, Buffer.from("{}"), CONFIG);

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: "FRAMING_ERROR",
        declaredLength: 15,
        receivedLength: 7,
      });
    });

    test("returns FRAMING_ERROR when the declared length exceeds the limit", async () => {
      const address = await startServer((connection) => {
        connection.write(Buffer.from("00100000", "hex"));
      });

      const result = await exchangeFrame(address, Buffer.from("{}"), CONFIG);

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "FRAMING_ERROR",
        message: "Declared frame length 1048576 exceeds limit of 1024 bytes",
        declaredLength: 1048576,
      });
    });

    test("returns NETWORK_ERROR when the connection is refused", async () => {
      const port = await unusedPort();

      const result = await exchangeFrame(
        { host: "127.0.0.1", port },
        Buffer.from("{}"),
        CONFIG,
      );

      expect(result._unsafeUnwrapErr().type).toBe("NETWORK_ERROR");
      expect(result._unsafeUnwrapErr().message).toContain(
        `Socket error on 127.0.0.1:${port}`,
      );
    });

    test("returns NETWORK_ERROR when the port is out of range", async () => {
      const result = await exchangeFrame(
        { host: "127.0.0.1", port: 70000 },
        Buffer.from("{}"),
        CONFIG,
      );

      expect(result._unsafeUnwrapErr().type).toBe("NETWORK_ERROR");
      expect(result._unsafeUnwrapErr().message).toContain(
        "Cannot connect to 127.0.0.1:70000",
      );
    });

    test("returns TIMEOUT when the peer stays silent", async () => {
      const address = await startServer(() => {
        // never answers
      });

      const startTime = Date.now();
      const result = await exchangeFrame(address, Buffer.from("{}"), {
        ...CONFIG,
        timeoutMs: 100,
      });

      expect(Date.now() - startTime).toBeGreaterThanOrEqual(90);
      expect(result._unsafeUnwrapErr()).toEqual({
        type: "TIMEOUT",
        message: `No complete response from 127.0.0.1:${address.port}`,
        timeoutMs: 100,
      });
    });
  });

  // ===========================================================================
  // createTcpTransport
  // ===========================================================================

  describe("createTcpTransport", () => {
    test("serializes the command and returns the decoded response", async () => {
      const requests: string[] = [];
      const address = await startServer((connection, request) => {
        requests.push(request.toString("utf8"));
        connection.write(encodeFrame(Buffer.from('{"system":{}}')));
      });

      const transport = createTcpTransport(CONFIG);
      const result = await transport.sendAndReceive(address, SYSINFO_COMMAND);

      expect(requests).toEqual(['{"system":{"get_sysinfo":{}}}']);
      expect(result._unsafeUnwrap().toString("utf8")).toBe('{"system":{}}');
    });

    test("opens a fresh connection per call", async () => {
      let accepted = 0;
      const address = await startServer((connection) => {
        accepted += 1;
        connection.write(encodeFrame(Buffer.from("{}")));
      });

      const transport = createTcpTransport(CONFIG);
      await transport.sendAndReceive(address, SYSINFO_COMMAND);
      await transport.sendAndReceive(address, SYSINFO_COMMAND);

      expect(accepted).toBe(2);
    });
  });

  // ===========================================================================
  // sendBroadcastProbe
  // ===========================================================================

  describe("sendBroadcastProbe", () => {
    function fakeSocket(
      overrides: Partial<DatagramSocket> = {},
    ): DatagramSocket {
      return {
        bind: vi.fn((onListening: () => void) => onListening()),
        setBroadcast: vi.fn(),
        send: vi.fn(
          (
            _message: Buffer,
            _port: number,
            _address: string,
            onSent: (error: Error | null) => void,
          ) => onSent(null),
        ),
        onMessage: vi.fn(),
        onError: vi.fn(),
        close: vi.fn(),
        ...overrides,
      };
    }

    const broadcast = {
      port: 9999,
      broadcastAddress: "255.255.255.255",
      framing: "framed",
    } as const;

    test("enables broadcast and sends one framed probe", async () => {
      const sent: Array<{ message: Buffer; port: number; address: string }> =
        [];
      const socket = fakeSocket({
        send: (message, port, address, onSent) => {
          sent.push({ message, port, address });
          onSent(null);
        },
      });

      const result = await sendBroadcastProbe(
        socket,
        SYSINFO_COMMAND,
        broadcast,
      );

      expect(result.isOk()).toBe(true);
      expect(socket.setBroadcast).toHaveBeenCalledWith(true);
      expect(sent).toHaveLength(1);
      expect(sent[0]?.port).toBe(9999);
      expect(sent[0]?.address).toBe("255.255.255.255");
      expect(sent[0]?.message.readUInt32BE(0)).toBe(29);
      expect(sent[0]?.message.subarray(4, 8).toString("hex")).toBe("d0f281f8");
    });

    test("sends bare cipher text when raw framing is configured", async () => {
      const sent: Buffer[] = [];
      const socket = fakeSocket({
        send: (message, _port, _address, onSent) => {
          sent.push(message);
          onSent(null);
        },
      });

      await sendBroadcastProbe(socket, SYSINFO_COMMAND, {
        ...broadcast,
        framing: "raw",
      });

      expect(sent[0]?.length).toBe(29);
      expect(sent[0]?.subarray(0, 4).toString("hex")).toBe("d0f281f8");
    });

    test("returns NETWORK_ERROR when the send fails", async () => {
      const socket = fakeSocket({
        send: (_message, _port, _address, onSent) => {
          onSent(new Error("EACCES"));
        },
      });

      const result = await sendBroadcastProbe(
        socket,
        SYSINFO_COMMAND,
        broadcast,
      );

      expect(result._unsafeUnwrapErr().type).toBe("NETWORK_ERROR");
      expect(result._unsafeUnwrapErr().message).toBe(
        "Broadcast to 255.255.255.255:9999 failed: EACCES",
      );
    });

    test("returns NETWORK_ERROR when broadcast cannot be enabled", async () => {
      const socket = fakeSocket({
        setBroadcast: () => {
          throw new Error("EBADF");
        },
      });

      const result = await sendBroadcastProbe(
        socket,
        SYSINFO_COMMAND,
        broadcast,
      );

      expect(result._unsafeUnwrapErr().message).toBe(
        "Cannot enable broadcast: EBADF",
      );
    });

    test("returns NETWORK_ERROR when sending throws", async () => {
      const socket = fakeSocket({
        send: () => {
          throw new Error("Not running");
        },
      });

      const result = await sendBroadcastProbe(
        socket,
        SYSINFO_COMMAND,
        broadcast,
      );

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: "NETWORK_ERROR",
        message: "Broadcast to 255.255.255.255:9999 failed: Not running",
      });
    });
  });
});
