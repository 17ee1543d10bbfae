import { createSearchJob, snapshotOf } from "../src/core/entities/SearchJob.js";
import { PushSocket, SocketManager } from "../src/infrastructure/transport/SocketManager.js";

class FakeSocket implements PushSocket {
  readyState = 1;
  sent: string[] = [];
  failSends = false;
  closed = false;

  send(data: string, callback: (error?: Error) => void): void {
    if (this.failSends) {
      callback(new Error("connection reset"));
      return;
    }
    this.sent.push(data);
    callback();
  }

  close(): void {
    this.closed = true;
    this.readyState = 3;
  }

  messages(): Array<{ event: string; data: Record<string, unknown> }> {
    return this.sent.map((raw) => JSON.parse(raw));
  }
}

describe("SocketManager", () => {
  let manager: SocketManager;
  let counter: number;

  beforeEach(() => {
    counter = 0;
    manager = new SocketManager(undefined, () => `client-${++counter}`);
  });

  test("should greet a new connection with its client id", () => {
    const socket = new FakeSocket();
    const clientId = manager.connect(socket);

    expect(clientId).toBe("client-1");
    expect(socket.sent).toEqual([JSON.stringify({ event: "client_connected", data: { client_id: "client-1" } })]);
    expect(manager.isConnected("client-1")).toBe(true);
  });

  test("should publish a snapshot to its owner only", async () => {
    const first = new FakeSocket();
    const second = new FakeSocket();
    manager.connect(first);
    manager.connect(second);

    const job = createSearchJob("https://scholar.example.org/p", "client-2", "s1");
    const delivered = await manager.publish("job_progress", snapshotOf(job), "client-2");

    expect(delivered).toBe(true);
    expect(first.sent).toHaveLength(1);
    const [, message] = second.messages();
    expect(message.event).toBe("job_progress");
    expect(message.data.job_id).toBe("client-2_s1");
    expect(message.data.status).toBe("pending");
  });

  test("should report false for an unknown client", async () => {
    const job = createSearchJob("https://scholar.example.org/p", "nobody", "s1");
    expect(await manager.publish("job_completed", snapshotOf(job), "nobody")).toBe(false);
  });

  test("should report false when the socket is not open", async () => {
    const socket = new FakeSocket();
    const clientId = manager.connect(socket);
    socket.readyState = 3;

    expect(await manager.send(clientId, "job_progress", {})).toBe(false);
    expect(manager.isConnected(clientId)).toBe(true);
  });

  test("should drop a client whose send fails", async () => {
    const socket = new FakeSocket();
    const clientId = manager.connect(socket);
    socket.failSends = true;

    expect(await manager.send(clientId, "job_progress", {})).toBe(false);
    expect(manager.isConnected(clientId)).toBe(false);
  });

  describe("Inbound messages", () => {
    test("should answer unknown events with an error", async () => {
      const socket = new FakeSocket();
      const clientId = manager.connect(socket);

      await manager.handleMessage(clientId, JSON.stringify({ event: "ping" }));

      expect(socket.messages()[1]).toEqual({ event: "error", data: { message: "Unknown event: ping" } });
    });

    test("should answer invalid JSON with an error", async () => {
      const socket = new FakeSocket();
      const clientId = manager.connect(socket);

      await manager.handleMessage(clientId, "{not json");

      expect(socket.messages()[1]).toEqual({ event: "error", data: { message: "Invalid JSON message" } });
    });

    test("should answer messages without an event field with an error", async () => {
      const socket = new FakeSocket();
      const clientId = manager.connect(socket);

      await manager.handleMessage(clientId, JSON.stringify(["event"]));

      expect(socket.messages()[1]).toEqual({
        event: "error",
        data: { message: 'Message must be an object with an "event" field' },
      });
    });
  });

  test("should forget disconnected clients and close the rest on closeAll", () => {
    const first = new FakeSocket();
    const second = new FakeSocket();
    manager.connect(first);
    manager.connect(second);

    expect(manager.disconnect("client-1")).toBe(true);
    expect(manager.disconnect("client-1")).toBe(false);
    expect(manager.connectedClients().map((c) => c.clientId)).toEqual(["client-2"]);

    manager.closeAll();
    expect(second.closed).toBe(true);
    expect(first.closed).toBe(false);
    expect(manager.connectedClients()).toEqual([]);
  });
});
