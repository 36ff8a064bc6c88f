import { afterEach, describe, it, expect } from "vitest";
import { MessageChannel, type MessagePort } from "node:worker_threads";
import { silentLogger } from "@wordsync/sync-core/src/log";
import { createSessionHost } from "../src/host";
import { SessionWorkerClient } from "../src/api";

// In-process channel in place of a real worker thread

describe("worker contract", () => {
  let ports: MessagePort[] = [];

  afterEach(() => {
    for (const port of ports) port.close();
    ports = [];
  });

  function connect() {
    const { port1, port2 } = new MessageChannel();
    ports = [port1, port2];
    const host = createSessionHost({ logger: silentLogger });
    port1.on("message", (message: unknown) => port1.postMessage(host.handle(message)));
    return new SessionWorkerClient(port2);
  }

  it("reset + chunk + end", async () => {
    const client = connect();
    await client.reset(new Map([[10, "I "], [20, "will "], [30, "go "]]));
    const first = await client.processChunk("<20>might </2");
    expect(first.ops).toEqual([]);
    const second = await client.processChunk("0>");
    expect(second.ops).toEqual([
      { op: "delete", count: 8 },
      { op: "insert", text: "might " }
    ]);
    expect(second.applied).toEqual([{ position: 20, content: "might " }]);
    const end = await client.endStream();
    expect(end.ops).toEqual([{ op: "insert", text: "go " }]);
    expect(client.inFlight).toBe(0);
  });

  it("passes byte chunks through", async () => {
    const client = connect();
    await client.reset({});
    const bytes = new TextEncoder().encode("<10>été</10>");
    await client.processChunk(bytes.subarray(0, 5));
    const result = await client.processChunk(bytes.subarray(5));
    expect(result.ops).toEqual([
      { op: "delete", count: 0 },
      { op: "insert", text: "été" }
    ]);
  });

  it("reports out-of-order records in the reply", async () => {
    const client = connect();
    await client.reset({ 10: "a ", 20: "b " });
    await client.processChunk("<20>c </20>");
    const result = await client.processChunk("<10>d </10>");
    expect(result.ops).toEqual([]);
    expect(result.issues).toEqual([{ kind: "OutOfOrderPosition", position: 10, cursor: 20 }]);
  });

  it("rejects a bad baseline", async () => {
    const client = connect();
    await expect(client.reset({ x: "a" })).rejects.toThrow(
      "baseline position must be a non-negative integer, got \"x\""
    );
  });

  it("answers malformed requests with an error", () => {
    const host = createSessionHost({ logger: silentLogger });
    const reply = host.handle({ id: 7, type: "rewind" });
    expect(reply.ok).toBe(false);
    expect(reply.id).toBe(7);
    if (!reply.ok) expect(reply.error).toMatch(/^invalid request: /);
    expect(host.handle("nonsense")).toMatchObject({ id: null, ok: false });
  });
});
