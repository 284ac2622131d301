/**
 * Tests for the niri client against an in-process fake of niri's socket.
 */

import { join } from "node:path";
import type { Socket } from "node:net";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CompositorEventStream, NiriClient, expectVariant, unwrapReply } from "./compositor-client.js";
import { CompositorError, UnexpectedReplyError } from "./errors.js";
import { createSilentLogger } from "./logger.js";
import { SocketConnection, SocketError } from "./socket-communication.js";
import {
  type LineServer,
  createMockNiriWindow,
  createMockNiriWorkspace,
  createSocketDir,
  startLineServer,
  waitFor,
} from "./test-utils.js";
import type { CompositorEvent } from "./types.js";

const reply = (socket: Socket, value: unknown): void => {
  socket.write(`${JSON.stringify(value)}\n`);
};

describe("NiriClient", () => {
  let socketPath: string;
  let cleanup: () => Promise<void>;
  let niri: LineServer;
  let client: NiriClient;
  let streamSockets: Socket[];

  beforeEach(async () => {
    const socketDir = await createSocketDir();
    cleanup = socketDir.cleanup;
    socketPath = join(socketDir.dir, "niri.sock");
    streamSockets = [];

    niri = await startLineServer(socketPath, (line, socket) => {
      switch (line) {
        case '"Windows"':
          reply(socket, {
            Ok: { Windows: [createMockNiriWindow({ id: 1 }), createMockNiriWindow({ id: 2, app_id: null })] },
          });
          return;
        case '"Workspaces"':
          reply(socket, { Ok: { Workspaces: [createMockNiriWorkspace({ id: 5, name: "main" })] } });
          return;
        case '"FocusedWindow"':
          reply(socket, { Ok: { FocusedWindow: null } });
          return;
        case '"EventStream"':
          streamSockets.push(socket);
          socket.write('{"Ok":"Handled"}\n{"WindowClosed":{"id":1}}\n');
          return;
        default:
          reply(socket, line.includes('"id":99') ? { Err: "Window not found" } : { Ok: "Handled" });
      }
    });
    client = new NiriClient({ socketPath, connectionTimeout: 1000 }, createSilentLogger());
  });

  afterEach(async () => {
    await niri.close();
    await cleanup();
  });

  describe("queries", () => {
    it("should convert the window list", async () => {
      const windows = await client.windows();

      expect(windows.map((window) => window.id)).toEqual([1, 2]);
      expect(windows[1]?.appId).toBeUndefined();
      expect(niri.lines).toEqual(['"Windows"']);
    });

    it("should convert the workspace list", async () => {
      expect(await client.workspaces()).toEqual([
        { id: 5, index: 1, name: "main", output: "DP-1", isActive: true, isFocused: true },
      ]);
    });

    it("should map a missing focused window to undefined", async () => {
      expect(await client.focusedWindow()).toBeUndefined();
    });

    it("should fail when the compositor is not running", async () => {
      await niri.close();

      await expect(client.windows()).rejects.toBeInstanceOf(SocketError);
    });
  });

  describe("actions", () => {
    it("should send actions wrapped in an Action request", async () => {
      await client.performAction({ FocusWindow: { id: 4 } });

      expect(niri.lines).toEqual(['{"Action":{"FocusWindow":{"id":4}}}']);
    });

    it("should surface compositor errors verbatim", async () => {
      const error = await client
        .performAction({ FocusWindow: { id: 99 } })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(CompositorError);
      expect(error).toMatchObject({ message: "Window not found" });
    });

    it("should use one connection per request", async () => {
      await client.performAction({ Spawn: { command: ["true"] } });
      await client.performAction({ ToggleWindowFloating: { id: 2 } });

      expect(niri.sockets).toHaveLength(2);
    });
  });

  describe("event stream", () => {
    it("should deliver events sharing a chunk with the acknowledgement", async () => {
      const stream = await client.eventStream();
      const events: CompositorEvent[] = [];
      stream.on("event", (event: CompositorEvent) => events.push(event));

      stream.resume();

      expect(events).toEqual([{ kind: "window-closed", id: 1 }]);
      await stream.close();
    });

    it("should report undecodable events and the end of the feed", async () => {
      const stream = await client.eventStream();
      const invalid: Error[] = [];
      let ended = false;
      stream.on("invalid", (error: Error) => invalid.push(error));
      stream.on("end", () => {
        ended = true;
      });
      stream.resume();

      const socket = streamSockets[0];
      socket?.write('{"WindowClosed":{"id":"x"}}\n');
      await waitFor(() => invalid.length === 1);
      socket?.end();
      await waitFor(() => ended);

      expect(invalid[0]?.message).toBe("Invalid event: WindowClosed: id must be a non-negative integer");
      expect(stream.isEnded()).toBe(true);
    });

    it("should keep the feed open after a line that is not JSON", async () => {
      const stream = await client.eventStream();
      const errors: Error[] = [];
      const events: CompositorEvent[] = [];
      stream.on("error", (error: Error) => errors.push(error));
      stream.on("event", (event: CompositorEvent) => events.push(event));
      stream.resume();

      const socket = streamSockets[0];
      socket?.write('garbage\n{"WindowClosed":{"id":2}}\n');
      await waitFor(() => events.length === 2);

      expect(errors).toHaveLength(1);
      expect(errors[0]).toMatchObject({ code: "DESERIALIZE_FAILED" });
      expect(stream.isEnded()).toBe(false);
      await stream.close();
    });
  });
});

describe("CompositorEventStream", () => {
  it("should queue events until resumed", () => {
    const stream = new CompositorEventStream();
    const seen: string[] = [];
    stream.on("event", (event: CompositorEvent) => seen.push(event.kind));
    stream.on("end", () => seen.push("end"));

    stream.accept({ WindowFocusChanged: { id: null } });
    stream.finish();
    stream.finish();
    expect(seen).toEqual([]);

    stream.resume();
    expect(seen).toEqual(["window-focus-changed", "end"]);
  });
});

describe("CompositorEventStream.fromConnection", () => {
  it("should end the feed after a transport error", () => {
    const connection = new SocketConnection("/nonexistent/niri.sock");
    const stream = CompositorEventStream.fromConnection(connection);
    const errors: Error[] = [];
    let ended = false;
    stream.on("error", (error: Error) => errors.push(error));
    stream.on("end", () => {
      ended = true;
    });
    stream.resume();

    connection.emit("error", new SocketError("Socket error: read ECONNRESET", "SOCKET_ERROR"));

    expect(errors.map((error) => error.message)).toEqual(["Socket error: read ECONNRESET"]);
    expect(ended).toBe(true);
    expect(stream.isEnded()).toBe(true);
  });
});

describe("reply helpers", () => {
  it("should unwrap Ok replies", () => {
    expect(unwrapReply({ Ok: "Handled" })).toBe("Handled");
  });

  it("should throw the Err message", () => {
    expect(() => unwrapReply({ Err: "bad request" })).toThrow(CompositorError);
    expect(() => unwrapReply({ Err: "bad request" })).toThrow("bad request");
  });

  it("should reject values that are not envelopes", () => {
    expect(() => unwrapReply(["Ok"])).toThrow(UnexpectedReplyError);
  });

  it("should pick the expected variant", () => {
    expect(expectVariant({ FocusedWindow: null }, "FocusedWindow")).toBeNull();
    expect(() => expectVariant({ Windows: [] }, "Workspaces")).toThrow(
      'received unexpected reply: {"Windows":[]}'
    );
  });
});
