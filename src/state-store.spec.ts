import { describe, expect, it } from "vitest";
import { NoFocusedWindowError, StatePoisonedError } from "./errors.js";
import { StateStore } from "./state-store.js";
import { createMockWindow, createState } from "./test-utils.js";

describe("StateStore", () => {
  it("applies convenience operations atomically", async () => {
    const store = new StateStore();

    await store.upsertWindow(createMockWindow({ id: 1 }));
    await store.upsertWindow(createMockWindow({ id: 2 }));
    await store.setFocus(1);

    expect((await store.windows()).map((window) => window.id)).toEqual([2, 1]);
    expect(await store.removeWindow(2)).toBe(1);
  });

  it("returns the value computed inside a critical section", async () => {
    const store = new StateStore(createState([createMockWindow({ id: 4, isFocused: true })]));

    const id = await store.read((state) => state.focusedWindow()?.id);

    expect(id).toBe(4);
  });

  it("propagates command errors without poisoning", async () => {
    const store = new StateStore();

    await expect(
      store.write(() => {
        throw new NoFocusedWindowError();
      })
    ).rejects.toThrow(NoFocusedWindowError);

    expect(store.isPoisoned()).toBe(false);
    await expect(store.windows()).resolves.toEqual([]);
  });

  it("poisons itself when a write fails unexpectedly", async () => {
    const store = new StateStore();

    await expect(
      store.write(() => {
        throw new TypeError("broken invariant");
      })
    ).rejects.toThrow("state store is poisoned: broken invariant");

    expect(store.isPoisoned()).toBe(true);
    await expect(store.windows()).rejects.toThrow(StatePoisonedError);
    await expect(store.setFocus(1)).rejects.toThrow(StatePoisonedError);
  });

  it("does not poison on a failing read", async () => {
    const store = new StateStore();

    await expect(
      store.read(() => {
        throw new Error("query failed");
      })
    ).rejects.toThrow("query failed");

    expect(store.isPoisoned()).toBe(false);
  });

  it("serializes writes in call order", async () => {
    const store = new StateStore();
    const order: number[] = [];

    await Promise.all(
      [1, 2, 3, 4].map((id) =>
        store.write((state) => {
          state.upsertWindow(createMockWindow({ id }));
          order.push(id);
        })
      )
    );

    expect(order).toEqual([1, 2, 3, 4]);
    expect((await store.windows()).map((window) => window.id)).toEqual([1, 2, 3, 4]);
  });
});
