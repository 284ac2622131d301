import { beforeEach, describe, expect, it } from "vitest";
import { NoWorkspaceError } from "./errors.js";
import { DaemonState } from "./state.js";
import { createMockWindow, createMockWorkspace, createState, createWorkspaceLayout } from "./test-utils.js";

describe("DaemonState", () => {
  let state: DaemonState;

  beforeEach(() => {
    state = createState([
      createMockWindow({ id: 1 }),
      createMockWindow({ id: 2 }),
      createMockWindow({ id: 3, isFocused: true }),
    ]);
  });

  describe("upsertWindow", () => {
    it("appends unknown windows", () => {
      state.upsertWindow(createMockWindow({ id: 9 }));

      expect(state.getWindows().map((window) => window.id)).toEqual([1, 2, 3, 9]);
    });

    it("replaces an existing window in place", () => {
      state.upsertWindow(createMockWindow({ id: 2, title: "Renamed" }));

      expect(state.getWindows().map((window) => window.id)).toEqual([1, 2, 3]);
      expect(state.getWindow(2)?.title).toBe("Renamed");
    });

    it("takes the focus from other windows when the newcomer is focused", () => {
      state.upsertWindow(createMockWindow({ id: 1, isFocused: true }));

      expect(state.focusedWindow()?.id).toBe(1);
      expect(state.getWindows().filter((window) => window.isFocused)).toHaveLength(1);
    });
  });

  describe("removeWindow", () => {
    it("returns the remaining count", () => {
      expect(state.removeWindow(2)).toBe(2);
      expect(state.getWindow(2)).toBeUndefined();
    });

    it("purges the id from every collection", () => {
      state.toggleMark("work", 2);
      state.toggleMark("work", 1);
      state.toggleFollowMode(2);
      state.toggleScratchpad(2);
      state.rememberVisited(2);

      state.removeWindow(2);

      expect(state.getMark("work")).toEqual([1]);
      expect(state.getFollowMode()).toEqual([]);
      expect(state.getScratchpad()).toEqual([]);
      expect(state.getCycleMemory()).toEqual([]);
    });

    it("drops a mark whose last window closed", () => {
      state.toggleMark("solo", 2);
      state.toggleMark("work", 1);

      state.removeWindow(2);

      expect([...state.getMarks().keys()]).toEqual(["work"]);
      expect(state.getMark("solo")).toBeUndefined();
    });

    it("ignores unknown ids", () => {
      expect(state.removeWindow(42)).toBe(3);
    });
  });

  describe("setFocus", () => {
    it("moves the focused window to the end of the list", () => {
      state.setFocus(1);

      expect(state.getWindows().map((window) => window.id)).toEqual([2, 3, 1]);
      expect(state.focusedWindow()?.id).toBe(1);
      expect(state.getWindow(3)?.isFocused).toBe(false);
    });

    it("clears the focus for null", () => {
      state.setFocus(null);

      expect(state.focusedWindow()).toBeUndefined();
    });

    it("clears the focus for an unknown id", () => {
      state.setFocus(77);

      expect(state.focusedWindow()).toBeUndefined();
      expect(state.getWindows().map((window) => window.id)).toEqual([1, 2, 3]);
    });
  });

  describe("replaceWindows", () => {
    it("purges ids of windows that disappeared", () => {
      state.toggleFollowMode(1);
      state.toggleScratchpad(2);

      state.replaceWindows([createMockWindow({ id: 2 }), createMockWindow({ id: 5 })]);

      expect(state.getWindows().map((window) => window.id)).toEqual([2, 5]);
      expect(state.getFollowMode()).toEqual([]);
      expect(state.getScratchpad()).toEqual([2]);
    });
  });

  describe("workspaces", () => {
    it("focuses a workspace and activates it on its output", () => {
      state.focusWorkspace(2);

      expect(state.focusedWorkspace()?.id).toBe(2);
      expect(state.getWorkspace(1)?.isActive).toBe(false);
      expect(state.getWorkspace(2)?.isActive).toBe(true);
      expect(state.getWorkspace(4)?.isActive).toBe(true);
    });

    it("activates a workspace without moving the focus", () => {
      state.activateWorkspace(2);

      expect(state.focusedWorkspace()?.id).toBe(1);
      expect(state.getWorkspace(2)?.isActive).toBe(true);
      expect(state.getWorkspace(1)?.isActive).toBe(false);
    });

    it("finds the bottom workspace of an output", () => {
      expect(state.findBottomWorkspace("DP-1").id).toBe(3);
      expect(state.findBottomWorkspace("HDMI-A-1").id).toBe(4);
    });

    it("fails when the output has no workspace", () => {
      expect(() => state.findBottomWorkspace("eDP-1")).toThrow(NoWorkspaceError);
      expect(() => state.findBottomWorkspace(undefined)).toThrow("No workspace on output 'unknown'");
    });

    it("replaces the list wholesale", () => {
      state.replaceWorkspaces([createMockWorkspace({ id: 8 })]);

      expect(state.getWorkspaces().map((workspace) => workspace.id)).toEqual([8]);
    });
  });

  describe("marks", () => {
    it("toggles ids and deletes marks left empty", () => {
      expect(state.toggleMark("a", 1)).toBe(true);
      expect(state.toggleMark("a", 2)).toBe(true);
      expect(state.getMark("a")).toEqual([1, 2]);

      expect(state.toggleMark("a", 1)).toBe(false);
      expect(state.toggleMark("a", 2)).toBe(false);
      expect(state.getMarks().has("a")).toBe(false);
    });

    it("prunes ids of missing windows", () => {
      state.toggleMark("a", 1);
      state.toggleMark("a", 99);

      expect(state.pruneMark("a")).toEqual([1]);
      expect(state.getMark("a")).toEqual([1]);
      expect(state.pruneMark("missing")).toBeUndefined();
    });
  });

  describe("recordCommand", () => {
    it("clears cycle memory only when the command changes", () => {
      state.recordCommand({ kind: "focus", match: { appId: "a" } });
      state.rememberVisited(1);

      expect(state.recordCommand({ kind: "focus", match: { appId: "a" } })).toBe(false);
      expect(state.getCycleMemory()).toEqual([1]);

      expect(state.recordCommand({ kind: "focus", match: { appId: "b" } })).toBe(true);
      expect(state.getCycleMemory()).toEqual([]);
      expect(state.getLastCommand()).toEqual({ kind: "focus", match: { appId: "b" } });
    });
  });

  it("starts empty", () => {
    const empty = new DaemonState();

    expect(empty.getWindows()).toEqual([]);
    expect(empty.getWorkspaces()).toEqual([]);
    expect(empty.getLastCommand()).toBeUndefined();
    expect(createWorkspaceLayout()).toHaveLength(4);
  });
});
