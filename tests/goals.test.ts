import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync, rmSync } from "fs";
import { join } from "path";

import { ArchiveStore } from "../src/archive/store.js";
import { Archive, Goal, GoalId, GoalState, Session } from "../src/archive/types.js";
import { NotFoundError, ValidationError, WriteFailureError } from "../src/core/errors.js";
import { GoalRepository } from "../src/goals/repository.js";
import { openTracker, Tracker } from "../src/tracker.js";
import { fixedClock, makeTempDir, steppingClock } from "./fixtures.js";

function listedGoal(id: GoalId, title: string, createdAt: string, state: GoalState): Goal {
  return { id, title, createdAt, isReward: false, commands: [], notes: "", state };
}

describe("GoalRepository", () => {
  let dir: string;
  let cleanup: () => void;
  let root: string;
  let tracker: Tracker;

  beforeEach(() => {
    ({ dir, cleanup } = makeTempDir());
    root = join(dir, "archive");
    tracker = openTracker(root, { now: steppingClock("2024-01-10T12:00:00.000Z") });
  });
  afterEach(() => cleanup());

  describe("create", () => {
    it("should assign increasing identifiers and persist the goal", () => {
      const first = tracker.goals.create({ title: "  Read 12 books ", target: 12, unit: "books" });
      const second = tracker.goals.create({ title: "Run", reward: "Massage" });

      expect(first).toBe(1);
      expect(second).toBe(2);
      expect(tracker.goals.get(first)).toEqual({
        id: 1,
        title: "Read 12 books",
        createdAt: "2024-01-10T12:00:00.000Z",
        isReward: false,
        target: 12,
        unit: "books",
        commands: [],
        notes: "",
        state: { kind: "active" },
      });
      expect(openTracker(root).goals.get(second)?.reward).toBe("Massage");
    });

    it("should reject an empty title without touching the archive", () => {
      expect(() => tracker.goals.create({ title: "   " })).toThrow(ValidationError);
      expect(tracker.archive.nextGoalId).toBe(1);
      expect(existsSync(tracker.store.goalPath(1))).toBe(false);
      expect(existsSync(tracker.store.manifestPath)).toBe(false);
    });

    it("should reject a target that is not a positive number", () => {
      expect(() => tracker.goals.create({ title: "Run", target: 0 })).toThrow(ValidationError);
      expect(() => tracker.goals.create({ title: "Run", target: Number.NaN })).toThrow(ValidationError);
      expect(() => tracker.goals.create({ title: "Run", target: -0 })).toThrow(ValidationError);
      expect(tracker.goals.list("all")).toEqual([]);
    });

    it("should never reuse an identifier, even after deletion and reload", () => {
      const first = tracker.goals.create({ title: "Temporary" });
      expect(tracker.goals.delete(first)).toBe("removed");

      const reopened = openTracker(root);
      const next = reopened.goals.create({ title: "Next" });

      expect(next).toBe(2);
      expect(reopened.goals.get(first)).toBeUndefined();
    });

    it("should store reward goals and their session commands", () => {
      const id = tracker.goals.create({
        title: "Play guitar",
        isReward: true,
        commands: [" open tabs.pdf ", "", "metronome 80"],
      });

      const goal = openTracker(root).goals.require(id);
      expect(goal.isReward).toBe(true);
      expect(goal.commands).toEqual(["open tabs.pdf", "metronome 80"]);
    });

    it("should not advance the identifier counter when the goal write fails", () => {
      tracker.goals.create({ title: "Read" });
      const blocked = `${tracker.store.goalPath(2)}.tmp`;
      mkdirSync(blocked);

      expect(() => tracker.goals.create({ title: "Run" })).toThrow(WriteFailureError);
      expect(tracker.archive.nextGoalId).toBe(2);
      expect(tracker.goals.get(2)).toBeUndefined();

      rmSync(blocked, { recursive: true });
      expect(tracker.goals.create({ title: "Run" })).toBe(2);
      expect(openTracker(root).goals.require(2).title).toBe("Run");
    });
  });

  describe("mutations", () => {
    it("should rename, retarget and persist", () => {
      const id = tracker.goals.create({ title: "Read", target: 10 });

      tracker.goals.rename(id, "Read more");
      tracker.goals.setTarget(id, 24);
      tracker.goals.setReward(id, "Bookshop trip");

      const reloaded = openTracker(root).goals.require(id);
      expect(reloaded.title).toBe("Read more");
      expect(reloaded.target).toBe(24);
      expect(reloaded.reward).toBe("Bookshop trip");
    });

    it("should clear the target when set to undefined", () => {
      const id = tracker.goals.create({ title: "Read", target: 10 });

      tracker.goals.setTarget(id, undefined);

      expect(tracker.goals.require(id).target).toBeUndefined();
      expect("target" in tracker.goals.require(id)).toBe(false);
    });

    it("should reject an empty rename and keep the old title", () => {
      const id = tracker.goals.create({ title: "Read" });

      expect(() => tracker.goals.rename(id, "")).toThrow(ValidationError);
      expect(tracker.goals.require(id).title).toBe("Read");
    });

    it("should fail with NotFound for unknown goals", () => {
      expect(() => tracker.goals.rename(42, "x")).toThrow(NotFoundError);
      expect(() => tracker.goals.setTarget(42, 1)).toThrow(NotFoundError);
      expect(() => tracker.goals.setNotes(42, "x")).toThrow(NotFoundError);
      expect(() => tracker.goals.archive(42)).toThrow(NotFoundError);
      expect(() => tracker.goals.delete(42)).toThrow(NotFoundError);
      expect(tracker.goals.get(42)).toBeUndefined();
    });

    it("should replace commands and drop blank entries", () => {
      const id = tracker.goals.create({ title: "Read", commands: ["old"] });

      tracker.goals.setCommands(id, ["  ", "open book.epub"]);

      expect(openTracker(root).goals.require(id).commands).toEqual(["open book.epub"]);
    });

    it("should hand notes text back and forth for an external editor", () => {
      const id = tracker.goals.create({ title: "Read" });

      tracker.goals.setNotes(id, "---\n2024-01-10 12:00\nchapter 1\n");

      expect(tracker.goals.notesText(id)).toBe("---\n2024-01-10 12:00\nchapter 1\n");
      expect(openTracker(root).goals.notesText(id)).toBe("---\n2024-01-10 12:00\nchapter 1\n");
    });
  });

  describe("archive / restore", () => {
    it("should move goals between the active and archived lists", () => {
      const read = tracker.goals.create({ title: "Read" });
      const run = tracker.goals.create({ title: "Run" });

      tracker.goals.archive(run);
      expect(tracker.goals.list("active").map((g) => g.id)).toEqual([read]);
      expect(tracker.goals.list("archived").map((g) => g.id)).toEqual([run]);
      expect(tracker.goals.require(run).state).toEqual({ kind: "archived", archivedAt: "2024-01-10T12:00:02.000Z" });

      tracker.goals.restore(run);
      expect(tracker.goals.list("active").map((g) => g.id)).toEqual([read, run]);
      expect(tracker.goals.list("archived")).toEqual([]);
      expect(openTracker(root).goals.require(run).state).toEqual({ kind: "active" });
    });

    it("should keep the first archive time when archived twice", () => {
      const id = tracker.goals.create({ title: "Read" });

      tracker.goals.archive(id);
      tracker.goals.archive(id);

      expect(openTracker(root).goals.require(id).state).toEqual({
        kind: "archived",
        archivedAt: "2024-01-10T12:00:01.000Z",
      });
    });

    it("should leave sessions untouched", () => {
      const id = tracker.goals.create({ title: "Read" });
      tracker.sessions.add({ goalId: id, date: "2024-01-09", value: 3 });

      tracker.goals.archive(id);

      expect([...tracker.sessions.sessionsFor(id)].map((s) => s.value)).toEqual([3]);
    });
  });

  describe("delete", () => {
    it("should physically remove a goal without sessions", () => {
      const id = tracker.goals.create({ title: "Scratch" });

      expect(tracker.goals.delete(id)).toBe("removed");
      expect(tracker.goals.get(id)).toBeUndefined();
      expect(existsSync(tracker.store.goalPath(id))).toBe(false);
    });

    it("should tombstone a goal with sessions and keep its ledger", () => {
      const id = tracker.goals.create({ title: "Read 12 books", target: 12, reward: "Shelf", unit: "books" });
      tracker.goals.setNotes(id, "notes");
      tracker.sessions.add({ goalId: id, date: "2024-01-01", value: 1 });
      tracker.sessions.add({ goalId: id, date: "2024-01-02", value: 1 });
      const before = [...tracker.sessions.sessionsFor(id)];

      expect(tracker.goals.delete(id)).toBe("tombstoned");

      const tombstone = tracker.goals.require(id);
      expect(tombstone).toEqual({
        id,
        title: "Read 12 books",
        createdAt: "2024-01-10T12:00:00.000Z",
        isReward: false,
        unit: "books",
        commands: [],
        notes: "",
        state: { kind: "tombstoned", deletedAt: "2024-01-10T12:00:03.000Z" },
      });
      expect([...tracker.sessions.sessionsFor(id)]).toEqual(before);
      expect([...openTracker(root).sessions.sessionsFor(id)]).toEqual(before);
    });

    it("should treat a tombstone as absent for further mutations", () => {
      const id = tracker.goals.create({ title: "Read" });
      tracker.sessions.add({ goalId: id, date: "2024-01-01", value: 1 });
      tracker.goals.delete(id);

      expect(() => tracker.goals.rename(id, "Again")).toThrow(NotFoundError);
      expect(() => tracker.goals.setNotes(id, "x")).toThrow(NotFoundError);
      expect(() => tracker.goals.notesText(id)).toThrow(NotFoundError);
      expect(() => tracker.goals.restore(id)).toThrow(NotFoundError);
      expect(() => tracker.goals.delete(id)).toThrow(NotFoundError);
    });
  });

  describe("list", () => {
    it("should order by creation time and break ties by identifier", () => {
      const archive: Archive = {
        schemaVersion: 2,
        nextGoalId: 5,
        nextSessionId: 1,
        goals: new Map<GoalId, Goal>([
          [1, listedGoal(1, "Late", "2024-02-01T00:00:00.000Z", { kind: "active" })],
          [3, listedGoal(3, "Tie B", "2024-01-01T00:00:00.000Z", { kind: "active" })],
          [2, listedGoal(2, "Tie A", "2024-01-01T00:00:00.000Z", { kind: "archived", archivedAt: null })],
          // 別オフセット表記だが時刻は 2024-01-15T00:00Z
          [4, listedGoal(4, "Offset", "2024-01-15T09:00:00+09:00", { kind: "active" })],
        ]),
        ledgers: new Map<GoalId, Session[]>(),
      };
      const repository = new GoalRepository(ArchiveStore.open(join(dir, "list")), archive, {
        now: fixedClock("2024-03-01T12:00:00.000Z"),
      });

      expect(repository.list("all").map((g) => g.id)).toEqual([2, 3, 4, 1]);
      expect(repository.list("active").map((g) => g.id)).toEqual([3, 4, 1]);
      expect(repository.list().map((g) => g.id)).toEqual([3, 4, 1]);
    });

    it("should include tombstones only under their own filter and all", () => {
      const kept = tracker.goals.create({ title: "Kept" });
      const gone = tracker.goals.create({ title: "Gone" });
      tracker.sessions.add({ goalId: gone, date: "2024-01-05", value: 1 });
      tracker.goals.delete(gone);

      expect(tracker.goals.list("active").map((g) => g.id)).toEqual([kept]);
      expect(tracker.goals.list("tombstoned").map((g) => g.id)).toEqual([gone]);
      expect(tracker.goals.list("all").map((g) => g.id)).toEqual([kept, gone]);
    });

    it("should return copies that do not change the repository", () => {
      const id = tracker.goals.create({ title: "Read", commands: ["open"] });
      const [view] = tracker.goals.list();

      view.title = "Changed outside";
      view.commands.push("echo changed");

      expect(tracker.goals.require(id).title).toBe("Read");
      expect(tracker.goals.require(id).commands).toEqual(["open"]);
    });
  });

  describe("search", () => {
    let read: number;
    let reading: number;
    let gaming: number;

    beforeEach(() => {
      read = tracker.goals.create({ title: "Read novels" });
      reading = tracker.goals.create({ title: "Reading group", isReward: true });
      gaming = tracker.goals.create({ title: "Gaming", isReward: true });
    });

    it("should match titles case-insensitively", () => {
      expect(tracker.goals.search("  READ ").map((g) => g.id)).toEqual([read, reading]);
    });

    it("should filter by goal or reward kind", () => {
      expect(tracker.goals.search("read", { isReward: true }).map((g) => g.id)).toEqual([reading]);
      expect(tracker.goals.search("", { isReward: false }).map((g) => g.id)).toEqual([read]);
      expect(tracker.goals.search("").map((g) => g.id)).toEqual([read, reading, gaming]);
    });

    it("should search active goals unless another filter is given", () => {
      tracker.goals.archive(reading);

      expect(tracker.goals.search("read").map((g) => g.id)).toEqual([read]);
      expect(tracker.goals.search("read", { filter: "archived" }).map((g) => g.id)).toEqual([reading]);
      expect(tracker.goals.search("read", { filter: "all" }).map((g) => g.id)).toEqual([read, reading]);
    });
  });
});
