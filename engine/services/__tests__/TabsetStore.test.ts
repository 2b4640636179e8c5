import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "fs/promises";
import os from "os";
import path from "path";
import type { TabsetData } from "../../../shared/types/index.js";
import {
  AlreadyExistsError,
  DirectoryUnavailableError,
  FileSystemError,
  NotFoundError,
  TabsetParseError,
  ValidationError,
} from "../../utils/errorTypes.js";
import { NodeFileSystem } from "../../utils/fileSystem.js";
import { TabsetStore } from "../TabsetStore.js";

const SNAPSHOT: TabsetData = {
  window_width: 1280,
  window_height: 800,
  colors: { foreground: "#cccccc" },
  tabs: [
    {
      title: "work",
      panes: [
        { left: 0, cwd: "file:///home/u/src", exe: "/bin/bash" },
        { left: 80, cwd: "file:///home/u/src", exe: "/usr/bin/top" },
      ],
    },
  ],
};

describe("TabsetStore", () => {
  let tempDir: string;
  let directory: string;
  let fileSystem: NodeFileSystem;
  let store: TabsetStore;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "tabsets-store-"));
    directory = path.join(tempDir, "tabsets");
    fileSystem = new NodeFileSystem();
    store = new TabsetStore(directory, fileSystem);
    await store.initialize();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe("initialize", () => {
    it("creates the directory", async () => {
      expect((await fs.stat(directory)).isDirectory()).toBe(true);
    });

    it("is a no-op when the directory exists", async () => {
      const mkdir = vi.spyOn(fileSystem, "mkdir");
      await store.initialize();
      expect(mkdir).not.toHaveBeenCalled();
    });

    it("reports a directory that cannot be created", async () => {
      const blocker = path.join(tempDir, "file");
      await fs.writeFile(blocker, "");
      const blocked = new TabsetStore(path.join(blocker, "tabsets"), fileSystem);

      await expect(blocked.initialize()).rejects.toBeInstanceOf(FileSystemError);
    });
  });

  describe("pathFor", () => {
    it("maps a name to its file", () => {
      expect(store.pathFor("my set")).toBe(path.join(directory, "my set.tabset.json"));
    });

    it("rejects names that could leave the directory", () => {
      expect(() => store.pathFor("../x")).toThrow(ValidationError);
      expect(() => store.pathFor("a/b")).toThrow("Invalid tabset name 'a/b'.");
    });
  });

  describe("save and load", () => {
    it("round-trips a snapshot", async () => {
      await store.save(SNAPSHOT, "work");

      await expect(store.load("work")).resolves.toEqual(SNAPSHOT);
      expect(await store.exists("work")).toBe(true);
    });

    it("writes pretty-printed JSON without leaving a temp file", async () => {
      await store.save(SNAPSHOT, "work");

      const content = await fs.readFile(path.join(directory, "work.tabset.json"), "utf-8");
      expect(content).toBe(JSON.stringify(SNAPSHOT, null, 2));
      expect(await fs.readdir(directory)).toEqual(["work.tabset.json"]);
    });

    it("replaces an existing record", async () => {
      await store.save(SNAPSHOT, "work");
      await store.save({ ...SNAPSHOT, window_width: 640 }, "work");

      expect((await store.load("work")).window_width).toBe(640);
    });

    it("refuses a malformed snapshot", async () => {
      const malformed = { ...SNAPSHOT, window_width: -1 };

      await expect(store.save(malformed, "work")).rejects.toBeInstanceOf(TabsetParseError);
      expect(await store.exists("work")).toBe(false);
    });

    it("cleans up the temp file when the final move fails", async () => {
      vi.spyOn(fileSystem, "move").mockRejectedValue(new Error("EXDEV"));
      const filePath = path.join(directory, "work.tabset.json");

      await expect(store.save(SNAPSHOT, "work")).rejects.toThrow(`Unable to save '${filePath}'.`);
      expect(await fs.readdir(directory)).toEqual([]);
    });

    it("reports a missing record as not found", async () => {
      const filePath = path.join(directory, "absent.tabset.json");
      await expect(store.load("absent")).rejects.toThrow(new NotFoundError(`Tabset file not found '${filePath}'.`));
    });

    it("reports invalid JSON as a parse error", async () => {
      await fs.writeFile(path.join(directory, "broken.tabset.json"), "{ not json");

      await expect(store.load("broken")).rejects.toBeInstanceOf(TabsetParseError);
    });

    it("reports JSON of the wrong shape as a parse error", async () => {
      await fs.writeFile(path.join(directory, "odd.tabset.json"), JSON.stringify({ tabs: "none" }));

      await expect(store.load("odd")).rejects.toBeInstanceOf(TabsetParseError);
    });

    it("defaults missing colors to an empty scheme", async () => {
      const withoutColors = { window_width: 100, window_height: 50, tabs: SNAPSHOT.tabs };
      await fs.writeFile(path.join(directory, "plain.tabset.json"), JSON.stringify(withoutColors));

      expect((await store.load("plain")).colors).toEqual({});
    });
  });

  describe("list", () => {
    it("returns stored names in code unit order", async () => {
      for (const name of ["beta", "Alpha", "alpha", "_misc"]) {
        await store.save(SNAPSHOT, name);
      }
      await fs.writeFile(path.join(directory, "notes.txt"), "");
      await fs.writeFile(path.join(directory, ".tabset.json"), "{}");

      await expect(store.list()).resolves.toEqual(["Alpha", "_misc", "alpha", "beta"]);
    });

    it("skips files whose names no operation accepts", async () => {
      await store.save(SNAPSHOT, "ok");
      await fs.writeFile(path.join(directory, "old (1).tabset.json"), JSON.stringify(SNAPSHOT));
      await fs.writeFile(path.join(directory, "tab:set.tabset.json"), JSON.stringify(SNAPSHOT));

      await expect(store.list()).resolves.toEqual(["ok"]);
    });

    it("returns an empty list for an empty directory", async () => {
      await expect(store.list()).resolves.toEqual([]);
    });

    it("reports an unreadable directory", async () => {
      const missing = new TabsetStore(path.join(tempDir, "missing"), fileSystem);

      await expect(missing.list()).rejects.toBeInstanceOf(DirectoryUnavailableError);
    });
  });

  describe("delete", () => {
    it("removes a record", async () => {
      await store.save(SNAPSHOT, "work");
      await store.delete("work");

      expect(await store.exists("work")).toBe(false);
    });

    it("reports a missing record as not found", async () => {
      await expect(store.delete("absent")).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("rename", () => {
    it("moves a record to the new name", async () => {
      await store.save(SNAPSHOT, "old");
      await store.rename("old", "new");

      expect(await store.list()).toEqual(["new"]);
      await expect(store.load("new")).resolves.toEqual(SNAPSHOT);
    });

    it("never overwrites an existing record", async () => {
      await store.save(SNAPSHOT, "a");
      await store.save({ ...SNAPSHOT, window_width: 10 }, "b");

      await expect(store.rename("a", "b")).rejects.toThrow(new AlreadyExistsError("Tabset 'b' already exists."));
      expect((await store.load("a")).window_width).toBe(1280);
      expect((await store.load("b")).window_width).toBe(10);
    });

    it("reports a missing source as not found", async () => {
      await expect(store.rename("absent", "other")).rejects.toBeInstanceOf(NotFoundError);
    });

    it("reports a failed move", async () => {
      await store.save(SNAPSHOT, "a");
      vi.spyOn(fileSystem, "move").mockRejectedValue(new Error("EACCES"));

      await expect(store.rename("a", "b")).rejects.toBeInstanceOf(FileSystemError);
      expect(await store.exists("a")).toBe(true);
    });
  });
});
