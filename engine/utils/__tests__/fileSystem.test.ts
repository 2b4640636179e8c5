import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { NodeFileSystem } from "../fileSystem.js";

const { execaMock } = vi.hoisted(() => ({ execaMock: vi.fn() }));

vi.mock("execa", () => ({
  execa: execaMock,
}));

describe("NodeFileSystem", () => {
  let tempDir: string;
  let fileSystem: NodeFileSystem;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "tabsets-fs-"));
    fileSystem = new NodeFileSystem("linux");
    execaMock.mockReset();
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe("which", () => {
    it("returns the first line printed by which", async () => {
      execaMock.mockResolvedValue({ failed: false, exitCode: 0, stdout: "/usr/bin/top\n/bin/top\n" });

      await expect(fileSystem.which("top")).resolves.toBe("/usr/bin/top");
      expect(execaMock).toHaveBeenCalledWith("which", ["top"], { reject: false, stdin: "ignore" });
    });

    it("uses where on Windows", async () => {
      execaMock.mockResolvedValue({ failed: false, exitCode: 0, stdout: "C:\\Tools\\top.exe\r\n" });

      await expect(new NodeFileSystem("win32").which("top")).resolves.toBe("C:\\Tools\\top.exe");
      expect(execaMock).toHaveBeenCalledWith("where", ["top"], { reject: false, stdin: "ignore" });
    });

    it("returns null when the lookup fails", async () => {
      execaMock.mockResolvedValue({ failed: true, exitCode: 1, stdout: "" });

      await expect(fileSystem.which("missing-tool")).resolves.toBeNull();
    });

    it("returns null for empty output", async () => {
      execaMock.mockResolvedValue({ failed: false, exitCode: 0, stdout: "\n" });

      await expect(fileSystem.which("top")).resolves.toBeNull();
    });

    it("does not spawn anything for a blank command", async () => {
      await expect(fileSystem.which("  ")).resolves.toBeNull();
      expect(execaMock).not.toHaveBeenCalled();
    });
  });

  describe("file operations", () => {
    it("creates nested directories and reports their kind", async () => {
      const nested = path.join(tempDir, "a", "b");
      await fileSystem.mkdir(nested);

      expect(await fileSystem.isDirectory(nested)).toBe(true);
      expect(await fileSystem.isFile(nested)).toBe(false);
      expect(await fileSystem.isPath(nested)).toBe(true);
      expect(await fileSystem.isPath(path.join(tempDir, "nope"))).toBe(false);
    });

    it("writes, reads, lists, moves and removes files", async () => {
      const first = path.join(tempDir, "one.txt");
      const second = path.join(tempDir, "two.txt");

      await fileSystem.writeFile(first, "hello");
      expect(await fileSystem.readFile(first)).toBe("hello");
      expect(await fileSystem.isFile(first)).toBe(true);

      await fileSystem.move(first, second);
      expect(await fileSystem.readDir(tempDir)).toEqual(["two.txt"]);

      await fileSystem.remove(second);
      expect(await fileSystem.readDir(tempDir)).toEqual([]);
    });

    it("removes empty directories", async () => {
      const dir = path.join(tempDir, "empty");
      await fileSystem.mkdir(dir);
      await fileSystem.removeDir(dir);

      expect(await fileSystem.isPath(dir)).toBe(false);
    });

    it("rejects with ENOENT when reading a missing file", async () => {
      await expect(fileSystem.readFile(path.join(tempDir, "missing"))).rejects.toMatchObject({ code: "ENOENT" });
    });

    it.skipIf(process.platform === "win32")("checks the executable bit", async () => {
      const script = path.join(tempDir, "run.sh");
      const plain = path.join(tempDir, "notes.txt");
      await fs.writeFile(script, "#!/bin/sh\n", { mode: 0o755 });
      await fs.writeFile(plain, "text", { mode: 0o644 });

      expect(await fileSystem.isExecutable(script)).toBe(true);
      expect(await fileSystem.isExecutable(plain)).toBe(false);
      expect(await fileSystem.isExecutable(tempDir)).toBe(false);
    });
  });
});
