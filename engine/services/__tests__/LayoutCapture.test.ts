import { describe, it, expect, vi } from "vitest";
import { LayoutCapture } from "../LayoutCapture.js";
import { FakeWindow } from "./fakes.js";

describe("LayoutCapture", () => {
  const capture = new LayoutCapture();

  it("records tabs and panes in host order", async () => {
    const window = new FakeWindow({
      dimensions: { pixelWidth: 1600, pixelHeight: 900 },
      colors: { foreground: "#dddddd", background: "#111111" },
      tabs: [
        {
          title: "editor",
          panes: [
            { left: 0, cwd: "file:///home/u/src", exe: "/usr/bin/vim" },
            { left: 80, cwd: "file:///home/u/src", exe: "/bin/bash" },
          ],
        },
        { title: "logs", panes: [{ left: 0, cwd: "file:///var/log", exe: "/usr/bin/less" }] },
      ],
    });

    await expect(capture.capture(window)).resolves.toEqual({
      window_width: 1600,
      window_height: 900,
      colors: { foreground: "#dddddd", background: "#111111" },
      tabs: [
        {
          title: "editor",
          panes: [
            { left: 0, cwd: "file:///home/u/src", exe: "/usr/bin/vim" },
            { left: 80, cwd: "file:///home/u/src", exe: "/bin/bash" },
          ],
        },
        { title: "logs", panes: [{ left: 0, cwd: "file:///var/log", exe: "/usr/bin/less" }] },
      ],
    });
  });

  it("stores unknown working directories and processes as empty strings", async () => {
    const window = new FakeWindow({ tabs: [{ title: "remote", panes: [{ cwd: null, exe: null }] }] });

    const snapshot = await capture.capture(window);
    expect(snapshot.tabs[0].panes[0]).toEqual({ left: 0, cwd: "", exe: "" });
  });

  it("uses an empty color scheme when the host reports none", async () => {
    const snapshot = await capture.capture(new FakeWindow());
    expect(snapshot.colors).toEqual({});
  });

  it("does not change the window", async () => {
    const window = new FakeWindow();
    await capture.capture(window);
    expect(window.actions).toEqual([]);
  });

  it("propagates host failures", async () => {
    const window = new FakeWindow();
    vi.spyOn(window, "getDimensions").mockRejectedValue(new Error("window closed"));

    await expect(capture.capture(window)).rejects.toThrow("window closed");
  });
});
