import { describe, it, expect, vi } from "vitest";
import { LazyCell } from "./lazy.js";

describe("LazyCell", () => {
  it("runs the initializer once for concurrent callers", async () => {
    let release: (value: string) => void = () => {};
    const init = vi.fn(
      () =>
        new Promise<string>((resolve) => {
          release = resolve;
        }),
    );
    const cell = new LazyCell(init);

    const first = cell.get();
    const second = cell.get();
    release("root");

    await expect(Promise.all([first, second])).resolves.toEqual([
      "root",
      "root",
    ]);
    expect(init).toHaveBeenCalledTimes(1);
  });

  it("memoizes the resolved value", async () => {
    const init = vi.fn().mockResolvedValue(42);
    const cell = new LazyCell<number>(init);

    expect(cell.peek()).toBeUndefined();
    await cell.get();
    await cell.get();

    expect(cell.peek()).toBe(42);
    expect(init).toHaveBeenCalledTimes(1);
  });

  it("retries after a failed initialization", async () => {
    const init = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("store unavailable"))
      .mockResolvedValueOnce("root");
    const cell = new LazyCell(init);

    await expect(cell.get()).rejects.toThrow("store unavailable");
    await expect(cell.get()).resolves.toBe("root");
    expect(init).toHaveBeenCalledTimes(2);
  });
});
