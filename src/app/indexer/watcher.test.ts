/**
 * Tests for the corpus watcher, against a mocked chokidar
 */

import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import type { EventEmitter } from "events";
import { QueryExpander } from "../../domain/services";
import { FakeCorpus } from "../../tests/fakeCorpus";
import { SCENARIO_LEXICON, TEST_SETTINGS } from "../../tests/fixtures";
import { SearchService, type RebuildResult } from "../search";
import { watchCorpus } from "./watcher";

type FakeWatcher = EventEmitter & { close: () => Promise<void> };

const chokidar = vi.hoisted(() => ({
  watchers: [] as FakeWatcher[],
  targets: [] as string[],
}));

vi.mock("chokidar", async () => {
  const { EventEmitter } = await import("events");

  class MockWatcher extends EventEmitter {
    close = vi.fn(async () => {});
  }

  return {
    watch: vi.fn((target: string) => {
      const watcher = new MockWatcher();
      chokidar.watchers.push(watcher);
      chokidar.targets.push(target);
      queueMicrotask(() => watcher.emit("ready"));
      return watcher;
    }),
  };
});

const rebuilt: RebuildResult = { generation: 1, documentCount: 1, termCount: 1, durationMs: 0 };

function createService(): SearchService {
  return new SearchService({
    corpus: new FakeCorpus([]),
    expander: new QueryExpander(SCENARIO_LEXICON),
    settings: TEST_SETTINGS,
  });
}

function lastWatcher(): FakeWatcher {
  const watcher = chokidar.watchers[chokidar.watchers.length - 1];
  if (!watcher) throw new Error("chokidar.watch was not called");
  return watcher;
}

describe("watchCorpus", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    chokidar.watchers.length = 0;
    chokidar.targets.length = 0;
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  test("watches the resolved corpus path", async () => {
    const handle = await watchCorpus(createService(), "/data/corpus");
    expect(chokidar.targets).toEqual(["/data/corpus"]);
    expect(handle.isRunning()).toBe(true);
    await handle.stop();
  });

  test("debounces a burst of changes into one rebuild", async () => {
    const service = createService();
    const rebuild = vi.spyOn(service, "rebuild").mockResolvedValue(rebuilt);
    const onRebuildStart = vi.fn();
    const onRebuildComplete = vi.fn();

    const handle = await watchCorpus(service, "/data/corpus", {
      debounceMs: 300,
      onRebuildStart,
      onRebuildComplete,
    });
    const watcher = lastWatcher();

    watcher.emit("change", "/data/corpus/a.json");
    await vi.advanceTimersByTimeAsync(200);
    watcher.emit("add", "/data/corpus/b.json");
    await vi.advanceTimersByTimeAsync(200);
    expect(rebuild).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(100);
    expect(rebuild).toHaveBeenCalledTimes(1);
    expect(onRebuildStart).toHaveBeenCalledWith(["/data/corpus/a.json", "/data/corpus/b.json"]);
    await vi.waitFor(() => expect(onRebuildComplete).toHaveBeenCalledWith(rebuilt));

    await handle.stop();
  });

  test("ignores files that are not JSON", async () => {
    const service = createService();
    const rebuild = vi.spyOn(service, "rebuild").mockResolvedValue(rebuilt);
    const onFileChange = vi.fn();

    const handle = await watchCorpus(service, "/data/corpus", { onFileChange });
    lastWatcher().emit("change", "/data/corpus/notes.txt");
    await vi.advanceTimersByTimeAsync(1000);

    expect(onFileChange).not.toHaveBeenCalled();
    expect(rebuild).not.toHaveBeenCalled();
    await handle.stop();
  });

  test("reports a failed rebuild and keeps watching", async () => {
    const service = createService();
    const rebuild = vi
      .spyOn(service, "rebuild")
      .mockRejectedValueOnce(new Error("bad export"))
      .mockResolvedValue(rebuilt);
    const onError = vi.fn();

    const handle = await watchCorpus(service, "/data/corpus", { debounceMs: 50, onError });
    const watcher = lastWatcher();

    watcher.emit("change", "/data/corpus/a.json");
    await vi.advanceTimersByTimeAsync(50);
    await vi.waitFor(() => expect(onError).toHaveBeenCalledWith(new Error("bad export")));

    watcher.emit("change", "/data/corpus/a.json");
    await vi.advanceTimersByTimeAsync(50);
    expect(rebuild).toHaveBeenCalledTimes(2);
    expect(handle.isRunning()).toBe(true);

    await handle.stop();
  });

  test("runs one more rebuild for changes made during a rebuild", async () => {
    const service = createService();
    let finishFirst: (result: RebuildResult) => void = () => {};
    const rebuild = vi
      .spyOn(service, "rebuild")
      .mockImplementationOnce(
        () =>
          new Promise<RebuildResult>((resolve) => {
            finishFirst = resolve;
          })
      )
      .mockResolvedValue(rebuilt);

    const handle = await watchCorpus(service, "/data/corpus", { debounceMs: 100 });
    const watcher = lastWatcher();

    watcher.emit("change", "/data/corpus/a.json");
    await vi.advanceTimersByTimeAsync(100);
    expect(rebuild).toHaveBeenCalledTimes(1);

    watcher.emit("change", "/data/corpus/b.json");
    watcher.emit("change", "/data/corpus/c.json");
    await vi.advanceTimersByTimeAsync(100);
    expect(rebuild).toHaveBeenCalledTimes(1);

    finishFirst(rebuilt);
    await vi.advanceTimersByTimeAsync(200);
    expect(rebuild).toHaveBeenCalledTimes(2);

    await handle.stop();
  });

  test("does not reschedule after stop during a rebuild", async () => {
    const service = createService();
    let finishFirst: (result: RebuildResult) => void = () => {};
    const rebuild = vi
      .spyOn(service, "rebuild")
      .mockImplementationOnce(
        () =>
          new Promise<RebuildResult>((resolve) => {
            finishFirst = resolve;
          })
      )
      .mockResolvedValue(rebuilt);

    const handle = await watchCorpus(service, "/data/corpus", { debounceMs: 100 });
    const watcher = lastWatcher();

    watcher.emit("change", "/data/corpus/a.json");
    await vi.advanceTimersByTimeAsync(100);
    expect(rebuild).toHaveBeenCalledTimes(1);

    watcher.emit("change", "/data/corpus/b.json");
    await handle.stop();
    finishFirst(rebuilt);
    await vi.advanceTimersByTimeAsync(0);

    expect(vi.getTimerCount()).toBe(0);
    await vi.advanceTimersByTimeAsync(500);
    expect(rebuild).toHaveBeenCalledTimes(1);
  });

  test("forwards watcher errors", async () => {
    const onError = vi.fn();
    const handle = await watchCorpus(createService(), "/data/corpus", { onError });

    lastWatcher().emit("error", "EMFILE");
    expect(onError).toHaveBeenCalledWith(new Error("EMFILE"));
    await handle.stop();
  });

  test("stops cleanly", async () => {
    const service = createService();
    const rebuild = vi.spyOn(service, "rebuild").mockResolvedValue(rebuilt);
    const handle = await watchCorpus(service, "/data/corpus", { debounceMs: 100 });
    const watcher = lastWatcher();

    watcher.emit("change", "/data/corpus/a.json");
    await handle.stop();
    await vi.advanceTimersByTimeAsync(500);
    watcher.emit("change", "/data/corpus/a.json");
    await vi.advanceTimersByTimeAsync(500);

    expect(handle.isRunning()).toBe(false);
    expect(watcher.close).toHaveBeenCalledTimes(1);
    expect(rebuild).not.toHaveBeenCalled();
  });
});
