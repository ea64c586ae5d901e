import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { CheckpointStore, createInitialState, jobIdForUrl } from "./checkpoint";

const URL = "https://example.com/articles/42";

describe("jobIdForUrl", () => {
  it("is the first 12 hex characters of the URL's MD5", () => {
    // md5("abc") = 900150983cd24fb0d6963f7d28e17f72
    expect(jobIdForUrl("abc")).toBe("900150983cd2");
  });

  it("is stable per URL and differs between URLs", () => {
    expect(jobIdForUrl(URL)).toBe(jobIdForUrl(URL));
    expect(jobIdForUrl(URL)).not.toBe(jobIdForUrl(`${URL}?page=2`));
  });
});

describe("CheckpointStore", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "checkpoint-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reports nothing saved for a new job", () => {
    const store = new CheckpointStore(URL, dir);
    expect(store.exists()).toBe(false);
    expect(store.load()).toBeNull();
    expect(store.lastCompletedStep()).toBe(0);
  });

  it("names the file after the job id", () => {
    const store = new CheckpointStore(URL, dir);
    expect(store.path).toBe(path.join(dir, `${jobIdForUrl(URL)}.json`));
  });

  it("round-trips the state and the last completed step", () => {
    const store = new CheckpointStore(URL, dir);
    const state = createInitialState(URL, "battery");
    state.pageText = "Body text";
    state.titleKo = "배터리 이야기";
    state.imagePaths = ["/tmp/a.png", null, "/tmp/c.png"];
    state.videos = { landscape_ko: "/tmp/v.mp4" };

    store.save(state, 5);

    const loaded = new CheckpointStore(URL, dir).load();
    expect(loaded).not.toBeNull();
    expect({ ...loaded, lastSavedAt: "" }).toEqual({ ...state, lastSavedAt: "" });
    expect(store.lastCompletedStep()).toBe(5);
    expect(fs.existsSync(`${store.path}.tmp`)).toBe(false);
  });

  it("overwrites an earlier checkpoint", () => {
    const store = new CheckpointStore(URL, dir);
    const state = createInitialState(URL, "");
    store.save(state, 3);
    store.save(state, 2);
    expect(store.lastCompletedStep()).toBe(2);
  });

  it("treats a corrupt file as no checkpoint", () => {
    const store = new CheckpointStore(URL, dir);
    fs.writeFileSync(store.path, "{ not json");
    expect(store.load()).toBeNull();
    expect(store.lastCompletedStep()).toBe(0);
  });

  it("treats a file with the wrong shape as no checkpoint", () => {
    const store = new CheckpointStore(URL, dir);
    fs.writeFileSync(store.path, JSON.stringify({ lastCompletedStep: "three", state: {} }));
    expect(store.load()).toBeNull();
  });

  it("fills defaults for fields older checkpoints lack", () => {
    const store = new CheckpointStore(URL, dir);
    const { reusedImageCount, uploadedVideoIds, historyId, errors, ...older } = createInitialState(URL, "");
    fs.writeFileSync(store.path, JSON.stringify({ lastCompletedStep: 1, state: older }));

    const loaded = store.load();
    expect(loaded?.reusedImageCount).toBe(reusedImageCount);
    expect(loaded?.uploadedVideoIds).toEqual(uploadedVideoIds);
    expect(loaded?.historyId).toBe(historyId);
    expect(loaded?.errors).toEqual(errors);
  });

  it("deletes the checkpoint", () => {
    const store = new CheckpointStore(URL, dir);
    store.save(createInitialState(URL, ""), 1);
    store.delete();
    expect(store.exists()).toBe(false);
    expect(store.lastCompletedStep()).toBe(0);
  });
});
