import { describe, expect, it } from "vitest";

import { ConfirmChannel, parseConfirmAnswer, type ConfirmRequest } from "./confirm-channel";

const scenarioRequest: ConfirmRequest = {
  gate: "scenario",
  message: "Scenario generated.",
  data: { title: "Title", sceneCount: 0, preview: [] },
};

const uploadRequest: ConfirmRequest = {
  gate: "upload",
  message: "Upload?",
  data: { videos: {}, thumbnails: {} },
};

describe("parseConfirmAnswer", () => {
  it.each(["y", "Y", "yes", "YES", "  yes  "])("treats %j as yes", (answer) => {
    expect(parseConfirmAnswer(answer)).toBe(true);
  });

  it.each(["", "n", "no", "yep", "ok", null, undefined])("treats %j as no", (answer) => {
    expect(parseConfirmAnswer(answer)).toBe(false);
  });
});

describe("ConfirmChannel", () => {
  it("delivers the answer to the pending request", async () => {
    const seen: ConfirmRequest[] = [];
    const channel = new ConfirmChannel((request) => seen.push(request));

    const answer = channel.request(scenarioRequest);
    expect(seen).toEqual([scenarioRequest]);
    expect(channel.pendingRequest).toEqual(scenarioRequest);

    expect(channel.respond(true)).toBe(true);
    await expect(answer).resolves.toBe(true);
    expect(channel.pendingRequest).toBeNull();
  });

  it("accepts a new request once the previous one is answered", async () => {
    const channel = new ConfirmChannel();
    const first = channel.handler(scenarioRequest);
    channel.respond(false);
    await expect(first).resolves.toBe(false);

    const second = channel.handler(uploadRequest);
    channel.respond(true);
    await expect(second).resolves.toBe(true);
  });

  it("rejects a second request while one is pending", async () => {
    const channel = new ConfirmChannel();
    const first = channel.request(scenarioRequest);
    await expect(channel.request(uploadRequest)).rejects.toThrow('A confirmation for "scenario" is already pending');
    channel.respond(true);
    await expect(first).resolves.toBe(true);
  });

  it("returns false from respond() when nothing is pending", () => {
    expect(new ConfirmChannel().respond(true)).toBe(false);
  });

  it("declines the pending and every later request after cancel()", async () => {
    const channel = new ConfirmChannel();
    const pending = channel.request(scenarioRequest);
    channel.cancel();
    await expect(pending).resolves.toBe(false);
    await expect(channel.request(uploadRequest)).resolves.toBe(false);
    expect(channel.isCancelled).toBe(true);
  });
});
