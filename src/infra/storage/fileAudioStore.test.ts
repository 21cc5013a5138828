import { mkdtemp, readFile, rm, utimes, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FileAudioStore } from "./fileAudioStore";

const now = new Date("2026-03-01T12:00:00.000Z");
const clock = { now: () => now };

let directory = "";
let counter = 0;
const ids = { next: () => `clip-${++counter}` };

beforeEach(async () => {
  directory = await mkdtemp(path.join(tmpdir(), "audio-store-"));
  counter = 0;
});

afterEach(async () => {
  await rm(directory, { recursive: true, force: true });
});

describe("FileAudioStore", () => {
  it("writes the bytes and returns the public url", async () => {
    const store = new FileAudioStore(path.join(directory, "audio"), "http://localhost:8000/", ids, clock);

    const result = await store.save({
      bytes: new Uint8Array([1, 2, 3]),
      contentType: "audio/mpeg",
    });

    expect(result._unsafeUnwrap()).toEqual({
      ref: "http://localhost:8000/static/audio/clip-1.mp3",
      byteLength: 3,
    });
    expect(Array.from(await readFile(path.join(directory, "audio", "clip-1.mp3")))).toEqual([1, 2, 3]);
  });

  it("fails as a storage error when the directory cannot be created", async () => {
    const blocker = path.join(directory, "blocker");
    await writeFile(blocker, "file in the way");
    const store = new FileAudioStore(path.join(blocker, "audio"), "http://localhost:8000", ids, clock);

    const result = await store.save({ bytes: new Uint8Array([1]), contentType: "audio/wav" });

    expect(result._unsafeUnwrapErr()).toMatchObject({
      source: "storage",
      code: "provider_error",
    });
  });

  it("removes only files older than the cutoff", async () => {
    const store = new FileAudioStore(directory, "http://localhost:8000", ids, clock);
    const oldFile = path.join(directory, "old.mp3");
    const freshFile = path.join(directory, "fresh.mp3");
    await writeFile(oldFile, "old");
    await writeFile(freshFile, "fresh");
    const twoDaysAgo = new Date(now.getTime() - 48 * 60 * 60 * 1000);
    const oneHourAgo = new Date(now.getTime() - 60 * 60 * 1000);
    await utimes(oldFile, twoDaysAgo, twoDaysAgo);
    await utimes(freshFile, oneHourAgo, oneHourAgo);

    const removed = await store.cleanupOlderThan(24 * 60 * 60 * 1000);

    expect(removed).toBe(1);
    await expect(readFile(freshFile, "utf8")).resolves.toBe("fresh");
    await expect(readFile(oldFile)).rejects.toThrow();
  });

  it("treats a missing directory as nothing to clean", async () => {
    const store = new FileAudioStore(path.join(directory, "missing"), "http://localhost:8000", ids, clock);

    await expect(store.cleanupOlderThan(1_000)).resolves.toBe(0);
  });
});
