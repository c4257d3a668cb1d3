import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { FileDedupStore } from "../lib/dedup-store.js";

describe("FileDedupStore", () => {
  let tempDir: string;
  let filePath: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "dedup-store-"));
    filePath = path.join(tempDir, "nested", "added_events.txt");
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("starts empty when the file doesn't exist", async () => {
    const store = await FileDedupStore.open(filePath);

    expect(await store.hasBeenSynced("Lab-2025-03-10")).toBe(false);
    expect(fs.existsSync(filePath)).toBe(false);
  });

  it("records identifiers once", async () => {
    const store = await FileDedupStore.open(filePath);

    expect(await store.markSynced("Lab-2025-03-10")).toBe(true);
    expect(await store.markSynced("Lab-2025-03-10")).toBe(false);
    expect(await store.hasBeenSynced("Lab-2025-03-10")).toBe(true);
    expect(fs.readFileSync(filePath, "utf-8")).toBe('"Lab-2025-03-10"\n');
  });

  it("remembers identifiers across reopen", async () => {
    const first = await FileDedupStore.open(filePath);
    await first.markSynced("Lab-2025-03-10");
    await first.markSynced("Line one\nline two-2025-03-11T09:00:00+01:00");
    await first.close();

    const second = await FileDedupStore.open(filePath);

    expect(await second.hasBeenSynced("Lab-2025-03-10")).toBe(true);
    expect(await second.hasBeenSynced("Line one\nline two-2025-03-11T09:00:00+01:00")).toBe(true);
  });

  it("reads plain-text tracking files", async () => {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, "Lab-2025-03-10\n\nTenta-2025-03-20 08:00:00+01:00\n");

    const store = await FileDedupStore.open(filePath);

    expect(await store.hasBeenSynced("Lab-2025-03-10")).toBe(true);
    expect(await store.hasBeenSynced("Tenta-2025-03-20 08:00:00+01:00")).toBe(true);
    expect(await store.hasBeenSynced("")).toBe(false);
  });
});
