import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { acquireRunLock, removeStaleLock, RunLockError } from "../lib/run-lock.js";

describe("acquireRunLock", () => {
  let tempDir: string;
  let lockPath: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "run-lock-"));
    lockPath = path.join(tempDir, "data", "todoist-sync.lock");
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("creates the lock file and removes it on release", () => {
    const release = acquireRunLock(lockPath);
    expect(fs.existsSync(lockPath)).toBe(true);

    release();
    expect(fs.existsSync(lockPath)).toBe(false);
  });

  it("refuses a second holder", () => {
    const release = acquireRunLock(lockPath);

    expect(() => acquireRunLock(lockPath)).toThrow(RunLockError);

    release();
    const again = acquireRunLock(lockPath);
    again();
  });

  it("replaces a stale lock", () => {
    fs.mkdirSync(path.dirname(lockPath), { recursive: true });
    fs.writeFileSync(lockPath, "{}");
    const old = new Date(Date.now() - 60_000);
    fs.utimesSync(lockPath, old, old);

    const release = acquireRunLock(lockPath, 1000);

    expect(JSON.parse(fs.readFileSync(lockPath, "utf-8")).pid).toBe(process.pid);
    expect(fs.readdirSync(path.dirname(lockPath))).toEqual(["todoist-sync.lock"]);
    release();
  });

  it("puts back a lock that another run took over first", () => {
    fs.mkdirSync(path.dirname(lockPath), { recursive: true });
    fs.writeFileSync(lockPath, "{}");
    const old = new Date(Date.now() - 60_000);
    fs.utimesSync(lockPath, old, old);
    const stale = fs.statSync(lockPath);

    // Another run replaces the stale lock with its own
    fs.rmSync(lockPath);
    fs.writeFileSync(lockPath, '{"pid":1}');

    expect(removeStaleLock(lockPath, stale)).toBe(false);
    expect(fs.readFileSync(lockPath, "utf-8")).toBe('{"pid":1}');
    expect(fs.readdirSync(path.dirname(lockPath))).toEqual(["todoist-sync.lock"]);
  });

  it("removes the stale lock it was given", () => {
    fs.mkdirSync(path.dirname(lockPath), { recursive: true });
    fs.writeFileSync(lockPath, "{}");
    const stale = fs.statSync(lockPath);

    expect(removeStaleLock(lockPath, stale)).toBe(true);
    expect(fs.existsSync(lockPath)).toBe(false);
  });
});
