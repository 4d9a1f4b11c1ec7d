import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { makeTempDir } from "../../__tests__/helpers.js";
import { ProfileStoreError } from "../../errors.js";
import { DeviceProfileStore, parseTapPoint } from "../profiles.js";

describe("DeviceProfileStore", () => {
  let tempDir: string;
  let store: DeviceProfileStore;

  beforeEach(async () => {
    tempDir = await makeTempDir("profiles");
    store = new DeviceProfileStore(path.join(tempDir, ".farmsync", "devices.json"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("is empty when the file does not exist", async () => {
    expect(await store.load()).toEqual({});
  });

  it("records a detected device", async () => {
    const seen = new Date("2026-03-01T10:00:00Z");
    await store.recordDetection(
      { identity: "SERIAL1", displayName: "Google Pixel 7", model: "Pixel 7", kind: "direct" },
      seen,
    );

    expect(await store.get("SERIAL1")).toEqual({
      displayName: "Google Pixel 7",
      model: "Pixel 7",
      transport: "direct",
      lastSeen: "2026-03-01T10:00:00.000Z",
    });
  });

  it("keeps the tap point when a device is seen again", async () => {
    const device = { identity: "SERIAL1", displayName: "Pixel", model: "Pixel 7", kind: "direct" as const };
    await store.recordDetection(device, new Date("2026-03-01T10:00:00Z"));
    await store.setTap("SERIAL1", { x: 540, y: 1800 });

    const profile = await store.recordDetection(
      { ...device, kind: "media-copy" },
      new Date("2026-03-02T10:00:00Z"),
    );

    expect(profile.tap).toEqual({ x: 540, y: 1800 });
    expect(profile.transport).toBe("media-copy");
    expect(profile.lastSeen).toBe("2026-03-02T10:00:00.000Z");
  });

  it("does not create a profile when setting a tap for an unknown device", async () => {
    expect(await store.setTap("UNKNOWN", { x: 1, y: 2 })).toBeUndefined();
    expect(await store.load()).toEqual({});
  });

  it("lists the most recently seen device first", async () => {
    await store.recordDetection(
      { identity: "OLD", displayName: "Old", model: "A", kind: "direct" },
      new Date("2026-01-01T00:00:00Z"),
    );
    await store.recordDetection(
      { identity: "NEW", displayName: "New", model: "B", kind: "media-copy" },
      new Date("2026-02-01T00:00:00Z"),
    );

    expect((await store.list()).map((profile) => profile.identity)).toEqual(["NEW", "OLD"]);
  });

  it("skips entries that fail validation", async () => {
    await fs.mkdir(path.dirname(store.path), { recursive: true });
    await fs.writeFile(
      store.path,
      JSON.stringify({
        GOOD: { displayName: "Good", model: "M", transport: "direct", lastSeen: "2026-01-01T00:00:00.000Z" },
        BAD: { displayName: "Bad", transport: "carrier-pigeon" },
      }),
    );

    expect(Object.keys(await store.load())).toEqual(["GOOD"]);
  });

  it("keeps entries it cannot read when recording another device", async () => {
    const bad = { displayName: "Bad", transport: "carrier-pigeon", tap: { x: 1, y: 2 } };
    await fs.mkdir(path.dirname(store.path), { recursive: true });
    await fs.writeFile(store.path, JSON.stringify({ BAD: bad }));

    await store.recordDetection(
      { identity: "SERIAL1", displayName: "Pixel", model: "Pixel 7", kind: "direct" },
      new Date("2026-03-01T10:00:00Z"),
    );

    expect(JSON.parse(await fs.readFile(store.path, "utf-8"))).toEqual({
      BAD: bad,
      SERIAL1: {
        displayName: "Pixel",
        model: "Pixel 7",
        transport: "direct",
        lastSeen: "2026-03-01T10:00:00.000Z",
      },
    });
  });

  it("reads an unparseable file as empty but refuses to overwrite it", async () => {
    await fs.mkdir(path.dirname(store.path), { recursive: true });
    await fs.writeFile(store.path, "{not json");

    expect(await store.load()).toEqual({});
    await expect(
      store.recordDetection({ identity: "SERIAL1", displayName: "P", model: "M", kind: "direct" }),
    ).rejects.toThrow(ProfileStoreError);
    expect(await fs.readFile(store.path, "utf-8")).toBe("{not json");
  });

  it("leaves no temp files behind after saving", async () => {
    await store.recordDetection({ identity: "SERIAL1", displayName: "P", model: "M", kind: "direct" });

    expect(await fs.readdir(path.dirname(store.path))).toEqual(["devices.json"]);
  });
});

describe("parseTapPoint", () => {
  it("accepts comma, x and space separators", () => {
    expect(parseTapPoint("540,1800")).toEqual({ x: 540, y: 1800 });
    expect(parseTapPoint("540x1800")).toEqual({ x: 540, y: 1800 });
    expect(parseTapPoint(" 540 1800 ")).toEqual({ x: 540, y: 1800 });
  });

  it("rejects anything else", () => {
    expect(parseTapPoint("540")).toBeNull();
    expect(parseTapPoint("-1,2")).toBeNull();
    expect(parseTapPoint("a,b")).toBeNull();
  });
});
