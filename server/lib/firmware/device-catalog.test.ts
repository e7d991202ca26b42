import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { fakeFetch, tempDir } from "../../testing/fakes";
import { DEVICE_API_URL, fetchDeviceCatalog, processDevices, writeDeviceCatalog } from "./device-catalog";

const apiResponse = {
  devices: {
    "tplink_archer-c7-v5": {
      title: "TP-Link Archer C7 v5",
      target: "ath79/generic",
      images: [{ name: "sysupgrade.bin" }],
      supported_releases: { stable: "23.05.3" },
    },
    generic: {
      title: "Generic x86/64",
      target: "x86/64",
      images: [{ name: "combined.img.gz" }],
      supported_releases: { stable: "23.05.3" },
    },
    "no-images": {
      title: "Board Without Images",
      target: "ramips/mt7621",
      images: [],
      supported_releases: { stable: "23.05.3" },
    },
    "snapshot-only": {
      title: "Snapshot Only",
      target: "mediatek/filogic",
      images: [{ name: "factory.bin" }],
      supported_releases: {},
    },
  },
};

describe("processDevices", () => {
  it("keeps devices with images and a stable release, sorted by title", () => {
    expect(processDevices(apiResponse)).toEqual([
      { title: "Generic x86/64", target: "x86/64", profile: "generic", version: "23.05.3", arch: "x86" },
      {
        title: "TP-Link Archer C7 v5",
        target: "ath79/generic",
        profile: "tplink_archer-c7-v5",
        version: "23.05.3",
        arch: "ath79",
      },
    ]);
  });

  it("treats a response without devices as empty", () => {
    expect(processDevices({})).toEqual([]);
  });

  it("rejects responses of the wrong shape", () => {
    expect(() => processDevices({ devices: [1, 2] })).toThrow(/^Unexpected device API response/);
  });
});

describe("device catalog file", () => {
  it("fetches, processes and writes the list", async () => {
    const file = join(await tempDir(), "devices.json");
    const { fetch } = fakeFetch({ [DEVICE_API_URL]: JSON.stringify(apiResponse) });

    const devices = await fetchDeviceCatalog(DEVICE_API_URL, fetch);
    await writeDeviceCatalog(file, devices);

    expect(devices).toHaveLength(2);
    expect(await readFile(file, "utf8")).toBe(`${JSON.stringify(devices, null, 2)}\n`);
  });

  it("fails on HTTP errors", async () => {
    await expect(fetchDeviceCatalog(DEVICE_API_URL, fakeFetch({}).fetch)).rejects.toThrow(
      "Device API request failed: 404 Not Found"
    );
  });
});
