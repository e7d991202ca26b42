// Device catalog for the firmware selector
// Reduces the OpenWrt device API to the devices that have a stable image

import { writeFile } from "node:fs/promises";
import { z } from "zod";

export const DEVICE_API_URL = "https://sysupgrade.openwrt.org/api/v1/devices";

const deviceSchema = z.object({
  title: z.string().optional(),
  target: z.string().optional(),
  images: z.array(z.object({ name: z.string().optional() }).passthrough()).optional(),
  supported_releases: z.object({ stable: z.string().optional() }).passthrough().optional(),
});

const apiSchema = z.object({
  devices: z.record(z.string(), deviceSchema).default({}),
});

export interface CatalogDevice {
  title: string;
  target: string;
  profile: string;
  version: string;
  arch: string;
}

export function processDevices(data: unknown): CatalogDevice[] {
  const parsed = apiSchema.safeParse(data);
  if (!parsed.success) {
    throw new Error(`Unexpected device API response: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }

  const devices: CatalogDevice[] = [];
  for (const [profile, details] of Object.entries(parsed.data.devices)) {
    if (!details.images || details.images.length === 0) continue;

    const version = details.supported_releases?.stable;
    if (!version) continue;

    const target = details.target ?? "";
    devices.push({
      title: details.title ?? "Unknown Device",
      target,
      profile,
      version,
      arch: target.split("/")[0],
    });
  }

  return devices.sort((a, b) => (a.title < b.title ? -1 : a.title > b.title ? 1 : 0));
}

export async function fetchDeviceCatalog(
  url = DEVICE_API_URL,
  fetchImpl: typeof fetch = fetch
): Promise<CatalogDevice[]> {
  console.log("[firmware] Fetching device list from OpenWrt API...");
  const res = await fetchImpl(url, { signal: AbortSignal.timeout(60000) });
  if (!res.ok) {
    throw new Error(`Device API request failed: ${res.status} ${res.statusText}`);
  }
  const devices = processDevices(await res.json());
  console.log(`[firmware] Processed ${devices.length} devices.`);
  return devices;
}

export async function writeDeviceCatalog(file: string, devices: readonly CatalogDevice[]): Promise<void> {
  await writeFile(file, `${JSON.stringify(devices, null, 2)}\n`);
  console.log(`[firmware] Device list saved to ${file}`);
}
