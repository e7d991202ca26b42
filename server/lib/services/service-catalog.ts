// Remote service list
// Downloaded as-is into the router config directory; the dashboard store reads it back

import { readFile, writeFile } from "node:fs/promises";
import { z } from "zod";

const serviceEntrySchema = z
  .object({
    name: z.string().min(1),
    title: z.string().optional(),
    description: z.string().optional(),
    category: z.string().optional(),
    icon: z.string().optional(),
  })
  .passthrough();

// Either a bare array or wrapped in { services: [...] }
const catalogSchema = z.union([
  z.array(serviceEntrySchema),
  z.object({ services: z.array(serviceEntrySchema) }).passthrough(),
]);

export type ServiceEntry = z.infer<typeof serviceEntrySchema>;

export function parseServiceCatalog(raw: string): ServiceEntry[] {
  const parsed = catalogSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Invalid service list: ${parsed.error.issues[0]?.message ?? "unknown shape"}`);
  }
  return Array.isArray(parsed.data) ? parsed.data : parsed.data.services;
}

export class ServiceCatalog {
  constructor(
    private readonly url: string,
    private readonly file: string,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  /**
   * Download, validate and store the list. Returns the number of services.
   */
  async update(): Promise<number> {
    const res = await this.fetchImpl(this.url);
    if (!res.ok) {
      throw new Error(`Service list download failed: ${res.status} ${res.statusText}`);
    }

    const raw = await res.text();
    const services = parseServiceCatalog(raw);
    await writeFile(this.file, raw);

    console.log(`[services] Stored ${services.length} services in ${this.file}`);
    return services.length;
  }

  async read(): Promise<ServiceEntry[]> {
    let raw: string;
    try {
      raw = await readFile(this.file, "utf8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
      throw err;
    }
    return parseServiceCatalog(raw);
  }
}
