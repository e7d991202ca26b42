// Firmware build pipeline
// Download ImageBuilder, add feeds and custom packages, build, rename, upload

import { appendFile, copyFile, mkdir, readFile, readdir, rename, writeFile } from "node:fs/promises";
import { basename, join } from "node:path";
import { z } from "zod";
import { type Executor, quote } from "../exec";
import { type BuildPlan, customFeedLines, makeImageCommand, renameOutputFile } from "./build-plan";

export interface UploadTarget {
  user: string;
  host: string;
  remoteDir: string;
  sshKey?: string;
}

export interface FirmwareBuildOptions {
  exec: Executor;
  fetch?: typeof fetch;
  upload?: UploadTarget;
  timeout?: number;
}

export interface FirmwareBuildResult {
  arch: string;
  outputDir: string;
  files: string[];
}

const releaseSchema = z.object({
  tag_name: z.string().optional(),
  assets: z.array(z.object({ name: z.string(), browser_download_url: z.string() })).default([]),
});

/**
 * Package architecture from ImageBuilder's .targetinfo
 */
export function parseTargetArch(targetInfo: string): string | null {
  const match = targetInfo.match(/^Target-Arch-Packages:\s*(\S+)/m);
  return match ? match[1] : null;
}

/**
 * Prefer the build for this architecture, then an arch-independent one, then any .ipk
 */
export function pickIpkAsset<T extends { name: string }>(assets: readonly T[], arch: string): T | null {
  const ipks = assets.filter((a) => a.name.endsWith(".ipk"));
  return (
    ipks.find((a) => a.name.endsWith(`_${arch}.ipk`)) ??
    ipks.find((a) => a.name.endsWith("_all.ipk")) ??
    ipks[0] ??
    null
  );
}

export function rsyncCommand(source: string, target: UploadTarget): string {
  const ssh = target.sshKey ? `ssh -i ${quote(target.sshKey)}` : "ssh";
  return [
    "rsync -avz",
    `-e ${quote(ssh)}`,
    quote(source.endsWith("/") ? source : `${source}/`),
    quote(`${target.user}@${target.host}:${target.remoteDir}`),
  ].join(" ");
}

export class FirmwareBuild {
  private readonly exec: Executor;
  private readonly fetchImpl: typeof fetch;
  private readonly timeout: number;

  constructor(
    private readonly plan: BuildPlan,
    private readonly options: FirmwareBuildOptions
  ) {
    this.exec = options.exec;
    this.fetchImpl = options.fetch ?? fetch;
    this.timeout = options.timeout ?? 60 * 60 * 1000;
  }

  async run(): Promise<FirmwareBuildResult> {
    await this.downloadImageBuilder();
    await this.installCustomKey();
    const arch = await this.detectArch();
    await this.addCustomFeeds(arch);
    await this.downloadCustomPackages(arch);
    await this.buildImage();
    const files = await this.renameOutputs();
    if (this.options.upload) {
      await this.uploadOutputs(this.options.upload);
    }
    return { arch, outputDir: this.plan.outputDir, files };
  }

  private async sh(command: string, cwd = this.plan.inputs.workspace): Promise<void> {
    const result = await this.exec.run(command, {
      cwd,
      timeout: this.timeout,
      onLine: (line) => console.log(`[firmware] ${line}`),
    });
    if (result.code !== 0) {
      throw new Error(`'${command}' exited with code ${result.code}`);
    }
  }

  private async downloadImageBuilder(): Promise<void> {
    console.log(`[firmware] Downloading from: ${this.plan.imageBuilderUrl}`);
    await this.sh(`wget -q ${quote(this.plan.imageBuilderUrl)}`);
    await this.sh(`tar -xf ${quote(this.plan.imageBuilderFile)}`);
  }

  private async installCustomKey(): Promise<void> {
    const keyFile = this.plan.inputs.customKeyFile;
    if (!keyFile) return;

    const keyDir = join(this.plan.imageBuilderDir, "etc", "opkg", "keys");
    await mkdir(keyDir, { recursive: true });
    await copyFile(keyFile, join(keyDir, basename(keyFile)));
    console.log("[firmware] Custom repository key added.");
  }

  private async detectArch(): Promise<string> {
    const targetInfo = await readFile(join(this.plan.imageBuilderDir, ".targetinfo"), "utf8");
    const arch = parseTargetArch(targetInfo);
    if (!arch) {
      throw new Error("Could not determine the target architecture from .targetinfo");
    }
    console.log(`[firmware] Detected architecture: ${arch}`);
    return arch;
  }

  private async addCustomFeeds(arch: string): Promise<void> {
    if (this.plan.feeds.length === 0) return;

    const confDir = join(this.plan.imageBuilderDir, "etc", "opkg");
    await mkdir(confDir, { recursive: true });
    const lines = customFeedLines(this.plan.feedBaseUrl, this.plan.inputs.version, arch, this.plan.feeds);
    await appendFile(join(confDir, "customfeeds.conf"), lines.map((l) => `${l}\n`).join(""));
    console.log(`[firmware] Added ${lines.length} custom feeds.`);
  }

  private async downloadCustomPackages(arch: string): Promise<void> {
    const repos = this.plan.inputs.ipkRepos ?? [];
    if (repos.length === 0) return;

    const pkgDir = join(this.plan.imageBuilderDir, "packages");
    await mkdir(pkgDir, { recursive: true });

    for (const repo of repos) {
      const res = await this.fetchImpl(`https://api.github.com/repos/${repo}/releases/latest`, {
        headers: { Accept: "application/vnd.github+json" },
      });
      if (!res.ok) {
        console.log(`[firmware] Warning: Could not find latest release for ${repo} (${res.status})`);
        continue;
      }

      const release = releaseSchema.safeParse(await res.json());
      const asset = release.success ? pickIpkAsset(release.data.assets, arch) : null;
      if (!asset) {
        console.log(`[firmware] Warning: No .ipk asset in the latest release of ${repo}`);
        continue;
      }

      console.log(`[firmware] Downloading ${repo} from ${asset.browser_download_url}`);
      const download = await this.fetchImpl(asset.browser_download_url);
      if (!download.ok) {
        throw new Error(`Download of ${asset.browser_download_url} failed: ${download.status}`);
      }
      await writeFile(join(pkgDir, asset.name), Buffer.from(await download.arrayBuffer()));
    }
  }

  private async buildImage(): Promise<void> {
    console.log(`[firmware] Building with Profile: ${this.plan.inputs.profile}`);
    console.log(`[firmware] Final Packages: ${this.plan.packages.join(" ")}`);
    await this.sh(makeImageCommand(this.plan), this.plan.imageBuilderDir);
  }

  private async renameOutputs(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.plan.outputDir);
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") entries = [];
      else throw err;
    }
    if (entries.length === 0) {
      throw new Error("Build failed: No files found in output directory.");
    }

    const files: string[] = [];
    for (const name of entries.sort()) {
      const renamed = renameOutputFile(name, this.plan.outputPrefix);
      if (renamed !== name) {
        await rename(join(this.plan.outputDir, name), join(this.plan.outputDir, renamed));
      }
      files.push(renamed);
    }
    console.log(`[firmware] Output files: ${files.join(", ")}`);
    return files;
  }

  private async uploadOutputs(target: UploadTarget): Promise<void> {
    console.log(`[firmware] Uploading files to ${target.host}:${target.remoteDir}`);
    await this.sh(rsyncCommand(this.plan.outputDir, target));
    console.log("[firmware] Upload complete.");
  }
}
