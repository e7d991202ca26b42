import { mkdir, readFile, readdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { beforeEach, describe, expect, it } from "vitest";
import { FakeExecutor, fakeFetch, tempDir } from "../../testing/fakes";
import { FirmwareBuild, parseTargetArch, pickIpkAsset, rsyncCommand } from "./build-pipeline";
import { type BuildPlan, createBuildPlan, makeImageCommand } from "./build-plan";

const RELEASE_URL = "https://api.github.com/repos/example/luci-app-demo/releases/latest";
const ASSET_URL = "https://github.com/example/luci-app-demo/releases/download/v1/luci-app-demo_1.0_x86_64.ipk";

describe("parseTargetArch", () => {
  it("reads the package architecture", () => {
    expect(parseTargetArch("Target: x86\nTarget-Arch-Packages: x86_64\nTarget-Board: x86\n")).toBe("x86_64");
  });

  it("returns null when absent", () => {
    expect(parseTargetArch("Target: x86\n")).toBeNull();
  });
});

describe("pickIpkAsset", () => {
  const assets = [
    { name: "README.md" },
    { name: "demo_1.0_all.ipk" },
    { name: "demo_1.0_mipsel_24kc.ipk" },
    { name: "demo_1.0_x86_64.ipk" },
  ];

  it("prefers the matching architecture", () => {
    expect(pickIpkAsset(assets, "x86_64")?.name).toBe("demo_1.0_x86_64.ipk");
  });

  it("falls back to an arch-independent package", () => {
    expect(pickIpkAsset(assets, "aarch64_cortex-a53")?.name).toBe("demo_1.0_all.ipk");
  });

  it("returns null without packages", () => {
    expect(pickIpkAsset([{ name: "source.tar.gz" }], "x86_64")).toBeNull();
  });
});

describe("rsyncCommand", () => {
  it("uploads the directory contents", () => {
    expect(rsyncCommand("/ws/output", { user: "deploy", host: "files.example.com", remoteDir: "/srv/fw" })).toBe(
      "rsync -avz -e 'ssh' '/ws/output/' 'deploy@files.example.com:/srv/fw'"
    );
  });
});

describe("FirmwareBuild", () => {
  let workspace: string;
  let plan: BuildPlan;

  beforeEach(async () => {
    workspace = await tempDir("firmware-");
    plan = createBuildPlan({
      target: "x86/64",
      profile: "generic",
      version: "23.05.3",
      theme: "luci-theme-argon",
      workspace,
      feedBaseUrl: "https://feeds.example.com",
      feeds: ["extra"],
      ipkRepos: ["example/luci-app-demo"],
    });
  });

  function imageBuilder(outputs: string[]) {
    return new FakeExecutor(async (command) => {
      if (command.startsWith("tar -xf")) {
        await mkdir(plan.imageBuilderDir, { recursive: true });
        await writeFile(join(plan.imageBuilderDir, ".targetinfo"), "Target-Arch-Packages: x86_64\n");
      }
      if (command.startsWith("make image")) {
        await mkdir(plan.outputDir, { recursive: true });
        for (const name of outputs) await writeFile(join(plan.outputDir, name), "");
      }
      return {};
    });
  }

  const github = () =>
    fakeFetch({
      [RELEASE_URL]: JSON.stringify({
        tag_name: "v1",
        assets: [{ name: "luci-app-demo_1.0_x86_64.ipk", browser_download_url: ASSET_URL }],
      }),
      [ASSET_URL]: "ipk-bytes",
    });

  it("downloads, configures, builds and renames", async () => {
    const exec = imageBuilder(["openwrt-23.05.3-x86-64-generic-squashfs-combined.img.gz", "sha256sums"]);

    const result = await new FirmwareBuild(plan, { exec, fetch: github().fetch }).run();

    expect(exec.commands).toEqual([
      `wget -q '${plan.imageBuilderUrl}'`,
      `tar -xf '${plan.imageBuilderFile}'`,
      makeImageCommand(plan),
    ]);
    expect(result).toEqual({
      arch: "x86_64",
      outputDir: plan.outputDir,
      files: ["RouterOS-23.05.3-x86-64-generic-squashfs-combined.img.gz", "sha256sums"],
    });
    expect((await readdir(plan.outputDir)).sort()).toEqual(result.files);
    expect(await readFile(join(plan.imageBuilderDir, "etc/opkg/customfeeds.conf"), "utf8")).toBe(
      "src/gz extra https://feeds.example.com/releases/packages-23.05/x86_64/extra\n"
    );
    expect(await readFile(join(plan.imageBuilderDir, "packages/luci-app-demo_1.0_x86_64.ipk"), "utf8")).toBe(
      "ipk-bytes"
    );
  });

  it("installs a custom repository key", async () => {
    const keyFile = join(workspace, "repo.pub");
    await writeFile(keyFile, "untrusted comment: test key\n");
    const keyed = createBuildPlan({ ...plan.inputs, customKeyFile: keyFile });
    plan = keyed;

    await new FirmwareBuild(keyed, { exec: imageBuilder(["openwrt-x.bin"]), fetch: github().fetch }).run();

    expect(await readFile(join(keyed.imageBuilderDir, "etc/opkg/keys/repo.pub"), "utf8")).toBe(
      "untrusted comment: test key\n"
    );
  });

  it("skips packages whose release cannot be found", async () => {
    const exec = imageBuilder(["openwrt-x.bin"]);

    const result = await new FirmwareBuild(plan, { exec, fetch: fakeFetch({}).fetch }).run();

    expect(result.files).toEqual(["RouterOS-x.bin"]);
  });

  it("fails when the build produced nothing", async () => {
    const exec = imageBuilder([]);

    await expect(new FirmwareBuild(plan, { exec, fetch: github().fetch }).run()).rejects.toThrow(
      "Build failed: No files found in output directory."
    );
  });

  it("fails when a step exits non-zero", async () => {
    const exec = new FakeExecutor(() => ({ code: 8 }));

    await expect(new FirmwareBuild(plan, { exec, fetch: github().fetch }).run()).rejects.toThrow(
      `'wget -q '${plan.imageBuilderUrl}'' exited with code 8`
    );
    expect(exec.commands).toHaveLength(1);
  });

  it("uploads the output when a target is given", async () => {
    const exec = imageBuilder(["openwrt-x.bin"]);
    const upload = { user: "deploy", host: "files.example.com", remoteDir: "/srv/fw" };

    await new FirmwareBuild(plan, { exec, fetch: github().fetch, upload }).run();

    expect(exec.commands.at(-1)).toBe(rsyncCommand(plan.outputDir, upload));
  });
});
