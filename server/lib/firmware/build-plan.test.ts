import { describe, expect, it } from "vitest";
import {
  BASE_PACKAGES,
  createBuildPlan,
  customFeedLines,
  firmwarePackages,
  imageBuilderFileName,
  imageBuilderUrl,
  makeImageCommand,
  releaseMajor,
  renameOutputFile,
} from "./build-plan";

const inputs = {
  target: "x86/64",
  profile: "generic",
  version: "23.05.3",
  theme: "luci-theme-argon",
  extraPackages: "htop nano",
  workspace: "/ws",
};

describe("ImageBuilder location", () => {
  it("names the archive after version and target", () => {
    expect(imageBuilderFileName("23.05.3", "x86/64")).toBe(
      "openwrt-imagebuilder-23.05.3-x86-64.Linux-x86_64.tar.xz"
    );
  });

  it("points at the release download", () => {
    expect(imageBuilderUrl("23.05.3", "ramips/mt7621")).toBe(
      "https://downloads.openwrt.org/releases/23.05.3/targets/ramips/mt7621/openwrt-imagebuilder-23.05.3-ramips-mt7621.Linux-x86_64.tar.xz"
    );
  });
});

describe("custom feeds", () => {
  it("uses the release series and package architecture", () => {
    expect(releaseMajor("23.05.3")).toBe("23.05");
    expect(customFeedLines("https://feeds.example.com", "23.05.3", "x86_64", ["extra", "more"])).toEqual([
      "src/gz extra https://feeds.example.com/releases/packages-23.05/x86_64/extra",
      "src/gz more https://feeds.example.com/releases/packages-23.05/x86_64/more",
    ]);
  });
});

describe("firmwarePackages", () => {
  it("swaps the default theme and appends extras", () => {
    expect(firmwarePackages("luci-theme-argon", " htop  nano ")).toEqual([
      ...BASE_PACKAGES,
      "-luci-theme-bootstrap",
      "luci-theme-argon",
      "luci-app-themeswitch",
      "htop",
      "nano",
    ]);
  });
});

describe("renameOutputFile", () => {
  it("replaces the openwrt prefix", () => {
    expect(renameOutputFile("openwrt-23.05.3-x86-64-generic-squashfs-combined.img.gz", "RouterOS")).toBe(
      "RouterOS-23.05.3-x86-64-generic-squashfs-combined.img.gz"
    );
  });

  it("leaves other files alone", () => {
    expect(renameOutputFile("sha256sums", "RouterOS")).toBe("sha256sums");
  });
});

describe("createBuildPlan", () => {
  it("derives paths and defaults", () => {
    const plan = createBuildPlan(inputs);

    expect(plan.imageBuilderDir).toBe("/ws/openwrt-imagebuilder-23.05.3-x86-64.Linux-x86_64");
    expect(plan.filesDir).toBe("/ws/files");
    expect(plan.outputDir).toBe("/ws/output");
    expect(plan.outputPrefix).toBe("RouterOS");
    expect(plan.packages.slice(-2)).toEqual(["htop", "nano"]);
  });

  it("rejects malformed targets, profiles and versions", () => {
    expect(() => createBuildPlan({ ...inputs, target: "x86" })).toThrow("Invalid device target 'x86'");
    expect(() => createBuildPlan({ ...inputs, profile: "a b" })).toThrow("Invalid device profile 'a b'");
    expect(() => createBuildPlan({ ...inputs, version: "latest" })).toThrow("Invalid OpenWrt version 'latest'");
  });

  it("rejects bad package names", () => {
    expect(() => createBuildPlan({ ...inputs, extraPackages: "htop $(id)" })).toThrow(
      "Invalid package name(s): $(id)"
    );
  });

  it("builds the make invocation", () => {
    const plan = createBuildPlan({ ...inputs, extraPackages: "" });

    expect(makeImageCommand(plan)).toBe(
      `make image PROFILE='generic' PACKAGES='${plan.packages.join(" ")}' FILES='/ws/files' BIN_DIR='/ws/output'`
    );
  });
});
