// Firmware image build plan
// Everything the ImageBuilder run needs, derived up front from the build inputs

import { join } from "node:path";
import { quote } from "../exec";
import { isValidPackageName, splitPackageList } from "../openwrt/commands/packages";

export interface FirmwareBuildInputs {
  /** e.g. "x86/64" */
  target: string;
  /** e.g. "generic" */
  profile: string;
  /** e.g. "23.05.3" */
  version: string;
  theme: string;
  extraPackages?: string;
  /** Directory holding files/ and receiving output/ */
  workspace: string;
  outputPrefix?: string;
  feedBaseUrl?: string;
  feeds?: readonly string[];
  customKeyFile?: string;
  /** GitHub "owner/repo" names whose latest release ships an .ipk */
  ipkRepos?: readonly string[];
}

export interface BuildPlan {
  inputs: FirmwareBuildInputs;
  imageBuilderFile: string;
  imageBuilderUrl: string;
  imageBuilderDir: string;
  packages: string[];
  filesDir: string;
  outputDir: string;
  outputPrefix: string;
  feedBaseUrl: string;
  feeds: readonly string[];
}

export const BASE_PACKAGES = [
  "luci",
  "luci-ssl",
  "luci-compat",
  "curl",
  "screen",
  "sshpass",
  "procps-ng-pkill",
  "luci-app-ttyd",
  "coreutils",
  "coreutils-base64",
  "coreutils-nohup",
] as const;

export const DEFAULT_FEED_BASE_URL = "https://repo.peditxdl.ir/passwall-packages";
export const DEFAULT_FEEDS = ["passwall_luci", "passwall_packages", "passwall2"] as const;
export const DEFAULT_OUTPUT_PREFIX = "RouterOS";

const TARGET = /^[a-z0-9_-]+\/[a-z0-9_-]+$/;
const VERSION = /^\d+\.\d+(\.\d+)?(-rc\d+)?$/;
const PROFILE = /^[a-zA-Z0-9_.,-]+$/;

export function imageBuilderFileName(version: string, target: string): string {
  return `openwrt-imagebuilder-${version}-${target.replace(/\//g, "-")}.Linux-x86_64.tar.xz`;
}

export function imageBuilderUrl(version: string, target: string): string {
  return `https://downloads.openwrt.org/releases/${version}/targets/${target}/${imageBuilderFileName(version, target)}`;
}

/**
 * "23.05.3" -> "23.05"
 */
export function releaseMajor(version: string): string {
  return version.split(".").slice(0, 2).join(".");
}

export function customFeedLines(
  feedBaseUrl: string,
  version: string,
  arch: string,
  feeds: readonly string[]
): string[] {
  const major = releaseMajor(version);
  return feeds.map((feed) => `src/gz ${feed} ${feedBaseUrl}/releases/packages-${major}/${arch}/${feed}`);
}

/**
 * Base set, the default theme swapped for the chosen one, then extras
 */
export function firmwarePackages(theme: string, extraPackages = ""): string[] {
  return [
    ...BASE_PACKAGES,
    "-luci-theme-bootstrap",
    theme,
    "luci-app-themeswitch",
    ...splitPackageList(extraPackages),
  ];
}

export function renameOutputFile(fileName: string, prefix: string): string {
  return fileName.startsWith("openwrt-") ? `${prefix}-${fileName.slice("openwrt-".length)}` : fileName;
}

export function createBuildPlan(inputs: FirmwareBuildInputs): BuildPlan {
  if (!TARGET.test(inputs.target)) throw new Error(`Invalid device target '${inputs.target}'`);
  if (!PROFILE.test(inputs.profile)) throw new Error(`Invalid device profile '${inputs.profile}'`);
  if (!VERSION.test(inputs.version)) throw new Error(`Invalid OpenWrt version '${inputs.version}'`);

  const packages = firmwarePackages(inputs.theme, inputs.extraPackages);
  const invalid = packages.filter((p) => !isValidPackageName(p.replace(/^-/, "")));
  if (invalid.length > 0) {
    throw new Error(`Invalid package name(s): ${invalid.join(", ")}`);
  }

  const imageBuilderFile = imageBuilderFileName(inputs.version, inputs.target);

  return {
    inputs,
    imageBuilderFile,
    imageBuilderUrl: imageBuilderUrl(inputs.version, inputs.target),
    imageBuilderDir: join(inputs.workspace, imageBuilderFile.replace(/\.tar\.xz$/, "")),
    packages,
    filesDir: join(inputs.workspace, "files"),
    outputDir: join(inputs.workspace, "output"),
    outputPrefix: inputs.outputPrefix ?? DEFAULT_OUTPUT_PREFIX,
    feedBaseUrl: inputs.feedBaseUrl ?? DEFAULT_FEED_BASE_URL,
    feeds: inputs.feeds ?? DEFAULT_FEEDS,
  };
}

export function makeImageCommand(plan: BuildPlan): string {
  return [
    "make image",
    `PROFILE=${quote(plan.inputs.profile)}`,
    `PACKAGES=${quote(plan.packages.join(" "))}`,
    `FILES=${quote(plan.filesDir)}`,
    `BIN_DIR=${quote(plan.outputDir)}`,
  ].join(" ");
}
