// OpenWRT Package Management Commands
// Commands for the opkg package manager

import { quote } from "../../exec";

export const PackageCommands = {
  // Update Package Lists
  update: `opkg update`,

  // List Packages
  listInstalled: `opkg list-installed`,

  // Install/Remove
  install: (pkg: string) => `opkg install ${quote(pkg)}`,
  remove: (pkgs: readonly string[]) => `opkg remove ${pkgs.map(quote).join(" ")}`,
};

// opkg package names: lowercase letters, digits and . _ + -
const PACKAGE_NAME = /^[a-zA-Z0-9][a-zA-Z0-9._+-]*$/;

export function isValidPackageName(name: string): boolean {
  return PACKAGE_NAME.test(name);
}

/**
 * Split a space separated package selection into names
 */
export function splitPackageList(input: string): string[] {
  return input.split(/\s+/).filter((name) => name.length > 0);
}

/**
 * Parse installed packages list
 */
export function parseInstalledPackages(output: string): Array<{
  name: string;
  version: string;
}> {
  const packages: Array<{
    name: string;
    version: string;
  }> = [];

  for (const line of output.split("\n")) {
    const match = line.match(/^(\S+)\s+-\s+(\S+)/);
    if (match) {
      packages.push({
        name: match[1],
        version: match[2],
      });
    }
  }

  return packages;
}
