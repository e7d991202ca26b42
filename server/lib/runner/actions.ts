// Locally handled runner actions
// Anything not listed here is delegated to the service runner

import { BackupCommands } from "../openwrt/commands/backup";
import { luciWanCommands } from "../openwrt/commands/firewall";
import {
  DNS_PROVIDERS,
  type DnsProvider,
  NetworkCommands,
  dnsServerCommands,
  isIPv4,
} from "../openwrt/commands/network";
import {
  PackageCommands,
  isValidPackageName,
  parseInstalledPackages,
  splitPackageList,
} from "../openwrt/commands/packages";
import { SystemCommands, parseSystemRelease } from "../openwrt/commands/system";
import { isWifiBand, wifiConfigCommands } from "../openwrt/commands/wireless";
import {
  type ActionContext,
  ActionInputError,
  capture,
  downloadScript,
  runLogged,
  runSequence,
  sleep,
} from "./action-context";

export type ActionCategory =
  | "proxy"
  | "dns"
  | "network"
  | "wireless"
  | "packages"
  | "optimization"
  | "system";

// Named inputs the dashboard sends; mapped onto positional arguments in this order
export type ActionParam = "dns1" | "dns2" | "packages" | "ssid" | "key" | "band" | "ipaddr";

export interface ActionDefinition {
  name: string;
  title: string;
  category: ActionCategory;
  /** Shown before running; set for destructive or exposing actions */
  confirm?: string;
  params: readonly ActionParam[];
  run: (ctx: ActionContext, args: readonly string[]) => Promise<number>;
}

export const UNINSTALL_PACKAGES = [
  "luci-app-passwall",
  "luci-app-passwall2",
  "luci-app-torplus",
  "luci-app-sshplus",
  "luci-app-aircast",
  "luci-app-dns-changer",
] as const;

export const BBR_PACKAGE = "kmod-tcp-bbr";

interface ScriptInstall {
  intro: string;
  url: (ctx: ActionContext) => string;
  fileName: string;
  done: string;
}

async function installFromScript(ctx: ActionContext, install: ScriptInstall): Promise<number> {
  await ctx.log.append(install.intro);
  const script = await downloadScript(ctx, install.url(ctx), install.fileName);
  const code = await runLogged(ctx, SystemCommands.runScript(script));
  if (code !== 0) {
    await ctx.log.append(`ERROR: ${install.fileName} exited with code ${code}.`);
    return code;
  }
  await ctx.log.append(install.done);
  return 0;
}

async function setDns(ctx: ActionContext, title: string, servers: readonly string[]): Promise<number> {
  await ctx.log.append(`Setting DNS to ${title}...`);
  const code = await runSequence(ctx, dnsServerCommands(servers));
  if (code === 0) {
    await ctx.log.append("DNS servers updated successfully.");
  }
  return code;
}

function presetDns(provider: DnsProvider): ActionDefinition {
  const preset = DNS_PROVIDERS[provider];
  return {
    name: `set_dns_${provider}`,
    title: preset.title,
    category: "dns",
    params: [],
    run: (ctx) => setDns(ctx, provider, preset.servers),
  };
}

async function installPackages(ctx: ActionContext, selection: string): Promise<number> {
  await ctx.log.append("Installing selected packages...");
  const packages = splitPackageList(selection);

  if (packages.length === 0) {
    await ctx.log.append("No packages selected to install.");
    return 0;
  }

  const invalid = packages.filter((name) => !isValidPackageName(name));
  if (invalid.length > 0) {
    throw new ActionInputError(`Invalid package name(s): ${invalid.join(", ")}`);
  }

  await ctx.log.append("Updating package lists...");
  await runLogged(ctx, PackageCommands.update);

  // A failed package is reported and skipped; the action itself still succeeds
  for (const name of packages) {
    await ctx.log.append(`Installing ${name}...`);
    const code = await runLogged(ctx, PackageCommands.install(name));
    if (code === 0) {
      await ctx.log.append(`${name} installed successfully.`);
    } else {
      await ctx.log.append(`Failed to install ${name}.`);
    }
  }

  return 0;
}

const SYSTEM_INFO_PROBES: ReadonlyArray<{ label: string; command: string }> = [
  { label: "Hostname", command: SystemCommands.getHostname },
  { label: "OpenWrt Version", command: SystemCommands.getSystemInfo },
  { label: "Kernel Version", command: SystemCommands.getKernelVersion },
  { label: "CPU Info", command: SystemCommands.getCpuModel },
  { label: "Memory", command: SystemCommands.getMemoryTotal },
  { label: "Disk Usage", command: SystemCommands.getRootUsage },
];

const ACTIONS: ActionDefinition[] = [
  // --- Maintenance of the console itself ---
  {
    name: "update_service_list",
    title: "Update Service List",
    category: "system",
    params: [],
    run: async (ctx) => {
      await ctx.log.append("Updating service list from remote source...");
      try {
        await ctx.services.update();
      } catch (err) {
        console.error("[runner] Service list update failed:", err instanceof Error ? err.message : err);
        await ctx.log.append("ERROR: Failed to download the service list.");
        return 1;
      }
      await ctx.log.append("Service list downloaded successfully.");
      return 0;
    },
  },
  {
    name: "refresh_luci",
    title: "Clear LuCI Cache",
    category: "system",
    params: [],
    run: async (ctx) => {
      await ctx.log.append("Clearing LuCI cache...");
      const code = await runLogged(ctx, SystemCommands.removeFile(ctx.config.luciIndexCache));
      if (code === 0) {
        await ctx.log.append("LuCI cache cleared. Please reload the web page.");
      }
      return code;
    },
  },

  // --- Proxy tooling ---
  {
    name: "install_pw1",
    title: "Install Passwall 1",
    category: "proxy",
    params: [],
    run: (ctx) =>
      installFromScript(ctx, {
        intro: "Downloading Passwall 1 components...",
        url: (c) => c.config.scripts.passwall1,
        fileName: "passwall.sh",
        done: "Passwall 1 installed successfully.",
      }),
  },
  {
    name: "install_pw2",
    title: "Install Passwall 2",
    category: "proxy",
    params: [],
    run: (ctx) =>
      installFromScript(ctx, {
        intro: "Downloading Passwall 2 components...",
        url: (c) => c.config.scripts.passwall2,
        fileName: "passwall2.sh",
        done: "Passwall 2 installed successfully.",
      }),
  },
  {
    name: "install_both",
    title: "Install Passwall 1 + 2",
    category: "proxy",
    params: [],
    run: (ctx) =>
      installFromScript(ctx, {
        intro: "Downloading Passwall 1 & 2 components...",
        url: (c) => c.config.scripts.passwallBoth,
        fileName: "passwalldue.sh",
        done: "Both Passwall versions installed successfully.",
      }),
  },
  {
    name: "easy_exroot",
    title: "Easy Exroot",
    category: "system",
    params: [],
    run: (ctx) =>
      installFromScript(ctx, {
        intro: "Downloading Easy Exroot script...",
        url: (c) => c.config.scripts.exroot,
        fileName: "ezexroot.sh",
        done: "Easy Exroot script finished.",
      }),
  },
  {
    name: "uninstall_all",
    title: "Uninstall All Tools",
    category: "proxy",
    confirm: "This will remove all related packages. Are you sure?",
    params: [],
    run: async (ctx) => {
      await ctx.log.append("Uninstalling all related packages...");
      const code = await runLogged(ctx, PackageCommands.remove(UNINSTALL_PACKAGES));
      await ctx.log.append("Uninstallation complete.");
      return code;
    },
  },

  // --- DNS ---
  presetDns("shecan"),
  presetDns("electro"),
  presetDns("cloudflare"),
  presetDns("google"),
  presetDns("begzar"),
  presetDns("radar"),
  {
    name: "set_dns_custom",
    title: "Custom DNS",
    category: "dns",
    params: ["dns1", "dns2"],
    run: async (ctx, [dns1 = "", dns2 = ""]) => {
      const servers = [dns1.trim(), dns2.trim()].filter((s) => s.length > 0);
      if (servers.length === 0) {
        throw new ActionInputError("At least one DNS server is required.");
      }
      const invalid = servers.filter((s) => !isIPv4(s));
      if (invalid.length > 0) {
        throw new ActionInputError(`Invalid DNS server address: ${invalid.join(", ")}`);
      }
      return setDns(ctx, "custom", servers);
    },
  },

  // --- Wireless and LAN ---
  {
    name: "set_wifi_config",
    title: "Apply WiFi Settings",
    category: "wireless",
    params: ["ssid", "key", "band"],
    run: async (ctx, [ssid = "", key = "", band = ""]) => {
      if (!ssid.trim()) throw new ActionInputError("WiFi SSID is required.");
      if (key.length < 8 || key.length > 63) {
        throw new ActionInputError("WiFi password must be 8 to 63 characters.");
      }
      if (!isWifiBand(band)) {
        throw new ActionInputError(`Invalid WiFi band '${band}'. Use 2G, 5G or Both.`);
      }

      await ctx.log.append(`Configuring WiFi (SSID: ${ssid}, Band: ${band})...`);
      const code = await runSequence(ctx, wifiConfigCommands(ssid, key, band));
      if (code === 0) {
        await ctx.log.append("WiFi settings applied.");
      }
      return code;
    },
  },
  {
    name: "set_lan_ip",
    title: "Set LAN IP Address",
    category: "network",
    params: ["ipaddr"],
    run: async (ctx, [ipaddr = ""]) => {
      const address = ipaddr.replace(/\s/g, "");
      if (!isIPv4(address)) {
        throw new ActionInputError(`Invalid LAN IP address '${ipaddr}'.`);
      }

      await ctx.log.append(`Setting LAN IP to ${address}...`);
      const code = await runSequence(ctx, [
        NetworkCommands.setIpAddr("lan", address),
        NetworkCommands.commitNetwork,
      ]);
      if (code === 0) {
        await ctx.log.append(
          "LAN IP will be changed after the next network restart or system reboot."
        );
      }
      return code;
    },
  },
  {
    name: "enable_luci_wan",
    title: "Enable LuCI on WAN",
    category: "network",
    confirm: "SECURITY WARNING: This will expose your router's web interface to the Internet! Continue?",
    params: [],
    run: async (ctx) => {
      await ctx.log.append("Enabling LuCI on WAN...");
      const code = await runSequence(ctx, luciWanCommands());
      if (code === 0) {
        await ctx.log.append("LuCI is now accessible from WAN.");
      }
      return code;
    },
  },

  // --- Packages ---
  {
    name: "opkg_update",
    title: "Update Package Lists",
    category: "packages",
    params: [],
    run: (ctx) => runLogged(ctx, PackageCommands.update),
  },
  {
    name: "install_opt_packages",
    title: "Install Opt Packages",
    category: "packages",
    params: ["packages"],
    run: (ctx, [packages = ""]) => installPackages(ctx, packages),
  },
  {
    name: "install_extra_packages",
    title: "Install Selected Packages",
    category: "packages",
    params: ["packages"],
    run: (ctx, [packages = ""]) => installPackages(ctx, packages),
  },

  // --- Optimizations ---
  {
    name: "apply_cpu_opts",
    title: "Apply CPU Opts",
    category: "optimization",
    params: [],
    run: async (ctx) => {
      await ctx.log.append("Applying CPU optimizations...");
      const code = await runLogged(ctx, SystemCommands.setCpuGovernor("performance"));
      if (code === 0) await ctx.log.append("CPU optimizations applied.");
      return code;
    },
  },
  {
    name: "apply_mem_opts",
    title: "Apply Memory Opts",
    category: "optimization",
    params: [],
    run: async (ctx) => {
      await ctx.log.append("Applying Memory optimizations...");
      const code = await runSequence(ctx, [
        SystemCommands.setSysctl("vm.swappiness", 10),
        SystemCommands.setSysctl("vm.vfs_cache_pressure", 50),
      ]);
      if (code === 0) await ctx.log.append("Memory optimizations applied.");
      return code;
    },
  },
  {
    name: "apply_net_opts",
    title: "Apply Network Opts",
    category: "optimization",
    params: [],
    run: async (ctx) => {
      await ctx.log.append("Applying Network optimizations...");

      const installed = await capture(ctx, PackageCommands.listInstalled);
      const hasBbr = parseInstalledPackages(installed.stdout).some((p) => p.name === BBR_PACKAGE);
      if (!hasBbr) {
        await ctx.log.append(`Installing ${BBR_PACKAGE} for congestion control...`);
        const code = await runSequence(ctx, [PackageCommands.update, PackageCommands.install(BBR_PACKAGE)]);
        if (code !== 0) return code;
      }

      const code = await runSequence(ctx, [
        SystemCommands.setSysctl("net.ipv4.tcp_fastopen", 3),
        SystemCommands.setSysctl("net.ipv4.tcp_congestion_control", "bbr"),
      ]);
      if (code === 0) await ctx.log.append("Network optimizations applied.");
      return code;
    },
  },
  {
    name: "apply_usb_opts",
    title: "Apply USB Opts",
    category: "optimization",
    params: [],
    run: async (ctx) => {
      await ctx.log.append("Applying USB optimizations...");
      await ctx.log.append("No USB tuning is defined for this device; nothing changed.");
      return 0;
    },
  },

  // --- System ---
  {
    name: "get_system_info",
    title: "Get System Info",
    category: "system",
    params: [],
    run: async (ctx) => {
      await ctx.log.append("Fetching system information...");
      for (const probe of SYSTEM_INFO_PROBES) {
        const result = await capture(ctx, probe.command);
        let value = result.stdout.trim();
        if (probe.command === SystemCommands.getSystemInfo) {
          const release = parseSystemRelease(result.stdout);
          value = release.DISTRIB_DESCRIPTION || release.DISTRIB_RELEASE || value;
        }
        await ctx.log.append(`${probe.label}: ${value}`);
      }
      await ctx.log.append("System information fetched.");
      return 0;
    },
  },
  {
    name: "expand_root",
    title: "Expand Root Partition",
    category: "system",
    confirm: "CRITICAL WARNING: This will WIPE ALL DATA on your storage device! Are you absolutely sure?",
    params: [],
    run: async (ctx) => {
      await ctx.log.append("---");
      await ctx.log.append("CRITICAL WARNING: Expanding root partition... THIS WILL WIPE ALL DATA!");
      await ctx.log.append("---");
      await ctx.log.append("Downloading and preparing the expansion script...");
      const script = await downloadScript(ctx, ctx.config.scripts.expand, "expand.sh");
      await ctx.log.append("--- ACTION REQUIRED ---");
      await ctx.log.append("The expansion script is about to run. The system will reboot automatically.");
      await ctx.log.append("After reboot, the process will continue. Please be patient.");
      const code = await runLogged(ctx, SystemCommands.runScript(script));
      await ctx.log.append("Expansion script initiated. System should be rebooting now.");
      return code;
    },
  },
  {
    name: "restore_opt_backup",
    title: "Restore Config Backup",
    category: "system",
    confirm: "Restore the newest configuration backup? Current settings will be replaced.",
    params: [],
    run: async (ctx) => {
      await ctx.log.append("Restoring config backup...");
      const latest = (await capture(ctx, BackupCommands.getLatestBackup(ctx.config.backupGlob))).stdout.trim();
      if (!latest) {
        await ctx.log.append(`ERROR: No backup found matching ${ctx.config.backupGlob}.`);
        return 1;
      }
      await ctx.log.append(`Restoring from ${latest}...`);
      const code = await runLogged(ctx, BackupCommands.restoreBackup(latest));
      if (code === 0) await ctx.log.append("Backup restored. Reboot to apply all settings.");
      return code;
    },
  },
  {
    name: "reboot_system",
    title: "Reboot System",
    category: "system",
    confirm: "Reboot the system now?",
    params: [],
    run: async (ctx) => {
      await ctx.log.append("Rebooting system in 5 seconds...");
      await sleep(5000, ctx.signal);
      return runLogged(ctx, SystemCommands.reboot);
    },
  },
];

export type ActionRegistry = ReadonlyMap<string, ActionDefinition>;

export function createActionRegistry(
  definitions: readonly ActionDefinition[] = ACTIONS
): ActionRegistry {
  return new Map(definitions.map((def) => [def.name, def]));
}

/**
 * Map named dashboard inputs onto the action's positional arguments
 */
export function argsFromParams(
  definition: ActionDefinition | undefined,
  params: Partial<Record<ActionParam, string>>
): string[] {
  if (!definition) return [];
  return definition.params.map((name) => params[name] ?? "");
}
