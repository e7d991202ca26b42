import { describe, expect, it } from "vitest";
import { BackupCommands } from "./backup";
import { luciWanCommands } from "./firewall";
import { DNS_PROVIDERS, dnsServerCommands, isIPv4 } from "./network";
import { isValidPackageName, parseInstalledPackages, splitPackageList } from "./packages";
import { SystemCommands, parseSystemRelease } from "./system";
import { isWifiBand, wifiConfigCommands } from "./wireless";

describe("network commands", () => {
  it("replaces WAN DNS servers", () => {
    expect(dnsServerCommands(["9.9.9.9"])).toEqual([
      "uci set network.wan.peerdns='0'",
      "uci -q delete network.wan.dns || true",
      "uci add_list network.wan.dns='9.9.9.9'",
      "uci commit network",
      "/etc/init.d/network restart",
    ]);
  });

  it("keeps two servers per provider", () => {
    for (const preset of Object.values(DNS_PROVIDERS)) {
      expect(preset.servers.every(isIPv4)).toBe(true);
    }
  });

  it.each([
    ["192.168.1.1", true],
    ["255.255.255.255", true],
    ["256.1.1.1", false],
    ["1.2.3", false],
    ["1.2.3.4.5", false],
    ["a.b.c.d", false],
    ["1.2.3.-4", false],
  ])("isIPv4(%s) is %s", (value, expected) => {
    expect(isIPv4(value)).toBe(expected);
  });
});

describe("package helpers", () => {
  it("splits a selection on any whitespace", () => {
    expect(splitPackageList("  htop\tnano\n curl ")).toEqual(["htop", "nano", "curl"]);
  });

  it("accepts opkg package names only", () => {
    expect(isValidPackageName("luci-app-ttyd")).toBe(true);
    expect(isValidPackageName("libstdcpp6")).toBe(true);
    expect(isValidPackageName("g++")).toBe(true);
    expect(isValidPackageName("-rf")).toBe(false);
    expect(isValidPackageName("a;b")).toBe(false);
    expect(isValidPackageName("$(reboot)")).toBe(false);
  });

  it("parses opkg list-installed output", () => {
    expect(parseInstalledPackages("curl - 8.5.0-1\nkmod-tcp-bbr - 5.15.150-1\n\n")).toEqual([
      { name: "curl", version: "8.5.0-1" },
      { name: "kmod-tcp-bbr", version: "5.15.150-1" },
    ]);
  });
});

describe("wireless commands", () => {
  it("configures the 2.4GHz radio only", () => {
    expect(wifiConfigCommands("Cafe", "it's-a-secret", "2G")).toEqual([
      "uci set wireless.default_radio0.ssid='Cafe'",
      "uci set wireless.default_radio0.encryption='psk2'",
      "uci set wireless.default_radio0.key='it'\\''s-a-secret'",
      "uci set wireless.default_radio0.disabled='0'",
      "uci set wireless.radio0.disabled='0'",
      "uci set wireless.radio1.disabled='1'",
      "uci commit wireless",
      "wifi reload",
    ]);
  });

  it("knows the band names", () => {
    expect(isWifiBand("Both")).toBe(true);
    expect(isWifiBand("both")).toBe(false);
  });
});

describe("system commands", () => {
  it("quotes script paths and arguments", () => {
    expect(SystemCommands.runScript("/tmp/service runner.sh", ["a b"])).toBe("sh '/tmp/service runner.sh' 'a b'");
  });

  it("builds sysctl writes", () => {
    expect(SystemCommands.setSysctl("vm.swappiness", 10)).toBe("sysctl -w vm.swappiness=10");
  });

  it("parses openwrt_release", () => {
    expect(
      parseSystemRelease("DISTRIB_ID='OpenWrt'\nDISTRIB_RELEASE='23.05.3'\nnot a pair\n")
    ).toEqual({ DISTRIB_ID: "OpenWrt", DISTRIB_RELEASE: "23.05.3" });
  });
});

describe("firewall and backup commands", () => {
  it("opens LuCI ports on the first two rules", () => {
    expect(luciWanCommands()).toEqual([
      "uci set firewall.@rule[0].dest_port='80'",
      "uci set firewall.@rule[1].dest_port='443'",
      "uci commit firewall",
      "/etc/init.d/firewall restart",
    ]);
  });

  it("finds and restores backups", () => {
    expect(BackupCommands.getLatestBackup("/tmp/backup-*.tar.gz")).toBe(
      "ls -1t /tmp/backup-*.tar.gz 2>/dev/null | head -1"
    );
    expect(BackupCommands.restoreBackup("/tmp/backup-1.tar.gz")).toBe("sysupgrade -r '/tmp/backup-1.tar.gz'");
  });
});
