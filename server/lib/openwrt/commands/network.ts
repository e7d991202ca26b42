// OpenWRT Network Commands
// UCI commands for WAN DNS servers and the LAN address

import { quote } from "../../exec";

export const NetworkCommands = {
  setPeerDns: (iface: string, enabled: boolean) =>
    `uci set network.${iface}.peerdns='${enabled ? 1 : 0}'`,
  clearDns: (iface: string) => `uci -q delete network.${iface}.dns || true`,
  addDns: (iface: string, server: string) =>
    `uci add_list network.${iface}.dns=${quote(server)}`,

  setIpAddr: (iface: string, ipaddr: string) =>
    `uci set network.${iface}.ipaddr=${quote(ipaddr)}`,

  // Commit and Restart
  commitNetwork: `uci commit network`,
  restartNetwork: `/etc/init.d/network restart`,
};

export type DnsProvider =
  | "shecan"
  | "electro"
  | "cloudflare"
  | "google"
  | "begzar"
  | "radar";

export const DNS_PROVIDERS: Record<DnsProvider, { title: string; servers: [string, string] }> = {
  shecan: { title: "Shecan", servers: ["178.22.122.100", "185.51.200.2"] },
  electro: { title: "Electro", servers: ["78.157.42.100", "78.157.42.101"] },
  cloudflare: { title: "Cloudflare", servers: ["1.1.1.1", "1.0.0.1"] },
  google: { title: "Google", servers: ["8.8.8.8", "8.8.4.4"] },
  begzar: { title: "Begzar", servers: ["185.55.226.26", "185.55.225.25"] },
  radar: { title: "Radar", servers: ["10.202.10.10", "10.202.10.11"] },
};

export function isIPv4(value: string): boolean {
  const parts = value.split(".");
  if (parts.length !== 4) return false;
  return parts.every((part) => /^\d{1,3}$/.test(part) && parseInt(part, 10) <= 255);
}

/**
 * Commands that replace the WAN DNS servers and restart networking
 */
export function dnsServerCommands(servers: readonly string[]): string[] {
  return [
    NetworkCommands.setPeerDns("wan", false),
    NetworkCommands.clearDns("wan"),
    ...servers.map((server) => NetworkCommands.addDns("wan", server)),
    NetworkCommands.commitNetwork,
    NetworkCommands.restartNetwork,
  ];
}
