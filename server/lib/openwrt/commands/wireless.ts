// OpenWRT Wireless Commands
// UCI commands for the default access point on each radio

import { quote } from "../../exec";

export const WirelessCommands = {
  setIfaceOption: (iface: string, option: string, value: string) =>
    `uci set wireless.${iface}.${option}=${quote(value)}`,

  enableRadio: (radio: string) => `uci set wireless.${radio}.disabled='0'`,
  disableRadio: (radio: string) => `uci set wireless.${radio}.disabled='1'`,

  // Commit and Reload
  commitWireless: `uci commit wireless`,
  reloadWifi: `wifi reload`,
};

export type WifiBand = "2G" | "5G" | "Both";

interface RadioTarget {
  band: "2G" | "5G";
  radio: string;
  iface: string;
}

// Stock OpenWrt numbers the 2.4GHz radio first
export const RADIOS: readonly RadioTarget[] = [
  { band: "2G", radio: "radio0", iface: "default_radio0" },
  { band: "5G", radio: "radio1", iface: "default_radio1" },
];

export function isWifiBand(value: string): value is WifiBand {
  return value === "2G" || value === "5G" || value === "Both";
}

/**
 * Set SSID and WPA2 key on the selected band(s), disable the other radio
 */
export function wifiConfigCommands(ssid: string, key: string, band: WifiBand): string[] {
  const cmds: string[] = [];

  for (const target of RADIOS) {
    if (band !== "Both" && band !== target.band) {
      cmds.push(WirelessCommands.disableRadio(target.radio));
      continue;
    }
    cmds.push(
      WirelessCommands.setIfaceOption(target.iface, "ssid", ssid),
      WirelessCommands.setIfaceOption(target.iface, "encryption", "psk2"),
      WirelessCommands.setIfaceOption(target.iface, "key", key),
      WirelessCommands.setIfaceOption(target.iface, "disabled", "0"),
      WirelessCommands.enableRadio(target.radio)
    );
  }

  cmds.push(WirelessCommands.commitWireless, WirelessCommands.reloadWifi);
  return cmds;
}
