// Form fields for action inputs, checked before a run is requested

import type { ActionParam } from "./api";

export type ParamValues = Partial<Record<ActionParam, string>>;

export interface ParamField {
  label: string;
  placeholder: string;
  type: "text" | "password" | "select";
  options?: readonly string[];
}

export const PARAM_FIELDS: Record<ActionParam, ParamField> = {
  dns1: { label: "Primary DNS", placeholder: "1.1.1.1", type: "text" },
  dns2: { label: "Secondary DNS", placeholder: "optional", type: "text" },
  packages: { label: "Packages", placeholder: "space-separated package names", type: "text" },
  ssid: { label: "WiFi name", placeholder: "MyNetwork", type: "text" },
  key: { label: "WiFi password", placeholder: "8 to 63 characters", type: "password" },
  band: { label: "Band", placeholder: "", type: "select", options: ["Both", "2G", "5G"] },
  ipaddr: { label: "LAN IP address", placeholder: "192.168.1.1", type: "text" },
};

const IPV4 = /^(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)(\.(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)){3}$/;

export function isIPv4(value: string): boolean {
  return IPV4.test(value);
}

/**
 * First problem with the entered values, or null when they can be sent
 */
export function validateParams(params: readonly ActionParam[], values: ParamValues): string | null {
  const value = (name: ActionParam) => (values[name] ?? "").trim();

  for (const name of params) {
    switch (name) {
      case "dns1":
        if (!isIPv4(value("dns1"))) return "Enter a valid primary DNS address.";
        break;
      case "dns2":
        if (value("dns2") && !isIPv4(value("dns2"))) return "Enter a valid secondary DNS address.";
        break;
      case "ssid":
        if (!value("ssid")) return "WiFi SSID is required.";
        break;
      case "key": {
        const length = (values.key ?? "").length;
        if (length < 8 || length > 63) return "WiFi password must be 8 to 63 characters.";
        break;
      }
      case "band":
        if (!["2G", "5G", "Both"].includes(value("band") || "Both")) return "Choose a WiFi band.";
        break;
      case "ipaddr":
        if (!isIPv4(value("ipaddr"))) return "Enter a valid LAN IP address.";
        break;
      case "packages":
        if (!value("packages")) return "Select at least one package.";
        break;
    }
  }
  return null;
}

/**
 * Only the inputs the action takes, trimmed. The WiFi key is sent as typed.
 */
export function paramsForRun(params: readonly ActionParam[], values: ParamValues): ParamValues {
  const result: ParamValues = {};
  for (const name of params) {
    const raw = values[name] ?? "";
    if (name === "band") {
      result.band = raw.trim() || "Both";
    } else {
      result[name] = name === "key" ? raw : raw.trim();
    }
  }
  return result;
}
