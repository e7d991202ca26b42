// OpenWRT System Commands
// Commands for system information, kernel tuning and management

import { quote } from "../../exec";

export const SystemCommands = {
  // System Information
  getHostname: `cat /proc/sys/kernel/hostname`,
  getSystemInfo: `cat /etc/openwrt_release 2>/dev/null`,
  getKernelVersion: `uname -a`,
  getCpuModel: `grep 'model name' /proc/cpuinfo | uniq`,
  getMemoryTotal: `free -h | grep 'Mem:' | awk '{print $2}'`,
  getRootUsage: `df -h / | awk 'NR==2 {print $2, $3, $4}'`,

  // Kernel Tuning
  setSysctl: (key: string, value: string | number) => `sysctl -w ${key}=${value}`,
  setCpuGovernor: (governor: string) =>
    `for CPU in /sys/devices/system/cpu/cpu*/cpufreq/scaling_governor; do ` +
    `if [ -f "$CPU" ]; then echo ${quote(governor)} > "$CPU"; fi; done`,

  // Files and Scripts
  removeFile: (path: string) => `rm -f ${quote(path)}`,
  runScript: (path: string, args: readonly string[] = []) =>
    ["sh", quote(path), ...args.map(quote)].join(" "),

  // System Control
  reboot: `reboot`,
};

/**
 * Parse system release info into structured object
 */
export function parseSystemRelease(output: string): Record<string, string> {
  const result: Record<string, string> = {};

  for (const line of output.split("\n")) {
    const match = line.match(/^(\w+)='([^']*)'/);
    if (match) {
      result[match[1]] = match[2];
    }
  }

  return result;
}
