// OpenWRT Firewall Commands

export const FirewallCommands = {
  updateRule: (index: number, option: string, value: string) =>
    `uci set firewall.@rule[${index}].${option}='${value}'`,

  // Commit and Restart
  commitFirewall: `uci commit firewall`,
  restartFirewall: `/etc/init.d/firewall restart`,
};

/**
 * Open the LuCI HTTP and HTTPS ports on the first two WAN rules
 */
export function luciWanCommands(): string[] {
  return [
    FirewallCommands.updateRule(0, "dest_port", "80"),
    FirewallCommands.updateRule(1, "dest_port", "443"),
    FirewallCommands.commitFirewall,
    FirewallCommands.restartFirewall,
  ];
}
