// OpenWRT Backup Commands

import { quote } from "../../exec";

export const BackupCommands = {
  // Newest archive matching a glob, empty output when there is none
  getLatestBackup: (glob: string) => `ls -1t ${glob} 2>/dev/null | head -1`,

  // Restore Backup
  restoreBackup: (path: string) => `sysupgrade -r ${quote(path)}`,
};
