import type { QuotaReportFormat } from "./types.js";

/**
 * `xfs_quota -x -c "report -h"` (blocks) and `"report -h -i"` (inodes):
 *
 *   User ID      Used   Soft   Hard Warn/Grace
 *   ---------- ---------------------------------
 *   root            0      0      0  00 [------]
 *   alice         50M   100M   200M  00 [------]
 */
export const xfsReportFormat: QuotaReportFormat = {
  format: "xfs",
  minColumns: 5,
  sentinels: new Set(["User", "----------", "root"]),
  parseRow(tokens, dimension) {
    const [username, used, soft, hard] = tokens;
    if (!username || used === undefined || soft === undefined || hard === undefined) return undefined;
    if (dimension === "inodes") {
      return { username, fields: { inodesUsed: used, inodesSoft: soft, inodesHard: hard } };
    }
    return { username, fields: { blocksUsed: used, blocksSoft: soft, blocksHard: hard } };
  },
};
