import type { QuotaReportFormat } from "./types.js";

const FLAG_COLUMN = /^[-+]{2}$/;
const GRACE_TOKEN = /^(none|expired|\d+days?|\d+:\d{2})$/;

/**
 * `repquota -u` and `quota -u` rows. repquota puts a limit-exceeded flag column after
 * the name, and both tools print a grace column when a soft limit is exceeded:
 *
 *   alice     +-   150000  100000  200000  6days    120  1000  2000
 */
export const genericReportFormat: QuotaReportFormat = {
  format: "generic",
  minColumns: 6,
  sentinels: new Set(["***", "Block", "Disk", "Filesystem", "User", "root"]),
  parseRow(tokens) {
    const [username, ...rest] = tokens;
    if (!username) return undefined;
    const values = rest.filter((t, i) => !(i === 0 && FLAG_COLUMN.test(t)) && !GRACE_TOKEN.test(t));
    const [blocksUsed, blocksSoft, blocksHard, inodesUsed, inodesSoft, inodesHard] = values;
    if (inodesHard === undefined) return undefined;
    return { username, fields: { blocksUsed, blocksSoft, blocksHard, inodesUsed, inodesSoft, inodesHard } };
  },
};
