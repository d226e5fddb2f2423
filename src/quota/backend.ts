// Quota backend: sets limits with xfs_quota or setquota and reads them back in bulk.
import type { Executor, ExecResult } from "../execution/executor.js";
import type { Command } from "../types/command.js";
import { resolveTimeout, type DurationCategory } from "../types/duration.js";
import type { FilesystemType, QuotaLimits, QuotaReport } from "../types/quota.js";
import { genericReportFormat, parseReport, xfsReportFormat } from "./parsers/index.js";
import { renderQuotaStatus } from "./render.js";
import { logger } from "../logger.js";

export class QuotaBackend {
  constructor(
    private readonly executor: Executor,
    private readonly timeoutCeiling = 0,
  ) {}

  private run(argv: string[], duration: DurationCategory): Promise<ExecResult> {
    const command: Command = { argv };
    return this.executor.execute(command, resolveTimeout(duration, this.timeoutCeiling));
  }

  /** Apply limits for one user. Returns false (after logging stderr) on a non-zero exit. */
  async setUserQuota(username: string, path: string, fsType: FilesystemType, limits: QuotaLimits): Promise<boolean> {
    const argv =
      fsType === "xfs"
        ? [
            "xfs_quota",
            "-x",
            "-c",
            `limit bsoft=${limits.blockSoft} bhard=${limits.blockHard} isoft=${limits.inodeSoft} ihard=${limits.inodeHard} ${username}`,
            path,
          ]
        : ["setquota", "-u", username, limits.blockSoft, limits.blockHard, limits.inodeSoft, limits.inodeHard, path];

    const r = await this.run(argv, "quick");
    if (r.exitCode !== 0) {
      logger.error({ username, path, fsType, exitCode: r.exitCode, stderr: r.stderr.trim() }, "Setting quota failed");
      return false;
    }
    logger.info({ username, path, fsType }, "Quota set");
    return true;
  }

  /**
   * Quotas for every user on the filesystem holding `path`. xfs needs a blocks and an
   * inodes report; the generic tools print both dimensions in one repquota run.
   */
  async fetchAllQuotas(path: string, fsType: FilesystemType): Promise<QuotaReport> {
    const report: QuotaReport = new Map();
    if (fsType === "xfs") {
      const blocks = await this.report(["xfs_quota", "-x", "-c", "report -h", path]);
      if (blocks !== undefined) parseReport(blocks, xfsReportFormat, { dimension: "blocks" }, report);
      const inodes = await this.report(["xfs_quota", "-x", "-c", "report -h -i", path]);
      if (inodes !== undefined) parseReport(inodes, xfsReportFormat, { dimension: "inodes" }, report);
      return report;
    }
    const output = await this.report(["repquota", "-u", path]);
    if (output !== undefined) parseReport(output, genericReportFormat, {}, report);
    return report;
  }

  /** Rendered quota line for one user, or "not set". */
  async fetchUserQuota(username: string, path: string, fsType: FilesystemType): Promise<string> {
    if (fsType === "xfs") {
      return renderQuotaStatus(await this.fetchAllQuotas(path, fsType), username);
    }
    const output = await this.report(["quota", "-u", username]);
    const report: QuotaReport = output === undefined ? new Map() : parseReport(output, genericReportFormat, { owner: username });
    return renderQuotaStatus(report, username);
  }

  private async report(argv: string[]): Promise<string | undefined> {
    const r = await this.run(argv, "normal");
    if (r.exitCode !== 0) {
      logger.warn({ command: argv.slice(0, 4).join(" "), exitCode: r.exitCode, stderr: r.stderr.trim() }, "Quota report failed");
      return undefined;
    }
    return r.stdout;
  }
}
