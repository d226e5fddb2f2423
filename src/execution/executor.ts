// Command execution layer: every external tool (ldap*, kadmin, quota tools, findmnt,
// getent) passes through this module. Tests swap in a scripted Executor.
import { execFile } from "node:child_process";
import type { Command } from "../types/command.js";
import { logger } from "../logger.js";

/** Result of command execution. Non-zero exits are data, not exceptions. */
export interface ExecResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly durationMs: number;
  readonly timedOut: boolean;
}

/** Exit code reported when the binary could not be spawned at all. */
export const SPAWN_FAILURE_EXIT_CODE = 127;

export interface Executor {
  execute(command: Command, timeoutMs: number): Promise<ExecResult>;
}

const SECRET_FLAGS = new Set(["-w", "-pw"]);

/** Render argv for logs with the values of password flags masked. */
export function describeCommand(command: Command): string {
  const shown = command.argv.map((arg, i) => (i > 0 && SECRET_FLAGS.has(command.argv[i - 1] ?? "") ? "****" : arg));
  return shown.join(" ").replace(/-pw "[^"]*"/g, '-pw "****"');
}

/** Local executor using child_process.execFile (no shell). */
export class LocalExecutor implements Executor {
  async execute(command: Command, timeoutMs: number): Promise<ExecResult> {
    const start = performance.now();
    const [cmd, ...args] = command.argv;
    if (!cmd) {
      return { stdout: "", stderr: "empty command", exitCode: SPAWN_FAILURE_EXIT_CODE, durationMs: 0, timedOut: false };
    }
    logger.debug({ command: describeCommand(command), timeoutMs }, "Executing command");

    return new Promise<ExecResult>((resolve) => {
      const child = execFile(
        cmd,
        args,
        {
          timeout: timeoutMs,
          maxBuffer: 10 * 1024 * 1024,
          env: command.env ? { ...process.env, ...command.env } : process.env,
          encoding: "utf8",
        },
        (error, stdout, stderr) => {
          const durationMs = Math.round(performance.now() - start);
          let exitCode = 0;
          let timedOut = false;
          if (error) {
            const code: unknown = error.code;
            if (typeof code === "number") exitCode = code;
            else if (code === "ENOENT" || code === "EACCES") exitCode = SPAWN_FAILURE_EXIT_CODE;
            else exitCode = 1;
            timedOut = error.killed === true && Boolean(error.signal);
          }
          resolve({
            stdout: stdout ?? "",
            stderr: stderr || (error && exitCode === SPAWN_FAILURE_EXIT_CODE ? error.message : ""),
            exitCode,
            durationMs,
            timedOut,
          });
        },
      );

      if (child.stdin) {
        // EPIPE when the program exits (or never started) before reading its input.
        child.stdin.on("error", (err) => logger.debug({ command: cmd, error: err.message }, "stdin write failed"));
        if (command.stdin !== undefined) child.stdin.write(command.stdin);
        child.stdin.end();
      }
    });
  }
}
