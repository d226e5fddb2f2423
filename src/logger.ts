import pino from "pino";

const level = process.env.LOG_LEVEL ?? (process.env.NODE_ENV === "test" ? "silent" : "info");
const logFile = process.env.USERADMIN_LOG_FILE;

// stderr keeps stdout free for command output; sync so process.exit() loses nothing.
const destination = logFile
  ? pino.multistream([
      { stream: pino.destination({ dest: 2, sync: true }) },
      { stream: pino.destination({ dest: logFile, sync: true, append: true, mkdir: true }) },
    ])
  : pino.destination({ dest: 2, sync: true });

export const logger = pino({ name: "useradmin", level }, destination);

/** Apply the level from the loaded config unless LOG_LEVEL pins it. */
export function setLogLevel(configured: string): void {
  if (process.env.LOG_LEVEL) return;
  logger.level = configured;
}
