import pino, { type Logger } from "pino";

export type LoggerFn = (msg: string, extra?: Record<string, unknown>) => void;

export type LoggerOptions = {
  env?: NodeJS.ProcessEnv;
  // stdout is an interactive terminal
  tty?: boolean;
};

export function resolveLogLevel(env: NodeJS.ProcessEnv): string {
  return env.LOG_LEVEL?.trim() ? env.LOG_LEVEL.trim().toLowerCase() : "info";
}

export function wantsPrettyLogs(env: NodeJS.ProcessEnv, tty: boolean): boolean {
  if (env.LOG_PRETTY === "1") return true;
  if (env.LOG_PRETTY === "0") return false;
  return env.NODE_ENV !== "production" && tty;
}

export function createLogger(opts?: LoggerOptions): Logger {
  const env = opts?.env ?? process.env;
  const tty = opts?.tty ?? !!process.stdout.isTTY;

  const transport = wantsPrettyLogs(env, tty)
    ? pino.transport({
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname,app",
          messageFormat: "{msg}",
        },
      })
    : undefined;

  return pino(
    {
      level: resolveLogLevel(env),
      base: { app: "bootcamp-iso-patcher" },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    transport,
  );
}

/** Adapts a pino logger to the plain functions the stages take. */
export function toLoggerFns(logger: Logger): {
  log: LoggerFn;
  logWarn: LoggerFn;
} {
  const log: LoggerFn = (msg, extra) => {
    if (extra) logger.info(extra, msg);
    else logger.info(msg);
  };
  const logWarn: LoggerFn = (msg, extra) => {
    if (extra) logger.warn(extra, msg);
    else logger.warn(msg);
  };
  return { log, logWarn };
}
