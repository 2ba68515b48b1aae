import winston from 'winston';

/** `[10:30:00] info [Batch]: Processing IMG_0042.jpg` */
export const logLine = winston.format.printf(({ level, message, timestamp, component }) => {
  const label = component === undefined ? '' : ` [${String(component)}]`;
  return `[${String(timestamp)}] ${level}${label}: ${String(message)}`;
});

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  silent: process.env.NODE_ENV === 'test',
  transports: [new winston.transports.Console()],
  format: winston.format.combine(
    winston.format.timestamp({ format: 'HH:mm:ss' }),
    winston.format.colorize(),
    logLine
  ),
});

/** Child logger whose lines carry the component label. */
export const componentLogger = (component: string) => logger.child({ component });
