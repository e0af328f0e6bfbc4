import winston from 'winston';
import chalk, { Chalk } from 'chalk';
import { env } from '../config';

const { combine, timestamp, printf, errors } = winston.format;

type LevelStyle = {
  color: Chalk;
  bright: Chalk;
  icon: string;
};

// Console styling per log level
const levelStyles: Record<string, LevelStyle> = {
  error: { color: chalk.red, bright: chalk.redBright, icon: '❌' },
  warn: { color: chalk.yellow, bright: chalk.yellowBright, icon: '⚠️ ' },
  info: { color: chalk.blue, bright: chalk.blueBright, icon: 'ℹ️ ' },
  http: { color: chalk.magenta, bright: chalk.magentaBright, icon: '🌐' },
  debug: { color: chalk.cyan, bright: chalk.cyanBright, icon: '🔍' },
};

const defaultStyle: LevelStyle = { color: chalk.white, bright: chalk.whiteBright, icon: '📝' };

const asText = (value: unknown): string =>
  typeof value === 'string' ? value : JSON.stringify(value, null, 2);

// Custom colorized format for console output
const colorizedFormat = printf(({ level, message, timestamp: ts, stack }) => {
  const style = levelStyles[level] ?? defaultStyle;

  const timestampStr = chalk.gray(`[${String(ts)}]`);
  const levelStr = style.color(`[${level.toUpperCase()}]`);

  // Include stack trace for errors
  return stack
    ? `${timestampStr} ${style.icon} ${levelStr}\n${chalk.red(String(stack))}`
    : `${timestampStr} ${style.icon} ${levelStr} ${style.bright(asText(message))}`;
});

// Simple format for file output (no colors)
const fileFormat = printf(({ level, message, timestamp: ts, stack }) => {
  return `${String(ts)} [${level.toUpperCase()}]: ${stack ? String(stack) : asText(message)}`;
});

// Create logger instance
const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), errors({ stack: true })),
  defaultMeta: { service: 'receipt-order-matcher' },
  transports: [
    // Console transport with colors
    new winston.transports.Console({
      format: combine(
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        errors({ stack: true }),
        colorizedFormat
      ),
    }),
  ],
});

// Add file transports in production
if (env.NODE_ENV === 'production') {
  logger.add(
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
      format: combine(
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        errors({ stack: true }),
        fileFormat
      ),
    })
  );
  logger.add(
    new winston.transports.File({
      filename: 'logs/combined.log',
      format: combine(
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        errors({ stack: true }),
        fileFormat
      ),
    })
  );
}

// Static helpers with pretty console output
export class Logging {
  public static info = (args: unknown): void => {
    const message = asText(args);
    logger.info(message);
  };

  public static warn = (args: unknown): void => {
    const message = asText(args);
    logger.warn(message);
  };

  public static error = (args: unknown): void => {
    const message = asText(args);
    logger.error(message);
  };

  public static debug = (args: unknown): void => {
    const message = asText(args);
    logger.debug(message);
  };

  public static http = (args: unknown): void => {
    const message = asText(args);
    logger.http(message);
  };

  // Pretty formatted success message
  public static success = (args: unknown): void => {
    const message = asText(args);
    const ts = new Date().toISOString().replace('T', ' ').substring(0, 19);
    // eslint-disable-next-line no-console
    console.log(chalk.gray(`[${ts}]`), '✅', chalk.green('[SUCCESS]'), chalk.greenBright(message));
  };

  // Box-styled important message
  public static box = (title: string, message: string): void => {
    const line = '═'.repeat(50);
    // eslint-disable-next-line no-console
    console.log(chalk.cyan(`╔${line}╗`));
    // eslint-disable-next-line no-console
    console.log(chalk.cyan('║') + chalk.bold.cyanBright(` ${title.padEnd(49)}`) + chalk.cyan('║'));
    // eslint-disable-next-line no-console
    console.log(chalk.cyan(`╠${line}╣`));
    // eslint-disable-next-line no-console
    console.log(chalk.cyan('║') + chalk.white(` ${message.padEnd(49)}`) + chalk.cyan('║'));
    // eslint-disable-next-line no-console
    console.log(chalk.cyan(`╚${line}╝`));
  };
}

export default logger;
