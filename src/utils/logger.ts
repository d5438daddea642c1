import winston from 'winston';
import chalk from 'chalk';
import { env } from '../config';

const { combine, timestamp, printf, errors } = winston.format;

type Level = 'error' | 'warn' | 'info' | 'http' | 'debug';

interface LevelStyle {
  label: chalk.Chalk;
  text: chalk.Chalk;
  icon: string;
}

const STYLES: Record<Level, LevelStyle> = {
  error: { label: chalk.red, text: chalk.redBright, icon: '❌' },
  warn: { label: chalk.yellow, text: chalk.yellowBright, icon: '⚠️ ' },
  info: { label: chalk.blue, text: chalk.blueBright, icon: 'ℹ️ ' },
  http: { label: chalk.magenta, text: chalk.magentaBright, icon: '🌐' },
  debug: { label: chalk.cyan, text: chalk.cyanBright, icon: '🔍' },
};

const FALLBACK_STYLE: LevelStyle = { label: chalk.white, text: chalk.whiteBright, icon: '📝' };

const isLevel = (level: string): level is Level => level in STYLES;

const styleOf = (level: string): LevelStyle => (isLevel(level) ? STYLES[level] : FALLBACK_STYLE);

const stamped = (...formats: winston.Logform.Format[]): winston.Logform.Format =>
  combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), errors({ stack: true }), ...formats);

// Console: colored, one line per entry; stack traces on their own lines
const consoleFormat = printf(({ level, message, timestamp: ts, stack }) => {
  const style = styleOf(level);
  const head = `${chalk.gray(`[${String(ts)}]`)} ${style.icon} ${style.label(`[${level.toUpperCase()}]`)}`;
  if (stack) {
    return `${head}\n${chalk.red(String(stack))}`;
  }
  return `${head} ${typeof message === 'string' ? style.text(message) : String(message)}`;
});

// Files: plain text
const fileFormat = printf(
  ({ level, message, timestamp: ts, stack }) =>
    `${String(ts)} [${level.toUpperCase()}]: ${String(stack || message)}`
);

const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: stamped(),
  defaultMeta: { service: 'ledger-reconciliation' },
  transports: [new winston.transports.Console({ format: stamped(consoleFormat) })],
});

if (env.NODE_ENV === 'production') {
  logger.add(
    new winston.transports.File({ filename: 'logs/error.log', level: 'error', format: stamped(fileFormat) })
  );
  logger.add(new winston.transports.File({ filename: 'logs/combined.log', format: stamped(fileFormat) }));
}

const asText = (value: unknown): string =>
  typeof value === 'string' ? value : JSON.stringify(value, null, 2);

/**
 * Startup banner helpers; request and engine logging goes through `logger`.
 */
export class Logging {
  public static info = (value: unknown): void => {
    logger.info(asText(value));
  };

  public static warn = (value: unknown): void => {
    logger.warn(asText(value));
  };

  public static success = (value: unknown): void => {
    const ts = new Date().toISOString().replace('T', ' ').substring(0, 19);
    // eslint-disable-next-line no-console
    console.log(chalk.gray(`[${ts}]`), '✅', chalk.green('[SUCCESS]'), chalk.greenBright(asText(value)));
  };

  public static box = (title: string, message: string): void => {
    const line = '═'.repeat(50);
    const rows = [
      chalk.cyan(`╔${line}╗`),
      chalk.cyan('║') + chalk.bold.cyanBright(` ${title.padEnd(49)}`) + chalk.cyan('║'),
      chalk.cyan(`╠${line}╣`),
      chalk.cyan('║') + chalk.white(` ${message.padEnd(49)}`) + chalk.cyan('║'),
      chalk.cyan(`╚${line}╝`),
    ];
    // eslint-disable-next-line no-console
    console.log(rows.join('\n'));
  };
}

export default logger;
