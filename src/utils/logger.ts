import winston from 'winston';
import chalk from 'chalk';
import { env } from '../config';

const { combine, timestamp, printf, errors } = winston.format;

type LevelName = 'error' | 'warn' | 'info' | 'http' | 'debug';
type Paint = (text: string) => string;

interface LevelStyle {
  label: Paint;
  message: Paint;
  icon: string;
}

const levelStyles: Record<LevelName, LevelStyle> = {
  error: { label: chalk.red, message: chalk.redBright, icon: '❌' },
  warn: { label: chalk.yellow, message: chalk.yellowBright, icon: '⚠️ ' },
  info: { label: chalk.blue, message: chalk.blueBright, icon: 'ℹ️ ' },
  http: { label: chalk.magenta, message: chalk.magentaBright, icon: '🌐' },
  debug: { label: chalk.cyan, message: chalk.cyanBright, icon: '🔍' },
};

const successStyle: LevelStyle = { label: chalk.green, message: chalk.greenBright, icon: '✅' };
const fallbackStyle: LevelStyle = { label: chalk.white, message: chalk.whiteBright, icon: '📝' };

const isLevelName = (level: string): level is LevelName => level in levelStyles;

const styleFor = (level: string, success: boolean): LevelStyle => {
  if (success) return successStyle;
  return isLevelName(level) ? levelStyles[level] : fallbackStyle;
};

const stampFormat = () =>
  combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), errors({ stack: true }));

// Console output. Entries logged through Logging.success carry { success: true }.
const colorizedFormat = printf((info) => {
  const success = info['success'] === true;
  const style = styleFor(info.level, success);
  const label = success ? 'SUCCESS' : info.level.toUpperCase();

  const ts = chalk.gray(`[${String(info['timestamp'])}]`);
  const head = `${ts} ${style.icon} ${style.label(`[${label}]`)}`;

  const stack = info['stack'];
  if (typeof stack === 'string') {
    return `${head}\n${chalk.red(stack)}`;
  }

  return `${head} ${style.message(String(info.message))}`;
});

const fileFormat = printf((info) => {
  const stack = info['stack'];
  const body = typeof stack === 'string' ? stack : String(info.message);
  return `${String(info['timestamp'])} [${info.level.toUpperCase()}]: ${body}`;
});

const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: stampFormat(),
  defaultMeta: { service: 'name-reconciler' },
  transports: [
    new winston.transports.Console({
      format: combine(stampFormat(), colorizedFormat),
    }),
  ],
});

if (env.NODE_ENV === 'production') {
  logger.add(
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
      format: combine(stampFormat(), fileFormat),
    })
  );
  logger.add(
    new winston.transports.File({
      filename: 'logs/combined.log',
      format: combine(stampFormat(), fileFormat),
    })
  );
}

const toMessage = (args: unknown): string =>
  typeof args === 'string' ? args : JSON.stringify(args, null, 2);

export class Logging {
  public static info = (args: unknown): void => {
    logger.info(toMessage(args));
  };

  public static warn = (args: unknown): void => {
    logger.warn(toMessage(args));
  };

  public static error = (args: unknown): void => {
    logger.error(toMessage(args));
  };

  public static debug = (args: unknown): void => {
    logger.debug(toMessage(args));
  };

  public static http = (args: unknown): void => {
    logger.http(toMessage(args));
  };

  // Logged at info level so LOG_LEVEL applies
  public static success = (args: unknown): void => {
    logger.info(toMessage(args), { success: true });
  };

  // Startup banner, printed regardless of level
  public static box = (title: string, lines: readonly string[]): void => {
    const width = 50;
    const rule = '═'.repeat(width);
    const row = (text: string): string => ` ${text}`.padEnd(width);

    // eslint-disable-next-line no-console
    console.log(chalk.cyan(`╔${rule}╗`));
    // eslint-disable-next-line no-console
    console.log(chalk.cyan('║') + chalk.bold.cyanBright(row(title)) + chalk.cyan('║'));
    // eslint-disable-next-line no-console
    console.log(chalk.cyan(`╠${rule}╣`));
    for (const line of lines) {
      // eslint-disable-next-line no-console
      console.log(chalk.cyan('║') + chalk.white(row(line)) + chalk.cyan('║'));
    }
    // eslint-disable-next-line no-console
    console.log(chalk.cyan(`╚${rule}╝`));
  };
}

export default logger;
