// src/util/logger.ts

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

export interface LoggerOptions {
   level?: LogLevel;
   /**
    * Optional prefix string (e.g. "[clickstart]" or "[action:add_files]").
    */
   prefix?: string;
}

const supportsColor =
   typeof process !== 'undefined' &&
   Boolean(process.stdout?.isTTY) &&
   process.env.NO_COLOR !== '1';

type ColorFn = (text: string) => string;

function wrap(code: number): ColorFn {
   const open = `\u001b[${code}m`;
   const close = `\u001b[0m`;
   return (text: string) => (supportsColor ? `${open}${text}${close}` : text);
}

const color = {
   red: wrap(31),
   yellow: wrap(33),
   cyan: wrap(36),
   magenta: wrap(35),
   dim: wrap(2),
   gray: wrap(90),
};

function colorForLevel(level: LogLevel): ColorFn {
   switch (level) {
      case 'error':
         return color.red;
      case 'warn':
         return color.yellow;
      case 'info':
         return color.cyan;
      case 'debug':
         return color.gray;
      default:
         return (s) => s;
   }
}

export function isLogLevel(value: unknown): value is LogLevel {
   return typeof value === 'string' && LEVELS.some((l) => l === value);
}

/**
 * Read a level from an environment-style string, falling back when it is
 * missing or not one of the known levels.
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
   const normalized = value?.trim().toLowerCase();
   return isLogLevel(normalized) ? normalized : fallback;
}

/**
 * Leveled console logger with colored output and prefixed children.
 */
export class Logger {
   private level: LogLevel;
   private readonly prefix: string | undefined;

   constructor(options: LoggerOptions = {}) {
      this.level = options.level ?? 'info';
      this.prefix = options.prefix;
   }

   setLevel(level: LogLevel) {
      this.level = level;
   }

   getLevel(): LogLevel {
      return this.level;
   }

   /**
    * Create a child logger with an additional prefix.
    *
    * The child copies the parent's level at creation time.
    */
   child(prefix: string): Logger {
      const combined = this.prefix ? `${this.prefix}${prefix}` : prefix;
      return new Logger({ level: this.level, prefix: combined });
   }

   private formatMessage(msg: unknown, lvl: LogLevel): string {
      const text =
         typeof msg === 'string'
            ? msg
            : msg instanceof Error
               ? msg.message
               : String(msg);

      const prefixColored = this.prefix ? color.magenta(this.prefix) : undefined;
      const textColored = lvl === 'debug' ? color.dim(text) : colorForLevel(lvl)(text);

      return prefixColored ? `${prefixColored} ${textColored}` : textColored;
   }

   private shouldLog(targetLevel: LogLevel): boolean {
      if (this.level === 'silent') return false;
      return LEVELS.indexOf(targetLevel) <= LEVELS.indexOf(this.level);
   }

   error(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('error')) return;
      console.error(this.formatMessage(msg, 'error'), ...rest);
   }

   warn(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('warn')) return;
      console.warn(this.formatMessage(msg, 'warn'), ...rest);
   }

   info(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('info')) return;
      console.log(this.formatMessage(msg, 'info'), ...rest);
   }

   debug(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('debug')) return;
      console.debug(this.formatMessage(msg, 'debug'), ...rest);
   }
}

/**
 * Process-wide logger used by the CLI, the reference host and the extension.
 * Level can be controlled via the CLICKSTART_LOG_LEVEL env var.
 */
export const defaultLogger = new Logger({
   level: parseLogLevel(process.env.CLICKSTART_LOG_LEVEL),
   prefix: '[clickstart]',
});
