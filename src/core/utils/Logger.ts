/**
 * Capacité de journalisation injectée dans les composants.
 * Injected logging capability (no module-wide logger).
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/** Sortie minimale utilisée par ConsoleLogger (process.stderr par défaut). */
export interface LineSink {
  write(line: string): unknown;
}

/**
 * Logger texte : `2024-05-01T12:34:56.789Z INFO [jirasync]: message`.
 * Écrit sur stderr : stdout est réservé aux enregistrements.
 */
export class ConsoleLogger implements Logger {
  constructor(
    private readonly name: string,
    private readonly level: LogLevel = 'info',
    private readonly sink: LineSink = process.stderr,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /** Logger dérivé partageant niveau et sortie. */
  public child(name: string): ConsoleLogger {
    return new ConsoleLogger(`${this.name}.${name}`, this.level, this.sink, this.now);
  }

  public debug(message: string): void {
    this.emit('debug', message);
  }

  public info(message: string): void {
    this.emit('info', message);
  }

  public warn(message: string): void {
    this.emit('warn', message);
  }

  public error(message: string, err?: unknown): void {
    this.emit('error', message);
    if (err instanceof Error && err.stack) {
      this.sink.write(err.stack + '\n');
    }
  }

  private emit(level: LogLevel, message: string): void {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.level)) return;
    this.sink.write(`${this.now().toISOString()} ${level.toUpperCase()} [${this.name}]: ${message}\n`);
  }
}
