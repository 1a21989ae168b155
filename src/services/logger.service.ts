import pino, { type DestinationStream, type Logger } from 'pino';
import { z } from 'zod';

type Sink = ReturnType<typeof pino.destination>;

export interface AppLoggerOptions {
  file: string;
  console?: boolean;
  level?: string;
}

export interface AppLogger {
  logger: Logger;
  /** Releases the log file. The logger must not be used afterwards. */
  close(): void;
}

const logRecordSchema = z
  .object({
    level: z.number(),
    time: z.string(),
    msg: z.string().optional()
  })
  .passthrough();

// Renders one pino JSON record as `TIMESTAMP [LEVEL] message`
export function formatLogLine(record: string): string {
  let raw: unknown;
  try {
    raw = JSON.parse(record);
  } catch {
    return record.endsWith('\n') ? record : `${record}\n`;
  }

  const parsed = logRecordSchema.safeParse(raw);
  if (!parsed.success) {
    return record.endsWith('\n') ? record : `${record}\n`;
  }

  const { level, time, msg } = parsed.data;
  const label = (pino.levels.labels[level] ?? 'log').toUpperCase();
  return `${time} [${label}] ${msg ?? ''}\n`;
}

class LineFormatStream implements DestinationStream {
  constructor(private readonly sink: Sink) {}

  write(record: string): void {
    this.sink.write(formatLogLine(record));
  }
}

/**
 * One logger per process: appends to the log file and, unless disabled,
 * echoes every line to stderr. Both sinks write synchronously so nothing is
 * lost when the process exits right after a failure.
 */
export function createAppLogger(options: AppLoggerOptions): AppLogger {
  const fileSink = pino.destination({ dest: options.file, sync: true, append: true, mkdir: true });
  const sinks: Sink[] = [fileSink];

  if (options.console !== false) {
    sinks.push(pino.destination({ dest: 2, sync: true }));
  }

  const logger = pino(
    {
      level: options.level ?? 'info',
      base: undefined,
      timestamp: pino.stdTimeFunctions.isoTime
    },
    pino.multistream(
      sinks.map(sink => ({ level: 'trace' as const, stream: new LineFormatStream(sink) }))
    )
  );

  let closed = false;
  return {
    logger,
    close() {
      if (closed) return;
      closed = true;
      fileSink.end();
    }
  };
}
