import { createWriteStream } from 'fs';
import { UsageError } from './errors';

export interface Logger {
  info(line?: string): void;
  error(line: string): void;
}

export interface RunLog extends Logger {
  readonly path: string;
  close(): Promise<void>;
}

/**
 * Console logger that also copies every line into a log file.
 *
 * The file is truncated on open and starts with a `Log started:` line, so each
 * run leaves exactly one trace behind. Resolves once the file is open; a path
 * that cannot be opened rejects with a UsageError before any work starts.
 * Should the file fail later, lines keep going to the console.
 */
export async function openRunLog(path: string): Promise<RunLog> {
  const stream = createWriteStream(path, { encoding: 'utf-8', flags: 'w' });
  await new Promise<void>((resolve, reject) => {
    stream.once('open', () => resolve());
    stream.once('error', (error) => reject(new UsageError(`Cannot open log file ${path}: ${error.message}`)));
  });

  let failure: Error | null = null;
  stream.on('error', (error) => {
    if (!failure) console.error(`Log file ${path} stopped accepting writes: ${error.message}`);
    failure = error;
  });
  const write = (line: string) => {
    if (!failure) stream.write(`${line}\n`);
  };

  write(`Log started: ${new Date().toISOString()}`);

  return {
    path,
    info(line = '') {
      console.log(line);
      write(line);
    },
    error(line) {
      console.error(line);
      write(line);
    },
    close() {
      return new Promise((resolve) => {
        if (failure || stream.destroyed) {
          resolve();
          return;
        }
        stream.end(() => resolve());
      });
    },
  };
}

export function banner(log: Logger, title: string, char = '='): void {
  log.info(char.repeat(80));
  log.info(title);
  log.info(char.repeat(80));
}
