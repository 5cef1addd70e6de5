import { Logger } from '@nestjs/common';
import type { EventEmitter } from 'events';

const logger = new Logger('HTTP');

interface LoggedRequest {
  method: string;
  originalUrl: string;
}

interface LoggedResponse extends EventEmitter {
  statusCode: number;
}

/**
 * One log line per response: METHOD url status durationMs. Hooked on the
 * response itself so guard, pipe and body-parser rejections are logged too.
 */
export function requestLogging(
  req: LoggedRequest,
  res: LoggedResponse,
  next: () => void,
): void {
  const started = Date.now();
  res.once('finish', () => {
    const line = `${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - started}ms`;
    if (res.statusCode < 400) logger.log(line);
    else logger.warn(line);
  });
  next();
}
