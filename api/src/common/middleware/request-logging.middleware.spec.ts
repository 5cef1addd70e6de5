import { Logger } from '@nestjs/common';
import { EventEmitter } from 'events';
import { requestLogging } from './request-logging.middleware';

function respond(statusCode: number) {
  const req = { method: 'POST', originalUrl: '/predict' };
  const res = Object.assign(new EventEmitter(), { statusCode });
  const next = jest.fn();
  requestLogging(req, res, next);
  return { res, next };
}

describe('requestLogging', () => {
  let log: jest.SpyInstance;
  let warn: jest.SpyInstance;

  beforeEach(() => {
    log = jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => jest.restoreAllMocks());

  it('passes the request on and logs nothing before the response finishes', () => {
    const { next } = respond(200);
    expect(next).toHaveBeenCalledTimes(1);
    expect(log).not.toHaveBeenCalled();
    expect(warn).not.toHaveBeenCalled();
  });

  it('logs successful responses at log level', () => {
    const { res } = respond(200);
    res.emit('finish');
    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0][0]).toMatch(/^POST \/predict 200 \d+ms$/);
    expect(warn).not.toHaveBeenCalled();
  });

  it('warns for a 503 sent without reaching the handler', () => {
    const { res } = respond(503);
    res.emit('finish');
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(/^POST \/predict 503 \d+ms$/);
    expect(log).not.toHaveBeenCalled();
  });

  it('logs once per response', () => {
    const { res } = respond(422);
    res.emit('finish');
    res.emit('finish');
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
