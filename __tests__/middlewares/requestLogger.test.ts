import { describe, expect, it, jest } from '@jest/globals';
import { EventEmitter } from 'events';
import { Request, Response } from 'express';
import { requestLogger } from '../../src/middlewares/requestLogger';
import { logger } from '../../src/utils/logger';
import { admin, mockRequest } from '../helpers/http';

function finishingResponse(statusCode: number): { res: Response; finish: () => void } {
  const emitter = new EventEmitter();
  const res = {} as Response;
  Object.assign(res, { statusCode, on: emitter.on.bind(emitter) });
  return { res, finish: () => emitter.emit('finish') };
}

function withUrl(req: Request, method: string, originalUrl: string): Request {
  Object.assign(req, { method, originalUrl });
  return req;
}

describe('requestLogger', () => {
  it('logs the caller and the ids the route touched once the response finishes', () => {
    const request = jest.spyOn(logger, 'request');
    jest.spyOn(Date, 'now').mockReturnValueOnce(1000).mockReturnValueOnce(1042);
    const req = withUrl(
      mockRequest({ user: admin, params: { uid: '7' }, query: { tz: 'Europe/Berlin' } }),
      'GET',
      '/api/users/7/entries?tz=Europe%2FBerlin'
    );
    const { res, finish } = finishingResponse(200);
    const next = jest.fn();

    requestLogger(req, res, next);
    expect(next).toHaveBeenCalledTimes(1);
    expect(request).not.toHaveBeenCalled();

    finish();

    expect(request).toHaveBeenCalledWith('GET', '/api/users/7/entries?tz=Europe%2FBerlin', 200, 42, {
      userId: 2,
      role: 'ADMIN',
      uid: 7,
      timeZone: 'Europe/Berlin',
    });
  });

  it('leaves out an anonymous caller and non-numeric ids', () => {
    const request = jest.spyOn(logger, 'request');
    const req = withUrl(mockRequest({ params: { eid: 'abc' } }), 'PUT', '/api/entries/abc');
    const { res, finish } = finishingResponse(400);

    requestLogger(req, res, jest.fn());
    finish();

    expect(request).toHaveBeenCalledWith('PUT', '/api/entries/abc', 400, expect.any(Number), {});
  });

  it('reports server errors at warn level', () => {
    const warn = jest.spyOn(logger, 'warn');

    logger.request('PUT', '/api/u/clock/out', 500, 3, { userId: 1 });

    expect(warn).toHaveBeenCalledWith('HTTP Request', {
      method: 'PUT',
      path: '/api/u/clock/out',
      statusCode: 500,
      duration: '3ms',
      userId: 1,
    });
  });
});
