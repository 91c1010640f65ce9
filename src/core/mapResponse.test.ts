import { describe, expect, it, vi } from 'vitest';
import { HTTPError } from '../error/httpError.js';
import {
  BadRequestError,
  ForbiddenError,
  NotFoundError,
  ServerError,
  ServiceUnavailableError,
} from '../error/responseErrors.js';
import type { Logger } from '../utils/logger.js';
import { mapResponse } from './mapResponse.js';

const createLogger = (): Logger => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() });

const createResponse = (status: number, body: string | null = null, url = 'https://xivapi.com/lore'): Response => {
  const response = new Response(body, { status });
  Object.defineProperty(response, 'url', { value: url });
  return response;
};

describe('mapResponse', () => {
  it('returns the parsed body for 200', async () => {
    const [err, data] = await mapResponse(createResponse(200, '{"Results":[]}'), createLogger());

    expect(err).toBeNull();
    expect(data).toEqual({ Results: [] });
  });

  it('treats other 2xx statuses as success', async () => {
    const [err, data] = await mapResponse(createResponse(201, '[1,2]'), createLogger());

    expect(err).toBeNull();
    expect(data).toEqual([1, 2]);
  });

  it('returns null for an empty body', async () => {
    const [err, data] = await mapResponse(createResponse(204), createLogger());

    expect(err).toBeNull();
    expect(data).toBeNull();
  });

  it('returns an error for a body that is not JSON', async () => {
    const [err, data] = await mapResponse(createResponse(200, '<html>'), createLogger());

    expect(data).toBeNull();
    expect(err?.message).toBe('error parsing json response body in mapResponse');
    expect(err?.cause).toBeInstanceOf(SyntaxError);
  });

  it.each([
    [400, BadRequestError],
    [401, ForbiddenError],
    [404, NotFoundError],
    [500, ServerError],
    [503, ServiceUnavailableError],
  ])('maps status %i to its error class', async (status, ErrorClass) => {
    const response = createResponse(status, '{"Error":true}');
    const [err, data] = await mapResponse(response, createLogger());

    expect(data).toBeNull();
    expect(err).toBeInstanceOf(ErrorClass);
    expect(err).toBeInstanceOf(HTTPError);
    expect(err instanceof HTTPError && err.response).toBe(response);
  });

  it.each([403, 429, 502])('maps unmapped status %i to a plain HTTPError', async (status) => {
    const [err, data] = await mapResponse(createResponse(status), createLogger());

    expect(data).toBeNull();
    expect(err?.constructor).toBe(HTTPError);
    expect(err?.message).toBe(`HTTP Error: ${status}`);
  });

  it('logs the status and the url without the api key', async () => {
    const logger = createLogger();
    const url = 'https://xivapi.com/lodestone/worldstatus?private_key=test-secret';

    await mapResponse(createResponse(503, null, url), logger);

    expect(logger.info).toHaveBeenCalledWith('503 from https://xivapi.com/lodestone/worldstatus?private_key=***', {
      status: 503,
      url: 'https://xivapi.com/lodestone/worldstatus?private_key=***',
    });
  });
});
