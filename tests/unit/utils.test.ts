import { describe, it, expect, vi } from 'vitest';
import type { IncomingMessage, ServerResponse } from 'http';
import { Readable } from 'stream';
import {
  SYSTEM_FINGERPRINT,
  formatUptime,
  isRecord,
  nowSeconds,
  parseJsonBody,
  readBody,
  safeWrite,
  sleep,
} from '../../src/utils.js';

function mockResponse(destroyed: boolean, writable: boolean, accepts = true) {
  const write = vi.fn().mockReturnValue(accepts);
  const res = { destroyed, writable, write } as unknown as ServerResponse;
  return { res, write };
}

function mockRequest(...chunks: string[]): IncomingMessage {
  return Readable.from(chunks.map((chunk) => Buffer.from(chunk))) as unknown as IncomingMessage;
}

describe('formatUptime', () => {
  it('should format seconds only', () => {
    expect(formatUptime(45)).toBe('45s');
  });

  it('should format minutes and seconds', () => {
    expect(formatUptime(125)).toBe('2m 5s');
  });

  it('should format hours, minutes, seconds', () => {
    expect(formatUptime(3661)).toBe('1h 1m 1s');
  });

  it('should format days', () => {
    expect(formatUptime(90061)).toBe('1d 1h 1m 1s');
  });

  it('should handle zero', () => {
    expect(formatUptime(0)).toBe('0s');
  });
});

describe('isRecord', () => {
  it('should accept plain objects only', () => {
    expect(isRecord({})).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord('x')).toBe(false);
  });
});

describe('nowSeconds', () => {
  it('should truncate the clock to whole seconds', () => {
    vi.useFakeTimers();
    vi.setSystemTime(1_700_000_123_999);
    expect(nowSeconds()).toBe(1_700_000_123);
    vi.useRealTimers();
  });
});

describe('SYSTEM_FINGERPRINT', () => {
  it('should name the gateway', () => {
    expect(SYSTEM_FINGERPRINT.startsWith('code-assist-gateway-')).toBe(true);
  });
});

describe('safeWrite', () => {
  it('should return false for destroyed response', () => {
    const { res, write } = mockResponse(true, true);
    expect(safeWrite(res, 'data')).toBe(false);
    expect(write).not.toHaveBeenCalled();
  });

  it('should return false for non-writable response', () => {
    const { res, write } = mockResponse(false, false);
    expect(safeWrite(res, 'data')).toBe(false);
    expect(write).not.toHaveBeenCalled();
  });

  it('should write and return the result for valid response', () => {
    const { res, write } = mockResponse(false, true);
    expect(safeWrite(res, 'data')).toBe(true);
    expect(write).toHaveBeenCalledWith('data');
  });

  it('should report backpressure from write', () => {
    const { res } = mockResponse(false, true, false);
    expect(safeWrite(res, 'data')).toBe(false);
  });
});

describe('readBody', () => {
  it('should concatenate chunks', async () => {
    expect(await readBody(mockRequest('{"a":', '1}'))).toBe('{"a":1}');
  });
});

describe('parseJsonBody', () => {
  it('should parse JSON bodies', async () => {
    expect(await parseJsonBody(mockRequest('{"messages":[]}'))).toEqual({ messages: [] });
  });

  it('should treat an empty body as an empty object', async () => {
    expect(await parseJsonBody(mockRequest('  '))).toEqual({});
  });

  it('should reject invalid JSON', async () => {
    await expect(parseJsonBody(mockRequest('{oops'))).rejects.toThrow('Invalid JSON');
  });
});

describe('sleep', () => {
  it('should resolve after specified time', async () => {
    vi.useFakeTimers();
    const promise = sleep(100);
    vi.advanceTimersByTime(100);
    await promise;
    vi.useRealTimers();
  });
});
