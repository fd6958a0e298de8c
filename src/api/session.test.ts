import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createMockLogger, createMockResponse } from '../test/mocks.js';
import { PortalSession } from './session.js';

describe('PortalSession', () => {
  let session: PortalSession;
  let mockFetch: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    mockFetch = vi.fn();
    vi.stubGlobal('fetch', mockFetch);
    session = new PortalSession(createMockLogger());
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should return the final status, URL and body', async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse({ status: 200, text: async () => 'hello' }));

    await expect(session.request('https://portal.example.com/a', { method: 'GET' })).resolves.toEqual({
      status: 200,
      url: 'https://portal.example.com/a',
      text: 'hello',
    });
    expect(mockFetch.mock.calls[0][1].redirect).toBe('manual');
  });

  it('should follow relative redirects as GET', async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse({ status: 302, headers: { location: '/b/c' } }));
    mockFetch.mockResolvedValueOnce(createMockResponse({ status: 200 }));

    const result = await session.request('https://portal.example.com/a', { method: 'POST', body: 'x=1' });

    expect(result.url).toBe('https://portal.example.com/b/c');
    expect(mockFetch.mock.calls[1][0]).toBe('https://portal.example.com/b/c');
    expect(mockFetch.mock.calls[1][1].method).toBe('GET');
    expect(mockFetch.mock.calls[1][1].body).toBeUndefined();
  });

  it('should drop the form content type when a redirect becomes a GET', async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse({ status: 302, headers: { location: '/b' } }));
    mockFetch.mockResolvedValueOnce(createMockResponse({ status: 200 }));

    await session.request('https://portal.example.com/a', {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded', Accept: 'text/html' },
      body: 'x=1',
    });

    expect(mockFetch.mock.calls[0][1].headers['Content-Type']).toBe('application/x-www-form-urlencoded');
    expect(mockFetch.mock.calls[1][1].headers['Content-Type']).toBeUndefined();
    expect(mockFetch.mock.calls[1][1].headers.Accept).toBe('text/html');
  });

  it('should keep the content type when a 307 replays the body', async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse({ status: 307, headers: { location: '/b' } }));
    mockFetch.mockResolvedValueOnce(createMockResponse({ status: 200 }));

    await session.request('https://portal.example.com/a', {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: 'x=1',
    });

    expect(mockFetch.mock.calls[1][1].headers['Content-Type']).toBe('application/x-www-form-urlencoded');
  });

  it('should only send cookies back to the origin that set them', async () => {
    mockFetch.mockResolvedValueOnce(
      createMockResponse({ status: 302, headers: { location: 'https://other.example.com/x', 'set-cookie': 'auth=test-secret' } }),
    );
    mockFetch.mockResolvedValueOnce(
      createMockResponse({ status: 302, headers: { location: 'https://portal.example.com/back', 'set-cookie': 'o=1' } }),
    );
    mockFetch.mockResolvedValueOnce(createMockResponse({ status: 200 }));

    await session.request('https://portal.example.com/a', { method: 'GET' });

    expect(mockFetch.mock.calls[1][1].headers.Cookie).toBeUndefined();
    expect(mockFetch.mock.calls[2][1].headers.Cookie).toBe('auth=test-secret');
    expect(session.cookieHeaderFor('https://other.example.com/')).toBe('o=1');
  });

  it('should replay the method and body on a 307', async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse({ status: 307, headers: { location: 'https://other.example.com/' } }));
    mockFetch.mockResolvedValueOnce(createMockResponse({ status: 200 }));

    await session.request('https://portal.example.com/a', { method: 'POST', body: 'x=1' });

    expect(mockFetch.mock.calls[1][1].method).toBe('POST');
    expect(mockFetch.mock.calls[1][1].body).toBe('x=1');
  });

  it('should return a 3xx without a location as is', async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse({ status: 304 }));

    const result = await session.request('https://portal.example.com/a', { method: 'GET' });

    expect(result.status).toBe(304);
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('should keep cookies across the redirect chain', async () => {
    mockFetch.mockResolvedValueOnce(
      createMockResponse({ status: 302, headers: { location: '/b', 'set-cookie': ['a=1; Path=/', 'b=2'] } }),
    );
    mockFetch.mockResolvedValueOnce(createMockResponse({ status: 200, headers: { 'set-cookie': 'a=3; HttpOnly' } }));

    await session.request('https://portal.example.com/a', { method: 'GET' });

    expect(mockFetch.mock.calls[0][1].headers.Cookie).toBeUndefined();
    expect(mockFetch.mock.calls[1][1].headers.Cookie).toBe('a=1; b=2');
    expect(session.cookieHeaderFor('https://portal.example.com/')).toBe('a=3; b=2');
  });

  it('should keep = inside cookie values', async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse({ status: 200, headers: { 'set-cookie': 'token=abc==; Path=/' } }));

    await session.request('https://portal.example.com/a', { method: 'GET' });

    expect(session.cookieHeaderFor('https://portal.example.com/')).toBe('token=abc==');
  });

  it('should let request headers override the defaults', async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse({ status: 200 }));

    await session.request('https://portal.example.com/a', { method: 'GET', headers: { 'User-Agent': 'test-agent' } });

    expect(mockFetch.mock.calls[0][1].headers['User-Agent']).toBe('test-agent');
  });

  it('should give up on a redirect loop', async () => {
    mockFetch.mockImplementation(async () => createMockResponse({ status: 302, headers: { location: '/loop' } }));

    await expect(session.request('https://portal.example.com/a', { method: 'GET' })).rejects.toMatchObject({
      kind: 'network',
      message: 'Too many redirects starting from https://portal.example.com/a',
    });
    expect(mockFetch).toHaveBeenCalledTimes(11);
  });

  it('should report a timeout', async () => {
    const abort = new Error('The operation was aborted');
    abort.name = 'AbortError';
    mockFetch.mockRejectedValueOnce(abort);

    await expect(session.request('https://portal.example.com/a', { method: 'GET' })).rejects.toThrow(
      'Request timed out',
    );
  });

  it('should wrap network errors', async () => {
    mockFetch.mockRejectedValueOnce(new Error('getaddrinfo ENOTFOUND'));

    await expect(session.request('https://portal.example.com/a', { method: 'GET' })).rejects.toMatchObject({
      kind: 'network',
      message: 'Network error: getaddrinfo ENOTFOUND',
    });
  });
});
