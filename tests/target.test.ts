import { describe, expect, it } from 'vitest';

import { buildTarget, InvalidTargetError } from '../src/target';

describe('buildTarget', () => {
  it('should render the request line and Host header with port and query', () => {
    const target = buildTarget('http://host:8080/p?q=1');

    expect(target.host).toBe('host');
    expect(target.port).toBe(8080);
    expect(target.path).toBe('/p?q=1');
    expect(target.requestBytes.toString('ascii')).toBe(
      'GET /p?q=1 HTTP/1.1\r\nHost: host:8080\r\nConnection: close\r\n\r\n',
    );
  });

  it('should default the port to 80 and the path to /', () => {
    const target = buildTarget('http://example.test');

    expect(target.port).toBe(80);
    expect(target.path).toBe('/');
    expect(target.hostHeader).toBe('example.test');
  });

  it('should keep the authority as written in the Host header', () => {
    const target = buildTarget('http://Example.Test:80/');

    expect(target.host).toBe('example.test');
    expect(target.hostHeader).toBe('Example.Test:80');
  });

  it('should put a bare query string on the root path', () => {
    expect(buildTarget('http://h?x=1').path).toBe('/?x=1');
  });

  it('should drop the fragment', () => {
    expect(buildTarget('http://h/a#frag').path).toBe('/a');
  });

  it('should accept a scheme in any case', () => {
    expect(buildTarget('HTTP://h:81/').port).toBe(81);
  });

  it('should treat a URL without a scheme as plain http', () => {
    const target = buildTarget('127.0.0.1:8000/health');

    expect(target.host).toBe('127.0.0.1');
    expect(target.port).toBe(8000);
    expect(target.path).toBe('/health');
  });

  it('should parse bracketed IPv6 hosts', () => {
    const target = buildTarget('http://[::1]:9000/');

    expect(target.host).toBe('::1');
    expect(target.port).toBe(9000);
    expect(target.hostHeader).toBe('[::1]:9000');
  });

  it('should reject https', () => {
    expect(() => buildTarget('https://example.test/')).toThrow(InvalidTargetError);
  });

  it('should reject other schemes and carry the URL', () => {
    try {
      buildTarget('ftp://example.test/');
      expect.fail('expected buildTarget to throw');
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidTargetError);
      expect(err).toHaveProperty('url', 'ftp://example.test/');
    }
  });

  it('should reject ports out of range or not numeric', () => {
    expect(() => buildTarget('http://h:0/')).toThrow(InvalidTargetError);
    expect(() => buildTarget('http://h:70000/')).toThrow(InvalidTargetError);
    expect(() => buildTarget('http://h:abc/')).toThrow(InvalidTargetError);
  });

  it('should return a frozen target', () => {
    expect(Object.isFrozen(buildTarget('http://h/'))).toBe(true);
  });
});
