import * as fs from 'fs';
import * as http from 'http';
import * as path from 'path';
import { Readable } from 'stream';
import { fileURLToPath } from 'url';
import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from 'vitest';
import { checkConfig, resolveConfigPath } from '../src/lib/checkConfig.js';
import { ConfigError } from '../src/lib/errors.js';
import { Logger } from '../src/lib/logger.js';
import { UrlChecker } from '../src/lib/UrlChecker.js';

const FIXTURE_PATH = fileURLToPath(
  new URL('./fixtures/config.ini', import.meta.url)
);

// --- Mock Server ---
let server: http.Server;
let baseUrl: string;

beforeAll(async () => {
  server = http.createServer((req, res) => {
    switch (req.url) {
      case '/ok':
      case '/new':
        res.writeHead(200, { 'Content-Type': 'text/html' });
        res.end('<html><body>ok</body></html>');
        return;
      case '/old':
        res.writeHead(301, { Location: `${baseUrl}/hop` });
        res.end();
        return;
      case '/hop':
        res.writeHead(302, { Location: '/new' });
        res.end();
        return;
      case '/nowhere':
        // A redirect status without a target cannot be followed.
        res.writeHead(301);
        res.end();
        return;
      case '/broken':
        res.writeHead(500);
        res.end('Internal Server Error');
        return;
      default:
        res.writeHead(404);
        res.end('Not Found');
    }
  });

  await new Promise<void>((resolve) => {
    server.listen(0, '127.0.0.1', resolve);
  });

  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Mock server did not bind to a TCP port');
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(() => {
  server.closeAllConnections();
  server.close();
});

/**
 * Helper to build a checker whose log output is kept out of the test run.
 */
function quietChecker(): UrlChecker {
  return new UrlChecker({ logger: new Logger('debug', () => undefined) });
}

function subscription(url: string, trueLink: string): string {
  return [
    `[${url}]`,
    'name = tester',
    'description = 測試',
    'blogname = Test Blog',
    `truelink = ${trueLink}`,
    '',
  ].join('\n');
}

describe('checkConfig against a local server', () => {
  it('should print only the header when every site is normal', async () => {
    const config = subscription(`${baseUrl}/ok`, `${baseUrl}/ok`);

    const report = await checkConfig(
      Readable.from([`[DEFAULT]\nicon = default\n\n${config}`]),
      quietChecker()
    );

    expect(report).toBe('| 狀態 | 網址 | 轉址網址 |\n| --- | --- | ------ |');
  });

  it('should report redirects and dead links, sorted', async () => {
    const config = [
      '[Planet]',
      'name = Test Planet',
      '',
      '[DEFAULT]',
      'icon = default',
      '',
      subscription(`${baseUrl}/nowhere`, `${baseUrl}/ok`),
      subscription(`${baseUrl}/ok`, `${baseUrl}/old`),
      subscription(`${baseUrl}/gone`, `${baseUrl}/broken`),
    ].join('\n');

    const report = await checkConfig(Readable.from([config]), quietChecker());

    expect(report.split('\n')).toEqual([
      '| 狀態 | 網址 | 轉址網址 |',
      '| --- | --- | ------ |',
      `| 301 轉址 | ${baseUrl}/old | ${baseUrl}/new |`,
      `| 404 失效 | ${baseUrl}/broken | |`,
      `| 404 失效 | ${baseUrl}/gone | |`,
      `| 404 失效 | ${baseUrl}/nowhere | |`,
    ]);
  });
});

describe('checkConfig with a config file', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should check every subscription of the file', async () => {
    const fetchSpy = vi
      .spyOn(globalThis, 'fetch')
      .mockImplementation(async () => new Response(null, { status: 200 }));

    const report = await checkConfig(
      fs.createReadStream(FIXTURE_PATH),
      quietChecker()
    );

    expect(report).toBe('| 狀態 | 網址 | 轉址網址 |\n| --- | --- | ------ |');
    expect(fetchSpy.mock.calls.map(([input]) => String(input)).sort()).toEqual([
      'http://bob.example.com',
      'http://feeds.example.com/bob',
      'https://blog.example.org/',
      'https://blog.example.org/feed/',
    ]);
  });

  it('should fail before any request when a subscription lacks its true link', async () => {
    const fetchSpy = vi.spyOn(globalThis, 'fetch');
    const config = [
      '[http://a.example]',
      'name = a',
      'description = d',
      'blogname = A',
      'icon = default',
      '',
    ].join('\n');

    await expect(
      checkConfig(Readable.from([config]), quietChecker())
    ).rejects.toBeInstanceOf(ConfigError);
    expect(fetchSpy).not.toHaveBeenCalled();
  });
});

describe('resolveConfigPath', () => {
  it('should fall back to moztw/config.ini under the working directory', () => {
    expect(resolveConfigPath(undefined, '/repo')).toBe(
      path.resolve('/repo', 'moztw', 'config.ini')
    );
  });

  it('should resolve a given path against the working directory', () => {
    expect(resolveConfigPath('planet/custom.ini', '/repo')).toBe(
      path.resolve('/repo', 'planet', 'custom.ini')
    );
    expect(resolveConfigPath('/etc/planet.ini', '/repo')).toBe(
      path.resolve('/etc/planet.ini')
    );
  });
});
