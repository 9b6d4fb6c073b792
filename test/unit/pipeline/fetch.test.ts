import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ReadableStream } from 'stream/web';
import { fetchInstaller, selectDownloadUrl, installerPath } from '../../../src/pipeline/fetch.js';
import { DEFAULT_CONFIG } from '../../../src/config/loader.js';
import { BuildErrorCode } from '../../../src/shared/errors.js';
import { fakeFetch, makeContext } from '../../helpers/fakes.js';

describe('selectDownloadUrl', () => {
  const config = {
    ...DEFAULT_CONFIG,
    download: { x86_64: 'https://example.com/x64.exe', aarch64: 'https://example.com/arm64.exe' },
  };

  it('picks the URL configured for each architecture', () => {
    expect(selectDownloadUrl('x86_64', config)).toBe('https://example.com/x64.exe');
    expect(selectDownloadUrl('aarch64', config)).toBe('https://example.com/arm64.exe');
  });
});

describe('fetchInstaller', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'cdf-fetch-'));
    await fs.mkdir(path.join(tmpDir, 'build'), { recursive: true });
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('writes the response body to the work dir', async () => {
    const ctx = makeContext(tmpDir);
    const fetchImpl = fakeFetch(200, 'MZ-installer');

    const dest = await fetchInstaller(ctx, 'https://example.com/setup.exe', fetchImpl);

    expect(dest).toBe(path.join(tmpDir, 'build', 'Claude-Setup-x64.exe'));
    expect(dest).toBe(installerPath(ctx));
    expect(await fs.readFile(dest, 'utf-8')).toBe('MZ-installer');
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(fetchImpl).toHaveBeenCalledWith('https://example.com/setup.exe');
  });

  it('fails on a 404 without retrying', async () => {
    const ctx = makeContext(tmpDir);
    const fetchImpl = fakeFetch(404, 'not found');

    await expect(fetchInstaller(ctx, 'https://example.com/setup.exe', fetchImpl))
      .rejects.toMatchObject({ code: BuildErrorCode.DOWNLOAD_FAILED, context: { status: 404 } });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    await expect(fs.access(installerPath(ctx))).rejects.toThrow();
  });

  it('fails on a transport error', async () => {
    const ctx = makeContext(tmpDir);
    const fetchImpl = jest.fn(async (_url: string): Promise<Response> => {
      throw new Error('getaddrinfo ENOTFOUND example.com');
    });

    await expect(fetchInstaller(ctx, 'https://example.com/setup.exe', fetchImpl))
      .rejects.toMatchObject({
        code: BuildErrorCode.DOWNLOAD_FAILED,
        context: { cause: 'getaddrinfo ENOTFOUND example.com' },
      });
  });

  it('streams a chunked body to disk', async () => {
    const ctx = makeContext(tmpDir);
    const chunk = new Uint8Array(64 * 1024).fill(0x4d);
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        for (let i = 0; i < 16; i++) controller.enqueue(chunk);
        controller.close();
      },
    });
    const fetchImpl = jest.fn(async (_url: string) => new Response(body, { status: 200 }));

    const dest = await fetchInstaller(ctx, 'https://example.com/setup.exe', fetchImpl);

    expect((await fs.stat(dest)).size).toBe(16 * 64 * 1024);
  });

  it('fails when the transfer breaks off mid-body', async () => {
    const ctx = makeContext(tmpDir);
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode('MZ'));
        controller.error(new Error('socket hang up'));
      },
    });
    const fetchImpl = jest.fn(async (_url: string) => new Response(body, { status: 200 }));

    await expect(fetchInstaller(ctx, 'https://example.com/setup.exe', fetchImpl))
      .rejects.toMatchObject({
        code: BuildErrorCode.DOWNLOAD_FAILED,
        message: 'Download from https://example.com/setup.exe was interrupted',
      });
  });
});
