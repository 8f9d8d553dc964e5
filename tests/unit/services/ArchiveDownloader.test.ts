import { promises as fs } from 'fs';
import path from 'path';
import { Readable } from 'stream';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  ArchiveDownloader,
  isAuthRedirectHost,
  reapplyAuthorization,
} from '../../../src/services/acquisition/ArchiveDownloader.js';
import { TransferError } from '../../../src/types/errors.js';
import { makeTempDir } from '../helpers/safeArchive.js';
import { networkError, reply, stubClient } from '../helpers/axiosStub.js';

const GRANULE = 'S1A_IW_SLC__1SDV_20240614T054512_TEST';
const ARCHIVE_URL = `https://downloads.example.test/${GRANULE}.zip`;
const authorize = () => ({ Authorization: 'Bearer test-token' });

describe('ArchiveDownloader', () => {
  let rawDir: string;

  beforeEach(async () => {
    rawDir = path.join(await makeTempDir(), 'raw_zip');
  });

  afterEach(async () => {
    await fs.rm(path.dirname(rawDir), { recursive: true, force: true });
  });

  it('streams the body to <granule>.zip with the bearer token', async () => {
    const { client, requests } = stubClient((config) => reply(config, 200, Readable.from([Buffer.from('zip-'), Buffer.from('bytes')])));
    const downloader = new ArchiveDownloader(rawDir, authorize, { client });

    const result = await downloader.download(GRANULE, ARCHIVE_URL);

    expect(result).toEqual({ archivePath: path.join(rawDir, `${GRANULE}.zip`), bytes: 9 });
    expect(await fs.readFile(result.archivePath, 'utf-8')).toBe('zip-bytes');
    await expect(fs.access(`${result.archivePath}.part`)).rejects.toThrow();
    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe(ARCHIVE_URL);
    expect(requests[0].responseType).toBe('stream');
    expect(requests[0].headers.get('Authorization')).toBe('Bearer test-token');
  });

  it('discards a partial file left by an earlier attempt', async () => {
    await fs.mkdir(rawDir, { recursive: true });
    const partPath = path.join(rawDir, `${GRANULE}.zip.part`);
    await fs.writeFile(partPath, 'truncated-old-data');
    const { client } = stubClient((config) => reply(config, 200, Readable.from([Buffer.from('new')])));

    const result = await new ArchiveDownloader(rawDir, authorize, { client }).download(GRANULE, ARCHIVE_URL);

    expect(await fs.readFile(result.archivePath, 'utf-8')).toBe('new');
    await expect(fs.access(partPath)).rejects.toThrow();
  });

  it('rejects a scene without a download URL before any request', async () => {
    const { client, requests } = stubClient((config) => reply(config, 200, Readable.from([])));

    const error = await new ArchiveDownloader(rawDir, authorize, { client }).download(GRANULE, '').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransferError);
    expect(error).toMatchObject({ message: 'scene has no download URL' });
    expect(requests).toHaveLength(0);
  });

  it('reports the HTTP status of a refused transfer', async () => {
    const { client } = stubClient((config) => reply(config, 401, Readable.from([])));

    const error = await new ArchiveDownloader(rawDir, authorize, { client }).download(GRANULE, ARCHIVE_URL).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransferError);
    expect(error).toMatchObject({ status: 401, message: `HTTP 401 while downloading ${GRANULE}` });
    await expect(fs.access(path.join(rawDir, `${GRANULE}.zip`))).rejects.toThrow();
  });

  it('wraps network failures without a status', async () => {
    const { client } = stubClient((config) => {
      throw networkError(config, 'ECONNRESET', 'socket hang up');
    });

    const error = await new ArchiveDownloader(rawDir, authorize, { client }).download(GRANULE, ARCHIVE_URL).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransferError);
    expect(error).toMatchObject({ message: `Download failed for ${GRANULE}: socket hang up` });
    expect(error).toMatchObject({ status: undefined });
  });

  it('restores the bearer token when a redirect moves to another Earthdata host', async () => {
    const { client, requests } = stubClient((config) => reply(config, 200, Readable.from([Buffer.from('zip')])));

    await new ArchiveDownloader(rawDir, authorize, { client }).download(GRANULE, ARCHIVE_URL);

    const { beforeRedirect } = requests[0];
    expect(beforeRedirect).toBeTypeOf('function');

    // the redirect follower has already stripped Authorization for the new host
    const toLogin: Record<string, unknown> = { hostname: 'urs.earthdata.nasa.gov', headers: { Accept: '*/*' } };
    const toElsewhere: Record<string, unknown> = { hostname: 'cdn.example.test', headers: { Accept: '*/*' } };
    beforeRedirect?.(toLogin, { headers: {}, statusCode: 302 });
    beforeRedirect?.(toElsewhere, { headers: {}, statusCode: 302 });

    expect(toLogin.headers).toEqual({ Accept: '*/*', Authorization: 'Bearer test-token' });
    expect(toElsewhere.headers).toEqual({ Accept: '*/*' });
  });
});

describe('isAuthRedirectHost', () => {
  it('matches Earthdata hosts and their subdomains only', () => {
    expect(isAuthRedirectHost('datapool.asf.alaska.edu')).toBe(true);
    expect(isAuthRedirectHost('asf.alaska.edu')).toBe(true);
    expect(isAuthRedirectHost('URS.EARTHDATA.NASA.GOV')).toBe(true);
    expect(isAuthRedirectHost('notasf.alaska.edu.example.test')).toBe(false);
    expect(isAuthRedirectHost('fakeasf.alaska.edu')).toBe(false);
  });
});

describe('reapplyAuthorization', () => {
  it('creates the header map when the redirect options carry none', () => {
    const options: Record<string, unknown> = { hostname: 'sentinel1.asf.alaska.edu' };

    reapplyAuthorization({ Authorization: 'Bearer test-token' })(options);

    expect(options.headers).toEqual({ Authorization: 'Bearer test-token' });
  });
});
