import { promises as fs } from 'fs';
import path from 'path';
import JSZip from 'jszip';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  ProductArchiveExtractor,
  findProductRoots,
} from '../../../src/services/acquisition/ProductArchiveExtractor.js';
import { ExtractionFailure } from '../../../src/types/errors.js';
import { makeTempDir, safeLayout, writeArchive } from '../helpers/safeArchive.js';

const PRODUCT = 'S1A_IW_GRDH_1SDV_20240614T054512_TEST.SAFE';

describe('findProductRoots', () => {
  it('derives roots from directory entries and file paths in archive order', () => {
    expect(
      findProductRoots(['B.SAFE/', 'B.SAFE/manifest.safe', 'readme.txt', 'A.SAFE/measurement/x-vv.tiff'])
    ).toEqual(['B.SAFE', 'A.SAFE']);
  });

  it('ignores nested .SAFE directories', () => {
    expect(findProductRoots(['outer/inner.SAFE/manifest.safe'])).toEqual([]);
  });
});

describe('ProductArchiveExtractor', () => {
  let workDir: string;
  let safeDir: string;
  let extractor: ProductArchiveExtractor;

  beforeEach(async () => {
    workDir = await makeTempDir();
    safeDir = path.join(workDir, 'safe_extracted');
    extractor = new ProductArchiveExtractor(safeDir);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it('extracts and verifies a complete product', async () => {
    const archive = await writeArchive(path.join(workDir, 'raw', 'scene.zip'), { [PRODUCT]: safeLayout() });

    const { productPath, report } = await extractor.extractAndVerify(archive);

    expect(productPath).toBe(path.join(safeDir, PRODUCT));
    expect(report.fileCount).toBe(5);
    expect(report.measurementFiles).toEqual({
      VV: path.join(productPath, 'measurement', 's1a-iw-grd-vv-001.tiff'),
      VH: path.join(productPath, 'measurement', 's1a-iw-grd-vh-002.tiff'),
    });
    expect(await fs.readFile(path.join(productPath, 'manifest.safe'), 'utf-8')).toBe('<xfdu:XFDU/>');
  });

  it('replaces an existing product directory', async () => {
    const stale = path.join(safeDir, PRODUCT, 'stale.txt');
    await fs.mkdir(path.dirname(stale), { recursive: true });
    await fs.writeFile(stale, 'old');
    const archive = await writeArchive(path.join(workDir, 'scene.zip'), { [PRODUCT]: safeLayout() });

    await extractor.extractAndVerify(archive);

    await expect(fs.access(stale)).rejects.toThrow();
  });

  it('uses the first root when the archive holds several products', async () => {
    const archive = await writeArchive(path.join(workDir, 'scene.zip'), {
      'FIRST.SAFE': safeLayout(),
      'SECOND.SAFE': safeLayout(),
    });

    const { productPath } = await extractor.extractAndVerify(archive);

    expect(productPath).toBe(path.join(safeDir, 'FIRST.SAFE'));
    await expect(fs.access(path.join(safeDir, 'SECOND.SAFE'))).rejects.toThrow();
  });

  it('fails with NoProductRoot when no .SAFE directory is present', async () => {
    const archive = await writeArchive(path.join(workDir, 'scene.zip'), { data: { 'file.txt': 'x' } });

    const error = await extractor.extractAndVerify(archive).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExtractionFailure);
    expect(error).toMatchObject({ reason: 'NoProductRoot' });
  });

  it('fails with ArchiveUnreadable for a file that is not a zip archive', async () => {
    const archive = path.join(workDir, 'broken.zip');
    await fs.writeFile(archive, 'not a zip archive');

    await expect(extractor.extractAndVerify(archive)).rejects.toMatchObject({ reason: 'ArchiveUnreadable' });
  });

  it('fails with ArchiveUnreadable for a missing archive', async () => {
    await expect(extractor.extractAndVerify(path.join(workDir, 'absent.zip'))).rejects.toMatchObject({
      reason: 'ArchiveUnreadable',
    });
  });

  it('fails with StructureInvalid and leaves the directory on disk', async () => {
    const archive = await writeArchive(path.join(workDir, 'scene.zip'), {
      [PRODUCT]: safeLayout({ omit: ['manifest'] }),
    });

    await expect(extractor.extractAndVerify(archive)).rejects.toMatchObject({
      reason: 'StructureInvalid',
      message: 'Missing manifest.safe',
    });
    await expect(fs.access(path.join(safeDir, PRODUCT, 'measurement'))).resolves.toBeUndefined();
  });

  it('streams entries to disk without reading the archive into memory', async () => {
    const measurement = 'x'.repeat(4 * 1024 * 1024);
    const archive = await writeArchive(path.join(workDir, 'scene.zip'), {
      [PRODUCT]: { ...safeLayout(), 'measurement/s1a-iw-grd-vv-001.tiff': measurement },
    });
    const readFile = vi.spyOn(fs, 'readFile');

    const { productPath } = await extractor.extractAndVerify(archive);

    const stat = await fs.stat(path.join(productPath, 'measurement', 's1a-iw-grd-vv-001.tiff'));
    expect(stat.size).toBe(measurement.length);
    expect(readFile).not.toHaveBeenCalled();
  });

  it('refuses entries that climb out of the product directory', async () => {
    const zip = new JSZip();
    for (const [relative, content] of Object.entries(safeLayout())) {
      zip.file(`${PRODUCT}/${relative}`, content);
    }
    zip.file(`${PRODUCT}/../../escaped.txt`, 'outside');
    const archive = path.join(workDir, 'scene.zip');
    await fs.writeFile(archive, await zip.generateAsync({ type: 'nodebuffer' }));

    await expect(extractor.extractAndVerify(archive)).rejects.toMatchObject({ reason: 'ArchiveUnreadable' });
    await expect(fs.access(path.join(workDir, 'escaped.txt'))).rejects.toThrow();
  });
});
