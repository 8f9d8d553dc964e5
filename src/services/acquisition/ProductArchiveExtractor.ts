/**
 * ProductArchiveExtractor - unpack a SAFE product archive and verify it
 *
 * The archive is read with yauzl: entry names come from the central directory
 * and each entry under the first top-level `.SAFE` directory is streamed to
 * disk, so multi-gigabyte products never sit in memory.
 */

import { createWriteStream, promises as fs } from 'fs';
import path from 'path';
import type { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import * as yauzl from 'yauzl';
import { createChildLogger } from '../../utils/logger.js';
import { ExtractionFailure, getErrorMessage } from '../../types/errors.js';
import type { MeasurementFiles } from '../../types/scene.js';
import { measurementFilesByPolarization, verifySafeProduct } from './SafeProductVerifier.js';

const SAFE_SUFFIX = '.SAFE';

const log = createChildLogger({ component: 'ProductArchiveExtractor' });

export interface ExtractionReport {
    fileCount: number;
    measurementFiles: MeasurementFiles;
}

export interface ExtractedProduct {
    productPath: string;
    report: ExtractionReport;
}

/**
 * Top-level `.SAFE` directory names in archive order, from explicit
 * directory entries or from the paths of the files beneath them
 */
export function findProductRoots(entryNames: readonly string[]): string[] {
    const roots: string[] = [];
    for (const name of entryNames) {
        const topLevel = name.split('/')[0];
        if (topLevel.endsWith(SAFE_SUFFIX) && !roots.includes(topLevel)) {
            roots.push(topLevel);
        }
    }
    return roots;
}

function isInside(parent: string, candidate: string): boolean {
    const relative = path.relative(parent, candidate);
    return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

function openArchive(archivePath: string): Promise<yauzl.ZipFile> {
    return new Promise((resolve, reject) => {
        yauzl.open(archivePath, { lazyEntries: true, autoClose: false }, (error, zipfile) => {
            if (error || !zipfile) {
                reject(error ?? new Error('zip file could not be opened'));
                return;
            }
            resolve(zipfile);
        });
    });
}

/**
 * All entries of the central directory, in archive order
 */
function readEntries(zipfile: yauzl.ZipFile): Promise<yauzl.Entry[]> {
    return new Promise((resolve, reject) => {
        const entries: yauzl.Entry[] = [];
        zipfile.on('entry', (entry: yauzl.Entry) => {
            entries.push(entry);
            zipfile.readEntry();
        });
        zipfile.once('end', () => resolve(entries));
        zipfile.once('error', reject);
        zipfile.readEntry();
    });
}

function openEntryStream(zipfile: yauzl.ZipFile, entry: yauzl.Entry): Promise<Readable> {
    return new Promise((resolve, reject) => {
        zipfile.openReadStream(entry, (error, stream) => {
            if (error || !stream) {
                reject(error ?? new Error(`no data for ${entry.fileName}`));
                return;
            }
            resolve(stream);
        });
    });
}

function unreadable(archivePath: string, error: unknown): ExtractionFailure {
    return new ExtractionFailure('ArchiveUnreadable', `Cannot read archive: ${getErrorMessage(error)}`, {
        archivePath,
    });
}

export class ProductArchiveExtractor {
    constructor(private readonly safeDir: string) {}

    /**
     * Extract the product in `archivePath` under the SAFE directory and verify it
     * @throws {ExtractionFailure} NoProductRoot, StructureInvalid or ArchiveUnreadable
     */
    async extractAndVerify(archivePath: string): Promise<ExtractedProduct> {
        let zipfile: yauzl.ZipFile;
        try {
            zipfile = await openArchive(archivePath);
        } catch (error) {
            throw unreadable(archivePath, error);
        }

        let productPath: string;
        let fileCount: number;
        try {
            let entries: yauzl.Entry[];
            try {
                entries = await readEntries(zipfile);
            } catch (error) {
                throw unreadable(archivePath, error);
            }

            const roots = findProductRoots(entries.map((entry) => entry.fileName));
            if (roots.length === 0) {
                throw new ExtractionFailure('NoProductRoot', `No .SAFE directory found in ${path.basename(archivePath)}`, {
                    archivePath,
                });
            }
            const root = roots[0];
            if (roots.length > 1) {
                log.warn({ archivePath, roots, using: root }, 'Archive contains several .SAFE roots, using the first');
            }

            productPath = path.join(this.safeDir, root);
            await fs.rm(productPath, { recursive: true, force: true });
            await fs.mkdir(productPath, { recursive: true });

            fileCount = await this.writeEntries(zipfile, entries, root, productPath, archivePath);
        } finally {
            zipfile.close();
        }
        log.info({ archivePath, productPath, fileCount }, 'Extracted product archive');

        const verification = await verifySafeProduct(productPath);
        if (!verification.valid) {
            throw new ExtractionFailure('StructureInvalid', verification.problem, { productPath });
        }

        return {
            productPath,
            report: {
                fileCount,
                measurementFiles: await measurementFilesByPolarization(productPath),
            },
        };
    }

    private async writeEntries(
        zipfile: yauzl.ZipFile,
        entries: readonly yauzl.Entry[],
        root: string,
        productPath: string,
        archivePath: string
    ): Promise<number> {
        let fileCount = 0;
        for (const entry of entries) {
            const name = entry.fileName;
            if (name.split('/')[0] !== root) {
                continue;
            }

            const target = path.resolve(this.safeDir, name);
            if (!isInside(productPath, target)) {
                throw new ExtractionFailure('ArchiveUnreadable', `Entry escapes the product directory: ${name}`, {
                    archivePath,
                });
            }

            if (name.endsWith('/')) {
                await fs.mkdir(target, { recursive: true });
                continue;
            }

            await fs.mkdir(path.dirname(target), { recursive: true });
            try {
                await pipeline(await openEntryStream(zipfile, entry), createWriteStream(target));
            } catch (error) {
                throw unreadable(archivePath, error);
            }
            fileCount++;
        }
        return fileCount;
    }
}
