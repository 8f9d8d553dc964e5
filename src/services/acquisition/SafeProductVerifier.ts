/**
 * SAFE product structure checks
 *
 * A usable product directory has annotation/, measurement/ and preview/
 * subdirectories, at least one GeoTIFF under measurement/, a manifest.safe
 * file, and at least one measurement file whose name carries a polarization tag.
 */

import { promises as fs } from 'fs';
import path from 'path';
import type { MeasurementFiles, Polarization } from '../../types/scene.js';

export const REQUIRED_DIRECTORIES = ['annotation', 'measurement', 'preview'] as const;
export const MANIFEST_FILE = 'manifest.safe';

/** Matching order; the first tag found in a file name wins */
const POLARIZATION_TAGS: readonly Polarization[] = ['VV', 'VH', 'HH', 'HV'];

export type VerificationResult = { valid: true } | { valid: false; problem: string };

async function isDirectory(target: string): Promise<boolean> {
    try {
        return (await fs.stat(target)).isDirectory();
    } catch {
        return false;
    }
}

async function isFile(target: string): Promise<boolean> {
    try {
        return (await fs.stat(target)).isFile();
    } catch {
        return false;
    }
}

function isTiff(fileName: string): boolean {
    return fileName.toLowerCase().endsWith('.tiff');
}

export function polarizationOf(fileName: string): Polarization | null {
    const lower = fileName.toLowerCase();
    return POLARIZATION_TAGS.find((tag) => lower.includes(tag.toLowerCase())) ?? null;
}

async function listMeasurementTiffs(productPath: string): Promise<string[]> {
    const measurementDir = path.join(productPath, 'measurement');
    const entries = await fs.readdir(measurementDir, { withFileTypes: true });
    return entries
        .filter((entry) => entry.isFile() && isTiff(entry.name))
        .map((entry) => entry.name)
        .sort();
}

/**
 * Check a product directory. The first failing check is reported.
 */
export async function verifySafeProduct(productPath: string): Promise<VerificationResult> {
    for (const dir of REQUIRED_DIRECTORIES) {
        if (!(await isDirectory(path.join(productPath, dir)))) {
            return { valid: false, problem: `Missing directory: ${dir}` };
        }
    }

    const tiffs = await listMeasurementTiffs(productPath);
    if (tiffs.length === 0) {
        return { valid: false, problem: 'No measurement TIFF files found' };
    }

    if (!(await isFile(path.join(productPath, MANIFEST_FILE)))) {
        return { valid: false, problem: `Missing ${MANIFEST_FILE}` };
    }

    if (!tiffs.some((name) => polarizationOf(name) !== null)) {
        return { valid: false, problem: 'No polarization tag found in measurement file names' };
    }

    return { valid: true };
}

/**
 * Map each polarization to its measurement file path. Files are visited in
 * name order; a later file with the same tag replaces an earlier one.
 */
export async function measurementFilesByPolarization(productPath: string): Promise<MeasurementFiles> {
    const files: MeasurementFiles = {};
    for (const name of await listMeasurementTiffs(productPath)) {
        const tag = polarizationOf(name);
        if (tag) {
            files[tag] = path.join(productPath, 'measurement', name);
        }
    }
    return files;
}
