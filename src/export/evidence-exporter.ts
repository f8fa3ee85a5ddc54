/**
 * Evidence export.
 *
 * Copies every sink output of a run into `<exportDir>/<batchId>/` and
 * writes a manifest with a SHA-256 digest per file. The manifest carries its
 * own `manifestHash`: the digest of the manifest body serialized without
 * that field. Recomputing the digests later proves the files were not
 * altered after export.
 */

import { createHash } from 'crypto';
import { mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import { errorMessage } from '../domain/errors';
import { ExportFileResult, ExportReport } from '../domain/run';

export interface Exporter {
  export(locations: string[], batchId: string): Promise<ExportReport>;
}

export interface ManifestFileEntry {
  name: string;
  sha256: string;
  bytes: number;
}

export interface EvidenceManifest {
  exportDate: string;
  exportedBy: string;
  batchId: string;
  files: ManifestFileEntry[];
  manifestHash: string;
}

export interface EvidenceExporterOptions {
  exportDir: string;
  exportedBy?: string;
  now?: () => Date;
}

export const MANIFEST_FILE_NAME = 'manifest.json';

export function computeSha256(content: string | Buffer): string {
  return createHash('sha256').update(content).digest('hex');
}

export class EvidenceExporter implements Exporter {
  private readonly exportedBy: string;
  private readonly now: () => Date;

  constructor(private readonly options: EvidenceExporterOptions) {
    this.exportedBy = options.exportedBy ?? 'deny-ledger';
    this.now = options.now ?? (() => new Date());
  }

  async export(locations: string[], batchId: string): Promise<ExportReport> {
    if (path.basename(batchId) !== batchId || batchId === '.' || batchId === '..') {
      throw new Error(`Batch id must be a plain directory name: ${batchId}`);
    }

    const batchDir = path.resolve(this.options.exportDir, batchId);
    await mkdir(batchDir, { recursive: true });

    const files: ExportFileResult[] = [];
    const entries: ManifestFileEntry[] = [];

    for (const location of locations) {
      const name = path.basename(location);
      const exportedTo = path.join(batchDir, name);
      try {
        const content = await readFile(location);
        await writeFile(exportedTo, content);
        const sha256 = computeSha256(content);
        files.push({ location, success: true, exportedTo, sha256 });
        entries.push({ name, sha256, bytes: content.byteLength });
      } catch (err) {
        files.push({ location, success: false, error: errorMessage(err, 'Copy failed') });
      }
    }

    const body = {
      exportDate: this.now().toISOString(),
      exportedBy: this.exportedBy,
      batchId,
      files: entries,
    };
    const manifest: EvidenceManifest = {
      ...body,
      manifestHash: computeSha256(JSON.stringify(body, null, 2)),
    };

    const manifestLocation = path.join(batchDir, MANIFEST_FILE_NAME);
    await writeFile(manifestLocation, `${JSON.stringify(manifest, null, 2)}\n`, 'utf8');

    return { batchId, files, manifestLocation };
  }
}
