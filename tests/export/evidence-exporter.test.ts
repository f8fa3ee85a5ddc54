import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { EvidenceExporter, EvidenceManifest, MANIFEST_FILE_NAME, computeSha256 } from '../../src/export/evidence-exporter';

function isManifest(value: unknown): value is EvidenceManifest {
  return typeof value === 'object' && value !== null && 'manifestHash' in value && 'files' in value;
}

async function readManifest(location: string): Promise<EvidenceManifest> {
  const parsed: unknown = JSON.parse(await readFile(location, 'utf8'));
  if (!isManifest(parsed)) throw new Error('not a manifest');
  return parsed;
}

describe('EvidenceExporter', () => {
  let dir: string;
  let exportDir: string;
  const exportDate = new Date('2026-01-26T02:00:00Z');

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'deny-ledger-export-'));
    exportDir = path.join(dir, 'evidence');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function exporter(): EvidenceExporter {
    return new EvidenceExporter({ exportDir, exportedBy: 'compliance-bot', now: () => exportDate });
  }

  test('copies each file into the batch directory with its digest', async () => {
    const audit = path.join(dir, 'InteractionAudit-2026-01-25.csv');
    const dlp = path.join(dir, 'DlpRuleMatch-2026-01-25.csv');
    await writeFile(audit, 'audit rows\n');
    await writeFile(dlp, 'dlp rows\n');

    const report = await exporter().export([audit, dlp], '2026-01-25');
    const batchDir = path.resolve(exportDir, '2026-01-25');

    expect(report.batchId).toBe('2026-01-25');
    expect(report.manifestLocation).toBe(path.join(batchDir, MANIFEST_FILE_NAME));
    expect(report.files).toEqual([
      {
        location: audit,
        success: true,
        exportedTo: path.join(batchDir, 'InteractionAudit-2026-01-25.csv'),
        sha256: computeSha256('audit rows\n'),
      },
      {
        location: dlp,
        success: true,
        exportedTo: path.join(batchDir, 'DlpRuleMatch-2026-01-25.csv'),
        sha256: computeSha256('dlp rows\n'),
      },
    ]);
    expect(await readFile(path.join(batchDir, 'DlpRuleMatch-2026-01-25.csv'), 'utf8')).toBe('dlp rows\n');
  });

  test('the manifest lists every exported file and hashes its own body', async () => {
    const audit = path.join(dir, 'InteractionAudit-2026-01-25.csv');
    await writeFile(audit, 'audit rows\n');

    const report = await exporter().export([audit], '2026-01-25');
    const manifest = await readManifest(path.join(exportDir, '2026-01-25', MANIFEST_FILE_NAME));

    expect(report.manifestLocation).toBeDefined();
    expect(manifest.exportDate).toBe('2026-01-26T02:00:00.000Z');
    expect(manifest.exportedBy).toBe('compliance-bot');
    expect(manifest.batchId).toBe('2026-01-25');
    expect(manifest.files).toEqual([
      { name: 'InteractionAudit-2026-01-25.csv', sha256: computeSha256('audit rows\n'), bytes: 11 },
    ]);

    const { manifestHash, ...body } = manifest;
    expect(manifestHash).toBe(computeSha256(JSON.stringify(body, null, 2)));
  });

  test('a missing file fails only that entry', async () => {
    const present = path.join(dir, 'present.csv');
    const missing = path.join(dir, 'missing.csv');
    await writeFile(present, 'rows\n');

    const report = await exporter().export([missing, present], 'batch-1');

    expect(report.files[0].location).toBe(missing);
    expect(report.files[0].success).toBe(false);
    expect(report.files[0].error).toContain('ENOENT');
    expect(report.files[1].success).toBe(true);
    const manifest = await readManifest(path.join(exportDir, 'batch-1', MANIFEST_FILE_NAME));
    expect(manifest.files.map((f) => f.name)).toEqual(['present.csv']);
  });

  test('a batch id that is not a plain name is refused', async () => {
    await expect(exporter().export([], '../outside')).rejects.toThrow('Batch id must be a plain directory name: ../outside');
  });

  test('the default author is the tool name', async () => {
    const report = await new EvidenceExporter({ exportDir, now: () => exportDate }).export([], 'empty');
    const manifest = await readManifest(report.manifestLocation ?? '');

    expect(manifest.exportedBy).toBe('deny-ledger');
    expect(manifest.files).toEqual([]);
  });
});

describe('computeSha256', () => {
  test('hex digest of the content', () => {
    expect(computeSha256('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
  });
});
