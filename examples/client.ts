// vault-relay client -- Example
//
// Walks one file through the vault:
//   1. Health check (GET /health)
//   2. Upload the file (POST /ingest) -> vault ID + SHA-256 digest
//   3. Fetch its metadata (GET /vault/:id?metadata_only=true)
//   4. Download it (GET /vault/:id?filename=...) and compare bytes
//   5. Verify integrity server-side (GET /vault/:id/verify)
//
// Usage:
//   tsx examples/client.ts
//
// Environment variables:
//   SERVER_URL  (optional) -- Relay URL (default: http://localhost:3000)
//   FILE_PATH   (optional) -- Path to a file to upload (default: creates a test file)

import { readFileSync } from 'node:fs';
import { basename } from 'node:path';

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Configuration from environment
// ---------------------------------------------------------------------------

const SERVER_URL = process.env.SERVER_URL ?? 'http://localhost:3000';
const FILE_PATH = process.env.FILE_PATH;

// ---------------------------------------------------------------------------
// Response shapes
// ---------------------------------------------------------------------------

const HealthSchema = z.object({
  status: z.string(),
  dependencies: z.record(z.unknown()),
});

const IngestSchema = z.object({
  vault_id: z.string(),
  filename: z.string(),
  content_digest: z.string(),
  file_size: z.number(),
});

const MetadataSchema = z.object({
  filename: z.string(),
  content_digest: z.string(),
  timestamp: z.string(),
});

const VerifySchema = z.object({
  original_hash: z.string(),
  current_hash: z.string(),
  integrity_verified: z.boolean(),
});

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function log(step: string, message: string): void {
  console.log(`\n[${'='.repeat(60)}]`);
  console.log(`[STEP] ${step}`);
  console.log(`       ${message}`);
  console.log(`[${'='.repeat(60)}]`);
}

function logDetail(label: string, value: string): void {
  console.log(`  ${label}: ${value}`);
}

async function readJson<T>(response: Response, schema: z.ZodType<T>): Promise<T> {
  const body: unknown = await response.json();
  if (!response.ok) {
    throw new Error(`HTTP ${response.status}: ${JSON.stringify(body)}`);
  }
  return schema.parse(body);
}

// ---------------------------------------------------------------------------
// Main flow
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  console.log('\n  vault-relay client -- Example');
  console.log('  =============================\n');
  console.log(`  Server: ${SERVER_URL}`);

  // ---- Step 1: Health check ----
  log('1/5', 'Checking server health (GET /health)');

  const health = await readJson(await fetch(`${SERVER_URL}/health`), HealthSchema);
  logDetail('Server status', health.status);
  logDetail('Dependencies', JSON.stringify(health.dependencies));

  // ---- Step 2: Upload ----
  log('2/5', 'Uploading file (POST /ingest)');

  let fileBuffer: Buffer;
  let fileName: string;
  if (FILE_PATH) {
    fileBuffer = readFileSync(FILE_PATH);
    fileName = basename(FILE_PATH);
    logDetail('File', `${FILE_PATH} (${fileBuffer.length} bytes)`);
  } else {
    fileBuffer = Buffer.from(`vault test file created at ${new Date().toISOString()}`, 'utf-8');
    fileName = 'test.txt';
    logDetail('File', `Generated test file (${fileBuffer.length} bytes)`);
  }

  const formData = new FormData();
  formData.append('file', new Blob([new Uint8Array(fileBuffer)]), fileName);

  const entry = await readJson(
    await fetch(`${SERVER_URL}/ingest`, { method: 'POST', body: formData }),
    IngestSchema
  );
  logDetail('Vault ID', entry.vault_id);
  logDetail('Stored as', entry.filename);
  logDetail('Digest', entry.content_digest);

  // ---- Step 3: Metadata ----
  log('3/5', 'Fetching metadata (GET /vault/:id?metadata_only=true)');

  const metadata = await readJson(
    await fetch(`${SERVER_URL}/vault/${entry.vault_id}?metadata_only=true`),
    MetadataSchema
  );
  logDetail('Ingested at', metadata.timestamp);

  // ---- Step 4: Download ----
  log('4/5', 'Downloading file (GET /vault/:id?filename=...)');

  const query = new URLSearchParams({ filename: entry.filename });
  const downloadRes = await fetch(`${SERVER_URL}/vault/${entry.vault_id}?${query.toString()}`);
  logDetail('Status', String(downloadRes.status));
  logDetail('X-Content-Digest', downloadRes.headers.get('X-Content-Digest') ?? 'missing');

  const downloaded = Buffer.from(await downloadRes.arrayBuffer());
  const match = Buffer.compare(fileBuffer, downloaded) === 0;
  logDetail('Round-trip match', match ? 'YES' : 'NO -- mismatch detected');

  // ---- Step 5: Verify ----
  log('5/5', 'Verifying integrity (GET /vault/:id/verify)');

  const report = await readJson(
    await fetch(`${SERVER_URL}/vault/${entry.vault_id}/verify?${query.toString()}`),
    VerifySchema
  );
  logDetail('Original', report.original_hash);
  logDetail('Current', report.current_hash);
  logDetail('Verified', String(report.integrity_verified));

  console.log('\n  Done.\n');
}

main().catch((error: unknown) => {
  console.error('\nFATAL:', error instanceof Error ? error.message : error);
  process.exit(1);
});
