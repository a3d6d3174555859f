// src/core/dedupe/preload.ts
import * as fs from 'fs/promises';
import { existsSync } from 'fs';
import { asId, asRecord } from '../enrich/raw.js';

/**
 * Ids already recorded in a structured (JSONL) output from earlier runs.
 * Unparsable lines, such as a torn final line, are skipped.
 */
export async function loadCapturedIds(jsonlPath: string): Promise<Set<string>> {
  const ids = new Set<string>();
  if (!existsSync(jsonlPath)) {
    return ids;
  }

  const content = await fs.readFile(jsonlPath, 'utf-8');
  let skipped = 0;
  for (const line of content.split('\n')) {
    if (line.trim().length === 0) {
      continue;
    }
    const id = parseRecordId(line);
    if (id) {
      ids.add(id);
    } else {
      skipped++;
    }
  }

  if (skipped > 0) {
    console.error(`[WARN] Ignored ${skipped} unreadable line(s) in ${jsonlPath}`);
  }
  return ids;
}

function parseRecordId(line: string): string | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return undefined;
  }
  return asId(asRecord(parsed)?.video_id);
}
