// src/core/dedupe/__tests__/preload.test.ts
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { loadCapturedIds } from '../preload.js';

describe('loadCapturedIds', () => {
  let dir: string;
  let errorSpy: jest.SpyInstance;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'trendcap-preload-'));
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    errorSpy.mockRestore();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('returns an empty set when the file does not exist', async () => {
    const ids = await loadCapturedIds(path.join(dir, 'missing.jsonl'));

    expect(ids.size).toBe(0);
  });

  it('reads video ids from every record', async () => {
    const file = path.join(dir, 'out.jsonl');
    await fs.writeFile(file, '{"video_id":"a"}\n\n{"video_id":7001}\n{"video_id":"a"}\n');

    const ids = await loadCapturedIds(file);

    expect([...ids]).toEqual(['a', '7001']);
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('skips a torn final line and warns once', async () => {
    const file = path.join(dir, 'out.jsonl');
    await fs.writeFile(file, '{"video_id":"a"}\n{"video_id":"b"}\n{"video_id":"c');

    const ids = await loadCapturedIds(file);

    expect([...ids]).toEqual(['a', 'b']);
    expect(errorSpy).toHaveBeenCalledWith(`[WARN] Ignored 1 unreadable line(s) in ${file}`);
  });
});
