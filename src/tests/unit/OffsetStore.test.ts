import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { OffsetStore, compareOffsets } from '../../persistence/OffsetStore.js';
import { PersistenceFailedError } from '../../utils/errors.js';

describe('compareOffsets', () => {
  it('compares integer offsets numerically', () => {
    expect(compareOffsets('10', '9')).toBe(1);
    expect(compareOffsets('9', '10')).toBe(-1);
    expect(compareOffsets('42', '42')).toBe(0);
  });

  it('keeps precision beyond 2^53', () => {
    expect(compareOffsets('9007199254740993', '9007199254740992')).toBe(1);
    expect(compareOffsets('115012345678901234568', '115012345678901234567')).toBe(1);
  });
});

describe('OffsetStore', () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'offsets-'));
    filePath = join(dir, 'state', 'offsets.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('starts empty when the file does not exist', async () => {
    const store = new OffsetStore(filePath);
    await store.load();

    expect(store.get('-100')).toBeUndefined();
  });

  it('persists offsets as a JSON object without leaving temp files', async () => {
    const store = new OffsetStore(filePath);
    await store.load();

    await store.set('-100', '115');

    expect(await readFile(filePath, 'utf8')).toBe('{\n  "-100": "115"\n}\n');
    expect(await readdir(join(dir, 'state'))).toEqual(['offsets.json']);
  });

  it('never moves an offset backward', async () => {
    const store = new OffsetStore(filePath);
    await store.load();

    await store.set('-100', '9007199254740993');
    await store.set('-100', '9007199254740992');

    expect(store.get('-100')).toBe('9007199254740993');
    expect(JSON.parse(await readFile(filePath, 'utf8'))).toEqual({ '-100': '9007199254740993' });
  });

  it('reloads what was written', async () => {
    const first = new OffsetStore(filePath);
    await first.load();
    await first.set('-100', '7');
    await first.set('-200', '3');

    const second = new OffsetStore(filePath);
    await second.load();

    expect(second.get('-100')).toBe('7');
    expect(second.get('-200')).toBe('3');
  });

  it('serialises concurrent writes', async () => {
    const store = new OffsetStore(filePath);
    await store.load();

    await Promise.all([store.set('-100', '1'), store.set('-200', '2'), store.set('-100', '3')]);

    expect(JSON.parse(await readFile(filePath, 'utf8'))).toEqual({ '-100': '3', '-200': '2' });
  });

  it('refuses to start from a corrupt file', async () => {
    await mkdir(join(dir, 'state'), { recursive: true });
    await writeFile(filePath, '{"-100": ', 'utf8');

    const store = new OffsetStore(filePath);
    await expect(store.load()).rejects.toBeInstanceOf(PersistenceFailedError);
  });

  it('skips malformed entries on load', async () => {
    await mkdir(join(dir, 'state'), { recursive: true });
    await writeFile(filePath, '{"-100": "5", "-200": null}', 'utf8');

    const store = new OffsetStore(filePath);
    await store.load();

    expect(store.get('-100')).toBe('5');
    expect(store.get('-200')).toBeUndefined();
  });

  it('rolls back the in-memory offset when the write fails', async () => {
    const store = new OffsetStore(filePath);
    await store.load();
    await store.set('-100', '5');

    // A directory in place of the file makes the rename fail
    await rm(filePath);
    await mkdir(filePath);

    await expect(store.set('-100', '6')).rejects.toBeInstanceOf(PersistenceFailedError);
    expect(store.get('-100')).toBe('5');

    await rm(filePath, { recursive: true });
    await store.set('-100', '6');
    expect(store.get('-100')).toBe('6');
    expect(JSON.parse(await readFile(filePath, 'utf8'))).toEqual({ '-100': '6' });
  });

  it('reset forgets a chat', async () => {
    const store = new OffsetStore(filePath);
    await store.load();
    await store.set('-100', '5');
    await store.set('-200', '8');

    await store.reset('-100');
    await store.flush();

    expect(store.get('-100')).toBeUndefined();
    expect(JSON.parse(await readFile(filePath, 'utf8'))).toEqual({ '-200': '8' });
  });
});
