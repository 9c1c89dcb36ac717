import { describe, it, expect } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { create_folder_writer, to_pretty_spaces } from './writer';

describe('to_pretty_spaces', () => {
  it('resolves --pretty and --minify', () => {
    expect(to_pretty_spaces({})).toBe(2);
    expect(to_pretty_spaces({ pretty: true })).toBe(2);
    expect(to_pretty_spaces({ pretty: '4' })).toBe(4);
    expect(to_pretty_spaces({ pretty: 'x' })).toBe(2);
    expect(to_pretty_spaces({ pretty: false })).toBe(0);
    expect(to_pretty_spaces({ pretty: '4', minify: true })).toBe(0);
  });
});

describe('create_folder_writer', () => {
  it('reformats JSON and appends a newline', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'dog-sim-'));
    try {
      const write = create_folder_writer(dir, 0);
      const target = await write('{ "episodes": 1 }', 'out/summary.json');
      expect(target).toBe(join(dir, 'out/summary.json'));
      expect(await readFile(target, 'utf8')).toBe('{"episodes":1}\n');

      const plain = await write('not json', 'notes.txt');
      expect(await readFile(plain, 'utf8')).toBe('not json\n');
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
