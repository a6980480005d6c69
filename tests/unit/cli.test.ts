import { describe, it, expect } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Writable } from 'node:stream';
import { runCli } from '../../src/cli';

class MemoryWritable extends Writable {
  chunks: string[] = [];

  _write(chunk: Buffer | string, _encoding: string, callback: (error?: Error | null) => void) {
    this.chunks.push(chunk.toString());
    callback();
  }

  text(): string {
    return this.chunks.join('');
  }
}

async function withTempDir(fn: (dir: string) => Promise<void>) {
  const dir = await mkdtemp(join(tmpdir(), 'envshroud-cli-'));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

async function run(args: string[]): Promise<string> {
  const stdout = new MemoryWritable();
  await runCli(['node', 'envshroud', '--log-level', 'silent', ...args], stdout);
  return stdout.text();
}

describe('CLI', () => {
  it('prints a masked env file', async () => {
    await withTempDir(async (dir) => {
      const envPath = join(dir, '.env');
      await writeFile(envPath, 'DB_PASSWORD=hunter2\nPORT=5432\n');
      expect(await run(['mask', envPath])).toBe('DB_PASSWORD=*******\nPORT=****\n');
      expect(await run(['mask', envPath, '--mode', 'none'])).toBe('DB_PASSWORD=hunter2\nPORT=5432\n');
    });
  });

  it('prints overlay spans as JSON, leaving revealed lines out', async () => {
    await withTempDir(async (dir) => {
      const envPath = join(dir, '.env');
      await writeFile(envPath, 'DB_PASSWORD=hunter2\nPORT=5432\n');
      const output = JSON.parse(await run(['mask', envPath, '--json', '--reveal', '2']));
      expect(output).toEqual({
        file: envPath,
        spans: [{ line: 1, startColumn: 12, endColumn: 19, displayText: '*******' }],
      });
    });
  });

  it('applies a config file and profile', async () => {
    await withTempDir(async (dir) => {
      const envPath = join(dir, '.env');
      const configPath = join(dir, 'envshroud.yaml');
      await writeFile(envPath, 'DB_PASSWORD=hunter2\nPORT=5432\n');
      await writeFile(configPath, 'patterns:\n  PORT: none\nprofiles:\n  ci:\n    maskChar: "x"\n');
      expect(await run(['mask', envPath, '--config', configPath, '--profile', 'ci'])).toBe(
        'DB_PASSWORD=xxxxxxx\nPORT=5432\n',
      );
    });
  });

  it('lists strategies with their options', async () => {
    const output = await run(['modes']);
    expect(output.split('\n')).toEqual([
      'full (built-in) - Replace every character with the mask character',
      '  mask_char: "*"',
      'none (built-in) - Leave the value visible, optionally passed through a transform',
      'partial (built-in) - Show leading and trailing characters, mask the middle',
      '  mask_char: "*"',
      '  show_start: 3',
      '  show_end: 3',
      '  min_mask: 3',
      '  fallback_mode: "full"',
      '',
    ]);
  });

  it('writes a sample config that does not overwrite an existing one', async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, 'nested', '.envshroud.yaml');
      await run(['init', '--config', configPath]);
      expect(await readFile(configPath, 'utf8')).toContain('defaultStrategy: full');

      await writeFile(configPath, 'maskChar: "#"\n');
      await run(['init', '--config', configPath]);
      expect(await readFile(configPath, 'utf8')).toBe('maskChar: "#"\n');
      process.exitCode = undefined;
    });
  });
});
