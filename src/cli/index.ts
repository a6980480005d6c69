#!/usr/bin/env node
import { Command } from 'commander';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { Writable } from 'node:stream';
import chokidar from 'chokidar';
import { errorMessage } from '../common/errors';
import { configureLogger, getLogger, isLogFormat, isLogLevel, LogFormat, LogLevel } from '../common/logger';
import { buildSampleConfig, loadConfig, MaskerConfig, resolveConfig } from '../config';
import { EnvMasker } from '../masker';

type GlobalOptions = {
  logLevel?: string;
  logFormat?: string;
};

interface ConfigOptions {
  config?: string;
  profile?: string;
}

interface MaskOptions extends ConfigOptions {
  mode?: string;
  reveal?: string[];
  json?: boolean;
}

async function ensureDir(filePath: string) {
  await mkdir(dirname(filePath), { recursive: true });
}

function parseLogLevel(value?: string): LogLevel | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.toLowerCase();
  if (isLogLevel(normalized)) {
    return normalized;
  }
  throw new Error(`Unsupported log level "${value}". Use one of silent,error,warn,info,debug.`);
}

function parseLogFormat(value?: string): LogFormat | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.toLowerCase();
  if (isLogFormat(normalized)) {
    return normalized;
  }
  throw new Error(`Unsupported log format "${value}". Use text or json.`);
}

function parseRevealLines(values: string[] = []): Set<number> {
  const lines = new Set<number>();
  for (const value of values) {
    const line = Number(value);
    if (!Number.isInteger(line) || line < 1) {
      throw new Error(`Invalid line number "${value}" for --reveal`);
    }
    lines.add(line);
  }
  return lines;
}

async function readConfig(options: ConfigOptions): Promise<MaskerConfig> {
  if (options.config) {
    return loadConfig(options.config, options.profile);
  }
  if (options.profile) {
    throw new Error('--profile requires --config');
  }
  return resolveConfig();
}

async function createMasker(options: ConfigOptions & { mode?: string }): Promise<EnvMasker> {
  const config = await readConfig(options);
  const masker = new EnvMasker(config);
  if (options.mode) {
    // A forced mode replaces every pattern rule.
    masker.configure({ defaultStrategy: options.mode, patterns: {}, sources: {} });
  }
  return masker;
}

export async function runCli(argv = process.argv, stdout: Writable = process.stdout) {
  const program = new Command();
  program.name('envshroud').description('Mask secret values in env files');

  program
    .option('--log-level <level>', 'Log level (silent|error|warn|info|debug)', process.env.ENVSHROUD_LOG_LEVEL)
    .option('--log-format <format>', 'Log format (text|json)', process.env.ENVSHROUD_LOG_FORMAT)
    .hook('preAction', (cmd) => {
      const opts = cmd.optsWithGlobals<GlobalOptions>();
      const level = parseLogLevel(opts.logLevel);
      const format = parseLogFormat(opts.logFormat);
      configureLogger({ level, format });
    });

  program
    .command('init')
    .description('Create sample configuration file')
    .option('--config <path>', 'Config path', '.envshroud.yaml')
    .action(async (options: { config: string }) => {
      const log = getLogger('cli:init');
      const target = resolve(options.config);
      await ensureDir(target);
      try {
        await writeFile(target, buildSampleConfig(), { flag: 'wx' });
      } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
          log.error(`Config file already exists at ${target}`);
          process.exitCode = 1;
          return;
        }
        throw error;
      }
      log.info(`Created config at ${target}`);
    });

  program
    .command('mask')
    .description('Print an env file with its values masked')
    .argument('<file>', 'Env file to mask')
    .option('--config <path>', 'Config file path')
    .option('--profile <name>', 'Config profile')
    .option('--mode <strategy>', 'Mask every entry with this strategy')
    .option('--reveal <lines...>', 'Line numbers to leave unmasked')
    .option('--json', 'Print overlay spans as JSON instead of the masked text')
    .action(async (file: string, options: MaskOptions) => {
      const log = getLogger('cli:mask');
      const masker = await createMasker(options);
      const path = resolve(file);
      const content = await readFile(path, 'utf8');
      const revealed = parseRevealLines(options.reveal);

      if (options.json) {
        const spans = masker.overlaysFor(content, path, revealed);
        stdout.write(`${JSON.stringify({ file: path, spans }, null, 2)}\n`);
      } else {
        stdout.write(masker.maskText(content, path, revealed));
      }
      log.debug(`Masked ${path}`, { ...masker.cacheStats() });
      masker.dispose();
    });

  program
    .command('modes')
    .description('List available masking strategies and their options')
    .option('--config <path>', 'Config file path')
    .option('--profile <name>', 'Config profile')
    .action(async (options: ConfigOptions) => {
      const masker = await createMasker(options);
      for (const info of Object.values(masker.registry.infoAll())) {
        const label = info.builtin ? 'built-in' : 'custom';
        const description = info.description ? ` - ${info.description}` : '';
        stdout.write(`${info.name} (${label})${description}\n`);
        for (const [option, value] of Object.entries(info.options)) {
          const shown = typeof value === 'function' ? '<function>' : JSON.stringify(value);
          stdout.write(`  ${option}: ${shown}\n`);
        }
      }
      masker.dispose();
    });

  program
    .command('watch')
    .description('Re-mask env files whenever they change')
    .argument('<paths...>', 'Files or directories to watch')
    .option('--config <path>', 'Config file path')
    .option('--profile <name>', 'Config profile')
    .action(async (paths: string[], options: ConfigOptions) => {
      const log = getLogger('cli:watch');
      const masker = await createMasker(options);
      const { debounceMs } = masker.getConfig();

      const remask = (path: string) => {
        readFile(path, 'utf8')
          .then((content) => {
            stdout.write(`==> ${path} <==\n${masker.maskText(content, path)}\n`);
            log.info(`Re-masked ${path}`);
          })
          .catch((error: unknown) => {
            log.error(`Failed to mask ${path}: ${errorMessage(error)}`);
          });
      };
      const schedule = (path: string) => {
        if (masker.isEnvFile(path)) {
          masker.scheduler.debounce(`mask:${path}`, debounceMs, () => remask(path));
        }
      };

      const watcher = chokidar.watch(paths, {
        ignored: ['**/.git/**', '**/node_modules/**'],
      });
      watcher.on('add', schedule).on('change', schedule).on('unlink', (path) => {
        masker.scheduler.cancel(`mask:${path}`);
      });
      log.info(`Watching ${paths.join(', ')} for env file changes...`);

      const shutdown = async () => {
        masker.dispose();
        await watcher.close();
        process.exit(0);
      };
      process.on('SIGINT', shutdown);
      process.on('SIGTERM', shutdown);
      await new Promise(() => {
        /* keep process alive until signal */
      });
    });

  program
    .command('completion')
    .description('Print shell completion script (bash)')
    .action(() => {
      const script = `#!/bin/bash
_envshroud_completions() {
  COMPREPLY=( $(compgen -W "init mask modes watch completion" -- "\${COMP_WORDS[COMP_CWORD]}") )
}
complete -F _envshroud_completions envshroud
`;
      stdout.write(script);
    });

  await program.parseAsync(argv);
}

if (require.main === module) {
  runCli().catch((error: unknown) => {
    getLogger('cli').error(errorMessage(error));
    process.exitCode = 1;
  });
}
