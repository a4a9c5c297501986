#!/usr/bin/env node

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { fileURLToPath } from 'node:url';
import fs from 'node:fs/promises';

import {
  ConfigurationError,
  DigestError,
  computeDigest,
  formatReport,
  loadConfigFile,
  mergeDigestOptions,
  type DigestOptions,
  type DigestResult
} from '@dirdigest/core';

export type OutputFormat = 'text' | 'json';

/** Bad command-line usage (unknown flag, invalid choice); reported with exit code 2. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

async function writeOutput(out: string | undefined, content: string): Promise<void> {
  if (out) {
    await fs.writeFile(out, content, 'utf8');
    return;
  }
  process.stdout.write(content);
}

export function renderResult(result: DigestResult, dir: string, opts: { format: OutputFormat; report: boolean }): string {
  if (opts.format === 'json') {
    const payload: { digest: string; root: string; files?: Array<{ path: string; sha256: string }> } = {
      digest: result.digest,
      root: dir
    };
    if (opts.report) {
      payload.files = result.files.map((f) => ({ path: f.path, sha256: f.contentHash }));
    }
    return JSON.stringify(payload, null, 2) + '\n';
  }

  return opts.report ? formatReport(result, dir) : `${result.digest}  ${dir}\n`;
}

/** Configuration problems are the caller's to fix (2); anything during the walk is 1. */
export function exitCodeFor(err: DigestError): number {
  return err instanceof ConfigurationError ? 2 : 1;
}

export async function main(argv = process.argv): Promise<number> {
  // `process.exitCode` persists across `main()` calls in one process (tests).
  process.exitCode = 0;

  const parser = yargs(hideBin(argv))
    .scriptName('dirdigest')
    .strict()
    .help()
    .exitProcess(false)
    .option('ignore', {
      type: 'string',
      array: true,
      describe: 'Glob pattern to ignore, relative to DIR (repeatable)'
    })
    .option('ignore-file', {
      type: 'string',
      array: true,
      describe: 'Load ignore patterns from a file (repeatable)'
    })
    .option('follow-symlinks', {
      type: 'boolean',
      describe: 'Follow symlinks while walking'
    })
    .option('include-metadata', {
      type: 'boolean',
      describe: 'Fold file mode and mtime into the digest'
    })
    .option('case-insensitive-order', {
      type: 'boolean',
      describe: 'Order paths ignoring ASCII case'
    })
    .option('default-ignore-file', {
      type: 'boolean',
      describe: 'Auto-load .dirdigestignore from DIR (use --no-default-ignore-file to disable)'
    })
    .option('concurrency', {
      type: 'number',
      describe: 'Files hashed at once'
    })
    .option('config', {
      type: 'string',
      describe: 'Path to dirdigest.yaml'
    })
    .option('report', {
      type: 'boolean',
      default: false,
      describe: 'List every hashed file before the root digest'
    })
    .option('format', {
      choices: ['text', 'json'] as const,
      default: 'text' as const,
      describe: 'Output format'
    })
    .option('out', {
      type: 'string',
      describe: 'Write output to this file (default: stdout)'
    })
    .command(
      '$0 [dir]',
      'Compute a deterministic digest of a directory tree',
      (cmd) =>
        cmd.positional('dir', {
          type: 'string',
          default: '.',
          describe: 'Directory to hash'
        }),
      async (args) => {
        const dir = String(args.dir);

        try {
          const fromFile: DigestOptions = args.config ? await loadConfigFile(String(args.config)) : {};
          const fromFlags: DigestOptions = {
            ignore: args.ignore?.map(String),
            ignoreFiles: args.ignoreFile?.map(String),
            defaultIgnoreFile: args.defaultIgnoreFile,
            includeMetadata: args.includeMetadata,
            followSymlinks: args.followSymlinks,
            caseInsensitiveOrder: args.caseInsensitiveOrder,
            concurrency: args.concurrency
          };

          const result = await computeDigest(dir, mergeDigestOptions(fromFile, fromFlags));
          await writeOutput(args.out, renderResult(result, dir, { format: args.format, report: Boolean(args.report) }));
          console.error(`ok  ${new Date().toISOString()}  ${dir}`);
        } catch (err) {
          if (!(err instanceof DigestError)) throw err;
          console.error(`dirdigest: error: ${err.message}`);
          process.exitCode = exitCodeFor(err);
        }
      }
    )
    .fail((msg, err) => {
      throw new UsageError(msg || (err ? err.message : 'invalid arguments'));
    });

  try {
    await parser.parse();
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    console.error(`dirdigest: ${err.message}`);
    process.exitCode = 2;
  }
  return typeof process.exitCode === 'number' ? process.exitCode : 0;
}

// Only run if invoked as a binary, not imported by tests.
const isInvokedAsBin = (() => {
  try {
    const thisFile = fileURLToPath(import.meta.url);
    return process.argv[1] === thisFile;
  } catch {
    return false;
  }
})();

if (isInvokedAsBin) {
  main().catch((err) => {
    console.error(err);
    process.exitCode = 1;
  });
}
