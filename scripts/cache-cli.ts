/**
 * Content Cache CLI Tool
 *
 * Inspects and maintains a cache directory, and fetches resources through
 * the cache. Settings come from CONTENT_CACHE_* variables, which may live in
 * a .env file.
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import dotenv from 'dotenv';
import { readFile, writeFile } from 'node:fs/promises';
import {
  createBufferCache,
  getConfigFromEnvironment,
  ORIGINAL,
  parseByteLimit,
  type CacheOrchestrator
} from '../src/index';

// Load environment variables from .env file
dotenv.config();

const program = new Command();

program
  .name('cache-cli')
  .description('Maintenance tool for the tiered content cache')
  .version('1.0.0')
  .option('-d, --directory <dir>', 'Cache directory (overrides CONTENT_CACHE_DIR)');

function formatBytes(bytes: number): string {
  if (bytes < 1_000) return `${bytes} B`;
  if (bytes < 1_000_000) return `${(bytes / 1_000).toFixed(1)} kB`;
  return `${(bytes / 1_000_000).toFixed(1)} MB`;
}

async function openCache(): Promise<CacheOrchestrator<Buffer>> {
  const config = getConfigFromEnvironment();
  const directory: unknown = program.opts().directory;
  return createBufferCache({
    config: {
      ...config,
      directory: typeof directory === 'string' ? directory : config.directory
    }
  });
}

function byteLimitOption(value: string): number | null {
  try {
    return parseByteLimit(value, '--limit');
  } catch (error) {
    throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
  }
}

function fail(action: string, error: unknown): never {
  console.error(chalk.red(`Failed to ${action}: ${error instanceof Error ? error.message : String(error)}`));
  process.exit(1);
}

program
  .command('fetch')
  .description('Fetch a resource through the cache')
  .argument('<url>', 'Resource URL')
  .option('-o, --output <file>', 'Write the content to a file')
  .action(async (url: string, options: { output?: string }) => {
    try {
      const cache = await openCache();
      console.log(chalk.blue(`Fetching ${chalk.cyan(url)}...`));

      const startTime = Date.now();
      const content = await cache.fetchAsync(url, ORIGINAL);
      cache.shutdown();

      if (content === null) {
        console.error(chalk.red('Resource could not be fetched'));
        process.exit(1);
      }

      console.log(chalk.green(`Got ${formatBytes(content.byteLength)} in ${Date.now() - startTime} ms`));
      if (options.output) {
        await writeFile(options.output, content);
        console.log(chalk.blue(`Wrote ${chalk.cyan(options.output)}`));
      }
    } catch (error) {
      fail('fetch resource', error);
    }
  });

program
  .command('seed')
  .description('Store a local file as user-provided content')
  .argument('<key>', 'Key to store the content under')
  .argument('<file>', 'File to read')
  .action(async (key: string, file: string) => {
    try {
      const cache = await openCache();
      const stored = await cache.addUserProvidedContent(await readFile(file), key, ['disk']);
      cache.shutdown();

      if (!stored) {
        console.error(chalk.red('Content could not be written to disk'));
        process.exit(1);
      }
      console.log(chalk.green(`Stored ${chalk.cyan(file)} under key '${chalk.cyan(key)}'`));
    } catch (error) {
      fail('seed content', error);
    }
  });

program
  .command('trim')
  .description('Delete the oldest artifacts until the cache fits its byte limit')
  .option('-l, --limit <bytes>', 'Byte limit to trim to, or none (overrides CONTENT_CACHE_BYTE_LIMIT)', byteLimitOption)
  .action(async (options: { limit?: number | null }) => {
    try {
      const cache = await openCache();
      const result = options.limit === undefined
        ? await cache.trimStaleFiles()
        : await cache.setByteLimit(options.limit);
      cache.shutdown();

      if (result === null) {
        console.log(chalk.yellow('No byte limit configured, nothing to trim'));
        return;
      }
      console.log(chalk.green(
        `Deleted ${result.deleted.length} file(s), ${formatBytes(result.bytesBefore)} -> ${formatBytes(result.bytesAfter)}`
      ));
    } catch (error) {
      fail('trim cache', error);
    }
  });

program
  .command('clear')
  .description('Remove every artifact from the cache directory')
  .action(async () => {
    try {
      const cache = await openCache();
      await cache.removeAllFromDisk();
      cache.shutdown();
      console.log(chalk.green('Cache directory cleared'));
    } catch (error) {
      fail('clear cache', error);
    }
  });

program
  .command('stats')
  .description('Show the size of the cache directory')
  .action(async () => {
    try {
      const cache = await openCache();
      const stats = await cache.stats();
      cache.shutdown();

      console.log(chalk.cyan('Cache statistics:'));
      console.log(`Directory: ${chalk.yellow(stats.directory)}`);
      console.log(`Files: ${chalk.yellow(String(stats.diskFiles))}`);
      console.log(`Size: ${chalk.yellow(formatBytes(stats.diskBytes))}`);
      console.log(`Byte limit: ${chalk.yellow(stats.byteLimit === null ? 'none' : formatBytes(stats.byteLimit))}`);
    } catch (error) {
      fail('read statistics', error);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => fail('run command', error));
