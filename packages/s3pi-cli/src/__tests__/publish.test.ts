/**
 * Tests for the publish command (commands/publish.ts)
 *
 * Runs the whole pipeline against a temporary package directory, a
 * temporary configuration file and an in-memory object store.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { Command } from 'commander';
import pino from 'pino';
import { MemoryObjectStore, StorageError } from '@s3pi/index-sync';
import { registerPublishCommand, runPublish } from '../commands/publish.js';
import type { PublishDeps } from '../commands/publish.js';

// ── Test helpers ─────────────────────────────────────────────────────────────

let tmpDir: string;
let packageDir: string;
let store: MemoryObjectStore;
let logSpy: MockInstance<typeof console.log>;
let errorSpy: MockInstance<typeof console.error>;

const ANSI_PATTERN = new RegExp(`${String.fromCharCode(27)}\\[[0-9;]*m`, 'g');

function printed(spy: MockInstance<typeof console.log>): string[] {
  return spy.mock.calls.map((args) => String(args[0]).replace(ANSI_PATTERN, ''));
}

function writeConfig(lines: string[]): string {
  const configPath = path.join(tmpDir, 'config');
  fs.writeFileSync(configPath, lines.join('\n') + '\n');
  return configPath;
}

function addDistribution(filename: string, content: string): void {
  fs.writeFileSync(path.join(packageDir, filename), content);
}

function deps(): PublishDeps {
  return {
    logger: pino({ level: 'silent' }),
    createStore: () => store,
    systemConfigPath: path.join(tmpDir, 'no-system-config'),
    sleep: async () => {},
  };
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 's3pi-publish-test-'));
  packageDir = path.join(tmpDir, 'dist');
  fs.mkdirSync(packageDir);
  store = new MemoryObjectStore();
  logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

// ── runPublish ───────────────────────────────────────────────────────────────

describe('runPublish', () => {
  it('publishes distributions and the index', async () => {
    const config = writeConfig(['[default]', 's3.bucket=test-bucket']);
    addDistribution('bar-2.0.whl', 'bar wheel');

    const result = await runPublish({ packageDirectory: packageDir, config }, deps());

    expect(result.exitCode).toBe(0);
    expect(store.keys('test-bucket')).toEqual([
      'simple/bar/bar-2.0.whl',
      'simple/bar/index.html',
      'simple/index.html',
    ]);
    expect(printed(logSpy)).toEqual([
      `Found 1 distribution file(s) in ${packageDir}`,
      '  + created simple/bar/bar-2.0.whl',
      '  + created simple/bar/index.html',
      '  + created simple/index.html',
      '✓ Published s3://test-bucket/simple/ (3 created, 0 updated, 0 unchanged)',
    ]);
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('reports unchanged objects on a repeated run', async () => {
    const config = writeConfig(['[default]', 's3.bucket=test-bucket']);
    addDistribution('bar-2.0.whl', 'bar wheel');
    await runPublish({ packageDirectory: packageDir, config }, deps());
    logSpy.mockClear();

    const result = await runPublish({ packageDirectory: packageDir, config }, deps());

    expect(result.report).toMatchObject({ created: 0, updated: 0, skipped: 3 });
    expect(printed(logSpy)).toEqual([
      `Found 1 distribution file(s) in ${packageDir}`,
      '✓ Published s3://test-bucket/simple/ (0 created, 0 updated, 3 unchanged)',
    ]);
  });

  it('publishes an empty root index for an empty directory', async () => {
    const config = writeConfig(['[default]', 's3.bucket=test-bucket']);

    const result = await runPublish({ packageDirectory: packageDir, config }, deps());

    expect(result.exitCode).toBe(0);
    expect(store.keys('test-bucket')).toEqual(['simple/index.html']);
    expect(await store.readText('test-bucket', 'simple/index.html')).not.toContain('<a ');
  });

  it('writes nothing when the configuration disables upload', async () => {
    const config = writeConfig(['[default]', 's3.bucket=test-bucket', 'upload=false']);
    addDistribution('bar-2.0.whl', 'bar wheel');

    const result = await runPublish({ packageDirectory: packageDir, config }, deps());

    expect(result.exitCode).toBe(0);
    expect(result.report?.dryRun).toBe(true);
    expect(store.callsFor('put')).toEqual([]);
    expect(printed(logSpy)).toEqual([
      `Found 1 distribution file(s) in ${packageDir}`,
      'DRY RUN - nothing was uploaded to s3://test-bucket/simple/',
      '  + would create simple/bar/bar-2.0.whl',
      '  + would create simple/bar/index.html',
      '  + would create simple/index.html',
      'Plan: 3 created, 0 updated, 0 unchanged',
    ]);
  });

  it('lets the upload option override the configuration', async () => {
    const config = writeConfig(['[default]', 's3.bucket=test-bucket', 'upload=true']);
    addDistribution('bar-2.0.whl', 'bar wheel');

    const result = await runPublish({ packageDirectory: packageDir, config, upload: false }, deps());

    expect(result.report?.dryRun).toBe(true);
    expect(store.callsFor('put')).toEqual([]);
  });

  it('passes the configuration to the store factory', async () => {
    const config = writeConfig(['[default]', 's3.bucket=test-bucket', 's3.region=eu-west-1']);
    const createStore = vi.fn(() => store);

    await runPublish(
      { packageDirectory: packageDir, config, region: 'ap-southeast-2' },
      { ...deps(), createStore }
    );

    expect(createStore).toHaveBeenCalledTimes(1);
    expect(createStore.mock.calls[0]).toEqual([
      expect.objectContaining({ bucket: 'test-bucket', region: 'ap-southeast-2' }),
      expect.anything(),
    ]);
  });

  it('also writes the index pages to an output directory', async () => {
    const config = writeConfig(['[default]', 's3.bucket=test-bucket']);
    addDistribution('bar-2.0.whl', 'bar wheel');
    const output = path.join(tmpDir, 'site');

    const result = await runPublish({ packageDirectory: packageDir, config, output }, deps());

    expect(result.exitCode).toBe(0);
    expect(fs.readFileSync(path.join(output, 'index.html'), 'utf-8')).toBe(
      await store.readText('test-bucket', 'simple/index.html')
    );
    expect(fs.existsSync(path.join(output, 'bar', 'index.html'))).toBe(true);
    expect(printed(logSpy)).toContain(`Wrote 2 index page(s) to ${output}`);
  });

  it('fails in the config stage when the bucket is missing', async () => {
    const config = writeConfig(['[default]', 's3.prefix=simple/']);
    const createStore = vi.fn(() => store);

    const result = await runPublish(
      { packageDirectory: packageDir, config },
      { ...deps(), createStore }
    );

    expect(result).toEqual({ exitCode: 1, failedStage: 'config' });
    expect(printed(errorSpy)).toEqual(['Error [config]: Invalid configuration: s3.bucket is required']);
    expect(createStore).not.toHaveBeenCalled();
  });

  it('fails in the scan stage when the package directory is missing', async () => {
    const config = writeConfig(['[default]', 's3.bucket=test-bucket']);
    const missing = path.join(tmpDir, 'missing');

    const result = await runPublish({ packageDirectory: missing, config }, deps());

    expect(result).toEqual({ exitCode: 1, failedStage: 'scan' });
    expect(printed(errorSpy)).toEqual([`Error [scan]: Package directory does not exist: ${missing}`]);
    expect(store.calls).toEqual([]);
  });

  it('fails in the sync stage on a permission error and leaves the root index unwritten', async () => {
    const config = writeConfig(['[default]', 's3.bucket=test-bucket']);
    addDistribution('bar-2.0.whl', 'bar wheel');
    store.failNext(
      'put',
      new StorageError('AccessDenied (HTTP 403): Access Denied', { statusCode: 403, transient: false })
    );

    const result = await runPublish({ packageDirectory: packageDir, config }, deps());

    expect(result).toEqual({ exitCode: 1, failedStage: 'sync' });
    expect(printed(errorSpy)).toEqual(['Error [sync]: AccessDenied (HTTP 403): Access Denied']);
    expect(store.getObject('test-bucket', 'simple/index.html')).toBeUndefined();
  });

  it('labels failures that are not publishing errors as unexpected', async () => {
    const config = writeConfig(['[default]', 's3.bucket=test-bucket']);
    const createStore = vi.fn((): MemoryObjectStore => {
      throw new Error('credentials provider crashed');
    });

    const result = await runPublish(
      { packageDirectory: packageDir, config },
      { ...deps(), createStore }
    );

    expect(result).toEqual({ exitCode: 1, failedStage: 'sync' });
    expect(printed(errorSpy)).toEqual([
      'Error [sync]: Unexpected error: credentials provider crashed',
    ]);
  });
});

// ── registerPublishCommand ───────────────────────────────────────────────────

describe('registerPublishCommand', () => {
  it('registers the package directory argument and options', () => {
    const program = new Command();

    registerPublishCommand(program);

    expect(program.registeredArguments.map((arg) => [arg.name(), arg.required])).toEqual([
      ['package-directory', true],
    ]);
    expect(program.options.map((option) => option.long)).toEqual([
      '--config',
      '--upload',
      '--no-upload',
      '--region',
      '--output',
      '--verbose',
    ]);
  });
});
