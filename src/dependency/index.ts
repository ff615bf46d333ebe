// Dependency ensurer: makes sure the Slack client library can be imported,
// installing it once with npm when it cannot. Never throws; the caller gets
// an explicit ready/fatal result to branch on.

import { execFile } from 'node:child_process';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';
import type { NotifierLogger } from '../logger/index.js';
import { describeError } from '../orchestrator/errors.js';

const COMPONENT = 'dependency';
const INSTALL_TIMEOUT_MS = 300_000;

export interface InstallResult {
  /** Process exit code; null when npm could not be started or was killed. */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  error?: string;
}

export type Installer = (name: string) => Promise<InstallResult>;

export type DependencyCheck<T> =
  | { status: 'ready'; module: T; installed: boolean }
  | { status: 'fatal'; reason: string };

export interface EnsureDependencyOptions<T> {
  name: string;
  /** Import the dependency, e.g. () => import('@slack/web-api'). */
  probe: () => Promise<T>;
  /**
   * Probe used after a successful install. Node caches a failed bare-specifier
   * resolution for the life of the process, so this should load the package by
   * path (see importInstalled). Default: probe.
   */
  reprobe?: () => Promise<T>;
  /** Default: npmInstaller(PACKAGE_ROOT). */
  install?: Installer;
  logger: Pick<NotifierLogger, 'log'>;
}

/** Directory holding this package's package.json (works from src/ and dist/). */
export const PACKAGE_ROOT = fileURLToPath(new URL('../../', import.meta.url));

/**
 * Installer that runs `npm install --no-save <name>` in cwd and resolves with
 * its exit status and captured output. Resolves (never rejects) even when npm
 * is missing from PATH.
 */
export function npmInstaller(cwd: string): Installer {
  const isWindows = process.platform === 'win32';
  return (name) =>
    new Promise<InstallResult>((resolve) => {
      execFile(
        isWindows ? 'npm.cmd' : 'npm',
        ['install', '--no-save', name],
        { cwd, shell: isWindows, timeout: INSTALL_TIMEOUT_MS, maxBuffer: 10 * 1024 * 1024 },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ exitCode: 0, stdout, stderr });
            return;
          }
          resolve({
            exitCode: typeof error.code === 'number' ? error.code : null,
            stdout,
            stderr,
            error: error.message,
          });
        },
      );
    });
}

/**
 * Import a package from <root>/node_modules by absolute file URL, bypassing
 * the resolver cache. The entry point is the package.json `main` field.
 */
export async function importInstalled(root: string, name: string): Promise<unknown> {
  const packageDir = join(root, 'node_modules', name);
  const manifest: unknown = JSON.parse(await readFile(join(packageDir, 'package.json'), 'utf-8'));
  const main =
    typeof manifest === 'object' && manifest !== null && 'main' in manifest && typeof manifest.main === 'string'
      ? manifest.main
      : 'index.js';
  const loaded: unknown = await import(pathToFileURL(join(packageDir, main)).href);
  return loaded;
}

/**
 * Probe a dependency and install it at most once if the probe fails.
 *
 * Outcomes:
 * - probe ok                              -> ready, no installer launched
 * - probe fails, install ok, re-probe ok  -> ready (installed: true)
 * - install fails or re-probe fails       -> fatal with the reason
 */
export async function ensureDependency<T>(options: EnsureDependencyOptions<T>): Promise<DependencyCheck<T>> {
  const { name, probe, logger } = options;

  try {
    const loaded = await probe();
    logger.log('info', COMPONENT, `Dependency check: ${name} already installed`);
    return { status: 'ready', module: loaded, installed: false };
  } catch (err) {
    logger.log('warn', COMPONENT, `Dependency check: ${name} missing, attempting installation`, {
      error: describeError(err),
    });
  }

  const install = options.install ?? npmInstaller(PACKAGE_ROOT);
  let result: InstallResult;
  try {
    result = await install(name);
  } catch (err) {
    const reason = `installer could not run: ${describeError(err)}`;
    logger.log('error', COMPONENT, `Dependency install failed: ${reason}`);
    return { status: 'fatal', reason };
  }

  if (result.exitCode !== 0) {
    const reason = result.exitCode === null
      ? `installer did not complete (${result.error ?? 'no exit code'})`
      : `installer exited with code ${result.exitCode}`;
    logger.log('error', COMPONENT, `Dependency install failed: ${reason}`, {
      stdout: result.stdout.trim(),
      stderr: result.stderr.trim(),
    });
    return { status: 'fatal', reason };
  }

  try {
    const loaded = await (options.reprobe ?? probe)();
    logger.log('info', COMPONENT, `Dependency install: ${name} successfully installed`, {
      stdout: result.stdout.trim(),
    });
    return { status: 'ready', module: loaded, installed: true };
  } catch (err) {
    const reason = `installed but still not importable: ${describeError(err)}`;
    logger.log('error', COMPONENT, `Dependency install failed: ${reason}`);
    return { status: 'fatal', reason };
  }
}
