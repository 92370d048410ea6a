/**
 * Binary Availability Checker
 *
 * Verifies that the external tools the pipeline drives are available at
 * startup. Missing tools are reported, never fatal: the affected jobs
 * fail individually and show up in the event log.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { logger } from '../middleware/logging.js';

const execFilePromise = promisify(execFile);

export interface BinaryCheckResult {
  binary: string;
  available: boolean;
  version?: string;
  error?: string;
}

export interface RequiredBinary {
  name: string;
  required: boolean;
  purpose: string;
  versionArgs?: string[];
}

/**
 * First version-looking token of a `--version` output
 */
export function parseVersion(output: string): string {
  const versionMatch = output.match(/version\s+([\d.]+)|v([\d.]+)|([\d.]+)/i);
  return versionMatch ? (versionMatch[1] || versionMatch[2] || versionMatch[3] || 'unknown') : 'unknown';
}

/**
 * Check if a binary is available and get its version
 */
export async function checkBinary(binaryName: string, versionArgs: string[] = ['--version']): Promise<BinaryCheckResult> {
  try {
    const { stdout, stderr } = await execFilePromise(binaryName, versionArgs, {
      timeout: 5000,
    });

    return {
      binary: binaryName,
      available: true,
      version: parseVersion(stdout || stderr),
    };
  } catch (error) {
    return {
      binary: binaryName,
      available: false,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

/**
 * Check every tool at startup. Logs warnings for missing binaries but
 * doesn't block startup.
 */
export async function checkRequiredBinaries(binaries: readonly RequiredBinary[]): Promise<BinaryCheckResult[]> {
  logger.info('Checking binary dependencies...');

  const results: BinaryCheckResult[] = [];

  for (const binary of binaries) {
    const result = await checkBinary(binary.name, binary.versionArgs);
    results.push(result);

    if (result.available) {
      logger.info(`✓ ${binary.name} found`, {
        service: 'binaryCheck',
        binary: binary.name,
        version: result.version,
      });
    } else {
      const logLevel = binary.required ? 'error' : 'warn';
      logger[logLevel](`✗ ${binary.name} not found - ${binary.purpose}`, {
        service: 'binaryCheck',
        binary: binary.name,
        required: binary.required,
        error: result.error,
      });
    }
  }

  const allRequired = binaries.filter(b => b.required);
  const availableRequired = results.filter(r => r.available && allRequired.some(b => b.name === r.binary));

  if (availableRequired.length < allRequired.length) {
    logger.warn(
      `${availableRequired.length}/${allRequired.length} required binaries available. ` +
      `Some features may not work correctly.`
    );
  } else {
    logger.info(`All ${allRequired.length} required binaries available`);
  }

  return results;
}
