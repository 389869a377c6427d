import { existsSync, readFileSync } from 'node:fs';
import type { Report } from '../types.js';
import { logger } from './logger.js';

/**
 * Raised when a scan report file can't be read or doesn't look like a report
 */
export class ReportLoadError extends Error {
  readonly path: string;

  constructor(path: string, message: string, options?: ErrorOptions) {
    super(`${message}: ${path}`, options);
    this.name = 'ReportLoadError';
    this.path = path;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check the parts of the report the builder relies on.
 * Returns the reason it's not a report, or null.
 */
export function checkReport(value: unknown): string | null {
  if (!isRecord(value)) {
    return 'report must be a JSON object';
  }
  if (typeof value.ArtifactName !== 'string' || value.ArtifactName === '') {
    return "missing 'ArtifactName'";
  }
  if (typeof value.ArtifactType !== 'string') {
    return "missing 'ArtifactType'";
  }
  if (value.Metadata !== undefined && !isRecord(value.Metadata)) {
    return "'Metadata' must be an object";
  }
  if (value.Results !== undefined && !Array.isArray(value.Results)) {
    return "'Results' must be an array";
  }
  if (Array.isArray(value.Results)) {
    for (const [index, result] of value.Results.entries()) {
      if (!isRecord(result) || typeof result.Target !== 'string') {
        return `result ${index} has no 'Target'`;
      }
      if (result.Packages !== undefined && !Array.isArray(result.Packages)) {
        return `result ${index} 'Packages' must be an array`;
      }
      const packages: unknown[] = Array.isArray(result.Packages) ? result.Packages : [];
      for (const [position, pkg] of packages.entries()) {
        if (!isRecord(pkg)) {
          return `result ${index} package ${position} must be an object`;
        }
        if (pkg.DependsOn !== undefined && !Array.isArray(pkg.DependsOn)) {
          return `result ${index} package ${position} 'DependsOn' must be an array`;
        }
      }
    }
  }
  return null;
}

function assertReport(path: string, value: unknown): asserts value is Report {
  const problem = checkReport(value);
  if (problem) {
    throw new ReportLoadError(path, `Invalid report (${problem})`);
  }
}

/**
 * Load and parse a scan report from file
 */
export function loadReport(path: string): Report {
  if (!existsSync(path)) {
    throw new ReportLoadError(path, 'Report file not found');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ReportLoadError(path, 'Report is not valid JSON', { cause: err });
  }

  assertReport(path, parsed);
  logger.debug({ path, results: parsed.Results?.length ?? 0 }, 'Loaded scan report');
  return {
    ...parsed,
    SchemaVersion: parsed.SchemaVersion ?? 0,
    Metadata: parsed.Metadata ?? {},
  };
}
