import type { Report } from '../types.js';
import type { Component } from '../sbom/component.js';
import type { MarshalPackagesOptions } from '../sbom/packages.js';
import { marshalResult } from '../sbom/result.js';
import { rootComponent } from '../sbom/root.js';
import { logger } from '../utils/logger.js';

export type MarshalOptions = MarshalPackagesOptions;

/**
 * Raised when no SBOM can be produced for a report
 */
export class MarshalError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'MarshalError';
  }
}

/**
 * Build the component graph of a report.
 *
 * The root stands for the scanned artifact; its children are the components
 * of each result, in result order. The report is not modified.
 */
export function marshalReport(report: Report, opts: MarshalOptions = {}): Component {
  let root: Component;
  try {
    root = rootComponent(report);
  } catch (err) {
    throw new MarshalError('failed to marshal report', { cause: err });
  }

  const results = report.Results ?? [];
  for (const result of results) {
    const components = marshalResult(report.Metadata, result, opts);
    root.components.push(...components);
  }

  logger.debug(
    { artifact: report.ArtifactName, results: results.length, components: root.components.length },
    'Built component graph',
  );
  return root;
}
