import type { PackageURL } from 'packageurl-js';
import type { DetectedVulnerability } from '../types.js';

export type ComponentType = 'container' | 'operating-system' | 'application' | 'library';

export const COMPONENT_TYPES: readonly ComponentType[] = [
  'container',
  'operating-system',
  'application',
  'library',
];

/** Prefix for every property this tool writes */
export const NAMESPACE = 'bomgraph:';

export interface Property {
  /** Empty for foreign properties re-emitted verbatim from passthrough input */
  namespace: string;
  name: string;
  value: string;
}

/**
 * A node of the component graph.
 *
 * Children are shared by reference: the same package component can sit under
 * several parents, and a dependency cycle makes the graph cyclic. Consumers
 * walking it must track visited nodes.
 */
export interface Component {
  type?: ComponentType;
  name: string;
  group?: string;
  version?: string;
  purl?: PackageURL;
  supplier?: string;
  licenses?: string[];
  hashes?: string[];
  properties: Property[];
  vulnerabilities?: DetectedVulnerability[];
  components: Component[];
}

export function isComponentType(value: string | undefined): value is ComponentType {
  return COMPONENT_TYPES.some((t) => t === value);
}
