import { PackageURL } from 'packageurl-js';
import type { Metadata } from '../types.js';

export const TypeMaven = 'maven';
export const TypeNPM = 'npm';
export const TypeOCI = 'oci';

const DEFAULT_REGISTRY = 'index.docker.io';
const DIGEST_PATTERN = /^sha256:[a-f0-9]{64}$/;
const REGISTRY_PATTERN = /^[a-zA-Z0-9.-]+(?::[0-9]+)?$/;
const PATH_COMPONENT_PATTERN = /^[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*$/;

/**
 * Raised when a package URL cannot be parsed or built.
 */
export class PackageUrlError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PackageUrlError';
  }
}

export function parsePurl(value: string): PackageURL {
  try {
    return PackageURL.fromString(value);
  } catch (err) {
    throw new PackageUrlError(`failed to parse purl "${value}"`, { cause: err });
  }
}

/**
 * Jar coordinates don't say where the archive lives, so maven purls carry the
 * file path as a qualifier. Other purls are returned as-is.
 */
export function withPath(purl: PackageURL | undefined, filePath: string | undefined): PackageURL | undefined {
  if (!purl || !filePath || purl.type !== TypeMaven) {
    return purl;
  }
  return new PackageURL(
    purl.type,
    purl.namespace ?? undefined,
    purl.name,
    purl.version ?? undefined,
    { ...(purl.qualifiers ?? {}), file_path: filePath },
    purl.subpath ?? undefined,
  );
}

interface ImageDigest {
  /** Fully qualified repository, e.g. index.docker.io/library/alpine */
  repository: string;
  digest: string;
}

/**
 * Parse a repo digest such as "alpine@sha256:…" or "ghcr.io/acme/api@sha256:…",
 * applying Docker Hub defaults to unqualified repositories.
 */
export function parseImageDigest(ref: string): ImageDigest {
  const at = ref.lastIndexOf('@');
  if (at <= 0) {
    throw new PackageUrlError(`invalid repo digest "${ref}": missing digest`);
  }
  const digest = ref.slice(at + 1);
  if (!DIGEST_PATTERN.test(digest)) {
    throw new PackageUrlError(`invalid repo digest "${ref}": unsupported digest "${digest}"`);
  }

  const segments = ref.slice(0, at).split('/');
  let registry = DEFAULT_REGISTRY;
  const first = segments[0];
  if (segments.length > 1 && (first.includes('.') || first.includes(':') || first === 'localhost')) {
    registry = first === 'docker.io' ? DEFAULT_REGISTRY : first;
    segments.shift();
  }
  if (!REGISTRY_PATTERN.test(registry)) {
    throw new PackageUrlError(`invalid repo digest "${ref}": bad registry "${registry}"`);
  }
  if (segments.some((segment) => !PATH_COMPONENT_PATTERN.test(segment))) {
    throw new PackageUrlError(`invalid repo digest "${ref}": bad repository name`);
  }
  if (registry === DEFAULT_REGISTRY && segments.length === 1) {
    segments.unshift('library');
  }

  return { repository: `${registry}/${segments.join('/')}`, digest };
}

/**
 * Package URL of a container image, built from its first repo digest.
 * Images that were never pushed have no repo digest and get no purl.
 */
export function ociPurl(metadata: Metadata): PackageURL | undefined {
  const repoDigest = metadata.RepoDigests?.[0];
  if (!repoDigest) {
    return undefined;
  }

  const { repository, digest } = parseImageDigest(repoDigest);
  const name = repository.slice(repository.lastIndexOf('/') + 1).toLowerCase();

  const qualifiers: Record<string, string> = { repository_url: repository };
  const arch = metadata.ImageConfig?.architecture;
  if (arch) {
    qualifiers.arch = arch;
  }

  try {
    return new PackageURL(TypeOCI, undefined, name, digest, qualifiers, undefined);
  } catch (err) {
    throw new PackageUrlError(`failed to build oci purl for "${repoDigest}"`, { cause: err });
  }
}
