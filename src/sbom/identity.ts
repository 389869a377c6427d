import type { PackageURL } from 'packageurl-js';
import type { Package } from '../types.js';
import { parsePurl, TypeMaven, TypeNPM } from './purl.js';

export interface ComponentIdentity {
  name: string;
  /** Maven group ID or npm scope */
  group: string;
  version: string;
  purl?: PackageURL;
}

/**
 * Name, group and version of a package as it appears in the SBOM.
 *
 * The version comes from the purl when there is one, since it holds the
 * resolved version. Maven and npm are the two ecosystems whose purl namespace
 * is a real grouping (group ID, scope), so only they get a group.
 * Local packages (e.g. a workspace package resolved from a local path) have no purl.
 *
 * @throws PackageUrlError when the package carries a malformed purl
 */
export function componentIdentity(pkg: Package): ComponentIdentity {
  const raw = pkg.Identifier?.PURL;
  if (!raw) {
    return { name: pkg.Name, group: '', version: pkg.Version };
  }

  const purl = parsePurl(raw);
  const version = purl.version ?? '';
  if (purl.type === TypeMaven || purl.type === TypeNPM) {
    return { name: purl.name, group: purl.namespace ?? '', version, purl };
  }
  return { name: pkg.Name, group: '', version, purl };
}
