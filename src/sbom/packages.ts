import type { DetectedVulnerability, Package, Result, TargetType } from '../types.js';
import { logger } from '../utils/logger.js';
import type { Component } from './component.js';
import { componentIdentity } from './identity.js';
import {
  filterProperties,
  property,
  PropertyFilePath,
  PropertyLayerDiffID,
  PropertyLayerDigest,
  PropertyModularitylabel,
  PropertyPkgID,
  PropertyPkgType,
  PropertySrcEpoch,
  PropertySrcName,
  PropertySrcRelease,
  PropertySrcVersion,
} from './properties.js';
import { withPath } from './purl.js';

export interface MarshalPackagesOptions {
  /** Called once for each package that cannot be converted. Defaults to a logged warning. */
  onSkip?: (pkgId: string, err: unknown) => void;
}

/**
 * Version with epoch and release folded in, e.g. "1:2.4.0-r3".
 */
export function formatVersion(pkg: Package): string {
  let version = pkg.Version;
  if (pkg.Release) {
    version = `${version}-${pkg.Release}`;
  }
  if (pkg.Epoch) {
    version = `${pkg.Epoch}:${version}`;
  }
  return version;
}

/** Packages without a natural ID are keyed by name and formatted version */
export function packageId(pkg: Package): string {
  return pkg.ID || `${pkg.Name}@${formatVersion(pkg)}`;
}

/** Vulnerabilities without a package ID are keyed like `packageId` */
export function vulnerabilityKey(vuln: DetectedVulnerability): string {
  return vuln.PkgID || `${vuln.PkgName}@${vuln.InstalledVersion}`;
}

/**
 * Inverse of DependsOn: for each package ID, the IDs of the packages that
 * depend on it within the same list.
 */
export function parentDeps(packages: readonly Package[]): Map<string, string[]> {
  const parents = new Map<string, string[]>();
  for (const pkg of packages) {
    const parentId = packageId(pkg);
    for (const dep of pkg.DependsOn ?? []) {
      const list = parents.get(dep);
      if (list) {
        list.push(parentId);
        continue;
      }
      parents.set(dep, [parentId]);
    }
  }
  return parents;
}

function groupVulnerabilities(vulns: readonly DetectedVulnerability[]): Map<string, DetectedVulnerability[]> {
  const byKey = new Map<string, DetectedVulnerability[]>();
  for (const vuln of vulns) {
    const key = vulnerabilityKey(vuln);
    const list = byKey.get(key);
    if (list) {
      list.push(vuln);
      continue;
    }
    byKey.set(key, [vuln]);
  }
  return byKey;
}

/**
 * Build the dependency forest of one result.
 *
 * Each package ID maps to exactly one component, shared by every parent that
 * depends on it. Indirect packages are reached through their parents and only
 * become roots when nothing in this result depends on them.
 */
export function marshalPackages(result: Result, opts: MarshalPackagesOptions = {}): Component[] {
  const packages = result.Packages ?? [];
  const parents = parentDeps(packages);
  const vulns = groupVulnerabilities(result.Vulnerabilities ?? []);
  const onSkip =
    opts.onSkip ??
    ((pkgId: string, err: unknown) => {
      logger.warn({ err, pkgId, target: result.Target }, 'Skipping package that cannot be converted to a component');
    });

  // A later duplicate replaces the package data but keeps the first position
  const pkgs = new Map<string, Package>();
  for (const pkg of packages) {
    pkgs.set(packageId(pkg), pkg);
  }

  const built = new Map<string, Component>();
  const skipped = new Set<string>();

  const build = (id: string, pkg: Package): Component | undefined => {
    const existing = built.get(id);
    if (existing) {
      return existing;
    }
    if (skipped.has(id)) {
      return undefined;
    }

    let component: Component;
    try {
      component = pkgComponent(id, pkg, result.Type, vulns.get(id));
    } catch (err) {
      skipped.add(id);
      onSkip(id, err);
      return undefined;
    }

    // Registered before descending so that a cycle ends at this node
    built.set(id, component);

    for (const dep of pkg.DependsOn ?? []) {
      const childPkg = pkgs.get(dep);
      if (!childPkg) {
        continue;
      }
      const child = build(dep, childPkg);
      if (child && !component.components.includes(child)) {
        component.components.push(child);
      }
    }
    return component;
  };

  const roots: Component[] = [];
  for (const [id, pkg] of pkgs) {
    if (pkg.Indirect && (parents.get(id)?.length ?? 0) > 0) {
      continue;
    }
    const component = build(id, pkg);
    if (component) {
      roots.push(component);
    }
  }
  return roots;
}

function pkgComponent(
  id: string,
  pkg: Package,
  type: TargetType | undefined,
  vulnerabilities: DetectedVulnerability[] | undefined,
): Component {
  const { name, group, version, purl } = componentIdentity(pkg);

  const properties = filterProperties([
    property(PropertyPkgID, id),
    property(PropertyPkgType, type),
    property(PropertyFilePath, pkg.FilePath),
    property(PropertySrcName, pkg.SrcName),
    property(PropertySrcVersion, pkg.SrcVersion),
    property(PropertySrcRelease, pkg.SrcRelease),
    property(PropertySrcEpoch, pkg.SrcEpoch),
    property(PropertyModularitylabel, pkg.Modularitylabel),
    property(PropertyLayerDigest, pkg.Layer?.Digest),
    property(PropertyLayerDiffID, pkg.Layer?.DiffID),
  ]);

  return {
    type: 'library',
    name,
    group: group || undefined,
    version: version || undefined,
    purl: withPath(purl, pkg.FilePath),
    supplier: pkg.Maintainer || undefined,
    licenses: pkg.Licenses?.length ? [...pkg.Licenses] : undefined,
    hashes: pkg.Digest ? [pkg.Digest] : undefined,
    properties,
    vulnerabilities,
    components: [],
  };
}
