/**
 * Report fixtures shared across test suites.
 *
 * Each factory fills in the fields a report needs and lets the test override
 * only what it cares about.
 */

import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type { Component } from '../../src/sbom/component.js';
import type { DetectedVulnerability, Package, Report, Result } from '../../src/types.js';

export const ALPINE_DIGEST = `sha256:${'a'.repeat(64)}`;

export function pkg(name: string, version: string, overrides: Partial<Package> = {}): Package {
  return {
    ID: `${name}@${version}`,
    Name: name,
    Version: version,
    ...overrides,
  };
}

export function npmPkg(name: string, version: string, overrides: Partial<Package> = {}): Package {
  return pkg(name, version, {
    Identifier: { PURL: `pkg:npm/${name}@${version}` },
    ...overrides,
  });
}

export function vuln(id: string, pkgName: string, installedVersion: string, overrides: Partial<DetectedVulnerability> = {}): DetectedVulnerability {
  return {
    VulnerabilityID: id,
    PkgID: `${pkgName}@${installedVersion}`,
    PkgName: pkgName,
    InstalledVersion: installedVersion,
    Severity: 'HIGH',
    ...overrides,
  };
}

export function result(overrides: Partial<Result> = {}): Result {
  return {
    Target: '/app/package-lock.json',
    Class: 'lang-pkgs',
    Type: 'npm',
    Packages: [],
    ...overrides,
  };
}

export function report(overrides: Partial<Report> = {}): Report {
  return {
    SchemaVersion: 2,
    ArtifactName: 'alpine:3.15',
    ArtifactType: 'container_image',
    Metadata: {
      ImageID: 'sha256:c059bfaa849c4d8e4aecaeb3a10c2d9b3d85f5165c66ad3a4d937758128c4d18',
      OS: { Family: 'alpine', Name: '3.15' },
    },
    Results: [],
    ...overrides,
  };
}

/** Find a direct child by name, failing the test when it's missing */
export function child(component: Component, name: string): Component {
  const found = component.components.find((c) => c.name === name);
  if (!found) {
    throw new Error(`${component.name} has no child named ${name}`);
  }
  return found;
}

export function propertyValue(component: Component, name: string): string | undefined {
  return component.properties.find((p) => p.name === name)?.value;
}

/**
 * Creates a temporary directory and executes a test function within it,
 * removing it afterwards.
 */
export async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = mkdtempSync(join(tmpdir(), 'bomgraph-test-'));
  try {
    await fn(dir);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
}
