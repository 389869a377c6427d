import type { Metadata, Result, TargetType } from '../types.js';
import type { Component } from './component.js';
import { marshalPackages, type MarshalPackagesOptions } from './packages.js';
import { filterProperties, property, PropertyClass, PropertyType } from './properties.js';

/**
 * Language package types found outside any lock file (installed node_modules,
 * site-packages, gemspecs, jars, conda metadata).
 */
export const FLOATING_TYPES: ReadonlySet<TargetType> = new Set([
  'node-pkg',
  'python-pkg',
  'gemspec',
  'jar',
  'conda-pkg',
]);

/**
 * Components contributed by one result to the root.
 *
 * Floating packages hang straight off the root:
 *   Container (alpine:3.15)
 *     -> Library (express 4.17.3)
 *     -> Library (django 4.0.2)
 *
 * OS packages go under an operating system node, lock file packages under an
 * application node named after the lock file:
 *   Container (alpine:3.15)
 *     -> Operating System (alpine 3.15)
 *       -> Library (bash 4.12)
 *     -> Application (/app/package-lock.json)
 *       -> Library (express 4.17.3)
 *
 * Results of any other class (config, secret, license) contribute nothing.
 */
export function marshalResult(
  metadata: Metadata,
  result: Result,
  opts: MarshalPackagesOptions = {},
): Component[] {
  if (result.Type && FLOATING_TYPES.has(result.Type)) {
    return marshalPackages(result, opts);
  }
  if (result.Class === 'os-pkgs' || result.Class === 'lang-pkgs') {
    const component = resultComponent(result, metadata);
    component.components = marshalPackages(result, opts);
    return [component];
  }
  return [];
}

export function resultComponent(result: Result, metadata: Metadata): Component {
  const component: Component = {
    name: result.Target,
    properties: filterProperties([property(PropertyType, result.Type), property(PropertyClass, result.Class)]),
    components: [],
  };

  switch (result.Class) {
    case 'os-pkgs':
      if (metadata.OS) {
        component.name = metadata.OS.Family;
        component.version = metadata.OS.Name || undefined;
      }
      component.type = 'operating-system';
      break;
    case 'lang-pkgs':
      component.type = 'application';
      break;
  }

  return component;
}
