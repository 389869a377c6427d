import type { Component } from '../sbom/component.js';
import type { ComponentJson, ComponentRefJson, GraphJson } from '../types.js';

export const TOOL_NAME = 'bomgraph';
export const TOOL_VERSION = '0.1.0';

class RefAllocator {
  private readonly byComponent = new Map<Component, string>();
  private readonly used = new Set<string>();

  get(component: Component): string | undefined {
    return this.byComponent.get(component);
  }

  /**
   * Purl when it's still free, then name@version, then a numbered suffix.
   */
  assign(component: Component): string {
    const purl = component.purl?.toString();
    const label = component.version ? `${component.name}@${component.version}` : component.name;
    let ref = purl && !this.used.has(purl) ? purl : label;
    for (let n = 2; this.used.has(ref); n++) {
      ref = `${label}#${n}`;
    }
    this.used.add(ref);
    this.byComponent.set(component, ref);
    return ref;
  }
}

type Entry = ComponentJson | ComponentRefJson;

interface Pending {
  component: Component;
  siblings: Entry[];
}

function toNode(component: Component, refs: RefAllocator): ComponentJson {
  const node: ComponentJson = {
    'bom-ref': refs.assign(component),
    type: component.type,
    name: component.name,
    group: component.group,
    version: component.version,
    purl: component.purl?.toString(),
    supplier: component.supplier,
    licenses: component.licenses,
    hashes: component.hashes,
  };
  if (component.properties.length > 0) {
    node.properties = component.properties.map((p) => ({ name: p.namespace + p.name, value: p.value }));
  }
  if (component.vulnerabilities?.length) {
    node.vulnerabilities = component.vulnerabilities.map((v) => v.VulnerabilityID);
  }
  return node;
}

// Children are pushed in reverse so they're written in order, depth first
function expand(component: Component, node: ComponentJson, pending: Pending[]): void {
  if (component.components.length === 0) return;
  const siblings: Entry[] = [];
  node.components = siblings;
  for (const child of [...component.components].reverse()) {
    pending.push({ component: child, siblings });
  }
}

function toJson(root: Component, refs: RefAllocator): ComponentJson {
  const pending: Pending[] = [];
  const top = toNode(root, refs);
  expand(root, top, pending);

  while (pending.length > 0) {
    const next = pending.pop();
    if (!next) break;
    const existing = refs.get(next.component);
    if (existing) {
      next.siblings.push({ ref: existing });
      continue;
    }
    const node = toNode(next.component, refs);
    next.siblings.push(node);
    expand(next.component, node, pending);
  }
  return top;
}

/**
 * Serialize the component graph. A component reached a second time, through a
 * shared dependency or a cycle, is written as `{ "ref": <bom-ref> }`.
 */
export function formatJsonOutput(root: Component, opts: { timestamp?: string } = {}): GraphJson {
  return {
    metadata: {
      timestamp: opts.timestamp ?? new Date().toISOString(),
      tool: { name: TOOL_NAME, version: TOOL_VERSION },
    },
    component: toJson(root, new RefAllocator()),
  };
}
