import chalk from 'chalk';
import type { Component, ComponentType } from '../sbom/component.js';

export interface GraphSummary {
  components: number;
  vulnerabilities: number;
  byType: Partial<Record<ComponentType, number>>;
}

interface TreeLine {
  component: Component;
  prefix: string;
  connector: string;
  childPrefix: string;
}

function typeToColor(type: ComponentType | undefined): (s: string) => string {
  if (type === 'container') return chalk.magenta;
  if (type === 'operating-system') return chalk.blue;
  if (type === 'application') return chalk.cyan;
  return chalk.dim;
}

function label(component: Component): string {
  const name = component.group ? `${component.group}/${component.name}` : component.name;
  return component.version ? `${name} ${component.version}` : name;
}

function vulnSuffix(component: Component): string {
  const count = component.vulnerabilities?.length ?? 0;
  if (count === 0) return '';
  return ' ' + chalk.red(`[${count} vulnerabilit${count !== 1 ? 'ies' : 'y'}]`);
}

/**
 * Render the graph as an indented tree, one line per visit.
 * A component already printed is shown again with "(see above)" instead of
 * its subtree, which also stops at cycles.
 */
export function renderTree(root: Component): string[] {
  const lines: string[] = [];
  const printed = new Set<Component>();
  const pending: TreeLine[] = [{ component: root, prefix: '', connector: '', childPrefix: '' }];

  while (pending.length > 0) {
    const next = pending.pop();
    if (!next) break;
    const { component, prefix, connector, childPrefix } = next;
    const type = component.type && component.type !== 'library' ? ' ' + typeToColor(component.type)(`(${component.type})`) : '';
    if (printed.has(component)) {
      lines.push(`${prefix}${connector}${label(component)}${type} ${chalk.dim('(see above)')}`);
      continue;
    }
    printed.add(component);
    lines.push(`${prefix}${connector}${label(component)}${type}${vulnSuffix(component)}`);

    // Reversed so the first child is printed first
    const last = component.components.length - 1;
    for (let index = last; index >= 0; index--) {
      pending.push({
        component: component.components[index],
        prefix: prefix + childPrefix,
        connector: index === last ? '└── ' : '├── ',
        childPrefix: index === last ? '    ' : '│   ',
      });
    }
  }

  return lines;
}

/** Count distinct components and the vulnerabilities attached to them */
export function summarize(root: Component): GraphSummary {
  const seen = new Set<Component>();
  const byType: Partial<Record<ComponentType, number>> = {};
  let vulnerabilities = 0;
  const stack: Component[] = [root];

  while (stack.length > 0) {
    const next = stack.pop();
    if (!next || seen.has(next)) continue;
    seen.add(next);
    vulnerabilities += next.vulnerabilities?.length ?? 0;
    if (next.type) {
      byType[next.type] = (byType[next.type] ?? 0) + 1;
    }
    stack.push(...next.components);
  }

  return { components: seen.size, vulnerabilities, byType };
}

/**
 * Print the component graph for humans
 */
export function formatConsoleOutput(root: Component): void {
  for (const line of renderTree(root)) {
    console.log(line);
  }

  const { components, vulnerabilities } = summarize(root);
  const summary = `${components} component${components !== 1 ? 's' : ''}, ${vulnerabilities} vulnerabilit${vulnerabilities !== 1 ? 'ies' : 'y'}`;
  console.log('');
  console.log(vulnerabilities > 0 ? chalk.yellow(summary) : chalk.green(`✓ ${summary}`));
}
