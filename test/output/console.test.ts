import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import chalk from 'chalk';
import { formatConsoleOutput, renderTree, summarize } from '../../src/output/console.js';
import { marshalReport } from '../../src/core/marshal.js';
import type { Component } from '../../src/sbom/component.js';
import { npmPkg, pkg, report, result, vuln } from '../helpers/fixtures.js';

function sampleGraph(): Component {
  return marshalReport(
    report({
      Results: [
        result({ Target: 'alpine:3.15 (alpine 3.15)', Class: 'os-pkgs', Type: 'alpine', Packages: [pkg('bash', '4.12')] }),
        result({
          Packages: [
            npmPkg('express', '4.17.3', { DependsOn: ['accepts@1.3.8', 'qs@6.9.6'] }),
            npmPkg('body-parser', '1.19.2', { DependsOn: ['qs@6.9.6'] }),
            npmPkg('accepts', '1.3.8', { Indirect: true }),
            npmPkg('qs', '6.9.6', { Indirect: true }),
          ],
          Vulnerabilities: [vuln('CVE-2022-24999', 'qs', '6.9.6'), vuln('CVE-2024-45590', 'body-parser', '1.19.2')],
        }),
      ],
    }),
  );
}

describe('output/console', () => {
  let consoleLogSpy: MockInstance<typeof console.log>;
  let previousLevel: typeof chalk.level;

  beforeEach(() => {
    previousLevel = chalk.level;
    chalk.level = 0;
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    chalk.level = previousLevel;
    consoleLogSpy.mockRestore();
  });

  describe('renderTree', () => {
    it('draws the graph and marks components seen before', () => {
      expect(renderTree(sampleGraph())).toEqual([
        'alpine:3.15 (container)',
        '├── alpine 3.15 (operating-system)',
        '│   └── bash 4.12',
        '└── /app/package-lock.json (application)',
        '    ├── express 4.17.3',
        '    │   ├── accepts 1.3.8',
        '    │   └── qs 6.9.6 [1 vulnerability]',
        '    └── body-parser 1.19.2 [1 vulnerability]',
        '        └── qs 6.9.6 (see above)',
      ]);
    });

    it('stops at cycles', () => {
      const a: Component = { type: 'library', name: 'a', version: '1', properties: [], components: [] };
      const b: Component = { type: 'library', name: 'b', version: '1', properties: [], components: [a] };
      a.components.push(b);

      expect(renderTree(a)).toEqual(['a 1', '└── b 1', '    └── a 1 (see above)']);
    });

    it('renders a very deep chain', () => {
      const root: Component = { type: 'library', name: 'dep0', version: '1', properties: [], components: [] };
      let tail = root;
      for (let i = 1; i < 5000; i++) {
        const next: Component = { type: 'library', name: `dep${i}`, version: '1', properties: [], components: [] };
        tail.components.push(next);
        tail = next;
      }

      const lines = renderTree(root);

      expect(lines).toHaveLength(5000);
      expect(lines[2]).toBe('    └── dep2 1');
      expect(lines[4999]).toBe(`${'    '.repeat(4998)}└── dep4999 1`);
    });

    it('prefixes the group', () => {
      const scoped: Component = { type: 'library', name: 'core', group: '@babel', version: '7.24.0', properties: [], components: [] };

      expect(renderTree(scoped)).toEqual(['@babel/core 7.24.0']);
    });
  });

  describe('summarize', () => {
    it('counts each shared component once', () => {
      expect(summarize(sampleGraph())).toEqual({
        components: 8,
        vulnerabilities: 2,
        byType: { container: 1, 'operating-system': 1, application: 1, library: 5 },
      });
    });
  });

  describe('formatConsoleOutput', () => {
    it('prints the tree followed by a summary', () => {
      formatConsoleOutput(sampleGraph());

      expect(consoleLogSpy).toHaveBeenCalledWith('alpine:3.15 (container)');
      expect(consoleLogSpy).toHaveBeenLastCalledWith('8 components, 2 vulnerabilities');
    });

    it('reports a clean graph', () => {
      formatConsoleOutput({ type: 'application', name: '/src', properties: [], components: [] });

      expect(consoleLogSpy).toHaveBeenLastCalledWith('✓ 1 component, 0 vulnerabilities');
    });
  });
});
