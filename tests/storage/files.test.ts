/**
 * Tests for JSON/YAML persistence of attack graphs.
 */

import { afterAll, afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  detectFormat,
  loadAttackGraph,
  loadDocument,
  saveAttackGraph,
  saveDocument,
} from '../../src/storage/files.js';
import { buildAttackGraph, attachAttackers } from '../../src/graph/builder.js';
import { InstanceModel } from '../../src/model/instance-model.js';
import type { SerializedAttackGraph } from '../../src/storage/schema.js';
import { GraphFormatError, UnsupportedFileFormatError } from '../../src/core/errors.js';
import { loadFixtures } from '../fixtures/index.js';

const stderrSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

afterAll(() => {
  stderrSpy.mockRestore();
});

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'attackgraph-files-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function fixtureGraph() {
  const { language, model } = loadFixtures();
  const graph = buildAttackGraph(language, model);
  attachAttackers(graph, model);
  return { graph, model };
}

/**
 * A document with every step named `<id>:<name>` and no assets, edge and
 * attacker lists sorted, as a graph loaded without its model writes it.
 */
function namedById(document: SerializedAttackGraph) {
  const rename = new Map(
    document.attack_steps.map((step): [string, string] => [
      `${step.asset ?? step.id}:${step.name}`,
      `${step.id}:${step.name}`,
    ])
  );
  const names = (fullNames: string[]) => fullNames.map((name) => rename.get(name) ?? name).sort();

  return {
    attack_steps: document.attack_steps.map(({ asset: _asset, ...step }) => ({
      ...step,
      children: names(step.children),
      parents: names(step.parents),
    })),
    attackers: document.attackers.map((attacker) => ({
      ...attacker,
      entry_points: names(attacker.entry_points),
      reached_attack_steps: names(attacker.reached_attack_steps),
    })),
  };
}

describe('detectFormat', () => {
  it('should pick the format from the extension', () => {
    expect(detectFormat('graph.json')).toBe('json');
    expect(detectFormat('graph.yml')).toBe('yaml');
    expect(detectFormat('graph.YAML')).toBe('yaml');
  });

  it('should reject other extensions', () => {
    expect(() => detectFormat('graph.txt')).toThrow(UnsupportedFileFormatError);
    expect(() => detectFormat('graph')).toThrow(
      'Unknown file extension for graph, expected .json, .yml or .yaml'
    );
  });
});

describe('saveDocument', () => {
  it('should write indented JSON and create parent directories', () => {
    const filePath = join(dir, 'nested', 'out.json');

    saveDocument(filePath, { a: 1 });

    expect(readFileSync(filePath, 'utf-8')).toBe('{\n  "a": 1\n}\n');
  });

  it('should write YAML for .yml files', () => {
    const filePath = join(dir, 'out.yml');

    saveDocument(filePath, { name: 'x', ids: [1, 2] });

    expect(readFileSync(filePath, 'utf-8')).toBe('name: x\nids:\n  - 1\n  - 2\n');
  });
});

describe('loadDocument', () => {
  it('should wrap parse failures', () => {
    const filePath = join(dir, 'broken.json');
    writeFileSync(filePath, '{');

    expect(() => loadDocument(filePath)).toThrow(GraphFormatError);
  });
});

describe('attack graph round trip', () => {
  it('should restore a JSON graph with its assets', () => {
    const { graph, model } = fixtureGraph();
    const filePath = join(dir, 'graph.json');

    saveAttackGraph(graph, filePath);
    const loaded = loadAttackGraph(filePath, model);

    expect(loaded.toDict()).toEqual(graph.toDict());
    expect(loaded.getNodeByFullName('WebApp:access')?.asset).toBe(model.getAssetByName('WebApp'));
  });

  it('should restore a YAML graph with native value types', () => {
    const { graph, model } = fixtureGraph();
    const filePath = join(dir, 'graph.yml');

    saveAttackGraph(graph, filePath);
    const loaded = loadAttackGraph(filePath, model);

    expect(loaded.toDict()).toEqual(graph.toDict());
    const notPresent = loaded.getNodeByFullName('WebApp:notPresent');
    expect(notPresent?.defenseStatus).toBe(0);
    expect(loaded.getNodeByFullName('WebApp:dataPresent')?.existenceStatus).toBe(true);
  });

  it('should restore compromise state', () => {
    const { graph, model } = fixtureGraph();
    const filePath = join(dir, 'graph.json');

    saveAttackGraph(graph, filePath);
    const loaded = loadAttackGraph(filePath, model);
    const outsider = loaded.getAttackerById(0);

    expect(outsider?.name).toBe('Outsider');
    expect(loaded.getNodeByFullName('Internet:access')?.compromisedBy.size).toBe(1);
    expect([...(outsider?.entryPoints ?? [])].map((node) => node.fullName)).toEqual([
      'Internet:access',
    ]);
  });

  it('should load without a model, naming nodes by id', () => {
    const { graph } = fixtureGraph();
    const filePath = join(dir, 'graph.json');

    saveAttackGraph(graph, filePath);
    const loaded = loadAttackGraph(filePath);
    const access = loaded.getNodeById(4);

    expect(loaded.nodes).toHaveLength(13);
    expect(access?.asset).toBeUndefined();
    expect(access?.fullName).toBe('4:access');
    expect([...(access?.children ?? [])].map((node) => node.id)).toEqual([5, 8, 10]);
  });

  it('should keep every field, edge and compromise when loaded without a model', () => {
    const { graph } = fixtureGraph();
    const filePath = join(dir, 'graph.yml');

    saveAttackGraph(graph, filePath);
    const loaded = loadAttackGraph(filePath).toDict();

    expect(loaded.attack_steps.every((step) => step.asset === undefined)).toBe(true);
    expect(namedById(loaded)).toEqual(namedById(graph.toDict()));
    expect(loaded.attackers).toEqual([
      {
        id: 0,
        name: 'Outsider',
        entry_points: ['0:access'],
        reached_attack_steps: ['0:access'],
      },
    ]);
  });
});

describe('loadAttackGraph', () => {
  it('should reject a document that fails validation', () => {
    const filePath = join(dir, 'graph.json');
    writeFileSync(filePath, JSON.stringify({ attack_steps: [{ id: -1 }] }));

    expect(() => loadAttackGraph(filePath)).toThrow(GraphFormatError);
  });

  it('should reject a reference to a missing attack step', () => {
    const filePath = join(dir, 'graph.json');
    saveDocument(filePath, {
      attack_steps: [
        {
          id: 0,
          type: 'or',
          name: 'a',
          ttc: null,
          children: ['0:ghost'],
          parents: [],
          compromised_by: [],
        },
      ],
    });

    expect(() => loadAttackGraph(filePath)).toThrow(
      'Failed to find attack step 0:ghost referenced by 0:a'
    );
  });

  it('should reject an asset the model does not have', () => {
    const { graph } = fixtureGraph();
    const filePath = join(dir, 'graph.json');
    saveAttackGraph(graph, filePath);

    expect(() => loadAttackGraph(filePath, new InstanceModel('empty'))).toThrow(
      'Failed to find asset Internet for attack step Internet:access'
    );
  });
});
