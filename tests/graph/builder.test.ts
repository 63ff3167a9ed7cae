/**
 * Tests for attack graph generation from the fixture language and model.
 */

import { afterAll, beforeEach, describe, it, expect, vi } from 'vitest';
import { buildAttackGraph, attachAttackers } from '../../src/graph/builder.js';
import { LanguageSpecification } from '../../src/language/specification.js';
import { InstanceModel } from '../../src/model/instance-model.js';
import { languageDocumentSchema } from '../../src/storage/schema.js';
import { StepExpressionResolutionError } from '../../src/core/errors.js';
import type { AttackGraph } from '../../src/graph/attack-graph.js';
import { loadFixtures } from '../fixtures/index.js';

function node(graph: AttackGraph, fullName: string) {
  const found = graph.getNodeByFullName(fullName);
  if (!found) throw new Error(`node ${fullName} missing`);
  return found;
}

function fullNames(nodes: Iterable<{ fullName: string }>): string[] {
  return [...nodes].map((n) => n.fullName);
}

const stderrSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

beforeEach(() => {
  stderrSpy.mockClear();
});

afterAll(() => {
  stderrSpy.mockRestore();
});

describe('buildAttackGraph', () => {
  it('should create one node per attack step in model order', () => {
    const { language, model } = loadFixtures();
    const graph = buildAttackGraph(language, model);

    expect(fullNames(graph.nodes)).toEqual([
      'Internet:access',
      'WebApp:notPresent',
      'WebApp:networkConnect',
      'WebApp:attemptAccess',
      'WebApp:access',
      'WebApp:read',
      'WebApp:dataPresent',
      'WebApp:noNetwork',
      'CustomerDB:read',
      'CustomerDB:modify',
      'CardNumbers:read',
      'CardNumbers:modify',
      'CardNumbers:leak',
    ]);
    expect(graph.nodes.map((n) => n.id)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12]);
  });

  it('should link the targets of every reaches expression', () => {
    const { language, model } = loadFixtures();
    const graph = buildAttackGraph(language, model);

    expect(fullNames(node(graph, 'Internet:access').children)).toEqual(['WebApp:networkConnect']);
    expect(fullNames(node(graph, 'WebApp:access').children)).toEqual([
      'WebApp:read',
      'CustomerDB:read',
      'CardNumbers:read',
    ]);
    expect(fullNames(node(graph, 'WebApp:access').parents)).toEqual([
      'WebApp:notPresent',
      'WebApp:attemptAccess',
    ]);
    expect(fullNames(node(graph, 'WebApp:attemptAccess').parents)).toEqual([
      'WebApp:networkConnect',
      'WebApp:noNetwork',
    ]);
    expect(fullNames(node(graph, 'CardNumbers:read').children)).toEqual(['CardNumbers:leak']);
    expect(node(graph, 'CustomerDB:read').children.size).toBe(0);
  });

  it('should carry step metadata onto the nodes', () => {
    const { language, model } = loadFixtures();
    const graph = buildAttackGraph(language, model);
    const access = node(graph, 'WebApp:access');

    expect(access.type).toBe('and');
    expect([...access.tags]).toEqual(['privileged']);
    expect(access.mitreInfo).toBe('T1078');
    expect(access.asset?.name).toBe('WebApp');
    expect(node(graph, 'WebApp:attemptAccess').ttc).toEqual({
      type: 'function',
      name: 'Exponential',
      arguments: [0.1],
    });
  });

  it('should set defense status from model properties', () => {
    const { language, model } = loadFixtures();
    const graph = buildAttackGraph(language, model);
    const notPresent = node(graph, 'WebApp:notPresent');

    expect(notPresent.defenseStatus).toBe(0.0);
    expect(notPresent.isAvailableDefense()).toBe(true);
    expect(node(graph, 'WebApp:read').defenseStatus).toBeUndefined();
  });

  it('should set existence status from the first requirement', () => {
    const { language, model } = loadFixtures();
    const graph = buildAttackGraph(language, model);

    expect(node(graph, 'WebApp:dataPresent').existenceStatus).toBe(true);
    expect(node(graph, 'WebApp:noNetwork').existenceStatus).toBe(true);
    expect(node(graph, 'WebApp:access').existenceStatus).toBeUndefined();
  });

  it('should treat a numeric or true-like defense property as enabled', () => {
    const { language } = loadFixtures();
    const model = new InstanceModel('defended');
    model.addAsset('Application', 'Patched', { notPresent: 1 });
    model.addAsset('Application', 'Flagged', { notPresent: 'true' });

    const graph = buildAttackGraph(language, model);

    expect(node(graph, 'Patched:notPresent').isEnabledDefense()).toBe(true);
    expect(node(graph, 'Flagged:notPresent').defenseStatus).toBe(1.0);
    expect(node(graph, 'Flagged:dataPresent').existenceStatus).toBe(false);
  });

  it('should throw when a reaches target does not exist', () => {
    const language = new LanguageSpecification(
      languageDocumentSchema.parse({
        assets: [
          {
            name: 'Host',
            attackSteps: [
              {
                name: 'connect',
                type: 'or',
                reaches: { stepExpressions: [{ type: 'attackStep', name: 'ghost' }] },
              },
            ],
          },
        ],
      })
    );
    const model = new InstanceModel();
    model.addAsset('Host', 'Server');

    expect(() => buildAttackGraph(language, model)).toThrow(StepExpressionResolutionError);
    expect(() => buildAttackGraph(language, model)).toThrow(
      'Failed to find target node Server:ghost to link with for attack step Server:connect'
    );
  });
});

describe('attachAttackers', () => {
  it('should compromise the entry points found in the graph', () => {
    const { language, model } = loadFixtures();
    const graph = buildAttackGraph(language, model);

    const [outsider] = attachAttackers(graph, model);

    expect(outsider.id).toBe(0);
    expect(outsider.name).toBe('Outsider');
    expect(fullNames(outsider.reachedAttackSteps)).toEqual(['Internet:access']);
    expect(fullNames(outsider.entryPoints)).toEqual(['Internet:access']);
    expect(node(graph, 'Internet:access').isCompromisedBy(outsider)).toBe(true);
  });

  it('should warn about entry points missing from the graph', () => {
    const { language, model } = loadFixtures();
    const graph = buildAttackGraph(language, model);

    attachAttackers(graph, model);

    expect(stderrSpy).toHaveBeenCalledWith(
      expect.stringContaining('Failed to find entry point Internet:exfiltrate for attacker "Outsider"')
    );
  });
});
