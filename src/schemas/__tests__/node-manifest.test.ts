import { describe, test, expect } from 'vitest';
import { isNodeManifest, manifestToRegistry } from '../../utils/node-manifest.js';

describe('Node Manifest Schema', () => {
  test('validates a manifest with no nodes', () => {
    expect(isNodeManifest({ nodes: {} })).toBe(true);
  });

  test('validates a manifest with all fields', () => {
    const manifest = {
      $schema: './node_modules/node-compat/src/schemas/node-manifest.schema.json',
      nodes: {
        LoadImage: {
          returnTypes: ['IMAGE', 'MASK'],
          className: 'LoadImage',
          description: 'Loads an image and its alpha mask',
        },
        PreviewImage: {},
      },
    };
    expect(isNodeManifest(manifest)).toBe(true);
  });

  test('rejects a manifest missing nodes', () => {
    expect(isNodeManifest({})).toBe(false);
  });

  test('rejects return types that are not a list of names', () => {
    expect(isNodeManifest({ nodes: { A: { returnTypes: 'IMAGE' } } })).toBe(false);
    expect(isNodeManifest({ nodes: { A: { returnTypes: [1] } } })).toBe(false);
    expect(isNodeManifest({ nodes: { A: { returnTypes: [''] } } })).toBe(false);
  });

  test('rejects unknown fields', () => {
    expect(isNodeManifest({ nodes: { A: { inputTypes: [] } } })).toBe(false);
    expect(isNodeManifest({ nodes: {}, version: 2 })).toBe(false);
  });

  test('rejects an empty identifier', () => {
    expect(isNodeManifest({ nodes: { '': {} } })).toBe(false);
  });

  test('converts a manifest into a registry', () => {
    const registry = manifestToRegistry(
      { nodes: { Sampler: { returnTypes: ['LATENT'], className: 'KSampler' }, Save: {} } },
      'node-manifest.json'
    );

    expect([...registry.values()]).toEqual([
      { identifier: 'Sampler', returnTypes: ['LATENT'], className: 'KSampler', sourceFile: 'node-manifest.json' },
      { identifier: 'Save', returnTypes: [], className: undefined, sourceFile: 'node-manifest.json' },
    ]);
  });

  test('freezes the declarations it builds', () => {
    const registry = manifestToRegistry({ nodes: { Sampler: { returnTypes: ['LATENT'] } } }, 'node-manifest.json');
    const sampler = registry.get('Sampler');

    expect(Object.isFrozen(sampler)).toBe(true);
    expect(Object.isFrozen(sampler?.returnTypes)).toBe(true);
  });
});
