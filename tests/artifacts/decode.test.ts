import { describe, it, expect } from 'vitest';
import { decodeAnnotationTree, decodeArgumentGraph, decodeInputs } from '../../src/artifacts/decode.js';
import { ValidationError } from '../../src/errors.js';

describe('decodeInputs', () => {
  it('should decode an argument graph with defaults filled in', () => {
    const [record] = decodeInputs([
      {
        kind: 'argument-graph',
        data: { arguments: [{ label: 'A', pcs: [{ kind: 'premise', label: '1', propositionLabel: 'P' }] }] },
      },
    ]);

    expect(record).toEqual({
      id: 'input-1',
      kind: 'argument-graph',
      rawSnippet: '',
      frontMatter: {},
      parsedData: {
        arguments: [{ label: 'A', gists: [], pcs: [{ kind: 'premise', label: '1', propositionLabel: 'P' }], data: {} }],
        propositions: [],
        relations: [],
      },
    });
  });

  it('should keep ids, snippets and metadata', () => {
    const [record] = decodeInputs([
      { id: 'map', kind: 'annotation-tree', data: { nodes: ['plain text'] }, snippet: 'plain text', metadata: { filename: 'map.ad' } },
    ]);

    expect(record).toMatchObject({ id: 'map', rawSnippet: 'plain text', frontMatter: { filename: 'map.ad' } });
    expect(record.parsedData).toEqual({ nodes: ['plain text'] });
  });

  it('should number records by position', () => {
    const records = decodeInputs([
      { kind: 'annotation-tree', data: { nodes: [] } },
      { kind: 'annotation-tree', data: { nodes: [] } },
    ]);

    expect(records.map((r) => r.id)).toEqual(['input-1', 'input-2']);
  });

  it('should reject duplicate ids', () => {
    expect(() =>
      decodeInputs([
        { id: 'a', kind: 'annotation-tree', data: {} },
        { id: 'a', kind: 'annotation-tree', data: {} },
      ])
    ).toThrow('inputs[1].id "a" is used more than once');
  });

  it('should reject anything but an array of inputs', () => {
    expect(() => decodeInputs({})).toThrow(ValidationError);
    expect(() => decodeInputs({})).toThrow('inputs must be an array');
  });

  it('should reject unknown artifact kinds', () => {
    expect(() => decodeInputs([{ kind: 'outline', data: {} }])).toThrow(
      'inputs[0].kind must be one of: argument-graph, annotation-tree'
    );
  });

  it('should reject non-string metadata', () => {
    expect(() => decodeInputs([{ kind: 'annotation-tree', data: {}, metadata: { filename: 3 } }])).toThrow(
      'inputs[0].metadata.filename must be a string'
    );
  });
});

describe('decodeArgumentGraph', () => {
  it('should name the path of a malformed entry', () => {
    expect(() => decodeArgumentGraph({ arguments: [{ label: 'A' }, { label: 5 }] })).toThrow(
      'data.arguments[1].label must be a string'
    );
  });

  it('should validate relation valences and dialectics', () => {
    expect(() =>
      decodeArgumentGraph({ relations: [{ source: 'a', target: 'b', valence: 'undercut' }] })
    ).toThrow('data.relations[0].valence must be one of: support, attack, contradict');
    expect(() =>
      decodeArgumentGraph({ relations: [{ source: 'a', target: 'b', valence: 'attack', dialectics: ['implied'] }] })
    ).toThrow('data.relations[0].dialectics[0] must be one of: grounded, sketched, axiomatic');
  });

  it('should give conclusions their inference data', () => {
    const g = decodeArgumentGraph({
      arguments: [
        {
          label: null,
          pcs: [
            { kind: 'premise', label: '1', propositionLabel: 'P' },
            { kind: 'conclusion', label: '2', propositionLabel: 'C', inferenceData: { from: ['1'] } },
            { kind: 'conclusion', label: '3', propositionLabel: 'D' },
          ],
        },
      ],
    });

    expect(g.arguments[0].label).toBeNull();
    expect(g.arguments[0].pcs.slice(1)).toEqual([
      { kind: 'conclusion', label: '2', propositionLabel: 'C', inferenceData: { from: ['1'] } },
      { kind: 'conclusion', label: '3', propositionLabel: 'D', inferenceData: {} },
    ]);
  });
});

describe('decodeAnnotationTree', () => {
  it('should decode nested elements', () => {
    expect(
      decodeAnnotationTree({
        nodes: ['a ', { tag: 'proposition', attributes: { id: '1' }, children: ['b'] }],
      })
    ).toEqual({ nodes: ['a ', { tag: 'proposition', attributes: { id: '1' }, children: ['b'] }] });
  });

  it('should name the path of a malformed element', () => {
    expect(() => decodeAnnotationTree({ nodes: [{ children: [{ attributes: {} }] }] })).toThrow(
      'data.nodes[0].tag must be a string'
    );
    expect(() => decodeAnnotationTree({ nodes: [{ tag: 'p', children: [{ children: [] }] }] })).toThrow(
      'data.nodes[0].children[0].tag must be a string'
    );
  });

  it('should refuse trees nested beyond the depth limit', () => {
    let node: unknown = 'leaf';
    for (let i = 0; i < 70; i++) node = { tag: 'span', children: [node] };

    expect(() => decodeAnnotationTree({ nodes: [node] })).toThrow(/is nested too deeply$/);
  });
});
