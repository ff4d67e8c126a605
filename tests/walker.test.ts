import { describe, expect, it, vi } from 'vitest';
import { OptionsError, RenderError, StructuralError } from '../src/core/errors.js';
import type { DicomDataSet, DicomElement } from '../src/core/types.js';
import { walkDataSet } from '../src/core/walker.js';
import type { TreeNode } from '../src/sinks/treeSink.js';
import { createDictionary, createNameResolver } from '../src/utils/dictionary.js';
import { createTag } from '../src/utils/tagUtils.js';
import { buildTree, renderLines } from '../src/view.js';
import { bytes, dataset, multi, nested, RecordingSink, scalar, sequence } from './helpers.js';

const resolveName = createNameResolver(
  createDictionary({
    '00081115': { name: 'Referenced Series Sequence', vr: 'SQ' },
    '0020000E': { name: 'Series Instance UID', vr: 'UI' },
    '00100010': { name: "Patient's Name", vr: 'PN' },
    '00100020': { name: 'Patient ID', vr: 'LO' },
    '7FE00010': { name: 'Pixel Data', vr: 'OB or OW' },
  })
);

const patient = dataset(scalar(0x0010, 0x0010, 'PN', 'DOE^JOHN'), scalar(0x0010, 0x0020, 'LO', '123456'));

const series = dataset(
  sequence(0x0008, 0x1115, [
    dataset(scalar(0x0020, 0x000e, 'UI', '1.2.3')),
    dataset(scalar(0x0020, 0x000e, 'UI', '1.2.4')),
  ])
);

function brokenElement(): DicomElement {
  return {
    tag: createTag(0x0010, 0x1000),
    vr: 'LO',
    value: { kind: 'multi', values: [{}] },
  } as unknown as DicomElement;
}

describe('walkDataSet', () => {
  it('renders a flat dataset in order', () => {
    expect(renderLines(patient, { resolveName })).toEqual([
      "(0010,0010) | Patient's Name | PN | DOE^JOHN",
      '(0010,0020) | Patient ID | LO | 123456',
    ]);
  });

  it('hides pixel data behind a placeholder', () => {
    const image = dataset(bytes(0x7fe0, 0x0010, 'OB', new Uint8Array(10000)));
    expect(renderLines(image, { resolveName })).toEqual(['(7FE0,0010) | Pixel Data | OB | <binary, 10000 bytes>']);
  });

  it('nests sequence items under their element', () => {
    expect(renderLines(series, { resolveName })).toEqual([
      '(0008,1115) | Referenced Series Sequence | SQ | <sequence, 2 items>',
      '  [Item 1]',
      '    (0020,000E) | Series Instance UID | UI | 1.2.3',
      '  [Item 2]',
      '    (0020,000E) | Series Instance UID | UI | 1.2.4',
    ]);
  });

  it('brackets children with begin and end calls', () => {
    const sink = new RecordingSink();
    walkDataSet(series, sink);
    expect(sink.events).toEqual([
      'element <sequence, 2 items>',
      'begin',
      'item 1',
      'begin',
      'element 1.2.3',
      'end',
      'item 2',
      'begin',
      'element 1.2.4',
      'end',
      'end',
    ]);
    expect(sink.records[1]).toEqual({ kind: 'item', depth: 1, index: 1, size: 1 });
  });

  it('falls back to Unknown without a dictionary', () => {
    const lines = renderLines(dataset(multi(0x0008, 0x0008, 'CS', ['ORIGINAL', 'PRIMARY'])));
    expect(lines).toEqual(['(0008,0008) | Unknown | CS | ORIGINAL\\PRIMARY']);
  });

  it('prefers a name carried by the element', () => {
    const named: DicomElement = { ...scalar(0x0009, 0x1001, 'LO', 'x'), name: 'Vendor Field' };
    expect(renderLines(dataset(named), { resolveName })).toEqual(['(0009,1001) | Vendor Field | LO | x']);
  });

  it('emits one top-level record per root element', () => {
    const root = dataset(
      scalar(0x0010, 0x0010, 'PN', 'DOE^JOHN'),
      sequence(0x0008, 0x1115, [dataset(), dataset(), dataset()]),
      scalar(0x0010, 0x0020, 'LO', '123456'),
      bytes(0x7fe0, 0x0010, 'OW', new Uint8Array(4))
    );
    const sink = new RecordingSink();
    walkDataSet(root, sink);
    expect(sink.records.filter((record) => record.depth === 0)).toHaveLength(4);

    const tree = buildTree(root);
    expect(tree[1].children).toHaveLength(3);
    expect(tree[1].children.every((node) => node.record.kind === 'item')).toBe(true);
  });

  it('keeps record depth equal to tree nesting level', () => {
    const levels: Array<[number, number]> = [];
    const visit = (nodes: TreeNode[], level: number): void => {
      for (const node of nodes) {
        levels.push([node.record.depth, level]);
        visit(node.children, level + 1);
      }
    };
    visit(buildTree(nested(2)), 0);
    expect(levels).toEqual([
      [0, 0],
      [1, 1],
      [2, 2],
      [3, 3],
      [4, 4],
    ]);
    expect(renderLines(nested(2), { resolveName })).toEqual([
      '(0008,1115) | Referenced Series Sequence | SQ | <sequence, 1 items>',
      '  [Item 1]',
      '    (0008,1115) | Referenced Series Sequence | SQ | <sequence, 1 items>',
      '      [Item 1]',
      '        (0020,000E) | Series Instance UID | UI | 1.2.3',
    ]);
  });

  it('walks deep nesting without recursion', () => {
    const lines = renderLines(nested(200));
    expect(lines).toHaveLength(401);
    expect(lines[400]).toBe(`${' '.repeat(800)}(0020,000E) | Unknown | UI | 1.2.3`);
  });

  it('produces the same output on every run', () => {
    expect(renderLines(series, { resolveName })).toEqual(renderLines(series, { resolveName }));
    expect(buildTree(series, { resolveName })).toEqual(buildTree(series, { resolveName }));
  });

  it('recovers from a value it cannot render', () => {
    const onRenderError = vi.fn();
    const lines = renderLines(dataset(brokenElement(), scalar(0x0010, 0x0010, 'PN', 'DOE^JOHN')), {
      resolveName,
      onRenderError,
    });
    expect(lines).toEqual(['(0010,1000) | Unknown | LO | <unrenderable value>', "(0010,0010) | Patient's Name | PN | DOE^JOHN"]);
    expect(onRenderError).toHaveBeenCalledTimes(1);
    const [error] = onRenderError.mock.calls[0];
    expect(error).toBeInstanceOf(RenderError);
    expect(error).toMatchObject({ tag: '(0010,1000)', message: 'Unexpected value of type object' });
  });

  it('marks record status', () => {
    const sink = new RecordingSink();
    walkDataSet(
      dataset(
        scalar(0x0010, 0x0010, 'PN', 'DOE^JOHN'),
        bytes(0x7fe0, 0x0010, 'OB', new Uint8Array(8)),
        sequence(0x0008, 0x1115, []),
        brokenElement()
      ),
      sink
    );
    expect(sink.records.map((record) => (record.kind === 'element' ? record.status : 'item'))).toEqual([
      'value',
      'binary',
      'sequence',
      'error',
    ]);
  });

  it('emits nothing for a malformed dataset', () => {
    const sink = new RecordingSink();
    const input = {
      elements: [scalar(0x0010, 0x0010, 'PN', 'DOE^JOHN'), { tag: createTag(0x0010, 0x0020), vr: 'LO' }],
    } as unknown as DicomDataSet;
    expect(() => walkDataSet(input, sink)).toThrow(StructuralError);
    expect(sink.events).toEqual([]);
  });

  it('emits nothing when nesting exceeds maxDepth', () => {
    const sink = new RecordingSink();
    expect(() => walkDataSet(nested(5), sink, { maxDepth: 4 })).toThrow(StructuralError);
    expect(sink.events).toEqual([]);
  });

  it('drops pixel data rows on request', () => {
    const image = dataset(scalar(0x0010, 0x0010, 'PN', 'DOE^JOHN'), bytes(0x7fe0, 0x0010, 'OB', new Uint8Array(16)));
    expect(renderLines(image, { resolveName, omitPixelData: true })).toEqual([
      "(0010,0010) | Patient's Name | PN | DOE^JOHN",
    ]);
  });

  it('applies start depth and item numbering options', () => {
    expect(renderLines(patient, { resolveName, depth: 1 })[0]).toBe("  (0010,0010) | Patient's Name | PN | DOE^JOHN");
    expect(renderLines(series, { itemIndexBase: 0 })[1]).toBe('  [Item 0]');
  });

  it('rejects invalid options', () => {
    expect(() => renderLines(patient, { maxValueLength: 0 })).toThrow(OptionsError);
    expect(() => walkDataSet(patient, new RecordingSink(), { maxNonPrintableRatio: 2 })).toThrow(
      'Invalid viewer options - maxNonPrintableRatio'
    );
  });

  it('rejects a negative or fractional start depth before any output', () => {
    const sink = new RecordingSink();
    expect(() => walkDataSet(patient, sink, { depth: -1 })).toThrow(OptionsError);
    expect(() => renderLines(patient, { depth: 1.5 })).toThrow('Invalid viewer options - depth');
    expect(sink.events).toEqual([]);
  });
});
