import { describe, it, expect } from 'vitest';
import { ArrayLimitError, MalformedInputError } from '../../src/errors.js';
import { indexed, keyToString, named, PENDING } from '../../src/node/keys.js';
import { QsNode, valueToKey } from '../../src/node/qs-node.js';

function childKeys(node: QsNode): string[] {
  return node.children.map((child) => keyToString(child.key));
}

describe('QsNode shape', () => {
  it('classifies scalar, list and mapping nodes', () => {
    expect(QsNode.leaf(named('a'), 'b').shape).toBe('scalar');
    expect(QsNode.leaf(named('a'), null).shape).toBe('scalar');
    expect(QsNode.leaf(named('a'), ['b', 'c']).shape).toBe('list');
    expect(QsNode.wrap(named('a'), QsNode.leaf(named('b'), 'c')).shape).toBe('mapping');
  });

  it('recognises array and default array nodes', () => {
    const array = QsNode.wrap(named('a'), QsNode.leaf(indexed(0), 'b'));
    expect(array.isArray()).toBe(true);
    expect(array.isDefaultArray()).toBe(true);

    const nested = QsNode.wrap(named('a'), QsNode.wrap(indexed(0), QsNode.leaf(named('b'), 'c')));
    expect(nested.isArray()).toBe(true);
    expect(nested.isDefaultArray()).toBe(false);

    const object = QsNode.wrap(named('a'), QsNode.leaf(named('b'), 'c'));
    expect(object.isArray()).toBe(false);
  });

  it('treats a leaf without value as empty', () => {
    expect(new QsNode(named('a')).isEmpty()).toBe(true);
    expect(QsNode.leaf(named('a'), '').isEmpty()).toBe(false);
  });
});

describe('QsNode.update', () => {
  it('scalar + scalar accumulates into a list', () => {
    const node = QsNode.leaf(named('a'), 'b');
    node.update(QsNode.leaf(named('a'), 'c'));
    expect(node.value).toEqual(['b', 'c']);
  });

  it('keeps extending the same list on further collisions', () => {
    const node = QsNode.leaf(named('a'), 'b');
    node.update(QsNode.leaf(named('a'), 'c'));
    node.update(QsNode.leaf(named('a'), 'd'));
    node.update(QsNode.leaf(named('a'), ['e', 'f']));
    expect(node.value).toEqual(['b', 'c', 'd', 'e', 'f']);
  });

  it('scalar + mapping demotes the scalar to a flag key', () => {
    const node = QsNode.leaf(named('b'), 'c');
    node.update(QsNode.wrap(named('b'), QsNode.leaf(named('d'), 'e')));
    expect(node.value).toBeUndefined();
    expect(node.serialize()).toEqual({ c: true, d: 'e' });
  });

  it('list + mapping demotes the list under its bracketed spelling', () => {
    const node = QsNode.leaf(named('a'), ['c', 'f']);
    node.update(QsNode.wrap(named('a'), QsNode.leaf(named('d'), 'e')));
    expect(node.serialize()).toEqual({ '[c,f]': true, d: 'e' });
  });

  it('mapping + scalar attaches the scalar as a flag key', () => {
    const node = QsNode.wrap(named('b'), QsNode.leaf(named('d'), 'e'));
    node.update(QsNode.leaf(named('b'), 'c'));
    expect(node.serialize()).toEqual({ d: 'e', c: true });
  });

  it('mapping + mapping merges children by key', () => {
    const node = QsNode.wrap(named('a'), QsNode.leaf(named('b'), 'x'));
    node.update(QsNode.wrap(named('a'), QsNode.leaf(named('c'), 'y')));
    node.update(QsNode.wrap(named('a'), QsNode.leaf(named('b'), 'z')));
    expect(childKeys(node)).toEqual(['b', 'c']);
    expect(node.serialize()).toEqual({ b: ['x', 'z'], c: 'y' });
  });

  it('a repeated flag key accumulates', () => {
    const node = QsNode.leaf(named('a'), 'x');
    node.update(QsNode.wrap(named('a'), QsNode.leaf(named('b'), 'y')));
    node.update(QsNode.leaf(named('a'), 'z'));
    node.update(QsNode.leaf(named('a'), 'x'));
    expect(node.serialize()).toEqual({ x: [true, true], b: 'y', z: true });
  });

  it('re-sorts array children by index', () => {
    const node = QsNode.wrap(named('a'), QsNode.leaf(indexed(1), 'c'));
    node.update(QsNode.wrap(named('a'), QsNode.leaf(indexed(0), 'b')));
    expect(childKeys(node)).toEqual(['0', '1']);
  });

  it('keeps insertion order for object children', () => {
    const node = QsNode.wrap(named('a'), QsNode.leaf(named('z'), '1'));
    node.update(QsNode.wrap(named('a'), QsNode.leaf(named('m'), '2')));
    expect(childKeys(node)).toEqual(['z', 'm']);
  });
});

describe('QsNode.hasMixedKeysAlong', () => {
  it('finds mixed keys on the merged path only', () => {
    const tree = QsNode.wrap(named('a'), QsNode.leaf(indexed(0), 'b'));
    const spine = QsNode.wrap(named('a'), QsNode.leaf(named('x'), 'y'));
    tree.update(spine);
    expect(tree.hasMixedKeys()).toBe(true);
    expect(tree.hasMixedKeysAlong(spine)).toBe(true);
  });

  it('ignores a plain object path', () => {
    const tree = QsNode.wrap(named('a'), QsNode.leaf(named('b'), 'c'));
    const spine = QsNode.wrap(named('a'), QsNode.leaf(named('d'), 'e'));
    tree.update(spine);
    expect(tree.hasMixedKeysAlong(spine)).toBe(false);
  });
});

describe('QsNode.toObjectNotation', () => {
  it('rewrites indexed keys as names at every level', () => {
    const node = QsNode.wrap(named('a'), QsNode.wrap(indexed(0), QsNode.leaf(indexed(1), 'b')));
    node.toObjectNotation();
    expect(node.children[0]?.key).toEqual(named('0'));
    expect(node.children[0]?.children[0]?.key).toEqual(named('1'));
  });

  it('merges children that collide after the rewrite', () => {
    const node = QsNode.wrap(named('a'), QsNode.leaf(indexed(0), 'b'));
    node.children.push(QsNode.leaf(named('0'), 'c'));
    node.toObjectNotation();
    expect(node.children).toHaveLength(1);
    expect(node.serialize()).toEqual({ 0: ['b', 'c'] });
  });
});

describe('QsNode.resolvePending', () => {
  it('assigns the next free index of the matching base node', () => {
    const base = QsNode.wrap(named('a'), QsNode.leaf(indexed(0), 'b'));
    const spine = QsNode.wrap(named('a'), QsNode.leaf(PENDING, 'c'));
    spine.resolvePending(base, 20);
    expect(spine.children[0]?.key).toEqual(indexed(1));
    base.update(spine);
    expect(base.serialize()).toEqual({ 0: 'b', 1: 'c' });
  });

  it('starts at zero without a base', () => {
    const spine = QsNode.wrap(named('a'), QsNode.leaf(PENDING, 'c'));
    spine.resolvePending(undefined, 20);
    expect(spine.children[0]?.key).toEqual(indexed(0));
  });

  it('resolves pending keys below named keys against the matching subtree', () => {
    const base = QsNode.wrap(named('a'), QsNode.wrap(named('b'), QsNode.leaf(indexed(3), 'x')));
    const spine = QsNode.wrap(named('a'), QsNode.wrap(named('b'), QsNode.leaf(PENDING, 'y')));
    spine.resolvePending(base, 20);
    expect(spine.children[0]?.children[0]?.key).toEqual(indexed(4));
  });

  it('throws ArrayLimitError when the assigned index exceeds the limit', () => {
    const base = QsNode.wrap(named('a'), QsNode.leaf(indexed(2), 'b'));
    const spine = QsNode.wrap(named('a'), QsNode.leaf(PENDING, 'c'));
    expect(() => spine.resolvePending(base, 2)).toThrow(ArrayLimitError);
  });
});

describe('QsNode.serialize', () => {
  it('renders a leaf without value as null', () => {
    expect(new QsNode(named('a')).serialize()).toBeNull();
  });

  it('renders array nodes as index-keyed objects by default', () => {
    const node = QsNode.wrap(named('a'), QsNode.leaf(indexed(2), 'x'));
    expect(node.serialize()).toEqual({ 2: 'x' });
  });

  it('renders sparse arrays when allowed', () => {
    const node = QsNode.wrap(named('a'), QsNode.leaf(indexed(2), 'x'));
    const result = node.serialize(true);
    expect(Array.isArray(result)).toBe(true);
    expect(result).toHaveLength(3);
    expect(Object.prototype.hasOwnProperty.call(result, 1)).toBe(false);
    expect(Object.prototype.hasOwnProperty.call(result, 2)).toBe(true);
  });

  it('keeps __proto__ as a plain own key', () => {
    const node = QsNode.wrap(named('a'), QsNode.leaf(named('__proto__'), 'x'));
    const result = node.serialize();
    expect(Object.prototype.hasOwnProperty.call(result, '__proto__')).toBe(true);
    expect(Object.getPrototypeOf(result)).toBe(Object.prototype);
  });
});

describe('QsNode.load', () => {
  it('builds named and indexed children from native values', () => {
    const node = QsNode.load(named('a'), { b: ['x', 1], c: null, d: true });
    expect(node?.serialize()).toEqual({ b: { 0: 'x', 1: 1 }, c: null, d: true });
  });

  it('converts dates and bigints to strings', () => {
    expect(QsNode.load(named('d'), new Date('2024-01-02T03:04:05.000Z'))?.value).toBe('2024-01-02T03:04:05.000Z');
    expect(QsNode.load(named('n'), 10n)?.value).toBe('10');
  });

  it('leaves undefined and functions empty', () => {
    expect(QsNode.load(named('u'), undefined)?.isEmpty()).toBe(true);
    expect(QsNode.load(named('f'), () => 1)?.isEmpty()).toBe(true);
  });

  it('applies the filter at every level', () => {
    const node = QsNode.load(named('a'), ['x', 'y', 'z'], ['a', 0, 2]);
    expect(node?.serialize()).toEqual({ 0: 'x', 2: 'z' });
    expect(QsNode.load(named('b'), 'x', ['a'])).toBeUndefined();
  });

  it('throws MalformedInputError on cycles', () => {
    const data: Record<string, unknown> = {};
    data['self'] = data;
    expect(() => QsNode.load(named('a'), data)).toThrow(MalformedInputError);
  });

  it('accepts the same object twice when it is not its own ancestor', () => {
    const shared = { x: '1' };
    expect(QsNode.load(named('a'), { b: shared, c: shared })?.serialize()).toEqual({ b: { x: '1' }, c: { x: '1' } });
  });
});

describe('valueToKey', () => {
  it('spells scalars and lists', () => {
    expect(valueToKey('c')).toBe('c');
    expect(valueToKey(null)).toBe('null');
    expect(valueToKey(1)).toBe('1');
    expect(valueToKey(['c', 'f'])).toBe('[c,f]');
  });
});
