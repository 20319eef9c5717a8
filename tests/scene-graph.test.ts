/**
 * Tests for scene graph mutation and lookup
 * 场景图变更与查询测试
 */

import { afterEach, describe, expect, test, vi } from 'vitest';
import { SceneGraph } from '../src/core/SceneGraph';
import {
  CycleError,
  GraphModifiedError,
  NodeNotFoundError,
  ParentNotFoundError,
  RootNodeError
} from '../src/core/Errors';
import { ROOT } from '../src/utils/Types';
import { checkInvariants } from './utils/checkInvariants';

function values<T>(graph: SceneGraph<T>): T[] {
  return Array.from(graph.iter(), ([, value]) => value);
}

function children<T>(graph: SceneGraph<T>, parent: number): T[] {
  return Array.from(graph.iterDirectChildren(parent));
}

describe('SceneGraph', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('attach', () => {
    test('should attach children and grandchildren in insertion order', () => {
      const graph = new SceneGraph('Root');
      graph.attach(ROOT, 'First Child');
      const secondChild = graph.attach(ROOT, 'Second Child');
      graph.attach(secondChild, 'First Grandchild');

      expect(Array.from(graph.iter())).toEqual([
        ['Root', 'First Child'],
        ['Root', 'Second Child'],
        ['Second Child', 'First Grandchild']
      ]);
      expect(graph.size()).toBe(3);
      expect(checkInvariants(graph)).toEqual([]);
    });

    test('should link siblings as the new last child', () => {
      const graph = new SceneGraph('Root');
      const first = graph.attachAtRoot('First Child');
      expect(children(graph, ROOT)).toEqual(['First Child']);

      const second = graph.attachAtRoot('Second Child');
      expect(children(graph, ROOT)).toEqual(['First Child', 'Second Child']);
      expect(graph.parent(first)).toBe(ROOT);
      expect(graph.parent(second)).toBe(ROOT);
      expect(first).not.toBe(second);
      expect(checkInvariants(graph)).toEqual([]);
    });

    test('should report children on the parent node', () => {
      const graph = new SceneGraph('Root');
      const parent = graph.attachAtRoot('Parent');
      expect(graph.get(parent)?.hasChildren).toBe(false);

      graph.attach(parent, 'Child');
      expect(graph.get(parent)?.hasChildren).toBe(true);
    });

    test('should reject a stale parent without modifying the graph', () => {
      const graph = new SceneGraph('Root');
      const gone = graph.attachAtRoot('Gone');
      graph.remove(gone);
      const epoch = graph.epoch;

      expect(() => graph.attach(gone, 'Orphan')).toThrow(ParentNotFoundError);
      expect(graph.size()).toBe(0);
      expect(graph.isEmpty()).toBe(true);
      expect(graph.epoch).toBe(epoch);
    });
  });

  describe('detach', () => {
    test('should split a middle child out into its own graph', () => {
      const graph = new SceneGraph('Root');
      const firstChild = graph.attachAtRoot('First Child');
      const secondChild = graph.attachAtRoot('Second Child');
      const thirdChild = graph.attachAtRoot('Third Child');

      const detached = graph.detach(secondChild);
      expect(detached?.root()).toBe('Second Child');
      expect(detached?.isEmpty()).toBe(true);

      expect(values(graph)).toEqual(['First Child', 'Third Child']);
      expect(graph.contains(secondChild)).toBe(false);
      expect(graph.get(secondChild)).toBeUndefined();
      expect(graph.contains(firstChild)).toBe(true);
      expect(graph.contains(thirdChild)).toBe(true);
      expect(checkInvariants(graph)).toEqual([]);
    });

    test('should rebuild the whole subtree in the new graph', () => {
      const graph = new SceneGraph('Root');
      graph.attachAtRoot('First Child');
      const thirdChild = graph.attachAtRoot('Third Child');
      const grandchild = graph.attach(thirdChild, 'First Grandchild');
      graph.attach(grandchild, 'Second Grandchild');
      const thirdGrandchild = graph.attach(grandchild, 'Third Grandchild');
      graph.attach(thirdGrandchild, 'First Greatgrandchild');

      const detached = graph.detach(thirdChild);
      if (!detached) throw new Error('expected a detached graph');

      expect(values(graph)).toEqual(['First Child']);
      expect(graph.size()).toBe(1);
      expect(detached.root()).toBe('Third Child');
      expect(detached.size()).toBe(4);
      expect(Array.from(detached.iter())).toEqual([
        ['Third Child', 'First Grandchild'],
        ['First Grandchild', 'Second Grandchild'],
        ['First Grandchild', 'Third Grandchild'],
        ['Third Grandchild', 'First Greatgrandchild']
      ]);
      expect(checkInvariants(graph)).toEqual([]);
      expect(checkInvariants(detached)).toEqual([]);
    });

    test('should return undefined for the root and stale handles', () => {
      const graph = new SceneGraph('Root');
      const node = graph.attachAtRoot('Node');
      graph.remove(node);

      expect(graph.detach(ROOT)).toBeUndefined();
      expect(graph.detach(node)).toBeUndefined();
    });

    test('should carry the configuration over to the detached graph', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const graph = new SceneGraph('Root', { warnOnStaleHandles: true });
      const branch = graph.attachAtRoot('Branch');
      const leaf = graph.attach(branch, 'Leaf');

      const detached = graph.detach(branch);
      if (!detached) throw new Error('expected a detached graph');
      expect(graph.contains(leaf)).toBe(false);

      const [[moved, value]] = Array.from(detached.iterOutOfOrder());
      expect(value).toBe('Leaf');
      detached.remove(moved);
      detached.remove(moved);

      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith('[SceneGraph] remove: Branch(1v0) is not in the graph, ignoring');
    });
  });

  describe('moveNode', () => {
    test('should move a node and its subtree under a new parent', () => {
      const graph = new SceneGraph('Root');
      const firstChild = graph.attach(ROOT, 'First Child');
      graph.attach(firstChild, 'First Grandchild');
      graph.attach(firstChild, 'Second Grandchild');
      graph.attach(firstChild, 'Third Grandchild');
      const secondChild = graph.attach(ROOT, 'Second Child');

      expect(children(graph, firstChild)).toEqual(['First Grandchild', 'Second Grandchild', 'Third Grandchild']);

      graph.moveNode(firstChild, secondChild);

      expect(children(graph, ROOT)).toEqual(['Second Child']);
      expect(children(graph, firstChild)).toEqual(['First Grandchild', 'Second Grandchild', 'Third Grandchild']);
      expect(children(graph, secondChild)).toEqual(['First Child']);
      expect(graph.parent(firstChild)).toBe(secondChild);
      expect(values(graph)).toEqual([
        'Second Child',
        'First Child',
        'First Grandchild',
        'Second Grandchild',
        'Third Grandchild'
      ]);
      expect(checkInvariants(graph)).toEqual([]);
    });

    test('should keep the handle and the value object', () => {
      const graph = new SceneGraph<{ name: string }>({ name: 'Root' });
      const payload = { name: 'Payload' };
      const node = graph.attachAtRoot(payload);
      const target = graph.attachAtRoot({ name: 'Target' });

      graph.moveNode(node, target);

      expect(graph.get(node)?.value).toBe(payload);
      expect(graph.parent(node)).toBe(target);
    });

    test('should move a node to the end when re-placed under its own parent', () => {
      const graph = new SceneGraph('Root');
      const a = graph.attachAtRoot('A');
      graph.attachAtRoot('B');
      graph.attachAtRoot('C');

      graph.moveNode(a, ROOT);

      expect(children(graph, ROOT)).toEqual(['B', 'C', 'A']);
      expect(checkInvariants(graph)).toEqual([]);
    });

    test('should move a sole child and leave the old parent childless', () => {
      const graph = new SceneGraph('Root');
      const from = graph.attachAtRoot('From');
      const to = graph.attachAtRoot('To');
      const only = graph.attach(from, 'Only');

      graph.moveNode(only, to);

      expect(graph.get(from)?.hasChildren).toBe(false);
      expect(children(graph, to)).toEqual(['Only']);
      expect(checkInvariants(graph)).toEqual([]);
    });

    test('should reject the root and stale handles', () => {
      const graph = new SceneGraph('Root');
      const node = graph.attachAtRoot('Node');
      const stale = graph.attachAtRoot('Stale');
      graph.remove(stale);

      expect(() => graph.moveNode(ROOT, node)).toThrow(NodeNotFoundError);
      expect(() => graph.moveNode(stale, ROOT)).toThrow(NodeNotFoundError);
      expect(() => graph.moveNode(node, stale)).toThrow(NodeNotFoundError);
      expect(graph.parent(node)).toBe(ROOT);
      expect(checkInvariants(graph)).toEqual([]);
    });

    test('should refuse to move a node into its own subtree', () => {
      const graph = new SceneGraph('Root');
      const a = graph.attachAtRoot('A');
      const b = graph.attach(a, 'B');
      const c = graph.attach(b, 'C');
      const before = Array.from(graph.iter());

      expect(() => graph.moveNode(a, c)).toThrow(CycleError);
      expect(() => graph.moveNode(a, a)).toThrow(CycleError);
      expect(Array.from(graph.iter())).toEqual(before);
      expect(checkInvariants(graph)).toEqual([]);
    });
  });

  describe('remove', () => {
    test('should keep siblings linked when removing middle, first, last and sole children', () => {
      const graph = new SceneGraph('Root');
      const parent = graph.attachAtRoot('Parent');
      const c1 = graph.attach(parent, 'c1');
      const c2 = graph.attach(parent, 'c2');
      const c3 = graph.attach(parent, 'c3');
      const c4 = graph.attach(parent, 'c4');

      graph.remove(c2);
      expect(children(graph, parent)).toEqual(['c1', 'c3', 'c4']);
      expect(checkInvariants(graph)).toEqual([]);

      graph.remove(c1);
      expect(children(graph, parent)).toEqual(['c3', 'c4']);
      expect(checkInvariants(graph)).toEqual([]);

      graph.remove(c4);
      expect(children(graph, parent)).toEqual(['c3']);
      expect(checkInvariants(graph)).toEqual([]);

      graph.remove(c3);
      expect(children(graph, parent)).toEqual([]);
      expect(graph.get(parent)?.hasChildren).toBe(false);
      expect(checkInvariants(graph)).toEqual([]);
    });

    test('should free the whole subtree', () => {
      const graph = new SceneGraph('Root');
      const keep = graph.attachAtRoot('Keep');
      const drop = graph.attachAtRoot('Drop');
      const inner = graph.attach(drop, 'Inner');
      const leaf = graph.attach(inner, 'Leaf');

      graph.remove(drop);

      expect(graph.size()).toBe(1);
      expect(graph.contains(inner)).toBe(false);
      expect(graph.contains(leaf)).toBe(false);
      expect(values(graph)).toEqual(['Keep']);
      expect(graph.contains(keep)).toBe(true);
    });

    test('should throw RootNodeError for the root', () => {
      const graph = new SceneGraph('Root');
      graph.attachAtRoot('Child');

      expect(() => graph.remove(ROOT)).toThrow(RootNodeError);
      expect(graph.size()).toBe(1);
    });

    test('should ignore stale handles and warn when configured', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const quiet = new SceneGraph('Root');
      const q = quiet.attachAtRoot('Q');
      quiet.remove(q);
      quiet.remove(q);
      expect(warn).not.toHaveBeenCalled();

      const loud = new SceneGraph('Root', { warnOnStaleHandles: true });
      const node = loud.attachAtRoot('Node');
      loud.remove(node);
      loud.remove(node);
      expect(warn).toHaveBeenCalledWith('[SceneGraph] remove: Branch(1v0) is not in the graph, ignoring');
    });

    test('should free a 50 000 deep chain without recursion', () => {
      const graph = new SceneGraph('Root');
      const top = graph.attachAtRoot('Link_0');
      let parent = top;
      for (let i = 1; i < 50_000; i++) {
        parent = graph.attach(parent, `Link_${i}`);
      }
      expect(graph.size()).toBe(50_000);

      graph.remove(top);

      expect(graph.size()).toBe(0);
      expect(graph.isEmpty()).toBe(true);
    });
  });

  describe('clear', () => {
    test('should drop every node and keep the root', () => {
      const graph = new SceneGraph('Root');
      for (let i = 0; i < 50_000; i++) {
        graph.attachAtRoot(`Node_${i}`);
      }

      graph.clear();

      expect(graph.size()).toBe(0);
      expect(graph.isEmpty()).toBe(true);
      expect(graph.root()).toBe('Root');
      expect(values(graph)).toEqual([]);
    });

    test('should accept new nodes afterwards and invalidate old handles', () => {
      const graph = new SceneGraph('Root');
      const old = graph.attachAtRoot('Old');
      graph.clear();

      const fresh = graph.attachAtRoot('Fresh');

      expect(graph.contains(old)).toBe(false);
      expect(graph.contains(fresh)).toBe(true);
      expect(values(graph)).toEqual(['Fresh']);
      expect(checkInvariants(graph)).toEqual([]);
    });
  });

  describe('lookup', () => {
    test('should expose the root value for reading and writing', () => {
      const graph = new SceneGraph('Root');
      graph.attachAtRoot('Child');

      graph.rootMut().value = 'New Root';

      expect(graph.root()).toBe('New Root');
      expect(Array.from(graph.iter())).toEqual([['New Root', 'Child']]);
    });

    test('should write node values through getMut', () => {
      const graph = new SceneGraph('Root');
      const node = graph.attachAtRoot('Before');
      const slot = graph.getMut(node);
      if (!slot) throw new Error('expected a node');

      slot.value = 'After';

      expect(graph.get(node)?.value).toBe('After');
    });

    test('should expose links read-only on node views', () => {
      const graph = new SceneGraph('Root');
      const a = graph.attachAtRoot('A');
      const b = graph.attachAtRoot('B');
      const a1 = graph.attach(a, 'A1');
      const view = graph.getMut(a);
      if (!view) throw new Error('expected a node');

      expect(view.parent).toBe(ROOT);
      expect(view.firstChild).toBe(a1);
      expect(view.lastChild).toBe(a1);
      expect(view.prevSibling).toBeUndefined();
      expect(view.nextSibling).toBe(b);

      expect(Reflect.set(view, 'nextSibling', a1)).toBe(false);
      expect(Reflect.set(view, 'parent', b)).toBe(false);
      expect(Reflect.set(view, 'firstChild', b)).toBe(false);

      expect(graph.parent(a)).toBe(ROOT);
      expect(children(graph, ROOT)).toEqual(['A', 'B']);
      expect(checkInvariants(graph)).toEqual([]);
    });

    test('should walk direct children from a node view', () => {
      const graph = new SceneGraph('Root');
      const a = graph.attachAtRoot('A');
      graph.attach(a, 'B');
      const c = graph.attach(a, 'C');
      graph.attach(c, 'D');
      const view = graph.get(a);
      if (!view) throw new Error('expected a node');

      expect(Array.from(view.iterChildren())).toEqual(['B', 'C']);

      const iter = view.iterChildren();
      iter.next();
      graph.attach(a, 'E');
      expect(() => iter.next()).toThrow(GraphModifiedError);
      expect(Array.from(view.iterChildren())).toEqual(['B', 'C', 'E']);
    });

    test('should treat the root as contained but not as a node', () => {
      const graph = new SceneGraph('Root');

      expect(graph.contains(ROOT)).toBe(true);
      expect(graph.get(ROOT)).toBeUndefined();
      expect(graph.getMut(ROOT)).toBeUndefined();
      expect(graph.parent(ROOT)).toBeUndefined();
      expect(graph.size()).toBe(0);
      expect(graph.isEmpty()).toBe(true);
    });

    test('should walk ancestry', () => {
      const graph = new SceneGraph('Root');
      const a = graph.attachAtRoot('A');
      const b = graph.attach(a, 'B');
      const c = graph.attach(b, 'C');
      const stale = graph.attachAtRoot('Stale');
      graph.remove(stale);

      expect(graph.ancestors(c)).toEqual([b, a, ROOT]);
      expect(graph.ancestors(ROOT)).toEqual([]);
      expect(graph.depth(ROOT)).toBe(0);
      expect(graph.depth(a)).toBe(1);
      expect(graph.depth(c)).toBe(3);
      expect(graph.depth(stale)).toBeUndefined();
      expect(graph.isAncestor(a, c)).toBe(true);
      expect(graph.isAncestor(ROOT, c)).toBe(true);
      expect(graph.isAncestor(c, a)).toBe(false);
      expect(graph.isAncestor(a, a)).toBe(false);
    });

    test('should bump the epoch on structural changes only', () => {
      const graph = new SceneGraph('Root');
      const start = graph.epoch;
      const node = graph.attachAtRoot('Node');
      expect(graph.epoch).toBe(start + 1);

      const slot = graph.getMut(node);
      if (slot) slot.value = 'Renamed';
      graph.rootMut().value = 'Renamed Root';
      expect(graph.epoch).toBe(start + 1);

      graph.remove(node);
      expect(graph.epoch).toBe(start + 2);
    });

    test('should reject a non-positive initial capacity', () => {
      expect(() => new SceneGraph('Root', { initialCapacity: 0 })).toThrow(RangeError);
    });
  });

  describe('attachGraph', () => {
    test('should splice another graph under a node', () => {
      const other = new SceneGraph('Other');
      const x = other.attachAtRoot('X');
      other.attach(x, 'Y');
      other.attachAtRoot('Z');

      const graph = new SceneGraph('Root');
      const p = graph.attachAtRoot('P');
      const spliced = graph.attachGraph(p, other);

      expect(graph.parent(spliced)).toBe(p);
      expect(Array.from(graph.iter())).toEqual([
        ['Root', 'P'],
        ['P', 'Other'],
        ['Other', 'X'],
        ['X', 'Y'],
        ['Other', 'Z']
      ]);
      expect(graph.size()).toBe(5);
      expect(checkInvariants(graph)).toEqual([]);
    });

    test('should leave the other graph holding only its root', () => {
      const other = new SceneGraph('Other');
      other.attachAtRoot('X');
      const graph = new SceneGraph('Root');

      graph.attachGraph(ROOT, other);

      expect(other.isEmpty()).toBe(true);
      expect(other.size()).toBe(0);
      expect(other.root()).toBe('Other');
    });

    test('should reject a stale parent before touching either graph', () => {
      const other = new SceneGraph('Other');
      other.attachAtRoot('X');
      const graph = new SceneGraph('Root');
      const stale = graph.attachAtRoot('Stale');
      graph.remove(stale);

      expect(() => graph.attachGraph(stale, other)).toThrow(ParentNotFoundError);
      expect(other.size()).toBe(1);
      expect(graph.size()).toBe(0);
    });

    test('should refuse to attach a graph to itself', () => {
      const graph = new SceneGraph('Root');
      graph.attachAtRoot('Child');

      expect(() => graph.attachGraph(ROOT, graph)).toThrow(CycleError);
      expect(graph.size()).toBe(1);
    });

    test('should round-trip a detached last child', () => {
      const graph = new SceneGraph('Root');
      graph.attachAtRoot('A');
      const b = graph.attachAtRoot('B');
      const b1 = graph.attach(b, 'B1');
      graph.attach(b, 'B2');
      graph.attach(b1, 'B11');
      const before = Array.from(graph.iter());

      const detached = graph.detach(b);
      if (!detached) throw new Error('expected a detached graph');
      expect(values(graph)).toEqual(['A']);

      graph.attachGraph(ROOT, detached);

      expect(Array.from(graph.iter())).toEqual(before);
      expect(checkInvariants(graph)).toEqual([]);
    });
  });
});
