import { COLLECTION_KEY, RecomputeController, entryKeys, fieldKey } from './recompute';

describe('RecomputeController', () => {
  it('computes lazily and caches until a source changes', () => {
    const controller = new RecomputeController();
    let source = 2;
    const compute = jest.fn(() => source * 10);
    const node = controller.computed('double', ['a:protein'], compute);

    expect(compute).not.toHaveBeenCalled();
    expect(node.read()).toBe(20);
    expect(node.read()).toBe(20);
    expect(compute).toHaveBeenCalledTimes(1);

    source = 3;
    expect(controller.notify('a:protein')).toBe(1);
    expect(node.isDirty).toBe(true);
    expect(node.read()).toBe(30);
    expect(compute).toHaveBeenCalledTimes(2);
    expect(controller.recomputeCount).toBe(2);
  });

  it('only invalidates nodes that read the changed key', () => {
    const controller = new RecomputeController();
    const a = controller.computed('a', [fieldKey('a', 'fat')], () => 'a');
    const b = controller.computed('b', [fieldKey('b', 'fat')], () => 'b');
    a.read();
    b.read();

    controller.notify(fieldKey('a', 'fat'));

    expect(a.isDirty).toBe(true);
    expect(b.isDirty).toBe(false);
  });

  it('stops invalidating a released node', () => {
    const controller = new RecomputeController();
    const node = controller.computed('a', entryKeys('a'), () => 1);
    node.read();

    controller.release(node);

    expect(controller.notify(fieldKey('a', 'protein'))).toBe(0);
    expect(node.isDirty).toBe(false);
    expect(controller.dependentCount(fieldKey('a', 'servings'))).toBe(0);
  });

  it('adds and removes dependencies after creation', () => {
    const controller = new RecomputeController();
    const node = controller.computed('aggregate', [COLLECTION_KEY], () => 0);
    node.read();

    controller.depend(node, entryKeys('x'));
    expect(controller.dependentCount(fieldKey('x', 'fiber'))).toBe(1);

    controller.undepend(node, entryKeys('x'));
    expect(controller.notify(fieldKey('x', 'fiber'))).toBe(0);
    expect(node.isDirty).toBe(false);
  });

  it('reports each recomputation to the callback', () => {
    const onRecompute = jest.fn();
    const controller = new RecomputeController(onRecompute);
    const node = controller.computed('entry-1', [fieldKey('entry-1', 'fat')], () => 1);

    node.read();
    node.read();

    expect(onRecompute).toHaveBeenCalledTimes(1);
    expect(onRecompute).toHaveBeenCalledWith('entry-1');
  });
});

describe('entryKeys', () => {
  it('lists one key per quantity field', () => {
    expect(entryKeys('entry-1')).toEqual([
      'entry-1:protein',
      'entry-1:fat',
      'entry-1:totalCarb',
      'entry-1:fiber',
      'entry-1:servings',
    ]);
  });
});
