import { describe, expect, it } from 'vitest';
import { RowBinding } from '../../src/tree/row-binding.js';
import { makeOutline } from '../fixtures/outline.js';

function todoBinding() {
  const outline = makeOutline([
    { name: 'w', about: 'Home', todos: [{ name: 't1', about: 'buy milk', due: '2030-01-02' }] },
  ]);
  const todo = outline.todo('t1');
  if (!todo) throw new Error('fixture missing t1');
  return { todo, binding: new RowBinding(todo, { depth: 2, index: 4 }) };
}

describe('RowBinding', () => {
  it('seeds one buffer per field from the node', () => {
    const { binding } = todoBinding();
    expect(binding.name).toBe('t1');
    expect(binding.depth).toBe(2);
    expect(binding.index).toBe(4);
    expect(binding.expanded).toBe(false);
    expect(binding.fieldValues()).toEqual(['buy milk', '2030-01-02']);
    expect(binding.hasField('due')).toBe(true);
    expect(binding.hasField('priority')).toBe(false);
    expect(binding.buffer('priority')).toBeUndefined();
  });

  it('edits the buffer without touching the node', () => {
    const { todo, binding } = todoBinding();
    const about = binding.buffer('about');
    about?.focus();
    about?.handleKey('!');

    expect(binding.editingField()).toBe('about');
    expect(binding.fieldValues()).toEqual(['buy milk!|', '2030-01-02']);
    expect(todo.getField('about')).toBe('buy milk');
  });

  it('reseeds only the buffers that are not being edited', () => {
    const { todo, binding } = todoBinding();
    binding.buffer('about')?.focus();
    binding.buffer('about')?.handleKey('!');

    todo.editField('due', '2030-02-03');
    binding.sync();

    expect(binding.buffer('about')?.value).toBe('buy milk!');
    expect(binding.buffer('due')?.value).toBe('2030-02-03');

    binding.buffer('about')?.blur();
    binding.refreshField('about');
    expect(binding.buffer('about')?.value).toBe('buy milk');
    expect(binding.editingField()).toBeNull();
  });

  it('toggles and sets expansion', () => {
    const { binding } = todoBinding();
    binding.toggleExpand();
    expect(binding.expanded).toBe(true);
    binding.toggleExpand();
    expect(binding.expanded).toBe(false);
    binding.expand();
    expect(binding.expanded).toBe(true);
    binding.expand(false);
    expect(binding.expanded).toBe(false);
  });
});
