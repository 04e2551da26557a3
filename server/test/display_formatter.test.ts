import { describe, expect, it } from 'vitest';

import { DEFAULT_PANEL_CONFIG } from '../src/navigation/defaults.js';
import { DisplayFormatter, renderPanel } from '../src/navigation/displayFormatter.js';
import { applyNameOptions, inferModuleName, inferSymbolName } from '../src/navigation/symbolNames.js';
import type { NavigationStack, StackCollection } from '../src/navigation/types.js';
import { ev, makeStack } from './fakes.js';

const SERVER = { fileId: '/ws/lib/server.ex', line: 4 };

function collectionOf(stacks: NavigationStack[], activeId: string | null): StackCollection {
  return { order: stacks.map((s) => s.id), stacks: new Map<string, NavigationStack>(stacks.map((s) => [s.id, s])), activeId };
}

describe('symbol names', () => {
  it('derives module names from file paths', () => {
    expect(inferModuleName('/ws/lib/user_controller.ex')).toBe('UserController');
    expect(inferModuleName('lib/accounts.ex')).toBe('Accounts');
    expect(inferModuleName('C:\\proj\\lib\\foo_bar_baz.ex')).toBe('FooBarBaz');
    expect(inferModuleName('Makefile')).toBe('Makefile');
    expect(inferModuleName('')).toBe('Unknown');
    expect(inferModuleName(null)).toBe('Unknown');
  });

  it('qualifies tags with the origin module', () => {
    expect(inferSymbolName('MyApp.Repo.get/2', SERVER)).toBe('MyApp.Repo.get/2');
    expect(inferSymbolName('handle_call/3', SERVER)).toBe('Server.handle_call/3');
    expect(inferSymbolName('init', SERVER)).toBe('Server.init');
    expect(inferSymbolName('MyApp.', SERVER)).toBe('MyApp.');
    expect(inferSymbolName('valid?/1', SERVER)).toBe('Server.valid?/1');
  });

  it('falls back when the tag or origin is missing', () => {
    expect(inferSymbolName('', SERVER)).toBe('Unknown');
    expect(inferSymbolName('handle_call/3', null)).toBe('handle_call/3');
    expect(inferSymbolName('init', { fileId: '', line: 1 })).toBe('init');
  });

  it('drops arity and module path on request', () => {
    expect(applyNameOptions('Server.handle_call/3', { showArity: false, showModulePath: true })).toBe('Server.handle_call');
    expect(applyNameOptions('MyApp.Repo.get/2', { showArity: true, showModulePath: false })).toBe('get/2');
    expect(applyNameOptions('Server.init/1', { showArity: false, showModulePath: false })).toBe('init');
    expect(applyNameOptions('Unknown', { showArity: false, showModulePath: false })).toBe('Unknown');
  });
});

describe('panel rendering', () => {
  it('renders a placeholder without stacks', () => {
    expect(renderPanel(collectionOf([], null), DEFAULT_PANEL_CONFIG)).toEqual({
      lines: ['📁 Tag Stacks:', '  (no stacks)'],
      highlights: [],
    });
  });

  it('renders the active stack with its current entry', () => {
    const stack = makeStack({ displayItems: [ev('handle_call/3')], maxDepth: 1, currentIndex: 1 });

    const { lines, highlights } = renderPanel(collectionOf([stack], 'stack_1'), DEFAULT_PANEL_CONFIG);

    expect(lines).toEqual(['📁 Tag Stacks:', '▶ UserController', '  UserController (root)', '  ↓', '  Server.handle_call/3 ← [current]']);
    expect(highlights).toEqual([
      { group: 'String', line: 1, colStart: 0, colEnd: 18 },
      { group: 'String', line: 4, colStart: 0, colEnd: 36 },
    ]);
  });

  it('marks the root line when the stack sits at root', () => {
    const stack = makeStack({ displayItems: [ev('handle_call/3')], maxDepth: 1, currentIndex: 0 });

    const { lines, highlights } = renderPanel(collectionOf([stack], 'stack_1'), DEFAULT_PANEL_CONFIG);

    expect(lines[2]).toBe('  UserController (root) ← [current]');
    expect(lines[4]).toBe('  Server.handle_call/3');
    expect(highlights).toContainEqual({ group: 'String', line: 2, colStart: 0, colEnd: 37 });
  });

  it('truncates past the configured depth', () => {
    const stack = makeStack({ displayItems: [ev('a/1'), ev('b/1'), ev('c/1')], maxDepth: 3, currentIndex: 3 });

    const { lines, highlights } = renderPanel(collectionOf([stack], 'stack_1'), { ...DEFAULT_PANEL_CONFIG, maxDepth: 2 });

    expect(lines.slice(3)).toEqual(['  ↓', '  Server.a/1', '  ↓', '  Server.b/1', '  ... (truncated)']);
    expect(highlights).toHaveLength(1);
  });

  it('lists several stacks in order with separators', () => {
    const first = makeStack({ displayItems: [ev('handle_call/3')], maxDepth: 1, currentIndex: 1 });
    const second = makeStack({
      id: 'stack_2',
      displayName: 'Server',
      rootLocation: { fileId: '/ws/lib/server.ex', line: 7 },
      displayItems: [ev('init/1')],
      maxDepth: 1,
      currentIndex: 1,
    });

    const { lines } = renderPanel(collectionOf([first, second], 'stack_2'), DEFAULT_PANEL_CONFIG);

    expect(lines).toEqual([
      '📁 Tag Stacks:',
      '  (2 stacks)',
      '  UserController',
      '  UserController (root)',
      '  ↓',
      '  Server.handle_call/3',
      '',
      '▶ Server',
      '  Server (root)',
      '  ↓',
      '  Server.init/1 ← [current]',
      '',
    ]);
  });

  it('applies name options from the config', () => {
    const stack = makeStack({ displayItems: [ev('handle_call/3')], maxDepth: 1, currentIndex: 1 });
    const config = { ...DEFAULT_PANEL_CONFIG, showArity: false, showModulePath: false };

    expect(renderPanel(collectionOf([stack], 'stack_1'), config).lines[4]).toBe('  handle_call ← [current]');
  });
});

describe('display formatter cache', () => {
  it('returns the same output until invalidated', () => {
    const stack = makeStack({ displayItems: [ev('init/1')], maxDepth: 1, currentIndex: 1 });
    const collection = collectionOf([stack], 'stack_1');
    const formatter = new DisplayFormatter();

    const first = formatter.render(collection, DEFAULT_PANEL_CONFIG);
    const second = formatter.render(collection, DEFAULT_PANEL_CONFIG);
    expect(second).toBe(first);

    stack.currentIndex = 0;
    expect(formatter.render(collection, DEFAULT_PANEL_CONFIG)).toBe(first);

    formatter.invalidate();
    const third = formatter.render(collection, DEFAULT_PANEL_CONFIG);
    expect(third).not.toBe(first);
    expect(third.lines[2]).toBe('  UserController (root) ← [current]');
  });

  it('re-renders for a different config object', () => {
    const collection = collectionOf([makeStack()], 'stack_1');
    const formatter = new DisplayFormatter();

    const first = formatter.render(collection, DEFAULT_PANEL_CONFIG);
    expect(formatter.render(collection, { ...DEFAULT_PANEL_CONFIG })).not.toBe(first);
  });
});
