import { describe, expect, it } from 'vitest';
import { computeSize, defaultSizeFor, resolveCells } from './sizing';
import { resolveConfig } from '../config';
import { normalizePanel } from '../registry';
import type { PanelInput } from '../../types';

const config = resolveConfig({ leftWidth: 30, bottomHeight: 0.25 });

function panel(extra: Partial<PanelInput>) {
  return normalizePanel({ name: 'p', edge: 'left', filter: () => false, open: 'x', ...extra });
}

describe('resolveCells', () => {
  it('takes a fraction of the total', () => {
    expect(resolveCells(0.5, 80)).toBe(40);
    expect(resolveCells(0.25, 50)).toBe(12);
  });

  it('uses absolute sizes regardless of the total', () => {
    expect(resolveCells(25, 80)).toBe(25);
    expect(resolveCells(25, 10)).toBe(25);
  });

  it('never yields less than one cell', () => {
    expect(resolveCells(0.01, 20)).toBe(1);
    expect(resolveCells(0.5, 0)).toBe(1);
  });
});

describe('computeSize', () => {
  it('prefers the panel size', () => {
    expect(computeSize(panel({ size: 0.5 }), 80, config)).toBe(40);
    expect(computeSize(panel({ size: 25 }), 80, config)).toBe(25);
  });

  it('falls back to the edge default', () => {
    expect(computeSize(panel({}), 200, config)).toBe(30);
    expect(computeSize(panel({ edge: 'bottom' }), 40, config)).toBe(10);
  });
});

describe('defaultSizeFor', () => {
  it('maps each edge to its configured default', () => {
    const defaults = resolveConfig();
    expect(defaultSizeFor('left', defaults)).toBe(40);
    expect(defaultSizeFor('right', defaults)).toBe(40);
    expect(defaultSizeFor('top', defaults)).toBe(0.4);
    expect(defaultSizeFor('bottom', defaults)).toBe(0.4);
  });
});
