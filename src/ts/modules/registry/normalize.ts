/**
 * Panel Input Normalization
 *
 * Turns the loose PanelInput a user writes into the tagged, frozen
 * PanelConfig the rest of edgedock works with.
 */

import type { Action, Edge, OptionValue, PanelConfig, PanelInput, WindowLocatorSpec } from '../../types';
import { EDGES } from '../../constants';
import { ConfigError } from '../../errors';

export function isEdge(value: unknown): value is Edge {
  return typeof value === 'string' && (EDGES as readonly string[]).includes(value);
}

export function toAction(value: string | (() => void | Promise<void>)): Action {
  if (typeof value === 'function') {
    return { kind: 'callback', run: value };
  }
  return { kind: 'command', command: value };
}

function toLocator(input: PanelInput): WindowLocatorSpec | null {
  if (input.getWindow) return { kind: 'resolver', resolve: input.getWindow };
  if (input.filter) return { kind: 'predicate', matches: input.filter };
  return null;
}

/**
 * Exemption patterns are JavaScript regular expressions matched unanchored
 * against the other panel's name. Stateful flags are dropped so test() is pure.
 */
export function toPatterns(
  name: string,
  value: PanelInput['exemptFrom'],
): RegExp[] {
  if (value === undefined) return [];
  const list: ReadonlyArray<string | RegExp> =
    typeof value === 'string' || value instanceof RegExp ? [value] : value;

  return list.map((pattern) => {
    if (pattern instanceof RegExp) {
      return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
    }
    try {
      return new RegExp(pattern);
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new ConfigError(`Panel ${name}: invalid exemptFrom pattern "${pattern}" (${reason})`);
    }
  });
}

export function isValidSize(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

/**
 * Validate and normalize a panel description.
 * Throws ConfigError without side effects when the input is malformed.
 */
export function normalizePanel(input: PanelInput): PanelConfig {
  const name = input.name;
  if (typeof name !== 'string' || name.length === 0) {
    throw new ConfigError('Panel description must include a name');
  }
  if (input.edge === undefined) {
    throw new ConfigError(`Panel ${name} must include an edge`);
  }
  if (!isEdge(input.edge)) {
    throw new ConfigError(
      `Panel ${name}: unrecognized edge "${input.edge}" (expected ${EDGES.join(', ')})`,
    );
  }

  const locator = toLocator(input);
  if (!locator) {
    throw new ConfigError(`Panel ${name} must include a filter or getWindow`);
  }
  if (input.open === undefined) {
    throw new ConfigError(`Panel ${name} must include an open action`);
  }
  if (input.size !== undefined && !isValidSize(input.size)) {
    throw new ConfigError(`Panel ${name}: size must be a positive number, got ${input.size}`);
  }

  const options: Record<string, OptionValue> = { ...(input.options ?? {}) };

  return Object.freeze({
    name,
    edge: input.edge,
    locator,
    openAction: toAction(input.open),
    closeAction: input.close === undefined ? null : toAction(input.close),
    size: input.size ?? null,
    move: input.move ?? null,
    options: Object.freeze(options),
    exemptFrom: Object.freeze(toPatterns(name, input.exemptFrom)),
    icon: input.icon ?? null,
  });
}
