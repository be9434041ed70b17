/**
 * Panel Registry
 *
 * Holds every registered panel keyed by name, plus the per-edge index that
 * fixes the order live windows are scanned in.
 */

import type { Edge, PanelConfig, PanelInput } from '../../types';
import { EDGES } from '../../constants';
import { UnknownPanelError } from '../../errors';
import { createLogger } from '../logging';
import { normalizePanel } from './normalize';

const log = createLogger('registry');

export interface PanelRegistry {
  /** Register or overwrite a panel (last write wins) */
  register(input: PanelInput): PanelConfig;
  get(name: string): PanelConfig | undefined;
  /** Like get, but throws UnknownPanelError */
  require(name: string): PanelConfig;
  has(name: string): boolean;
  /** Registration order */
  all(): PanelConfig[];
  names(): string[];
  /** Registration order, without duplicates */
  namesAtEdge(edge: Edge): string[];
}

export function createPanelRegistry(): PanelRegistry {
  const panels = new Map<string, PanelConfig>();
  const edgeIndex = new Map<Edge, string[]>(EDGES.map((edge) => [edge, []]));

  function indexFor(edge: Edge): string[] {
    let names = edgeIndex.get(edge);
    if (!names) {
      names = [];
      edgeIndex.set(edge, names);
    }
    return names;
  }

  return {
    register(input: PanelInput): PanelConfig {
      const config = normalizePanel(input);
      const previous = panels.get(config.name);

      if (previous && previous.edge !== config.edge) {
        const stale = indexFor(previous.edge);
        stale.splice(stale.indexOf(config.name), 1);
      }

      const names = indexFor(config.edge);
      if (!names.includes(config.name)) {
        names.push(config.name);
      }

      panels.set(config.name, config);
      log.verbose(() =>
        previous
          ? `Re-registered panel ${config.name} at ${config.edge}`
          : `Registered panel ${config.name} at ${config.edge}`,
      );
      return config;
    },

    get(name: string): PanelConfig | undefined {
      return panels.get(name);
    },

    require(name: string): PanelConfig {
      const config = panels.get(name);
      if (!config) throw new UnknownPanelError(name);
      return config;
    },

    has(name: string): boolean {
      return panels.has(name);
    },

    all(): PanelConfig[] {
      return [...panels.values()];
    },

    names(): string[] {
      return [...panels.keys()];
    },

    namesAtEdge(edge: Edge): string[] {
      return [...indexFor(edge)];
    },
  };
}
