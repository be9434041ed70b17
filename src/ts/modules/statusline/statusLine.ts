/**
 * Status Line
 *
 * Renders one segment per registered panel, highlighting the panels that
 * are currently active at their edge. Derived from $activePanels so a
 * status display only has to subscribe to $text.
 */

import { atom, computed, type ReadableAtom } from 'nanostores';
import type { PanelConfig, StatusLineOptions } from '../../types';
import { $activePanels, type ActivePanels } from '../../stores';
import type { PanelRegistry } from '../registry';

export interface StatusSegment {
  name: string;
  text: string;
  active: boolean;
}

export interface PanelStatusLine {
  $segments: ReadableAtom<StatusSegment[]>;
  $text: ReadableAtom<string>;
  /** Re-read the registry after panels were registered */
  refresh(): void;
}

export function buildSegments(
  panels: PanelConfig[],
  active: ActivePanels,
  options: StatusLineOptions,
): StatusSegment[] {
  return panels
    .filter((panel) => options.edge === null || panel.edge === options.edge)
    .map((panel) => {
      const icon = panel.icon ?? options.defaultIcon;
      return {
        name: panel.name,
        text: options.showNames ? `${icon} ${panel.name}` : icon,
        active: active[panel.edge] === panel.name,
      };
    });
}

export function renderSegments(segments: StatusSegment[], options: StatusLineOptions): string {
  return segments
    .map((segment) => (segment.active ? options.activeMarker : options.inactiveMarker) + segment.text)
    .join(options.separator);
}

export function createPanelStatusLine(
  registry: PanelRegistry,
  options: StatusLineOptions,
  $active: ReadableAtom<ActivePanels> = $activePanels,
): PanelStatusLine {
  const $registryVersion = atom(0);

  const $segments = computed([$active, $registryVersion], (active) =>
    buildSegments(registry.all(), active, options),
  );
  const $text = computed($segments, (segments) => renderSegments(segments, options));

  return {
    $segments,
    $text,
    refresh(): void {
      $registryVersion.set($registryVersion.get() + 1);
    },
  };
}
