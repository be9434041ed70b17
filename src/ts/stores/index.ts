/**
 * Nanostores State Management
 *
 * Reactive state published at every settle point. Status displays subscribe
 * here; nothing in edgedock reads these stores back for control decisions.
 *
 * Naming convention: $storeName (dollar prefix for stores)
 */

import { map, computed } from 'nanostores';
import type { Edge, NotificationSink } from '../types';

// =============================================================================
// Active Panel Stores
// =============================================================================

export type ActivePanels = Record<Edge, string | null>;

function emptyActivePanels(): ActivePanels {
  return { left: null, right: null, top: null, bottom: null };
}

/**
 * Active panel per edge.
 * Use setActivePanel(edge, name) for updates.
 */
export const $activePanels = map<ActivePanels>(emptyActivePanels());

/** Names of every active panel, in edge order (derived) */
export const $activePanelNames = computed($activePanels, (active) =>
  [active.left, active.right, active.top, active.bottom].filter(
    (name): name is string => name !== null,
  ),
);

// =============================================================================
// Helper Functions
// =============================================================================

export function setActivePanel(edge: Edge, name: string | null): void {
  $activePanels.setKey(edge, name);
}

export function getActivePanel(edge: Edge): string | null {
  return $activePanels.get()[edge];
}

export function resetActivePanels(): void {
  $activePanels.set(emptyActivePanels());
}

/** NotificationSink publishing into $activePanels */
export const storeNotificationSink: NotificationSink = {
  setActive(edge: Edge, name: string | null): void {
    setActivePanel(edge, name);
  },
};
