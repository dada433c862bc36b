/**
 * View Context
 *
 * The helper set for the request currently being rendered. Controllers
 * install one per request; decorators read it when they first need helpers.
 */

import { ViewHelpers } from './helpers.ts';

let currentHelpers: ViewHelpers | null = null;

/**
 * Get the helpers for the current view, creating a default set on first use
 */
export function getViewHelpers(): ViewHelpers {
  if (!currentHelpers) {
    currentHelpers = new ViewHelpers();
  }
  return currentHelpers;
}

/**
 * Install the helpers for the current view. Passing null resets to defaults.
 */
export function setViewHelpers(helpers: ViewHelpers | null): void {
  currentHelpers = helpers;
}

/**
 * Run `fn` with `helpers` installed, restoring the previous set afterwards
 */
export function withViewHelpers<T>(helpers: ViewHelpers, fn: () => T): T {
  const previous = currentHelpers;
  currentHelpers = helpers;
  try {
    return fn();
  } finally {
    currentHelpers = previous;
  }
}
