/**
 * Feed routing expression (ULTRAFEEDER_CONFIG) assembled from credentials
 */

import type { FeedRouting } from '../config/service-catalog';

const REFERENCE = /\{([A-Z0-9_]+)\}/g;

/**
 * Configuration keys referenced by any route
 */
export function routingKeys(routing: FeedRouting): string[] {
  const keys = new Set<string>();
  for (const route of routing.routes) {
    for (const match of route.matchAll(REFERENCE)) {
      keys.add(match[1]);
    }
  }
  return [...keys];
}

/**
 * Build the expression. A route whose credential is missing or empty is left
 * out; placeholder values are routed as they are.
 */
export function buildFeedRouting(routing: FeedRouting, values: Readonly<Record<string, string>>): string {
  const routes: string[] = [];
  for (const route of routing.routes) {
    let complete = true;
    const filled = route.replace(REFERENCE, (_whole, key: string) => {
      const value = values[key];
      if (value === undefined || value === '') {
        complete = false;
        return '';
      }
      return value;
    });
    if (complete) {
      routes.push(filled);
    }
  }
  return routes.join(';');
}
