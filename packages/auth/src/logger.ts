import { getLogger } from '@gantry/telemetry'

/**
 * Get a logger for the auth package
 * @param subcategory Optional subcategory like 'bootstrap', 'realm', etc.
 */
export function getAuthLogger(subcategory?: string) {
  const category = subcategory ? ['gantry', 'auth', subcategory] : ['gantry', 'auth']
  return getLogger(category)
}
