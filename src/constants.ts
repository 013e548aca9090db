/**
 * GeoGrid Constants
 *
 * Centralized constants used throughout the codebase.
 * Single source of truth for caps and defaults.
 */

// =============================================================================
// Precision
// =============================================================================

/**
 * Coarsest precision level supported by the precision table
 */
export const MIN_PRECISION = 1

/**
 * Finest precision level supported by the precision table
 */
export const MAX_PRECISION = 8

/**
 * Precision used when neither a precision nor a radius is given (~2.4km cells)
 */
export const DEFAULT_PRECISION = 5

// =============================================================================
// Search
// =============================================================================

/**
 * Default radius for radius searches, in kilometers
 */
export const DEFAULT_SEARCH_RADIUS_KM = 20

/**
 * Hard cap on the number of rings an expansion may emit.
 * Unbounded top-N searches stop with ExpansionExhaustedError past this point.
 */
export const MAX_FRONTIER_RINGS = 5000

// =============================================================================
// Geodesy
// =============================================================================

/**
 * Mean Earth radius in kilometers
 */
export const EARTH_RADIUS_KM = 6371
