/**
 * Taxi Tracker - Singapore taxi availability by planning area
 *
 * Fetches live taxi positions (data.gov.sg) and planning-area boundaries
 * (OneMap), assigns every taxi to the area containing it and ranks the
 * areas by taxi count.
 *
 * @packageDocumentation
 */

// Pipeline
export {
    TaxiTrackerService,
    createTaxiTrackerService,
    type TaxiPositionSource,
    type PlanningAreaSource,
    type AreaDescriber,
    type TaxiTrackerDependencies,
    type RunOptions,
} from './services/taxi-tracker-service.js';

// Area resolution
export { AreaResolver } from './services/area-resolver.js';
export { PointInPolygonEngine, DEFAULT_BOUNDARY_TOLERANCE } from './services/pip-engine.js';

// Aggregation
export {
    countByArea,
    rankAreaCounts,
    compareRankedAreas,
    buildAreaCounts,
    centroidOf,
    DEFAULT_TOP_K,
    type RankedArea,
} from './services/aggregator.js';
export { buildMapLink, formatCoordinates } from './services/maps-link.js';
export { ReverseGeocoder, createReverseGeocoder } from './services/reverse-geocoder.js';

// Providers
export {
    TaxiAvailabilityProvider,
    createTaxiAvailabilityProvider,
} from './providers/taxi-availability-provider.js';
export {
    PlanningAreaProvider,
    createPlanningAreaProvider,
    buildPlanningArea,
    describePlanningArea,
    parseAreaGeometry,
} from './providers/planning-area-provider.js';

// Configuration and rendering
export { loadConfig, DEFAULT_CONFIG, type TrackerConfig, type OutputFormat } from './cli/lib/config.js';
export { formatReport } from './cli/lib/report.js';

// Core
export * from './core/types.js';
export * from './core/errors.js';
export { HTTPClient, createHTTPClient } from './core/http-client.js';
