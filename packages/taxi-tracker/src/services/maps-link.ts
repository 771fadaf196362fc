/**
 * Google Maps search links
 *
 * @see https://developers.google.com/maps/documentation/urls/get-started#search-action
 */

import type { LatLng } from '../core/types.js';

const GOOGLE_MAPS_SEARCH_URL = 'https://www.google.com/maps/search/?api=1&query=';

/**
 * Format coordinates as "lat,lng" with 6 decimals (~0.1 m)
 */
export function formatCoordinates(location: LatLng): string {
  return `${location.lat.toFixed(6)},${location.lng.toFixed(6)}`;
}

/**
 * Link to a map search for a coordinate or a free-text place name
 */
export function buildMapLink(query: LatLng | string): string {
  if (typeof query === 'string') {
    return GOOGLE_MAPS_SEARCH_URL + encodeURIComponent(`${query}, Singapore`);
  }
  return GOOGLE_MAPS_SEARCH_URL + formatCoordinates(query);
}
