/**
 * @swapdesk/matching: Distance and travel-time estimates.
 */

import type { GeoLocation } from "@swapdesk/types";

export const EARTH_RADIUS_KM = 6371;

export type AreaType = "urban" | "suburban" | "rural" | "unknown";

/** Assumed travel speed in km/h */
export const AREA_SPEEDS: Readonly<Record<AreaType, number>> = {
  urban: 20,
  suburban: 30,
  rural: 40,
  unknown: 25,
};

const URBAN_KEYWORDS = ["city", "blantyre", "lilongwe", "mzuzu", "zomba"];
const SUBURBAN_KEYWORDS = ["town", "trading", "market"];

function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

/**
 * Great-circle distance in kilometres (haversine).
 */
export function haversineKm(
  a: Pick<GeoLocation, "lat" | "lng">,
  b: Pick<GeoLocation, "lat" | "lng">,
): number {
  const dLat = toRadians(b.lat - a.lat);
  const dLng = toRadians(b.lng - a.lng);
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(a.lat)) * Math.cos(toRadians(b.lat)) * Math.sin(dLng / 2) ** 2;
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.min(1, Math.sqrt(h)));
}

/**
 * Classify an address by keyword. An empty address is "unknown".
 */
export function areaType(address: string): AreaType {
  const lower = address.trim().toLowerCase();
  if (lower.length === 0) return "unknown";
  if (URBAN_KEYWORDS.some((k) => lower.includes(k))) return "urban";
  if (SUBURBAN_KEYWORDS.some((k) => lower.includes(k))) return "suburban";
  return "rural";
}

/**
 * Human-readable travel time for a distance.
 *
 * "Location required" without a distance, otherwise "Less than 1 min",
 * "N min" or "Hh Mm".
 */
export function estimateTransferTime(
  distanceKm: number | null,
  area: AreaType = "unknown",
): string {
  if (distanceKm === null) return "Location required";

  const minutes = (distanceKm / AREA_SPEEDS[area]) * 60;
  if (minutes < 1) return "Less than 1 min";
  if (minutes < 60) return `${Math.floor(minutes)} min`;

  const hours = Math.floor(minutes / 60);
  const rest = Math.floor(minutes % 60);
  return `${hours}h ${rest}m`;
}
