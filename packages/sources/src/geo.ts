import type { SourceRegistry } from "./registry.js";
import type { SourceDescriptor, SourceLocation } from "./types.js";

export const EARTH_RADIUS_KM = 6371;

export type Coordinates = Pick<SourceLocation, "latitude" | "longitude">;

export type NearestSource = {
  source: SourceDescriptor & { location: SourceLocation };
  distanceKm: number;
};

function toRadians(degrees: number) {
  return (degrees * Math.PI) / 180;
}

/** Great-circle distance in kilometres. */
export function haversineKm(from: Coordinates, to: Coordinates) {
  const dLat = toRadians(to.latitude - from.latitude);
  const dLng = toRadians(to.longitude - from.longitude);

  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(from.latitude)) *
      Math.cos(toRadians(to.latitude)) *
      Math.sin(dLng / 2) ** 2;

  return 2 * EARTH_RADIUS_KM * Math.asin(Math.min(1, Math.sqrt(a)));
}

export function findNearestSource(
  registry: Pick<SourceRegistry, "listWithLocation">,
  latitude: number,
  longitude: number
): NearestSource | null {
  let nearest: NearestSource | null = null;

  for (const descriptor of registry.listWithLocation()) {
    const { location } = descriptor;
    if (!location) continue;

    const distanceKm = haversineKm({ latitude, longitude }, location);
    // strict comparison: the first of equally near sources wins
    if (!nearest || distanceKm < nearest.distanceKm) {
      nearest = { source: { ...descriptor, location }, distanceKm };
    }
  }

  return nearest;
}
