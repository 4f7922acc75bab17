import { GeoPoint } from '../types/domain';

export const EARTH_RADIUS_KM = 6371.0;

function toRadians(degrees: number): number {
    return (degrees * Math.PI) / 180;
}

function isKnownLocation(point: GeoPoint | null): point is GeoPoint {
    if (!point) return false;
    if (!Number.isFinite(point.lat) || !Number.isFinite(point.lon)) return false;
    // (0, 0) resta il segnaposto legacy per "posizione sconosciuta"
    return !(point.lat === 0 && point.lon === 0);
}

/**
 * Distanza great-circle (haversine) in km.
 * Restituisce `null` se uno dei due punti è sconosciuto: il chiamante decide la penalità.
 */
export function haversineKm(a: GeoPoint | null, b: GeoPoint | null): number | null {
    if (!isKnownLocation(a) || !isKnownLocation(b)) {
        return null;
    }

    const lat1 = toRadians(a.lat);
    const lat2 = toRadians(b.lat);
    const dLat = toRadians(b.lat - a.lat);
    const dLon = toRadians(b.lon - a.lon);

    const h = Math.sin(dLat / 2) ** 2 + Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLon / 2) ** 2;
    const c = 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
    return EARTH_RADIUS_KM * c;
}

export function toGeoPoint(lat: number | null, lon: number | null): GeoPoint | null {
    if (lat === null || lon === null) {
        return null;
    }
    return { lat, lon };
}
