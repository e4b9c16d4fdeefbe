import type { LegKind } from '../types/trip';

export const LEG_KIND_LABELS: Record<LegKind, string> = {
  to_pickup: 'Current Location to Pickup',
  to_dropoff: 'Pickup to Dropoff',
};

export function legKindLabel(kind: LegKind): string {
  return LEG_KIND_LABELS[kind] ?? kind;
}
