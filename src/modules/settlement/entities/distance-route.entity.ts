import { InvalidRouteException } from '../exceptions/settlement.exceptions';
import { isPositiveNumber } from './settlement.enums';

export interface DistanceRouteProps {
  originId: number;
  destinationId: number;
  distanceKm: number;
  isSegmentLink?: boolean;
}

export type RouteLegKind = 'segment link' | 'direct';

export function routeKey(originId: number, destinationId: number, isSegmentLink: boolean): string {
  return `${originId}:${destinationId}:${isSegmentLink ? 'link' : 'direct'}`;
}

/**
 * One edge of the distance matrix. Segment links are intermediate pickup legs
 * of a consolidated trip; the rest are terminal main-haul legs.
 */
export class DistanceRoute {
  readonly originId: number;
  readonly destinationId: number;
  readonly distanceKm: number;
  readonly isSegmentLink: boolean;

  private constructor(props: Required<DistanceRouteProps>) {
    this.originId = props.originId;
    this.destinationId = props.destinationId;
    this.distanceKm = props.distanceKm;
    this.isSegmentLink = props.isSegmentLink;
    Object.freeze(this);
  }

  static create(props: DistanceRouteProps): DistanceRoute {
    const { originId, destinationId, distanceKm } = props;

    if (!Number.isInteger(originId) || !Number.isInteger(destinationId)) {
      throw new InvalidRouteException(
        `Route endpoints must be integer ids, received ${originId} → ${destinationId}`,
        { origin_id: originId, destination_id: destinationId },
      );
    }
    if (!isPositiveNumber(distanceKm)) {
      throw new InvalidRouteException(
        `Route ${originId} → ${destinationId} must have a positive distance, received ${distanceKm}`,
        { origin_id: originId, destination_id: destinationId, distance_km: distanceKm },
      );
    }

    return new DistanceRoute({
      originId,
      destinationId,
      distanceKm,
      isSegmentLink: props.isSegmentLink ?? false,
    });
  }

  get key(): string {
    return routeKey(this.originId, this.destinationId, this.isSegmentLink);
  }

  get kind(): RouteLegKind {
    return this.isSegmentLink ? 'segment link' : 'direct';
  }
}
