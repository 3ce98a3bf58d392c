import { InvalidRouteException } from '../exceptions/settlement.exceptions';
import { DistanceRoute, routeKey } from './distance-route.entity';

export type RouteSource = RouteMap | ReadonlyArray<DistanceRoute>;

/**
 * Distance matrix indexed by (origin, destination, segment flag).
 *
 * Callers settling many trips against the same matrix should build the map
 * once and pass it to every calculation.
 */
export class RouteMap {
  private readonly routes: ReadonlyMap<string, DistanceRoute>;

  private constructor(routes: Map<string, DistanceRoute>) {
    this.routes = routes;
  }

  static from(routes: Iterable<DistanceRoute>): RouteMap {
    const index = new Map<string, DistanceRoute>();

    for (const route of routes) {
      const existing = index.get(route.key);
      if (existing) {
        throw new InvalidRouteException(
          `Duplicate ${route.kind} route ${route.originId} → ${route.destinationId} ` +
            `(${existing.distanceKm} km and ${route.distanceKm} km)`,
          {
            origin_id: route.originId,
            destination_id: route.destinationId,
            is_segment_link: route.isSegmentLink,
          },
        );
      }
      index.set(route.key, route);
    }

    return new RouteMap(index);
  }

  find(originId: number, destinationId: number, isSegmentLink: boolean): DistanceRoute | undefined {
    return this.routes.get(routeKey(originId, destinationId, isSegmentLink));
  }

  require(originId: number, destinationId: number, isSegmentLink: boolean): DistanceRoute {
    const route = this.find(originId, destinationId, isSegmentLink);
    if (!route) {
      const kind = isSegmentLink ? 'segment link' : 'direct';
      throw new InvalidRouteException(
        `No ${kind} route from ${originId} to ${destinationId} in the distance matrix`,
        { origin_id: originId, destination_id: destinationId, is_segment_link: isSegmentLink },
      );
    }
    return route;
  }
}
