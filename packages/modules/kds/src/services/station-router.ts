import type { StationDirectory } from '../stations';
import type { Station } from '../types';
import type { KitchenOrder } from '../validation';
import { RoutingError } from '../errors';

export type OrderLine = KitchenOrder['lines'][number];

export interface RoutedLine {
  line: OrderLine;
  station: Station;
}

export interface RoutingPlan {
  routed: RoutedLine[];
  errors: RoutingError[];
}

/**
 * Resolve every line of `order` to an active station. Lines that cannot be
 * routed become RoutingErrors; the rest of the order is still routed. Each
 * station is looked up at most once per call.
 */
export async function planRouting(
  hubId: string,
  order: KitchenOrder,
  directory: StationDirectory,
): Promise<RoutingPlan> {
  const cache = new Map<string, Promise<Station | null>>();
  const lookup = (stationId: string): Promise<Station | null> => {
    let pending = cache.get(stationId);
    if (!pending) {
      pending = directory.getStation(hubId, stationId);
      cache.set(stationId, pending);
    }
    return pending;
  };

  const plan: RoutingPlan = { routed: [], errors: [] };
  for (const line of order.lines) {
    const station = await lookup(line.stationId);
    if (!station) {
      plan.errors.push(new RoutingError(order.orderId, line.lineId, line.stationId, 'unknown_station'));
    } else if (!station.isActive) {
      plan.errors.push(new RoutingError(order.orderId, line.lineId, line.stationId, 'inactive_station'));
    } else {
      plan.routed.push({ line, station });
    }
  }
  return plan;
}
