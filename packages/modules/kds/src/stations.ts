import type { Station } from './types';

export interface StationDirectory {
  /** Null when the station does not exist in `hubId`. */
  getStation(hubId: string, stationId: string): Promise<Station | null>;
}

export class InMemoryStationDirectory implements StationDirectory {
  private readonly stations = new Map<string, Station>();

  constructor(stations: Station[] = []) {
    for (const station of stations) this.upsert(station);
  }

  upsert(station: Station): void {
    this.stations.set(`${station.hubId}:${station.id}`, { ...station });
  }

  async getStation(hubId: string, stationId: string): Promise<Station | null> {
    const station = this.stations.get(`${hubId}:${stationId}`);
    return station ? { ...station } : null;
  }
}
