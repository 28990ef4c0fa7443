/**
 * Test fixtures
 */

import type { FireRecord, RawFireEvent } from "../../src/domain/fire/Fire"

export function rawFire(overrides: RawFireEvent = {}): RawFireEvent {
  return {
    latitude: 37.7749,
    longitude: -122.4194,
    brightness: 330.5,
    confidence: "high",
    frp: 12.3,
    acq_date: "2024-07-01",
    acq_time: "1230",
    satellite: "N",
    instrument: "VIIRS",
    daynight: "D",
    ...overrides,
  }
}

export function fireRecord(overrides: Partial<FireRecord> = {}): FireRecord {
  return {
    fireId: "37.7749_-122.4194_2024-07-01_1230",
    timestamp: 1719837000,
    latitude: 37.7749,
    longitude: -122.4194,
    brightness: 330.5,
    confidence: "high",
    frp: 12.3,
    acqDate: "2024-07-01",
    acqTime: "1230",
    satellite: "N",
    instrument: "VIIRS",
    dayNight: "D",
    locationCity: "San Francisco",
    locationLocality: "San Francisco",
    locationState: "California",
    locationCountry: "United States of America (the)",
    createdAt: new Date("2024-07-01T12:45:00.000Z"),
    updatedAt: new Date("2024-07-01T12:45:00.000Z"),
    ...overrides,
  }
}
