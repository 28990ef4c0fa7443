/**
 * FIRMS CSV parsing Unit Tests
 */

import { parseFirmsCsv } from "../../../src/infrastructure/firms/firmsCsv"

const VIIRS_CSV = [
  "latitude,longitude,bright_ti4,scan,track,acq_date,acq_time,satellite,instrument,confidence,version,bright_ti5,frp,daynight",
  "37.7749,-122.4194,330.5,0.39,0.36,2024-07-01,1230,N,VIIRS,h,2.0NRT,290.1,12.3,D",
  "-12.5,130.8,301.2,0.4,0.37,2024-07-01,45,N,VIIRS,n,2.0NRT,288.0,3.1,N",
  "",
].join("\n")

describe("parseFirmsCsv", () => {
  it("should parse VIIRS rows", () => {
    const fires = parseFirmsCsv(VIIRS_CSV)

    expect(fires).toHaveLength(2)
    expect(fires[0]).toEqual({
      latitude: 37.7749,
      longitude: -122.4194,
      brightness: 330.5,
      confidence: "h",
      frp: 12.3,
      acq_date: "2024-07-01",
      acq_time: "1230",
      satellite: "N",
      instrument: "VIIRS",
      daynight: "D",
    })
    expect(fires[1].acq_time).toBe("45")
  })

  it("should read MODIS brightness", () => {
    const csv = [
      "latitude,longitude,brightness,acq_date,acq_time,satellite,instrument,confidence,frp,daynight",
      "10,20,315.2,2024-07-01,0100,Terra,MODIS,85,20.5,N",
    ].join("\r\n")

    expect(parseFirmsCsv(csv)[0]).toMatchObject({ brightness: 315.2, confidence: "85", instrument: "MODIS" })
  })

  it("should skip truncated rows", () => {
    const csv = "latitude,longitude,frp\n1,2,3\n4,5"

    expect(parseFirmsCsv(csv)).toHaveLength(1)
  })

  it("should return nothing for a header-only body", () => {
    expect(parseFirmsCsv("latitude,longitude\n")).toEqual([])
  })
})
