import { describe, expect, it } from "vitest";
import { aqiCategory, degreesToCompass, pm25ToAqi } from "../server/data/weather-math";

describe("air quality index", () => {
  it("interpolates within breakpoints", () => {
    expect(pm25ToAqi(0)).toBe(0);
    expect(pm25ToAqi(6)).toBe(25);
    expect(pm25ToAqi(20)).toBe(67);
    expect(pm25ToAqi(35.5)).toBe(101);
    expect(pm25ToAqi(55.5)).toBe(151);
    expect(pm25ToAqi(150.5)).toBe(201);
    expect(pm25ToAqi(250.5)).toBe(301);
  });

  it("caps above the scale and zeroes the gaps between breakpoints", () => {
    expect(pm25ToAqi(600)).toBe(500);
    expect(pm25ToAqi(12.05)).toBe(0);
  });

  it("names categories by upper bound", () => {
    expect(aqiCategory(50)).toBe("Good");
    expect(aqiCategory(51)).toBe("Moderate");
    expect(aqiCategory(150)).toBe("Unhealthy for Sensitive");
    expect(aqiCategory(200)).toBe("Unhealthy");
    expect(aqiCategory(201)).toBe("Very Unhealthy");
    expect(aqiCategory(301)).toBe("Hazardous");
  });
});

describe("compass direction", () => {
  it("maps degrees onto sixteen points", () => {
    expect(degreesToCompass(0)).toBe("N");
    expect(degreesToCompass(11.24)).toBe("N");
    expect(degreesToCompass(11.25)).toBe("NNE");
    expect(degreesToCompass(90)).toBe("E");
    expect(degreesToCompass(180)).toBe("S");
    expect(degreesToCompass(270)).toBe("W");
    expect(degreesToCompass(348.75)).toBe("N");
    expect(degreesToCompass(-22.5)).toBe("NNW");
  });
});
