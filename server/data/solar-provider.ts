import * as Astronomy from "astronomy-engine";

export type SunTimes = {
  date: string;
  sunrise: Date | null;
  sunset: Date | null;
  solarNoon: Date | null;
  civilDawn: Date | null;
  civilDusk: Date | null;
  dayLengthMinutes: number | null;
};

export type SunPosition = {
  altitude: number;
  azimuth: number;
};

export type ElevationSample = {
  /** Minutes after the start of the sampled day. */
  minutes: number;
  altitude: number;
};

export type AnalemmaPoint = {
  date: string;
  /** 1-12 */
  month: number;
  /** Sun altitude at local solar noon. */
  altitude: number;
  /** Minutes the sun runs ahead of clock time (negative when late). */
  equationOfTime: number;
};

const DAY_MS = 24 * 60 * 60 * 1000;
const MINUTE_MS = 60 * 1000;
const CIVIL_TWILIGHT_ALTITUDE = -6;
const ANALEMMA_STEP_DAYS = 7;
const PRIME_MERIDIAN = new Astronomy.Observer(0, 0, 0);

const toDate = (time: Astronomy.AstroTime | null): Date | null => (time ? time.date : null);

/** Sun rise/set and position for a fixed observer, computed with astronomy-engine. */
export class SolarProvider {
  readonly latitude: number;
  readonly longitude: number;
  private readonly observer: Astronomy.Observer;

  constructor(latitude: number, longitude: number) {
    this.latitude = latitude;
    this.longitude = longitude;
    this.observer = new Astronomy.Observer(latitude, longitude, 0);
  }

  /**
   * Local solar midnight before `at`, approximated from longitude so searches
   * cover the observer's own calendar day.
   */
  solarDayStart(at: Date): Date {
    const offsetMs = (this.longitude / 15) * 60 * 60 * 1000;
    const local = at.getTime() + offsetMs;
    return new Date(Math.floor(local / DAY_MS) * DAY_MS - offsetMs);
  }

  getSunTimes(at: Date = new Date()): SunTimes {
    const start = this.solarDayStart(at);
    const sunrise = toDate(Astronomy.SearchRiseSet(Astronomy.Body.Sun, this.observer, +1, start, 1));
    const sunset = toDate(Astronomy.SearchRiseSet(Astronomy.Body.Sun, this.observer, -1, start, 1));
    const civilDawn = toDate(
      Astronomy.SearchAltitude(Astronomy.Body.Sun, this.observer, +1, start, 1, CIVIL_TWILIGHT_ALTITUDE),
    );
    const civilDusk = toDate(
      Astronomy.SearchAltitude(Astronomy.Body.Sun, this.observer, -1, start, 1, CIVIL_TWILIGHT_ALTITUDE),
    );
    const noon = Astronomy.SearchHourAngle(Astronomy.Body.Sun, this.observer, 0, start);
    const dayLengthMinutes =
      sunrise && sunset && sunset.getTime() > sunrise.getTime()
        ? (sunset.getTime() - sunrise.getTime()) / 60000
        : null;

    return {
      date: new Date(start.getTime() + (this.longitude / 15) * 60 * 60 * 1000).toISOString().slice(0, 10),
      sunrise,
      sunset,
      solarNoon: noon.time.date,
      civilDawn,
      civilDusk,
      dayLengthMinutes,
    };
  }

  getSunPosition(at: Date = new Date()): SunPosition {
    const equator = Astronomy.Equator(Astronomy.Body.Sun, at, this.observer, true, true);
    const horizon = Astronomy.Horizon(at, this.observer, equator.ra, equator.dec, "normal");
    return { altitude: horizon.altitude, azimuth: horizon.azimuth };
  }

  /** Sun altitude every `stepMinutes` across the 24 hours from `dayStart`. */
  getElevationCurve(dayStart: Date, stepMinutes = 30): ElevationSample[] {
    const samples: ElevationSample[] = [];
    for (let minutes = 0; minutes < 24 * 60; minutes += stepMinutes) {
      const { altitude } = this.getSunPosition(new Date(dayStart.getTime() + minutes * MINUTE_MS));
      samples.push({ minutes, altitude });
    }
    return samples;
  }

  /** Minutes between 12:00 UTC and the sun's transit of the prime meridian on `at`'s UTC date. */
  getEquationOfTime(at: Date = new Date()): number {
    const midnight = new Date(Date.UTC(at.getUTCFullYear(), at.getUTCMonth(), at.getUTCDate()));
    const transit = Astronomy.SearchHourAngle(Astronomy.Body.Sun, PRIME_MERIDIAN, 0, midnight).time.date;
    const transitMinutes = transit.getUTCHours() * 60 + transit.getUTCMinutes() + transit.getUTCSeconds() / 60;
    return 12 * 60 - transitMinutes;
  }

  /** Noon altitude and equation of time every seven days through `year`. */
  getAnalemma(year: number): AnalemmaPoint[] {
    const points: AnalemmaPoint[] = [];
    for (let day = new Date(Date.UTC(year, 0, 1)); day.getUTCFullYear() === year; ) {
      const morning = new Date(day.getTime() + 6 * 60 * MINUTE_MS);
      const transit = Astronomy.SearchHourAngle(Astronomy.Body.Sun, this.observer, 0, morning);
      points.push({
        date: day.toISOString().slice(0, 10),
        month: day.getUTCMonth() + 1,
        altitude: transit.hor.altitude,
        equationOfTime: this.getEquationOfTime(day),
      });
      day = new Date(day.getTime() + ANALEMMA_STEP_DAYS * DAY_MS);
    }
    return points;
  }

  /** Change in day length versus the previous day, in minutes. */
  getDayLengthChange(at: Date = new Date()): number | null {
    const today = this.getSunTimes(at).dayLengthMinutes;
    const yesterday = this.getSunTimes(new Date(at.getTime() - DAY_MS)).dayLengthMinutes;
    if (today === null || yesterday === null) return null;
    return today - yesterday;
  }
}
