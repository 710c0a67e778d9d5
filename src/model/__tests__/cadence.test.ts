import { Cadence, DEFAULT_CADENCE, isCadence, parseCadence } from "../cadence.js";

describe("cadence", () => {
  describe("parseCadence", () => {
    it("should default to daily when not configured", () => {
      expect(parseCadence(undefined)).toBe(Cadence.Daily);
      expect(parseCadence(null)).toBe(DEFAULT_CADENCE);
    });

    it("should accept every known cadence regardless of case and padding", () => {
      expect(parseCadence("hourly")).toBe(Cadence.Hourly);
      expect(parseCadence(" Daily ")).toBe(Cadence.Daily);
      expect(parseCadence("ON_STARTUP")).toBe(Cadence.OnStartup);
      expect(parseCadence("never")).toBe(Cadence.Never);
    });

    it("should reject unknown values", () => {
      expect(parseCadence("weekly")).toBeUndefined();
      expect(parseCadence("")).toBeUndefined();
      expect(parseCadence(24)).toBeUndefined();
    });
  });

  describe("isCadence", () => {
    it("should only accept the exact enum values", () => {
      expect(isCadence("hourly")).toBe(true);
      expect(isCadence("Hourly")).toBe(false);
      expect(isCadence(undefined)).toBe(false);
    });
  });
});
