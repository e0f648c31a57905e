import { asISODateString, isISODateString, isUUID } from "./guards.js";

describe("guards", () => {
  describe("isUUID", () => {
    it("should accept a v4 UUID", () => {
      expect(isUUID("3b241101-e2bb-4255-8caf-4136c566a962")).toBe(true);
    });

    it("should reject other strings and non-strings", () => {
      expect(isUUID("not-a-uuid")).toBe(false);
      expect(isUUID(42)).toBe(false);
    });
  });

  describe("isISODateString", () => {
    it("should accept the toISOString rendering", () => {
      expect(isISODateString("2024-03-01T10:30:00.000Z")).toBe(true);
    });

    it("should reject dates without milliseconds or zone", () => {
      expect(isISODateString("2024-03-01T10:30:00")).toBe(false);
      expect(isISODateString("2024-03-01")).toBe(false);
    });

    it("should throw from asISODateString on invalid input", () => {
      expect(() => asISODateString("yesterday")).toThrow(
        "Invalid ISO date string: yesterday",
      );
    });
  });
});
